import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { TokenGateway } from '../gateway.js';
import validateRoutes from './routes/validate.js';
import adminRoutes from './routes/admin.js';

/**
 * Validate CORS origin - must be empty or a valid URL
 */
export function validateCorsOrigin(origin: string | undefined): string | false {
  if (!origin) return false;

  try {
    const url = new URL(origin);
    // Only allow http/https protocols
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return origin;
  } catch {
    return false;
  }
}

export interface ApiServerDeps {
  config: Config;
  gateway: TokenGateway;
  logger: Logger;
}

export async function createApiServer(deps: ApiServerDeps): Promise<FastifyInstance> {
  const { config, gateway, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 65536,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  await app.register(rateLimit, {
    max: config.server.rate_limit_max,
    timeWindow: config.server.rate_limit_window_ms,
    allowList: (request) => request.url === '/health',
  });

  // CORS - restrictive by default, validate origin URL
  await app.register(cors, {
    origin: validateCorsOrigin(config.server.cors_origin),
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  });

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('gateway', gateway);
  app.decorate('gatewayLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    const status = error.statusCode ?? 500;
    reply.code(status).send({
      error: status < 500 ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register routes
  await app.register(validateRoutes);
  await app.register(adminRoutes);

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    gateway: TokenGateway;
    gatewayLogger: Logger;
  }
}

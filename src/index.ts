import pino from 'pino';
import { DEV_HASH_SECRET, resolveConfig } from './config/index.js';
import { TokenGateway } from './gateway.js';
import { createApiServer } from './api/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/gateway.yaml';

async function main() {
  // Load configuration from file, then override with environment variables
  const config = resolveConfig(CONFIG_PATH);

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting tokengate...');
  logger.info(
    {
      configPath: CONFIG_PATH,
      servedPath: config.zero_trust.fail_safe_mode ? 'legacy' : 'enhanced',
      parallelValidation: config.zero_trust.parallel_validation.enabled,
    },
    'Configuration loaded'
  );

  if (config.tokens.hash_secret === DEV_HASH_SECRET) {
    logger.warn('tokens.hash_secret is the development default; set TOKEN_HASH_SECRET');
  }

  // Initialize database and gateway
  const gateway = await TokenGateway.create(config, logger);
  gateway.start();

  // Create and start API server
  const server = await createApiServer({ config, gateway, logger });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');

    await server.close();
    logger.info('HTTP server closed');

    await gateway.close();
    logger.info('Resources cleaned up');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  const port = config.server.listen_port;
  await server.listen({ port, host: config.server.host });

  logger.info({ port, host: config.server.host }, 'tokengate started');
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  // Don't exit - let the app continue
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});

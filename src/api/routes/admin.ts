import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { SecurityLevelSchema } from '../../config/index.js';
import { AuditKindSchema, AuditSeveritySchema } from '../../audit/types.js';
import { MAX_AUDIT_QUERY_LIMIT } from '../../storage/index.js';
import { TenantStatusSchema } from '../../tokens/types.js';
import { translateFailure, type FailureKind, type RequestFailureKind } from '../../errors/index.js';

const IssueBodySchema = z.object({
  tenant_id: z.string().min(1).max(200),
  scopes: z.array(z.string().min(1).max(200)).min(1).max(100),
  ttl_seconds: z.number().int().positive().optional(),
  security_level: SecurityLevelSchema.optional(),
});

const TokenParamsSchema = z.object({
  id: z.string().uuid(),
});

const TenantParamsSchema = z.object({
  id: z.string().min(1).max(200),
});

const TenantStatusBodySchema = z.object({
  status: TenantStatusSchema,
});

const AuditQuerySchema = z.object({
  tenant_id: z.string().min(1).max(200).optional(),
  kind: AuditKindSchema.optional(),
  severity: AuditSeveritySchema.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_AUDIT_QUERY_LIMIT).optional(),
});

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function sendFailure(reply: FastifyReply, kind: FailureKind | RequestFailureKind) {
  const { status, ...body } = translateFailure(kind);
  return reply.code(status).send(body);
}

const adminRoutes: FastifyPluginAsync = async (fastify) => {
  const { gateway, config, gatewayLogger: logger } = fastify;
  const configuredKey = config.server.admin_api_key;

  if (!configuredKey) {
    logger.warn('server.admin_api_key is not set; token management routes are open');
  }

  // API key authentication hook
  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    // No API key configured = development mode (allow all)
    if (!configuredKey) return;

    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey !== 'string' || !safeCompare(apiKey, configuredKey)) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  });

  // Issue a token
  fastify.post('/v1/tokens', async (request, reply) => {
    const parsed = IssueBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return sendFailure(reply, 'InvalidRequest');
    }

    const outcome = await gateway.issue({
      tenantId: parsed.data.tenant_id,
      scopes: parsed.data.scopes,
      ttlSeconds: parsed.data.ttl_seconds,
      securityLevel: parsed.data.security_level,
    });
    if (!outcome.ok) {
      return sendFailure(reply, outcome.kind);
    }

    return reply.code(201).send({
      token: outcome.value.token,
      token_id: outcome.value.tokenId,
      expires_at: outcome.value.expiresAt.toISOString(),
    });
  });

  // Extend a token
  fastify.post('/v1/tokens/:id/extend', async (request, reply) => {
    const params = TokenParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendFailure(reply, 'InvalidRequest');
    }

    const outcome = await gateway.extend(params.data.id);
    if (!outcome.ok) {
      return sendFailure(reply, outcome.kind);
    }
    return { extended: outcome.value };
  });

  // Revoke a token
  fastify.delete('/v1/tokens/:id', async (request, reply) => {
    const params = TokenParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendFailure(reply, 'InvalidRequest');
    }

    const outcome = await gateway.revoke(params.data.id);
    if (!outcome.ok) {
      return sendFailure(reply, outcome.kind);
    }
    return { revoked: outcome.value };
  });

  // Suspend or reactivate a tenant
  fastify.put('/v1/tenants/:id/status', async (request, reply) => {
    const params = TenantParamsSchema.safeParse(request.params);
    const body = TenantStatusBodySchema.safeParse(request.body);
    if (!params.success || !body.success) {
      return sendFailure(reply, 'InvalidRequest');
    }

    const outcome = await gateway.setTenantStatus(params.data.id, body.data.status);
    if (!outcome.ok) {
      return sendFailure(reply, outcome.kind);
    }
    return { updated: outcome.value };
  });

  // Counters of every component
  fastify.get('/v1/stats', async () => {
    return gateway.stats();
  });

  // Recent audit events, newest first
  fastify.get('/v1/audit', async (request, reply) => {
    const parsed = AuditQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendFailure(reply, 'InvalidRequest');
    }

    const outcome = await gateway.queryAudit({
      tenantId: parsed.data.tenant_id,
      kind: parsed.data.kind,
      severity: parsed.data.severity,
      limit: parsed.data.limit,
    });
    if (!outcome.ok) {
      return sendFailure(reply, outcome.kind);
    }

    return {
      events: outcome.value.map((event) => ({
        timestamp: event.timestamp.toISOString(),
        kind: event.kind,
        severity: event.severity,
        path: event.path ?? null,
        token_id: event.tokenId ?? null,
        tenant_id: event.tenantId ?? null,
        endpoint: event.endpoint ?? null,
        outcome: event.outcome,
        latency_ms: event.latencyMs ?? null,
        detail: event.detail ?? null,
      })),
    };
  });
};

export default adminRoutes;

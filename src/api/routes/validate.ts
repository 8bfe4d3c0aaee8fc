import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { translateFailure } from '../../errors/index.js';

const MAX_TOKEN_LENGTH = 4096;

const ValidateBodySchema = z.object({
  token: z.string().max(MAX_TOKEN_LENGTH),
  required_scope: z.string().min(1).max(200),
  tenant_id: z.string().min(1).max(200),
  endpoint: z.string().max(2048).optional(),
});

const validateRoutes: FastifyPluginAsync = async (fastify) => {
  const { gateway } = fastify;

  fastify.post('/v1/validate', async (request, reply) => {
    const parsed = ValidateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const { status, ...body } = translateFailure('InvalidRequest');
      return reply.code(status).send(body);
    }

    const userAgent = request.headers['user-agent'];
    const outcome = await gateway.validate({
      token: parsed.data.token,
      requiredScope: parsed.data.required_scope,
      tenantId: parsed.data.tenant_id,
      endpoint: parsed.data.endpoint,
      clientIp: request.ip,
      userAgent: typeof userAgent === 'string' ? userAgent : undefined,
    });

    if (!outcome.ok) {
      const { status, ...body } = translateFailure(outcome.kind);
      return reply.code(status).send(body);
    }

    const result = outcome.value;
    return {
      valid: true,
      token_id: result.tokenId,
      tenant_id: result.tenant.tenantId,
      scopes: result.grantedScopes,
      rate_limit_remaining: result.rateLimitRemaining,
      risk_score: result.riskScore,
      step_up_recommended: result.stepUpRecommended,
      expires_at: result.expiresAt.toISOString(),
      extended: result.extended,
      path: result.path,
    };
  });
};

export default validateRoutes;

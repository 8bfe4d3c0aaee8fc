import type { FailureKind } from '../errors/index.js';
import type { ValidationPath } from '../audit/types.js';
import type { TenantContext } from '../tokens/types.js';

export interface ValidationRequest {
  token: string;
  requiredScope: string;
  /** Tenant the caller claims to act for */
  tenantId: string;
  clientIp?: string;
  userAgent?: string;
  endpoint?: string;
}

interface ResultBase {
  readonly path: ValidationPath;
  readonly riskScore: number;
  readonly cacheHit: boolean;
  readonly durationMs: number;
}

export interface ValidResult extends ResultBase {
  readonly valid: true;
  readonly tokenId: string;
  readonly tenant: TenantContext;
  readonly grantedScopes: readonly string[];
  readonly rateLimitRemaining: number;
  readonly stepUpRecommended: boolean;
  readonly expiresAt: Date;
  readonly extended: boolean;
}

/** Invalid results never carry a tenant */
export interface InvalidResult extends ResultBase {
  readonly valid: false;
  readonly failure: FailureKind;
  readonly tokenId?: string;
}

export type ValidationResult = ValidResult | InvalidResult;

/**
 * A shadow run decides the same way as a served one but leaves the critical
 * cross-tenant event to the served path, so each attempt is reported once.
 */
export type ValidationMode = 'served' | 'shadow';

export interface TokenValidator {
  readonly path: ValidationPath;
  validate(
    request: ValidationRequest,
    signal?: AbortSignal,
    mode?: ValidationMode
  ): Promise<ValidationResult>;
}

/** Severity of a failed decision: cross-tenant use is critical on the served path */
export function failureSeverity(failure: FailureKind, mode: ValidationMode): 'critical' | 'info' {
  return failure === 'CrossTenantAttempt' && mode === 'served' ? 'critical' : 'info';
}

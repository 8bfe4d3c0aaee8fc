import { z } from 'zod';
import type { SecurityLevel } from '../config/index.js';

export type { SecurityLevel };

export const TenantStatusSchema = z.enum(['active', 'suspended']);
export type TenantStatus = z.infer<typeof TenantStatusSchema>;

/**
 * Stored token metadata. The plaintext token is never part of it.
 */
export interface TokenRecord {
  readonly tokenId: string;
  readonly tokenHash: string;
  readonly tenantId: string;
  readonly scopes: readonly string[];
  readonly securityLevel: SecurityLevel;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
  readonly extensionCount: number;
  readonly revokedAt?: Date;
}

export interface TenantContext {
  readonly tenantId: string;
  readonly isolationBoundary: string;
  readonly status: TenantStatus;
}

export interface IssueRequest {
  tenantId: string;
  scopes: readonly string[];
  ttlSeconds?: number;
  securityLevel?: SecurityLevel;
}

export interface IssuedToken {
  /** Plaintext value, returned exactly once */
  token: string;
  tokenId: string;
  expiresAt: Date;
}

import { z } from 'zod';

export const AuditKindSchema = z.enum([
  'decision',
  'extended',
  'discrepancy',
  'timeout',
  'issued',
  'revoked',
]);
export const AuditSeveritySchema = z.enum(['info', 'elevated', 'critical']);
export const ValidationPathSchema = z.enum(['legacy', 'enhanced']);

export type AuditKind = z.infer<typeof AuditKindSchema>;
export type AuditSeverity = z.infer<typeof AuditSeveritySchema>;
export type ValidationPath = z.infer<typeof ValidationPathSchema>;

export type AuditDetail = Readonly<Record<string, string | number | boolean | null>>;

export interface AuditEvent {
  readonly timestamp: Date;
  readonly kind: AuditKind;
  readonly severity: AuditSeverity;
  readonly path?: ValidationPath;
  readonly tokenId?: string;
  readonly tenantId?: string;
  readonly endpoint?: string;
  readonly outcome: string;
  readonly latencyMs?: number;
  readonly detail?: AuditDetail;
}

export interface AuditQuery {
  tenantId?: string;
  kind?: AuditKind;
  severity?: AuditSeverity;
  limit?: number;
}

export interface AuditStats {
  queued: number;
  written: number;
  dropped: number;
  overflowed: number;
  failedFlushes: number;
}

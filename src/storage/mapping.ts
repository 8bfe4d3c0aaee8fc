import { z } from 'zod';
import type { AuditEvent } from '../audit/types.js';
import { AuditKindSchema, AuditSeveritySchema, ValidationPathSchema } from '../audit/types.js';
import type { InsertAuditEvent, SelectAuditEvent } from '../db/schema.js';

export const MAX_AUDIT_QUERY_LIMIT = 500;
export const DEFAULT_AUDIT_QUERY_LIMIT = 50;

export function clampAuditLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit < 1) {
    return DEFAULT_AUDIT_QUERY_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_AUDIT_QUERY_LIMIT);
}

export function toAuditRow(event: AuditEvent): InsertAuditEvent {
  return {
    eventTime: event.timestamp.toISOString(),
    kind: event.kind,
    severity: event.severity,
    path: event.path ?? null,
    tokenId: event.tokenId ?? null,
    tenantId: event.tenantId ?? null,
    endpoint: event.endpoint ?? null,
    outcome: event.outcome,
    latencyMs: event.latencyMs ?? null,
    detail: event.detail ? JSON.stringify(event.detail) : null,
  };
}

const DetailSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export function fromAuditRow(row: SelectAuditEvent): AuditEvent {
  return Object.freeze({
    timestamp: new Date(row.eventTime),
    kind: AuditKindSchema.parse(row.kind),
    severity: AuditSeveritySchema.parse(row.severity),
    path: row.path === null ? undefined : ValidationPathSchema.parse(row.path),
    tokenId: row.tokenId ?? undefined,
    tenantId: row.tenantId ?? undefined,
    endpoint: row.endpoint ?? undefined,
    outcome: row.outcome,
    latencyMs: row.latencyMs ?? undefined,
    detail: row.detail === null ? undefined : DetailSchema.parse(JSON.parse(row.detail)),
  });
}

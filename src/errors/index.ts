export const FAILURE_KINDS = [
  'InvalidToken',
  'ExpiredToken',
  'CrossTenantAttempt',
  'InsufficientScope',
  'RateLimitExceeded',
  'ValidationTimeout',
  'StoreUnavailable',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/** Rejected issue parameters; validation never produces it */
export type RequestFailureKind = 'InvalidRequest';

export type Outcome<T, K extends string = FailureKind> =
  | { ok: true; value: T }
  | { ok: false; kind: K };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<K extends string>(kind: K): { ok: false; kind: K } {
  return { ok: false, kind };
}

/**
 * Raised by the token store once its bounded retry is exhausted, or on a non-transient
 * driver error. Callers at the validation boundary turn it into `StoreUnavailable`.
 */
export class StoreUnavailableError extends Error {
  constructor(
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(`Token store unavailable during ${operation}`, options);
    this.name = 'StoreUnavailableError';
  }
}

export { translateFailure, type TranslatedError } from './translation.js';

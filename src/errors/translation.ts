import type { FailureKind, RequestFailureKind } from './index.js';

export interface TranslatedError {
  readonly error: string;
  readonly hint: string;
  readonly code: string;
  readonly status: number;
}

// External messages never name tokens, tenants or storage internals.
const TRANSLATIONS: Readonly<Record<FailureKind | RequestFailureKind, TranslatedError>> = {
  InvalidToken: {
    error: 'Please log in again',
    hint: 'Your session may have been corrupted',
    code: 'AUTH_FORMAT_001',
    status: 401,
  },
  ExpiredToken: {
    error: 'Please log in again',
    hint: 'Refresh your session',
    code: 'AUTH_EXPIRED_001',
    status: 401,
  },
  CrossTenantAttempt: {
    error: 'Resource not found',
    hint: 'Try searching again',
    code: 'ACCESS_DENIED_001',
    status: 404,
  },
  InsufficientScope: {
    error: 'Access not available',
    hint: 'Contact your administrator',
    code: 'PERM_DENIED_001',
    status: 403,
  },
  RateLimitExceeded: {
    error: 'Too many requests',
    hint: 'Please wait a moment before trying again',
    code: 'RATE_LIMIT_001',
    status: 429,
  },
  ValidationTimeout: {
    error: 'Service temporarily unavailable',
    hint: 'Try again shortly',
    code: 'TIMEOUT_001',
    status: 503,
  },
  StoreUnavailable: {
    error: 'Service temporarily unavailable',
    hint: 'Please try again in a few minutes',
    code: 'DB_CONN_001',
    status: 503,
  },
  InvalidRequest: {
    error: 'Invalid request',
    hint: 'Check the request parameters',
    code: 'REQ_INVALID_001',
    status: 400,
  },
};

export function translateFailure(kind: FailureKind | RequestFailureKind): TranslatedError {
  return TRANSLATIONS[kind];
}

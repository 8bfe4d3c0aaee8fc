import { describe, it, expect } from 'vitest';
import { FAILURE_KINDS, translateFailure } from '../src/errors/index.js';

describe('translateFailure', () => {
  it('should map every failure kind to its fixed message', () => {
    expect(translateFailure('InvalidToken')).toEqual({
      error: 'Please log in again',
      hint: 'Your session may have been corrupted',
      code: 'AUTH_FORMAT_001',
      status: 401,
    });
    expect(translateFailure('ExpiredToken')).toEqual({
      error: 'Please log in again',
      hint: 'Refresh your session',
      code: 'AUTH_EXPIRED_001',
      status: 401,
    });
    expect(translateFailure('CrossTenantAttempt')).toEqual({
      error: 'Resource not found',
      hint: 'Try searching again',
      code: 'ACCESS_DENIED_001',
      status: 404,
    });
    expect(translateFailure('InsufficientScope')).toEqual({
      error: 'Access not available',
      hint: 'Contact your administrator',
      code: 'PERM_DENIED_001',
      status: 403,
    });
    expect(translateFailure('RateLimitExceeded')).toEqual({
      error: 'Too many requests',
      hint: 'Please wait a moment before trying again',
      code: 'RATE_LIMIT_001',
      status: 429,
    });
    expect(translateFailure('ValidationTimeout')).toEqual({
      error: 'Service temporarily unavailable',
      hint: 'Try again shortly',
      code: 'TIMEOUT_001',
      status: 503,
    });
    expect(translateFailure('StoreUnavailable')).toEqual({
      error: 'Service temporarily unavailable',
      hint: 'Please try again in a few minutes',
      code: 'DB_CONN_001',
      status: 503,
    });
  });

  it('should translate rejected request parameters', () => {
    expect(translateFailure('InvalidRequest')).toEqual({
      error: 'Invalid request',
      hint: 'Check the request parameters',
      code: 'REQ_INVALID_001',
      status: 400,
    });
  });

  it('should never mention tokens, tenants or storage', () => {
    for (const kind of FAILURE_KINDS) {
      const { error, hint } = translateFailure(kind);
      expect(`${error} ${hint}`).not.toMatch(/token|tenant|database|sql/i);
    }
  });

  it('should use distinct codes', () => {
    const codes = FAILURE_KINDS.map((kind) => translateFailure(kind).code);
    expect(new Set(codes).size).toBe(FAILURE_KINDS.length);
  });
});

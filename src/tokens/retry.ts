import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import type { RetryConfig } from '../config/index.js';
import { StoreUnavailableError } from '../errors/index.js';

const TRANSIENT_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  '57P01', // admin_shutdown
  '40001', // serialization_failure
]);

/**
 * Driver errors worth another attempt: lock contention, dropped connections and
 * PostgreSQL connection exceptions (class 08).
 */
export function isTransientError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return false;
  }
  const code = err.code;
  if (typeof code !== 'string') {
    return false;
  }
  return TRANSIENT_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
}

export function backoffDelay(attempt: number, retry: RetryConfig): number {
  return Math.min(retry.base_delay_ms * 2 ** (attempt - 1), retry.max_delay_ms);
}

/**
 * Run a store operation, retrying transient failures with exponential backoff.
 * Anything else, or exhausting the attempts, ends in a StoreUnavailableError.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  retry: RetryConfig,
  logger: Logger
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        throw err;
      }
      if (!isTransientError(err) || attempt >= retry.attempts) {
        logger.error({ err, operation, attempt }, 'Token store operation failed');
        throw new StoreUnavailableError(operation, { cause: err });
      }
      const delay = backoffDelay(attempt, retry);
      logger.warn({ err, operation, attempt, delay }, 'Transient store error, retrying');
      await sleep(delay);
    }
  }
}

import { RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS, RETRY_MAX_RETRIES } from '../constants/defaults.js';
import { OperationCancelledError } from '../errors/lifecycle-errors.js';
import { debugRetry } from '../utils/debug.js';
import { errorMessage } from '../utils/fs.js';

/**
 * Retry configuration for network calls
 */
export interface RetryConfig {
  /** Retries after the first attempt (default: 2, i.e. 3 attempts) */
  maxRetries: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Upper bound for a single delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor: number;
  /** Jitter fraction 0-1 (default: 0.1) */
  jitterPercent: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: RETRY_MAX_RETRIES,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  backoffFactor: 2,
  jitterPercent: 0.1,
};

/** HTTP statuses treated as transient. A 429 rate limit is not retried. */
const RETRYABLE_STATUS_CODES = new Set([408, 500, 502, 503, 504]);

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function numericField(error: object, field: 'statusCode' | 'status'): number | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Transient failures: network errors by code, 408 and 5xx by `statusCode`
 * (HTTP / DNS provider errors) or `status` (ACME problem documents).
 */
export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  if (error instanceof OperationCancelledError) return false;

  if ('code' in error && typeof error.code === 'string' && RETRYABLE_ERROR_CODES.has(error.code)) {
    return true;
  }

  const status = numericField(error, 'statusCode') ?? numericField(error, 'status');
  return status !== undefined && RETRYABLE_STATUS_CODES.has(status);
}

/**
 * Exponential backoff with jitter, clamped to maxDelayMs
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);
  const jitter = exponentialDelay * config.jitterPercent * (Math.random() * 2 - 1);
  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

/**
 * Sleep for the given time; rejects with OperationCancelledError as soon as
 * the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(OperationCancelledError.create());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(OperationCancelledError.create());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation, retrying transient failures with bounded exponential
 * backoff. Non-transient failures and the last failure are rethrown as-is.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context = 'operation',
  signal?: AbortSignal,
): Promise<T> {
  const finalConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt <= finalConfig.maxRetries; attempt++) {
    if (signal?.aborted) {
      throw OperationCancelledError.create();
    }

    try {
      const result = await operation();
      if (attempt > 0) {
        debugRetry('%s succeeded on attempt %d/%d', context, attempt + 1, finalConfig.maxRetries + 1);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (attempt === finalConfig.maxRetries) {
        break;
      }

      if (!isRetryableError(error)) {
        debugRetry(
          '%s: non-retryable error on attempt %d: %s',
          context,
          attempt + 1,
          errorMessage(error),
        );
        throw error;
      }

      const delayMs = calculateRetryDelay(attempt, finalConfig);
      debugRetry(
        '%s: attempt %d/%d failed, retrying in %dms. Error: %s',
        context,
        attempt + 1,
        finalConfig.maxRetries + 1,
        Math.round(delayMs),
        errorMessage(error),
      );
      await sleep(delayMs, signal);
    }
  }

  debugRetry('%s: all %d attempts failed', context, finalConfig.maxRetries + 1);
  throw lastError;
}

/**
 * Default settings for certkeeper
 *
 * Used by resolveConfig() and by components constructed without an explicit
 * value.
 */

// DNS propagation
export const PROPAGATION_DELAY_MS = 60_000;
export const DNS_TXT_TTL_SECONDS = 120;
export const DEFAULT_DNS_PROVIDER = 'cloudflare';

// Renewal
export const RENEWAL_THRESHOLD_DAYS = 30;

// Challenge validation polling
export const VALIDATION_TIMEOUT_MS = 5 * 60 * 1_000; // 5 minutes
export const VALIDATION_POLL_INITIAL_DELAY_MS = 1_000;
export const VALIDATION_POLL_MAX_DELAY_MS = 15_000;
export const VALIDATION_POLL_FACTOR = 2;

// Order polling after finalize
export const ORDER_POLL_INTERVAL_MS = 2_000;
export const ORDER_POLL_MAX_ATTEMPTS = 60;

// Retry of transient network failures (3 attempts in total)
export const RETRY_MAX_RETRIES = 2;
export const RETRY_BASE_DELAY_MS = 1_000;
export const RETRY_MAX_DELAY_MS = 30_000;

// Credential file lock
export const LOCK_TIMEOUT_MS = 10_000;
export const LOCK_RETRY_INTERVAL_MS = 50;
export const LOCK_STALE_MS = 60_000;

// Target configuration
export const SSL_MODE_COMMERCIAL = 'commercial';

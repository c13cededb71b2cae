/**
 * Authentication & Rate Limiting Configuration
 */

/** Header carrying the caller's API key */
export const API_KEY_HEADER = 'x-api-key';

/** Bucket pattern granting visibility into every bucket */
export const WILDCARD_BUCKET = '*';

/** Redis key prefix for rate limit windows */
export const RATE_LIMIT_PREFIX = 'ratelimit:';

/** Default rate limit (requests per window) */
export const DEFAULT_RATE_LIMIT = 100;

/** Rate limit window in seconds */
export const RATE_LIMIT_WINDOW_SECONDS = 60;

/** Default maximum PUT payload: 100 MiB */
export const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

/** Single message for every invalid-credential case */
export const INVALID_CREDENTIAL_MESSAGE = 'Invalid or missing API key';

/** Unauthenticated liveness route; `_` cannot start a bucket name */
export const HEALTH_ROUTE = '/_health';

/** Headers added to every response */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'x-xss-protection': '1; mode=block',
  'strict-transport-security': 'max-age=31536000; includeSubDomains',
};

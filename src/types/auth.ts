/**
 * Identity, Access & Rate Limiting Types
 */

/** Closed set of caller roles. Roles only gate write permission. */
export type Role = 'admin' | 'user' | 'readonly';

/** Caller recognised by API key */
export interface Identity {
  username: string;
  role: Role;
  /** Exact bucket names, or the wildcard pattern */
  allowed_buckets: ReadonlySet<string>;
}

/** Auth context attached to an admitted request */
export interface AuthContext {
  username: string;
  role: Role;
  /** Short digest of the presented key, safe to log */
  key_fingerprint: string;
}

/** Rate limit check result */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  reset_in_seconds: number;
}

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

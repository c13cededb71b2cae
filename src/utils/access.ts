/**
 * Bucket-level access control
 *
 * Two independent gates:
 * - visibility: the identity's patterns contain "*" or the exact bucket
 * - write: mutating operations need the admin or user role
 *
 * Denial reasons stay generic on the write gate so responses never
 * reveal which role a key carries.
 */

import { WILDCARD_BUCKET } from '../config/auth';
import { isMutating } from '../api/validation';
import type { AccessDecision, Identity, Role } from '../types/auth';
import type { GatewayOperation } from '../types/gateway';

export const WRITE_DENIED = 'Write permission denied';

export function canSeeBucket(identity: Identity, bucket: string): boolean {
  return identity.allowed_buckets.has(WILDCARD_BUCKET) || identity.allowed_buckets.has(bucket);
}

export function canWrite(role: Role): boolean {
  switch (role) {
    case 'admin':
    case 'user':
      return true;
    case 'readonly':
      return false;
    default: {
      const unknownRole: never = role;
      throw new Error(`Unhandled role: ${String(unknownRole)}`);
    }
  }
}

export function authorize(
  identity: Identity,
  bucket: string,
  operation: GatewayOperation
): AccessDecision {
  if (!canSeeBucket(identity, bucket)) {
    return { allowed: false, reason: `Not allowed to access bucket: ${bucket}` };
  }

  if (isMutating(operation) && !canWrite(identity.role)) {
    return { allowed: false, reason: WRITE_DENIED };
  }

  return { allowed: true };
}

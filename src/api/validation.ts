import { sizeExceededMessage } from '../utils/body';
import type { GatewayOperation, GatewayRequest, RequestTarget } from '../types/gateway';

export type ValidationResult =
  | { valid: true; target: RequestTarget }
  | { valid: false; reason: string };

export interface ValidationOptions {
  /** Maximum declared payload size for writes, in bytes */
  maxFileSize: number;
}

const INVALID_PATH = 'Invalid path format';

/** Operations that change backend state */
export function isMutating(operation: GatewayOperation): boolean {
  return operation === 'putObject';
}

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Split "/bucket[/key]" into bucket and key. The key is the remainder of
 * the path after the bucket and may itself contain slashes.
 */
export function parsePath(path: string): { bucket: string; key?: string } | undefined {
  const stripped = path.startsWith('/') ? path.slice(1) : path;
  const separator = stripped.indexOf('/');
  const rawBucket = separator === -1 ? stripped : stripped.slice(0, separator);
  const rawKey = separator === -1 ? '' : stripped.slice(separator + 1);

  const bucket = decodeSegment(rawBucket);
  const key = decodeSegment(rawKey);
  if (!bucket || key === undefined) return undefined;

  // "/bucket/" lists like "/bucket"
  return key === '' ? { bucket } : { bucket, key };
}

function classify(
  method: string,
  key: string | undefined
): { operation: GatewayOperation } | { reason: string } {
  switch (method) {
    case 'GET':
      return { operation: key === undefined ? 'listObjects' : 'getObject' };
    case 'PUT':
      return key === undefined
        ? { reason: 'Unsupported operation: PUT on a bucket' }
        : { operation: 'putObject' };
    default:
      return { reason: `Unsupported method: ${method}` };
  }
}

/**
 * Structural checks run before any identity or routing work.
 * Pure: no I/O, no state.
 */
export function validateRequest(
  request: GatewayRequest,
  options: ValidationOptions
): ValidationResult {
  const target = parsePath(request.path);
  if (!target) {
    return { valid: false, reason: INVALID_PATH };
  }

  const classified = classify(request.method.toUpperCase(), target.key);
  if ('reason' in classified) {
    return { valid: false, reason: classified.reason };
  }
  const { operation } = classified;

  if (isMutating(operation)) {
    const declared = headerValue(request.headers['content-length']);
    if (declared !== undefined && /^\d+$/.test(declared)) {
      const length = Number(declared);
      if (length > options.maxFileSize) {
        return { valid: false, reason: sizeExceededMessage(length, options.maxFileSize) };
      }
    }
  }

  return { valid: true, target: { operation, ...target } };
}

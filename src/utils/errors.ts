/**
 * Gateway error taxonomy
 *
 * Every failure the pipeline reports is a GatewayError with one of
 * these kinds. The HTTP status is derived from the kind only.
 */

export type GatewayErrorKind =
  | 'Unauthorized'
  | 'InvalidRequest'
  | 'BucketNotFound'
  | 'ObjectNotFound'
  | 'BackendFault'
  | 'InternalFault';

const STATUS_BY_KIND: Record<GatewayErrorKind, number> = {
  Unauthorized: 401,
  InvalidRequest: 400,
  BucketNotFound: 404,
  ObjectNotFound: 404,
  BackendFault: 500,
  InternalFault: 500,
};

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }

  toJSON(): { error: string; status: number } {
    return { error: this.message, status: this.status };
  }

  static unauthorized(message: string): GatewayError {
    return new GatewayError('Unauthorized', message);
  }

  static invalidRequest(message: string, cause?: unknown): GatewayError {
    return new GatewayError('InvalidRequest', message, { cause });
  }

  static bucketNotFound(bucket: string): GatewayError {
    return new GatewayError('BucketNotFound', `Bucket not found: ${bucket}`);
  }

  static objectNotFound(bucket: string, key: string): GatewayError {
    return new GatewayError('ObjectNotFound', `Object not found: ${bucket}/${key}`);
  }

  /** Backend detail stays in the cause; callers only see the generic message */
  static backendFault(cause: unknown): GatewayError {
    return new GatewayError('BackendFault', 'Storage backend error', { cause });
  }

  static internalFault(message = 'Internal server error', cause?: unknown): GatewayError {
    return new GatewayError('InternalFault', message, { cause });
  }
}

/** Raised while loading configuration; aborts startup */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

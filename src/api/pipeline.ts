/**
 * Gateway Pipeline
 *
 * Runs one request through the admission stages in fixed order:
 *
 *   validated → identified → rate-checked → authorized → routed → dispatched → responded
 *
 * A failure at any stage short-circuits to an error response. Recording
 * the request in the rate limiter is the only state change before the
 * backend call. Security headers are added to every response produced
 * here, success or failure.
 */

import type { FastifyBaseLogger } from 'fastify';
import {
  API_KEY_HEADER,
  INVALID_CREDENTIAL_MESSAGE,
  SECURITY_HEADERS,
} from '../config/auth';
import { authorize } from '../utils/access';
import type { AccountRegistry } from '../utils/accounts';
import { readBody } from '../utils/body';
import { GatewayError } from '../utils/errors';
import { keyFingerprint, type IdentityStore } from '../utils/identity';
import { renderListing } from '../utils/listing';
import type { RateLimiter } from '../utils/ratelimit';
import type { RateLimitResult } from '../types/auth';
import type {
  GatewayRequest,
  GatewayResponse,
  PipelineStage,
  RequestContext,
} from '../types/gateway';
import type { StorageBackend } from '../types/storage';
import { validateRequest } from './validation';

export interface GatewayPipelineDeps {
  accounts: AccountRegistry;
  identities: IdentityStore;
  rateLimiter: RateLimiter;
  /** Backend client per account id */
  backends: ReadonlyMap<string, StorageBackend>;
  maxFileSize: number;
}

/** What the pipeline knows about a request when it fails */
interface FailureScope {
  stage: PipelineStage;
  username?: string;
  key_fingerprint?: string;
  bucket?: string;
  key?: string;
  operation?: string;
}

export function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return { ...headers, ...SECURITY_HEADERS };
}

export function rateLimitHeaders(result: RateLimitResult): Record<string, string> {
  return {
    'x-ratelimit-limit': String(result.limit),
    'x-ratelimit-remaining': String(result.remaining),
    'x-ratelimit-reset': String(result.reset_in_seconds),
  };
}

/**
 * JSON error response carrying the security headers
 */
export function errorResponse(error: GatewayError, extraHeaders: Record<string, string> = {}): GatewayResponse {
  return {
    status: error.status,
    headers: withSecurityHeaders({
      ...extraHeaders,
      'content-type': 'application/json; charset=utf-8',
    }),
    body: JSON.stringify(error.toJSON()),
  };
}

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class GatewayPipeline {
  constructor(private readonly deps: GatewayPipelineDeps) {}

  async handle(request: GatewayRequest, log: FastifyBaseLogger): Promise<GatewayResponse> {
    const scope: FailureScope = { stage: 'validated' };
    let limitHeaders: Record<string, string> = {};

    try {
      // Validated
      const validation = validateRequest(request, { maxFileSize: this.deps.maxFileSize });
      if (!validation.valid) {
        throw GatewayError.invalidRequest(validation.reason);
      }
      const { target } = validation;
      Object.assign(scope, { bucket: target.bucket, key: target.key, operation: target.operation });

      // Identified
      scope.stage = 'identified';
      const apiKey = singleHeader(request.headers[API_KEY_HEADER]);
      if (!apiKey) {
        throw GatewayError.unauthorized(INVALID_CREDENTIAL_MESSAGE);
      }
      const fingerprint = keyFingerprint(apiKey);
      scope.key_fingerprint = fingerprint;
      const identity = this.deps.identities.resolve(apiKey);
      if (!identity) {
        throw GatewayError.unauthorized(INVALID_CREDENTIAL_MESSAGE);
      }
      scope.username = identity.username;

      // RateChecked
      scope.stage = 'rate-checked';
      const admission = await this.deps.rateLimiter.admit(identity.username);
      limitHeaders = rateLimitHeaders(admission);
      if (!admission.allowed) {
        throw GatewayError.invalidRequest('Rate limit exceeded');
      }

      const context: RequestContext = {
        ...target,
        method: request.method,
        auth: {
          username: identity.username,
          role: identity.role,
          key_fingerprint: fingerprint,
        },
      };

      // Authorized
      scope.stage = 'authorized';
      const decision = authorize(identity, context.bucket, context.operation);
      if (!decision.allowed) {
        throw GatewayError.unauthorized(decision.reason);
      }

      // Routed
      scope.stage = 'routed';
      const backend = this.route(context.bucket);

      // Dispatched
      scope.stage = 'dispatched';
      const response = await this.dispatch(context, backend, request);

      scope.stage = 'responded';
      log.info(
        {
          username: context.auth.username,
          bucket: context.bucket,
          key: context.key,
          operation: context.operation,
          status: response.status,
        },
        'Request completed'
      );

      return {
        ...response,
        headers: withSecurityHeaders({ ...limitHeaders, ...response.headers }),
      };
    } catch (err) {
      const error = toGatewayError(err, scope.stage);
      this.logFailure(log, error, scope);
      return errorResponse(error, limitHeaders);
    }
  }

  private route(bucket: string): StorageBackend {
    const resolved = this.deps.accounts.resolve(bucket);
    if (!resolved) {
      throw GatewayError.bucketNotFound(bucket);
    }

    const backend = this.deps.backends.get(resolved.accountId);
    if (!backend) {
      throw GatewayError.internalFault(`No storage client for account ${resolved.accountId}`);
    }
    return backend;
  }

  private async dispatch(
    context: RequestContext,
    backend: StorageBackend,
    request: GatewayRequest
  ): Promise<GatewayResponse> {
    switch (context.operation) {
      case 'listObjects': {
        const objects = await backend.listObjects(context.bucket, request.prefix);
        return {
          status: 200,
          headers: { 'content-type': 'application/xml' },
          body: renderListing(context.bucket, request.prefix, objects),
        };
      }
      case 'getObject': {
        const body = await backend.getObject(context.bucket, requireKey(context));
        return {
          status: 200,
          headers: { 'content-type': 'application/octet-stream' },
          body,
        };
      }
      case 'putObject': {
        const body = await readBody(request.body, this.deps.maxFileSize);
        const contentType = singleHeader(request.headers['content-type']);
        await backend.putObject(context.bucket, requireKey(context), body, contentType);
        return { status: 200, headers: {} };
      }
      default: {
        const unknownOperation: never = context.operation;
        throw GatewayError.internalFault(`Unhandled operation: ${String(unknownOperation)}`);
      }
    }
  }

  private logFailure(log: FastifyBaseLogger, error: GatewayError, scope: FailureScope): void {
    const fields = { ...scope, kind: error.kind, status: error.status };
    if (error.kind === 'BackendFault' || error.kind === 'InternalFault') {
      log.error({ ...fields, err: error.cause ?? error }, error.message);
    } else {
      log.warn(fields, error.message);
    }
  }
}

/** Anything unexpected from the backend call is a backend fault; elsewhere it is ours */
function toGatewayError(err: unknown, stage: PipelineStage): GatewayError {
  if (err instanceof GatewayError) return err;
  return stage === 'dispatched' ? GatewayError.backendFault(err) : GatewayError.internalFault(undefined, err);
}

function requireKey(context: RequestContext): string {
  if (context.key === undefined) {
    throw GatewayError.internalFault(`Operation ${context.operation} requires an object key`);
  }
  return context.key;
}

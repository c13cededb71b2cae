import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import type { AuthContext } from './auth';

/** Logical operations the gateway forwards */
export type GatewayOperation = 'listObjects' | 'getObject' | 'putObject';

/** Framework-independent view of an inbound request */
export interface GatewayRequest {
  method: string;
  /** Raw (still percent-encoded) path, without the query string */
  path: string;
  prefix?: string;
  headers: IncomingHttpHeaders;
  body?: Readable | Buffer;
}

export interface GatewayResponse {
  status: number;
  headers: Record<string, string>;
  body?: string | Buffer;
}

/** Bucket and key decoded from the request path */
export interface RequestTarget {
  operation: GatewayOperation;
  bucket: string;
  key?: string;
}

/** Per-request state, never shared across requests */
export interface RequestContext extends RequestTarget {
  method: string;
  auth: AuthContext;
}

export type PipelineStage =
  | 'validated'
  | 'identified'
  | 'rate-checked'
  | 'authorized'
  | 'routed'
  | 'dispatched'
  | 'responded';

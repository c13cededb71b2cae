/**
 * Storage Account & Backend Types
 */

/** Backend account owning a disjoint set of buckets */
export interface StorageAccount {
  id: string;
  endpoint_url: string;
  region: string;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  buckets: readonly string[];
  force_path_style: boolean;
}

/** Listing entry, in backend order */
export interface ObjectSummary {
  key: string;
  size: number;
  last_modified?: Date;
}

/**
 * Object store client for a single account.
 *
 * Implementations carry their own endpoint and credentials and
 * enforce their own request timeout. The gateway never retries.
 */
export interface StorageBackend {
  /** Aggregates every continuation page before resolving */
  listObjects(bucket: string, prefix?: string): Promise<ObjectSummary[]>;
  /** Rejects with an ObjectNotFound GatewayError when the key is missing */
  getObject(bucket: string, key: string): Promise<Buffer>;
  putObject(bucket: string, key: string, body: Buffer, contentType?: string): Promise<void>;
}

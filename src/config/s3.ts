import { S3Client } from '@aws-sdk/client-s3';
import type { StorageAccount } from '../types/storage';

/** Connection setup timeout for backend requests (ms) */
const CONNECTION_TIMEOUT_MS = 5_000;

/**
 * S3 client for one backend account.
 * The request timeout bounds every backend call the gateway makes.
 */
export function createS3Client(account: StorageAccount, requestTimeoutMs: number): S3Client {
  return new S3Client({
    endpoint: account.endpoint_url,
    region: account.region,
    credentials: account.credentials,
    forcePathStyle: account.force_path_style, // Required for MinIO and most self-hosted stores
    requestHandler: {
      requestTimeout: requestTimeoutMs,
      connectionTimeout: CONNECTION_TIMEOUT_MS,
    },
  });
}

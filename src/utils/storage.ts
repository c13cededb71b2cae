import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3ServiceException,
  type S3Client,
} from '@aws-sdk/client-s3';
import { GatewayError } from './errors';
import type { ObjectSummary, StorageBackend } from '../types/storage';

export type S3Sender = Pick<S3Client, 'send'>;

function isMissingKey(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  // S3-compatible stores do not always map to the modeled exception
  return error instanceof S3ServiceException && error.name === 'NoSuchKey';
}

/**
 * StorageBackend over one account's S3 client
 */
export class S3StorageBackend implements StorageBackend {
  constructor(
    readonly accountId: string,
    private readonly client: S3Sender
  ) {}

  /**
   * List every object under a prefix, following continuation tokens
   * until the backend reports the listing complete
   */
  async listObjects(bucket: string, prefix?: string): Promise<ObjectSummary[]> {
    const objects: ObjectSummary[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const entry of response.Contents ?? []) {
          if (entry.Key === undefined) continue;
          objects.push({
            key: entry.Key,
            size: entry.Size ?? 0,
            last_modified: entry.LastModified,
          });
        }

        continuationToken = response.NextContinuationToken;
      } while (continuationToken);
    } catch (error) {
      throw GatewayError.backendFault(error);
    }

    return objects;
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) return Buffer.alloc(0);
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isMissingKey(error)) {
        throw GatewayError.objectNotFound(bucket, key);
      }
      throw GatewayError.backendFault(error);
    }
  }

  async putObject(bucket: string, key: string, body: Buffer, contentType?: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: body.length,
          ContentType: contentType,
        })
      );
    } catch (error) {
      throw GatewayError.backendFault(error);
    }
  }
}

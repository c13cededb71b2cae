import type { Readable } from 'stream';
import { GatewayError } from './errors';

export const UNREADABLE_BODY_MESSAGE = 'Upload body could not be read';

export function sizeExceededMessage(length: number, limit: number): string {
  return `File size ${length} exceeds maximum allowed size of ${limit} bytes`;
}

/**
 * Collect a request body, failing as soon as it grows past `limit`.
 * Covers uploads that declared no content-length. A stream that errors
 * or closes before its end (client abort) fails as an invalid request.
 */
export async function readBody(body: Readable | Buffer | undefined, limit: number): Promise<Buffer> {
  if (body === undefined) return Buffer.alloc(0);

  if (Buffer.isBuffer(body)) {
    if (body.length > limit) {
      throw GatewayError.invalidRequest(sizeExceededMessage(body.length, limit));
    }
    return body;
  }

  const stream = body;
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let settled = false;

    // Past the limit the stream keeps draining so the response can still be written
    stream.on('data', (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      total += buffer.length;
      if (total > limit) {
        settled = true;
        reject(GatewayError.invalidRequest(sizeExceededMessage(total, limit)));
        return;
      }
      chunks.push(buffer);
    });
    stream.once('end', () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks, total));
    });
    stream.once('error', (err) => {
      if (settled) return;
      settled = true;
      reject(GatewayError.invalidRequest(UNREADABLE_BODY_MESSAGE, err));
    });
    stream.once('close', () => {
      if (settled) return;
      settled = true;
      reject(GatewayError.invalidRequest(UNREADABLE_BODY_MESSAGE));
    });
  });
}

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { buildServer, type GatewayServer } from './server';
import { GatewayPipeline } from './pipeline';
import { AccountRegistry } from '../utils/accounts';
import { IdentityStore } from '../utils/identity';
import { MemoryRateLimiter } from '../utils/ratelimit';
import { GatewayError } from '../utils/errors';
import type { ObjectSummary, StorageBackend } from '../types/storage';

class MemoryBackend implements StorageBackend {
  readonly objects = new Map<string, Buffer>();

  async listObjects(bucket: string, prefix = ''): Promise<ObjectSummary[]> {
    return [...this.objects.entries()]
      .filter(([path]) => path.startsWith(`${bucket}/${prefix}`))
      .map(([path, body]) => ({ key: path.slice(bucket.length + 1), size: body.length }));
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    const body = this.objects.get(`${bucket}/${key}`);
    if (!body) throw GatewayError.objectNotFound(bucket, key);
    return body;
  }

  async putObject(bucket: string, key: string, body: Buffer): Promise<void> {
    this.objects.set(`${bucket}/${key}`, body);
  }
}

describe('gateway server', () => {
  let backend: MemoryBackend;
  let limiter: MemoryRateLimiter;
  let app: GatewayServer;

  beforeEach(async () => {
    backend = new MemoryBackend();
    limiter = new MemoryRateLimiter({ limit: 5 });
    const pipeline = new GatewayPipeline({
      accounts: new AccountRegistry([
        {
          id: 'primary',
          endpoint_url: 'http://primary.storage.test',
          region: 'us-east-1',
          credentials: { accessKeyId: 'test-access', secretAccessKey: 'test-secret' },
          buckets: ['bucket1'],
          force_path_style: true,
        },
      ]),
      identities: new IdentityStore([
        { api_key: 'admin-key', identity: { username: 'admin', role: 'admin', allowed_buckets: new Set(['*']) } },
      ]),
      rateLimiter: limiter,
      backends: new Map([['primary', backend]]),
      maxFileSize: 1024,
    });
    app = buildServer({ pipeline, rateLimiter: limiter, logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  test('GET /_health needs no credentials', async () => {
    const response = await app.inject({ method: 'GET', url: '/_health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
    expect(response.headers['x-frame-options']).toBe('DENY');
  });

  test('stores and fetches an object', async () => {
    const stored = await app.inject({
      method: 'PUT',
      url: '/bucket1/docs/hello.txt',
      headers: { 'x-api-key': 'admin-key', 'content-type': 'text/plain' },
      payload: 'hello world',
    });
    expect(stored.statusCode).toBe(200);
    expect(stored.body).toBe('');
    expect(backend.objects.get('bucket1/docs/hello.txt')?.toString()).toBe('hello world');

    const fetched = await app.inject({
      method: 'GET',
      url: '/bucket1/docs/hello.txt',
      headers: { 'x-api-key': 'admin-key' },
    });
    expect(fetched.statusCode).toBe(200);
    expect(fetched.headers['content-type']).toBe('application/octet-stream');
    expect(fetched.body).toBe('hello world');
  });

  test('JSON bodies are stored as sent', async () => {
    await app.inject({
      method: 'PUT',
      url: '/bucket1/data.json',
      headers: { 'x-api-key': 'admin-key', 'content-type': 'application/json' },
      payload: '{"a": 1}',
    });

    expect(backend.objects.get('bucket1/data.json')?.toString()).toBe('{"a": 1}');
  });

  test('percent-encoded keys are decoded', async () => {
    backend.objects.set('bucket1/my file.txt', Buffer.from('spaced'));

    const response = await app.inject({
      method: 'GET',
      url: '/bucket1/my%20file.txt',
      headers: { 'x-api-key': 'admin-key' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('spaced');
  });

  test('lists with a prefix filter', async () => {
    backend.objects.set('bucket1/logs/a.log', Buffer.from('1'));
    backend.objects.set('bucket1/other.txt', Buffer.from('2'));

    const response = await app.inject({
      method: 'GET',
      url: '/bucket1?prefix=logs/',
      headers: { 'x-api-key': 'admin-key' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/xml');
    expect(response.headers['x-ratelimit-limit']).toBe('5');
    expect(response.headers['x-ratelimit-remaining']).toBe('4');
    expect(response.body).toContain('<Key>logs/a.log</Key>');
    expect(response.body).not.toContain('<Key>other.txt</Key>');
  });

  test('malformed percent-escapes are an invalid path with security headers', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/bucket1/a%2',
      headers: { 'x-api-key': 'admin-key' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toEqual({ error: 'Invalid path format', status: 400 });
    expect(response.headers['x-frame-options']).toBe('DENY');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
    expect(response.headers['x-xss-protection']).toBe('1; mode=block');
    expect(response.headers['strict-transport-security']).toBe('max-age=31536000; includeSubDomains');
    expect(limiter.trackedCount).toBe(0);
  });

  test('a repeated prefix without a key is the generic 401', async () => {
    const response = await app.inject({ method: 'GET', url: '/bucket1?prefix=a&prefix=b' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Invalid or missing API key', status: 401 });
  });

  test('a repeated prefix lists with the first value', async () => {
    backend.objects.set('bucket1/logs/a.log', Buffer.from('1'));
    backend.objects.set('bucket1/other.txt', Buffer.from('2'));

    const response = await app.inject({
      method: 'GET',
      url: '/bucket1?prefix=logs/&prefix=other',
      headers: { 'x-api-key': 'admin-key' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('<Prefix>logs/</Prefix>');
    expect(response.body).toContain('<Key>logs/a.log</Key>');
    expect(response.body).not.toContain('<Key>other.txt</Key>');
  });

  test('unknown key is a JSON 401', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/bucket1',
      headers: { 'x-api-key': 'K1' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toEqual({ error: 'Invalid or missing API key', status: 401 });
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  test('PUT on a bucket is rejected', async () => {
    const response = await app.inject({
      method: 'PUT',
      url: '/bucket1',
      headers: { 'x-api-key': 'admin-key', 'content-type': 'text/plain' },
      payload: 'x',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Unsupported operation: PUT on a bucket', status: 400 });
  });

  test('unsupported methods get a JSON 404 with security headers', async () => {
    const response = await app.inject({
      method: 'DELETE',
      url: '/bucket1/docs/hello.txt',
      headers: { 'x-api-key': 'admin-key' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Not Found', status: 404 });
    expect(response.headers['strict-transport-security']).toBe('max-age=31536000; includeSubDomains');
  });

  test('rate limit applies across requests', async () => {
    for (let i = 0; i < 5; i++) {
      await app.inject({ method: 'GET', url: '/bucket1', headers: { 'x-api-key': 'admin-key' } });
    }

    const response = await app.inject({ method: 'GET', url: '/bucket1', headers: { 'x-api-key': 'admin-key' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Rate limit exceeded', status: 400 });
  });
});

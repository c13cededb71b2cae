import { expect, test, describe } from 'vitest';
import { parsePath, validateRequest } from './validation';
import type { GatewayRequest } from '../types/gateway';

const options = { maxFileSize: 1024 };

function request(method: string, path: string, headers: GatewayRequest['headers'] = {}): GatewayRequest {
  return { method, path, headers };
}

describe('parsePath', () => {
  test('one segment is a bucket', () => {
    expect(parsePath('/mybucket')).toEqual({ bucket: 'mybucket' });
  });

  test('key is the remainder of the path after the bucket', () => {
    expect(parsePath('/mybucket/a/b')).toEqual({ bucket: 'mybucket', key: 'a/b' });
  });

  test('trailing slash lists the bucket', () => {
    expect(parsePath('/mybucket/')).toEqual({ bucket: 'mybucket' });
  });

  test('segments are percent-decoded after splitting', () => {
    expect(parsePath('/my%20bucket/dir%2Ffile%20name.txt')).toEqual({
      bucket: 'my bucket',
      key: 'dir/file name.txt',
    });
  });

  test.each(['', '/', '//key', '/%E0%A4%A/key', '/bucket/%ZZ'])('rejects %j', (path) => {
    expect(parsePath(path)).toBeUndefined();
  });
});

describe('validateRequest', () => {
  test('GET on a bucket is a listing', () => {
    expect(validateRequest(request('GET', '/mybucket'), options)).toEqual({
      valid: true,
      target: { operation: 'listObjects', bucket: 'mybucket' },
    });
  });

  test('GET on a key is a fetch', () => {
    expect(validateRequest(request('GET', '/mybucket/a/b'), options)).toEqual({
      valid: true,
      target: { operation: 'getObject', bucket: 'mybucket', key: 'a/b' },
    });
  });

  test('PUT on a key is an upload', () => {
    expect(validateRequest(request('PUT', '/mybucket/file.txt', { 'content-length': '1024' }), options)).toEqual({
      valid: true,
      target: { operation: 'putObject', bucket: 'mybucket', key: 'file.txt' },
    });
  });

  test('empty path fails', () => {
    expect(validateRequest(request('GET', ''), options)).toEqual({
      valid: false,
      reason: 'Invalid path format',
    });
  });

  test('declared size over the limit fails for writes', () => {
    expect(validateRequest(request('PUT', '/b/k', { 'content-length': '1025' }), options)).toEqual({
      valid: false,
      reason: 'File size 1025 exceeds maximum allowed size of 1024 bytes',
    });
  });

  test('declared size is ignored for reads', () => {
    expect(validateRequest(request('GET', '/b/k', { 'content-length': '999999' }), options).valid).toBe(true);
  });

  test('unparseable content-length is left to the body reader', () => {
    expect(validateRequest(request('PUT', '/b/k', { 'content-length': 'lots' }), options).valid).toBe(true);
  });

  test('PUT on a bucket is unsupported', () => {
    expect(validateRequest(request('PUT', '/mybucket'), options)).toEqual({
      valid: false,
      reason: 'Unsupported operation: PUT on a bucket',
    });
  });

  test('other methods are unsupported', () => {
    expect(validateRequest(request('DELETE', '/b/k'), options)).toEqual({
      valid: false,
      reason: 'Unsupported method: DELETE',
    });
  });
});

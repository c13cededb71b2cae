import { expect, test, describe } from 'vitest';
import { authorize, canSeeBucket, canWrite } from './access';
import type { Identity, Role } from '../types/auth';

function identity(role: Role, buckets: string[]): Identity {
  return { username: `${role}-caller`, role, allowed_buckets: new Set(buckets) };
}

describe('bucket visibility', () => {
  test('wildcard sees every bucket', () => {
    const caller = identity('user', ['*']);
    for (const bucket of ['b1', 'b2', 'anything-else']) {
      expect(canSeeBucket(caller, bucket)).toBe(true);
      expect(authorize(caller, bucket, 'getObject')).toEqual({ allowed: true });
    }
  });

  test('exact patterns only see the named buckets', () => {
    const caller = identity('admin', ['b1']);
    expect(authorize(caller, 'b1', 'listObjects')).toEqual({ allowed: true });
    expect(authorize(caller, 'b2', 'listObjects')).toEqual({
      allowed: false,
      reason: 'Not allowed to access bucket: b2',
    });
  });

  test('patterns are not prefixes', () => {
    expect(canSeeBucket(identity('user', ['b1']), 'b10')).toBe(false);
  });
});

describe('write permission', () => {
  test('readonly is always denied', () => {
    expect(canWrite('readonly')).toBe(false);
    expect(authorize(identity('readonly', ['*']), 'b1', 'putObject')).toEqual({
      allowed: false,
      reason: 'Write permission denied',
    });
  });

  test('readonly may still read what it can see', () => {
    expect(authorize(identity('readonly', ['b1']), 'b1', 'getObject')).toEqual({ allowed: true });
    expect(authorize(identity('readonly', ['b1']), 'b1', 'listObjects')).toEqual({ allowed: true });
  });

  test.each<Role>(['admin', 'user'])('%s writes follow visibility', (role) => {
    expect(authorize(identity(role, ['b1']), 'b1', 'putObject')).toEqual({ allowed: true });
    expect(authorize(identity(role, ['b1']), 'b2', 'putObject')).toEqual({
      allowed: false,
      reason: 'Not allowed to access bucket: b2',
    });
  });

  test('visibility is checked before the write gate', () => {
    expect(authorize(identity('readonly', ['b1']), 'b2', 'putObject')).toEqual({
      allowed: false,
      reason: 'Not allowed to access bucket: b2',
    });
  });
});

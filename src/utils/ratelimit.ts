/**
 * Sliding Window Rate Limiters
 *
 * Each username owns an ordered list of request timestamps covering the
 * trailing window. A check purges expired entries, refuses when the
 * remaining count has reached the limit (without recording the refused
 * attempt), and otherwise records the new request.
 *
 * Two stores share that contract:
 * - MemoryRateLimiter keeps the windows in process. Purge, check and
 *   append run synchronously inside one call, so no other request can
 *   interleave on the event loop.
 * - RedisRateLimiter keeps each window in a sorted set and runs the same
 *   steps as one Lua script, which Redis executes atomically. Use it when
 *   several gateway processes must share one limit.
 *
 * Neither is a token bucket: a burst of `limit` requests is allowed at
 * once, and nothing more until the oldest entry leaves the window.
 */

import { randomUUID } from 'crypto';
import type Redis from 'ioredis';
import type { RateLimitResult } from '../types/auth';
import { DEFAULT_RATE_LIMIT, RATE_LIMIT_PREFIX, RATE_LIMIT_WINDOW_SECONDS } from '../config/auth';

export interface RateLimiter {
  admit(username: string): Promise<RateLimitResult>;
  close(): Promise<void>;
}

export interface RateLimiterOptions {
  limit?: number;
  windowSeconds?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class MemoryRateLimiter implements RateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();
  private sweeper: NodeJS.Timeout | undefined;

  constructor(options: RateLimiterOptions = {}) {
    this.limit = options.limit ?? DEFAULT_RATE_LIMIT;
    this.windowMs = (options.windowSeconds ?? RATE_LIMIT_WINDOW_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  async admit(username: string): Promise<RateLimitResult> {
    return this.check(username);
  }

  /**
   * Synchronous purge-check-append for one username
   */
  check(username: string): RateLimitResult {
    const now = this.now();
    let timestamps = this.windows.get(username);
    if (!timestamps) {
      timestamps = [];
      this.windows.set(username, timestamps);
    }

    const firstLive = timestamps.findIndex((t) => now - t < this.windowMs);
    timestamps.splice(0, firstLive === -1 ? timestamps.length : firstLive);

    if (timestamps.length >= this.limit) {
      return {
        allowed: false,
        limit: this.limit,
        remaining: 0,
        reset_in_seconds: this.resetIn(timestamps, now),
      };
    }

    timestamps.push(now);
    return {
      allowed: true,
      limit: this.limit,
      remaining: this.limit - timestamps.length,
      reset_in_seconds: this.resetIn(timestamps, now),
    };
  }

  /** Seconds until the oldest recorded request leaves the window */
  private resetIn(timestamps: number[], now: number): number {
    if (timestamps.length === 0) return Math.ceil(this.windowMs / 1000);
    return Math.max(0, Math.ceil((timestamps[0] + this.windowMs - now) / 1000));
  }

  /**
   * Drop usernames whose whole window has expired.
   * Returns how many were dropped.
   */
  sweep(): number {
    const now = this.now();
    let dropped = 0;
    for (const [username, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || now - newest >= this.windowMs) {
        this.windows.delete(username);
        dropped++;
      }
    }
    return dropped;
  }

  /** Number of usernames currently tracked */
  get trackedCount(): number {
    return this.windows.size;
  }

  /**
   * Sweep once per window length until closed
   */
  startSweeper(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), this.windowMs);
    this.sweeper.unref();
  }

  async close(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
    this.windows.clear();
  }
}

/**
 * KEYS[1] window key
 * ARGV now_ms, window_ms, limit, member
 * Returns { allowed (0|1), count after the call, oldest score }
 */
const ADMIT_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
if count >= limit then
  local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
  return { 0, count, tonumber(oldest[2]) }
end
redis.call('ZADD', key, now, ARGV[4])
redis.call('PEXPIRE', key, window)
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
return { 1, count + 1, tonumber(oldest[2]) }
`;

export type RedisEvalClient = Pick<Redis, 'eval' | 'quit'>;

export class RedisRateLimiter implements RateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;

  constructor(
    private readonly redis: RedisEvalClient,
    options: RateLimiterOptions = {}
  ) {
    this.limit = options.limit ?? DEFAULT_RATE_LIMIT;
    this.windowMs = (options.windowSeconds ?? RATE_LIMIT_WINDOW_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  async admit(username: string): Promise<RateLimitResult> {
    const now = this.now();
    // Member must be unique so same-millisecond requests are all counted
    const member = `${now}:${randomUUID()}`;

    const reply = await this.redis.eval(
      ADMIT_SCRIPT,
      1,
      `${RATE_LIMIT_PREFIX}${username}`,
      now,
      this.windowMs,
      this.limit,
      member
    );

    const [allowed, count, oldest] = parseReply(reply);
    return {
      allowed,
      limit: this.limit,
      remaining: Math.max(0, this.limit - count),
      reset_in_seconds: Math.max(0, Math.ceil((oldest + this.windowMs - now) / 1000)),
    };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function parseReply(reply: unknown): [boolean, number, number] {
  if (
    !Array.isArray(reply) ||
    reply.length !== 3 ||
    !reply.every((value): value is number => typeof value === 'number')
  ) {
    throw new Error('Unexpected rate limit script reply');
  }
  return [reply[0] === 1, reply[1], reply[2]];
}

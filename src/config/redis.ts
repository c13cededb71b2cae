import Redis from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';

/**
 * Create the Redis connection backing the shared rate limiter
 */
export function createRedis(url: string, log: FastifyBaseLogger): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('connect', () => {
    log.info('Connected to Redis');
  });

  redis.on('error', (err) => {
    log.error({ err }, 'Redis error');
  });

  return redis;
}

/**
 * Initialize Redis: connect and verify the server answers
 */
export async function initRedis(redis: Redis): Promise<void> {
  await redis.connect();
  const result = await redis.ping();
  if (result !== 'PONG') {
    throw new Error('Redis ping failed');
  }
}

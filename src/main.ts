import { buildServer } from './api/server';
import { GatewayPipeline } from './api/pipeline';
import { loadConfig, type GatewaySettings } from './config/gateway';
import { loggerOptions, startupLogger } from './config/logger';
import { createRedis, initRedis } from './config/redis';
import { createS3Client } from './config/s3';
import { AccountRegistry } from './utils/accounts';
import { IdentityStore } from './utils/identity';
import { MemoryRateLimiter, RedisRateLimiter, type RateLimiter } from './utils/ratelimit';
import { S3StorageBackend } from './utils/storage';
import type { StorageBackend } from './types/storage';

async function createRateLimiter(settings: GatewaySettings): Promise<RateLimiter> {
  const options = {
    limit: settings.rate_limit.max_requests,
    windowSeconds: settings.rate_limit.window_seconds,
  };

  if (settings.rate_limit.store === 'redis') {
    const redis = createRedis(settings.rate_limit.redis_url, startupLogger);
    await initRedis(redis);
    return new RedisRateLimiter(redis, options);
  }

  const limiter = new MemoryRateLimiter(options);
  limiter.startSweeper();
  return limiter;
}

function createBackends(settings: GatewaySettings): Map<string, StorageBackend> {
  const backends = new Map<string, StorageBackend>();
  for (const account of settings.accounts) {
    startupLogger.info({ account: account.id, endpoint: account.endpoint_url }, 'Creating storage client');
    const client = createS3Client(account, settings.backend_timeout_ms);
    backends.set(account.id, new S3StorageBackend(account.id, client));
  }
  return backends;
}

const start = async () => {
  const settings = loadConfig();
  const host = process.env.HOST || settings.server.host;
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : settings.server.port;

  const accounts = new AccountRegistry(settings.accounts);
  const identities = new IdentityStore(settings.identities);
  const rateLimiter = await createRateLimiter(settings);

  startupLogger.info(
    {
      accounts: accounts.accountIds().length,
      buckets: accounts.size,
      users: identities.size,
      rate_limit_store: settings.rate_limit.store,
    },
    'Configuration loaded'
  );

  const pipeline = new GatewayPipeline({
    accounts,
    identities,
    rateLimiter,
    backends: createBackends(settings),
    maxFileSize: settings.max_file_size,
  });

  const app = buildServer({ pipeline, rateLimiter, logger: loggerOptions });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    app
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port, host });
};

start().catch((err) => {
  startupLogger.fatal({ err }, 'Gateway failed to start');
  process.exit(1);
});

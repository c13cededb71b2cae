import { readFileSync } from 'fs';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from '../utils/errors';
import type { Identity } from '../types/auth';
import type { StorageAccount } from '../types/storage';
import {
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_RATE_LIMIT,
  RATE_LIMIT_WINDOW_SECONDS,
} from './auth';

const CONFIG_PATH = process.env.GATEWAY_CONFIG || 'config.json';

/** Default backend request timeout (ms) */
export const DEFAULT_BACKEND_TIMEOUT_MS = 30_000;

/**
 * Configuration file schema
 */
export const AccountConfigSchema = Type.Object({
  endpoint_url: Type.String({ minLength: 1 }),
  region: Type.String({ minLength: 1 }),
  access_key_id: Type.String({ minLength: 1 }),
  secret_access_key: Type.String({ minLength: 1 }),
  buckets: Type.Array(Type.String({ minLength: 1 })),
  force_path_style: Type.Optional(Type.Boolean()),
});

export const UserConfigSchema = Type.Object({
  api_key: Type.String({ minLength: 1 }),
  role: Type.Union([Type.Literal('admin'), Type.Literal('user'), Type.Literal('readonly')]),
  allowed_buckets: Type.Array(Type.String({ minLength: 1 })),
});

export const RateLimitConfigSchema = Type.Object({
  max_requests: Type.Optional(Type.Integer({ minimum: 1 })),
  window_seconds: Type.Optional(Type.Integer({ minimum: 1 })),
  store: Type.Optional(Type.Union([Type.Literal('memory'), Type.Literal('redis')])),
  redis_url: Type.Optional(Type.String({ minLength: 1 })),
});

export const GatewayConfigSchema = Type.Object({
  accounts: Type.Record(Type.String(), AccountConfigSchema),
  users: Type.Record(Type.String(), UserConfigSchema),
  server: Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
  }),
  max_file_size: Type.Optional(Type.Integer({ minimum: 0 })),
  backend_timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
  rate_limit: Type.Optional(RateLimitConfigSchema),
});

export type GatewayConfigFile = Static<typeof GatewayConfigSchema>;

export type RateLimitSettings =
  | { store: 'memory'; max_requests: number; window_seconds: number }
  | { store: 'redis'; max_requests: number; window_seconds: number; redis_url: string };

/** Configuration after validation, with defaults applied */
export interface GatewaySettings {
  accounts: StorageAccount[];
  identities: Array<{ api_key: string; identity: Identity }>;
  server: { host: string; port: number };
  max_file_size: number;
  backend_timeout_ms: number;
  rate_limit: RateLimitSettings;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function schemaErrors(raw: unknown): string[] {
  return [...Value.Errors(GatewayConfigSchema, raw)].map(
    (error) => `${error.path || '/'}: ${error.message}`
  );
}

/**
 * Reject configuration that the lookups could only resolve arbitrarily
 */
function checkAmbiguities(config: GatewayConfigFile): void {
  const owners = new Map<string, string>();
  for (const [accountId, account] of Object.entries(config.accounts)) {
    for (const bucket of account.buckets) {
      const owner = owners.get(bucket);
      if (owner !== undefined && owner !== accountId) {
        throw new ConfigError(
          `Bucket "${bucket}" is claimed by both accounts "${owner}" and "${accountId}"`
        );
      }
      owners.set(bucket, accountId);
    }
  }

  const keyOwners = new Map<string, string>();
  for (const [username, user] of Object.entries(config.users)) {
    const owner = keyOwners.get(user.api_key);
    if (owner !== undefined) {
      throw new ConfigError(`Users "${owner}" and "${username}" share the same API key`);
    }
    keyOwners.set(user.api_key, username);
  }
}

function resolveRateLimit(config: GatewayConfigFile): RateLimitSettings {
  const section = config.rate_limit ?? {};
  const max_requests = section.max_requests ?? DEFAULT_RATE_LIMIT;
  const window_seconds = section.window_seconds ?? RATE_LIMIT_WINDOW_SECONDS;

  if (section.store === 'redis') {
    if (!section.redis_url) {
      throw new ConfigError('rate_limit.redis_url is required when rate_limit.store is "redis"');
    }
    return { store: 'redis', max_requests, window_seconds, redis_url: section.redis_url };
  }

  return { store: 'memory', max_requests, window_seconds };
}

/**
 * Validate a parsed configuration document and apply defaults
 */
export function parseConfig(raw: unknown): GatewaySettings {
  if (!Value.Check(GatewayConfigSchema, raw)) {
    throw new ConfigError(`Invalid configuration:\n${schemaErrors(raw).join('\n')}`);
  }

  checkAmbiguities(raw);

  const accounts: StorageAccount[] = Object.entries(raw.accounts).map(([id, account]) => ({
    id,
    endpoint_url: account.endpoint_url,
    region: account.region,
    credentials: {
      accessKeyId: account.access_key_id,
      secretAccessKey: account.secret_access_key,
    },
    buckets: [...account.buckets],
    force_path_style: account.force_path_style ?? true,
  }));

  const identities = Object.entries(raw.users).map(([username, user]) => ({
    api_key: user.api_key,
    identity: {
      username,
      role: user.role,
      allowed_buckets: new Set(user.allowed_buckets),
    },
  }));

  return {
    accounts,
    identities,
    server: { host: raw.server.host, port: raw.server.port },
    max_file_size: raw.max_file_size ?? DEFAULT_MAX_FILE_SIZE,
    backend_timeout_ms: raw.backend_timeout_ms ?? DEFAULT_BACKEND_TIMEOUT_MS,
    rate_limit: resolveRateLimit(raw),
  };
}

/**
 * Load configuration from disk (GATEWAY_CONFIG, default ./config.json)
 */
export function loadConfig(path: string = CONFIG_PATH): GatewaySettings {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${describe(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${describe(err)}`);
  }

  return parseConfig(raw);
}

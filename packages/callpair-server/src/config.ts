import type { IceServer } from "callpair";
import ms from "ms";

export type Environment = typeof process.env;

export interface Config {
  readonly server: ServerConfig;
  readonly ice: IceConfig;
  readonly redis: RedisConfig | null;
  readonly retention: RetentionConfig;
}

export interface ServerConfig {
  readonly host: string | null;
  readonly port: number;
  readonly maxMessageSize: number;
}

export interface IceConfig {
  readonly servers: IceServer[];
}

export interface RedisConfig {
  readonly url: string;
  readonly pool: RedisPoolConfig;
  readonly keyPrefix: string | undefined;
  readonly connectTimeout: number;
  readonly commandTimeout: number;
  readonly keepAlive: number;
  /** How long one `XREAD` waits for mailbox entries. */
  readonly block: number;
}

export interface RedisPoolConfig {
  readonly min: number;
  readonly max: number;
  readonly acquireTimeoutMillis: number;
  readonly evictionRunIntervalMillis: number;
  readonly maxWaitingClients: number;
}

export interface RetentionConfig {
  readonly rooms: number;
}

export const defaultIceURLs = [
  "stun:stun.l.google.com:19302",
  "stun:stun1.l.google.com:19302",
  "stun:stun2.l.google.com:19302",
  "stun:stun3.l.google.com:19302",
  "stun:stun4.l.google.com:19302",
];

export function getConfig(env: Environment = process.env): Config {
  return {
    server: getServerConfig(env),
    ice: getIceConfig(env),
    redis: getRedisConfig(env),
    retention: getRetentionConfig(env),
  };
}

function getServerConfig(env: Environment): ServerConfig {
  return {
    host: env.LISTEN_HOST || null,
    port: int("LISTEN_PORT", env.LISTEN_PORT || "3001"),
    maxMessageSize: int("MAX_MESSAGE_SIZE", env.MAX_MESSAGE_SIZE || "65536"),
  };
}

function getIceConfig(env: Environment): IceConfig {
  const urls = env.ICE_SERVERS
    ? env.ICE_SERVERS.split(",")
        .map((url) => url.trim())
        .filter((url) => url.length > 0)
    : defaultIceURLs;

  const username = env.TURN_USERNAME || undefined;
  const credential = env.TURN_CREDENTIAL || undefined;

  return {
    servers: urls.map((url) => {
      if (!/^stuns?:|^turns?:/.test(url))
        throw new ConfigError(`Unsupported ICE server URL ${url}`);

      if (url.startsWith("turn") && username != null && credential != null)
        return { urls: url, username, credential };
      return { urls: url };
    }),
  };
}

function getRedisConfig(env: Environment): RedisConfig | null {
  if (!env.REDIS_URL && !env.REDIS_HOST) return null;

  return {
    url: getRedisURL(env),
    pool: getRedisPoolConfig(env),
    keyPrefix: env.REDIS_KEY_PREFIX || undefined,
    connectTimeout: duration(
      "REDIS_CONNECT_TIMEOUT",
      env.REDIS_CONNECT_TIMEOUT || "5s"
    ),
    commandTimeout: duration(
      "REDIS_COMMAND_TIMEOUT",
      env.REDIS_COMMAND_TIMEOUT || "2s"
    ),
    keepAlive: duration("REDIS_KEEP_ALIVE", env.REDIS_KEEP_ALIVE || "1s"),
    block: duration("MAILBOX_BLOCK", env.MAILBOX_BLOCK || "1s"),
  };
}

function getRedisPoolConfig(env: Environment): RedisPoolConfig {
  const min = int("REDIS_POOL_MIN", env.REDIS_POOL_MIN || "2");
  const max = int("REDIS_POOL_MAX", env.REDIS_POOL_MAX || "120");
  const defaultWait = Math.ceil(max / 10);

  return {
    min,
    max,
    acquireTimeoutMillis: duration(
      "REDIS_POOL_ACQUIRE_TIMEOUT",
      env.REDIS_POOL_ACQUIRE_TIMEOUT || "2.5s"
    ),
    evictionRunIntervalMillis: duration(
      "REDIS_POOL_EVICT_INTERVAL_MS",
      env.REDIS_POOL_EVICT_INTERVAL_MS || "10s"
    ),
    maxWaitingClients: int(
      "REDIS_POOL_MAX_PENDING",
      env.REDIS_POOL_MAX_PENDING || `${defaultWait}`
    ),
  };
}

function getRedisURL(env: Environment): string {
  if (env.REDIS_URL) return env.REDIS_URL;

  const protocol = env.REDIS_TLS ? "rediss" : "redis";
  const auth = env.REDIS_PASSWORD
    ? `${env.REDIS_USER || "default"}:${env.REDIS_PASSWORD}@`
    : "";
  const host = `${env.REDIS_HOST}:${env.REDIS_PORT || "6379"}`;
  return `${protocol}://${auth}${host}`;
}

function getRetentionConfig(env: Environment): RetentionConfig {
  return {
    rooms: duration("ROOM_TTL", env.ROOM_TTL || "30h"),
  };
}

function int(name: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0)
    throw new ConfigError(
      `$${name} must be a non-negative integer, not "${value}"`
    );
  return parsed;
}

function duration(name: string, value: string): number {
  const parsed = ms(value);
  if (typeof parsed !== "number" || !Number.isFinite(parsed))
    throw new ConfigError(
      `$${name} must be a duration like "5s", not "${value}"`
    );
  return parsed;
}

export class ConfigError extends Error {
  public readonly name: string = "ConfigError";
}

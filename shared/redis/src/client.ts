import { Redis } from "ioredis";
import { logger } from "../../observability/src/logger.js";

export interface RedisSettings {
  /** Server URL; null keeps every RedisCache on its in-memory map */
  url: string | null;
  /** Prepended by ioredis to every command's keys */
  keyPrefix: string;
}

const DEFAULT_SETTINGS: RedisSettings = { url: null, keyPrefix: "acl:" };

let settings: RedisSettings = DEFAULT_SETTINGS;
let redisClient: Redis | null = null;
// Set once getRedisClient() has decided, so a missing URL is logged once.
let resolved = false;
let available = false;

/**
 * Settings for the client getRedisClient() creates. Ignored (with a
 * warning) while a client is open; call disconnectRedis() first.
 */
export function configureRedis(next: RedisSettings): void {
  if (redisClient) {
    if (next.url !== settings.url || next.keyPrefix !== settings.keyPrefix) {
      logger.warn("Redis client already open, new settings apply after disconnectRedis()");
    }
    return;
  }
  settings = { ...next };
  resolved = false;
}

/** The `keyPrefix` ioredis prepends to every command's keys. */
export function getRedisKeyPrefix(): string {
  return settings.keyPrefix;
}

function connect({ url, keyPrefix }: { url: string; keyPrefix: string }): Redis {
  const client = new Redis(url, {
    keyPrefix,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      if (times > 10) return null;
      return Math.min(times * 200, 5000);
    },
    lazyConnect: false,
  });

  client.on("connect", () => {
    available = true;
    logger.info("Redis connected", { key_prefix: keyPrefix });
  });
  client.on("error", (err: Error) => {
    available = false;
    logger.warn(`Redis error: ${err.message}`);
  });
  client.on("close", () => {
    available = false;
  });
  client.on("reconnecting", () => {
    logger.info("Redis reconnecting...");
  });

  return client;
}

/**
 * The shared client, created on first use from the configured settings.
 * Null when no URL is configured.
 */
export function getRedisClient(): Redis | null {
  if (redisClient) return redisClient;
  if (resolved) return null;
  resolved = true;

  if (!settings.url) {
    logger.info("Redis URL not configured, using in-memory cache fallback");
    return null;
  }
  redisClient = connect({ url: settings.url, keyPrefix: settings.keyPrefix });
  return redisClient;
}

export function isRedisAvailable(): boolean {
  return available && redisClient?.status === "ready";
}

/** Close the client (for shutdown). The next getRedisClient() starts over. */
export async function disconnectRedis(): Promise<void> {
  const client = redisClient;
  redisClient = null;
  available = false;
  resolved = false;
  if (client) {
    await client.quit();
  }
}

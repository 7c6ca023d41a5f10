import { getRedisClient, getRedisKeyPrefix, isRedisAvailable } from "./client.js";
import { logger } from "../../observability/src/logger.js";

/** Converts cached values to and from the strings Redis stores. */
export interface CacheCodec<T> {
  encode(value: T): string;
  decode(raw: string): T;
}

/** Minimal key/value cache contract shared by every backend. */
export interface KeyValueCache<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlOverride?: number): Promise<void>;
  del(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface RedisCacheOptions<T> {
  codec?: CacheCodec<T>;
  /**
   * When a Redis command fails, log and continue against the in-memory map
   * (default). When false the Redis error is rethrown to the caller.
   */
  fallbackOnError?: boolean;
}

export function jsonCodec<T>(): CacheCodec<T> {
  return {
    encode: (value) => JSON.stringify(value),
    decode: (raw) => JSON.parse(raw) as T,
  };
}

/**
 * Generic cache backed by Redis with transparent in-memory fallback.
 * When Redis is unavailable, uses a local Map with TTL-based expiry.
 *
 * Both paths hold the encoded string, so a value read from memory is
 * decoded exactly like one read from Redis.
 */
export class RedisCache<T> implements KeyValueCache<T> {
  private readonly prefix: string;
  private readonly ttlSeconds: number;
  private readonly codec: CacheCodec<T>;
  private readonly fallbackOnError: boolean;

  // In-memory fallback
  private readonly memCache = new Map<string, { raw: string; expiresAt: number }>();

  constructor(prefix: string, ttlSeconds: number, options: RedisCacheOptions<T> = {}) {
    this.prefix = prefix;
    this.ttlSeconds = ttlSeconds;
    this.codec = options.codec ?? jsonCodec<T>();
    this.fallbackOnError = options.fallbackOnError ?? true;
  }

  private redisKey(key: string): string {
    // ioredis keyPrefix is added by the client; we add our logical prefix
    return `${this.prefix}:${key}`;
  }

  private handleRedisError(op: string, key: string, err: unknown): void {
    if (!this.fallbackOnError) throw err;
    logger.warn(`RedisCache.${op} failed for ${this.prefix}:${key}: ${err instanceof Error ? err.message : String(err)}`);
  }

  async get(key: string): Promise<T | null> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      let raw: string | null | undefined = undefined;
      try {
        raw = await redis.get(this.redisKey(key));
      } catch (err) {
        this.handleRedisError("get", key, err);
        // Fall through to memory cache
      }
      if (raw === null) return null;
      if (raw !== undefined) return this.codec.decode(raw);
    }

    // In-memory fallback
    const entry = this.memCache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.memCache.delete(key);
      return null;
    }
    return this.codec.decode(entry.raw);
  }

  async set(key: string, value: T, ttlOverride?: number): Promise<void> {
    const ttl = ttlOverride ?? this.ttlSeconds;
    const raw = this.codec.encode(value);
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        await redis.set(this.redisKey(key), raw, "EX", ttl);
        return;
      } catch (err) {
        this.handleRedisError("set", key, err);
        // Fall through to memory cache
      }
    }

    // In-memory fallback
    this.memCache.set(key, {
      raw,
      expiresAt: Date.now() + ttl * 1000,
    });
  }

  async del(key: string): Promise<void> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        await redis.del(this.redisKey(key));
      } catch (err) {
        this.handleRedisError("del", key, err);
      }
    }

    this.memCache.delete(key);
  }

  async clear(): Promise<void> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        // SCAN-based deletion to avoid blocking with KEYS.
        // SCAN patterns and results carry the client keyPrefix, del() adds it again.
        const keyPrefix = getRedisKeyPrefix();
        const pattern = `${keyPrefix}${this.prefix}:*`;
        let cursor = "0";
        do {
          const [nextCursor, keys] = await redis.scan(cursor, "MATCH", pattern, "COUNT", 100);
          cursor = nextCursor;
          if (keys.length > 0) {
            const pipeline = redis.pipeline();
            for (const k of keys) {
              pipeline.del(k.startsWith(keyPrefix) ? k.slice(keyPrefix.length) : k);
            }
            await pipeline.exec();
          }
        } while (cursor !== "0");
      } catch (err) {
        this.handleRedisError("clear", "*", err);
      }
    }

    this.memCache.clear();
  }
}

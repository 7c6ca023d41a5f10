import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "../../../shared/observability/src/logger.js";
import { ConfigError } from "./errors.js";

export interface AclCacheConfig {
  /** Logical key prefix inside Redis (after the client keyPrefix) */
  prefix: string;
  ttlSeconds: number;
  /** Fall back to the in-memory map when a Redis command fails */
  fallbackOnError: boolean;
  /** Redis server URL; null keeps the cache in memory */
  redisUrl: string | null;
  /** Client-level keyPrefix ioredis prepends to every key */
  redisKeyPrefix: string;
}

export const DEFAULT_ACL_CACHE_CONFIG: AclCacheConfig = {
  prefix: "acl",
  ttlSeconds: 300, // 5 minutes
  fallbackOnError: true,
  redisUrl: null,
  redisKeyPrefix: "acl:",
};

const YamlConfigSchema = z
  .object({
    prefix: z.string().min(1).optional(),
    ttl_seconds: z.number().int().positive().optional(),
    fallback_on_error: z.boolean().optional(),
    redis_url: z.string().url().optional(),
    redis_key_prefix: z.string().optional(),
  })
  .strict();

const BooleanEnv = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvConfigSchema = z.object({
  ACL_CACHE_PREFIX: z.string().min(1).optional(),
  ACL_CACHE_TTL_SECONDS: z.coerce.number().int().positive().optional(),
  ACL_CACHE_FALLBACK_ON_ERROR: BooleanEnv.optional(),
  REDIS_URL: z.string().url().optional(),
  REDIS_KEY_PREFIX: z.string().optional(),
});

// ── YAML (loaded once from disk) ────────────────────────────────────────

function loadYaml(configPath: string): Partial<AclCacheConfig> {
  if (!existsSync(configPath)) {
    logger.warn(`ACL cache config not found at: ${configPath}, using defaults and environment`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse ACL cache YAML ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to undefined
  const result = YamlConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ACL cache config in ${configPath}: ${result.error.message}`);
  }

  const { prefix, ttl_seconds, fallback_on_error, redis_url, redis_key_prefix } = result.data;
  logger.info(`ACL cache config loaded from YAML: ${configPath}`);
  return withoutUndefined({
    prefix,
    ttlSeconds: ttl_seconds,
    fallbackOnError: fallback_on_error,
    redisUrl: redis_url,
    redisKeyPrefix: redis_key_prefix,
  });
}

function loadEnv(env: NodeJS.ProcessEnv): Partial<AclCacheConfig> {
  const result = EnvConfigSchema.safeParse({
    ACL_CACHE_PREFIX: env.ACL_CACHE_PREFIX || undefined,
    ACL_CACHE_TTL_SECONDS: env.ACL_CACHE_TTL_SECONDS || undefined,
    ACL_CACHE_FALLBACK_ON_ERROR: env.ACL_CACHE_FALLBACK_ON_ERROR?.toLowerCase() || undefined,
    REDIS_URL: env.REDIS_URL || undefined,
    // An empty prefix is a valid setting
    REDIS_KEY_PREFIX: env.REDIS_KEY_PREFIX,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid ACL cache environment: ${result.error.message}`);
  }

  return withoutUndefined({
    prefix: result.data.ACL_CACHE_PREFIX,
    ttlSeconds: result.data.ACL_CACHE_TTL_SECONDS,
    fallbackOnError: result.data.ACL_CACHE_FALLBACK_ON_ERROR,
    redisUrl: result.data.REDIS_URL,
    redisKeyPrefix: result.data.REDIS_KEY_PREFIX,
  });
}

function withoutUndefined(values: {
  [K in keyof AclCacheConfig]: AclCacheConfig[K] | undefined;
}): Partial<AclCacheConfig> {
  const out: Partial<AclCacheConfig> = {};
  if (values.prefix !== undefined) out.prefix = values.prefix;
  if (values.ttlSeconds !== undefined) out.ttlSeconds = values.ttlSeconds;
  if (values.fallbackOnError !== undefined) out.fallbackOnError = values.fallbackOnError;
  if (values.redisUrl !== undefined) out.redisUrl = values.redisUrl;
  if (values.redisKeyPrefix !== undefined) out.redisKeyPrefix = values.redisKeyPrefix;
  return out;
}

// ── Public API ──────────────────────────────────────────────────────────

let cachedConfig: AclCacheConfig | null = null;

/**
 * Defaults, then the YAML file, then environment variables.
 * The YAML path is `configPath`, else ACL_CACHE_CONFIG_PATH, else
 * config/acl-cache.yml under the working directory. Memoized.
 */
export function loadAclCacheConfig(configPath?: string): AclCacheConfig {
  if (cachedConfig) return cachedConfig;

  const path = configPath
    || process.env.ACL_CACHE_CONFIG_PATH
    || resolve(process.cwd(), "config/acl-cache.yml");

  cachedConfig = {
    ...DEFAULT_ACL_CACHE_CONFIG,
    ...loadYaml(path),
    ...loadEnv(process.env),
  };
  return cachedConfig;
}

/** Drop the memoized config and load it again */
export function reloadAclCacheConfig(configPath?: string): AclCacheConfig {
  cachedConfig = null;
  return loadAclCacheConfig(configPath);
}

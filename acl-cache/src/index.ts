import "dotenv/config";

import { RedisCache, configureRedis, disconnectRedis, type KeyValueCache } from "../../shared/redis/src/index.js";
import { logInfo } from "../../shared/observability/src/index.js";
import {
  AclCacheAdapter,
  aclCodec,
  loadAclCacheConfig,
  type AclAuthorizationStrategy,
  type AclCacheConfig,
  type MutableAcl,
  type PermissionGrantingStrategy,
} from "./acl.js";

export * from "./acl.js";

export interface CreateAclCacheOptions {
  authorizationStrategy: AclAuthorizationStrategy;
  permissionGrantingStrategy: PermissionGrantingStrategy;
  /** Overrides loadAclCacheConfig() */
  config?: AclCacheConfig;
  /** Backing cache; defaults to a RedisCache built from config */
  cache?: KeyValueCache<MutableAcl>;
}

export function createAclCache(options: CreateAclCacheOptions): AclCacheAdapter {
  const config = options.config ?? loadAclCacheConfig();
  let cache = options.cache;
  if (!cache) {
    configureRedis({ url: config.redisUrl, keyPrefix: config.redisKeyPrefix });
    cache = new RedisCache<MutableAcl>(config.prefix, config.ttlSeconds, {
      codec: aclCodec,
      fallbackOnError: config.fallbackOnError,
    });
  }

  logInfo("ACL cache ready", {
    prefix: config.prefix,
    ttl_seconds: config.ttlSeconds,
    fallback_on_error: config.fallbackOnError,
    redis_configured: config.redisUrl !== null,
    custom_backend: options.cache !== undefined,
  });

  return new AclCacheAdapter(cache, options.permissionGrantingStrategy, options.authorizationStrategy);
}

/** Disconnect Redis (for graceful shutdown) */
export async function shutdownAclCache(): Promise<void> {
  await disconnectRedis();
}

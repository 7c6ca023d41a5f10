export {
  configureRedis,
  getRedisClient,
  getRedisKeyPrefix,
  isRedisAvailable,
  disconnectRedis,
} from "./client.js";
export type { RedisSettings } from "./client.js";
export { RedisCache, jsonCodec } from "./cache.js";
export type { CacheCodec, KeyValueCache, RedisCacheOptions } from "./cache.js";

/**
 * ACL barrel export: re-exports from focused acl/ modules.
 */

// Types
export type {
  AccessControlEntry,
  Acl,
  AclAuthorizationStrategy,
  AclCache,
  AclChangeType,
  MutableAcl,
  ObjectIdentity,
  PermissionGrantingStrategy,
  PrimaryKey,
  RebindableAcl,
  Sid,
} from "./acl/types.js";
export { isMutableAcl, isRebindableAcl } from "./acl/types.js";

// Domain object
export { AclEntry } from "./acl/acl-entry.js";
export type { AclEntryInit } from "./acl/acl-entry.js";

// Errors
export {
  AclCacheError,
  AclCodecError,
  ConfigError,
  CyclicParentChainError,
  InvalidArgumentError,
  StrategyNotBoundError,
} from "./acl/errors.js";
export type { AclCacheErrorCode } from "./acl/errors.js";

// Keys and codec
export { cacheKeyFor, isObjectIdentity, isPrimaryKey, objectIdentityEquals, objectIdentityKey, primaryKeyKey } from "./acl/keys.js";
export { aclCodec, serializeAcl, deserializeAcl, SerializedAclSchema } from "./acl/codec.js";
export type { SerializedAcl, SerializedAclNode } from "./acl/codec.js";

// Config loading
export { loadAclCacheConfig, reloadAclCacheConfig, DEFAULT_ACL_CACHE_CONFIG } from "./acl/config.js";
export type { AclCacheConfig } from "./acl/config.js";

// Cache adapter
export { AclCacheAdapter } from "./acl/cache-adapter.js";

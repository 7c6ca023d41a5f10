import type { KeyValueCache } from "../../../shared/redis/src/index.js";
import { logger, withSpan } from "../../../shared/observability/src/index.js";
import { ancestorChain, anyAcl } from "./chain.js";
import { InvalidArgumentError, requireValue } from "./errors.js";
import { cacheKeyFor, isObjectIdentity, isPrimaryKey, objectIdentityKey, primaryKeyKey } from "./keys.js";
import {
  isMutableAcl,
  isRebindableAcl,
  type Acl,
  type AclAuthorizationStrategy,
  type AclCache,
  type MutableAcl,
  type ObjectIdentity,
  type PermissionGrantingStrategy,
  type PrimaryKey,
} from "./types.js";

function keyKind(key: ObjectIdentity | PrimaryKey): "object_identity" | "primary_key" {
  return isObjectIdentity(key) ? "object_identity" : "primary_key";
}

/**
 * AclCache over a generic key/value cache.
 *
 * Each ACL is written twice, under its object identity and its primary key,
 * and its mutable ancestors are written before it. Entries read back from
 * the cache get this adapter's strategy instances attached, along with
 * every ancestor, since strategies never survive serialization.
 *
 * Store and evict issue several cache calls and are not atomic: a reader
 * can briefly see an entry under one key only.
 */
export class AclCacheAdapter implements AclCache {
  private readonly cache: KeyValueCache<MutableAcl>;
  private readonly authorizationStrategy: AclAuthorizationStrategy;
  private readonly permissionGrantingStrategy: PermissionGrantingStrategy;

  constructor(
    cache: KeyValueCache<MutableAcl>,
    permissionGrantingStrategy: PermissionGrantingStrategy,
    authorizationStrategy: AclAuthorizationStrategy
  ) {
    this.cache = requireValue(cache, "Cache required");
    this.permissionGrantingStrategy = requireValue(permissionGrantingStrategy, "PermissionGrantingStrategy required");
    this.authorizationStrategy = requireValue(authorizationStrategy, "AclAuthorizationStrategy required");
  }

  async putInCache(acl: MutableAcl): Promise<void> {
    requireValue(acl, "Acl required");
    // Validate the whole chain before the first write.
    const chain = ancestorChain(acl, isMutableAcl);
    for (const entry of chain) {
      if (!isObjectIdentity(requireValue(entry.objectIdentity, "ObjectIdentity required"))) {
        throw new InvalidArgumentError("ObjectIdentity needs a string type and a string or finite number identifier");
      }
      if (!isPrimaryKey(requireValue(entry.id, "ID required"))) {
        throw new InvalidArgumentError("ID must be a string or a finite number");
      }
    }

    await withSpan("acl_cache.put", { "acl.chain_length": chain.length }, async () => {
      // Root first, so an entry is never visible before its ancestors.
      for (let i = chain.length - 1; i >= 0; i--) {
        const entry = chain[i];
        await this.cache.set(objectIdentityKey(entry.objectIdentity), entry);
        await this.cache.set(primaryKeyKey(entry.id), entry);
      }
      logger.debug("ACL cached", { acl_id: String(acl.id), chain_length: chain.length });
    });
  }

  async getFromCache(key: ObjectIdentity | PrimaryKey): Promise<MutableAcl | null> {
    requireKey(key);
    return withSpan("acl_cache.get", { "acl.key_kind": keyKind(key) }, () => this.fetch(key));
  }

  async evictFromCache(key: ObjectIdentity | PrimaryKey): Promise<void> {
    requireKey(key);

    await withSpan("acl_cache.evict", { "acl.key_kind": keyKind(key) }, async () => {
      const acl = await this.fetch(key);
      if (!acl) return;

      await this.cache.del(primaryKeyKey(acl.id));
      await this.cache.del(objectIdentityKey(acl.objectIdentity));
      logger.debug("ACL evicted", { acl_id: String(acl.id) });
    });
  }

  async clearCache(): Promise<void> {
    await withSpan("acl_cache.clear", {}, () => this.cache.clear());
    logger.debug("ACL cache cleared");
  }

  private async fetch(key: ObjectIdentity | PrimaryKey): Promise<MutableAcl | null> {
    const acl = await this.cache.get(cacheKeyFor(key));
    if (!acl) {
      logger.debug("ACL cache miss", { key_kind: keyKind(key) });
      return null;
    }
    return this.rebindStrategies(acl);
  }

  private rebindStrategies(acl: MutableAcl): MutableAcl {
    for (const entry of ancestorChain<Acl>(acl, anyAcl)) {
      if (isRebindableAcl(entry)) {
        entry.bindStrategies(this.authorizationStrategy, this.permissionGrantingStrategy);
      }
    }
    return acl;
  }
}

function requireKey(key: ObjectIdentity | PrimaryKey | null | undefined): void {
  if (key === null || key === undefined) {
    throw new InvalidArgumentError("Cache key required");
  }
  if (isObjectIdentity(key) || isPrimaryKey(key)) return;
  throw new InvalidArgumentError("Cache key must be an ObjectIdentity, a string or a finite number");
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getRedisKeyPrefix, type KeyValueCache } from "../../../shared/redis/src/index.js";
import {
  AclCacheAdapter,
  AclEntry,
  CyclicParentChainError,
  InvalidArgumentError,
  aclCodec,
  createAclCache,
  shutdownAclCache,
  type AclCacheConfig,
  type Acl,
  type AclAuthorizationStrategy,
  type MutableAcl,
  type ObjectIdentity,
  type PermissionGrantingStrategy,
  type PrimaryKey,
} from "../index.js";

// Serializes like Redis would, and records every call.
class RecordingCache implements KeyValueCache<MutableAcl> {
  readonly calls: string[] = [];
  private readonly store = new Map<string, string>();

  async get(key: string): Promise<MutableAcl | null> {
    this.calls.push(`get ${key}`);
    const raw = this.store.get(key);
    return raw === undefined ? null : aclCodec.decode(raw);
  }

  async set(key: string, value: MutableAcl): Promise<void> {
    this.calls.push(`set ${key}`);
    this.store.set(key, aclCodec.encode(value));
  }

  async del(key: string): Promise<void> {
    this.calls.push(`del ${key}`);
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.calls.push("clear");
    this.store.clear();
  }

  keys(): string[] {
    return [...this.store.keys()];
  }
}

// Holds live objects, like a local heap cache.
class InstanceCache implements KeyValueCache<MutableAcl> {
  private readonly store = new Map<string, MutableAcl>();
  async get(key: string) {
    return this.store.get(key) ?? null;
  }
  async set(key: string, value: MutableAcl) {
    this.store.set(key, value);
  }
  async del(key: string) {
    this.store.delete(key);
  }
  async clear() {
    this.store.clear();
  }
}

const authStrategy: AclAuthorizationStrategy = { securityCheck: () => undefined };
const grantingStrategy: PermissionGrantingStrategy = { isGranted: () => true };

const OBJ_1: ObjectIdentity = { type: "Document", identifier: "obj-1" };
const OBJ_2: ObjectIdentity = { type: "Document", identifier: "obj-2" };
const OBJ_3: ObjectIdentity = { type: "Document", identifier: "obj-3" };

function entry(id: number, objectIdentity: ObjectIdentity, parentAcl: AclEntry | null = null): AclEntry {
  return new AclEntry({
    id,
    objectIdentity,
    parentAcl,
    owner: { kind: "principal", principal: "alice" },
    entries: [
      { id: id * 10, sid: { kind: "authority", authority: "ROLE_USER" }, mask: 1, granting: true, auditSuccess: false, auditFailure: false },
    ],
  });
}

// A MutableAcl that is not an AclEntry, so its id and identity are not
// checked on construction.
function plainAcl(id: PrimaryKey, objectIdentity: ObjectIdentity, parentAcl: Acl | null = null): MutableAcl {
  return {
    id,
    objectIdentity,
    owner: null,
    parentAcl,
    entriesInheriting: true,
    entries: [],
    isGranted: () => false,
    setParent: () => undefined,
    setOwner: () => undefined,
    setEntriesInheriting: () => undefined,
    insertAce: () => undefined,
    deleteAce: () => undefined,
  };
}

function asEntry(acl: Acl | null): AclEntry {
  if (!(acl instanceof AclEntry)) throw new Error("expected an AclEntry");
  return acl;
}

describe("AclCacheAdapter", () => {
  let cache: RecordingCache;
  let adapter: AclCacheAdapter;

  beforeEach(() => {
    cache = new RecordingCache();
    adapter = new AclCacheAdapter(cache, grantingStrategy, authStrategy);
  });

  describe("constructor", () => {
    it("rejects a missing cache", () => {
      expect(
        () => new AclCacheAdapter(null as unknown as KeyValueCache<MutableAcl>, grantingStrategy, authStrategy)
      ).toThrow(InvalidArgumentError);
    });

    it("rejects missing strategies", () => {
      expect(
        () => new AclCacheAdapter(cache, null as unknown as PermissionGrantingStrategy, authStrategy)
      ).toThrow("PermissionGrantingStrategy required");
      expect(
        () => new AclCacheAdapter(cache, grantingStrategy, undefined as unknown as AclAuthorizationStrategy)
      ).toThrow("AclAuthorizationStrategy required");
    });
  });

  describe("putInCache / getFromCache", () => {
    it("stores an entry under both keys and fetches it by either", async () => {
      const a = entry(100, OBJ_1);
      await adapter.putInCache(a);

      expect(cache.calls).toEqual(["set oid:Document:s:obj-1", "set pk:n:100"]);

      const byOid = asEntry(await adapter.getFromCache(OBJ_1));
      const byPk = asEntry(await adapter.getFromCache(100));
      expect(byOid.id).toBe(100);
      expect(byOid.objectIdentity).toEqual(OBJ_1);
      expect(byPk.id).toBe(100);
      expect(byPk.objectIdentity).toEqual(OBJ_1);
      expect(byPk.entries).toEqual(a.entries);
    });

    it("looks up object identities by value", async () => {
      await adapter.putInCache(entry(100, OBJ_1));
      const fetched = await adapter.getFromCache({ type: "Document", identifier: "obj-1" });
      expect(fetched?.id).toBe(100);
    });

    it("returns null on a miss", async () => {
      expect(await adapter.getFromCache(999)).toBeNull();
      expect(await adapter.getFromCache(OBJ_3)).toBeNull();
    });

    it("keeps numeric and string primary keys apart", async () => {
      await adapter.putInCache(entry(100, OBJ_1));
      expect(await adapter.getFromCache("100")).toBeNull();
    });

    it("stores ancestors before the entry itself", async () => {
      const a = entry(100, OBJ_1);
      const b = entry(200, OBJ_2, a);
      await adapter.putInCache(b);

      expect(cache.calls).toEqual([
        "set oid:Document:s:obj-1",
        "set pk:n:100",
        "set oid:Document:s:obj-2",
        "set pk:n:200",
      ]);
      expect((await adapter.getFromCache(OBJ_1))?.id).toBe(100);
      expect((await adapter.getFromCache(100))?.objectIdentity).toEqual(OBJ_1);
    });

    it("writes 2n entries for a chain of depth n", async () => {
      const root = entry(1, { type: "Folder", identifier: 1 });
      const mid = entry(2, { type: "Folder", identifier: 2 }, root);
      const leaf = entry(3, { type: "Folder", identifier: 3 }, mid);
      await adapter.putInCache(leaf);

      expect(cache.calls.filter((c) => c.startsWith("set "))).toHaveLength(6);
      expect(cache.keys()).toHaveLength(6);
    });

    it("does not store a parent that is not a mutable ACL", async () => {
      const readOnlyParent: Acl = {
        id: 100,
        objectIdentity: OBJ_1,
        owner: null,
        parentAcl: null,
        entriesInheriting: true,
        entries: [],
        isGranted: () => false,
      };
      const child = new AclEntry({ id: 200, objectIdentity: OBJ_2, parentAcl: readOnlyParent });
      await adapter.putInCache(child);

      expect(cache.calls).toEqual(["set oid:Document:s:obj-2", "set pk:n:200"]);
      expect(await adapter.getFromCache(100)).toBeNull();
    });

    it("returns the parent chain with the fetched entry", async () => {
      await adapter.putInCache(entry(200, OBJ_2, entry(100, OBJ_1)));

      const fetched = asEntry(await adapter.getFromCache(200));
      const parent = fetched.parentAcl;
      expect(parent?.id).toBe(100);
      expect(parent?.objectIdentity).toEqual(OBJ_1);
    });
  });

  describe("strategy rebinding", () => {
    it("attaches the adapter strategies to a deserialized entry and its ancestors", async () => {
      await adapter.putInCache(entry(300, OBJ_3, entry(200, OBJ_2, entry(100, OBJ_1))));

      const fetched = asEntry(await adapter.getFromCache(OBJ_3));
      expect(fetched.strategies.authorization).toBe(authStrategy);
      expect(fetched.strategies.permissionGranting).toBe(grantingStrategy);

      const parent = asEntry(fetched.parentAcl);
      const grandparent = asEntry(parent.parentAcl);
      for (const ancestor of [parent, grandparent]) {
        expect(ancestor.strategies.authorization).toBe(authStrategy);
        expect(ancestor.strategies.permissionGranting).toBe(grantingStrategy);
      }
    });

    it("replaces stale strategies on entries cached as live objects", async () => {
      const staleAuth: AclAuthorizationStrategy = { securityCheck: () => undefined };
      const staleGranting: PermissionGrantingStrategy = { isGranted: () => false };
      const c = new AclEntry({
        id: 500,
        objectIdentity: { type: "Report", identifier: 5 },
        authorizationStrategy: staleAuth,
        permissionGrantingStrategy: staleGranting,
      });

      const local = new AclCacheAdapter(new InstanceCache(), grantingStrategy, authStrategy);
      await local.putInCache(c);
      const fetched = asEntry(await local.getFromCache(500));

      expect(fetched).toBe(c);
      expect(fetched.strategies.authorization).toBe(authStrategy);
      expect(fetched.strategies.permissionGranting).toBe(grantingStrategy);
    });

    it("lets a fetched entry evaluate permissions through the bound strategy", async () => {
      await adapter.putInCache(entry(100, OBJ_1));
      const fetched = await adapter.getFromCache(100);
      expect(fetched?.isGranted([1], [{ kind: "principal", principal: "alice" }], false)).toBe(true);
    });
  });

  describe("evictFromCache", () => {
    it("removes both keys when evicting by primary key", async () => {
      await adapter.putInCache(entry(100, OBJ_1));
      cache.calls.length = 0;

      await adapter.evictFromCache(100);

      expect(cache.calls).toEqual(["get pk:n:100", "del pk:n:100", "del oid:Document:s:obj-1"]);
      expect(await adapter.getFromCache(OBJ_1)).toBeNull();
      expect(await adapter.getFromCache(100)).toBeNull();
    });

    it("removes both keys when evicting by object identity", async () => {
      await adapter.putInCache(entry(100, OBJ_1));
      cache.calls.length = 0;

      await adapter.evictFromCache(OBJ_1);

      expect(cache.calls).toEqual(["get oid:Document:s:obj-1", "del pk:n:100", "del oid:Document:s:obj-1"]);
      expect(await adapter.getFromCache(100)).toBeNull();
      expect(await adapter.getFromCache(OBJ_1)).toBeNull();
    });

    it("leaves ancestors cached", async () => {
      await adapter.putInCache(entry(200, OBJ_2, entry(100, OBJ_1)));
      await adapter.evictFromCache(200);

      expect(await adapter.getFromCache(OBJ_2)).toBeNull();
      expect((await adapter.getFromCache(OBJ_1))?.id).toBe(100);
      expect((await adapter.getFromCache(100))?.id).toBe(100);
    });

    it("is a no-op on a miss", async () => {
      await adapter.evictFromCache(OBJ_3);
      expect(cache.calls).toEqual(["get oid:Document:s:obj-3"]);
    });
  });

  describe("clearCache", () => {
    it("drops every stored key", async () => {
      await adapter.putInCache(entry(200, OBJ_2, entry(100, OBJ_1)));
      await adapter.clearCache();

      expect(cache.calls.at(-1)).toBe("clear");
      for (const key of [OBJ_1, OBJ_2, 100, 200]) {
        expect(await adapter.getFromCache(key)).toBeNull();
      }
    });
  });

  describe("invalid arguments", () => {
    it("rejects a missing entry without touching the cache", async () => {
      await expect(adapter.putInCache(null as unknown as MutableAcl)).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects a missing key without touching the cache", async () => {
      await expect(adapter.getFromCache(null as unknown as number)).rejects.toThrow("Cache key required");
      await expect(adapter.evictFromCache(undefined as unknown as number)).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects a cyclic parent chain before any write", async () => {
      const a = new AclEntry({ id: 1, objectIdentity: OBJ_1, authorizationStrategy: authStrategy });
      const b = new AclEntry({ id: 2, objectIdentity: OBJ_2, parentAcl: a });
      a.setParent(b);

      await expect(adapter.putInCache(b)).rejects.toThrow(CyclicParentChainError);
      await expect(adapter.putInCache(b)).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects an entry without an id before any write", async () => {
      const acl = plainAcl(null as unknown as PrimaryKey, OBJ_1);

      await expect(adapter.putInCache(acl)).rejects.toThrow("ID required");
      expect(cache.calls).toEqual([]);
    });

    it("rejects an ancestor without an object identity before any write", async () => {
      const grandparent = plainAcl(100, null as unknown as ObjectIdentity);
      const child = new AclEntry({ id: 300, objectIdentity: OBJ_3, parentAcl: plainAcl(200, OBJ_2, grandparent) });

      await expect(adapter.putInCache(child)).rejects.toThrow("ObjectIdentity required");
      expect(cache.calls).toEqual([]);
    });

    it("rejects non-finite numeric ids before any write", async () => {
      const nan = new AclEntry({ id: Number.NaN, objectIdentity: OBJ_1 });
      const child = entry(200, OBJ_2, new AclEntry({ id: Number.POSITIVE_INFINITY, objectIdentity: OBJ_1 }));

      await expect(adapter.putInCache(nan)).rejects.toThrow("ID must be a string or a finite number");
      await expect(adapter.putInCache(child)).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects a non-finite numeric object identifier before any write", async () => {
      const acl = new AclEntry({ id: 1, objectIdentity: { type: "Document", identifier: Number.NaN } });

      await expect(adapter.putInCache(acl)).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects non-finite numeric keys without touching the cache", async () => {
      await expect(adapter.getFromCache(Number.NaN)).rejects.toThrow("Cache key must be an ObjectIdentity, a string or a finite number");
      await expect(adapter.evictFromCache(Number.POSITIVE_INFINITY)).rejects.toThrow(InvalidArgumentError);
      await expect(
        adapter.getFromCache({ type: "Document", identifier: Number.NEGATIVE_INFINITY })
      ).rejects.toThrow(InvalidArgumentError);
      expect(cache.calls).toEqual([]);
    });

    it("rejects a cycle formed after the entry was cached as a live object", async () => {
      const local = new AclCacheAdapter(new InstanceCache(), grantingStrategy, authStrategy);
      const a = new AclEntry({ id: 1, objectIdentity: OBJ_1, authorizationStrategy: authStrategy });
      const b = new AclEntry({ id: 2, objectIdentity: OBJ_2, parentAcl: a });
      await local.putInCache(b);

      a.setParent(b);

      await expect(local.getFromCache(2)).rejects.toThrow(CyclicParentChainError);
      await expect(local.getFromCache(OBJ_1)).rejects.toThrow(CyclicParentChainError);
    });
  });

  describe("underlying cache failures", () => {
    it("propagates the cache error unchanged", async () => {
      const boom = new Error("connection reset");
      const failing: KeyValueCache<MutableAcl> = {
        get: async () => {
          throw boom;
        },
        set: async () => undefined,
        del: async () => undefined,
        clear: async () => undefined,
      };
      const broken = new AclCacheAdapter(failing, grantingStrategy, authStrategy);

      await expect(broken.getFromCache(100)).rejects.toBe(boom);
      await expect(broken.evictFromCache(OBJ_1)).rejects.toBe(boom);
    });
  });

  describe("createAclCache", () => {
    const config: AclCacheConfig = {
      prefix: "test-acl",
      ttlSeconds: 60,
      fallbackOnError: true,
      redisUrl: null,
      redisKeyPrefix: "acl:",
    };

    afterEach(async () => {
      await shutdownAclCache();
    });

    it("round-trips through the in-memory fallback and rehydrates strategies", async () => {
      const acl = createAclCache({
        authorizationStrategy: authStrategy,
        permissionGrantingStrategy: grantingStrategy,
        config,
      });
      const a = entry(100, OBJ_1);
      await acl.putInCache(a);

      const fetched = asEntry(await acl.getFromCache(OBJ_1));
      expect(fetched).not.toBe(a);
      expect(fetched.id).toBe(100);
      expect(fetched.strategies.authorization).toBe(authStrategy);
      expect(fetched.strategies.permissionGranting).toBe(grantingStrategy);

      await acl.evictFromCache(100);
      expect(await acl.getFromCache(OBJ_1)).toBeNull();
    });

    it("hands the configured Redis key prefix to the client", () => {
      createAclCache({
        authorizationStrategy: authStrategy,
        permissionGrantingStrategy: grantingStrategy,
        config: { ...config, redisKeyPrefix: "perm:" },
      });
      expect(getRedisKeyPrefix()).toBe("perm:");
    });

    it("uses an injected backing cache", async () => {
      const injected = new RecordingCache();
      const acl = createAclCache({
        authorizationStrategy: authStrategy,
        permissionGrantingStrategy: grantingStrategy,
        config,
        cache: injected,
      });
      await acl.putInCache(entry(100, OBJ_1));
      expect(injected.calls).toEqual(["set oid:Document:s:obj-1", "set pk:n:100"]);
    });
  });
});

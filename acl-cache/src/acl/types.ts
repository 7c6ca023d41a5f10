/** Identifies the protected domain object an ACL governs. Compared by value. */
export interface ObjectIdentity {
  readonly type: string;
  readonly identifier: string | number;
}

/** Opaque identifier of one ACL record. */
export type PrimaryKey = string | number;

export type Sid =
  | { kind: "principal"; principal: string }
  | { kind: "authority"; authority: string };

export interface AccessControlEntry {
  id: PrimaryKey;
  sid: Sid;
  /** Permission bit mask */
  mask: number;
  granting: boolean;
  auditSuccess: boolean;
  auditFailure: boolean;
}

export type AclChangeType = "ownership" | "general";

export interface Acl {
  readonly id: PrimaryKey;
  readonly objectIdentity: ObjectIdentity;
  readonly owner: Sid | null;
  readonly parentAcl: Acl | null;
  readonly entriesInheriting: boolean;
  readonly entries: readonly AccessControlEntry[];
  isGranted(permissions: number[], sids: Sid[], administrativeMode: boolean): boolean;
}

export interface MutableAcl extends Acl {
  setParent(parent: Acl | null): void;
  setOwner(owner: Sid): void;
  setEntriesInheriting(inheriting: boolean): void;
  insertAce(index: number, ace: AccessControlEntry): void;
  deleteAce(index: number): void;
}

// ── Collaborator strategies ─────────────────────────────────────────────

/** Decides whether the current principal may change an ACL. Throws to deny. */
export interface AclAuthorizationStrategy {
  securityCheck(acl: Acl, changeType: AclChangeType): void;
}

/** Evaluates permission grants against an ACL and its parents. */
export interface PermissionGrantingStrategy {
  isGranted(acl: Acl, permissions: number[], sids: Sid[], administrativeMode: boolean): boolean;
}

/**
 * An ACL whose strategy references can be reattached after it was rebuilt
 * from cache storage. Strategies are never serialized.
 */
export interface RebindableAcl {
  bindStrategies(
    authorizationStrategy: AclAuthorizationStrategy,
    permissionGrantingStrategy: PermissionGrantingStrategy
  ): void;
}

/** The cache contract the ACL resolution service talks to. */
export interface AclCache {
  getFromCache(key: ObjectIdentity | PrimaryKey): Promise<MutableAcl | null>;
  putInCache(acl: MutableAcl): Promise<void>;
  evictFromCache(key: ObjectIdentity | PrimaryKey): Promise<void>;
  clearCache(): Promise<void>;
}

export function isMutableAcl(acl: Acl): acl is MutableAcl {
  const candidate: Partial<MutableAcl> = acl;
  return (
    typeof candidate.setParent === "function" &&
    typeof candidate.insertAce === "function" &&
    typeof candidate.deleteAce === "function"
  );
}

export function isRebindableAcl(acl: Acl): acl is Acl & RebindableAcl {
  const candidate: Acl & Partial<RebindableAcl> = acl;
  return typeof candidate.bindStrategies === "function";
}

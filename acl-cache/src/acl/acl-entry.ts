import { InvalidArgumentError, StrategyNotBoundError, requireValue } from "./errors.js";
import { objectIdentityEquals } from "./keys.js";
import type {
  AccessControlEntry,
  Acl,
  AclAuthorizationStrategy,
  AclChangeType,
  MutableAcl,
  ObjectIdentity,
  PermissionGrantingStrategy,
  PrimaryKey,
  RebindableAcl,
  Sid,
} from "./types.js";

export interface AclEntryInit {
  id: PrimaryKey;
  objectIdentity: ObjectIdentity;
  owner?: Sid | null;
  parentAcl?: Acl | null;
  entriesInheriting?: boolean;
  entries?: AccessControlEntry[];
  authorizationStrategy?: AclAuthorizationStrategy | null;
  permissionGrantingStrategy?: PermissionGrantingStrategy | null;
}

/**
 * Mutable ACL record. The two strategy references are process-wide
 * collaborators: they are never serialized and must be rebound with
 * `bindStrategies` after the entry is rebuilt from cache storage.
 */
export class AclEntry implements MutableAcl, RebindableAcl {
  readonly id: PrimaryKey;
  readonly objectIdentity: ObjectIdentity;

  private _owner: Sid | null;
  private _parentAcl: Acl | null;
  private _entriesInheriting: boolean;
  private readonly _entries: AccessControlEntry[];

  private authorizationStrategy: AclAuthorizationStrategy | null;
  private permissionGrantingStrategy: PermissionGrantingStrategy | null;

  constructor(init: AclEntryInit) {
    this.id = requireValue(init.id, "ID required");
    this.objectIdentity = requireValue(init.objectIdentity, "ObjectIdentity required");
    this._owner = init.owner ?? null;
    this._parentAcl = init.parentAcl ?? null;
    this._entriesInheriting = init.entriesInheriting ?? true;
    this._entries = [...(init.entries ?? [])];
    this.authorizationStrategy = init.authorizationStrategy ?? null;
    this.permissionGrantingStrategy = init.permissionGrantingStrategy ?? null;
  }

  get owner(): Sid | null {
    return this._owner;
  }

  get parentAcl(): Acl | null {
    return this._parentAcl;
  }

  get entriesInheriting(): boolean {
    return this._entriesInheriting;
  }

  get entries(): readonly AccessControlEntry[] {
    return this._entries;
  }

  /** Strategies currently attached, or null when the entry came from storage unbound. */
  get strategies(): {
    authorization: AclAuthorizationStrategy | null;
    permissionGranting: PermissionGrantingStrategy | null;
  } {
    return {
      authorization: this.authorizationStrategy,
      permissionGranting: this.permissionGrantingStrategy,
    };
  }

  bindStrategies(
    authorizationStrategy: AclAuthorizationStrategy,
    permissionGrantingStrategy: PermissionGrantingStrategy
  ): void {
    this.authorizationStrategy = authorizationStrategy;
    this.permissionGrantingStrategy = permissionGrantingStrategy;
  }

  isGranted(permissions: number[], sids: Sid[], administrativeMode: boolean): boolean {
    if (permissions.length === 0) throw new InvalidArgumentError("Permissions required");
    if (sids.length === 0) throw new InvalidArgumentError("SIDs required");

    const strategy = this.permissionGrantingStrategy;
    if (!strategy) throw new StrategyNotBoundError("PermissionGrantingStrategy");
    return strategy.isGranted(this, permissions, sids, administrativeMode);
  }

  setParent(parent: Acl | null): void {
    this.securityCheck("general");
    if (parent && (parent === this || objectIdentityEquals(parent.objectIdentity, this.objectIdentity))) {
      throw new InvalidArgumentError("Cannot set parent to be the same ACL");
    }
    this._parentAcl = parent;
  }

  setOwner(owner: Sid): void {
    this.securityCheck("ownership");
    this._owner = requireValue(owner, "Owner required");
  }

  setEntriesInheriting(inheriting: boolean): void {
    this.securityCheck("general");
    this._entriesInheriting = inheriting;
  }

  insertAce(index: number, ace: AccessControlEntry): void {
    this.securityCheck("general");
    if (index < 0 || index > this._entries.length) {
      throw new InvalidArgumentError(`ACE index ${index} out of bounds (0..${this._entries.length})`);
    }
    this._entries.splice(index, 0, ace);
  }

  deleteAce(index: number): void {
    this.securityCheck("general");
    if (index < 0 || index >= this._entries.length) {
      throw new InvalidArgumentError(`ACE index ${index} out of bounds (0..${this._entries.length - 1})`);
    }
    this._entries.splice(index, 1);
  }

  private securityCheck(changeType: AclChangeType): void {
    const strategy = this.authorizationStrategy;
    if (!strategy) throw new StrategyNotBoundError("AclAuthorizationStrategy");
    strategy.securityCheck(this, changeType);
  }
}

import type { ObjectIdentity, PrimaryKey } from "./types.js";

// Non-finite numbers are rejected: JSON writes them as null, so a stored
// key would not match the value read back.
export function isPrimaryKey(value: unknown): value is PrimaryKey {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

export function isObjectIdentity(value: unknown): value is ObjectIdentity {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("identifier" in value)) return false;
  const { type, identifier } = value;
  return typeof type === "string" && isPrimaryKey(identifier);
}

export function objectIdentityEquals(a: ObjectIdentity, b: ObjectIdentity): boolean {
  return a.type === b.type && a.identifier === b.identifier;
}

// Components are URI-escaped so a ":" inside a type or identifier can't
// produce another identity's key.
export function objectIdentityKey(oid: ObjectIdentity): string {
  const kind = typeof oid.identifier === "number" ? "n" : "s";
  return `oid:${encodeURIComponent(oid.type)}:${kind}:${encodeURIComponent(String(oid.identifier))}`;
}

export function primaryKeyKey(pk: PrimaryKey): string {
  return typeof pk === "number" ? `pk:n:${pk}` : `pk:s:${encodeURIComponent(pk)}`;
}

export function cacheKeyFor(key: ObjectIdentity | PrimaryKey): string {
  return isObjectIdentity(key) ? objectIdentityKey(key) : primaryKeyKey(key);
}

import { z } from "zod";
import type { CacheCodec } from "../../../shared/redis/src/index.js";
import { AclEntry } from "./acl-entry.js";
import { AclCodecError } from "./errors.js";
import { ancestorChain, anyAcl } from "./chain.js";
import type { Acl, MutableAcl } from "./types.js";

// ── Wire shape ──────────────────────────────────────────────────────────

const PrimaryKeySchema = z.union([z.string(), z.number().finite()]);

const ObjectIdentitySchema = z.object({
  type: z.string(),
  identifier: PrimaryKeySchema,
});

const SidSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("principal"), principal: z.string() }),
  z.object({ kind: z.literal("authority"), authority: z.string() }),
]);

const AccessControlEntrySchema = z.object({
  id: PrimaryKeySchema,
  sid: SidSchema,
  mask: z.number().int(),
  granting: z.boolean(),
  auditSuccess: z.boolean(),
  auditFailure: z.boolean(),
});

const SerializedAclNodeSchema = z.object({
  id: PrimaryKeySchema,
  objectIdentity: ObjectIdentitySchema,
  owner: SidSchema.nullable(),
  entriesInheriting: z.boolean(),
  entries: z.array(AccessControlEntrySchema),
});

/** An ACL and its ancestors as a flat list, root first, the ACL itself last. */
export const SerializedAclSchema = z.object({
  chain: z.array(SerializedAclNodeSchema).nonempty(),
});

export type SerializedAclNode = z.infer<typeof SerializedAclNodeSchema>;
export type SerializedAcl = z.infer<typeof SerializedAclSchema>;

// ── Conversion ──────────────────────────────────────────────────────────

function toNode(acl: Acl): SerializedAclNode {
  return {
    id: acl.id,
    objectIdentity: { type: acl.objectIdentity.type, identifier: acl.objectIdentity.identifier },
    owner: acl.owner,
    entriesInheriting: acl.entriesInheriting,
    entries: acl.entries.map((ace) => ({ ...ace })),
  };
}

function toEntry(node: SerializedAclNode, parentAcl: AclEntry | null): AclEntry {
  return new AclEntry({
    id: node.id,
    objectIdentity: node.objectIdentity,
    owner: node.owner,
    parentAcl,
    entriesInheriting: node.entriesInheriting,
    entries: node.entries,
  });
}

/** Plain record of an ACL and its ancestors. Strategies are not written. */
export function serializeAcl(acl: Acl): SerializedAcl {
  const [root, ...descendants] = ancestorChain(acl, anyAcl).reverse();
  return { chain: [toNode(root), ...descendants.map(toNode)] };
}

/** Rebuilds the AclEntry chain and returns its last node. Entries carry no strategies. */
export function deserializeAcl(record: SerializedAcl): AclEntry {
  const [root, ...descendants] = record.chain;
  let acl = toEntry(root, null);
  for (const node of descendants) {
    acl = toEntry(node, acl);
  }
  return acl;
}

export const aclCodec: CacheCodec<MutableAcl> = {
  encode(acl) {
    return JSON.stringify(serializeAcl(acl));
  },

  decode(raw) {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new AclCodecError(`Cached ACL is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = SerializedAclSchema.safeParse(json);
    if (!parsed.success) {
      throw new AclCodecError(`Cached ACL failed validation: ${parsed.error.message}`);
    }
    return deserializeAcl(parsed.data);
  },
};

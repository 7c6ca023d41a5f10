import { CyclicParentChainError } from "./errors.js";
import type { Acl } from "./types.js";

/**
 * The ACL followed by its ancestors, nearest first. Walking stops at the
 * first parent that is null or fails `follow`. An ACL reached twice throws
 * CyclicParentChainError.
 */
export function ancestorChain<T extends Acl>(start: T, follow: (parent: Acl) => parent is T): T[] {
  const chain: T[] = [start];
  const visited = new Set<Acl>([start]);

  for (let parent = start.parentAcl; parent !== null && follow(parent); parent = parent.parentAcl) {
    if (visited.has(parent)) {
      throw new CyclicParentChainError(parent.id);
    }
    visited.add(parent);
    chain.push(parent);
  }
  return chain;
}

export function anyAcl(_parent: Acl): _parent is Acl {
  return true;
}

/**
 * packages/core/src/runtime/dirtySet.ts — Dirty propagation for the measure
 * pass.
 *
 * A node whose own layout inputs changed is dirty-self; it and every ancestor
 * form the effective dirty set, since an ancestor's cached size may depend on
 * the changed node.
 */

import type { NodeHandle } from "./identity.js";

export type DirtySets = Readonly<{
  self: ReadonlySet<NodeHandle>;
  effective: ReadonlySet<NodeHandle>;
}>;

export function computeDirtySets(
  parentOf: (handle: NodeHandle) => NodeHandle | null | undefined,
  seeds: Iterable<NodeHandle>,
): DirtySets {
  const self = new Set<NodeHandle>();
  const effective = new Set<NodeHandle>();

  function addWithAncestors(handle: NodeHandle): void {
    let current: NodeHandle | null = handle;
    while (current !== null) {
      if (effective.has(current)) break;
      effective.add(current);
      current = parentOf(current) ?? null;
    }
  }

  for (const handle of seeds) {
    if (parentOf(handle) === undefined) continue;
    self.add(handle);
    addWithAncestors(handle);
  }

  return { self, effective };
}

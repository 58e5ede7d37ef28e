/**
 * packages/core/src/layout/measureCache.ts — Layout memoization store.
 *
 * One entry per instance key holding the result of the last full measurement
 * and everything needed to prove it still holds: the constraints it was
 * measured under, the layout spec, and every child's constraint and size.
 */

import type { InstanceKey, NodeHandle } from "../runtime/identity.js";
import type { Constraint } from "./constraint.js";
import type { Position, Size } from "./geometry.js";
import type { LayoutSpec } from "./layoutSpec.js";

export type ChildMeasurement = Readonly<{
  key: InstanceKey;
  handle: NodeHandle;
  constraint: Constraint;
  size: Size;
}>;

export type ChildPlacement = Readonly<{ key: InstanceKey; position: Position }>;

export type LayoutCacheEntry = {
  readonly handle: NodeHandle;
  /** Constraint passed down by the parent. Updated on boundary hits. */
  incoming: Constraint;
  readonly merged: Constraint;
  readonly spec: LayoutSpec;
  readonly size: Size;
  readonly childKeys: readonly InstanceKey[];
  readonly childMeasurements: readonly ChildMeasurement[];
  readonly placements: readonly ChildPlacement[];
  /** Last layout pass that measured or reused this entry. */
  lastSeenPass: number;
};

export type LayoutCacheLookup =
  | Readonly<{ kind: "entry"; entry: LayoutCacheEntry }>
  | Readonly<{ kind: "absent" }>
  | Readonly<{ kind: "evicted"; reason: "stale" | "replaced" }>;

export class LayoutCache {
  private readonly entries = new Map<InstanceKey, LayoutCacheEntry>();

  constructor(private readonly maxPassGap: number) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Entry for `key` owned by `handle`. Entries written by a previous node
   * under the same key, or unseen for more than `maxPassGap` layout passes,
   * are evicted here.
   */
  lookup(key: InstanceKey, handle: NodeHandle, pass: number): LayoutCacheLookup {
    const entry = this.entries.get(key);
    if (entry === undefined) return { kind: "absent" };
    if (entry.handle !== handle) {
      this.entries.delete(key);
      return { kind: "evicted", reason: "replaced" };
    }
    if (pass - entry.lastSeenPass > this.maxPassGap) {
      this.entries.delete(key);
      return { kind: "evicted", reason: "stale" };
    }
    return { kind: "entry", entry };
  }

  peek(key: InstanceKey): LayoutCacheEntry | undefined {
    return this.entries.get(key);
  }

  store(key: InstanceKey, entry: LayoutCacheEntry): void {
    this.entries.set(key, entry);
  }

  /** Drop the entry for `key`; with `handle`, only when that node owns it. */
  delete(key: InstanceKey, handle?: NodeHandle): boolean {
    if (handle !== undefined) {
      const entry = this.entries.get(key);
      if (entry === undefined || entry.handle !== handle) return false;
    }
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): readonly InstanceKey[] {
    return Array.from(this.entries.keys());
  }
}

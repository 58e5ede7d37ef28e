/**
 * packages/core/src/layout/measure.ts — Top-down measure pass with layout
 * memoization.
 *
 * `measureNode` merges the node's declared constraint with the incoming one
 * and classifies the call into exactly one `LayoutCacheOutcome`:
 *
 *   non-cacheable    spec reads volatile state; measured, never stored
 *   miss-dirty-self  node's spec or child list changed this frame
 *   miss-no-entry    no entry, or entry for another spec or child list
 *   miss-constraint  merged constraint differs from the entry's
 *   hit-direct       entry matches, same incoming constraint
 *   hit-boundary     entry matches after the merge, incoming constraint differs
 *   miss-child-size  entry matched but a dirty descendant changed a child's size
 *
 * Hits on clean subtrees do not recurse. A hit on a node with dirty
 * descendants re-measures its children under the cached child constraints
 * and stands only if every size matches.
 */

import type { ComponentNode } from "../runtime/nodeRegistry.js";
import type { InstanceKey, NodeHandle } from "../runtime/identity.js";
import { type Constraint, constraintEquals, describeConstraint, mergeConstraint } from "./constraint.js";
import type { LayoutCacheOutcome, LayoutDiagnosticsCollector } from "./diagnostics.js";
import { type Position, type Size, isValidSize, sizeEquals } from "./geometry.js";
import {
  type ChildMeasureRequest,
  DEFAULT_LAYOUT_SPEC,
  type LayoutInput,
  type LayoutOutput,
  type LayoutSpec,
  sameLayoutSpec,
} from "./layoutSpec.js";
import type { ChildMeasurement, ChildPlacement, LayoutCache, LayoutCacheEntry } from "./measureCache.js";
import { type LayoutResult, layoutFail, layoutOk } from "./result.js";

export type MeasureContext = Readonly<{
  getNode: (handle: NodeHandle) => ComponentNode | undefined;
  cache: LayoutCache;
  /** Nodes whose own spec or child list changed, plus non-cacheable nodes. */
  dirtySelf: ReadonlySet<NodeHandle>;
  /** `dirtySelf` and all their ancestors. */
  dirtyEffective: ReadonlySet<NodeHandle>;
  diagnostics: LayoutDiagnosticsCollector;
  /** Index of this layout pass; skipped frames do not advance it. */
  pass: number;
  /** Nodes measured or verified earlier in this pass; treated as clean. */
  settled: Set<NodeHandle>;
  /** Called with inclusive wall time per call when profiling. */
  onMeasured: ((handle: NodeHandle, outcome: LayoutCacheOutcome, elapsedMs: number) => void) | null;
  now: () => number;
}>;

type ChildRecord = {
  key: InstanceKey;
  constraint: Constraint;
  size: Size;
  consistent: boolean;
};

function sameKeys(a: readonly InstanceKey[], b: readonly InstanceKey[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function sameHandles(
  measured: readonly ChildMeasurement[],
  children: readonly NodeHandle[],
): boolean {
  if (measured.length !== children.length) return false;
  for (let i = 0; i < children.length; i++) {
    if (measured[i]?.handle !== children[i]) return false;
  }
  return true;
}

function childKeysOf(ctx: MeasureContext, node: ComponentNode): InstanceKey[] {
  const keys: InstanceKey[] = [];
  for (const child of node.children) {
    const c = ctx.getNode(child);
    if (c !== undefined) keys.push(c.identity.instanceKey);
  }
  return keys;
}

function applyPlacements(
  ctx: MeasureContext,
  node: ComponentNode,
  placements: readonly ChildPlacement[],
): void {
  const byKey = new Map<InstanceKey, Position>();
  for (const p of placements) byKey.set(p.key, p.position);
  for (const child of node.children) {
    const c = ctx.getNode(child);
    if (c === undefined) continue;
    const pos = byKey.get(c.identity.instanceKey);
    if (pos !== undefined) c.meta.relPosition = pos;
  }
}

/** Mark the entries under a non-recursing hit as seen this pass. */
function touchSubtree(ctx: MeasureContext, node: ComponentNode): void {
  for (const child of node.children) {
    const c = ctx.getNode(child);
    if (c === undefined) continue;
    const entry = ctx.cache.peek(c.identity.instanceKey);
    if (entry !== undefined && entry.handle === child) entry.lastSeenPass = ctx.pass;
    touchSubtree(ctx, c);
  }
}

function reuseEntry(
  ctx: MeasureContext,
  node: ComponentNode,
  entry: LayoutCacheEntry,
  incoming: Constraint,
): LayoutResult<Size> {
  entry.incoming = incoming;
  entry.lastSeenPass = ctx.pass;
  node.meta.computed = entry.size;
  node.meta.layoutCacheHit = true;
  applyPlacements(ctx, node, entry.placements);
  return layoutOk(entry.size);
}

/**
 * Re-measure children under their cached constraints. Ok(true) when every
 * size matches the entry.
 */
function verifyChildSizes(ctx: MeasureContext, entry: LayoutCacheEntry): LayoutResult<boolean> {
  let allMatch = true;
  for (const m of entry.childMeasurements) {
    const res = measureNode(ctx, m.handle, m.constraint);
    if (!res.ok) return res;
    if (!sizeEquals(res.value, m.size)) allMatch = false;
  }
  return layoutOk(allMatch);
}

function measureFresh(
  ctx: MeasureContext,
  node: ComponentNode,
  spec: LayoutSpec,
  incoming: Constraint,
  merged: Constraint,
  store: boolean,
): LayoutResult<Size> {
  const key = node.identity.instanceKey;
  node.meta.computed = null;
  node.meta.layoutCacheHit = false;
  for (const child of node.children) {
    const c = ctx.getNode(child);
    if (c !== undefined) c.meta.relPosition = null;
  }

  const records = new Map<NodeHandle, ChildRecord>();
  const placements = new Map<NodeHandle, Position>();

  const measureTracked = (child: NodeHandle, c: Constraint): LayoutResult<Size> => {
    const childNode = ctx.getNode(child);
    if (childNode === undefined || childNode.parent !== node.handle) {
      return layoutFail(
        "WEFT_NODE_NOT_FOUND",
        `${node.name}: measureChild called with handle ${child}, which is not a child of this node`,
      );
    }
    const res = measureNode(ctx, child, c);
    if (!res.ok) return res;
    const prev = records.get(child);
    if (prev === undefined) {
      records.set(child, {
        key: childNode.identity.instanceKey,
        constraint: c,
        size: res.value,
        consistent: true,
      });
    } else if (!constraintEquals(prev.constraint, c) || !sizeEquals(prev.size, res.value)) {
      prev.consistent = false;
    }
    return res;
  };

  const input: LayoutInput = Object.freeze({
    constraint: merged,
    children: node.children,
    measureChild: measureTracked,
    measureChildren(requests: readonly ChildMeasureRequest[]): LayoutResult<readonly Size[]> {
      const sizes: Size[] = [];
      for (const [child, c] of requests) {
        const res = measureTracked(child, c);
        if (!res.ok) return res;
        sizes.push(res.value);
      }
      return layoutOk(sizes);
    },
    measureChildUntracked(child: NodeHandle, c: Constraint): LayoutResult<Size> {
      if (!node.children.includes(child)) {
        return layoutFail(
          "WEFT_NODE_NOT_FOUND",
          `${node.name}: measureChildUntracked called with handle ${child}, which is not a child of this node`,
        );
      }
      return measureNode(ctx, child, c);
    },
  });
  const output: LayoutOutput = Object.freeze({
    placeChild(child: NodeHandle, position: Position): void {
      placements.set(child, position);
    },
  });

  const result = spec.measure(input, output);
  if (!result.ok) {
    ctx.cache.delete(key, node.handle);
    return result;
  }
  if (!isValidSize(result.value)) {
    ctx.cache.delete(key, node.handle);
    return layoutFail(
      "WEFT_INVALID_SIZE",
      `${node.name}: layout "${spec.typeTag}" returned an invalid size under ${describeConstraint(merged)}`,
    );
  }
  const size = result.value;

  const placementList: ChildPlacement[] = [];
  for (const child of node.children) {
    const c = ctx.getNode(child);
    const pos = placements.get(child);
    if (c === undefined || pos === undefined) continue;
    c.meta.relPosition = pos;
    placementList.push({ key: c.identity.instanceKey, position: pos });
  }
  node.meta.computed = size;

  if (!store) return layoutOk(size);

  const measurements: ChildMeasurement[] = [];
  let complete = true;
  for (const child of node.children) {
    const r = records.get(child);
    if (r === undefined || !r.consistent) {
      complete = false;
      break;
    }
    measurements.push({ key: r.key, handle: child, constraint: r.constraint, size: r.size });
  }

  if (!complete) {
    ctx.cache.delete(key, node.handle);
    return layoutOk(size);
  }

  ctx.cache.store(key, {
    handle: node.handle,
    incoming,
    merged,
    spec,
    size,
    childKeys: childKeysOf(ctx, node),
    childMeasurements: measurements,
    placements: placementList,
    lastSeenPass: ctx.pass,
  });
  ctx.diagnostics.recordStore();
  ctx.settled.add(node.handle);
  return layoutOk(size);
}

function measureClassified(
  ctx: MeasureContext,
  node: ComponentNode,
  incoming: Constraint,
  record: (outcome: LayoutCacheOutcome) => void,
): LayoutResult<Size> {
  const spec = node.layoutSpec ?? DEFAULT_LAYOUT_SPEC;
  const merged = mergeConstraint(spec.constraint, incoming);
  const key = node.identity.instanceKey;

  if (!spec.cacheable) {
    record("non-cacheable");
    ctx.cache.delete(key, node.handle);
    return measureFresh(ctx, node, spec, incoming, merged, false);
  }

  const lookup = ctx.cache.lookup(key, node.handle, ctx.pass);
  const entry = lookup.kind === "entry" ? lookup.entry : null;

  const settled = ctx.settled.has(node.handle);
  if (!settled && ctx.dirtySelf.has(node.handle)) {
    record("miss-dirty-self");
    return measureFresh(ctx, node, spec, incoming, merged, true);
  }
  if (
    entry === null ||
    !sameLayoutSpec(entry.spec, spec) ||
    !sameKeys(entry.childKeys, childKeysOf(ctx, node)) ||
    !sameHandles(entry.childMeasurements, node.children)
  ) {
    record("miss-no-entry");
    return measureFresh(ctx, node, spec, incoming, merged, true);
  }
  if (!constraintEquals(entry.merged, merged)) {
    record("miss-constraint");
    return measureFresh(ctx, node, spec, incoming, merged, true);
  }

  const hit: LayoutCacheOutcome = constraintEquals(entry.incoming, incoming)
    ? "hit-direct"
    : "hit-boundary";
  if (settled || !ctx.dirtyEffective.has(node.handle)) {
    record(hit);
    touchSubtree(ctx, node);
    return reuseEntry(ctx, node, entry, incoming);
  }

  const verified = verifyChildSizes(ctx, entry);
  if (!verified.ok) {
    record("miss-child-size");
    ctx.cache.delete(key, node.handle);
    return verified;
  }
  if (verified.value) {
    record(hit);
    ctx.settled.add(node.handle);
    return reuseEntry(ctx, node, entry, incoming);
  }
  record("miss-child-size");
  return measureFresh(ctx, node, spec, incoming, merged, true);
}

/**
 * Measure `handle` under `incoming`. Failures are returned, never thrown;
 * a failed node leaves no cache entry behind.
 */
export function measureNode(
  ctx: MeasureContext,
  handle: NodeHandle,
  incoming: Constraint,
): LayoutResult<Size> {
  const node = ctx.getNode(handle);
  if (node === undefined) {
    return layoutFail("WEFT_NODE_NOT_FOUND", `measureNode: no node for handle ${handle}`);
  }
  const started = ctx.onMeasured !== null ? ctx.now() : 0;
  let outcome: LayoutCacheOutcome = "miss-no-entry";
  const result = measureClassified(ctx, node, incoming, (o) => {
    outcome = o;
    ctx.diagnostics.recordOutcome(o);
  });
  if (ctx.onMeasured !== null) ctx.onMeasured(handle, outcome, ctx.now() - started);
  return result;
}

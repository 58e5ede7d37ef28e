/**
 * packages/core/src/render/record.ts — Record pass.
 *
 * Walks the measured tree top-down, resolves absolute positions from the
 * relative placements of the measure pass, propagates clip rects, and emits
 * the ordered op list for the rendering backend. A node keeps its recorded
 * fragments while its spec object and size are unchanged.
 *
 * Nodes that were not placed by their parent are skipped with their subtree.
 * Zero-area and off-screen nodes emit no draw ops, but their children are
 * still visited.
 */

import { DEFAULT_LAYOUT_SPEC } from "../layout/layoutSpec.js";
import {
  ORIGIN,
  type Position,
  type Rect,
  type Size,
  ZERO_SIZE,
  addPositions,
  intersectRects,
  rectFrom,
  rectsDisjoint,
  sizeEquals,
} from "../layout/geometry.js";
import type { NodeHandle } from "../runtime/identity.js";
import type { ComponentNode } from "../runtime/nodeRegistry.js";
import type { DrawFragment, FrameOp } from "./fragment.js";

export type RecordResult = Readonly<{
  ops: readonly FrameOp[];
  nodesRecorded: number;
  nodesReused: number;
}>;

export function recordFrame(
  getNode: (handle: NodeHandle) => ComponentNode | undefined,
  root: NodeHandle,
  screen: Size,
): RecordResult {
  const ops: FrameOp[] = [];
  const screenRect: Rect = rectFrom(ORIGIN, screen);
  let nodesRecorded = 0;
  let nodesReused = 0;

  function clearPlacement(handle: NodeHandle): void {
    const node = getNode(handle);
    if (node === undefined) return;
    node.meta.absPosition = null;
    node.meta.eventClipRect = null;
    for (const child of node.children) clearPlacement(child);
  }

  function fragmentsOf(node: ComponentNode, size: Size): readonly DrawFragment[] {
    const spec = node.layoutSpec ?? DEFAULT_LAYOUT_SPEC;
    if (node.meta.fragmentsSpec === spec && sizeEquals(node.meta.fragmentsSize, size)) {
      nodesReused++;
      return node.meta.fragments;
    }
    const collected: DrawFragment[] = [];
    spec.record({
      size,
      draw(fragment: DrawFragment): void {
        collected.push(fragment);
      },
    });
    nodesRecorded++;
    node.meta.fragments = Object.freeze(collected);
    node.meta.fragmentsSpec = spec;
    node.meta.fragmentsSize = size;
    return node.meta.fragments;
  }

  function visit(handle: NodeHandle, parentAbs: Position, isRoot: boolean, clip: Rect | null): void {
    const node = getNode(handle);
    if (node === undefined) return;
    const rel = node.meta.relPosition ?? (isRoot ? ORIGIN : null);
    if (rel === null) {
      clearPlacement(handle);
      return;
    }

    const abs = addPositions(parentAbs, rel);
    const size = node.meta.computed ?? ZERO_SIZE;
    const nodeRect = rectFrom(abs, size);
    node.meta.absPosition = abs;
    node.meta.eventClipRect = clip;

    const spec = node.layoutSpec ?? DEFAULT_LAYOUT_SPEC;
    let childClip = clip;
    if (spec.clipsChildren) {
      childClip = clip === null ? nodeRect : intersectRects(clip, nodeRect);
      ops.push({ op: "clipPush", rect: childClip });
    }

    const fragments = fragmentsOf(node, size);
    if (size.w > 0 && size.h > 0 && !rectsDisjoint(nodeRect, screenRect)) {
      for (const f of fragments) {
        ops.push({
          op: "draw",
          node: node.identity.instanceKey,
          shape: f.shape,
          position: addPositions(abs, f.offset ?? ORIGIN),
          size: f.size ?? size,
          color: f.color,
          payload: f.payload,
        });
      }
    }

    for (const child of node.children) visit(child, abs, false, childClip);

    if (spec.clipsChildren) ops.push({ op: "clipPop" });
  }

  visit(root, ORIGIN, true, null);
  return { ops: Object.freeze(ops), nodesRecorded, nodesReused };
}

/**
 * packages/core/src/render/fragment.ts — Draw fragments and frame ops.
 *
 * Fragments are opaque to the engine: a shape tag plus a payload the
 * rendering backend understands. The record pass positions them.
 */

import type { Position, Rect, Size } from "../layout/geometry.js";
import type { InstanceKey } from "../runtime/identity.js";

export type Rgba = Readonly<{ r: number; g: number; b: number; a: number }>;

/** Node-local draw fragment emitted by a layout spec's `record`. */
export type DrawFragment = Readonly<{
  shape: string;
  /** Offset from the node's origin. Defaults to (0,0). */
  offset?: Position;
  /** Defaults to the node's computed size. */
  size?: Size;
  color?: Rgba;
  payload?: Readonly<Record<string, unknown>>;
}>;

export type DrawOp = Readonly<{
  op: "draw";
  node: InstanceKey;
  shape: string;
  position: Position;
  size: Size;
  color: Rgba | undefined;
  payload: Readonly<Record<string, unknown>> | undefined;
}>;

export type ClipPushOp = Readonly<{ op: "clipPush"; rect: Rect }>;
export type ClipPopOp = Readonly<{ op: "clipPop" }>;

/** Ordered output of the record pass, handed to the rendering backend. */
export type FrameOp = DrawOp | ClipPushOp | ClipPopOp;

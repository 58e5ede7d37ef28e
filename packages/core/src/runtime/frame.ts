/**
 * packages/core/src/runtime/frame.ts — Per-frame input and output contracts.
 */

import type {
  CursorEvent,
  ImeEvent,
  KeyboardEvent,
  Modifiers,
  WindowRequests,
} from "../input/events.js";
import type { LayoutFrameDiagnostics } from "../layout/diagnostics.js";
import type { Position, Size } from "../layout/geometry.js";
import type { FrameOp } from "../render/fragment.js";

export type RedrawReason =
  | "startup"
  | "window-resized"
  | "cursor-moved"
  | "cursor-left"
  | "mouse-input"
  | "mouse-wheel"
  | "touch-input"
  | "scale-factor-changed"
  | "keyboard-input"
  | "modifiers-changed"
  | "ime-event"
  | "focus-changed"
  | "runtime-invalidation"
  | "runtime-frame-awaiter";

export const REDRAW_REASONS: readonly RedrawReason[] = Object.freeze([
  "startup",
  "window-resized",
  "cursor-moved",
  "cursor-left",
  "mouse-input",
  "mouse-wheel",
  "touch-input",
  "scale-factor-changed",
  "keyboard-input",
  "modifiers-changed",
  "ime-event",
  "focus-changed",
  "runtime-invalidation",
  "runtime-frame-awaiter",
]);

export function isRedrawReason(v: unknown): v is RedrawReason {
  return typeof v === "string" && REDRAW_REASONS.some((r) => r === v);
}

export type BuildMode = "FullInitial" | "PartialReplay" | "SkipNoInvalidation";

export type FrameInput = Readonly<{
  screen: Size;
  redrawReasons?: readonly RedrawReason[];
  /** Absolute cursor position; null when the cursor is outside the window. */
  cursorPosition?: Position | null;
  cursorEvents?: readonly CursorEvent[];
  keyboardEvents?: readonly KeyboardEvent[];
  imeEvents?: readonly ImeEvent[];
  modifiers?: Modifiers;
}>;

export type FrameBuildStats = Readonly<{
  /** Component bodies executed this frame. */
  bodyExecutions: number;
  /** Child calls whose body was skipped because props were equal. */
  replaySkips: number;
  nodesCreated: number;
  nodesTornDown: number;
  /** Bodies re-executed during a partial replay; 0 for other modes. */
  partialReplayNodes: number;
  totalNodesBeforeBuild: number;
}>;

export const EMPTY_BUILD_STATS: FrameBuildStats = Object.freeze({
  bodyExecutions: 0,
  replaySkips: 0,
  nodesCreated: 0,
  nodesTornDown: 0,
  partialReplayNodes: 0,
  totalNodesBeforeBuild: 0,
});

export type FrameOutput = Readonly<{
  frame: number;
  buildMode: BuildMode;
  redrawReasons: readonly RedrawReason[];
  ops: readonly FrameOp[];
  windowRequests: Readonly<WindowRequests>;
  diagnostics: LayoutFrameDiagnostics;
  build: FrameBuildStats;
  rootSize: Size | null;
}>;

/**
 * packages/core/src/input/events.ts — Input event model.
 *
 * The windowing backend translates its native events into these shapes and
 * passes them in `FrameInput`. Handlers consume events by clearing them from
 * the shared lists (see `InputHandlerInput.blockCursor` and friends).
 */

import type { Position, Size } from "../layout/geometry.js";

export type MouseButton = "left" | "right" | "middle";

export type CursorEventContent =
  | Readonly<{ kind: "pressed"; button: MouseButton }>
  | Readonly<{ kind: "released"; button: MouseButton }>
  | Readonly<{ kind: "scroll"; deltaX: number; deltaY: number }>;

export type CursorEvent = Readonly<{ timestampMs: number; content: CursorEventContent }>;

export type KeyState = "pressed" | "released";

export type KeyboardEvent = Readonly<{
  key: string;
  code: string;
  state: KeyState;
  repeat: boolean;
  text?: string;
}>;

export type ImeEvent =
  | Readonly<{ kind: "enabled" }>
  | Readonly<{ kind: "preedit"; text: string; cursor?: readonly [number, number] }>
  | Readonly<{ kind: "commit"; text: string }>
  | Readonly<{ kind: "disabled" }>;

export type Modifiers = Readonly<{ shift: boolean; ctrl: boolean; alt: boolean; meta: boolean }>;

export const NO_MODIFIERS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export type CursorIcon =
  | "default"
  | "pointer"
  | "text"
  | "grab"
  | "grabbing"
  | "not-allowed"
  | "ew-resize"
  | "ns-resize";

/** Request to place the IME candidate window. */
export type ImeRequest = {
  size: Size;
  /** Absolute position; filled with the requesting node's position when left unset. */
  position: Position | undefined;
};

export type WindowRequests = {
  cursorIcon: CursorIcon;
  imeRequest: ImeRequest | null;
};

/** What a handler sees for one node during the input pass. */
export type InputHandlerInput = Readonly<{
  size: Size;
  /** Cursor position relative to the node; null when unknown, blocked or clipped out. */
  cursorPosition: Position | null;
  cursorEvents: CursorEvent[];
  keyboardEvents: KeyboardEvent[];
  imeEvents: ImeEvent[];
  modifiers: Modifiers;
  requests: WindowRequests;
  /** Hide the cursor and its events from every node handled after this one. */
  blockCursor: () => void;
  blockKeyboard: () => void;
  blockIme: () => void;
  blockAll: () => void;
}>;

export type InputHandler = (input: InputHandlerInput) => void;

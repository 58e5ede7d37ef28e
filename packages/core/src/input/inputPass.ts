/**
 * packages/core/src/input/inputPass.ts — Input pass.
 *
 * Handlers run in reverse pre-order: children before parents, later siblings
 * before earlier ones, so the topmost node sees events first and can consume
 * them for everything handled after it.
 */

import { type Position, type Size, rectContains } from "../layout/geometry.js";
import type { NodeHandle } from "../runtime/identity.js";
import type { ComponentNode } from "../runtime/nodeRegistry.js";
import type {
  CursorEvent,
  ImeEvent,
  InputHandlerInput,
  KeyboardEvent,
  Modifiers,
  WindowRequests,
} from "./events.js";

export type InputPassArgs = Readonly<{
  getNode: (handle: NodeHandle) => ComponentNode | undefined;
  /** Live nodes in pre-order. */
  order: readonly NodeHandle[];
  cursorPosition: Position | null;
  cursorEvents: readonly CursorEvent[];
  keyboardEvents: readonly KeyboardEvent[];
  imeEvents: readonly ImeEvent[];
  modifiers: Modifiers;
  now: () => number;
  onHandled: ((handle: NodeHandle, elapsedMs: number) => void) | null;
}>;

export type InputPassResult = Readonly<{
  requests: WindowRequests;
  handlersRun: number;
}>;

export function runInputPass(args: InputPassArgs): InputPassResult {
  const requests: WindowRequests = { cursorIcon: "default", imeRequest: null };
  const cursor: { position: Position | null } = { position: args.cursorPosition };
  const cursorEvents: CursorEvent[] = args.cursorEvents.slice();
  const keyboardEvents: KeyboardEvent[] = args.keyboardEvents.slice();
  const imeEvents: ImeEvent[] = args.imeEvents.slice();
  let handlersRun = 0;

  for (let i = args.order.length - 1; i >= 0; i--) {
    const handle = args.order[i];
    if (handle === undefined) continue;
    const node = args.getNode(handle);
    const handler = node?.inputHandler;
    if (node === undefined || !handler) continue;
    const abs = node.meta.absPosition;
    const size: Size | null = node.meta.computed;
    if (abs === null || size === null) continue;

    // Outside the clip the node sees no cursor; blocking then only affects itself.
    const clip = node.meta.eventClipRect;
    const clippedOut =
      cursor.position !== null && clip !== null && !rectContains(clip, cursor.position);
    const ownCursor = clippedOut ? null : cursor.position;
    const ownCursorEvents = clippedOut ? [] : cursorEvents;

    const blockCursor = (): void => {
      if (!clippedOut) cursor.position = null;
      ownCursorEvents.length = 0;
    };
    const blockKeyboard = (): void => {
      keyboardEvents.length = 0;
    };
    const blockIme = (): void => {
      imeEvents.length = 0;
    };

    const input: InputHandlerInput = {
      size,
      cursorPosition: ownCursor === null ? null : { x: ownCursor.x - abs.x, y: ownCursor.y - abs.y },
      cursorEvents: ownCursorEvents,
      keyboardEvents,
      imeEvents,
      modifiers: args.modifiers,
      requests,
      blockCursor,
      blockKeyboard,
      blockIme,
      blockAll(): void {
        blockCursor();
        blockKeyboard();
        blockIme();
      },
    };

    const started = args.onHandled !== null ? args.now() : 0;
    handler(input);
    handlersRun++;
    if (args.onHandled !== null) args.onHandled(handle, args.now() - started);

    if (requests.imeRequest !== null && requests.imeRequest.position === undefined) {
      requests.imeRequest.position = abs;
    }
  }

  return { requests, handlersRun };
}

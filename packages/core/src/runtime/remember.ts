/**
 * packages/core/src/runtime/remember.ts — Remembered state for component
 * invocations.
 *
 * Slots are indexed by call order within a body, so a body must call
 * `remember` the same number of times on every execution. Writing a changed
 * value invalidates the owning node; the next frame replays it.
 *
 * Lifecycle:
 *   - Created on the node's first execution
 *   - Kept while the node survives, including frames where its body is skipped
 *   - Deleted on teardown; setters captured before that become no-ops
 */

import { WeftError } from "../errors.js";
import type { NodeHandle } from "./identity.js";

export type State<T> = Readonly<{
  get: () => T;
  /** Takes a value or an updater; equal values (`Object.is`) do not invalidate. */
  set: (next: T | ((prev: T) => T)) => void;
}>;

type Slot = { value: unknown };

type MutableRememberState = {
  handle: NodeHandle;
  slots: Slot[];
  index: number;
  /** Slot count of the first completed execution. */
  expectedCount: number | null;
  /** Bumped on delete so stale setters are ignored. */
  generation: number;
};

export type RememberStore = Readonly<{
  beginRender: (handle: NodeHandle) => void;
  /** Validates the slot count; throws `WEFT_REMEMBER_ORDER` on a mismatch. */
  endRender: (handle: NodeHandle) => void;
  remember: <T>(handle: NodeHandle, init: () => T) => State<T>;
  delete: (handle: NodeHandle) => boolean;
  /** Delete every node's state. */
  clear: () => void;
  has: (handle: NodeHandle) => boolean;
  size: () => number;
}>;

function isUpdater<T>(v: T | ((prev: T) => T)): v is (prev: T) => T {
  return typeof v === "function";
}

export function createRememberStore(onInvalidate: (handle: NodeHandle) => void): RememberStore {
  const states = new Map<NodeHandle, MutableRememberState>();

  function requireState(handle: NodeHandle): MutableRememberState {
    const state = states.get(handle);
    if (state === undefined) {
      throw new WeftError(
        "WEFT_INVALID_STATE",
        `remember: node ${handle} is not executing a component body`,
      );
    }
    return state;
  }

  return Object.freeze({
    beginRender(handle: NodeHandle): void {
      const state = states.get(handle);
      if (state === undefined) {
        states.set(handle, { handle, slots: [], index: 0, expectedCount: null, generation: 0 });
        return;
      }
      state.index = 0;
    },

    endRender(handle: NodeHandle): void {
      const state = states.get(handle);
      if (state === undefined) return;
      if (state.expectedCount === null) {
        state.expectedCount = state.index;
      } else if (state.index !== state.expectedCount) {
        throw new WeftError(
          "WEFT_REMEMBER_ORDER",
          `remember count mismatch for node ${handle}: expected ${state.expectedCount}, got ${state.index}`,
        );
      }
    },

    remember<T>(handle: NodeHandle, init: () => T): State<T> {
      const state = requireState(handle);
      const index = state.index;
      state.index++;

      let slot = state.slots[index];
      if (slot === undefined) {
        if (state.expectedCount !== null && index >= state.expectedCount) {
          throw new WeftError(
            "WEFT_REMEMBER_ORDER",
            `remember count mismatch for node ${handle}: slot ${index} was not used by the first execution`,
          );
        }
        slot = { value: init() };
        state.slots[index] = slot;
      }

      const cell = slot;
      const generation = state.generation;
      return Object.freeze({
        get(): T {
          // Slot order is checked above; the value type follows the call site.
          return cell.value as T;
        },
        set(next: T | ((prev: T) => T)): void {
          if (state.generation !== generation) return;
          const prev = cell.value as T;
          const value = isUpdater(next) ? next(prev) : next;
          if (Object.is(prev, value)) return;
          cell.value = value;
          onInvalidate(handle);
        },
      });
    },

    delete(handle: NodeHandle): boolean {
      const state = states.get(handle);
      if (state === undefined) return false;
      state.generation++;
      states.delete(handle);
      return true;
    },

    clear(): void {
      for (const state of states.values()) state.generation++;
      states.clear();
    },

    has(handle: NodeHandle): boolean {
      return states.has(handle);
    },

    size(): number {
      return states.size;
    },
  });
}

/**
 * packages/core/src/runtime/identity.ts — Node identity across frames.
 *
 * A node is "the same" across frames when its parent is the same node and its
 * (componentTypeId, instanceKey, logicId) triple matches.
 */

import type { MarkerId } from "./fingerprint.js";
import { type Hash64, hashParts } from "./hash.js";

/** Arena slot handle; valid until the node is torn down. */
export type NodeHandle = number;

/** Stable hash of the defining module and function name. */
export type ComponentTypeId = Hash64;

/** Derived from parent key, marker path, type id and explicit or positional key. */
export type InstanceKey = Hash64;

/** Explicit user key for repeated children. */
export type UserKey = string | number;

export type NodeIdentity = Readonly<{
  typeId: ComponentTypeId;
  instanceKey: InstanceKey;
  /** Occurrence index of `typeId` under the same parent and marker path. */
  logicId: number;
}>;

export const ROOT_PARENT_KEY = "weft:root";

export function componentTypeId(module: string, name: string): ComponentTypeId {
  return hashParts(["component", module, name]);
}

export function deriveInstanceKey(
  parentKey: InstanceKey | null,
  markerPath: readonly MarkerId[],
  typeId: ComponentTypeId,
  key: UserKey | undefined,
  logicId: number,
): InstanceKey {
  const parts: (string | number)[] = [parentKey ?? ROOT_PARENT_KEY, markerPath.length];
  for (const id of markerPath) parts.push(id);
  parts.push(typeId);
  if (key === undefined) {
    parts.push("pos", logicId);
  } else {
    parts.push("key", typeof key === "number" ? `n${String(key)}` : `s${key}`);
  }
  return hashParts(parts);
}

export function identityEquals(a: NodeIdentity, b: NodeIdentity): boolean {
  return a.typeId === b.typeId && a.instanceKey === b.instanceKey && a.logicId === b.logicId;
}

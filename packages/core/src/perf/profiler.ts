/**
 * packages/core/src/perf/profiler.ts — Diagnostics records for the profiler
 * sink.
 *
 * The engine assembles one frame record per frame (plus wake records) and
 * hands it to a `ProfilerSink`. Sinks are fire-and-forget: a throwing sink is
 * logged through the configured `warn` and the frame continues.
 */

import type { LayoutFrameDiagnostics } from "../layout/diagnostics.js";
import type { Position, Size } from "../layout/geometry.js";
import type { BuildMode, RedrawReason } from "../runtime/frame.js";
import type { NodeHandle } from "../runtime/identity.js";
import type { ComponentNode } from "../runtime/nodeRegistry.js";
import { describeThrown } from "../errors.js";

export const PROFILER_FORMAT_VERSION = 3;
export const PROFILER_FORMAT_NAME = "weft-frame-profile";

export type ComponentPhases = Readonly<{
  buildNs: number | null;
  measureNs: number | null;
  inputNs: number | null;
}>;

export type ProfilerComponentRecord = Readonly<{
  id: string;
  fnName: string;
  absPos: Position | null;
  size: Size | null;
  layoutCacheHit: boolean;
  phases: ComponentPhases;
  children: readonly ProfilerComponentRecord[];
}>;

export type ProfilerFrameRecord = Readonly<{
  type: "frame";
  frame: number;
  buildMode: BuildMode;
  redrawReasons: readonly RedrawReason[];
  interFrameWaitNs: number | null;
  partialReplayNodes: number;
  totalNodesBeforeBuild: number;
  buildTimeNs: number;
  measureTimeNs: number;
  recordTimeNs: number;
  inputTimeNs: number;
  frameTotalNs: number;
  layoutDiagnostics: LayoutFrameDiagnostics;
  components: readonly ProfilerComponentRecord[];
}>;

export type WakeSource = "lifecycle" | "window-event" | "runtime";

export type ProfilerWakeRecord = Readonly<{
  type: "wake";
  frame: number;
  source: WakeSource;
  reasons: readonly RedrawReason[];
}>;

export type ProfilerRecord = ProfilerFrameRecord | ProfilerWakeRecord;

export type ProfilerSink = Readonly<{
  send: (record: ProfilerRecord) => void;
}>;

type MutablePhases = { buildNs: number | null; measureNs: number | null; inputNs: number | null };

/** Per-node phase timings for one frame, in nanoseconds. */
export class PhaseTimings {
  private readonly byNode = new Map<NodeHandle, MutablePhases>();

  private slot(handle: NodeHandle): MutablePhases {
    let p = this.byNode.get(handle);
    if (p === undefined) {
      p = { buildNs: null, measureNs: null, inputNs: null };
      this.byNode.set(handle, p);
    }
    return p;
  }

  addBuild(handle: NodeHandle, ns: number): void {
    const p = this.slot(handle);
    p.buildNs = (p.buildNs ?? 0) + ns;
  }

  addMeasure(handle: NodeHandle, ns: number): void {
    const p = this.slot(handle);
    p.measureNs = (p.measureNs ?? 0) + ns;
  }

  addInput(handle: NodeHandle, ns: number): void {
    const p = this.slot(handle);
    p.inputNs = (p.inputNs ?? 0) + ns;
  }

  get(handle: NodeHandle): ComponentPhases {
    return this.byNode.get(handle) ?? { buildNs: null, measureNs: null, inputNs: null };
  }
}

/** Mirror of the component tree under `root`, children in order. */
export function collectComponentRecords(
  getNode: (handle: NodeHandle) => ComponentNode | undefined,
  root: NodeHandle | null,
  timings: PhaseTimings | null,
): ProfilerComponentRecord[] {
  if (root === null) return [];
  const visit = (handle: NodeHandle): ProfilerComponentRecord | null => {
    const node = getNode(handle);
    if (node === undefined) return null;
    const children: ProfilerComponentRecord[] = [];
    for (const child of node.children) {
      const rec = visit(child);
      if (rec !== null) children.push(rec);
    }
    return {
      id: node.identity.instanceKey,
      fnName: node.name,
      absPos: node.meta.absPosition,
      size: node.meta.computed,
      layoutCacheHit: node.meta.layoutCacheHit,
      phases: timings?.get(handle) ?? { buildNs: null, measureNs: null, inputNs: null },
      children,
    };
  };
  const rootRecord = visit(root);
  return rootRecord === null ? [] : [rootRecord];
}

export function sendProfilerRecord(
  sink: ProfilerSink | null,
  record: ProfilerRecord,
  warn: (message: string) => void,
): void {
  if (sink === null) return;
  try {
    sink.send(record);
  } catch (err) {
    warn(`[weft][profiler] dropped ${record.type} record for frame ${record.frame}: ${describeThrown(err)}`);
  }
}

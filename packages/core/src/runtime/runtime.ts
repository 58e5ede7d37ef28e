/**
 * packages/core/src/runtime/runtime.ts — Frame driver.
 *
 * One `Runtime` owns the node arena, the layout cache and remembered state
 * for a root component. Each `frame()` runs to completion:
 *
 *   gate     no redraw reasons and a previous output: reuse it (SkipNoInvalidation)
 *   build    FullInitial without a tree; otherwise replay invalidated nodes top-down
 *   garbage  tear down children their parent's new body did not revisit
 *   dirty    spec/child-list changes plus ancestors
 *   measure  root under Fixed(screen), consulting the layout cache
 *   record   absolute positions, clips, draw ops
 *   input    handlers in reverse pre-order
 *
 * Re-entrant `frame()` calls throw `WEFT_REENTRANT_FRAME`.
 */

import { warnDuplicateRegistration } from "../debug/devWarnings.js";
import { WeftError, describeThrown } from "../errors.js";
import { NO_MODIFIERS, type WindowRequests } from "../input/events.js";
import { runInputPass } from "../input/inputPass.js";
import { fixedConstraint } from "../layout/constraint.js";
import {
  EMPTY_LAYOUT_DIAGNOSTICS,
  type LayoutFrameDiagnostics,
  LayoutDiagnosticsCollector,
} from "../layout/diagnostics.js";
import { ORIGIN, type Size, isValidSize, sizeEquals } from "../layout/geometry.js";
import { type MeasureContext, measureNode } from "../layout/measure.js";
import { LayoutCache, type LayoutCacheEntry } from "../layout/measureCache.js";
import { msToNs } from "../perf/env.js";
import { emitFrameAudit } from "../perf/frameAudit.js";
import {
  PhaseTimings,
  type ProfilerFrameRecord,
  type WakeSource,
  collectComponentRecords,
  sendProfilerRecord,
} from "../perf/profiler.js";
import { recordFrame } from "../render/record.js";
import { createBuildPass } from "./build.js";
import { type RuntimeConfig, resolveRuntimeConfig } from "./config.js";
import { computeDirtySets } from "./dirtySet.js";
import {
  type BuildMode,
  EMPTY_BUILD_STATS,
  type FrameBuildStats,
  type FrameInput,
  type FrameOutput,
  type RedrawReason,
} from "./frame.js";
import { type NodeHandle, type NodeIdentity, deriveInstanceKey } from "./identity.js";
import { type ComponentNode, createNodeRegistry } from "./nodeRegistry.js";
import { createRememberStore } from "./remember.js";
import type { Component } from "./replay.js";

export type Runtime<P> = Readonly<{
  frame: (input: FrameInput) => FrameOutput;
  /** Replace the root props; unequal props invalidate the root. */
  setRootProps: (props: P) => void;
  /** Force `handle` to re-execute next frame. */
  invalidate: (handle: NodeHandle) => void;
  /** Queue redraw reasons for the next frame (e.g. from a wake-up outside `frame`). */
  requestRedraw: (reasons: readonly RedrawReason[], source?: WakeSource) => void;
  hasPendingWork: () => boolean;
  frameIndex: () => number;
  root: () => NodeHandle | null;
  nodeCount: () => number;
  getNode: (handle: NodeHandle) => Readonly<ComponentNode> | undefined;
  /** Live nodes created by the named component, in pre-order. */
  findNodes: (name: string) => NodeHandle[];
  preorder: () => NodeHandle[];
  cacheEntry: (handle: NodeHandle) => LayoutCacheEntry | undefined;
  cacheSize: () => number;
  dispose: () => void;
}>;

function pushReason(list: RedrawReason[], reason: RedrawReason): void {
  if (!list.includes(reason)) list.push(reason);
}

function validateScreen(screen: Size): void {
  if (!isValidSize(screen)) {
    throw new WeftError(
      "WEFT_INVALID_SIZE",
      `frame: screen must have non-negative integer w/h, got ${JSON.stringify(screen)}`,
    );
  }
}

export function createRuntime<P>(
  rootComponent: Component<P>,
  initialProps: P,
  config?: RuntimeConfig,
): Runtime<P> {
  const cfg = resolveRuntimeConfig(config);
  const warnCtx = { devMode: cfg.devMode, warned: new Set<string>(), warn: cfg.warn };

  const registry = createNodeRegistry({
    onDuplicateRegistration: (node, what) => warnDuplicateRegistration(warnCtx, node, what),
  });
  const invalidated = new Set<NodeHandle>();
  const volatile = new Set<NodeHandle>();
  const pendingReasons: RedrawReason[] = [];
  const cache = new LayoutCache(cfg.layoutCacheMaxPassGap);
  const diagnostics = new LayoutDiagnosticsCollector();
  const remember = createRememberStore((handle) => invalidate(handle));
  const build = createBuildPass({ registry, remember, cache, invalidated, volatile, now: cfg.now });

  let rootProps = initialProps;
  let rootPropsChanged = false;
  let frameIndex = 0;
  let layoutPass = 0;
  let inFrame = false;
  let disposed = false;
  let lastOutput: FrameOutput | null = null;
  let lastScreen: Size | null = null;
  let lastFrameEnd: number | null = null;

  function requestRedraw(reasons: readonly RedrawReason[], source: WakeSource = "window-event"): void {
    const wasIdle = pendingReasons.length === 0;
    for (const r of reasons) pushReason(pendingReasons, r);
    if (!wasIdle || pendingReasons.length === 0) return;
    sendProfilerRecord(
      cfg.profiler,
      { type: "wake", frame: frameIndex, source, reasons: pendingReasons.slice() },
      cfg.warn,
    );
    cfg.onRequestFrame?.();
  }

  function invalidate(handle: NodeHandle): void {
    if (disposed || registry.get(handle) === undefined) return;
    invalidated.add(handle);
    requestRedraw(["runtime-invalidation"], "runtime");
  }

  function removeNode(node: ComponentNode): void {
    cache.delete(node.identity.instanceKey, node.handle);
    remember.delete(node.handle);
    invalidated.delete(node.handle);
    volatile.delete(node.handle);
  }

  function teardownAll(): void {
    for (const d of build.dropped()) registry.teardown(d, removeNode);
    const root = registry.root();
    if (root !== null) registry.teardown(root, removeNode);
    registry.reset();
    remember.clear();
    cache.clear();
    invalidated.clear();
    volatile.clear();
    lastOutput = null;
  }

  /** True when `handle` or one of its ancestors was left out by a re-run parent. */
  function isDropped(handle: NodeHandle): boolean {
    const dropped = new Set(build.dropped());
    let current: NodeHandle | null = handle;
    while (current !== null) {
      if (dropped.has(current)) return true;
      current = registry.get(current)?.parent ?? null;
    }
    return false;
  }

  function collectReasons(input: FrameInput): RedrawReason[] {
    const reasons: RedrawReason[] = [];
    for (const r of input.redrawReasons ?? []) pushReason(reasons, r);
    if (frameIndex === 1) pushReason(reasons, "startup");
    if (lastScreen !== null && !sizeEquals(lastScreen, input.screen)) {
      pushReason(reasons, "window-resized");
    }
    if ((input.cursorEvents?.length ?? 0) > 0) pushReason(reasons, "mouse-input");
    if ((input.keyboardEvents?.length ?? 0) > 0) pushReason(reasons, "keyboard-input");
    if ((input.imeEvents?.length ?? 0) > 0) pushReason(reasons, "ime-event");
    for (const r of pendingReasons) pushReason(reasons, r);
    pendingReasons.length = 0;
    return reasons;
  }

  function emitFrameRecord(
    output: FrameOutput,
    timings: PhaseTimings | null,
    interFrameWaitNs: number | null,
    phaseNs: Readonly<{ build: number; measure: number; record: number; input: number; total: number }>,
  ): void {
    if (cfg.profiler === null) return;
    const record: ProfilerFrameRecord = {
      type: "frame",
      frame: output.frame,
      buildMode: output.buildMode,
      redrawReasons: output.redrawReasons,
      interFrameWaitNs,
      partialReplayNodes: output.build.partialReplayNodes,
      totalNodesBeforeBuild: output.build.totalNodesBeforeBuild,
      buildTimeNs: phaseNs.build,
      measureTimeNs: phaseNs.measure,
      recordTimeNs: phaseNs.record,
      inputTimeNs: phaseNs.input,
      frameTotalNs: phaseNs.total,
      layoutDiagnostics: output.diagnostics,
      components: collectComponentRecords(registry.get, registry.root(), timings),
    };
    sendProfilerRecord(cfg.profiler, record, cfg.warn);
  }

  function skipFrame(
    previous: FrameOutput,
    frameStart: number,
    interFrameWaitNs: number | null,
  ): FrameOutput {
    const output: FrameOutput = {
      ...previous,
      frame: frameIndex,
      buildMode: "SkipNoInvalidation",
      redrawReasons: [],
      diagnostics: EMPTY_LAYOUT_DIAGNOSTICS,
      build: { ...EMPTY_BUILD_STATS, totalNodesBeforeBuild: registry.size() },
    };
    Object.freeze(output);
    lastOutput = output;
    emitFrameAudit("runtime", "frame.skip", { frame: frameIndex });
    const total = msToNs(cfg.now() - frameStart);
    emitFrameRecord(output, null, interFrameWaitNs, {
      build: 0,
      measure: 0,
      record: 0,
      input: 0,
      total,
    });
    return output;
  }

  function runBuild(): BuildMode {
    const root = registry.root();
    if (root === null) {
      const identity: NodeIdentity = Object.freeze({
        typeId: rootComponent.typeId,
        instanceKey: deriveInstanceKey(null, [], rootComponent.typeId, undefined, 0),
        logicId: 0,
      });
      registry.setRoot(build.buildRoot(rootComponent, rootProps, identity));
      rootPropsChanged = false;
      return "FullInitial";
    }

    if (rootPropsChanged || invalidated.has(root)) build.rerun(root, rootComponent, rootProps);
    rootPropsChanged = false;

    const pending = Array.from(invalidated).filter((h) => registry.get(h) !== undefined);
    const depths = new Map<NodeHandle, number>();
    for (const h of pending) depths.set(h, registry.depth(h));
    pending.sort((a, b) => (depths.get(a) ?? 0) - (depths.get(b) ?? 0));
    for (const handle of pending) {
      if (build.executed().has(handle) || registry.get(handle) === undefined) continue;
      // A re-run ancestor that skipped this node's branch leaves it attached.
      if (isDropped(handle)) continue;
      if (!build.replayStored(handle)) invalidated.delete(handle);
    }
    return "PartialReplay";
  }

  function runFrame(input: FrameInput): FrameOutput {
    frameIndex++;
    const frameStart = cfg.now();
    const interFrameWaitNs = lastFrameEnd === null ? null : msToNs(frameStart - lastFrameEnd);
    const reasons = collectReasons(input);

    if (lastOutput !== null && reasons.length === 0 && registry.root() !== null) {
      const out = skipFrame(lastOutput, frameStart, interFrameWaitNs);
      lastFrameEnd = cfg.now();
      return out;
    }

    const timings = cfg.profiler !== null ? new PhaseTimings() : null;
    const totalNodesBeforeBuild = registry.size();
    build.begin(frameIndex, timings);
    diagnostics.reset();

    // --- build ---
    const buildStart = cfg.now();
    let mode: BuildMode;
    try {
      mode = runBuild();
    } catch (err) {
      teardownAll();
      if (err instanceof WeftError) throw err;
      throw new WeftError(
        "WEFT_USER_CODE_THROW",
        `component body threw: ${describeThrown(err)}`,
        { cause: err },
      );
    }

    // --- garbage ---
    let nodesTornDown = 0;
    for (const d of build.dropped()) nodesTornDown += registry.teardown(d, removeNode);
    const buildNs = msToNs(cfg.now() - buildStart);

    const root = registry.root();
    if (root === null) {
      throw new WeftError("WEFT_INVALID_STATE", "frame: build produced no root node");
    }

    // --- dirty ---
    const expandStart = cfg.now();
    const paramDirty = build.paramDirty();
    const structuralDirty = build.structuralDirty();
    const seeds = new Set<NodeHandle>([...paramDirty, ...structuralDirty, ...volatile]);
    const dirty = computeDirtySets((h) => {
      const node = registry.get(h);
      return node === undefined ? undefined : node.parent;
    }, seeds);
    diagnostics.setDirtyCounts(
      countLive(paramDirty),
      countLive(structuralDirty),
      dirty.effective.size,
      msToNs(cfg.now() - expandStart),
    );

    // --- measure ---
    const measureStart = cfg.now();
    layoutPass++;
    const ctx: MeasureContext = {
      getNode: registry.get,
      cache,
      dirtySelf: dirty.self,
      dirtyEffective: dirty.effective,
      diagnostics,
      pass: layoutPass,
      settled: new Set(),
      onMeasured:
        timings === null ? null : (handle, _outcome, ms) => timings.addMeasure(handle, ms * 1e6),
      now: cfg.now,
    };
    const measured = measureNode(ctx, root, fixedConstraint(input.screen.w, input.screen.h));
    if (!measured.ok) {
      lastOutput = null;
      cfg.warn(`[weft][layout] measure failed (${measured.fatal.code}): ${measured.fatal.detail}`);
      emitFrameAudit("layout", "measure.failed", {
        frame: frameIndex,
        code: measured.fatal.code,
        detail: measured.fatal.detail,
      });
      throw new WeftError(measured.fatal.code, measured.fatal.detail);
    }
    registry.require(root).meta.relPosition = ORIGIN;
    const layoutDiagnostics: LayoutFrameDiagnostics = diagnostics.snapshot();
    const measureNs = msToNs(cfg.now() - measureStart);

    // --- record ---
    const recordStart = cfg.now();
    const recorded = recordFrame(registry.get, root, input.screen);
    const recordNs = msToNs(cfg.now() - recordStart);

    // --- input ---
    const inputStart = cfg.now();
    let requests: WindowRequests;
    try {
      requests = runInputPass({
        getNode: registry.get,
        order: registry.preorder(),
        cursorPosition: input.cursorPosition ?? null,
        cursorEvents: input.cursorEvents ?? [],
        keyboardEvents: input.keyboardEvents ?? [],
        imeEvents: input.imeEvents ?? [],
        modifiers: input.modifiers ?? NO_MODIFIERS,
        now: cfg.now,
        onHandled: timings === null ? null : (handle, ms) => timings.addInput(handle, ms * 1e6),
      }).requests;
    } catch (err) {
      lastOutput = null;
      if (err instanceof WeftError) throw err;
      throw new WeftError("WEFT_USER_CODE_THROW", `input handler threw: ${describeThrown(err)}`, {
        cause: err,
      });
    }
    const inputNs = msToNs(cfg.now() - inputStart);

    const stats = build.stats();
    const buildStats: FrameBuildStats = {
      bodyExecutions: stats.bodyExecutions,
      replaySkips: stats.replaySkips,
      nodesCreated: stats.nodesCreated,
      nodesTornDown,
      partialReplayNodes: mode === "PartialReplay" ? stats.bodyExecutions : 0,
      totalNodesBeforeBuild,
    };
    const output: FrameOutput = {
      frame: frameIndex,
      buildMode: mode,
      redrawReasons: reasons,
      ops: recorded.ops,
      windowRequests: { ...requests },
      diagnostics: layoutDiagnostics,
      build: buildStats,
      rootSize: measured.value,
    };
    Object.freeze(output);
    lastOutput = output;
    lastScreen = input.screen;

    emitFrameAudit("runtime", "frame.done", {
      frame: frameIndex,
      buildMode: mode,
      reasons,
      bodyExecutions: stats.bodyExecutions,
      replaySkips: stats.replaySkips,
      nodesTornDown,
      measureNodeCalls: layoutDiagnostics.measureNodeCalls,
      cacheStores: layoutDiagnostics.cacheStoreCount,
      fragmentsRecorded: recorded.nodesRecorded,
      fragmentsReused: recorded.nodesReused,
      ops: recorded.ops.length,
    });
    emitFrameRecord(output, timings, interFrameWaitNs, {
      build: buildNs,
      measure: measureNs,
      record: recordNs,
      input: inputNs,
      total: msToNs(cfg.now() - frameStart),
    });
    lastFrameEnd = cfg.now();
    return output;
  }

  function countLive(set: ReadonlySet<NodeHandle>): number {
    let n = 0;
    for (const h of set) if (registry.get(h) !== undefined) n++;
    return n;
  }

  return Object.freeze({
    frame(input: FrameInput): FrameOutput {
      if (disposed) throw new WeftError("WEFT_INVALID_STATE", "frame: runtime is disposed");
      if (inFrame) {
        throw new WeftError("WEFT_REENTRANT_FRAME", "frame: called while a frame is in progress");
      }
      validateScreen(input.screen);
      inFrame = true;
      try {
        return runFrame(input);
      } finally {
        inFrame = false;
      }
    },
    setRootProps(props: P): void {
      const previous = rootProps;
      rootProps = props;
      if (rootComponent.equals(previous, props)) return;
      rootPropsChanged = true;
      requestRedraw(["runtime-invalidation"], "runtime");
    },
    invalidate,
    requestRedraw,
    hasPendingWork(): boolean {
      return pendingReasons.length > 0;
    },
    frameIndex(): number {
      return frameIndex;
    },
    root: registry.root,
    nodeCount: registry.size,
    getNode: registry.get,
    findNodes(name: string): NodeHandle[] {
      return registry.preorder().filter((h) => registry.get(h)?.name === name);
    },
    preorder(): NodeHandle[] {
      return registry.preorder();
    },
    cacheEntry(handle: NodeHandle): LayoutCacheEntry | undefined {
      const node = registry.get(handle);
      if (node === undefined) return undefined;
      const entry = cache.peek(node.identity.instanceKey);
      return entry !== undefined && entry.handle === handle ? entry : undefined;
    },
    cacheSize(): number {
      return cache.size;
    },
    dispose(): void {
      if (disposed) return;
      teardownAll();
      pendingReasons.length = 0;
      disposed = true;
    },
  });
}

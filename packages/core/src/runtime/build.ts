/**
 * packages/core/src/runtime/build.ts — Build pass.
 *
 * Executes component bodies and decides, per child call, whether to create a
 * node, re-execute an existing one, or skip it. Records which nodes became
 * dirty for layout and which previous children were not revisited.
 *
 * Dirtiness collected here:
 *   - param:      an existing node's layout spec changed (type tag or equals)
 *   - structural: an existing node's child list changed
 * New nodes are neither; they have no cache entry to invalidate.
 */

import { WeftError } from "../errors.js";
import type { InputHandler } from "../input/events.js";
import type { LayoutCache } from "../layout/measureCache.js";
import type { LayoutSpec } from "../layout/layoutSpec.js";
import type { PhaseTimings } from "../perf/profiler.js";
import type { BuildContext } from "./buildContext.js";
import { type FlowSite, type MarkerPath, isReuseEligible, markerIds } from "./fingerprint.js";
import {
  type NodeHandle,
  type NodeIdentity,
  type UserKey,
  deriveInstanceKey,
  identityEquals,
} from "./identity.js";
import type { NodeRegistry } from "./nodeRegistry.js";
import type { RememberStore, State } from "./remember.js";
import { type Component, type ReuseCandidate, decideReuse } from "./replay.js";

export type BuildStats = {
  bodyExecutions: number;
  replaySkips: number;
  nodesCreated: number;
};

export type BuildPassDeps = Readonly<{
  registry: NodeRegistry;
  remember: RememberStore;
  cache: LayoutCache;
  /** Nodes whose own remembered state changed since they last ran. */
  invalidated: Set<NodeHandle>;
  /** Nodes whose spec is non-cacheable; kept current on every exit. */
  volatile: Set<NodeHandle>;
  now: () => number;
}>;

export type BuildPass = Readonly<{
  cx: BuildContext;
  /** Start a frame's build; resets the per-frame sets. */
  begin: (frame: number, timings: PhaseTimings | null) => void;
  /** Execute a component as a fresh root. */
  buildRoot: <P>(component: Component<P>, props: P, identity: NodeIdentity) => NodeHandle;
  /** Re-execute an existing node with `props`, without touching its parent. */
  rerun: <P>(handle: NodeHandle, component: Component<P>, props: P) => void;
  /** Re-execute an existing node with its stored props. False when it has no descriptor. */
  replayStored: (handle: NodeHandle) => boolean;
  executed: () => ReadonlySet<NodeHandle>;
  paramDirty: () => ReadonlySet<NodeHandle>;
  structuralDirty: () => ReadonlySet<NodeHandle>;
  /** Previous children not revisited by their parent's new body. */
  dropped: () => readonly NodeHandle[];
  stats: () => Readonly<BuildStats>;
}>;

function keyToken(key: UserKey | undefined): string {
  if (key === undefined) return "";
  return typeof key === "number" ? `n${String(key)}` : `s${key}`;
}

export function createBuildPass(deps: BuildPassDeps): BuildPass {
  const { registry, remember, cache, invalidated, volatile } = deps;

  let frame = 0;
  let timings: PhaseTimings | null = null;
  let executed = new Set<NodeHandle>();
  let paramDirty = new Set<NodeHandle>();
  let structuralDirty = new Set<NodeHandle>();
  let dropped: NodeHandle[] = [];
  let stats: BuildStats = { bodyExecutions: 0, replaySkips: 0, nodesCreated: 0 };

  function execute<P>(
    component: Component<P>,
    props: P,
    identity: NodeIdentity,
    opts: Readonly<{ reuse?: NodeHandle; creationPath?: MarkerPath; attach: boolean }>,
  ): NodeHandle {
    const started = timings !== null ? deps.now() : 0;
    const handle = registry.enter(identity, component.name, { ...opts, frame });
    const node = registry.require(handle);
    if (opts.reuse === undefined) {
      // A replaced node may have left an entry under the same key.
      cache.delete(identity.instanceKey);
      stats.nodesCreated++;
    }
    node.replay = component.describe(props);
    // Cleared before the body so a write during the body schedules another run.
    invalidated.delete(handle);
    remember.beginRender(handle);

    let completed = false;
    try {
      component.render(props, cx);
      completed = true;
    } finally {
      const exit = registry.exit();
      for (const d of exit.dropped) dropped.push(d);
      if (completed) {
        remember.endRender(handle);
        executed.add(handle);
        stats.bodyExecutions++;
        if (!exit.isNew) {
          if (exit.specChanged) paramDirty.add(handle);
          if (exit.childrenChanged) structuralDirty.add(handle);
        }
        if (node.layoutSpec !== null && !node.layoutSpec.cacheable) volatile.add(handle);
        else volatile.delete(handle);
        if (timings !== null) timings.addBuild(handle, (deps.now() - started) * 1e6);
      }
    }
    return handle;
  }

  function render<P>(component: Component<P>, props: P, key?: UserKey): void {
    const scope = registry.currentScope();
    const path = scope.recorder.openPath();
    const ids = markerIds(path);
    const parentKey = scope.node.identity.instanceKey;

    const occurrenceKey = `${ids.join(",")}|${component.typeId}|${keyToken(key)}`;
    const logicId = scope.occurrences.get(occurrenceKey) ?? 0;
    scope.occurrences.set(occurrenceKey, logicId + 1);
    if (key !== undefined && logicId > 0) {
      throw new WeftError(
        "WEFT_DUPLICATE_KEY",
        `${scope.node.name}: duplicate key ${JSON.stringify(key)} for ${component.name} under the same parent`,
      );
    }

    const instanceKey = deriveInstanceKey(parentKey, ids, component.typeId, key, logicId);
    const identity: NodeIdentity = Object.freeze({
      typeId: component.typeId,
      instanceKey,
      logicId,
    });

    let candidate: ReuseCandidate | null = null;
    let previous: NodeHandle | undefined = scope.reusable.get(instanceKey);
    const prevNode = previous === undefined ? undefined : registry.get(previous);
    if (prevNode !== undefined && identityEquals(prevNode.identity, identity)) {
      candidate = {
        replay: prevNode.replay,
        eligible: isReuseEligible(scope.previousFingerprint, prevNode.creationPath, path),
        invalidated: invalidated.has(prevNode.handle),
      };
    } else {
      previous = undefined;
    }

    const decision = decideReuse(candidate, component, props);
    if (decision.kind === "skip" && previous !== undefined && prevNode !== undefined) {
      registry.attach(previous);
      prevNode.propsUnchangedFromPrevious = true;
      stats.replaySkips++;
      return;
    }
    if (decision.kind === "replay" && previous !== undefined) {
      execute(component, props, identity, { reuse: previous, creationPath: path, attach: true });
      return;
    }
    execute(component, props, identity, { creationPath: path, attach: true });
  }

  function group<T>(site: FlowSite, body: () => T): T {
    const recorder = registry.currentScope().recorder;
    const marker = recorder.enter(site);
    try {
      return body();
    } finally {
      recorder.exit(marker);
    }
  }

  const cx: BuildContext = Object.freeze({
    render,
    group,
    each<T>(site: FlowSite, items: Iterable<T>, body: (item: T, index: number) => void): void {
      let index = 0;
      for (const item of items) {
        const i = index++;
        group(site, () => body(item, i));
      }
    },
    layout(spec: LayoutSpec): void {
      registry.setLayoutSpec(spec);
    },
    onInput(handler: InputHandler): void {
      registry.setInputHandler(handler);
    },
    remember<T>(init: () => T): State<T> {
      return remember.remember(registry.currentMut().handle, init);
    },
    self(): NodeHandle {
      return registry.currentMut().handle;
    },
    frame(): number {
      return frame;
    },
  });

  function rerun<P>(handle: NodeHandle, component: Component<P>, props: P): void {
    const node = registry.require(handle);
    execute(component, props, node.identity, { reuse: handle, attach: false });
  }

  return Object.freeze({
    cx,
    begin(frameIndex: number, t: PhaseTimings | null): void {
      frame = frameIndex;
      timings = t;
      for (const h of registry.preorder()) {
        const node = registry.get(h);
        if (node !== undefined) node.propsUnchangedFromPrevious = false;
      }
      executed = new Set();
      paramDirty = new Set();
      structuralDirty = new Set();
      dropped = [];
      stats = { bodyExecutions: 0, replaySkips: 0, nodesCreated: 0 };
    },
    buildRoot<P>(component: Component<P>, props: P, identity: NodeIdentity): NodeHandle {
      return execute(component, props, identity, { attach: false });
    },
    rerun,
    replayStored(handle: NodeHandle): boolean {
      const descriptor = registry.get(handle)?.replay ?? null;
      if (descriptor === null) return false;
      descriptor.replay({
        run<P>(component: Component<P>, props: P): void {
          rerun(handle, component, props);
        },
      });
      return true;
    },
    executed: () => executed,
    paramDirty: () => paramDirty,
    structuralDirty: () => structuralDirty,
    dropped: () => dropped,
    stats: () => stats,
  });
}

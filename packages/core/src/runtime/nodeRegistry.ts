/**
 * packages/core/src/runtime/nodeRegistry.ts — Arena of live component
 * invocations plus the scope stack of the current build pass.
 *
 * `enter`/`exit` bracket one body execution. `exit` finalizes what the body
 * declared (layout spec, input handler, children, fingerprint) but never
 * removes children: which previous children survive is decided by the build
 * pass from fingerprints, and the rest go through `teardown`.
 */

import { WeftError } from "../errors.js";
import type { InputHandler } from "../input/events.js";
import type { Position, Rect, Size } from "../layout/geometry.js";
import { type LayoutSpec, sameLayoutSpec } from "../layout/layoutSpec.js";
import type { DrawFragment } from "../render/fragment.js";
import { FingerprintRecorder, type MarkerId, type MarkerPath } from "./fingerprint.js";
import type { InstanceKey, NodeHandle, NodeIdentity } from "./identity.js";
import type { ReplayDescriptor } from "./replay.js";

/** Written by the measure, record and input passes. */
export type NodeFrameMeta = {
  computed: Size | null;
  relPosition: Position | null;
  absPosition: Position | null;
  /** Intersection of ancestor clip rects; null when no ancestor clips. */
  eventClipRect: Rect | null;
  layoutCacheHit: boolean;
  fragments: readonly DrawFragment[];
  fragmentsSpec: LayoutSpec | null;
  fragmentsSize: Size | null;
};

export type ComponentNode = {
  readonly handle: NodeHandle;
  readonly identity: NodeIdentity;
  readonly name: string;
  parent: NodeHandle | null;
  children: readonly NodeHandle[];
  layoutSpec: LayoutSpec | null;
  inputHandler: InputHandler | null;
  replay: ReplayDescriptor | null;
  /**
   * True when the latest build's parent body proved the props equal and
   * skipped this node. Cleared for every node when a build starts; skip
   * frames leave it as is.
   */
  propsUnchangedFromPrevious: boolean;
  /** Markers entered by the last executed body. */
  fingerprint: readonly MarkerId[];
  /** Markers open in the parent's body when this node was entered. */
  creationPath: MarkerPath;
  readonly createdFrame: number;
  lastExecutedFrame: number;
  meta: NodeFrameMeta;
};

/** One body execution in progress. */
export type BuildScope = {
  readonly node: ComponentNode;
  readonly isNew: boolean;
  readonly previousChildren: readonly NodeHandle[];
  readonly previousFingerprint: readonly MarkerId[];
  readonly previousSpec: LayoutSpec | null;
  /** Previous children by instance key, for reuse lookups. */
  readonly reusable: ReadonlyMap<InstanceKey, NodeHandle>;
  readonly children: NodeHandle[];
  readonly recorder: FingerprintRecorder;
  /** Occurrence counts per (marker path, type id). */
  readonly occurrences: Map<string, number>;
  layoutSpecDeclared: boolean;
  inputHandlerDeclared: boolean;
};

export type ScopeExit = Readonly<{
  handle: NodeHandle;
  isNew: boolean;
  specChanged: boolean;
  childrenChanged: boolean;
  /** Previous children the body did not revisit. */
  dropped: readonly NodeHandle[];
  fingerprint: readonly MarkerId[];
  previousFingerprint: readonly MarkerId[];
}>;

export type EnterOptions = Readonly<{
  /** Existing node to re-execute; a new node is created when absent. */
  reuse?: NodeHandle;
  creationPath?: MarkerPath;
  /** Append to the enclosing scope's children. False for a replay started by the driver. */
  attach: boolean;
  frame: number;
}>;

export type DuplicateRegistration = "layout" | "input";

export type NodeRegistryOptions = Readonly<{
  onDuplicateRegistration?: (node: ComponentNode, what: DuplicateRegistration) => void;
}>;

export type NodeRegistry = Readonly<{
  enter: (identity: NodeIdentity, name: string, opts: EnterOptions) => NodeHandle;
  exit: () => ScopeExit;
  /** Innermost scope. Throws outside a build. */
  currentScope: () => BuildScope;
  currentMut: () => ComponentNode;
  isBuilding: () => boolean;
  setLayoutSpec: (spec: LayoutSpec) => void;
  setInputHandler: (handler: InputHandler) => void;
  /** Reattach a reused subtree under the current scope. */
  attach: (handle: NodeHandle) => void;
  /** Remove a node and its subtree; `onRemoved` runs once per removed node, leaves first. */
  teardown: (handle: NodeHandle, onRemoved: (node: ComponentNode) => void) => number;
  get: (handle: NodeHandle) => ComponentNode | undefined;
  require: (handle: NodeHandle) => ComponentNode;
  root: () => NodeHandle | null;
  setRoot: (handle: NodeHandle | null) => void;
  size: () => number;
  depth: (handle: NodeHandle) => number;
  /** Handles in pre-order (parent before children, siblings in order). */
  preorder: (from?: NodeHandle) => NodeHandle[];
  /** Drop every node without callbacks and reset the scope stack. */
  reset: () => void;
}>;

export function emptyFrameMeta(): NodeFrameMeta {
  return {
    computed: null,
    relPosition: null,
    absPosition: null,
    eventClipRect: null,
    layoutCacheHit: false,
    fragments: [],
    fragmentsSpec: null,
    fragmentsSize: null,
  };
}

function sameHandles(a: readonly NodeHandle[], b: readonly NodeHandle[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function createNodeRegistry(opts: NodeRegistryOptions = {}): NodeRegistry {
  const nodes = new Map<NodeHandle, ComponentNode>();
  const scopes: BuildScope[] = [];
  let nextHandle = 1;
  let rootHandle: NodeHandle | null = null;

  function requireNode(handle: NodeHandle): ComponentNode {
    const node = nodes.get(handle);
    if (node === undefined) {
      throw new WeftError("WEFT_NODE_NOT_FOUND", `NodeRegistry: no node for handle ${handle}`);
    }
    return node;
  }

  function currentScope(): BuildScope {
    const scope = scopes[scopes.length - 1];
    if (scope === undefined) {
      throw new WeftError(
        "WEFT_BUILD_OUTSIDE_FRAME",
        "NodeRegistry: no component scope is open; build helpers may only run inside a component body",
      );
    }
    return scope;
  }

  function appendToParent(handle: NodeHandle): NodeHandle | null {
    const parentScope = scopes[scopes.length - 1];
    if (parentScope === undefined) return null;
    parentScope.children.push(handle);
    return parentScope.node.handle;
  }

  function enter(identity: NodeIdentity, name: string, o: EnterOptions): NodeHandle {
    let node: ComponentNode;
    let isNew: boolean;
    if (o.reuse !== undefined) {
      node = requireNode(o.reuse);
      isNew = false;
      if (o.attach) node.parent = appendToParent(node.handle);
    } else {
      const handle = nextHandle++;
      node = {
        handle,
        identity,
        name,
        parent: null,
        children: [],
        layoutSpec: null,
        inputHandler: null,
        replay: null,
        propsUnchangedFromPrevious: false,
        fingerprint: [],
        creationPath: o.creationPath ?? [],
        createdFrame: o.frame,
        lastExecutedFrame: o.frame,
        meta: emptyFrameMeta(),
      };
      nodes.set(handle, node);
      isNew = true;
      if (o.attach) node.parent = appendToParent(handle);
    }
    if (o.creationPath !== undefined) node.creationPath = o.creationPath;

    const reusable = new Map<InstanceKey, NodeHandle>();
    for (const child of node.children) {
      const c = nodes.get(child);
      if (c !== undefined) reusable.set(c.identity.instanceKey, child);
    }

    scopes.push({
      node,
      isNew,
      previousChildren: node.children,
      previousFingerprint: node.fingerprint,
      previousSpec: node.layoutSpec,
      reusable,
      children: [],
      recorder: new FingerprintRecorder(),
      occurrences: new Map(),
      layoutSpecDeclared: false,
      inputHandlerDeclared: false,
    });
    node.lastExecutedFrame = o.frame;
    node.propsUnchangedFromPrevious = false;
    return node.handle;
  }

  function exit(): ScopeExit {
    const scope = scopes.pop();
    if (scope === undefined) {
      throw new WeftError("WEFT_INVALID_STATE", "NodeRegistry.exit: scope stack is empty");
    }
    const node = scope.node;
    if (!scope.layoutSpecDeclared) node.layoutSpec = null;
    if (!scope.inputHandlerDeclared) node.inputHandler = null;

    const kept = new Set(scope.children);
    const dropped: NodeHandle[] = [];
    for (const prev of scope.previousChildren) {
      if (!kept.has(prev)) dropped.push(prev);
    }

    const childrenChanged = !sameHandles(scope.previousChildren, scope.children);
    node.children = Object.freeze(scope.children.slice());
    node.fingerprint = scope.recorder.finish();

    return Object.freeze({
      handle: node.handle,
      isNew: scope.isNew,
      specChanged: !sameLayoutSpec(scope.previousSpec, node.layoutSpec),
      childrenChanged,
      dropped,
      fingerprint: node.fingerprint,
      previousFingerprint: scope.previousFingerprint,
    });
  }

  function teardown(handle: NodeHandle, onRemoved: (node: ComponentNode) => void): number {
    const node = nodes.get(handle);
    if (node === undefined) return 0;
    let removed = 0;
    for (const child of node.children) {
      // A child already reattached elsewhere belongs to another parent now.
      const c = nodes.get(child);
      if (c !== undefined && c.parent === handle) removed += teardown(child, onRemoved);
    }
    nodes.delete(handle);
    if (rootHandle === handle) rootHandle = null;
    onRemoved(node);
    return removed + 1;
  }

  return Object.freeze({
    enter,
    exit,
    currentScope,
    currentMut(): ComponentNode {
      return currentScope().node;
    },
    isBuilding(): boolean {
      return scopes.length > 0;
    },
    setLayoutSpec(spec: LayoutSpec): void {
      const scope = currentScope();
      if (scope.layoutSpecDeclared) opts.onDuplicateRegistration?.(scope.node, "layout");
      scope.layoutSpecDeclared = true;
      scope.node.layoutSpec = spec;
    },
    setInputHandler(handler: InputHandler): void {
      const scope = currentScope();
      if (scope.inputHandlerDeclared) opts.onDuplicateRegistration?.(scope.node, "input");
      scope.inputHandlerDeclared = true;
      scope.node.inputHandler = handler;
    },
    attach(handle: NodeHandle): void {
      const node = requireNode(handle);
      node.parent = appendToParent(handle);
    },
    teardown,
    get(handle: NodeHandle): ComponentNode | undefined {
      return nodes.get(handle);
    },
    require: requireNode,
    root(): NodeHandle | null {
      return rootHandle;
    },
    setRoot(handle: NodeHandle | null): void {
      rootHandle = handle;
    },
    size(): number {
      return nodes.size;
    },
    depth(handle: NodeHandle): number {
      let d = 0;
      let current = nodes.get(handle)?.parent ?? null;
      while (current !== null) {
        d++;
        current = nodes.get(current)?.parent ?? null;
      }
      return d;
    },
    preorder(from?: NodeHandle): NodeHandle[] {
      const start = from ?? rootHandle;
      const out: NodeHandle[] = [];
      if (start === null) return out;
      const stack: NodeHandle[] = [start];
      while (stack.length > 0) {
        const handle = stack.pop();
        if (handle === undefined) continue;
        const node = nodes.get(handle);
        if (node === undefined) continue;
        out.push(handle);
        for (let i = node.children.length - 1; i >= 0; i--) {
          const child = node.children[i];
          if (child !== undefined) stack.push(child);
        }
      }
      return out;
    },
    reset(): void {
      nodes.clear();
      scopes.length = 0;
      rootHandle = null;
    },
  });
}

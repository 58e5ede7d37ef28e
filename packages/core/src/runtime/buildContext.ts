/**
 * packages/core/src/runtime/buildContext.ts — What a component body can do.
 */

import type { InputHandler } from "../input/events.js";
import type { LayoutSpec } from "../layout/layoutSpec.js";
import type { FlowSite } from "./fingerprint.js";
import type { NodeHandle, UserKey } from "./identity.js";
import type { State } from "./remember.js";
import type { Component } from "./replay.js";

export type BuildContext = Readonly<{
  /** Invoke a child component. Repeated children may pass an explicit key. */
  render: <P>(component: Component<P>, props: P, key?: UserKey) => void;
  /**
   * Run `body` under a control-flow marker for `site`. Wrap every branch
   * taken and every loop body; nested groups nest.
   */
  group: <T>(site: FlowSite, body: () => T) => T;
  /** Loop helper: each iteration runs in its own group of `site`. */
  each: <T>(site: FlowSite, items: Iterable<T>, body: (item: T, index: number) => void) => void;
  /** Declare how this node measures and records itself. Last call wins. */
  layout: (spec: LayoutSpec) => void;
  /** Declare this node's input handler. Last call wins. */
  onInput: (handler: InputHandler) => void;
  /** State slot indexed by call order; writes invalidate this node. */
  remember: <T>(init: () => T) => State<T>;
  /** Handle of the node whose body is running. */
  self: () => NodeHandle;
  /** Index of the frame being built. */
  frame: () => number;
}>;

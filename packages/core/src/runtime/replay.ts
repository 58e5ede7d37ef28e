/**
 * packages/core/src/runtime/replay.ts — Component definitions, replay
 * descriptors and the per-call reuse decision.
 *
 * A replay descriptor is the stored "runner plus last props" of a node. Its
 * props are only readable through the component that created it; a
 * descriptor checked against a different component reads as absent, so a
 * type mismatch degrades to a rebuild and never to a mistyped call.
 */

import type { BuildContext } from "./buildContext.js";
import { type FlowSite, type FlowSites, createFlowSites } from "./fingerprint.js";
import { type ComponentTypeId, componentTypeId } from "./identity.js";

export type PropsEquality<P> = (prev: P, next: P) => boolean;

/** Runs a component body for the node being replayed. */
export type ReplayHost = Readonly<{
  run: <P>(component: Component<P>, props: P) => void;
}>;

export type ReplayDescriptor = Readonly<{
  typeTag: ComponentTypeId;
  replay: (host: ReplayHost) => void;
}>;

export type ComponentDefinition<P> = Readonly<{
  name: string;
  /** Defining module; with `name` it forms the stable component type id. */
  module: string;
  /** Props equality used to skip re-execution. */
  equals: PropsEquality<P>;
  render: (props: P, cx: BuildContext) => void;
}>;

export type Component<P> = Readonly<{
  name: string;
  module: string;
  typeId: ComponentTypeId;
  equals: PropsEquality<P>;
  render: (props: P, cx: BuildContext) => void;
  /** Allocate a branch/loop site id. Call once per site, at definition time. */
  site: (label?: string) => FlowSite;
  describe: (props: P) => ReplayDescriptor;
  /** Props stored in a descriptor created by this component, else null. */
  propsOf: (descriptor: ReplayDescriptor) => Readonly<{ props: P }> | null;
}>;

export function defineComponent<P>(def: ComponentDefinition<P>): Component<P> {
  const typeId = componentTypeId(def.module, def.name);
  const sites: FlowSites = createFlowSites(typeId);
  const stored = new WeakMap<ReplayDescriptor, Readonly<{ props: P }>>();

  const component: Component<P> = Object.freeze({
    name: def.name,
    module: def.module,
    typeId,
    equals: def.equals,
    render: def.render,
    site(label?: string): FlowSite {
      return sites.next(label);
    },
    describe(props: P): ReplayDescriptor {
      const descriptor: ReplayDescriptor = Object.freeze({
        typeTag: typeId,
        replay(host: ReplayHost): void {
          host.run(component, props);
        },
      });
      stored.set(descriptor, Object.freeze({ props }));
      return descriptor;
    },
    propsOf(descriptor: ReplayDescriptor): Readonly<{ props: P }> | null {
      if (descriptor.typeTag !== typeId) return null;
      return stored.get(descriptor) ?? null;
    },
  });
  return component;
}

/**
 * - `build`: no eligible previous node; create a new subtree.
 * - `replay`: same node, body re-executed with the new props.
 * - `skip`: same node, props equal, body not executed.
 */
export type ReuseDecision =
  | Readonly<{ kind: "build" }>
  | Readonly<{ kind: "replay" }>
  | Readonly<{ kind: "skip" }>;

export type ReuseCandidate = Readonly<{
  /** Previous descriptor of the matching node, if any. */
  replay: ReplayDescriptor | null;
  /** Fingerprint position check passed. */
  eligible: boolean;
  /** The node's own state changed since it last ran. */
  invalidated: boolean;
}>;

export function decideReuse<P>(
  candidate: ReuseCandidate | null,
  component: Component<P>,
  props: P,
): ReuseDecision {
  if (candidate === null || !candidate.eligible) return { kind: "build" };
  if (candidate.replay === null) return { kind: "build" };
  const previous = component.propsOf(candidate.replay);
  if (previous === null) return { kind: "build" };
  if (candidate.invalidated) return { kind: "replay" };
  return component.equals(previous.props, props) ? { kind: "skip" } : { kind: "replay" };
}

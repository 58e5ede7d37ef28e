/**
 * packages/core/src/layout/layoutSpec.ts — How a node measures, places and
 * records itself.
 *
 * A spec is a flat capability: one `measure`, one `record`, one `equals`.
 * Specs are built from a `LayoutSpecType`, which owns the typed parameters
 * of every spec it creates; comparing specs of different types is always
 * unequal.
 */

import type { DrawFragment } from "../render/fragment.js";
import { shallowEqual } from "../runtime/equality.js";
import type { NodeHandle } from "../runtime/identity.js";
import {
  CONSTRAINT_NONE,
  type Constraint,
  constraintEquals,
  resolveDimension,
} from "./constraint.js";
import type { Position, Size } from "./geometry.js";
import { ORIGIN } from "./geometry.js";
import { type LayoutResult, layoutOk } from "./result.js";

export type ChildMeasureRequest = readonly [child: NodeHandle, constraint: Constraint];

export type LayoutInput = Readonly<{
  /** This node's declared constraint merged with the one its parent passed down. */
  constraint: Constraint;
  children: readonly NodeHandle[];
  /** Measure a child; the constraint and result feed this node's cache entry. */
  measureChild: (child: NodeHandle, constraint: Constraint) => LayoutResult<Size>;
  /** Measure several children; fails on the first failure. */
  measureChildren: (requests: readonly ChildMeasureRequest[]) => LayoutResult<readonly Size[]>;
  /** Measure without recording the result as a dependency of this node's entry. */
  measureChildUntracked: (child: NodeHandle, constraint: Constraint) => LayoutResult<Size>;
}>;

export type LayoutOutput = Readonly<{
  placeChild: (child: NodeHandle, position: Position) => void;
}>;

export type RecordInput = Readonly<{
  size: Size;
  draw: (fragment: DrawFragment) => void;
}>;

export interface LayoutSpec {
  readonly typeTag: string;
  /** Declared sizing intent, merged with the parent's constraint before measuring. */
  readonly constraint: Constraint;
  /** False when measuring reads frame-varying external state. Never stored in the cache. */
  readonly cacheable: boolean;
  readonly clipsChildren: boolean;
  measure(input: LayoutInput, output: LayoutOutput): LayoutResult<Size>;
  record(input: RecordInput): void;
  equals(other: LayoutSpec): boolean;
}

export type LayoutSpecOptions = Readonly<{
  constraint?: Constraint;
  clipsChildren?: boolean;
}>;

export type LayoutSpecDefinition<P> = Readonly<{
  typeTag: string;
  measure: (params: P, input: LayoutInput, output: LayoutOutput) => LayoutResult<Size>;
  record?: (params: P, input: RecordInput) => void;
  /** Parameter equality. Defaults to `shallowEqual`. */
  equals?: (a: P, b: P) => boolean;
  cacheable?: boolean;
  clipsChildren?: boolean;
}>;

export type LayoutSpecType<P> = Readonly<{
  typeTag: string;
  create: (params: P, options?: LayoutSpecOptions) => LayoutSpec;
  /** Parameters of a spec created by this type, or null for any other spec. */
  paramsOf: (spec: LayoutSpec) => Readonly<{ params: P }> | null;
}>;

export function defineLayoutSpec<P>(def: LayoutSpecDefinition<P>): LayoutSpecType<P> {
  const owned = new WeakMap<LayoutSpec, Readonly<{ params: P }>>();
  const paramsEqual = def.equals ?? shallowEqual;
  const record = def.record;

  function paramsOf(spec: LayoutSpec): Readonly<{ params: P }> | null {
    return owned.get(spec) ?? null;
  }

  function create(params: P, options?: LayoutSpecOptions): LayoutSpec {
    const spec: LayoutSpec = Object.freeze({
      typeTag: def.typeTag,
      constraint: options?.constraint ?? CONSTRAINT_NONE,
      cacheable: def.cacheable ?? true,
      clipsChildren: options?.clipsChildren ?? def.clipsChildren ?? false,
      measure(input: LayoutInput, output: LayoutOutput): LayoutResult<Size> {
        return def.measure(params, input, output);
      },
      record(input: RecordInput): void {
        if (record) record(params, input);
      },
      equals(other: LayoutSpec): boolean {
        if (other === spec) return true;
        const theirs = paramsOf(other);
        if (theirs === null) return false;
        return (
          other.clipsChildren === spec.clipsChildren &&
          constraintEquals(other.constraint, spec.constraint) &&
          paramsEqual(params, theirs.params)
        );
      },
    });
    owned.set(spec, Object.freeze({ params }));
    return spec;
  }

  return Object.freeze({ typeTag: def.typeTag, create, paramsOf });
}

/** Type tag and parameters must both match. */
export function sameLayoutSpec(a: LayoutSpec | null, b: LayoutSpec | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.typeTag === b.typeTag && a.equals(b);
}

/**
 * Used for nodes that declare no spec: children are stacked at the origin
 * against this node's constraint, and each axis resolves around the largest
 * child extent.
 */
export const defaultLayout: LayoutSpecType<null> = defineLayoutSpec<null>({
  typeTag: "weft:default",
  measure(_params, input, output) {
    let contentW = 0;
    let contentH = 0;
    if (input.children.length > 0) {
      const requests: ChildMeasureRequest[] = input.children.map((child) => [
        child,
        input.constraint,
      ]);
      const sizes = input.measureChildren(requests);
      if (!sizes.ok) return sizes;
      for (let i = 0; i < input.children.length; i++) {
        const child = input.children[i];
        const size = sizes.value[i];
        if (child === undefined || size === undefined) continue;
        output.placeChild(child, ORIGIN);
        contentW = Math.max(contentW, size.w);
        contentH = Math.max(contentH, size.h);
      }
    }
    const w = resolveDimension(input.constraint.width, contentW);
    if (!w.ok) return w;
    const h = resolveDimension(input.constraint.height, contentH);
    if (!h.ok) return h;
    return layoutOk({ w: w.value, h: h.value });
  },
});

export const DEFAULT_LAYOUT_SPEC: LayoutSpec = defaultLayout.create(null);

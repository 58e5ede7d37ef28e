/**
 * packages/core/src/layout/constraint.ts — Sizing intent and its top-down merge.
 *
 * A node declares how it wants to be sized per axis; its parent resolves a
 * constraint for it; `mergeConstraint` combines the two. `Fixed` is never
 * overridden by an ancestor, `Wrap` never inherits an ancestor's minimum and
 * every `max` only ever tightens going down the tree.
 *
 * The merge is not commutative: `mergeConstraint(a, b)` is generally not
 * `mergeConstraint(b, a)`.
 */

import type { LayoutResult } from "./result.js";
import { layoutFail, layoutOk } from "./result.js";

/** Exact size in pixels. */
export type FixedDimension = Readonly<{ kind: "fixed"; value: number }>;
/** Size to content, within optional bounds. */
export type WrapDimension = Readonly<{ kind: "wrap"; min?: number; max?: number }>;
/** Take all available space, within optional bounds. */
export type FillDimension = Readonly<{ kind: "fill"; min?: number; max?: number }>;

export type DimensionValue = FixedDimension | WrapDimension | FillDimension;

export type Constraint = Readonly<{ width: DimensionValue; height: DimensionValue }>;

export function fixed(value: number): FixedDimension {
  return Object.freeze({ kind: "fixed", value });
}

export function wrap(min?: number, max?: number): WrapDimension {
  return Object.freeze(boundsOf("wrap", min, max));
}

export function fill(min?: number, max?: number): FillDimension {
  return Object.freeze(boundsOf("fill", min, max));
}

function boundsOf<K extends "wrap" | "fill">(
  kind: K,
  min: number | undefined,
  max: number | undefined,
): Readonly<{ kind: K; min?: number; max?: number }> {
  // Absent bounds are left off entirely so structurally equal values compare equal.
  if (min === undefined && max === undefined) return { kind };
  if (min === undefined) return { kind, max };
  if (max === undefined) return { kind, min };
  return { kind, min, max };
}

export function constraint(width: DimensionValue, height: DimensionValue): Constraint {
  return Object.freeze({ width, height });
}

/** Unbounded size-to-content on both axes. */
export const CONSTRAINT_NONE: Constraint = constraint(wrap(), wrap());

export function fixedConstraint(w: number, h: number): Constraint {
  return constraint(fixed(w), fixed(h));
}

/* --- Dimension accessors --- */

export function getMin(dim: DimensionValue): number | undefined {
  return dim.kind === "fixed" ? dim.value : dim.min;
}

export function getMax(dim: DimensionValue): number | undefined {
  return dim.kind === "fixed" ? dim.value : dim.max;
}

/** Upper bound in pixels, `fallback` when the axis is unbounded. */
export function toMaxPx(dim: DimensionValue, fallback: number): number {
  return getMax(dim) ?? fallback;
}

export function dimensionEquals(a: DimensionValue, b: DimensionValue): boolean {
  if (a === b) return true;
  if (a.kind === "fixed" || b.kind === "fixed") {
    return a.kind === "fixed" && b.kind === "fixed" && a.value === b.value;
  }
  return a.kind === b.kind && a.min === b.min && a.max === b.max;
}

export function constraintEquals(a: Constraint, b: Constraint): boolean {
  return a === b || (dimensionEquals(a.width, b.width) && dimensionEquals(a.height, b.height));
}

/* --- Merge --- */

function tighter(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

function looser(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

/**
 * Combine a child's declared dimension with its parent's resolved dimension.
 */
export function mergeDimension(child: DimensionValue, parent: DimensionValue): DimensionValue {
  switch (child.kind) {
    case "fixed":
      return child;
    case "wrap": {
      if (parent.kind === "fixed") {
        return wrap(child.min, tighter(child.max, parent.value));
      }
      return wrap(child.min, tighter(child.max, parent.max));
    }
    case "fill": {
      switch (parent.kind) {
        case "fixed":
          return fill(child.min, tighter(child.max, parent.value));
        case "wrap":
          return fill(child.min ?? parent.min, tighter(child.max, parent.max));
        case "fill": {
          const min = looser(child.min, parent.min);
          const max = tighter(child.max, parent.max);
          if (min !== undefined && max !== undefined && min > max) {
            return fill(max, max);
          }
          return fill(min, max);
        }
      }
    }
  }
}

/**
 * Merge per axis. Applied once per ancestor level during the measure pass;
 * results are never reused across different parent constraints.
 */
export function mergeConstraint(child: Constraint, parent: Constraint): Constraint {
  const width = mergeDimension(child.width, parent.width);
  const height = mergeDimension(child.height, parent.height);
  if (width === child.width && height === child.height) return child;
  return constraint(width, height);
}

/* --- Resolution --- */

/** Smallest size a constraint allows: `Fixed` value, otherwise `min` or 0. */
export function minSizeFromConstraint(c: Constraint): { w: number; h: number } {
  return { w: getMin(c.width) ?? 0, h: getMin(c.height) ?? 0 };
}

/**
 * Resolve one axis to concrete pixels given the content's natural extent.
 *
 * `Fill` takes its maximum; a `Fill` axis with no maximum anywhere in the
 * ancestor chain cannot be resolved and fails with `WEFT_UNRESOLVABLE_FILL`.
 */
export function resolveDimension(dim: DimensionValue, content: number): LayoutResult<number> {
  switch (dim.kind) {
    case "fixed":
      return layoutOk(dim.value);
    case "wrap": {
      let v = Math.max(content, dim.min ?? 0);
      if (dim.max !== undefined) v = Math.min(v, dim.max);
      return layoutOk(v);
    }
    case "fill": {
      if (dim.max === undefined) {
        return layoutFail(
          "WEFT_UNRESOLVABLE_FILL",
          `fill dimension ${describeDimension(dim)} has no resolvable maximum`,
        );
      }
      return layoutOk(Math.max(dim.max, dim.min ?? 0));
    }
  }
}

export function describeDimension(dim: DimensionValue): string {
  if (dim.kind === "fixed") return `Fixed(${dim.value})`;
  const name = dim.kind === "wrap" ? "Wrap" : "Fill";
  return `${name}{min:${dim.min ?? "-"},max:${dim.max ?? "-"}}`;
}

export function describeConstraint(c: Constraint): string {
  return `${describeDimension(c.width)} x ${describeDimension(c.height)}`;
}

/**
 * packages/core/src/layout/geometry.ts — Geometric primitives.
 *
 * All values are integer device pixels. Positions may be negative (content
 * scrolled or placed off-screen); sizes never are.
 */

/** Point in pixels. */
export type Position = Readonly<{ x: number; y: number }>;

/** Width and height in pixels. */
export type Size = Readonly<{ w: number; h: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export const ORIGIN: Position = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });

export function sizeEquals(a: Size | null, b: Size | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.w === b.w && a.h === b.h;
}

export function positionEquals(a: Position | null, b: Position | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.x === b.x && a.y === b.y;
}

export function addPositions(a: Position, b: Position): Position {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function rectFrom(pos: Position, size: Size): Rect {
  return { x: pos.x, y: pos.y, w: size.w, h: size.h };
}

export function isEmptyRect(r: Rect): boolean {
  return r.w <= 0 || r.h <= 0;
}

/** Intersection of two rects; a zero-area rect when they do not overlap. */
export function intersectRects(a: Rect, b: Rect): Rect {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  return { x: x0, y: y0, w: Math.max(0, x1 - x0), h: Math.max(0, y1 - y0) };
}

/** True when the rects share no area. */
export function rectsDisjoint(a: Rect, b: Rect): boolean {
  return (
    a.x + a.w <= b.x || b.x + b.w <= a.x || a.y + a.h <= b.y || b.y + b.h <= a.y
  );
}

/** Half-open containment: the right and bottom edges are outside. */
export function rectContains(r: Rect, p: Position): boolean {
  return p.x >= r.x && p.y >= r.y && p.x < r.x + r.w && p.y < r.y + r.h;
}

export function isValidSize(v: unknown): v is Size {
  if (typeof v !== "object" || v === null) return false;
  const w: unknown = Reflect.get(v, "w");
  const h: unknown = Reflect.get(v, "h");
  return isNonNegativeInt(w) && isNonNegativeInt(h);
}

function isNonNegativeInt(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

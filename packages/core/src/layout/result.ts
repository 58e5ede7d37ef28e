/**
 * packages/core/src/layout/result.ts — Layout operation results.
 *
 * Measurement reports failures as values so a parent spec can substitute a
 * fallback for a failed child. Unhandled failures reach the frame boundary.
 */

export type LayoutFatalCode =
  /** Generic failure for a layout spec's own checks. */
  | "WEFT_MEASURE_FAILED"
  | "WEFT_UNRESOLVABLE_FILL"
  | "WEFT_INVALID_SIZE"
  | "WEFT_NODE_NOT_FOUND";

/** Fatal error carried by a failed layout operation. */
export type LayoutFatal = Readonly<{ code: LayoutFatalCode; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

export function layoutOk<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function layoutFail(code: LayoutFatalCode, detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}

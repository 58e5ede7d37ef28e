/**
 * Error types for weft.
 *
 * Violations of engine invariants surface as `WeftError` instances with a
 * stable `code`. Layout measurement reports failures as values (see
 * `LayoutResult`) and only becomes a thrown `WeftError` at the frame boundary.
 */

// =============================================================================
// WeftErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all runtime violations.
 */
export type WeftErrorCode =
  | "WEFT_INVALID_CONFIG"
  | "WEFT_INVALID_STATE"
  | "WEFT_REENTRANT_FRAME"
  | "WEFT_BUILD_OUTSIDE_FRAME"
  | "WEFT_DUPLICATE_KEY"
  | "WEFT_REMEMBER_ORDER"
  | "WEFT_MEASURE_FAILED"
  | "WEFT_UNRESOLVABLE_FILL"
  | "WEFT_INVALID_SIZE"
  | "WEFT_NODE_NOT_FOUND"
  | "WEFT_USER_CODE_THROW";

// =============================================================================
// WeftError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class WeftError extends Error {
  override readonly name = "WeftError";
  readonly code: WeftErrorCode;

  constructor(code: WeftErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WeftError);
    }
  }
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}

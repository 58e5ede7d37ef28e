/**
 * @weft/core
 *
 * Incremental recomputation engine for a retained-mode UI runtime.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { WeftError, type WeftErrorCode, describeThrown } from "./errors.js";

// =============================================================================
// Runtime
// =============================================================================

export { type Runtime, createRuntime } from "./runtime/runtime.js";
export {
  type RuntimeConfig,
  type ResolvedRuntimeConfig,
  resolveRuntimeConfig,
} from "./runtime/config.js";
export {
  type BuildMode,
  type FrameBuildStats,
  type FrameInput,
  type FrameOutput,
  type RedrawReason,
  EMPTY_BUILD_STATS,
  REDRAW_REASONS,
  isRedrawReason,
} from "./runtime/frame.js";
export type { BuildContext } from "./runtime/buildContext.js";
export {
  type Component,
  type ComponentDefinition,
  type PropsEquality,
  type ReplayDescriptor,
  type ReplayHost,
  type ReuseCandidate,
  type ReuseDecision,
  decideReuse,
  defineComponent,
} from "./runtime/replay.js";
export type { State } from "./runtime/remember.js";
export { refEqual, shallowEqual } from "./runtime/equality.js";

// =============================================================================
// Identity, fingerprints and the node arena
// =============================================================================

export { type Hash64, hashParts, hashString } from "./runtime/hash.js";
export {
  type ComponentTypeId,
  type InstanceKey,
  type NodeHandle,
  type NodeIdentity,
  type UserKey,
  ROOT_PARENT_KEY,
  componentTypeId,
  deriveInstanceKey,
  identityEquals,
} from "./runtime/identity.js";
export {
  type FlowSite,
  type FlowSites,
  type MarkerId,
  type MarkerPath,
  type OpenMarker,
  type SiteId,
  FingerprintRecorder,
  compareFingerprints,
  createFlowSites,
  isReuseEligible,
  markerId,
  markerIds,
} from "./runtime/fingerprint.js";
export {
  type ComponentNode,
  type NodeFrameMeta,
  type NodeRegistry,
  type NodeRegistryOptions,
  type ScopeExit,
  createNodeRegistry,
} from "./runtime/nodeRegistry.js";
export { type DirtySets, computeDirtySets } from "./runtime/dirtySet.js";

// =============================================================================
// Layout
// =============================================================================

export {
  type Position,
  type Rect,
  type Size,
  ORIGIN,
  ZERO_SIZE,
  intersectRects,
  isValidSize,
  rectContains,
  rectFrom,
  sizeEquals,
} from "./layout/geometry.js";
export {
  type Constraint,
  type DimensionValue,
  type FillDimension,
  type FixedDimension,
  type WrapDimension,
  CONSTRAINT_NONE,
  constraint,
  constraintEquals,
  describeConstraint,
  describeDimension,
  dimensionEquals,
  fill,
  fixed,
  fixedConstraint,
  getMax,
  getMin,
  mergeConstraint,
  mergeDimension,
  minSizeFromConstraint,
  resolveDimension,
  toMaxPx,
  wrap,
} from "./layout/constraint.js";
export {
  type LayoutFatal,
  type LayoutFatalCode,
  type LayoutResult,
  layoutFail,
  layoutOk,
} from "./layout/result.js";
export {
  type ChildMeasureRequest,
  type LayoutInput,
  type LayoutOutput,
  type LayoutSpec,
  type LayoutSpecDefinition,
  type LayoutSpecOptions,
  type LayoutSpecType,
  type RecordInput,
  DEFAULT_LAYOUT_SPEC,
  defaultLayout,
  defineLayoutSpec,
  sameLayoutSpec,
} from "./layout/layoutSpec.js";
export {
  type LayoutCacheOutcome,
  type LayoutFrameDiagnostics,
  EMPTY_LAYOUT_DIAGNOSTICS,
  LAYOUT_CACHE_OUTCOMES,
  LayoutDiagnosticsCollector,
  sumOutcomeCounters,
} from "./layout/diagnostics.js";
export {
  type ChildMeasurement,
  type ChildPlacement,
  type LayoutCacheEntry,
  type LayoutCacheLookup,
  LayoutCache,
} from "./layout/measureCache.js";
export { type MeasureContext, measureNode } from "./layout/measure.js";

// =============================================================================
// Recording and input
// =============================================================================

export type {
  ClipPopOp,
  ClipPushOp,
  DrawFragment,
  DrawOp,
  FrameOp,
  Rgba,
} from "./render/fragment.js";
export { type RecordResult, recordFrame } from "./render/record.js";
export {
  type CursorEvent,
  type CursorEventContent,
  type CursorIcon,
  type ImeEvent,
  type ImeRequest,
  type InputHandler,
  type InputHandlerInput,
  type KeyState,
  type KeyboardEvent,
  type Modifiers,
  type MouseButton,
  type WindowRequests,
  NO_MODIFIERS,
} from "./input/events.js";

// =============================================================================
// Diagnostics
// =============================================================================

export {
  type ComponentPhases,
  type ProfilerComponentRecord,
  type ProfilerFrameRecord,
  type ProfilerRecord,
  type ProfilerSink,
  type ProfilerWakeRecord,
  type WakeSource,
  PROFILER_FORMAT_NAME,
  PROFILER_FORMAT_VERSION,
} from "./perf/profiler.js";
export { envFlag, readEnv } from "./perf/env.js";

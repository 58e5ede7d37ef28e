/**
 * packages/core/src/layout/diagnostics.ts — Per-frame layout counters.
 *
 * Every `measureNode` call lands in exactly one `LayoutCacheOutcome`, so the
 * outcome counters always sum to `measureNodeCalls`. Stores are counted
 * separately; a store follows a miss.
 */

export type LayoutCacheOutcome =
  | "hit-direct"
  | "hit-boundary"
  | "miss-no-entry"
  | "miss-constraint"
  | "miss-dirty-self"
  | "miss-child-size"
  | "non-cacheable";

export const LAYOUT_CACHE_OUTCOMES: readonly LayoutCacheOutcome[] = Object.freeze([
  "hit-direct",
  "hit-boundary",
  "miss-no-entry",
  "miss-constraint",
  "miss-dirty-self",
  "miss-child-size",
  "non-cacheable",
]);

export type LayoutFrameDiagnostics = Readonly<{
  dirtyNodesParam: number;
  dirtyNodesStructural: number;
  dirtyNodesWithAncestors: number;
  dirtyExpandNs: number;
  measureNodeCalls: number;
  cacheHitsDirect: number;
  cacheHitsBoundary: number;
  cacheMissNoEntry: number;
  cacheMissConstraint: number;
  cacheMissDirtySelf: number;
  cacheMissChildSize: number;
  cacheStoreCount: number;
  cacheDropNonCacheableCount: number;
}>;

export const EMPTY_LAYOUT_DIAGNOSTICS: LayoutFrameDiagnostics = Object.freeze({
  dirtyNodesParam: 0,
  dirtyNodesStructural: 0,
  dirtyNodesWithAncestors: 0,
  dirtyExpandNs: 0,
  measureNodeCalls: 0,
  cacheHitsDirect: 0,
  cacheHitsBoundary: 0,
  cacheMissNoEntry: 0,
  cacheMissConstraint: 0,
  cacheMissDirtySelf: 0,
  cacheMissChildSize: 0,
  cacheStoreCount: 0,
  cacheDropNonCacheableCount: 0,
});

type OutcomeCounter = Exclude<
  keyof LayoutFrameDiagnostics,
  | "dirtyNodesParam"
  | "dirtyNodesStructural"
  | "dirtyNodesWithAncestors"
  | "dirtyExpandNs"
  | "measureNodeCalls"
  | "cacheStoreCount"
>;

const COUNTER_BY_OUTCOME: Readonly<Record<LayoutCacheOutcome, OutcomeCounter>> = Object.freeze({
  "hit-direct": "cacheHitsDirect",
  "hit-boundary": "cacheHitsBoundary",
  "miss-no-entry": "cacheMissNoEntry",
  "miss-constraint": "cacheMissConstraint",
  "miss-dirty-self": "cacheMissDirtySelf",
  "miss-child-size": "cacheMissChildSize",
  "non-cacheable": "cacheDropNonCacheableCount",
});

export class LayoutDiagnosticsCollector {
  private counts: { -readonly [K in keyof LayoutFrameDiagnostics]: number } = {
    ...EMPTY_LAYOUT_DIAGNOSTICS,
  };

  reset(): void {
    this.counts = { ...EMPTY_LAYOUT_DIAGNOSTICS };
  }

  setDirtyCounts(param: number, structural: number, withAncestors: number, expandNs: number): void {
    this.counts.dirtyNodesParam = param;
    this.counts.dirtyNodesStructural = structural;
    this.counts.dirtyNodesWithAncestors = withAncestors;
    this.counts.dirtyExpandNs = expandNs;
  }

  recordOutcome(outcome: LayoutCacheOutcome): void {
    this.counts.measureNodeCalls++;
    this.counts[COUNTER_BY_OUTCOME[outcome]]++;
  }

  recordStore(): void {
    this.counts.cacheStoreCount++;
  }

  snapshot(): LayoutFrameDiagnostics {
    return Object.freeze({ ...this.counts });
  }
}

/** Sum of the outcome counters; equals `measureNodeCalls` for any frame. */
export function sumOutcomeCounters(d: LayoutFrameDiagnostics): number {
  let total = 0;
  for (const outcome of LAYOUT_CACHE_OUTCOMES) total += d[COUNTER_BY_OUTCOME[outcome]];
  return total;
}

/**
 * packages/node/src/profiler/summarize.ts — Offline summary of a JSONL
 * profile.
 *
 * Blank lines are ignored. Lines that are not JSON objects, or records of an
 * unknown type, are counted in `malformedLines` and otherwise skipped.
 */

import type { BuildMode } from "@weft/core";
import { type ProfileHeader, isRecordObject, parseJsonLine, readProfileHeader } from "./jsonl.js";

export type ComponentMeasureTotal = Readonly<{
  fnName: string;
  /** Measure time minus the direct children's measure time, summed over every frame and instance. */
  selfNs: number;
  /** Measure time including nested components. */
  inclusiveNs: number;
  samples: number;
}>;

export type ProfileSummary = Readonly<{
  header: ProfileHeader | null;
  frames: number;
  wakes: number;
  malformedLines: number;
  framesByMode: Readonly<Record<BuildMode, number>>;
  averageFrameNs: number | null;
  /** (direct + boundary hits) / measure calls over all frames. */
  cacheHitRatio: number | null;
  topMeasure: readonly ComponentMeasureTotal[];
}>;

export type SummarizeOptions = Readonly<{
  /** Number of entries in `topMeasure`, ranked by `selfNs`. Default 5. */
  top?: number;
}>;

const DEFAULT_TOP = 5;

function isBuildMode(v: unknown): v is BuildMode {
  return v === "FullInitial" || v === "PartialReplay" || v === "SkipNoInvalidation";
}

function num(obj: Readonly<Record<string, unknown>>, key: string): number {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

type MeasureAcc = { selfNs: number; inclusiveNs: number; samples: number };

function measureOf(item: unknown): number | null {
  if (!isRecordObject(item) || !isRecordObject(item.phases)) return null;
  const v = item.phases.measureNs;
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function walkComponents(value: unknown, totals: Map<string, MeasureAcc>): void {
  if (!Array.isArray(value)) return;
  for (const item of value) {
    if (!isRecordObject(item)) continue;
    const { fnName, children } = item;
    const measureNs = measureOf(item);
    if (typeof fnName === "string" && measureNs !== null) {
      let childNs = 0;
      if (Array.isArray(children)) {
        for (const child of children) childNs += measureOf(child) ?? 0;
      }
      const acc = totals.get(fnName) ?? { selfNs: 0, inclusiveNs: 0, samples: 0 };
      acc.selfNs += Math.max(0, measureNs - childNs);
      acc.inclusiveNs += measureNs;
      acc.samples++;
      totals.set(fnName, acc);
    }
    walkComponents(children, totals);
  }
}

export function summarizeProfile(lines: Iterable<string>, opts: SummarizeOptions = {}): ProfileSummary {
  const top = opts.top ?? DEFAULT_TOP;
  const framesByMode: Record<BuildMode, number> = {
    FullInitial: 0,
    PartialReplay: 0,
    SkipNoInvalidation: 0,
  };
  const totals = new Map<string, MeasureAcc>();
  let header: ProfileHeader | null = null;
  let seenContent = false;
  let frames = 0;
  let wakes = 0;
  let malformedLines = 0;
  let frameNs = 0;
  let measureCalls = 0;
  let hits = 0;

  for (const line of lines) {
    if (line.trim().length === 0) continue;
    const obj = parseJsonLine(line);
    const first = !seenContent;
    seenContent = true;
    if (obj === null) {
      malformedLines++;
      continue;
    }
    if (first) {
      const h = readProfileHeader(obj);
      if (h !== null) {
        header = h;
        continue;
      }
    }

    const { type, buildMode, layoutDiagnostics, components } = obj;
    if (type === "wake") {
      wakes++;
      continue;
    }
    if (type !== "frame" || !isBuildMode(buildMode)) {
      malformedLines++;
      continue;
    }
    frames++;
    framesByMode[buildMode]++;
    frameNs += num(obj, "frameTotalNs");
    if (isRecordObject(layoutDiagnostics)) {
      measureCalls += num(layoutDiagnostics, "measureNodeCalls");
      hits += num(layoutDiagnostics, "cacheHitsDirect") + num(layoutDiagnostics, "cacheHitsBoundary");
    }
    walkComponents(components, totals);
  }

  const topMeasure: ComponentMeasureTotal[] = Array.from(totals, ([fnName, acc]) => ({
    fnName,
    selfNs: acc.selfNs,
    inclusiveNs: acc.inclusiveNs,
    samples: acc.samples,
  }))
    .sort((a, b) => b.selfNs - a.selfNs || (a.fnName < b.fnName ? -1 : a.fnName > b.fnName ? 1 : 0))
    .slice(0, Math.max(0, top));

  return Object.freeze({
    header,
    frames,
    wakes,
    malformedLines,
    framesByMode: Object.freeze(framesByMode),
    averageFrameNs: frames > 0 ? frameNs / frames : null,
    cacheHitRatio: measureCalls > 0 ? hits / measureCalls : null,
    topMeasure: Object.freeze(topMeasure),
  });
}

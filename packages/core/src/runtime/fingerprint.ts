/**
 * packages/core/src/runtime/fingerprint.ts — Control-flow fingerprints.
 *
 * Every branch or loop site in a component body is allocated a site id once,
 * at definition time. Entering the site during an invocation pushes a marker
 * `hash(siteId, visitIndex)`; the ordered list of markers entered is that
 * invocation's fingerprint.
 *
 * A child created under a marker path is only reused next time if every
 * marker on that path sits at the same position in the parent's previous
 * fingerprint, and the parent opened the same path again. Everything else is
 * new (marker absent) or discarded and rebuilt (order or count shifted).
 */

import { WeftError } from "../errors.js";
import { type Hash64, hashParts } from "./hash.js";

export type SiteId = Hash64;
export type MarkerId = Hash64;

/** A branch/loop location allocated once per definition. */
export type FlowSite = Readonly<{ id: SiteId; label: string | undefined }>;

/** Allocator of site ids for one component definition. */
export type FlowSites = Readonly<{
  seed: Hash64;
  next: (label?: string) => FlowSite;
}>;

/** Marker currently open in a body, with its index in the fingerprint. */
export type OpenMarker = Readonly<{ id: MarkerId; position: number }>;

export type MarkerPath = readonly OpenMarker[];

export function createFlowSites(seedSource: string): FlowSites {
  const seed = hashParts(["flow-seed", seedSource]);
  let counter = 0;
  return Object.freeze({
    seed,
    next(label?: string): FlowSite {
      const id = hashParts([seed, counter]);
      counter++;
      return Object.freeze({ id, label });
    },
  });
}

export function markerId(site: SiteId, visitIndex: number): MarkerId {
  return hashParts([site, visitIndex]);
}

/**
 * Index of the first differing marker, or -1 when the fingerprints are equal.
 * A strict prefix diverges at the shorter length.
 */
export function compareFingerprints(
  prev: readonly MarkerId[],
  next: readonly MarkerId[],
): number {
  const n = Math.min(prev.length, next.length);
  for (let i = 0; i < n; i++) {
    if (prev[i] !== next[i]) return i;
  }
  return prev.length === next.length ? -1 : n;
}

export function markerIds(path: MarkerPath): MarkerId[] {
  const out: MarkerId[] = [];
  for (const m of path) out.push(m.id);
  return out;
}

/**
 * Reuse eligibility of a previous child.
 *
 * `createdUnder` is the marker path the child was created under last time;
 * `openNow` is the path open at this call.
 */
export function isReuseEligible(
  previousFingerprint: readonly MarkerId[],
  createdUnder: MarkerPath,
  openNow: MarkerPath,
): boolean {
  if (createdUnder.length !== openNow.length) return false;
  for (let i = 0; i < createdUnder.length; i++) {
    const before = createdUnder[i];
    const now = openNow[i];
    if (before === undefined || now === undefined) return false;
    if (before.id !== now.id || before.position !== now.position) return false;
    if (previousFingerprint[before.position] !== before.id) return false;
  }
  return true;
}

/**
 * Records one invocation's markers. Visit indices count per site, so a loop
 * site visited three times yields three distinct markers.
 */
export class FingerprintRecorder {
  private readonly markers: MarkerId[] = [];
  private readonly open: OpenMarker[] = [];
  private readonly visits = new Map<SiteId, number>();

  enter(site: FlowSite): OpenMarker {
    const visitIndex = this.visits.get(site.id) ?? 0;
    this.visits.set(site.id, visitIndex + 1);
    const marker: OpenMarker = Object.freeze({
      id: markerId(site.id, visitIndex),
      position: this.markers.length,
    });
    this.markers.push(marker.id);
    this.open.push(marker);
    return marker;
  }

  exit(marker: OpenMarker): void {
    const top = this.open[this.open.length - 1];
    if (top !== marker) {
      throw new WeftError(
        "WEFT_INVALID_STATE",
        "FingerprintRecorder: markers must close in reverse order of entry",
      );
    }
    this.open.pop();
  }

  openPath(): MarkerPath {
    return this.open.slice();
  }

  depth(): number {
    return this.open.length;
  }

  finish(): readonly MarkerId[] {
    return Object.freeze(this.markers.slice());
  }
}

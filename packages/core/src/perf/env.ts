/**
 * packages/core/src/perf/env.ts — Runtime-agnostic environment lookups.
 *
 * Core never imports `node:*`; flags and clocks are read through
 * `globalThis` so the engine runs unchanged in any JS host.
 */

type EnvHost = Readonly<{
  process?: Readonly<{ env?: Readonly<Record<string, string | undefined>> }>;
}>;

type ClockHost = Readonly<{ performance?: Readonly<{ now?: () => number }> }>;

export function readEnv(name: string): string | undefined {
  try {
    const g: EnvHost = globalThis;
    return g.process?.env?.[name];
  } catch {
    return undefined;
  }
}

export function envFlag(name: string): boolean {
  const raw = readEnv(name);
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}

/** Monotonic milliseconds when available, wall clock otherwise. */
export function nowMs(): number {
  try {
    const g: ClockHost = globalThis;
    const perf = g.performance;
    if (perf !== undefined && typeof perf.now === "function") return perf.now();
  } catch {
    // no-op
  }
  return Date.now();
}

export function msToNs(ms: number): number {
  return Math.max(0, Math.round(ms * 1e6));
}

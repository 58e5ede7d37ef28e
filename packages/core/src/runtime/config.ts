/**
 * packages/core/src/runtime/config.ts — Runtime configuration.
 *
 * `resolveRuntimeConfig` validates user input against frozen defaults.
 * Invalid values throw `WeftError("WEFT_INVALID_CONFIG")` at creation time.
 */

import { WeftError } from "../errors.js";
import { envFlag, nowMs } from "../perf/env.js";
import type { ProfilerSink } from "../perf/profiler.js";

export type RuntimeConfig = Readonly<{
  /** Enables dev warnings. Defaults to the `WEFT_DEV` environment flag. */
  devMode?: boolean;
  /** Receives warnings and logged failures. Defaults to `console.warn`. */
  warn?: (message: string) => void;
  /** Cache entries unseen for more layout passes than this are evicted. */
  layoutCacheMaxPassGap?: number;
  /** Receives one record per frame plus wake records. */
  profiler?: ProfilerSink | null;
  /** Millisecond clock used for every timing. */
  now?: () => number;
  /** Called when remembered state or `requestRedraw` makes a frame necessary. */
  onRequestFrame?: () => void;
}>;

export type ResolvedRuntimeConfig = Readonly<{
  devMode: boolean;
  warn: (message: string) => void;
  layoutCacheMaxPassGap: number;
  profiler: ProfilerSink | null;
  now: () => number;
  onRequestFrame: (() => void) | null;
}>;

function defaultWarn(message: string): void {
  console.warn(message);
}

const DEFAULT_CONFIG: ResolvedRuntimeConfig = Object.freeze({
  devMode: false,
  warn: defaultWarn,
  layoutCacheMaxPassGap: 1,
  profiler: null,
  now: nowMs,
  onRequestFrame: null,
});

function invalidConfig(detail: string): never {
  throw new WeftError("WEFT_INVALID_CONFIG", detail);
}

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidConfig(`${name} must be a non-negative integer`);
  return v;
}

function requireFunction<F>(name: string, v: F): F {
  if (typeof v !== "function") invalidConfig(`${name} must be a function`);
  return v;
}

export function resolveRuntimeConfig(config: RuntimeConfig | undefined): ResolvedRuntimeConfig {
  const devMode = config?.devMode ?? envFlag("WEFT_DEV");
  if (!config) return devMode ? Object.freeze({ ...DEFAULT_CONFIG, devMode }) : DEFAULT_CONFIG;

  const warn = config.warn === undefined ? DEFAULT_CONFIG.warn : requireFunction("warn", config.warn);
  const layoutCacheMaxPassGap =
    config.layoutCacheMaxPassGap === undefined
      ? DEFAULT_CONFIG.layoutCacheMaxPassGap
      : requireNonNegativeInt("layoutCacheMaxPassGap", config.layoutCacheMaxPassGap);
  const profiler = config.profiler ?? null;
  if (profiler !== null && typeof profiler.send !== "function") {
    invalidConfig("profiler must provide a send(record) function");
  }
  const now = config.now === undefined ? DEFAULT_CONFIG.now : requireFunction("now", config.now);
  const onRequestFrame =
    config.onRequestFrame === undefined
      ? null
      : requireFunction("onRequestFrame", config.onRequestFrame);

  return Object.freeze({
    devMode,
    warn,
    layoutCacheMaxPassGap,
    profiler,
    now,
    onRequestFrame,
  });
}

/**
 * packages/node/src/profiler/env.ts — Environment-driven profiler setup.
 *
 *   WEFT_PROFILE=1                 enable the JSONL profiler
 *   WEFT_PROFILE_OUTPUT=<path>     output file (default: weft-profile.jsonl)
 */

import { resolve } from "node:path";
import {
  type SpawnProfileWriter,
  type WorkerProfilerSink,
  createWorkerProfilerSink,
} from "./workerSink.js";

export const DEFAULT_PROFILE_OUTPUT = "weft-profile.jsonl";

export type ProfilerEnv = Readonly<{
  enabled: boolean;
  outputPath: string;
}>;

type Env = Readonly<Record<string, string | undefined>>;

function readVar(env: Env, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function isOn(value: string | null): boolean {
  if (value === null) return false;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function readProfilerEnv(env: Env = process.env, cwd: string = process.cwd()): ProfilerEnv {
  const output = readVar(env, "WEFT_PROFILE_OUTPUT") ?? DEFAULT_PROFILE_OUTPUT;
  return Object.freeze({
    enabled: isOn(readVar(env, "WEFT_PROFILE")),
    outputPath: resolve(cwd, output),
  });
}

export type ProfilerFromEnvOptions = Readonly<{
  env?: Env;
  cwd?: string;
  warn?: (message: string) => void;
  spawn?: SpawnProfileWriter;
}>;

/** A worker-backed sink when `WEFT_PROFILE` is on, otherwise `null`. */
export function createProfilerSinkFromEnv(opts: ProfilerFromEnvOptions = {}): WorkerProfilerSink | null {
  const cfg = readProfilerEnv(opts.env, opts.cwd);
  if (!cfg.enabled) return null;
  return createWorkerProfilerSink({
    outputPath: cfg.outputPath,
    ...(opts.warn !== undefined ? { warn: opts.warn } : {}),
    ...(opts.spawn !== undefined ? { spawn: opts.spawn } : {}),
  });
}

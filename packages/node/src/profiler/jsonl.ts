/**
 * packages/node/src/profiler/jsonl.ts — JSONL profile framing.
 *
 * A profile file is one header line followed by one line per
 * `ProfilerRecord`, each a single JSON object terminated by `\n`.
 */

import {
  PROFILER_FORMAT_NAME,
  PROFILER_FORMAT_VERSION,
  type ProfilerRecord,
} from "@weft/core";

export type ProfileHeader = Readonly<{
  version: number;
  format: string;
  generatedAt: string;
}>;

export function createProfileHeader(now: Date = new Date()): ProfileHeader {
  return Object.freeze({
    version: PROFILER_FORMAT_VERSION,
    format: PROFILER_FORMAT_NAME,
    generatedAt: now.toISOString(),
  });
}

export function formatProfileLine(value: ProfileHeader | ProfilerRecord): string {
  return `${JSON.stringify(value)}\n`;
}

export function isRecordObject(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Parses one line; `null` for blank or malformed lines. */
export function parseJsonLine(line: string): Readonly<Record<string, unknown>> | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecordObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function readProfileHeader(obj: Readonly<Record<string, unknown>>): ProfileHeader | null {
  const { version, format, generatedAt } = obj;
  if (typeof version !== "number" || typeof format !== "string") return null;
  if (typeof generatedAt !== "string") return null;
  if (format !== PROFILER_FORMAT_NAME) return null;
  return { version, format, generatedAt };
}

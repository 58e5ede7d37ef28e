/**
 * packages/core/src/perf/frameAudit.ts — Optional per-frame audit logging.
 *
 * Emits one NDJSON line per audit point (build mode, teardown, cache
 * summary) when enabled. Lines go to `globalThis.__weftFrameAuditSink` when
 * installed, otherwise to stderr.
 *
 * Enable with:
 *   WEFT_FRAME_AUDIT=1
 */

import { envFlag, nowMs } from "./env.js";

export const FRAME_AUDIT_ENABLED = envFlag("WEFT_FRAME_AUDIT");

type AuditFields = Readonly<Record<string, unknown>>;

type AuditHost = Readonly<{
  __weftFrameAuditSink?: (line: string) => void;
  process?: Readonly<{ pid?: number; stderr?: Readonly<{ write?: (text: string) => unknown }> }>;
  console?: Readonly<{ error?: (msg?: unknown) => void }>;
}>;

export function formatFrameAudit(
  scope: string,
  stage: string,
  fields: AuditFields,
  pid: number | undefined,
): string {
  return JSON.stringify({
    ts: new Date().toISOString(),
    tMs: nowMs(),
    pid,
    layer: "core",
    scope,
    stage,
    ...fields,
  });
}

export function emitFrameAudit(scope: string, stage: string, fields: AuditFields): void {
  if (!FRAME_AUDIT_ENABLED) return;
  try {
    const g: AuditHost = globalThis;
    const pid = g.process?.pid;
    const line = formatFrameAudit(
      scope,
      stage,
      fields,
      typeof pid === "number" && Number.isInteger(pid) ? pid : undefined,
    );
    const sink = g.__weftFrameAuditSink;
    if (typeof sink === "function") {
      sink(line);
      return;
    }
    const stderr = g.process?.stderr;
    if (stderr !== undefined && typeof stderr.write === "function") {
      stderr.write(`${line}\n`);
      return;
    }
    g.console?.error?.(line);
  } catch {
    // Never break a frame due to optional diagnostics.
  }
}

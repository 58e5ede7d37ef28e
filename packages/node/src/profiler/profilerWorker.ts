/**
 * packages/node/src/profiler/profilerWorker.ts — Worker-thread entrypoint
 * that appends profile lines to a file.
 */

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parentPort, workerData } from "node:worker_threads";
import { isRecordObject } from "./jsonl.js";

function readOutputPath(data: unknown): string {
  const outputPath = isRecordObject(data) ? data.outputPath : undefined;
  if (typeof outputPath === "string" && outputPath.length > 0) return outputPath;
  throw new Error("profilerWorker: workerData.outputPath must be a non-empty string");
}

if (parentPort === null) {
  throw new Error("profilerWorker: parentPort is null (not running in worker_threads)");
}

const port = parentPort;
const outputPath = readOutputPath(workerData);
mkdirSync(dirname(outputPath), { recursive: true });
writeFileSync(outputPath, "");

port.on("message", (m: unknown) => {
  if (!isRecordObject(m)) return;
  const { type, line } = m;
  if (type === "line" && typeof line === "string") {
    appendFileSync(outputPath, line);
    return;
  }
  if (type === "close") port.close();
});

/**
 * packages/node/src/profiler/workerSink.ts — Profiler sink backed by a
 * worker thread.
 *
 * `send` serializes the record on the calling thread and posts the line
 * without waiting. A failed post or a worker error is reported through
 * `warn`; after a worker error every further record is dropped.
 */

import { Worker } from "node:worker_threads";
import { type ProfilerRecord, type ProfilerSink, describeThrown } from "@weft/core";
import { createProfileHeader, formatProfileLine } from "./jsonl.js";

export type ProfilerWorkerMessage =
  | Readonly<{ type: "line"; line: string }>
  | Readonly<{ type: "close" }>;

/** The part of a `Worker` the sink talks to. */
export type ProfileLinePort = Readonly<{
  postMessage: (message: ProfilerWorkerMessage) => void;
  /** Flushes pending lines and resolves once the writer is gone. */
  close: () => Promise<void>;
}>;

export type SpawnProfileWriter = (
  outputPath: string,
  onError: (err: unknown) => void,
) => ProfileLinePort;

export type CreateWorkerProfilerSinkOptions = Readonly<{
  outputPath: string;
  warn?: (message: string) => void;
  /** Timestamp for the header line. */
  now?: () => Date;
  spawn?: SpawnProfileWriter;
}>;

export type WorkerProfilerSinkStats = Readonly<{
  /** Lines handed to the worker, header included. */
  posted: number;
  dropped: number;
}>;

export type WorkerProfilerSink = ProfilerSink &
  Readonly<{
    close: () => Promise<void>;
    stats: () => WorkerProfilerSinkStats;
  }>;

function defaultWarn(message: string): void {
  console.warn(message);
}

type WorkerEntry = Readonly<{ url: URL; execArgv: string[] | undefined }>;

/**
 * Compiled builds load `profilerWorker.js` directly. From sources the parent's
 * loader hooks do not reach the worker, so a bootstrap registers tsx there.
 */
export function profilerWorkerEntry(moduleUrl: string = import.meta.url): WorkerEntry {
  if (moduleUrl.endsWith(".ts")) {
    return { url: new URL("./profilerWorker.bootstrap.mjs", moduleUrl), execArgv: [] };
  }
  return { url: new URL("./profilerWorker.js", moduleUrl), execArgv: undefined };
}

export const spawnProfilerWorker: SpawnProfileWriter = (outputPath, onError) => {
  const entry = profilerWorkerEntry();
  const worker = new Worker(entry.url, {
    workerData: { outputPath },
    ...(entry.execArgv !== undefined ? { execArgv: entry.execArgv } : {}),
  });
  let exited = false;
  worker.on("error", onError);
  worker.on("exit", () => {
    exited = true;
  });
  return Object.freeze({
    postMessage: (message: ProfilerWorkerMessage) => {
      worker.postMessage(message);
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (exited) {
          resolve();
          return;
        }
        worker.once("exit", () => resolve());
        worker.postMessage({ type: "close" });
      }),
  });
};

export function createWorkerProfilerSink(opts: CreateWorkerProfilerSinkOptions): WorkerProfilerSink {
  const warn = opts.warn ?? defaultWarn;
  const spawn = opts.spawn ?? spawnProfilerWorker;
  let posted = 0;
  let dropped = 0;
  let workerFailed = false;
  let closed = false;

  const port = spawn(opts.outputPath, (err) => {
    if (workerFailed) return;
    workerFailed = true;
    warn(`[weft][profiler] writer for ${opts.outputPath} failed: ${describeThrown(err)}`);
  });

  function post(line: string, label: string): void {
    if (closed || workerFailed) {
      dropped++;
      return;
    }
    try {
      port.postMessage({ type: "line", line });
      posted++;
    } catch (err) {
      dropped++;
      warn(`[weft][profiler] dropped ${label}: ${describeThrown(err)}`);
    }
  }

  post(formatProfileLine(createProfileHeader(opts.now?.())), "header");

  return Object.freeze({
    send(record: ProfilerRecord): void {
      post(formatProfileLine(record), `${record.type} record for frame ${record.frame}`);
    },
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await port.close();
    },
    stats(): WorkerProfilerSinkStats {
      return { posted, dropped };
    },
  });
}

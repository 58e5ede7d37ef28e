import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, createWarnCapture, describe, test } from "@weft/testkit";
import type { ProfilerWakeRecord } from "@weft/core";
import { createProfileHeader, formatProfileLine } from "../jsonl.js";
import { createWorkerProfilerSink, profilerWorkerEntry } from "../workerSink.js";
import { createFakeWriter, postedLines } from "./fakeWriter.js";

const AT = new Date("2026-03-04T05:06:07.000Z");
const WAKE: ProfilerWakeRecord = {
  type: "wake",
  frame: 3,
  source: "runtime",
  reasons: ["runtime-invalidation"],
};

function setup() {
  const writer = createFakeWriter();
  const capture = createWarnCapture();
  const sink = createWorkerProfilerSink({
    outputPath: "/tmp/profile.jsonl",
    warn: capture.warn,
    now: () => AT,
    spawn: writer.spawn,
  });
  return { writer, capture, sink };
}

describe("worker profiler sink", () => {
  test("posts the header line on creation", () => {
    const { writer, sink } = setup();
    assert.deepEqual(writer.paths, ["/tmp/profile.jsonl"]);
    assert.deepEqual(postedLines(writer), [formatProfileLine(createProfileHeader(AT))]);
    assert.deepEqual(sink.stats(), { posted: 1, dropped: 0 });
  });

  test("each record becomes one JSON line", () => {
    const { writer, sink } = setup();
    sink.send(WAKE);
    assert.equal(
      postedLines(writer)[1],
      '{"type":"wake","frame":3,"source":"runtime","reasons":["runtime-invalidation"]}\n',
    );
    assert.deepEqual(sink.stats(), { posted: 2, dropped: 0 });
  });

  test("a failed post is counted and logged", () => {
    const { writer, capture, sink } = setup();
    writer.failPosts = true;
    sink.send(WAKE);
    assert.deepEqual(capture.messages, ["[weft][profiler] dropped wake record for frame 3: Error: port closed"]);
    assert.deepEqual(sink.stats(), { posted: 1, dropped: 1 });
  });

  test("after a writer error every record is dropped and the error is logged once", () => {
    const { writer, capture, sink } = setup();
    writer.onError?.(new Error("EACCES"));
    writer.onError?.(new Error("EACCES again"));
    sink.send(WAKE);
    sink.send(WAKE);
    assert.deepEqual(capture.messages, [
      "[weft][profiler] writer for /tmp/profile.jsonl failed: Error: EACCES",
    ]);
    assert.deepEqual(sink.stats(), { posted: 1, dropped: 2 });
    assert.equal(postedLines(writer).length, 1);
  });

  test("close shuts the writer once and drops later records", async () => {
    const { writer, sink } = setup();
    await sink.close();
    await sink.close();
    assert.equal(writer.closes, 1);
    sink.send(WAKE);
    assert.deepEqual(sink.stats(), { posted: 1, dropped: 1 });
  });
});

describe("worker profiler sink - real worker", () => {
  test("source builds start the worker through the bootstrap, compiled builds load the .js body", () => {
    const fromSource = profilerWorkerEntry("file:///app/packages/node/src/profiler/workerSink.ts");
    assert.equal(fromSource.url.href, "file:///app/packages/node/src/profiler/profilerWorker.bootstrap.mjs");
    assert.deepEqual(fromSource.execArgv, []);

    const compiled = profilerWorkerEntry("file:///app/dist/node/src/profiler/workerSink.js");
    assert.equal(compiled.url.href, "file:///app/dist/node/src/profiler/profilerWorker.js");
    assert.equal(compiled.execArgv, undefined);
  });

  test("writes the header and each record to the output file", async () => {
    const dir = mkdtempSync(join(tmpdir(), "weft-profiler-test-"));
    try {
      const outputPath = join(dir, "nested", "profile.jsonl");
      const capture = createWarnCapture();
      const sink = createWorkerProfilerSink({ outputPath, warn: capture.warn, now: () => AT });
      sink.send(WAKE);
      await sink.close();

      assert.deepEqual(capture.messages, []);
      assert.equal(
        readFileSync(outputPath, "utf8"),
        formatProfileLine(createProfileHeader(AT)) +
          '{"type":"wake","frame":3,"source":"runtime","reasons":["runtime-invalidation"]}\n',
      );
      assert.deepEqual(sink.stats(), { posted: 2, dropped: 0 });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

import { assert, describe, test } from "@weft/testkit";
import { summarizeProfile } from "../summarize.js";

const HEADER = JSON.stringify({ version: 3, format: "weft-frame-profile", generatedAt: "2026-01-02T00:00:00.000Z" });

function frameLine(
  buildMode: string,
  frameTotalNs: number,
  diag: Readonly<{ calls: number; direct: number; boundary: number }>,
  components: unknown,
): string {
  return JSON.stringify({
    type: "frame",
    buildMode,
    frameTotalNs,
    layoutDiagnostics: {
      measureNodeCalls: diag.calls,
      cacheHitsDirect: diag.direct,
      cacheHitsBoundary: diag.boundary,
    },
    components,
  });
}

const node = (fnName: string, measureNs: number | null, children: unknown[] = []) => ({
  fnName,
  phases: { buildNs: null, measureNs, inputNs: null },
  children,
});

const LINES = [
  HEADER,
  frameLine("FullInitial", 100, { calls: 4, direct: 0, boundary: 0 }, [node("App", 50, [node("Leaf", 20)])]),
  JSON.stringify({ type: "wake", frame: 1, source: "runtime", reasons: ["runtime-invalidation"] }),
  "",
  "not json",
  frameLine("PartialReplay", 300, { calls: 4, direct: 2, boundary: 1 }, [node("App", 10, [node("Leaf", null)])]),
  JSON.stringify({ type: "frame", buildMode: "Sideways" }),
  JSON.stringify({ type: "mystery" }),
];

describe("summarizeProfile", () => {
  test("counts frames, wakes and malformed lines", () => {
    const s = summarizeProfile(LINES);
    assert.deepEqual(s.header, { version: 3, format: "weft-frame-profile", generatedAt: "2026-01-02T00:00:00.000Z" });
    assert.equal(s.frames, 2);
    assert.equal(s.wakes, 1);
    assert.equal(s.malformedLines, 3);
    assert.deepEqual(s.framesByMode, { FullInitial: 1, PartialReplay: 1, SkipNoInvalidation: 0 });
    assert.equal(s.averageFrameNs, 200);
    assert.equal(s.cacheHitRatio, 0.375);
  });

  test("ranks components by summed self measure time", () => {
    const s = summarizeProfile(LINES);
    assert.deepEqual(s.topMeasure, [
      { fnName: "App", selfNs: 40, inclusiveNs: 60, samples: 2 },
      { fnName: "Leaf", selfNs: 20, inclusiveNs: 20, samples: 1 },
    ]);
    assert.deepEqual(summarizeProfile(LINES, { top: 1 }).topMeasure, [
      { fnName: "App", selfNs: 40, inclusiveNs: 60, samples: 2 },
    ]);
  });

  test("a parent is not charged for its children's measure time", () => {
    const lines = [
      frameLine("FullInitial", 1, { calls: 0, direct: 0, boundary: 0 }, [
        node("Shell", 50, [node("Heavy", 45, [node("Tiny", 5)])]),
      ]),
    ];
    assert.deepEqual(summarizeProfile(lines).topMeasure, [
      { fnName: "Heavy", selfNs: 40, inclusiveNs: 45, samples: 1 },
      { fnName: "Shell", selfNs: 5, inclusiveNs: 50, samples: 1 },
      { fnName: "Tiny", selfNs: 5, inclusiveNs: 5, samples: 1 },
    ]);
  });

  test("ties break by name", () => {
    const lines = [
      frameLine("PartialReplay", 1, { calls: 0, direct: 0, boundary: 0 }, [node("Zed", 5), node("Abe", 5)]),
    ];
    assert.deepEqual(
      summarizeProfile(lines).topMeasure.map((t) => t.fnName),
      ["Abe", "Zed"],
    );
  });

  test("a header is only recognized on the first content line", () => {
    const s = summarizeProfile(["", frameLine("FullInitial", 10, { calls: 0, direct: 0, boundary: 0 }, []), HEADER]);
    assert.equal(s.header, null);
    assert.equal(s.frames, 1);
    assert.equal(s.malformedLines, 1);
    assert.equal(s.cacheHitRatio, null);
  });

  test("an empty profile has no averages", () => {
    const s = summarizeProfile([]);
    assert.equal(s.frames, 0);
    assert.equal(s.averageFrameNs, null);
    assert.deepEqual(s.topMeasure, []);
  });
});

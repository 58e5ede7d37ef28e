import { assert, describe, test } from "@weft/testkit";
import { createProfileHeader, formatProfileLine, parseJsonLine, readProfileHeader } from "../jsonl.js";

const AT = new Date("2026-01-02T03:04:05.000Z");

describe("profile JSONL framing", () => {
  test("the header names the format and version", () => {
    const header = createProfileHeader(AT);
    assert.deepEqual(header, {
      version: 3,
      format: "weft-frame-profile",
      generatedAt: "2026-01-02T03:04:05.000Z",
    });
    assert.equal(
      formatProfileLine(header),
      '{"version":3,"format":"weft-frame-profile","generatedAt":"2026-01-02T03:04:05.000Z"}\n',
    );
  });

  test("parseJsonLine accepts only JSON objects", () => {
    assert.deepEqual(parseJsonLine(' {"a":1} '), { a: 1 });
    assert.equal(parseJsonLine("   "), null);
    assert.equal(parseJsonLine("[1,2]"), null);
    assert.equal(parseJsonLine("null"), null);
    assert.equal(parseJsonLine("{bad"), null);
  });

  test("readProfileHeader rejects other formats and missing fields", () => {
    const ok = { version: 3, format: "weft-frame-profile", generatedAt: "x" };
    assert.deepEqual(readProfileHeader(ok), ok);
    assert.equal(readProfileHeader({ ...ok, format: "other" }), null);
    assert.equal(readProfileHeader({ version: 3, format: "weft-frame-profile" }), null);
    assert.equal(readProfileHeader({ ...ok, version: "3" }), null);
  });
});

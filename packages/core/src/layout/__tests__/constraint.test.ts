import { assert, describe, test } from "@weft/testkit";
import {
  constraint,
  constraintEquals,
  describeConstraint,
  fill,
  fixed,
  fixedConstraint,
  mergeConstraint,
  mergeDimension,
  minSizeFromConstraint,
  resolveDimension,
  wrap,
} from "../constraint.js";

describe("mergeDimension", () => {
  test("Fixed child wins regardless of parent", () => {
    assert.deepEqual(mergeDimension(fixed(100), fixed(200)), fixed(100));
    assert.deepEqual(mergeDimension(fixed(100), fill(300, 400)), fixed(100));
    assert.deepEqual(mergeDimension(fixed(100), wrap(undefined, 10)), fixed(100));
  });

  test("Fill child under Fixed parent takes the parent's size as max", () => {
    assert.deepEqual(mergeDimension(fill(50), fixed(200)), fill(50, 200));
    assert.deepEqual(mergeDimension(fill(50, 120), fixed(200)), fill(50, 120));
  });

  test("Wrap child keeps the tighter max under a Fixed parent", () => {
    assert.equal(mergeDimension(wrap(20, 80), fixed(100)).max, 80);
    assert.equal(mergeDimension(wrap(30), fixed(100)).max, 100);
    assert.deepEqual(mergeDimension(wrap(30), fixed(100)), wrap(30, 100));
  });

  test("Wrap child never inherits a parent minimum", () => {
    assert.deepEqual(mergeDimension(wrap(), wrap(20, 80)), wrap(undefined, 80));
    assert.deepEqual(mergeDimension(wrap(5), fill(40, 60)), wrap(5, 60));
  });

  test("Wrap child under Fill stays Wrap with the tightened max", () => {
    assert.deepEqual(mergeDimension(wrap(5), fill(undefined, 30)), wrap(5, 30));
  });

  test("Fill child under Wrap falls back to the parent's min", () => {
    assert.deepEqual(mergeDimension(fill(undefined, 90), wrap(15, 70)), fill(15, 70));
    assert.deepEqual(mergeDimension(fill(4, 90), wrap(15, 70)), fill(4, 70));
  });

  test("Fill vs Fill combines bounds and clamps an inverted range to the max", () => {
    assert.deepEqual(mergeDimension(fill(10, 100), fill(20, 60)), fill(20, 60));
    assert.deepEqual(mergeDimension(fill(60, 100), fill(10, 40)), fill(40, 40));
  });

  test("merge is not commutative", () => {
    assert.deepEqual(mergeDimension(fixed(100), wrap(20, 80)), fixed(100));
    assert.deepEqual(mergeDimension(wrap(20, 80), fixed(100)), wrap(20, 80));
  });

  test("three-level propagation keeps the tightest max and the leaf's own min", () => {
    const root = fixed(100);
    const middle = mergeDimension(wrap(20, 80), root);
    const leaf = mergeDimension(wrap(10, 50), middle);
    assert.deepEqual(middle, wrap(20, 80));
    assert.deepEqual(leaf, wrap(10, 50));
  });

  test("same inputs always produce equal outputs", () => {
    const a = mergeDimension(fill(7, 70), wrap(3, 40));
    const b = mergeDimension(fill(7, 70), wrap(3, 40));
    assert.deepEqual(a, b);
  });
});

describe("mergeConstraint", () => {
  test("merges each axis independently", () => {
    const merged = mergeConstraint(constraint(fill(), wrap(2)), fixedConstraint(80, 24));
    assert.ok(constraintEquals(merged, constraint(fill(undefined, 80), wrap(2, 24))));
  });

  test("returns the child itself when nothing changes", () => {
    const child = fixedConstraint(10, 20);
    assert.equal(mergeConstraint(child, constraint(wrap(), fill(5, 9))), child);
  });
});

describe("resolution", () => {
  test("Wrap clamps content into its bounds", () => {
    assert.deepEqual(resolveDimension(wrap(10, 50), 70), { ok: true, value: 50 });
    assert.deepEqual(resolveDimension(wrap(10, 50), 3), { ok: true, value: 10 });
    assert.deepEqual(resolveDimension(wrap(), 17), { ok: true, value: 17 });
  });

  test("Fill takes its max, never below its min", () => {
    assert.deepEqual(resolveDimension(fill(5, 40), 0), { ok: true, value: 40 });
    assert.deepEqual(resolveDimension(fixed(12), 99), { ok: true, value: 12 });
  });

  test("Fill without any max fails loudly", () => {
    const res = resolveDimension(fill(), 30);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "WEFT_UNRESOLVABLE_FILL");
    assert.equal(res.fatal.detail, "fill dimension Fill{min:-,max:-} has no resolvable maximum");
  });

  test("minSizeFromConstraint reads Fixed values and mins", () => {
    assert.deepEqual(minSizeFromConstraint(constraint(fixed(3), wrap(4, 9))), { w: 3, h: 4 });
    assert.deepEqual(minSizeFromConstraint(constraint(fill(), wrap())), { w: 0, h: 0 });
  });

  test("describeConstraint", () => {
    assert.equal(describeConstraint(constraint(fixed(3), wrap(1))), "Fixed(3) x Wrap{min:1,max:-}");
  });
});

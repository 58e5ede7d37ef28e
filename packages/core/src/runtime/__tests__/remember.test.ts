import { assert, describe, test } from "@weft/testkit";
import {
  type State,
  WeftError,
  createRuntime,
  defineComponent,
  fixedConstraint,
  refEqual,
  shallowEqual,
} from "../../index.js";
import { RenderLog, SCREEN, columnSpec, leafSpec, makeLeaf } from "./fixtures.js";

function setup() {
  const log = new RenderLog();
  const captured: { count: State<number> | null } = { count: null };
  const Sibling = makeLeaf(log, "Sibling");
  const Counter = defineComponent<null>({
    name: "Counter",
    module: "test/remember",
    equals: refEqual,
    render(_props, cx) {
      log.hit("Counter");
      const count = cx.remember(() => 0);
      captured.count = count;
      const w = count.get() + 1;
      cx.layout(leafSpec.create({ w, h: 1 }, { constraint: fixedConstraint(w, 1) }));
    },
  });
  const App = defineComponent<Readonly<{ show: boolean }>>({
    name: "App",
    module: "test/remember",
    equals: shallowEqual,
    render(props, cx) {
      log.hit("App");
      cx.layout(columnSpec.create(null));
      if (props.show) cx.group(counterSite, () => cx.render(Counter, null));
      cx.render(Sibling, { w: 2, h: 1 });
    },
  });
  const counterSite = App.site("counter");

  let requested = 0;
  const rt = createRuntime(App, { show: true }, {
    warn: () => {},
    onRequestFrame: () => {
      requested++;
    },
  });
  rt.frame({ screen: SCREEN });
  log.reset();

  function count(): State<number> {
    const state = captured.count;
    if (state === null) throw new Error("Counter never rendered");
    return state;
  }
  return { rt, log, count, requests: () => requested };
}

describe("remember", () => {
  test("a write replays only the owning node", () => {
    const { rt, log, count, requests } = setup();
    count().set(2);
    assert.equal(requests(), 1);
    assert.equal(rt.hasPendingWork(), true);

    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.buildMode, "PartialReplay");
    assert.deepEqual(out.redrawReasons, ["runtime-invalidation"]);
    assert.equal(out.build.bodyExecutions, 1);
    assert.equal(log.count("Counter"), 1);
    assert.equal(log.count("App"), 0);
    assert.equal(log.count("Sibling"), 0);
    assert.equal(count().get(), 2);
    assert.deepEqual(out.rootSize, { w: 3, h: 2 });

    const d = out.diagnostics;
    assert.equal(d.dirtyNodesParam, 1);
    assert.equal(d.dirtyNodesWithAncestors, 2);
    assert.equal(d.measureNodeCalls, 5);
    assert.equal(d.cacheMissChildSize, 1);
    assert.equal(d.cacheMissDirtySelf, 1);
    assert.equal(d.cacheHitsDirect, 3);
    assert.equal(d.cacheStoreCount, 2);
  });

  test("several writes before a frame request it once", () => {
    const { count, requests } = setup();
    count().set(1);
    count().set(5);
    assert.equal(requests(), 1);
  });

  test("writing an equal value does nothing", () => {
    const { rt, count, requests } = setup();
    count().set(0);
    assert.equal(requests(), 0);
    assert.equal(rt.hasPendingWork(), false);
    assert.equal(rt.frame({ screen: SCREEN }).buildMode, "SkipNoInvalidation");
  });

  test("the updater form reads the current value", () => {
    const { rt, count } = setup();
    count().set((n) => n + 4);
    count().set((n) => n * 2);
    assert.equal(count().get(), 8);
    rt.frame({ screen: SCREEN });
    assert.equal(count().get(), 8);
  });

  test("setters of a torn-down node are ignored", () => {
    const { rt, count, requests } = setup();
    const stale = count();
    rt.setRootProps({ show: false });
    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.build.nodesTornDown, 1);
    const before = requests();

    stale.set(9);
    assert.equal(requests(), before);
    assert.equal(rt.hasPendingWork(), false);
  });

  test("a write during the body schedules another frame", () => {
    const Settle = defineComponent<null>({
      name: "Settle",
      module: "test/remember",
      equals: refEqual,
      render(_props, cx) {
        const n = cx.remember(() => 0);
        if (n.get() < 2) n.set(n.get() + 1);
      },
    });
    const rt = createRuntime(Settle, null, { warn: () => {} });
    assert.equal(rt.frame({ screen: SCREEN }).buildMode, "FullInitial");
    assert.equal(rt.hasPendingWork(), true);
    assert.equal(rt.frame({ screen: SCREEN }).build.bodyExecutions, 1);
    assert.equal(rt.hasPendingWork(), true);
    assert.equal(rt.frame({ screen: SCREEN }).build.bodyExecutions, 1);
    assert.equal(rt.hasPendingWork(), false);
    assert.equal(rt.frame({ screen: SCREEN }).buildMode, "SkipNoInvalidation");
  });
});

describe("remember - call order", () => {
  const Flaky = defineComponent<Readonly<{ extra: boolean }>>({
    name: "Flaky",
    module: "test/remember",
    equals: shallowEqual,
    render(props, cx) {
      cx.remember(() => "a");
      if (props.extra) cx.remember(() => "b");
    },
  });

  function isOrderError(message: string) {
    return (err: unknown): boolean =>
      err instanceof WeftError && err.code === "WEFT_REMEMBER_ORDER" && err.message === message;
  }

  test("a changed slot count throws WEFT_REMEMBER_ORDER and resets the tree", () => {
    const rt = createRuntime(Flaky, { extra: false }, { warn: () => {} });
    rt.frame({ screen: SCREEN });

    rt.setRootProps({ extra: true });
    assert.throws(
      () => rt.frame({ screen: SCREEN }),
      isOrderError("remember count mismatch for node 1: slot 1 was not used by the first execution"),
    );
    assert.equal(rt.nodeCount(), 0);

    const rebuilt = rt.frame({ screen: SCREEN });
    assert.equal(rebuilt.buildMode, "FullInitial");
    assert.equal(rt.root(), 2);

    rt.setRootProps({ extra: false });
    assert.throws(
      () => rt.frame({ screen: SCREEN }),
      isOrderError("remember count mismatch for node 2: expected 2, got 1"),
    );
  });
});

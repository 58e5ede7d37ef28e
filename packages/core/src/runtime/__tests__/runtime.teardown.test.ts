import { assert, describe, test } from "@weft/testkit";
import { type Runtime, WeftError, createRuntime, defineComponent, shallowEqual } from "../../index.js";
import { RenderLog, SCREEN, columnSpec, defined, makeLeaf, makePanel, only } from "./fixtures.js";

function setup() {
  const log = new RenderLog();
  const Leaf = makeLeaf(log);
  const Panel = makePanel(log, Leaf);
  const App = defineComponent<Readonly<{ show: boolean }>>({
    name: "App",
    module: "test/teardown",
    equals: shallowEqual,
    render(props, cx) {
      cx.layout(columnSpec.create(null));
      cx.render(Leaf, { w: 5, h: 1 });
      if (props.show) cx.group(panelSite, () => cx.render(Panel, { w: 2, h: 2 }));
    },
  });
  const panelSite = App.site("panel");
  const rt = createRuntime(App, { show: true }, { warn: () => {} });
  return { rt, log };
}

function isCode(code: string, message: string) {
  return (err: unknown): boolean => err instanceof WeftError && err.code === code && err.message === message;
}

describe("teardown", () => {
  test("dropping a subtree removes its nodes and their cache entries", () => {
    const { rt } = setup();
    rt.frame({ screen: SCREEN });
    assert.equal(rt.nodeCount(), 4);
    assert.equal(rt.cacheSize(), 4);
    const panel = only(rt, "Panel");
    const innerLeaf = defined(defined(rt.getNode(panel)).children[0]);

    rt.setRootProps({ show: false });
    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.build.nodesTornDown, 2);
    assert.equal(rt.nodeCount(), 2);
    assert.equal(rt.getNode(panel), undefined);
    assert.equal(rt.getNode(innerLeaf), undefined);
    assert.equal(rt.cacheEntry(panel), undefined);
    assert.equal(rt.cacheSize(), 2);
    assert.deepEqual(out.rootSize, { w: 5, h: 1 });
  });

  test("a subtree that comes back is built fresh", () => {
    const { rt, log } = setup();
    rt.frame({ screen: SCREEN });
    const panelBefore = only(rt, "Panel");
    rt.setRootProps({ show: false });
    rt.frame({ screen: SCREEN });
    log.reset();

    rt.setRootProps({ show: true });
    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.build.nodesCreated, 2);
    assert.notEqual(only(rt, "Panel"), panelBefore);
    assert.equal(log.count("Panel"), 1);
    assert.equal(out.diagnostics.cacheMissNoEntry, 2);
  });

  test("dispose drops everything and rejects later frames", () => {
    const { rt } = setup();
    rt.frame({ screen: SCREEN });
    const root = defined(rt.root());
    rt.dispose();
    rt.dispose();
    assert.equal(rt.nodeCount(), 0);
    assert.equal(rt.cacheSize(), 0);
    assert.equal(rt.root(), null);
    rt.invalidate(root);
    assert.equal(rt.hasPendingWork(), false);
    assert.throws(
      () => rt.frame({ screen: SCREEN }),
      isCode("WEFT_INVALID_STATE", "frame: runtime is disposed"),
    );
  });
});

describe("frame re-entrancy", () => {
  test("calling frame from a component body throws WEFT_REENTRANT_FRAME", () => {
    const holder: { rt: Runtime<Readonly<{ reenter: boolean }>> | null } = { rt: null };
    const App = defineComponent<Readonly<{ reenter: boolean }>>({
      name: "App",
      module: "test/teardown",
      equals: shallowEqual,
      render(props) {
        if (props.reenter) holder.rt?.frame({ screen: SCREEN });
      },
    });
    const rt = createRuntime(App, { reenter: true }, { warn: () => {} });
    holder.rt = rt;

    assert.throws(
      () => rt.frame({ screen: SCREEN }),
      isCode("WEFT_REENTRANT_FRAME", "frame: called while a frame is in progress"),
    );
    assert.equal(rt.frameIndex(), 1);

    rt.setRootProps({ reenter: false });
    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.buildMode, "FullInitial");
    assert.equal(out.frame, 2);
  });
});

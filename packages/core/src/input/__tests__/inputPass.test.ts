import { assert, describe, test } from "@weft/testkit";
import {
  type CursorEvent,
  type InputHandlerInput,
  type KeyboardEvent,
  ORIGIN,
  WeftError,
  constraint,
  createRuntime,
  defineComponent,
  defineLayoutSpec,
  fixedConstraint,
  layoutOk,
  refEqual,
  shallowEqual,
  wrap,
} from "../../index.js";
import { columnSpec, leafSpec } from "../../runtime/__tests__/fixtures.js";

const SCREEN = { w: 80, h: 24 };
const CLICK: CursorEvent = { timestampMs: 1, content: { kind: "pressed", button: "left" } };
const KEY_A: KeyboardEvent = { key: "a", code: "KeyA", state: "pressed", repeat: false };

function describeInput(label: string, input: InputHandlerInput): string {
  const pos = input.cursorPosition === null ? "none" : `${input.cursorPosition.x},${input.cursorPosition.y}`;
  return `${label} ${pos} c${input.cursorEvents.length} k${input.keyboardEvents.length}`;
}

type ButtonProps = Readonly<{ label: string; w: number; h: number; block?: boolean }>;

function setup() {
  const seen: string[] = [];
  const behavior = { explode: false, block: false };

  const Button = defineComponent<ButtonProps>({
    name: "Button",
    module: "test/input",
    equals: shallowEqual,
    render(props, cx) {
      cx.layout(leafSpec.create({ w: props.w, h: props.h }, { constraint: fixedConstraint(props.w, props.h) }));
      cx.onInput((input) => {
        seen.push(describeInput(props.label, input));
        if (props.label === "A" && behavior.explode) throw new Error("boom");
        if (props.label === "B" && behavior.block) input.blockCursor();
        if (props.label === "B" && input.imeEvents.length > 0) {
          input.requests.imeRequest = { size: { w: 1, h: 1 }, position: undefined };
          input.blockIme();
        }
        if (props.label === "A" && input.cursorPosition !== null) input.requests.cursorIcon = "pointer";
      });
    },
  });

  const App = defineComponent<null>({
    name: "App",
    module: "test/input",
    equals: refEqual,
    render(_props, cx) {
      cx.layout(columnSpec.create(null));
      cx.onInput((input) => {
        seen.push(describeInput("App", input));
      });
      cx.render(Button, { label: "A", w: 10, h: 2 });
      cx.render(Button, { label: "B", w: 10, h: 3 });
    },
  });

  const rt = createRuntime(App, null, { warn: () => {} });
  return { rt, seen, behavior };
}

describe("input pass", () => {
  test("handlers run children first with node-relative cursor positions", () => {
    const { rt, seen } = setup();
    const out = rt.frame({ screen: SCREEN, cursorPosition: { x: 3, y: 3 }, cursorEvents: [CLICK] });
    assert.deepEqual(out.redrawReasons, ["startup", "mouse-input"]);
    assert.deepEqual(seen, ["B 3,1 c1 k0", "A 3,3 c1 k0", "App 3,3 c1 k0"]);
    assert.equal(out.windowRequests.cursorIcon, "pointer");
  });

  test("blocking the cursor hides it from every later handler", () => {
    const { rt, seen, behavior } = setup();
    behavior.block = true;
    const out = rt.frame({ screen: SCREEN, cursorPosition: { x: 3, y: 3 }, cursorEvents: [CLICK] });
    assert.deepEqual(seen, ["B 3,1 c1 k0", "A none c0 k0", "App none c0 k0"]);
    assert.equal(out.windowRequests.cursorIcon, "default");
  });

  test("keyboard events add a redraw reason and reach every handler", () => {
    const { rt, seen } = setup();
    rt.frame({ screen: SCREEN });
    seen.length = 0;

    const out = rt.frame({ screen: SCREEN, keyboardEvents: [KEY_A] });
    assert.equal(out.buildMode, "PartialReplay");
    assert.deepEqual(out.redrawReasons, ["keyboard-input"]);
    assert.deepEqual(seen, ["B none c0 k1", "A none c0 k1", "App none c0 k1"]);
  });

  test("skipped frames run no handlers", () => {
    const { rt, seen } = setup();
    rt.frame({ screen: SCREEN });
    seen.length = 0;
    const out = rt.frame({ screen: SCREEN, cursorPosition: { x: 1, y: 1 } });
    assert.equal(out.buildMode, "SkipNoInvalidation");
    assert.deepEqual(seen, []);
  });

  test("an IME request without a position takes the requesting node's position", () => {
    const { rt } = setup();
    const out = rt.frame({ screen: SCREEN, imeEvents: [{ kind: "preedit", text: "k" }] });
    assert.deepEqual(out.redrawReasons, ["startup", "ime-event"]);
    assert.deepEqual(out.windowRequests.imeRequest, { size: { w: 1, h: 1 }, position: { x: 0, y: 2 } });
  });

  test("a throwing handler fails the frame and forces the next one to run", () => {
    const { rt, seen, behavior } = setup();
    behavior.explode = true;
    assert.throws(
      () => rt.frame({ screen: SCREEN }),
      (err: unknown) =>
        err instanceof WeftError &&
        err.code === "WEFT_USER_CODE_THROW" &&
        err.message === "input handler threw: Error: boom",
    );
    assert.deepEqual(seen, ["B none c0 k0", "A none c0 k0"]);

    behavior.explode = false;
    seen.length = 0;
    const out = rt.frame({ screen: SCREEN });
    assert.equal(out.buildMode, "PartialReplay");
    assert.deepEqual(out.redrawReasons, []);
    assert.deepEqual(seen, ["B none c0 k0", "A none c0 k0", "App none c0 k0"]);
  });
});

describe("input pass - clipping", () => {
  const viewportSpec = defineLayoutSpec<null>({
    typeTag: "test:viewport",
    clipsChildren: true,
    measure(_p, input, output) {
      for (const child of input.children) {
        const r = input.measureChild(child, constraint(wrap(), wrap()));
        if (!r.ok) return r;
        output.placeChild(child, ORIGIN);
      }
      return layoutOk({ w: 10, h: 2 });
    },
  });

  test("a node outside its ancestors' clip sees no cursor and cannot block it", () => {
    const seen: string[] = [];
    const Content = defineComponent<null>({
      name: "Content",
      module: "test/input",
      equals: refEqual,
      render(_props, cx) {
        cx.layout(leafSpec.create({ w: 10, h: 5 }, { constraint: fixedConstraint(10, 5) }));
        cx.onInput((input) => {
          seen.push(describeInput("Content", input));
          input.blockCursor();
        });
      },
    });
    const Viewport = defineComponent<null>({
      name: "Viewport",
      module: "test/input",
      equals: refEqual,
      render(_props, cx) {
        cx.layout(viewportSpec.create(null));
        cx.onInput((input) => {
          seen.push(describeInput("Viewport", input));
        });
        cx.render(Content, null);
      },
    });

    const rt = createRuntime(Viewport, null, { warn: () => {} });
    rt.frame({ screen: SCREEN, cursorPosition: { x: 5, y: 4 }, cursorEvents: [CLICK] });
    assert.deepEqual(seen, ["Content none c0 k0", "Viewport 5,4 c1 k0"]);

    seen.length = 0;
    rt.frame({ screen: SCREEN, cursorPosition: { x: 5, y: 1 }, cursorEvents: [CLICK] });
    assert.deepEqual(seen, ["Content 5,1 c1 k0", "Viewport none c0 k0"]);
  });
});

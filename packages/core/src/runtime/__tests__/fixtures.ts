import {
  type Component,
  type FrameOp,
  type NodeHandle,
  type Runtime,
  defineComponent,
  defineLayoutSpec,
  fixedConstraint,
  layoutOk,
  resolveDimension,
  shallowEqual,
} from "../../index.js";

/** Counts component body executions by name. */
export class RenderLog {
  private readonly counts = new Map<string, number>();

  hit(name: string): void {
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1);
  }

  count(name: string): number {
    return this.counts.get(name) ?? 0;
  }

  reset(): void {
    this.counts.clear();
  }
}

export type LeafProps = Readonly<{ w: number; h: number }>;

/** Fixed-size box that draws one rect. */
export const leafSpec = defineLayoutSpec<LeafProps>({
  typeTag: "test:leaf",
  measure: (p) => layoutOk({ w: p.w, h: p.h }),
  record: (_p, input) => input.draw({ shape: "rect" }),
});

/** Stacks children top to bottom under its own merged constraint. */
export const columnSpec = defineLayoutSpec<null>({
  typeTag: "test:column",
  measure(_p, input, output) {
    let y = 0;
    let w = 0;
    for (const child of input.children) {
      const r = input.measureChild(child, input.constraint);
      if (!r.ok) return r;
      output.placeChild(child, { x: 0, y });
      y += r.value.h;
      w = Math.max(w, r.value.w);
    }
    const rw = resolveDimension(input.constraint.width, w);
    if (!rw.ok) return rw;
    const rh = resolveDimension(input.constraint.height, y);
    if (!rh.ok) return rh;
    return layoutOk({ w: rw.value, h: rh.value });
  },
});

export function makeLeaf(log: RenderLog, name = "Leaf"): Component<LeafProps> {
  return defineComponent<LeafProps>({
    name,
    module: "test/fixtures",
    equals: shallowEqual,
    render(props, cx) {
      log.hit(name);
      cx.layout(leafSpec.create(props, { constraint: fixedConstraint(props.w, props.h) }));
    },
  });
}

/** Wraps a single leaf with the default layout. */
export function makePanel(log: RenderLog, leaf: Component<LeafProps>): Component<LeafProps> {
  return defineComponent<LeafProps>({
    name: "Panel",
    module: "test/fixtures",
    equals: shallowEqual,
    render(props, cx) {
      log.hit("Panel");
      cx.render(leaf, props);
    },
  });
}

export function opsSummary(ops: readonly FrameOp[]): string[] {
  return ops.map((op) => {
    switch (op.op) {
      case "draw":
        return `draw ${op.shape} ${op.position.x},${op.position.y} ${op.size.w}x${op.size.h}`;
      case "clipPush":
        return `clipPush ${op.rect.x},${op.rect.y} ${op.rect.w}x${op.rect.h}`;
      case "clipPop":
        return "clipPop";
    }
  });
}

export function only<P>(rt: Runtime<P>, name: string): NodeHandle {
  const found = rt.findNodes(name);
  const handle = found[0];
  if (found.length !== 1 || handle === undefined) {
    throw new Error(`expected exactly one ${name} node, found ${found.length}`);
  }
  return handle;
}

export const SCREEN = Object.freeze({ w: 80, h: 24 });

export function defined<T>(value: T | undefined | null, what = "value"): T {
  if (value === undefined || value === null) throw new Error(`expected ${what} to be defined`);
  return value;
}

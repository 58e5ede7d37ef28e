import type { ComponentNode, DuplicateRegistration } from "../runtime/nodeRegistry.js";

type WarnContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  warn: (message: string) => void;
}>;

export type WarnScope = "registry" | "layout" | "input" | "profiler" | "runtime";

/** Dev-mode warning, emitted at most once per key. */
export function warnOnce(ctx: WarnContext, scope: WarnScope, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warned.has(key)) return;
  ctx.warned.add(key);
  ctx.warn(`[weft][${scope}] ${detail}`);
}

export function describeNode(node: ComponentNode): string {
  return `${node.name}#${node.identity.instanceKey.slice(0, 8)}`;
}

export function warnDuplicateRegistration(
  ctx: WarnContext,
  node: ComponentNode,
  what: DuplicateRegistration,
): void {
  const helper = what === "layout" ? "layout()" : "onInput()";
  warnOnce(
    ctx,
    "registry",
    `duplicate:${what}:${node.identity.instanceKey}`,
    `${describeNode(node)} called ${helper} more than once in one execution; the last call wins`,
  );
}

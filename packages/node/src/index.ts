/**
 * @weft/node
 *
 * Node.js bindings for @weft/core: a worker-thread JSONL profiler sink,
 * environment-driven profiler setup, and an offline profile summarizer.
 */

export * from "./profiler/index.js";

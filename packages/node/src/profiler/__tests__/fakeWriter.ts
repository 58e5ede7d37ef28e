import type { ProfilerWorkerMessage, SpawnProfileWriter } from "../workerSink.js";

/** In-process stand-in for the profiler worker. */
export type FakeWriter = {
  readonly spawn: SpawnProfileWriter;
  readonly paths: string[];
  readonly messages: ProfilerWorkerMessage[];
  onError: ((err: unknown) => void) | null;
  failPosts: boolean;
  closes: number;
};

export function createFakeWriter(): FakeWriter {
  const writer: FakeWriter = {
    spawn: (outputPath, onError) => {
      writer.paths.push(outputPath);
      writer.onError = onError;
      return {
        postMessage(message: ProfilerWorkerMessage): void {
          if (writer.failPosts) throw new Error("port closed");
          writer.messages.push(message);
        },
        async close(): Promise<void> {
          writer.closes++;
        },
      };
    },
    paths: [],
    messages: [],
    onError: null,
    failPosts: false,
    closes: 0,
  };
  return writer;
}

export function postedLines(writer: FakeWriter): string[] {
  const lines: string[] = [];
  for (const m of writer.messages) if (m.type === "line") lines.push(m.line);
  return lines;
}

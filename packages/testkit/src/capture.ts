/** Collects messages passed to a `warn` callback. */
export type WarnCapture = Readonly<{
  warn: (message: string) => void;
  messages: readonly string[];
  clear: () => void;
}>;

export function createWarnCapture(): WarnCapture {
  const messages: string[] = [];
  return Object.freeze({
    warn: (message: string) => {
      messages.push(message);
    },
    messages,
    clear: () => {
      messages.length = 0;
    },
  });
}

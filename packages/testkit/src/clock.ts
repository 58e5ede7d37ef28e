/** Millisecond clock that only moves when told to. */
export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let t = startMs;
  return Object.freeze({
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  });
}

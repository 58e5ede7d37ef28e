/** Deterministic xorshift32 generator for seeded fuzz tests. */
export type Rng = Readonly<{
  u32: () => number;
  /** Integer in [min, max]. */
  int: (min: number, max: number) => number;
  chance: (percent: number) => boolean;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0 || 0x9e3779b9;
  const u32 = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };
  return Object.freeze({
    u32,
    int: (min: number, max: number) => min + (u32() % (max - min + 1)),
    chance: (percent: number) => u32() % 100 < percent,
  });
}

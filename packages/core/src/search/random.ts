/**
 * Source of uniformly distributed numbers in [0, 1), same contract as Math.random.
 */
export type RandomSource = () => number;

/**
 * Deterministic generator (mulberry32). Two sources built from the same seed
 * produce the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Picks one element uniformly at random. The list must not be empty.
 */
export function pickUniform<T>(items: ReadonlyArray<T>, random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/**
 * Standard normal sample via Box-Muller.
 */
export function standardNormal(random: RandomSource): number {
  // 1 - u keeps the argument of log in (0, 1].
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

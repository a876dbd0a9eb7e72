export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

// mulberry32
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

export function pickIndex(random: RandomSource, length: number): number {
  if (length <= 0) {
    throw new Error("Cannot pick from an empty list.");
  }
  const index = Math.floor(random() * length);
  return Math.min(Math.max(index, 0), length - 1);
}

export function sampleWithoutReplacement<T>(
  items: ReadonlyArray<T>,
  count: number,
  random: RandomSource = defaultRandom,
): T[] {
  const pool = [...items];
  if (count >= pool.length) {
    return pool;
  }
  const take = Math.max(0, Math.floor(count));
  for (let index = 0; index < take; index += 1) {
    const swapWith = index + pickIndex(random, pool.length - index);
    const current = pool[index];
    pool[index] = pool[swapWith];
    pool[swapWith] = current;
  }
  return pool.slice(0, take);
}

export type Random = () => number;

export const defaultRandom: Random = Math.random;

/**
 * Park-Miller generator; the same seed always yields the same sequence.
 */
export function makeSeededRng(seed: number): Random {
  let state = seed % 2147483647;
  if (state <= 0) {
    state += 2147483646;
  }
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

export function randomChoice<T>(items: readonly T[], random: Random = defaultRandom): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

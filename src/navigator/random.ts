import seedrandom from 'seedrandom';

/**
 * Uniform number in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Seeded generator owned by a single navigator. Without a seed the generator is auto-seeded,
 * so runs are not reproducible.
 */
export function createRandomSource(seed?: number | string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
  return () => prng();
}

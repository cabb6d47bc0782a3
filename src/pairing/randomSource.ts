import crypto from 'crypto';
import seedrandom from 'seedrandom';

/**
 * Seedable source of randomness shared by both search strategies and the
 * delivery padding. Seed it once per draw; never reseed mid-search.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [0, maxExclusive) */
  int(maxExclusive: number): number;
  pick<T>(items: readonly T[]): T;
}

export function createRandomSource(seed: string | number): RandomSource {
  const prng = seedrandom(String(seed));

  const int = (maxExclusive: number): number => {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
      throw new RangeError(`Cannot draw an integer below ${maxExclusive}`);
    }
    return Math.floor(prng() * maxExclusive);
  };

  return {
    next: () => prng(),
    int,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
      }
      return items[int(items.length)];
    },
  };
}

export function generateSeed(): string {
  return String(crypto.randomInt(0, 2 ** 47));
}

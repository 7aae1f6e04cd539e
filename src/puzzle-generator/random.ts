/**
 * Random helpers over an injected RandomSource.
 *
 * Key synthesis draws every number through these helpers, so a seeded
 * source reproduces the same puzzle.
 */

import { RandomSource } from './types';

const PARK_MILLER_MODULUS = 2147483647;
const PARK_MILLER_MULTIPLIER = 16807;

/**
 * Create a deterministic Park-Miller generator.
 *
 * @param seed - Any integer; folded into [1, 2^31 - 2]
 * @returns Source producing numbers in [0, 1)
 *
 * @example
 * ```typescript
 * const random = createSeededRandom(42);
 * const generator = new PuzzleGenerator({ random });
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed)) {
    throw new Error('Seed must be an integer');
  }

  // State must stay in [1, M - 1]; 0 is a fixed point of the recurrence
  const period = PARK_MILLER_MODULUS - 1;
  let state = (((seed % period) + period) % period) + 1;

  return () => {
    state = (state * PARK_MILLER_MULTIPLIER) % PARK_MILLER_MODULUS;
    return (state - 1) / (PARK_MILLER_MODULUS - 1);
  };
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle.
 */
export function shuffleInPlace<T>(random: RandomSource, list: T[]): void {
  for (let i = list.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [list[i], list[j]] = [list[j], list[i]];
  }
}

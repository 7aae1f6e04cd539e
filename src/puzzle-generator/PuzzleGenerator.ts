/**
 * PuzzleGenerator - assembles hash collision puzzles.
 *
 * Looks up the difficulty profile, synthesizes colliding keys, replays their
 * insertion with the chosen technique and returns one PuzzleResult.
 *
 * Key guarantees:
 * 1. Unknown techniques fall back to linear probing
 * 2. Unknown difficulties throw InvalidDifficultyError
 * 3. The same random sequence yields the same puzzle
 */

import {
  DEFAULT_TECHNIQUE,
  DIFFICULTIES,
  DIFFICULTY_PROFILES,
  TECHNIQUES,
  TECHNIQUE_INFO,
} from './constants';
import { InvalidDifficultyError } from './errors';
import { generateCollisionKeys, generateQuadraticKeys } from './keys';
import {
  resolveChaining,
  resolveDoubleHashing,
  resolveLinearProbing,
  resolveQuadraticProbing,
} from './resolvers';
import {
  Difficulty,
  DifficultyProfile,
  PuzzleGeneratorConfig,
  PuzzleResult,
  RandomSource,
  Technique,
} from './types';

export function isTechnique(value: string): value is Technique {
  return TECHNIQUES.some((technique) => technique === value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}

/**
 * Map a requested technique name to a technique, defaulting to linear probing.
 */
export function resolveTechnique(value: string): Technique {
  return isTechnique(value) ? value : DEFAULT_TECHNIQUE;
}

function validateProfile(difficulty: Difficulty, profile: DifficultyProfile): void {
  if (!Number.isInteger(profile.tableSize) || profile.tableSize < 3) {
    throw new Error(`Table size for "${difficulty}" must be an integer >= 3`);
  }
  if (!Number.isInteger(profile.numKeys) || profile.numKeys <= 0) {
    throw new Error(`Key count for "${difficulty}" must be a positive integer`);
  }
  if (!Number.isInteger(profile.maxKeyValue) || profile.maxKeyValue <= 0) {
    throw new Error(`Max key value for "${difficulty}" must be a positive integer`);
  }
}

/**
 * PuzzleGenerator class for creating hash collision puzzles.
 *
 * @example
 * ```typescript
 * const generator = new PuzzleGenerator({ random: createSeededRandom(7) });
 *
 * const puzzle = generator.generatePuzzle('double_hashing', 'medium');
 * console.log(puzzle.steps); // One step per key, in insertion order
 * ```
 */
export class PuzzleGenerator {
  private readonly random: RandomSource;
  private readonly profiles: Record<Difficulty, DifficultyProfile>;

  /**
   * Create a new PuzzleGenerator.
   *
   * @param config - Configuration options
   */
  constructor(config: PuzzleGeneratorConfig = {}) {
    this.random = config.random ?? Math.random;
    this.profiles = { ...DIFFICULTY_PROFILES };

    // Quadratic key synthesis draws base hashes from [1, tableSize - 2]
    for (const difficulty of DIFFICULTIES) {
      const override = config.profiles?.[difficulty];
      if (override !== undefined) {
        this.profiles[difficulty] = override;
      }
      validateProfile(difficulty, this.profiles[difficulty]);
    }
  }

  /**
   * Generate one puzzle.
   *
   * @param technique - Technique name; unrecognized names use linear probing
   * @param difficulty - 'easy', 'medium' or 'hard'
   * @returns Keys, solved table and step trace
   * @throws InvalidDifficultyError for any other difficulty
   */
  generatePuzzle(technique: string, difficulty: string): PuzzleResult {
    if (!isDifficulty(difficulty)) {
      throw new InvalidDifficultyError(difficulty);
    }

    const selected = resolveTechnique(technique);
    const profile = this.profiles[difficulty];
    const { tableSize } = profile;

    const keys =
      selected === 'quadratic_probing'
        ? generateQuadraticKeys(profile, difficulty, this.random)
        : generateCollisionKeys(profile, difficulty, this.random);

    const info = TECHNIQUE_INFO[selected];
    const base = {
      techniqueLabel: info.label,
      tableSize,
      keys,
      description: info.description,
      formulaLabel: info.formulaLabel,
    };

    switch (selected) {
      case 'linear_probing':
        return { technique: selected, ...base, ...resolveLinearProbing(keys, tableSize) };
      case 'quadratic_probing':
        return { technique: selected, ...base, ...resolveQuadraticProbing(keys, tableSize) };
      case 'double_hashing':
        return { technique: selected, ...base, ...resolveDoubleHashing(keys, tableSize) };
      case 'chaining':
        return { technique: selected, ...base, ...resolveChaining(keys, tableSize) };
    }
  }

  /**
   * Profile used for a difficulty tier.
   */
  getProfile(difficulty: Difficulty): DifficultyProfile {
    return { ...this.profiles[difficulty] };
  }

  /**
   * Get configuration values.
   */
  getConfig(): Required<PuzzleGeneratorConfig> {
    return {
      random: this.random,
      profiles: { ...this.profiles },
    };
  }
}

/**
 * Generate one puzzle with a default generator.
 *
 * @param random - Random source (default: Math.random)
 */
export function generatePuzzle(
  technique: string,
  difficulty: string,
  random: RandomSource = Math.random
): PuzzleResult {
  return new PuzzleGenerator({ random }).generatePuzzle(technique, difficulty);
}

import { DIFFICULTIES } from './constants';

/**
 * Thrown when a puzzle is requested for a difficulty tier with no profile.
 * Unknown techniques are not an error; they fall back to linear probing.
 */
export class InvalidDifficultyError extends Error {
  readonly difficulty: string;

  constructor(difficulty: string) {
    super(`Unknown difficulty "${difficulty}" (expected one of: ${DIFFICULTIES.join(', ')})`);
    this.name = 'InvalidDifficultyError';
    this.difficulty = difficulty;
  }
}

/**
 * Puzzle Generator Module
 *
 * Generates hash table collision puzzles for linear probing, quadratic
 * probing, double hashing and separate chaining.
 *
 * @packageDocumentation
 */

// Main class
export {
  PuzzleGenerator,
  generatePuzzle,
  resolveTechnique,
  isTechnique,
  isDifficulty,
} from './PuzzleGenerator';
export { InvalidDifficultyError } from './errors';

// Types
export {
  Technique,
  OpenAddressingTechnique,
  Difficulty,
  DifficultyProfile,
  RandomSource,
  Slot,
  StepStatus,
  PlacedStep,
  DoubleHashPlacedStep,
  FailedStep,
  ProbingStep,
  DoubleHashStep,
  ChainStep,
  ProbingResolution,
  DoubleHashResolution,
  ChainingResolution,
  LinearProbingPuzzle,
  QuadraticProbingPuzzle,
  DoubleHashingPuzzle,
  ChainingPuzzle,
  PuzzleResult,
  PuzzleGeneratorConfig,
  PuzzleStats,
  TechniqueInfo,
} from './types';

// Building blocks (for advanced usage)
export { generateCollisionKeys, generateQuadraticKeys } from './keys';
export {
  resolveLinearProbing,
  resolveQuadraticProbing,
  resolveDoubleHashing,
  resolveChaining,
} from './resolvers';
export {
  linearProbingFormula,
  quadraticProbingFormula,
  doubleHashingFormula,
  chainingFormula,
} from './formulas';
export { primaryHash, secondaryHash } from './hasher';
export { createSeededRandom } from './random';

// Output
export { toPuzzleDocument, PuzzleDocument, StepDocument } from './serializer';
export { summarizePuzzle } from './stats';

// Constants (for reference and testing)
export {
  DEFAULT_TECHNIQUE,
  DEFAULT_DIFFICULTY,
  TECHNIQUES,
  DIFFICULTIES,
  DIFFICULTY_PROFILES,
  TECHNIQUE_INFO,
  MAX_FILL_ATTEMPTS,
  TABLE_FULL_ERROR,
  QUADRATIC_EXHAUSTED_ERROR,
} from './constants';

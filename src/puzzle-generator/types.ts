/**
 * Core type definitions for the Puzzle Generator.
 * These types model the keys, tables and step traces of a hash collision puzzle.
 */

/**
 * Collision resolution technique.
 * The set is closed: every switch over it is exhaustive.
 */
export type Technique = 'linear_probing' | 'quadratic_probing' | 'double_hashing' | 'chaining';

/**
 * Open addressing techniques (one key per slot).
 */
export type OpenAddressingTechnique = Exclude<Technique, 'chaining'>;

/**
 * Difficulty tier controlling table size, key count and collision intensity.
 */
export type Difficulty = 'easy' | 'medium' | 'hard';

/**
 * Source of uniformly distributed numbers in [0, 1).
 * `Math.random` satisfies it; tests pass a seeded generator.
 */
export type RandomSource = () => number;

/**
 * Parameter bundle for one difficulty tier.
 */
export interface DifficultyProfile {
  /** Number of slots (or buckets) in the table */
  tableSize: number;

  /** Number of keys to synthesize (expected to be <= tableSize) */
  numKeys: number;

  /** Upper bound for key values, inclusive */
  maxKeyValue: number;
}

/**
 * A slot of an open addressing table: a key or empty.
 */
export type Slot = number | null;

/**
 * Status of a key in its insertion attempt.
 */
export type StepStatus = 'placed' | 'failed';

/**
 * Step record for a key placed by linear or quadratic probing.
 */
export interface PlacedStep {
  status: 'placed';

  /** Key being inserted */
  key: number;

  /** key mod tableSize */
  initialHash: number;

  /** Every slot examined, in order, including the final one (not deduplicated) */
  probeSequence: number[];

  /** Slot the key was stored in */
  finalIndex: number;

  /** Probes beyond the first */
  collisions: number;

  /** Human-readable formula with the final answer withheld */
  formula: string;
}

/**
 * Step record for a key placed by double hashing.
 */
export interface DoubleHashPlacedStep extends PlacedStep {
  /** Step size from the second hash function, in [1, tableSize - 1] */
  h2Value: number;
}

/**
 * Step record for a key that found no empty slot.
 * The key is not inserted; later keys are still processed.
 */
export interface FailedStep {
  status: 'failed';
  key: number;
  error: string;
}

export type ProbingStep = PlacedStep | FailedStep;

export type DoubleHashStep = DoubleHashPlacedStep | FailedStep;

/**
 * Step record for separate chaining. Chaining never fails.
 */
export interface ChainStep {
  key: number;
  initialHash: number;
  finalIndex: number;

  /** Length of the bucket after this key was appended */
  chainLength: number;

  /** Fully solved formula */
  formula: string;
}

/**
 * Table and trace produced by a resolver.
 */
export interface Resolution<TSolution, TStep> {
  solution: TSolution;
  steps: TStep[];
}

export type ProbingResolution = Resolution<Slot[], ProbingStep>;
export type DoubleHashResolution = Resolution<Slot[], DoubleHashStep>;
export type ChainingResolution = Resolution<number[][], ChainStep>;

/**
 * Fields shared by every puzzle result.
 */
interface PuzzleResultBase<T extends Technique> {
  technique: T;
  techniqueLabel: string;
  tableSize: number;
  keys: number[];
  description: string;
  formulaLabel: string;
}

export interface LinearProbingPuzzle extends PuzzleResultBase<'linear_probing'>, ProbingResolution {}

export interface QuadraticProbingPuzzle
  extends PuzzleResultBase<'quadratic_probing'>,
    ProbingResolution {}

export interface DoubleHashingPuzzle
  extends PuzzleResultBase<'double_hashing'>,
    DoubleHashResolution {}

export interface ChainingPuzzle extends PuzzleResultBase<'chaining'>, ChainingResolution {}

/**
 * Result of generating one puzzle, discriminated by `technique`.
 */
export type PuzzleResult =
  | LinearProbingPuzzle
  | QuadraticProbingPuzzle
  | DoubleHashingPuzzle
  | ChainingPuzzle;

/**
 * Static display metadata for a technique.
 */
export interface TechniqueInfo {
  label: string;
  description: string;
  formulaLabel: string;
}

/**
 * Configuration options for the PuzzleGenerator.
 */
export interface PuzzleGeneratorConfig {
  /**
   * Random source used for key synthesis.
   * Default: Math.random
   */
  random?: RandomSource;

  /**
   * Per-difficulty overrides merged over DIFFICULTY_PROFILES.
   */
  profiles?: Partial<Record<Difficulty, DifficultyProfile>>;
}

/**
 * Summary statistics for a generated puzzle.
 */
export interface PuzzleStats {
  /** Keys in the puzzle */
  keyCount: number;

  /** Keys stored in the table */
  placedCount: number;

  /** Keys with a failed step */
  failedCount: number;

  /** Sum of collisions over all placed keys */
  totalCollisions: number;

  /** Longest probe sequence (1 for chaining) */
  maxProbeLength: number;

  /** Non-empty slots or buckets */
  occupiedSlots: number;

  /** placedCount / tableSize */
  loadFactor: number;

  /** Longest bucket (0 or 1 for open addressing) */
  longestChain: number;
}

/**
 * Puzzle parameters per difficulty tier and static technique metadata.
 *
 * Table sizes are prime so double hashing visits every slot and
 * quadratic probing reaches at least half of them.
 */

import { Difficulty, DifficultyProfile, Technique, TechniqueInfo } from './types';

/**
 * Technique used when the caller passes an unrecognized name.
 */
export const DEFAULT_TECHNIQUE: Technique = 'linear_probing';

/**
 * Difficulty used by the CLI when none is given.
 */
export const DEFAULT_DIFFICULTY: Difficulty = 'easy';

export const TECHNIQUES: readonly Technique[] = [
  'linear_probing',
  'quadratic_probing',
  'double_hashing',
  'chaining',
];

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

/**
 * Table size, key count and key range for each tier.
 */
export const DIFFICULTY_PROFILES: Readonly<Record<Difficulty, DifficultyProfile>> = {
  easy: { tableSize: 7, numKeys: 4, maxKeyValue: 99 },
  medium: { tableSize: 11, numKeys: 7, maxKeyValue: 199 },
  hard: { tableSize: 13, numKeys: 9, maxKeyValue: 299 },
};

/**
 * Forced collision clusters for linear probing, double hashing and chaining.
 * Every key in a cluster shares the same initial hash.
 */
export const COLLISION_CLUSTERS: Readonly<
  Record<Difficulty, { clusterCount: number; clusterSize: number }>
> = {
  easy: { clusterCount: 1, clusterSize: 2 },
  medium: { clusterCount: 2, clusterSize: 2 },
  hard: { clusterCount: 3, clusterSize: 3 },
};

/**
 * Cluster sizes for quadratic probing. Larger clusters force probes at
 * i = 1, 2, 3 (offsets 1, 4, 9).
 */
export const QUADRATIC_CLUSTER_SIZES: Readonly<Record<Difficulty, readonly number[]>> = {
  easy: [3],
  medium: [4, 2],
  hard: [4, 3],
};

/**
 * Cap on random draws when padding a key set with non-colliding keys.
 * When exhausted the key set is returned short.
 */
export const MAX_FILL_ATTEMPTS = 1000;

export const TABLE_FULL_ERROR = 'Table full';

export const QUADRATIC_EXHAUSTED_ERROR = 'No slot found (quadratic probing exhausted)';

export const TECHNIQUE_INFO: Readonly<Record<Technique, TechniqueInfo>> = {
  linear_probing: {
    label: 'Linear Probing',
    description: 'On collision, probe next slot: h(k, i) = (h(k) + i) mod m',
    formulaLabel: 'h(k, i) = (k mod m + i) mod m',
  },
  quadratic_probing: {
    label: 'Quadratic Probing',
    description: 'On collision, probe with quadratic increments: h(k, i) = (h(k) + i²) mod m',
    formulaLabel: 'h(k, i) = (k mod m + i²) mod m',
  },
  double_hashing: {
    label: 'Double Hashing',
    description: 'On collision, use second hash function: h(k,i) = (h1(k) + i·h2(k)) mod m',
    formulaLabel: 'h(k,i) = (k mod m + i·(1 + k mod (m-1))) mod m',
  },
  chaining: {
    label: 'Separate Chaining',
    description: 'Each slot holds a linked list. Colliding keys are chained together.',
    formulaLabel: 'h(k) = k mod m → append to chain at index',
  },
};

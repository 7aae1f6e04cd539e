/**
 * Key synthesis: small key sets engineered to collide under k mod m.
 *
 * Keys of the form baseHash + j * tableSize all share the initial hash
 * baseHash. Each synthesizer forces a few such clusters, pads the set with
 * random keys, shuffles it and truncates it to numKeys. Truncating after the
 * shuffle may drop forced keys, and an exhausted fill leaves the set short.
 */

import { COLLISION_CLUSTERS, MAX_FILL_ATTEMPTS, QUADRATIC_CLUSTER_SIZES } from './constants';
import { randomInt, shuffleInPlace } from './random';
import { Difficulty, DifficultyProfile, RandomSource } from './types';

/**
 * Append up to clusterSize keys sharing baseHash, skipping out-of-range or used keys.
 */
function addCluster(
  keys: number[],
  used: Set<number>,
  baseHash: number,
  clusterSize: number,
  profile: DifficultyProfile
): void {
  for (let j = 0; j < clusterSize; j++) {
    const key = baseHash + j * profile.tableSize;
    if (key >= 1 && key <= profile.maxKeyValue && !used.has(key)) {
      keys.push(key);
      used.add(key);
    }
  }
}

/**
 * Pad with random unused keys, shuffle, and truncate to numKeys.
 */
function fillShuffleAndTruncate(
  keys: number[],
  used: Set<number>,
  profile: DifficultyProfile,
  random: RandomSource
): number[] {
  let attempts = 0;
  while (keys.length < profile.numKeys && attempts < MAX_FILL_ATTEMPTS) {
    const key = randomInt(random, 1, profile.maxKeyValue);
    if (!used.has(key)) {
      keys.push(key);
      used.add(key);
    }
    attempts++;
  }

  shuffleInPlace(random, keys);
  return keys.slice(0, profile.numKeys);
}

/**
 * Generate keys with forced collisions for linear probing, double hashing
 * and chaining.
 *
 * @param profile - Table size, key count and key range
 * @param difficulty - Selects cluster count and size
 * @param random - Random source (default: Math.random)
 * @returns Distinct keys in [1, maxKeyValue], at most numKeys of them
 */
export function generateCollisionKeys(
  profile: DifficultyProfile,
  difficulty: Difficulty,
  random: RandomSource = Math.random
): number[] {
  const keys: number[] = [];
  const used = new Set<number>();
  const { clusterCount, clusterSize } = COLLISION_CLUSTERS[difficulty];

  for (let c = 0; c < clusterCount; c++) {
    const baseHash = randomInt(random, 0, profile.tableSize - 1);
    addCluster(keys, used, baseHash, clusterSize, profile);
  }

  return fillShuffleAndTruncate(keys, used, profile, random);
}

/**
 * Generate keys that drive quadratic probing into deep probe chains.
 *
 * Clusters of 3-4 keys sharing one initial hash force probes at offsets
 * 1, 4, 9. The base hash avoids 0 and tableSize - 1.
 *
 * @param profile - Table size, key count and key range
 * @param difficulty - Selects the cluster sizes
 * @param random - Random source (default: Math.random)
 * @returns Distinct keys in [1, maxKeyValue], at most numKeys of them
 */
export function generateQuadraticKeys(
  profile: DifficultyProfile,
  difficulty: Difficulty,
  random: RandomSource = Math.random
): number[] {
  const keys: number[] = [];
  const used = new Set<number>();

  for (const clusterSize of QUADRATIC_CLUSTER_SIZES[difficulty]) {
    const baseHash = randomInt(random, 1, profile.tableSize - 2);
    addCluster(keys, used, baseHash, clusterSize, profile);
  }

  return fillShuffleAndTruncate(keys, used, profile, random);
}

/**
 * Summary statistics for a generated puzzle.
 * Useful for checking that a puzzle actually exercises collisions.
 */

import { PuzzleResult, PuzzleStats } from './types';

/**
 * Summarize collisions, probe lengths and occupancy of a puzzle.
 *
 * For chaining, a key appended to a non-empty bucket counts as one collision
 * and every key takes a single probe.
 */
export function summarizePuzzle(result: PuzzleResult): PuzzleStats {
  const keyCount = result.steps.length;

  if (result.technique === 'chaining') {
    const chainLengths = result.solution.map((bucket) => bucket.length);
    return {
      keyCount,
      placedCount: keyCount,
      failedCount: 0,
      totalCollisions: result.steps.reduce((sum, step) => sum + step.chainLength - 1, 0),
      maxProbeLength: keyCount > 0 ? 1 : 0,
      occupiedSlots: chainLengths.filter((length) => length > 0).length,
      loadFactor: keyCount / result.tableSize,
      longestChain: Math.max(0, ...chainLengths),
    };
  }

  let placedCount = 0;
  let totalCollisions = 0;
  let maxProbeLength = 0;

  for (const step of result.steps) {
    if (step.status === 'failed') continue;
    placedCount++;
    totalCollisions += step.collisions;
    maxProbeLength = Math.max(maxProbeLength, step.probeSequence.length);
  }

  const occupiedSlots = result.solution.filter((slot) => slot !== null).length;

  return {
    keyCount,
    placedCount,
    failedCount: keyCount - placedCount,
    totalCollisions,
    maxProbeLength,
    occupiedSlots,
    loadFactor: placedCount / result.tableSize,
    longestChain: occupiedSlots > 0 ? 1 : 0,
  };
}

/**
 * Collision resolvers.
 *
 * Each resolver inserts the keys in order into an empty table of tableSize
 * slots and returns the final table and one step record per key. The open
 * addressing resolvers make at most tableSize probes per key. A key that
 * finds no empty slot gets a failed step and is left out of the table.
 */

import { QUADRATIC_EXHAUSTED_ERROR, TABLE_FULL_ERROR } from './constants';
import {
  chainingFormula,
  doubleHashingFormula,
  linearProbingFormula,
  quadraticProbingFormula,
} from './formulas';
import {
  assertTableSize,
  doubleHashProbe,
  linearProbe,
  primaryHash,
  quadraticProbe,
  secondaryHash,
} from './hasher';
import {
  ChainStep,
  ChainingResolution,
  DoubleHashResolution,
  DoubleHashStep,
  ProbingResolution,
  ProbingStep,
  Slot,
} from './types';

interface ProbeOutcome {
  probeSequence: number[];
  finalIndex: number;
}

/**
 * Probe slots probeAt(0), probeAt(1), ... and claim the first empty one for key.
 *
 * @returns The probes made, or null when tableSize probes found no empty slot
 */
function claimSlot(
  table: Slot[],
  key: number,
  probeAt: (i: number) => number
): ProbeOutcome | null {
  const probeSequence: number[] = [];

  for (let i = 0; i < table.length; i++) {
    const slot = probeAt(i);
    probeSequence.push(slot);
    if (table[slot] === null) {
      table[slot] = key;
      return { probeSequence, finalIndex: slot };
    }
  }

  return null;
}

function emptyTable(tableSize: number): Slot[] {
  return new Array<Slot>(tableSize).fill(null);
}

/**
 * Linear probing: h(k, i) = (h(k) + i) mod m.
 *
 * @example
 * ```typescript
 * const { solution } = resolveLinearProbing([10, 17, 24], 7);
 * // [null, null, null, 10, 17, 24, null]
 * ```
 */
export function resolveLinearProbing(keys: readonly number[], tableSize: number): ProbingResolution {
  assertTableSize(tableSize);
  const table = emptyTable(tableSize);
  const steps: ProbingStep[] = [];

  for (const key of keys) {
    const initialHash = primaryHash(key, tableSize);
    const outcome = claimSlot(table, key, (i) => linearProbe(initialHash, i, tableSize));

    if (!outcome) {
      steps.push({ status: 'failed', key, error: TABLE_FULL_ERROR });
      continue;
    }

    const collisions = outcome.probeSequence.length - 1;
    steps.push({
      status: 'placed',
      key,
      initialHash,
      probeSequence: outcome.probeSequence,
      finalIndex: outcome.finalIndex,
      collisions,
      formula: linearProbingFormula({ key, initialHash, collisions, tableSize }),
    });
  }

  return { solution: table, steps };
}

/**
 * Quadratic probing: h(k, i) = (h(k) + i²) mod m.
 *
 * With m probes the sequence may revisit slots and miss others, so a key can
 * fail while empty slots remain.
 */
export function resolveQuadraticProbing(
  keys: readonly number[],
  tableSize: number
): ProbingResolution {
  assertTableSize(tableSize);
  const table = emptyTable(tableSize);
  const steps: ProbingStep[] = [];

  for (const key of keys) {
    const initialHash = primaryHash(key, tableSize);
    const outcome = claimSlot(table, key, (i) => quadraticProbe(initialHash, i, tableSize));

    if (!outcome) {
      steps.push({ status: 'failed', key, error: QUADRATIC_EXHAUSTED_ERROR });
      continue;
    }

    const collisions = outcome.probeSequence.length - 1;
    steps.push({
      status: 'placed',
      key,
      initialHash,
      probeSequence: outcome.probeSequence,
      finalIndex: outcome.finalIndex,
      collisions,
      formula: quadraticProbingFormula({ key, initialHash, collisions, tableSize }),
    });
  }

  return { solution: table, steps };
}

/**
 * Double hashing: h(k, i) = (h1(k) + i * h2(k)) mod m, h2(k) = 1 + (k mod (m - 1)).
 *
 * Requires tableSize >= 2.
 */
export function resolveDoubleHashing(
  keys: readonly number[],
  tableSize: number
): DoubleHashResolution {
  assertTableSize(tableSize, 2);
  const table = emptyTable(tableSize);
  const steps: DoubleHashStep[] = [];

  for (const key of keys) {
    const initialHash = primaryHash(key, tableSize);
    const h2Value = secondaryHash(key, tableSize);
    const outcome = claimSlot(table, key, (i) =>
      doubleHashProbe(initialHash, i, h2Value, tableSize)
    );

    if (!outcome) {
      steps.push({ status: 'failed', key, error: TABLE_FULL_ERROR });
      continue;
    }

    const collisions = outcome.probeSequence.length - 1;
    steps.push({
      status: 'placed',
      key,
      initialHash,
      h2Value,
      probeSequence: outcome.probeSequence,
      finalIndex: outcome.finalIndex,
      collisions,
      formula: doubleHashingFormula({ key, initialHash, collisions, tableSize, h2Value }),
    });
  }

  return { solution: table, steps };
}

/**
 * Separate chaining: append each key to bucket k mod m. Never fails.
 */
export function resolveChaining(keys: readonly number[], tableSize: number): ChainingResolution {
  assertTableSize(tableSize);
  const buckets: number[][] = Array.from({ length: tableSize }, () => []);
  const steps: ChainStep[] = [];

  for (const key of keys) {
    const initialHash = primaryHash(key, tableSize);
    const bucket = buckets[initialHash];
    bucket.push(key);

    steps.push({
      key,
      initialHash,
      finalIndex: initialHash,
      chainLength: bucket.length,
      formula: chainingFormula({ key, initialHash, tableSize }),
    });
  }

  return { solution: buckets, steps };
}

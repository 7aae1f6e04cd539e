/**
 * Hash functions shared by the resolvers and key synthesizers.
 *
 * h(k)  = k mod m
 * h2(k) = 1 + (k mod (m - 1))
 *
 * h2 is never 0, so double hashing always advances.
 */

/**
 * Throw unless the table size is a positive integer.
 *
 * @param tableSize - Number of slots or buckets
 * @param minimum - Smallest accepted size (default: 1)
 */
export function assertTableSize(tableSize: number, minimum: number = 1): void {
  if (!Number.isInteger(tableSize) || tableSize < minimum) {
    throw new Error(`Table size must be an integer >= ${minimum}, got ${tableSize}`);
  }
}

/**
 * Primary hash: the slot a key tries first.
 *
 * @example
 * ```typescript
 * primaryHash(17, 7); // 3
 * ```
 */
export function primaryHash(key: number, tableSize: number): number {
  if (!Number.isInteger(key) || key < 0) {
    throw new Error(`Key must be a non-negative integer, got ${key}`);
  }
  return key % tableSize;
}

/**
 * Secondary hash for double hashing: the step between probes.
 *
 * @returns Step size in [1, tableSize - 1]
 *
 * @example
 * ```typescript
 * secondaryHash(17, 7); // 1 + (17 mod 6) = 6
 * ```
 */
export function secondaryHash(key: number, tableSize: number): number {
  return 1 + (key % (tableSize - 1));
}

/**
 * Slot examined at probe index i for each open addressing scheme.
 */
export function linearProbe(initialHash: number, i: number, tableSize: number): number {
  return (initialHash + i) % tableSize;
}

export function quadraticProbe(initialHash: number, i: number, tableSize: number): number {
  return (initialHash + i * i) % tableSize;
}

export function doubleHashProbe(
  initialHash: number,
  i: number,
  step: number,
  tableSize: number
): number {
  return (initialHash + i * step) % tableSize;
}

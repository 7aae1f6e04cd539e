/**
 * Formula strings shown beside each step.
 *
 * Probing formulas withhold the slot the learner has to work out ("= ?").
 * Chaining formulas are fully solved. Every builder is a pure function of
 * fields already on the step record.
 */

export interface ProbeFormulaInput {
  key: number;
  initialHash: number;
  collisions: number;
  tableSize: number;
}

export interface DoubleHashFormulaInput extends ProbeFormulaInput {
  h2Value: number;
}

export interface ChainFormulaInput {
  key: number;
  initialHash: number;
  tableSize: number;
}

function unsolvedModulo(key: number, tableSize: number): string {
  return `h(${key}) = ${key} mod ${tableSize} = ?`;
}

/**
 * @example
 * ```typescript
 * linearProbingFormula({ key: 17, initialHash: 3, collisions: 1, tableSize: 7 });
 * // 'h(17) = 17 mod 7 = 3 → collision(s), probe i=1..1'
 * ```
 */
export function linearProbingFormula({
  key,
  initialHash,
  collisions,
  tableSize,
}: ProbeFormulaInput): string {
  if (collisions === 0) {
    return unsolvedModulo(key, tableSize);
  }
  return `h(${key}) = ${key} mod ${tableSize} = ${initialHash} → collision(s), probe i=1..${collisions}`;
}

/**
 * One unsolved expression per probe, i = 0 through the final probe.
 */
export function quadraticProbingFormula({
  key,
  initialHash,
  collisions,
  tableSize,
}: ProbeFormulaInput): string {
  if (collisions === 0) {
    return unsolvedModulo(key, tableSize);
  }

  const probes: string[] = [];
  for (let p = 0; p <= collisions; p++) {
    probes.push(`i=${p}: (${initialHash} + ${p}²) mod ${tableSize} = ?`);
  }
  return probes.join(' | ');
}

/**
 * Both hashes unsolved on a direct hit; after a collision the hashes are
 * solved and only the final probe is left open.
 */
export function doubleHashingFormula({
  key,
  initialHash,
  collisions,
  tableSize,
  h2Value,
}: DoubleHashFormulaInput): string {
  const h2Expression = `h2(${key}) = 1 + (${key} mod ${tableSize - 1})`;

  if (collisions === 0) {
    return `h1(${key}) = ${key} mod ${tableSize} = ? | ${h2Expression} = ?`;
  }
  return (
    `h1(${key}) = ${key} mod ${tableSize} = ${initialHash} | ` +
    `${h2Expression} = ${h2Value} | ` +
    `collision(s) → i=${collisions}: (${initialHash} + ${collisions}×${h2Value}) mod ${tableSize} = ?`
  );
}

export function chainingFormula({ key, initialHash, tableSize }: ChainFormulaInput): string {
  return `${key} % ${tableSize} = ${initialHash}`;
}

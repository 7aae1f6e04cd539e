/**
 * Conversion of a PuzzleResult to the JSON document consumed by renderers.
 * Field names are snake_case; empty slots are null.
 */

import { ChainStep, DoubleHashStep, ProbingStep, PuzzleResult, Slot, Technique } from './types';

export interface PlacedStepDocument {
  key: number;
  initial_hash: number;
  h2_value?: number;
  probe_sequence: number[];
  final_index: number;
  collisions: number;
  formula: string;
}

export interface FailedStepDocument {
  key: number;
  error: string;
}

export interface ChainStepDocument {
  key: number;
  initial_hash: number;
  final_index: number;
  chain_length: number;
  formula: string;
}

export type StepDocument = PlacedStepDocument | FailedStepDocument | ChainStepDocument;

export interface PuzzleDocument {
  technique: Technique;
  technique_label: string;
  table_size: number;
  keys: number[];
  solution: Slot[] | number[][];
  steps: StepDocument[];
  description: string;
  formula_label: string;
}

function probingStepDocument(
  step: ProbingStep | DoubleHashStep
): PlacedStepDocument | FailedStepDocument {
  if (step.status === 'failed') {
    return { key: step.key, error: step.error };
  }

  const document: PlacedStepDocument = {
    key: step.key,
    initial_hash: step.initialHash,
    probe_sequence: [...step.probeSequence],
    final_index: step.finalIndex,
    collisions: step.collisions,
    formula: step.formula,
  };
  if ('h2Value' in step) {
    document.h2_value = step.h2Value;
  }
  return document;
}

function chainStepDocument(step: ChainStep): ChainStepDocument {
  return {
    key: step.key,
    initial_hash: step.initialHash,
    final_index: step.finalIndex,
    chain_length: step.chainLength,
    formula: step.formula,
  };
}

/**
 * Build the serializable document for a puzzle.
 *
 * @example
 * ```typescript
 * const json = JSON.stringify(toPuzzleDocument(generatePuzzle('chaining', 'easy')));
 * ```
 */
export function toPuzzleDocument(result: PuzzleResult): PuzzleDocument {
  const header = {
    technique: result.technique,
    technique_label: result.techniqueLabel,
    table_size: result.tableSize,
    keys: [...result.keys],
  };
  const footer = {
    description: result.description,
    formula_label: result.formulaLabel,
  };

  if (result.technique === 'chaining') {
    return {
      ...header,
      solution: result.solution.map((bucket) => [...bucket]),
      steps: result.steps.map(chainStepDocument),
      ...footer,
    };
  }

  const steps: ReadonlyArray<ProbingStep | DoubleHashStep> = result.steps;
  return {
    ...header,
    solution: [...result.solution],
    steps: steps.map(probingStepDocument),
    ...footer,
  };
}

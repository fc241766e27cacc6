import type { CriticResult } from './types.js';

export const TOOL_SELECTION_FIELD = 'tool_selection';

/**
 * The implicit critic every pairing gets: exact tool-name equality,
 * weighted by the rubric.
 */
export class ToolSelectionCritic {
  readonly field = TOOL_SELECTION_FIELD;
  readonly weight: number;

  constructor(weight: number) {
    this.weight = weight;
  }

  evaluate(expected: string, actual: string): CriticResult {
    const matched = expected === actual;
    return { matched, score: matched ? this.weight : 0 };
  }
}

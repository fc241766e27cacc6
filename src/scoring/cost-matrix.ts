import type { Critic } from '../critics/index.js';
import type { ToolSelectionCritic } from '../critics/tool-selection.js';
import type { ActualToolCall, ExpectedToolCall, FieldResult } from '../evals/types.js';

/** Everything scored for one expected/actual pairing. */
export interface PairScore {
  score: number;
  weight: number;
  fieldResults: FieldResult[];
}

/** Weight penalty per unit of fired weight in the assignment objective. */
export const TIE_BREAK_PENALTY = 1e-9;

export interface CostMatrix {
  /** Square, padded with zero rows/columns up to max(n, m). */
  matrix: number[][];
  /**
   * What the assignment maximizes: score minus `TIE_BREAK_PENALTY * weight`.
   * Among pairings with equal total score, the one with less fired weight wins.
   */
  objective: number[][];
  /** `pairs[i][j]` for real expected call i and real actual call j. */
  pairs: PairScore[][];
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function scorePair(
  expected: ExpectedToolCall,
  actual: ActualToolCall,
  toolSelection: ToolSelectionCritic,
  critics: readonly Critic[]
): PairScore {
  const selection = toolSelection.evaluate(expected.name, actual.name);
  const fieldResults: FieldResult[] = [
    {
      field: toolSelection.field,
      expected: expected.name,
      actual: actual.name,
      matched: selection.matched,
      score: selection.score,
      weight: toolSelection.weight,
    },
  ];
  let score = selection.score;
  let weight = toolSelection.weight;

  for (const critic of critics) {
    const expectedValue = expected.args[critic.field];
    const actualValue = actual.args[critic.field];
    if (!isPresent(expectedValue) || !isPresent(actualValue)) {
      continue;
    }

    const result = critic.evaluate(expectedValue, actualValue);
    score += result.score;
    weight += critic.weight;
    fieldResults.push({
      field: critic.field,
      expected: expectedValue,
      actual: actualValue,
      matched: result.matched,
      score: result.score,
      weight: critic.weight,
    });
  }

  return { score, weight, fieldResults };
}

export function buildCostMatrix(
  expectedCalls: readonly ExpectedToolCall[],
  actualCalls: readonly ActualToolCall[],
  toolSelection: ToolSelectionCritic,
  critics: readonly Critic[]
): CostMatrix {
  const k = Math.max(expectedCalls.length, actualCalls.length);
  const matrix = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  const objective = Array.from({ length: k }, () => new Array<number>(k).fill(0));

  const pairs = expectedCalls.map((expected, i) =>
    actualCalls.map((actual, j) => {
      const pair = scorePair(expected, actual, toolSelection, critics);
      matrix[i][j] = pair.score;
      objective[i][j] = pair.score - TIE_BREAK_PENALTY * pair.weight;
      return pair;
    })
  );

  return { matrix, objective, pairs };
}

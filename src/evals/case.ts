import { ToolSelectionCritic, type Critic } from '../critics/index.js';
import { buildCostMatrix, classify, normalizeScore, solveAssignment } from '../scoring/index.js';
import { ValidationError } from './errors.js';
import type { EvalRubric } from './rubric.js';
import {
  EXTRA_TOOL_CALL_FIELD,
  MISSING_TOOL_CALL_FIELD,
  type ActualToolCall,
  type ChatMessage,
  type EvaluationResult,
  type ExpectedToolCall,
  type FieldResult,
} from './types.js';

export interface WeightPolicy {
  maxTotalWeight: number;
  minWeight: number;
}

export const DEFAULT_WEIGHT_POLICY: WeightPolicy = {
  maxTotalWeight: 1.0,
  minWeight: 0.1,
};

const WEIGHT_EPSILON = 1e-9;

export interface EvalCaseOptions {
  name: string;
  userMessage: string;
  expectedToolCalls: readonly ExpectedToolCall[];
  rubric: EvalRubric;
  critics?: readonly Critic[];
  additionalMessages?: readonly ChatMessage[];
  /** Pass `false` to skip the critic weight checks. */
  weightPolicy?: WeightPolicy | false;
}

/**
 * One scenario: what the user says, which tool calls should follow, and how
 * to score what actually came back. Immutable once built.
 */
export class EvalCase {
  readonly name: string;
  readonly userMessage: string;
  readonly expectedToolCalls: readonly ExpectedToolCall[];
  readonly rubric: EvalRubric;
  readonly critics: readonly Critic[];
  readonly additionalMessages: readonly ChatMessage[];
  readonly weightPolicy: WeightPolicy | false;

  constructor(options: EvalCaseOptions) {
    const weightPolicy = options.weightPolicy ?? DEFAULT_WEIGHT_POLICY;
    const critics = options.critics ?? [];
    const issues = [
      ...checkCase(options),
      ...(weightPolicy ? checkCriticWeights(critics, weightPolicy) : []),
    ];
    if (issues.length > 0) {
      throw new ValidationError(`Invalid eval case '${options.name}'`, issues);
    }

    this.name = options.name;
    this.userMessage = options.userMessage;
    this.expectedToolCalls = deepFreeze(
      options.expectedToolCalls.map(call => ({ name: call.name, args: structuredClone(call.args) }))
    );
    this.rubric = options.rubric;
    this.critics = Object.freeze([...critics]);
    this.additionalMessages = Object.freeze(options.additionalMessages?.map(m => ({ ...m })) ?? []);
    this.weightPolicy = weightPolicy;
    Object.freeze(this);
  }

  evaluate(actualToolCalls: readonly ActualToolCall[]): EvaluationResult {
    const expected = this.expectedToolCalls;
    const { rubric } = this;

    if (rubric.failOnToolSelection && !sameNames(expected, actualToolCalls)) {
      return failedEvaluation();
    }
    if (rubric.failOnToolCallQuantity && expected.length !== actualToolCalls.length) {
      return failedEvaluation();
    }

    const toolSelection = new ToolSelectionCritic(rubric.toolSelectionWeight);
    const { objective, pairs } = buildCostMatrix(expected, actualToolCalls, toolSelection, this.critics);
    const { rowToColumn } = solveAssignment(objective);

    let totalScore = 0;
    let totalWeight = 0;
    const fieldResults: FieldResult[] = [];
    const pairedActual = new Set<number>();

    rowToColumn.forEach((j, i) => {
      if (i >= expected.length) {
        return;
      }
      if (j >= actualToolCalls.length) {
        totalWeight += 1;
        fieldResults.push(unmatched(MISSING_TOOL_CALL_FIELD, expected[i].name, null));
        return;
      }

      const pair = pairs[i][j];
      totalScore += pair.score;
      totalWeight += pair.weight;
      fieldResults.push(...pair.fieldResults);
      pairedActual.add(j);
    });

    actualToolCalls.forEach((call, j) => {
      if (!pairedActual.has(j)) {
        totalWeight += 1;
        fieldResults.push(unmatched(EXTRA_TOOL_CALL_FIELD, null, call.name));
      }
    });

    const score = normalizeScore(totalScore, totalWeight);
    return {
      score,
      classification: classify(score, rubric),
      fieldResults,
    };
  }
}

export function evaluate(evalCase: EvalCase, actualToolCalls: readonly ActualToolCall[]): EvaluationResult {
  return evalCase.evaluate(actualToolCalls);
}

export function failedEvaluation(): EvaluationResult {
  return { score: 0, classification: 'FAIL', fieldResults: [] };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function unmatched(field: string, expected: string | null, actual: string | null): FieldResult {
  return { field, expected, actual, matched: false, score: 0, weight: 1 };
}

function sameNames(expected: readonly ExpectedToolCall[], actual: readonly ActualToolCall[]): boolean {
  const expectedNames = new Set(expected.map(call => call.name));
  const actualNames = new Set(actual.map(call => call.name));
  if (expectedNames.size !== actualNames.size) {
    return false;
  }
  return [...expectedNames].every(name => actualNames.has(name));
}

function checkCase(options: EvalCaseOptions): string[] {
  const issues: string[] = [];
  if (!options.name) {
    issues.push('name is required');
  }
  if (typeof options.userMessage !== 'string') {
    issues.push('userMessage must be a string');
  }
  options.expectedToolCalls.forEach((call, i) => {
    if (!call.name) {
      issues.push(`expectedToolCalls[${i}] needs a tool name`);
    }
    if (typeof call.args !== 'object' || call.args === null || Array.isArray(call.args)) {
      issues.push(`expectedToolCalls[${i}].args must be an object`);
    }
  });
  return issues;
}

function checkCriticWeights(critics: readonly Critic[], policy: WeightPolicy): string[] {
  const issues: string[] = [];
  for (const critic of critics) {
    if (critic.weight < policy.minWeight - WEIGHT_EPSILON) {
      issues.push(`critic '${critic.field}' weight ${critic.weight} is below the minimum of ${policy.minWeight}`);
    }
  }

  const total = critics.reduce((sum, critic) => sum + critic.weight, 0);
  if (total > policy.maxTotalWeight + WEIGHT_EPSILON) {
    issues.push(`critic weights sum to ${total}, above the maximum of ${policy.maxTotalWeight}`);
  }
  return issues;
}

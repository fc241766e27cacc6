import { ValidationError } from './errors.js';

export interface EvalRubricOptions {
  failThreshold: number;
  warnThreshold: number;
  toolSelectionWeight?: number;
  failOnToolSelection?: boolean;
  failOnToolCallQuantity?: boolean;
}

/**
 * Thresholds and policy flags that turn a normalized score into
 * FAIL / WARN / PASS.
 */
export class EvalRubric {
  readonly failThreshold: number;
  readonly warnThreshold: number;
  readonly toolSelectionWeight: number;
  /** Fail outright when the set of called tool names differs from the expected set. */
  readonly failOnToolSelection: boolean;
  /** Fail outright when the number of calls differs. */
  readonly failOnToolCallQuantity: boolean;

  constructor(options: EvalRubricOptions) {
    const {
      failThreshold,
      warnThreshold,
      toolSelectionWeight = 1.0,
      failOnToolSelection = true,
      failOnToolCallQuantity = true,
    } = options;

    const issues: string[] = [];
    if (!isUnitInterval(failThreshold)) {
      issues.push(`failThreshold must be between 0 and 1, got ${failThreshold}`);
    }
    if (!isUnitInterval(warnThreshold)) {
      issues.push(`warnThreshold must be between 0 and 1, got ${warnThreshold}`);
    }
    if (issues.length === 0 && failThreshold > warnThreshold) {
      issues.push(`failThreshold (${failThreshold}) must not exceed warnThreshold (${warnThreshold})`);
    }
    if (!Number.isFinite(toolSelectionWeight) || toolSelectionWeight <= 0) {
      issues.push(`toolSelectionWeight must be a positive number, got ${toolSelectionWeight}`);
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid rubric', issues);
    }

    this.failThreshold = failThreshold;
    this.warnThreshold = warnThreshold;
    this.toolSelectionWeight = toolSelectionWeight;
    this.failOnToolSelection = failOnToolSelection;
    this.failOnToolCallQuantity = failOnToolCallQuantity;
    Object.freeze(this);
  }

  with(overrides: Partial<EvalRubricOptions>): EvalRubric {
    return new EvalRubric({ ...this.toOptions(), ...overrides });
  }

  toOptions(): Required<EvalRubricOptions> {
    return {
      failThreshold: this.failThreshold,
      warnThreshold: this.warnThreshold,
      toolSelectionWeight: this.toolSelectionWeight,
      failOnToolSelection: this.failOnToolSelection,
      failOnToolCallQuantity: this.failOnToolCallQuantity,
    };
  }
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

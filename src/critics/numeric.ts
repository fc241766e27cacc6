import { ConfigurationError } from '../evals/errors.js';
import { assertCriticOptions, assertThreshold } from './base.js';
import type { BaseCritic, CriticOptions, CriticResult } from './types.js';

export interface NumericCriticOptions extends CriticOptions {
  valueRange: readonly [number, number];
  matchThreshold?: number;
}

const DEFAULT_MATCH_THRESHOLD = 0.8;

/**
 * Fuzzy numeric comparison. Both values are normalized against `valueRange`
 * (out-of-range values extrapolate) and the similarity is one minus the
 * distance between them, floored at zero.
 *
 * The range is only checked when scoring, so a case carrying a degenerate
 * range still loads and fails with a ConfigurationError when evaluated.
 */
export class NumericCritic implements BaseCritic {
  readonly kind = 'numeric' as const;
  readonly field: string;
  readonly weight: number;
  readonly valueRange: readonly [number, number];
  readonly matchThreshold: number;

  constructor(options: NumericCriticOptions) {
    assertCriticOptions(options);
    const matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
    assertThreshold('matchThreshold', matchThreshold);
    this.field = options.field;
    this.weight = options.weight;
    this.valueRange = [options.valueRange[0], options.valueRange[1]];
    this.matchThreshold = matchThreshold;
  }

  evaluate(expected: unknown, actual: unknown): CriticResult {
    const similarity = this.similarity(expected, actual);
    return {
      matched: similarity >= this.matchThreshold,
      score: this.weight * similarity,
    };
  }

  similarity(expected: unknown, actual: unknown): number {
    const [min, max] = this.valueRange;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
      throw new ConfigurationError(
        `Numeric critic for '${this.field}' needs min < max, got [${min}, ${max}]`,
        this.field
      );
    }

    const e = toNumber(expected);
    const a = toNumber(actual);
    if (e === null || a === null) {
      return 0;
    }

    const span = max - min;
    const distance = Math.abs((e - min) / span - (a - min) / span);
    return Math.min(1, Math.max(0, 1 - distance));
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

import { isDeepStrictEqual } from 'node:util';
import { assertCriticOptions } from './base.js';
import type { BaseCritic, CriticOptions, CriticResult } from './types.js';

/**
 * Exact structural equality. Full weight on a match, nothing otherwise.
 */
export class BinaryCritic implements BaseCritic {
  readonly kind = 'binary' as const;
  readonly field: string;
  readonly weight: number;

  constructor(options: CriticOptions) {
    assertCriticOptions(options);
    this.field = options.field;
    this.weight = options.weight;
  }

  evaluate(expected: unknown, actual: unknown): CriticResult {
    const matched = isDeepStrictEqual(expected, actual);
    return { matched, score: matched ? this.weight : 0 };
  }
}

import { ConfigurationError } from '../evals/errors.js';
import { assertCriticOptions, assertThreshold } from './base.js';
import { createSimilarityRegistry } from './similarity/index.js';
import type { BaseCritic, CriticOptions, CriticResult, SimilarityRegistry } from './types.js';

export interface SimilarityCriticOptions extends CriticOptions {
  metric?: string;
  similarityThreshold?: number;
  strategies?: SimilarityRegistry;
}

const DEFAULT_METRIC = 'cosine';
const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

/**
 * Compares the textual form of two values with a named similarity strategy.
 */
export class SimilarityCritic implements BaseCritic {
  readonly kind = 'similarity' as const;
  readonly field: string;
  readonly weight: number;
  readonly metric: string;
  readonly similarityThreshold: number;
  private readonly strategies: SimilarityRegistry;

  constructor(options: SimilarityCriticOptions) {
    assertCriticOptions(options);
    const similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    assertThreshold('similarityThreshold', similarityThreshold);
    this.field = options.field;
    this.weight = options.weight;
    this.metric = options.metric ?? DEFAULT_METRIC;
    this.similarityThreshold = similarityThreshold;
    this.strategies = options.strategies ?? createSimilarityRegistry();
  }

  evaluate(expected: unknown, actual: unknown): CriticResult {
    const strategy = this.strategies.get(this.metric);
    if (!strategy) {
      throw new ConfigurationError(
        `Unsupported similarity metric '${this.metric}' for '${this.field}' (available: ${[...this.strategies.keys()].join(', ')})`,
        this.field
      );
    }

    const raw = strategy.similarity(toText(expected), toText(actual));
    const similarity = Number.isFinite(raw) ? Math.min(1, Math.max(0, raw)) : 0;
    return {
      matched: similarity >= this.similarityThreshold,
      score: this.weight * similarity,
    };
  }
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

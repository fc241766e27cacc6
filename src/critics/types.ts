export interface CriticResult {
  matched: boolean;
  score: number;
}

export type CriticKind = 'binary' | 'numeric' | 'similarity';

export interface CriticOptions {
  field: string;
  weight: number;
}

/**
 * Scores one expected argument value against the value the model produced.
 * `score` is always within `[0, weight]`.
 */
export interface BaseCritic {
  readonly kind: CriticKind;
  readonly field: string;
  readonly weight: number;
  evaluate(expected: unknown, actual: unknown): CriticResult;
}

export interface SimilarityStrategy {
  name: string;
  /** Returns a similarity in [0, 1]; must be deterministic for equal inputs. */
  similarity(a: string, b: string): number;
}

export type SimilarityRegistry = ReadonlyMap<string, SimilarityStrategy>;

import type { SimilarityRegistry, SimilarityStrategy } from '../types.js';
import { cosineSimilarity } from './cosine.js';
import { jaccardSimilarity } from './jaccard.js';

export { cosineSimilarity } from './cosine.js';
export { jaccardSimilarity } from './jaccard.js';
export { tokenize } from './tokenize.js';

export const BUILTIN_SIMILARITY_STRATEGIES: readonly SimilarityStrategy[] = [
  cosineSimilarity,
  jaccardSimilarity,
];

export function createSimilarityRegistry(
  strategies: readonly SimilarityStrategy[] = BUILTIN_SIMILARITY_STRATEGIES
): SimilarityRegistry {
  return new Map(strategies.map(s => [s.name, s]));
}

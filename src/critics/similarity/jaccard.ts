import type { SimilarityStrategy } from '../types.js';
import { tokenize } from './tokenize.js';

export const jaccardSimilarity: SimilarityStrategy = {
  name: 'jaccard',
  similarity(a: string, b: string): number {
    const left = new Set(tokenize(a));
    const right = new Set(tokenize(b));
    if (left.size === 0 && right.size === 0) {
      return 1;
    }

    let shared = 0;
    for (const token of left) {
      if (right.has(token)) shared++;
    }
    return shared / (left.size + right.size - shared);
  },
};

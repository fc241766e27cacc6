import type { SimilarityStrategy } from '../types.js';
import { tokenize } from './tokenize.js';

type Vector = Map<string, number>;

/**
 * TF-IDF cosine similarity with the vocabulary and document frequencies
 * fitted on the two inputs alone. Scores are relative to that tiny corpus:
 * a term shared by both strings gets the lowest idf.
 */
export const cosineSimilarity: SimilarityStrategy = {
  name: 'cosine',
  similarity(a: string, b: string): number {
    const docs = [termCounts(tokenize(a)), termCounts(tokenize(b))];
    const idf = inverseDocumentFrequency(docs);
    if (idf.size === 0) {
      return 0;
    }

    const [va, vb] = docs.map(counts => normalize(weigh(counts, idf)));
    let dot = 0;
    for (const [term, weight] of va) {
      dot += weight * (vb.get(term) ?? 0);
    }
    return Math.min(1, Math.max(0, dot));
  },
};

function termCounts(tokens: string[]): Vector {
  const counts: Vector = new Map();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

// Smoothed idf: ln((1 + n) / (1 + df)) + 1
function inverseDocumentFrequency(docs: Vector[]): Vector {
  const df: Vector = new Map();
  for (const doc of docs) {
    for (const term of doc.keys()) {
      df.set(term, (df.get(term) ?? 0) + 1);
    }
  }

  const n = docs.length;
  const idf: Vector = new Map();
  for (const [term, count] of df) {
    idf.set(term, Math.log((1 + n) / (1 + count)) + 1);
  }
  return idf;
}

function weigh(counts: Vector, idf: Vector): Vector {
  const weighted: Vector = new Map();
  for (const [term, count] of counts) {
    weighted.set(term, count * (idf.get(term) ?? 0));
  }
  return weighted;
}

function normalize(vector: Vector): Vector {
  let norm = 0;
  for (const value of vector.values()) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);
  if (norm === 0) {
    return vector;
  }

  const unit: Vector = new Map();
  for (const [term, value] of vector) {
    unit.set(term, value / norm);
  }
  return unit;
}

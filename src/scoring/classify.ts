import type { Classification } from '../evals/types.js';

export interface Thresholds {
  failThreshold: number;
  warnThreshold: number;
}

/** Ascending tiers: below fail is FAIL, below warn is WARN, the rest PASS. */
export function classify(score: number, { failThreshold, warnThreshold }: Thresholds): Classification {
  if (score < failThreshold) {
    return 'FAIL';
  }
  if (score < warnThreshold) {
    return 'WARN';
  }
  return 'PASS';
}

export function normalizeScore(totalScore: number, totalWeight: number): number {
  return totalWeight > 0 ? totalScore / totalWeight : 0;
}

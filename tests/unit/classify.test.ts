import { describe, expect, it } from 'vitest';
import { classify, normalizeScore } from '../../src/scoring/index.js';

describe('classify', () => {
  const thresholds = { failThreshold: 0.5, warnThreshold: 0.8 };

  it('uses ascending tiers', () => {
    expect(classify(0.49, thresholds)).toBe('FAIL');
    expect(classify(0.5, thresholds)).toBe('WARN');
    expect(classify(0.79, thresholds)).toBe('WARN');
    expect(classify(0.8, thresholds)).toBe('PASS');
    expect(classify(1, thresholds)).toBe('PASS');
  });

  it('skips WARN when both thresholds are equal', () => {
    const equal = { failThreshold: 0.7, warnThreshold: 0.7 };
    expect(classify(0.69, equal)).toBe('FAIL');
    expect(classify(0.7, equal)).toBe('PASS');
  });

  it('always passes with zero thresholds', () => {
    expect(classify(0, { failThreshold: 0, warnThreshold: 0 })).toBe('PASS');
  });
});

describe('normalizeScore', () => {
  it('divides score by weight', () => {
    expect(normalizeScore(1.5, 2.5)).toBeCloseTo(0.6);
  });

  it('returns 0 when there is no weight', () => {
    expect(normalizeScore(0, 0)).toBe(0);
  });
});

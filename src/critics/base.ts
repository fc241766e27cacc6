import { ValidationError } from '../evals/errors.js';
import type { CriticOptions } from './types.js';

export function assertCriticOptions({ field, weight }: CriticOptions): void {
  const issues: string[] = [];
  if (typeof field !== 'string' || field.length === 0) {
    issues.push('field must be a non-empty string');
  }
  if (!Number.isFinite(weight) || weight <= 0 || weight > 1) {
    issues.push(`weight for '${field}' must be in (0, 1], got ${weight}`);
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid critic', issues);
  }
}

export function assertThreshold(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError('Invalid critic', [`${name} must be between 0 and 1, got ${value}`]);
  }
}

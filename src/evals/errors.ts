/**
 * Raised while constructing a case, rubric, critic or suite whose
 * configuration breaks a structural rule. Nothing has been evaluated yet.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Raised by a critic at evaluation time when its own settings make it
 * impossible to score (degenerate numeric range, unknown similarity metric).
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

export class AssignmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssignmentError';
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

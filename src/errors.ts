/** Raised when two groups are asked to interact in a way the rules forbid. */
export class InvalidOperationError extends Error {
  readonly code = 'INVALID_OPERATION';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/** Raised before any search runs when the supplied groups or rules are unusable. */
export class MalformedInputError extends Error {
  readonly code = 'MALFORMED_INPUT';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'MalformedInputError';
    this.issues = issues;
  }
}

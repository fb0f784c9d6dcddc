/**
 * Raised when the static assessment configuration or the environment
 * configuration is inconsistent. Thrown at startup, never caught by the UI.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Raised when a score outside the configured rating set reaches the session or the aggregator. */
export class InvalidRatingError extends Error {
  readonly value: unknown;
  readonly max: number;

  constructor(value: unknown, max: number) {
    super(`Rating must be an integer between 1 and ${max}, received ${String(value)}`);
    this.name = 'InvalidRatingError';
    this.value = value;
    this.max = max;
  }
}

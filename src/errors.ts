/**
 * Error classes for Promptward
 */

/**
 * Base error class with a code for programmatic handling
 */
export class PromptwardError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'PromptwardError';
    this.code = code;
  }
}

/**
 * Prompt is missing or not a string. A caller contract violation,
 * rejected before detection runs.
 */
export class InvalidInputError extends PromptwardError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/**
 * Malformed rule table or environment. Raised at startup only.
 */
export class ConfigurationError extends PromptwardError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], options?: { cause?: unknown }) {
    super(
      problems.length > 0 ? `${message}: ${problems.join('; ')}` : message,
      'CONFIGURATION_ERROR',
      options
    );
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Narrow an unknown prompt value to a string
 */
export function assertPrompt(value: unknown): asserts value is string {
  if (typeof value !== 'string') {
    throw new InvalidInputError('Missing or invalid prompt');
  }
}

/**
 * Return the prompt if it is a string, else throw InvalidInputError
 */
export function requirePrompt(value: unknown): string {
  assertPrompt(value);
  return value;
}

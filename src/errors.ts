/**
 * Errors
 *
 * Error types for theme parsing, validation, rendering and deployment.
 * Every class carries a stable `code` and a user-facing message for the CLI.
 */

/**
 * Base class for all huectl errors.
 */
export class HuectlError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'HuectlError';
  }

  /**
   * Get a message suitable for terminal output.
   */
  toUserMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a color value is not exactly six hex digits (with an optional `#`).
 */
export class InvalidColorFormatError extends HuectlError {
  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super('INVALID_COLOR_FORMAT', `Invalid color format for '${field}': '${value}'`);
    this.name = 'InvalidColorFormatError';
  }

  toUserMessage(): string {
    return `${this.field}: '${this.value}' is not a color. Expected #RRGGBB, e.g. #282828.`;
  }
}

/**
 * Thrown when a required theme field is absent.
 */
export class MissingRequiredFieldError extends HuectlError {
  constructor(public readonly field: string) {
    super('MISSING_REQUIRED_FIELD', `Missing required field: ${field}`);
    this.name = 'MissingRequiredFieldError';
  }

  toUserMessage(): string {
    return `${this.field}: required field is missing`;
  }
}

/**
 * Thrown when a field is present but has the wrong type or an unusable value.
 */
export class InvalidFieldError extends HuectlError {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super('INVALID_FIELD', `Invalid value for '${field}': ${reason}`);
    this.name = 'InvalidFieldError';
  }

  toUserMessage(): string {
    return `${this.field}: ${this.reason}`;
  }
}

/**
 * Thrown when theme source text is not valid TOML.
 */
export class ThemeSyntaxError extends HuectlError {
  constructor(message: string) {
    super('THEME_SYNTAX', message);
    this.name = 'ThemeSyntaxError';
  }

  toUserMessage(): string {
    return `Theme file is not valid TOML: ${this.message}`;
  }
}

/**
 * A single structural problem found while validating a theme.
 */
export type StructuralProblem =
  | MissingRequiredFieldError
  | InvalidColorFormatError
  | InvalidFieldError;

/**
 * Thrown when the structural validation pass finds one or more problems.
 */
export class ValidationError extends HuectlError {
  constructor(public readonly problems: readonly StructuralProblem[]) {
    super(
      'VALIDATION_FAILED',
      `Theme validation failed with ${problems.length} problem(s): ${problems.map((p) => p.message).join('; ')}`
    );
    this.name = 'ValidationError';
  }

  toUserMessage(): string {
    const lines = this.problems.map((problem) => `  - ${problem.toUserMessage()}`);
    return `Theme validation failed:\n${lines.join('\n')}`;
  }
}

/**
 * Thrown when a format name does not match any registered generator.
 */
export class UnknownGeneratorError extends HuectlError {
  constructor(
    public readonly generatorName: string,
    public readonly available: readonly string[] = []
  ) {
    super('UNKNOWN_GENERATOR', `Unknown format: '${generatorName}'`);
    this.name = 'UnknownGeneratorError';
  }

  toUserMessage(): string {
    if (this.available.length === 0) {
      return this.message;
    }
    return `${this.message}. Supported formats: ${this.available.join(', ')}`;
  }
}

/**
 * Wraps a failure raised while rendering one target.
 */
export class GeneratorError extends HuectlError {
  constructor(
    public readonly target: string,
    public readonly cause: unknown
  ) {
    super('GENERATOR_FAILED', `Failed to generate ${target}: ${describeCause(cause)}`);
    this.name = 'GeneratorError';
  }
}

/**
 * Wraps a failure raised while writing one target's file.
 */
export class DeploymentError extends HuectlError {
  constructor(
    public readonly target: string,
    public readonly path: string,
    public readonly cause: unknown
  ) {
    super('DEPLOYMENT_FAILED', `Failed to deploy ${target} to ${path}: ${describeCause(cause)}`);
    this.name = 'DeploymentError';
  }
}

/**
 * Type guard for HuectlError.
 */
export function isHuectlError(error: unknown): error is HuectlError {
  return error instanceof HuectlError;
}

/**
 * Best message for an unknown thrown value.
 */
export function describeCause(cause: unknown): string {
  if (isHuectlError(cause)) {
    return cause.toUserMessage();
  }
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * True for a Node.js system error with the given `code` (e.g. `ENOENT`).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

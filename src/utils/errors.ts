// src/utils/errors.ts

/**
 * The validation engine was used incorrectly: unknown rule, bad rule
 * parameter, malformed rule expression or a non-object handed to struct
 * validation. Never raised for a value that merely fails its rules.
 */
export class InvalidValidationError extends Error {
  constructor(
    message: string,
    public readonly rule?: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'InvalidValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CatalogError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`[${filePath}] ${message}`);
    this.name = 'CatalogError';
  }
}

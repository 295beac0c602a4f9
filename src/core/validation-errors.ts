// src/core/validation-errors.ts

export type FieldErrors = Record<string, Record<string, string>>;

/**
 * Result of one validation call: field -> rule -> localized message, plus
 * at most one internal error when the call itself failed.
 *
 * A (field, rule) pair holds one message; adding it again replaces it.
 */
export class ValidationErrors {
  private readonly failures = new Map<string, Map<string, string>>();

  private constructor(private readonly internal?: Error) {}

  static empty(): ValidationErrors {
    return new ValidationErrors();
  }

  static fromInternal(error: Error): ValidationErrors {
    return new ValidationErrors(error);
  }

  hasError(): boolean {
    return this.hasInternalError() || this.hasValidationErrors();
  }

  hasInternalError(): boolean {
    return this.internal !== undefined;
  }

  hasValidationErrors(): boolean {
    return this.failures.size > 0;
  }

  isFailed(field: string): boolean {
    return this.failures.has(field);
  }

  isFailedOn(field: string, rule: string): boolean {
    return this.failures.get(field)?.has(rule) ?? false;
  }

  /** The internal error, or undefined when the call itself succeeded. */
  internalError(): Error | undefined {
    return this.internal;
  }

  /** Copy of all failures; changing it does not affect this instance. */
  errors(): FieldErrors {
    const result: FieldErrors = {};
    for (const [field, rules] of this.failures) {
      result[field] = Object.fromEntries(rules);
    }
    return result;
  }

  messages(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [field, rules] of this.failures) {
      result[field] = [...rules.values()];
    }
    return result;
  }

  rules(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [field, rules] of this.failures) {
      result[field] = [...rules.keys()];
    }
    return result;
  }

  addError(field: string, rule: string, message = ''): void {
    let rules = this.failures.get(field);
    if (!rules) {
      rules = new Map();
      this.failures.set(field, rules);
    }
    rules.set(rule, message);
  }

  toJSON(): FieldErrors {
    return this.errors();
  }

  toString(): string {
    let output = '';
    for (const [field, rules] of this.failures) {
      output += `${field}:\n`;
      for (const [rule, message] of rules) {
        output += `    ${rule}: ${message}\n`;
      }
    }
    return output;
  }
}

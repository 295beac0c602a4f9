// src/utils/error-factory.ts

import { CatalogError, InvalidValidationError } from './errors.js';

export interface InternalErrorDetails {
  name: string;
  message: string;
  rule?: string;
  field?: string;
  suggestion?: string;
}

export class ErrorFactory {
  static describeInternalError(error: unknown): InternalErrorDetails {
    const details: InternalErrorDetails = {
      name: error instanceof Error ? error.name : 'Error',
      message: error instanceof Error ? error.message : String(error),
    };

    if (error instanceof InvalidValidationError) {
      if (error.rule !== undefined) details.rule = error.rule;
      if (error.field !== undefined) details.field = error.field;
    }

    const suggestion = this.getSuggestion(details.message, error);
    if (suggestion) {
      details.suggestion = suggestion;
    }

    return details;
  }

  private static getSuggestion(message: string, error: unknown): string | undefined {
    if (message.includes('Undefined validation function')) {
      return 'Register the rule with addValidation() or enable its format checker before validating.';
    }

    if (message.includes('Bad param')) {
      return 'Check the rule parameter: numeric rules such as min, max and len need a number after "=".';
    }

    if (message.includes('expects an object')) {
      return 'Struct validation needs an object; use var() for single values.';
    }

    if (error instanceof CatalogError) {
      return 'Check the catalog file: it needs a "locale" and a "messages" map of rule names to templates.';
    }

    if (message.includes('YAML') || message.includes('JSON')) {
      return 'Check the syntax of the input file.';
    }

    return undefined;
  }
}

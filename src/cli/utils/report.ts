// src/cli/utils/report.ts

import chalk from 'chalk';
import { ValidationErrors } from '../../core/validation-errors.js';
import { ErrorFactory } from '../../utils/error-factory.js';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_INTERNAL = 2;

export function exitCodeFor(result: ValidationErrors): number {
  if (result.hasInternalError()) return EXIT_INTERNAL;
  if (result.hasValidationErrors()) return EXIT_INVALID;
  return EXIT_VALID;
}

/**
 * Render a result for the terminal: coloured field/rule listing, or JSON
 * in the aggregate's serialized shape.
 */
export function formatReport(result: ValidationErrors, json = false): string {
  const internal = result.internalError();

  if (json) {
    if (internal) {
      return JSON.stringify({ internalError: ErrorFactory.describeInternalError(internal) }, null, 2);
    }
    return JSON.stringify(result, null, 2);
  }

  if (internal) {
    const details = ErrorFactory.describeInternalError(internal);
    const lines = [chalk.red(`${details.name}: ${details.message}`)];
    if (details.suggestion) {
      lines.push(chalk.dim(`  ${details.suggestion}`));
    }
    return lines.join('\n');
  }

  if (!result.hasValidationErrors()) {
    return chalk.green('valid');
  }

  const lines: string[] = [];
  for (const [field, rules] of Object.entries(result.errors())) {
    lines.push(chalk.bold(`${field}:`));
    for (const [rule, message] of Object.entries(rules)) {
      lines.push(`    ${chalk.yellow(rule)}: ${message}`);
    }
  }
  return lines.join('\n');
}

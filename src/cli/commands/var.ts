// src/cli/commands/var.ts

import { loadValidatorConfig } from '../../config/config-loader.js';
import { buildValidator } from '../../config/validator-factory.js';
import { ConfigurationError } from '../../utils/errors.js';
import { exitCodeFor, formatReport } from '../utils/report.js';

export interface VarCommandOptions {
  rules: string;
  name?: string;
  other?: string;
  locale?: string;
  /** Read value and other as JSON instead of plain strings */
  parse?: boolean;
  json?: boolean;
  config?: string;
}

function readValue(text: string, parse: boolean): unknown {
  if (!parse) return text;
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Value is not valid JSON: ${reason}`);
  }
}

/**
 * Validate one value against a rule expression. Returns the exit code.
 */
export async function varCommand(cwd: string, value: string, options: VarCommandOptions): Promise<number> {
  const validator = await buildValidator(await loadValidatorConfig(cwd, options.config));
  const locale = options.locale ?? '';
  const name = options.name ?? 'value';
  const parse = options.parse ?? false;
  const subject = readValue(value, parse);

  const result =
    options.other === undefined
      ? validator.var(locale, name, subject, options.rules)
      : validator.varWithValue(locale, name, subject, readValue(options.other, parse), options.rules);

  console.log(formatReport(result, options.json));
  return exitCodeFor(result);
}

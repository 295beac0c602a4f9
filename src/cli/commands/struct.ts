// src/cli/commands/struct.ts

import * as path from 'path';
import { loadDocument, loadStructSchema, loadValidatorConfig } from '../../config/config-loader.js';
import { buildValidator } from '../../config/validator-factory.js';
import { ConfigurationError } from '../../utils/errors.js';
import { exitCodeFor, formatReport } from '../utils/report.js';

export interface StructCommandOptions {
  except?: string[];
  partial?: string[];
  locale?: string;
  json?: boolean;
  config?: string;
}

/**
 * Validate a YAML/JSON document against a struct schema file. Returns the
 * exit code.
 */
export async function structCommand(
  cwd: string,
  schemaPath: string,
  dataPath: string,
  options: StructCommandOptions
): Promise<number> {
  if (options.except?.length && options.partial?.length) {
    throw new ConfigurationError('--except and --partial cannot be combined');
  }

  const validator = await buildValidator(await loadValidatorConfig(cwd, options.config));
  const schema = await loadStructSchema(path.resolve(cwd, schemaPath));
  const document = await loadDocument(path.resolve(cwd, dataPath));
  const locale = options.locale ?? '';

  const result = options.except?.length
    ? validator.structExcept(locale, schema, document, ...options.except)
    : options.partial?.length
      ? validator.structPartial(locale, schema, document, ...options.partial)
      : validator.struct(locale, schema, document);

  console.log(formatReport(result, options.json));
  return exitCodeFor(result);
}

// src/config/config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import type { StructSchema } from '../engine/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { structSchemaFileSchema, ValidatorConfig, validatorConfigSchema } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'locale-validator.yml';

export interface LoadedConfig {
  config: ValidatorConfig;
  /** Directory catalog paths are resolved against */
  baseDir: string;
  /** File the config came from; undefined when defaults were used */
  sourcePath?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readYaml(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  try {
    return YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${filePath} as YAML/JSON: ${reason}`);
  }
}

/**
 * Loads the validator configuration from `configPath`, or from
 * locale-validator.yml in `cwd`. A missing default file yields the defaults;
 * a missing explicit file is an error.
 */
export async function loadValidatorConfig(cwd: string, configPath?: string): Promise<LoadedConfig> {
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  let raw: unknown;
  try {
    raw = await readYaml(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      if (configPath) {
        throw new ConfigurationError(`Config file not found: ${filePath}`);
      }
      Logger.debug(`No ${DEFAULT_CONFIG_FILE} found, using defaults`);
      return { config: validatorConfigSchema.parse({}), baseDir: cwd };
    }
    throw error;
  }

  const result = validatorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid config ${filePath}: ${describeIssues(result.error)}`);
  }

  return { config: result.data, baseDir: path.dirname(filePath), sourcePath: filePath };
}

/**
 * Read a struct schema (YAML or JSON) for the CLI.
 */
export async function loadStructSchema(filePath: string): Promise<StructSchema> {
  const raw = await readYaml(filePath);
  const result = structSchemaFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid struct schema ${filePath}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read a YAML or JSON document to validate.
 */
export function loadDocument(filePath: string): Promise<unknown> {
  return readYaml(filePath);
}

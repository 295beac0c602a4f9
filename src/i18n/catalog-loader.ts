// src/i18n/catalog-loader.ts

import * as fs from 'fs/promises';
import { fileURLToPath } from 'url';
import * as YAML from 'yaml';
import { z } from 'zod';
import type { I18nValidator } from '../core/i18n-validator.js';
import { CatalogError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

const pluralMessageSchema = z
  .object({
    other: z.string(),
    zero: z.string().optional(),
    one: z.string().optional(),
    two: z.string().optional(),
    few: z.string().optional(),
    many: z.string().optional(),
  })
  .strict();

export const catalogSchema = z.object({
  locale: z.string(),
  messages: z.record(z.string(), z.union([z.string(), pluralMessageSchema])),
});

/**
 * Messages for one locale, keyed by rule name (without prefix).
 */
export type Catalog = z.infer<typeof catalogSchema>;

export const BUILTIN_CATALOG_PATH = fileURLToPath(new URL('../../locales/en.yml', import.meta.url));

/**
 * Validate parsed catalog content. `source` names the origin in errors.
 */
export function parseCatalog(content: unknown, source: string): Catalog {
  const result = catalogSchema.safeParse(content);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogError(source, `Invalid catalog: ${issues}`);
  }
  return result.data;
}

/**
 * Read a YAML or JSON catalog file.
 */
export async function loadCatalogFile(filePath: string): Promise<Catalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new CatalogError(filePath, 'Catalog file not found');
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(filePath, `Cannot parse catalog YAML/JSON: ${reason}`);
  }

  const catalog = parseCatalog(parsed, filePath);
  Logger.debug(`Loaded ${Object.keys(catalog.messages).length} messages for '${catalog.locale}' from ${filePath}`);
  return catalog;
}

/** English messages for the engine's built-in rules. */
export function loadBuiltinCatalog(): Promise<Catalog> {
  return loadCatalogFile(BUILTIN_CATALOG_PATH);
}

/**
 * Register every catalog message on the validator, so the validator's key
 * prefix applies.
 */
export function applyCatalog(validator: I18nValidator, catalog: Catalog): void {
  for (const [rule, entry] of Object.entries(catalog.messages)) {
    if (typeof entry === 'string') {
      validator.addTranslation(catalog.locale, rule, entry);
    } else {
      const { other, ...plural } = entry;
      validator.addTranslation(catalog.locale, rule, other, plural);
    }
  }
}

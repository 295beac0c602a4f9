// src/config/validator-factory.ts

import * as path from 'path';
import { createValidator, I18nValidator, Option } from '../core/i18n-validator.js';
import { FORMAT_OPTIONS, withAliasResolver, withTranslator } from '../core/options.js';
import { RuleEngine } from '../engine/rule-engine.js';
import { applyCatalog, loadBuiltinCatalog, loadCatalogFile } from '../i18n/catalog-loader.js';
import { MessageCatalog } from '../i18n/message-catalog.js';
import { Logger } from '../utils/logger.js';
import { LoadedConfig } from './config-loader.js';

/**
 * Build a validator from a loaded configuration: message catalog, alias
 * resolution, format checkers, then catalogs in file order (later files
 * override earlier ones).
 */
export async function buildValidator(loaded: LoadedConfig): Promise<I18nValidator> {
  const { config, baseDir } = loaded;
  const catalog = new MessageCatalog(config.defaultLocale, ...config.locales);

  const options: Option[] = [withTranslator(catalog, config.prefix)];
  if (config.aliases) {
    options.push(withAliasResolver());
  }
  for (const format of config.formats) {
    options.push(FORMAT_OPTIONS[format]());
  }

  const validator = createValidator(new RuleEngine(), ...options);

  if (config.builtinMessages) {
    applyCatalog(validator, await loadBuiltinCatalog());
  }

  for (const catalogPath of config.catalogs) {
    const resolved = path.resolve(baseDir, catalogPath);
    applyCatalog(validator, await loadCatalogFile(resolved));
  }

  Logger.debug(
    `Validator ready: locales [${catalog.supportedLocales().join(', ')}], ` +
      `${config.formats.length} format checkers, prefix '${config.prefix}'`
  );

  return validator;
}

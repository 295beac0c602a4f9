// src/index.ts - public API

export { I18nValidator, createValidator } from './core/i18n-validator.js';
export type { Option } from './core/i18n-validator.js';
export * from './core/options.js';
export { ValidationErrors } from './core/validation-errors.js';
export type { FieldErrors } from './core/validation-errors.js';
export { TranslationResolver } from './core/translation-resolver.js';
export type { TranslationContext } from './core/translation-resolver.js';
export { ErrorTranslator } from './core/error-translator.js';
export { coerceParam, parseNumeric } from './core/numeric.js';
export type { CoercedParam, NumericValue } from './core/numeric.js';
export { isTranslatable, isTranslatableField } from './core/translatable.js';
export type { Translatable, TranslatableField } from './core/translatable.js';

export * from './engine/index.js';
export * from './i18n/index.js';
export * from './funcs/index.js';

export { loadValidatorConfig, loadStructSchema, DEFAULT_CONFIG_FILE } from './config/config-loader.js';
export type { LoadedConfig } from './config/config-loader.js';
export { buildValidator } from './config/validator-factory.js';
export { validatorConfigSchema, structSchemaFileSchema } from './config/schema.js';
export type { ValidatorConfig } from './config/schema.js';

export { InvalidValidationError, ConfigurationError, CatalogError } from './utils/errors.js';
export { ErrorFactory } from './utils/error-factory.js';
export type { InternalErrorDetails } from './utils/error-factory.js';
export { Logger, LogLevel } from './utils/logger.js';

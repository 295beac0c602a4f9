// src/core/i18n-validator.ts

import { RuleEngine } from '../engine/rule-engine.js';
import { RuleFunc, StructSchema, ValidationEngine } from '../engine/types.js';
import { PluralOptions, Translator } from '../i18n/types.js';
import { Logger } from '../utils/logger.js';
import { ErrorTranslator } from './error-translator.js';
import { TranslationResolver } from './translation-resolver.js';
import { ValidationErrors } from './validation-errors.js';

/**
 * Configures a validator while it is being created.
 */
export type Option = (validator: I18nValidator) => void;

/**
 * Validation with localized errors. Rules run on the engine; failures come
 * back as a ValidationErrors aggregate worded through the translator.
 *
 * Register rules and translations before sharing an instance between
 * callers; the validation methods themselves keep no state.
 */
export class I18nValidator {
  private resolver = new TranslationResolver();
  private errorTranslator = new ErrorTranslator(this.resolver);

  constructor(readonly engine: ValidationEngine) {}

  get translator(): Translator | undefined {
    return this.resolver.translator;
  }

  get prefix(): string {
    return this.resolver.prefix;
  }

  /**
   * Set the translator and the catalog key prefix. Translations added before
   * this call were dropped; options apply in order.
   */
  useTranslator(translator: Translator, prefix = ''): void {
    this.resolver = new TranslationResolver(translator, prefix);
    this.errorTranslator = new ErrorTranslator(this.resolver);
  }

  addValidation(rule: string, fn: RuleFunc): void {
    const name = rule.trim();
    if (name === '') {
      Logger.warn('Ignoring validation with an empty rule name');
      return;
    }
    this.engine.registerValidation(name, fn);
  }

  /**
   * Register a message for a rule. The key gets the configured prefix, the
   * same one used when failures are translated.
   */
  addTranslation(locale: string, rule: string, message: string, plural?: PluralOptions): void {
    const name = rule.trim();
    if (name === '') {
      Logger.warn('Ignoring translation with an empty rule name');
      return;
    }
    if (!this.resolver.translator) {
      Logger.warn(`Ignoring translation for '${name}': no translator configured`);
      return;
    }
    this.resolver.translator.addMessage(locale, this.resolver.ruleKey(name), message, plural);
  }

  struct(locale: string, schema: StructSchema, value: unknown): ValidationErrors {
    return this.errorTranslator.translateStructErrors(
      locale,
      value,
      this.engine.struct(schema, value)
    );
  }

  /** Validate a struct, skipping the listed fields (`Field`, `Inner.Field`). */
  structExcept(locale: string, schema: StructSchema, value: unknown, ...fields: string[]): ValidationErrors {
    return this.errorTranslator.translateStructErrors(
      locale,
      value,
      this.engine.structExcept(schema, value, fields)
    );
  }

  /** Validate only the listed fields of a struct. */
  structPartial(locale: string, schema: StructSchema, value: unknown, ...fields: string[]): ValidationErrors {
    return this.errorTranslator.translateStructErrors(
      locale,
      value,
      this.engine.structPartial(schema, value, fields)
    );
  }

  /** Validate a single value; failures are filed under `name`. */
  var(locale: string, name: string, value: unknown, rules: string): ValidationErrors {
    return this.errorTranslator.translateVariableErrors(
      locale,
      name,
      value,
      this.engine.var(value, rules)
    );
  }

  /** Validate a value against another, for rules such as eqfield. */
  varWithValue(locale: string, name: string, value: unknown, other: unknown, rules: string): ValidationErrors {
    return this.errorTranslator.translateVariableErrors(
      locale,
      name,
      value,
      this.engine.varWithValue(value, other, rules)
    );
  }
}

/**
 * Create a validator over `engine` (a fresh RuleEngine by default) and
 * apply the options in order.
 */
export function createValidator(engine: ValidationEngine = new RuleEngine(), ...options: Option[]): I18nValidator {
  const validator = new I18nValidator(engine);
  for (const option of options) {
    option(validator);
  }
  return validator;
}

// src/core/translation-resolver.ts

import { Translator } from '../i18n/types.js';
import { isTranslatable, isTranslatableField } from './translatable.js';

/**
 * Everything needed to word one failed rule.
 */
export interface TranslationContext {
  locale: string;
  /** Display name of the field */
  field: string;
  /** Rule name as reported by the engine, without prefix */
  rule: string;
  /** Structural name passed to the per-value hooks */
  structField: string;
  param: string | number | bigint;
  /** The value handed to the validator (struct or variable) */
  value: unknown;
  count: number;
}

export class TranslationResolver {
  readonly prefix: string;

  constructor(
    readonly translator?: Translator,
    prefix = ''
  ) {
    this.prefix = prefix.trim();
  }

  hasTranslator(): boolean {
    return this.translator !== undefined;
  }

  /** Catalog key of a rule: 'prefix.rule', or the rule itself without a prefix. */
  ruleKey(rule: string): string {
    return this.prefix === '' ? rule : `${this.prefix}.${rule}`;
  }

  /**
   * Word a failed rule. The value's own translateError wins; otherwise the
   * catalog is asked for the prefixed key, with the field title taken from
   * the value's translateTitle when it offers one. Returns '' without a
   * translator.
   */
  translate(context: TranslationContext): string {
    if (!this.translator) {
      return '';
    }

    const { locale, rule, structField, value } = context;

    if (isTranslatable(value)) {
      const own = value.translateError(locale, rule, structField);
      if (own !== '') {
        return own;
      }
    }

    let field = context.field;
    if (isTranslatableField(value)) {
      const title = value.translateTitle(locale, structField);
      if (title !== '') {
        field = title;
      }
    }

    return this.translator.plural(locale, this.ruleKey(rule), context.count, {
      field,
      param: context.param,
    });
  }
}

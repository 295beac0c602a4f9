// src/core/error-translator.ts

import { isViolationSet, ViolationRecord } from '../engine/types.js';
import { Logger } from '../utils/logger.js';
import { coerceParam } from './numeric.js';
import { TranslationResolver } from './translation-resolver.js';
import { ValidationErrors } from './validation-errors.js';

/**
 * Where a record is filed and which names the resolver sees.
 */
interface FieldIdentity {
  field: string;
  structField: string;
}

/**
 * Turns the raw result of an engine call into a ValidationErrors aggregate.
 */
export class ErrorTranslator {
  constructor(private readonly resolver: TranslationResolver) {}

  /** Struct-shaped results: records are filed under the engine's field name. */
  translateStructErrors(locale: string, value: unknown, error: Error | undefined): ValidationErrors {
    return this.translate(locale, value, error, (record) => ({
      field: record.field,
      structField: record.structField,
    }));
  }

  /** Variable results: records are filed under the caller-supplied name. */
  translateVariableErrors(
    locale: string,
    name: string,
    value: unknown,
    error: Error | undefined
  ): ValidationErrors {
    return this.translate(locale, value, error, () => ({ field: name, structField: name }));
  }

  private translate(
    locale: string,
    value: unknown,
    error: Error | undefined,
    identify: (record: ViolationRecord) => FieldIdentity
  ): ValidationErrors {
    if (!error) {
      return ValidationErrors.empty();
    }

    if (!isViolationSet(error)) {
      Logger.debug(`Validation engine failed: ${error.message}`);
      return ValidationErrors.fromInternal(error);
    }

    const result = ValidationErrors.empty();

    for (const record of error.records) {
      const identity = identify(record);
      result.addError(identity.field, record.rule, this.messageFor(locale, value, record, identity));
    }

    return result;
  }

  private messageFor(
    locale: string,
    value: unknown,
    record: ViolationRecord,
    identity: FieldIdentity
  ): string {
    if (!this.resolver.hasTranslator()) {
      return record.message;
    }

    const { param, count } = coerceParam(record.param);
    const message = this.resolver.translate({
      locale,
      field: identity.field,
      rule: record.rule,
      structField: identity.structField,
      param,
      value,
      count,
    });

    if (message === '') {
      Logger.debug(`No translation for '${this.resolver.ruleKey(record.rule)}' (${locale || 'default locale'}), using engine message`);
      return record.message;
    }
    return message;
  }
}

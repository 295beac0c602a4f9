// src/__tests__/core/options.test.ts

import { describe, it, expect } from 'vitest';
import { createValidator } from '../../core/i18n-validator.js';
import {
  FORMAT_NAMES,
  FORMAT_OPTIONS,
  withAlphaNumericPersianValidator,
  withAlphaNumericValidator,
  withIranianIBANValidator,
  withIranianMobileValidator,
  withIranianNationalCodeValidator,
  withJalaaliValidator,
  withTranslator,
  withUsernameValidator,
} from '../../core/options.js';
import { RuleEngine } from '../../engine/rule-engine.js';
import { MessageCatalog } from '../../i18n/message-catalog.js';

describe('format checker options', () => {
  it('should register every format rule by its default name', () => {
    const engine = new RuleEngine();
    createValidator(
      engine,
      withTranslator(new MessageCatalog('en')),
      ...FORMAT_NAMES.map((name) => FORMAT_OPTIONS[name]())
    );

    for (const name of FORMAT_NAMES) {
      expect(engine.hasRule(name)).toBe(true);
    }
  });

  it('should register the English default message for the default locale', () => {
    const validator = createValidator(
      new RuleEngine(),
      withTranslator(new MessageCatalog('en')),
      withIranianNationalCodeValidator()
    );

    expect(validator.var('en', 'code', '0499370899', 'national_code').hasError()).toBe(false);
    expect(validator.var('en', 'code', '0499370898', 'national_code').errors()).toEqual({
      code: { national_code: 'Must be a valid 10 digit iranian national id number' },
    });
  });

  it('should use custom messages and rule names', () => {
    const validator = createValidator(
      new RuleEngine(),
      withTranslator(new MessageCatalog('en', 'de')),
      withIranianMobileValidator({ en: '{field} is not a mobile number', de: '{field} ist keine Mobilnummer' }, 'cell')
    );

    expect(validator.var('en', 'm', '09121234567', 'cell').hasError()).toBe(false);
    expect(validator.var('en', 'm', '12345', 'cell').errors().m.cell).toBe('m is not a mobile number');
    expect(validator.var('de', 'm', '12345', 'cell').errors().m.cell).toBe('m ist keine Mobilnummer');
  });

  it('should apply the translator prefix to default messages', () => {
    const catalog = new MessageCatalog('en');
    createValidator(new RuleEngine(), withTranslator(catalog, 'rules'), withUsernameValidator());

    expect(catalog.hasMessage('en', 'rules.username')).toBe(true);
  });

  it('should read extra allowed characters from the alnum parameter', () => {
    const validator = createValidator(new RuleEngine(), withAlphaNumericValidator());

    expect(validator.var('en', 'slug', 'abc-def', 'alnum=-').hasError()).toBe(false);
    expect(validator.var('en', 'slug', 'abc_def', 'alnum=-').isFailedOn('slug', 'alnum')).toBe(true);
    expect(validator.var('en', 'slug', 'abc def', 'alnum').isFailedOn('slug', 'alnum')).toBe(true);
  });

  it('should accept Persian letters under alnum_fa', () => {
    const validator = createValidator(new RuleEngine(), withAlphaNumericPersianValidator());

    expect(validator.var('en', 'title', 'سلام123', 'alnum_fa').hasError()).toBe(false);
    expect(validator.var('en', 'title', 'سلام!', 'alnum_fa').isFailedOn('title', 'alnum_fa')).toBe(true);
  });

  it('should validate IBANs with and without the country code', () => {
    const validator = createValidator(new RuleEngine(), withIranianIBANValidator());

    expect(validator.var('en', 'iban', 'IR270170000000100324200001', 'iban').hasError()).toBe(false);
    expect(validator.var('en', 'iban', '270170000000100324200001', 'iban').hasError()).toBe(false);
    expect(validator.var('en', 'iban', 'IR270170000000100324200002', 'iban').hasError()).toBe(true);
  });

  it('should check Jalaali dates with the default or a given layout', () => {
    const validator = createValidator(
      new RuleEngine(),
      withTranslator(new MessageCatalog('en')),
      withJalaaliValidator()
    );

    expect(validator.var('en', 'born', '1403-12-30T10:20:30Z', 'jalaali').hasError()).toBe(false);
    expect(validator.var('en', 'born', '1402/06/31', 'jalaali=YYYY/MM/DD').hasError()).toBe(false);
    expect(validator.var('en', 'born', '1402/07/31', 'jalaali=YYYY/MM/DD').errors()).toEqual({
      born: { jalaali: 'Must be a valid jalaali datetime' },
    });
  });

  it('should fail format rules on non-text values', () => {
    const validator = createValidator(new RuleEngine(), withUsernameValidator());

    expect(validator.var('en', 'user', { name: 'x' }, 'username').isFailedOn('user', 'username')).toBe(true);
  });
});

// src/__tests__/core/error-translator.test.ts

import { describe, it, expect, vi } from 'vitest';
import { ErrorTranslator } from '../../core/error-translator.js';
import { TranslationResolver } from '../../core/translation-resolver.js';
import { Translatable } from '../../core/translatable.js';
import { FieldViolations, ViolationRecord } from '../../engine/types.js';
import { MessageCatalog } from '../../i18n/message-catalog.js';
import { InvalidValidationError } from '../../utils/errors.js';

function record(overrides: Partial<ViolationRecord> = {}): ViolationRecord {
  return {
    field: 'name',
    structField: 'Name',
    namespace: 'User.name',
    structNamespace: 'User.Name',
    rule: 'required',
    param: '',
    value: '',
    message: "Key: 'User.name' Error:Field validation for 'name' failed on the 'required' tag",
    ...overrides,
  };
}

function catalogWith(messages: Record<string, string>): MessageCatalog {
  const catalog = new MessageCatalog('en');
  for (const [key, message] of Object.entries(messages)) {
    catalog.addMessage('en', key, message);
  }
  return catalog;
}

describe('ErrorTranslator', () => {
  describe('translateStructErrors', () => {
    it('should return an empty aggregate when there is no engine error', () => {
      const translator = new ErrorTranslator(new TranslationResolver());
      const result = translator.translateStructErrors('en', {}, undefined);

      expect(result.hasError()).toBe(false);
    });

    it('should wrap errors that are not violation sets as internal errors', () => {
      const failure = new InvalidValidationError("Undefined validation function 'nope' on field 'name'", 'nope', 'name');
      const translator = new ErrorTranslator(new TranslationResolver(catalogWith({})));
      const result = translator.translateStructErrors('en', {}, failure);

      expect(result.hasInternalError()).toBe(true);
      expect(result.hasValidationErrors()).toBe(false);
      expect(result.internalError()).toBe(failure);
    });

    it('should store engine messages when no translator is configured', () => {
      const translator = new ErrorTranslator(new TranslationResolver());
      const result = translator.translateStructErrors('en', {}, new FieldViolations([record()]));

      expect(result.errors()).toEqual({
        name: { required: "Key: 'User.name' Error:Field validation for 'name' failed on the 'required' tag" },
      });
    });

    it('should translate each record under its field and rule', () => {
      const translator = new ErrorTranslator(
        new TranslationResolver(catalogWith({ required: '{field} is required', min: '{field} needs {param}' }))
      );
      const violations = new FieldViolations([
        record(),
        record({ field: 'email', structField: 'Email', rule: 'min', param: '5' }),
      ]);

      const result = translator.translateStructErrors('en', {}, violations);

      expect(result.errors()).toEqual({
        name: { required: 'name is required' },
        email: { min: 'email needs 5' },
      });
    });

    it('should pass coerced params and counts to the catalog', () => {
      const catalog = catalogWith({ max: '{field} at most {param}' });
      const pluralSpy = vi.spyOn(catalog, 'plural');
      const translator = new ErrorTranslator(new TranslationResolver(catalog));

      translator.translateStructErrors('en', {}, new FieldViolations([record({ rule: 'max', param: '5.7' })]));

      expect(pluralSpy).toHaveBeenCalledWith('en', 'max', 5, { field: 'name', param: 5.7 });
    });

    it('should fall back to the engine message when the catalog has no entry', () => {
      const translator = new ErrorTranslator(new TranslationResolver(catalogWith({})));
      const result = translator.translateStructErrors('en', {}, new FieldViolations([record()]));

      expect(result.errors().name.required).toBe(
        "Key: 'User.name' Error:Field validation for 'name' failed on the 'required' tag"
      );
    });

    it('should hand the struct field name to the value hooks', () => {
      const value: Translatable = { translateError: vi.fn(() => 'own message') };
      const translator = new ErrorTranslator(new TranslationResolver(catalogWith({})));

      const result = translator.translateStructErrors('fa', value, new FieldViolations([record()]));

      expect(value.translateError).toHaveBeenCalledWith('fa', 'required', 'Name');
      expect(result.errors()).toEqual({ name: { required: 'own message' } });
    });
  });

  describe('translateVariableErrors', () => {
    const varRecord = record({
      field: '',
      structField: '',
      namespace: '',
      structNamespace: '',
      rule: 'is_valid',
      message: "Key: '' Error:Field validation for '' failed on the 'is_valid' tag",
    });

    it('should file records under the caller-supplied name', () => {
      const translator = new ErrorTranslator(new TranslationResolver(catalogWith({ is_valid: '{field} must be valid' })));
      const result = translator.translateVariableErrors('en', 'token', 'invalid', new FieldViolations([varRecord]));

      expect(result.errors()).toEqual({ token: { is_valid: 'token must be valid' } });
    });

    it('should use the name for untranslated records too', () => {
      const translator = new ErrorTranslator(new TranslationResolver());
      const result = translator.translateVariableErrors('en', 'token', 'invalid', new FieldViolations([varRecord]));

      expect(result.errors()).toEqual({
        token: { is_valid: "Key: '' Error:Field validation for '' failed on the 'is_valid' tag" },
      });
    });

    it('should pass the name as structural name to the value hooks', () => {
      const value: Translatable = { translateError: vi.fn(() => '') };
      const translator = new ErrorTranslator(new TranslationResolver(catalogWith({ is_valid: 'bad {field}' })));

      const result = translator.translateVariableErrors('en', 'token', value, new FieldViolations([varRecord]));

      expect(value.translateError).toHaveBeenCalledWith('en', 'is_valid', 'token');
      expect(result.errors()).toEqual({ token: { is_valid: 'bad token' } });
    });

    it('should wrap plain errors as internal errors', () => {
      const failure = new TypeError('cannot compare');
      const translator = new ErrorTranslator(new TranslationResolver());
      const result = translator.translateVariableErrors('en', 'token', 'x', failure);

      expect(result.hasInternalError()).toBe(true);
      expect(result.hasValidationErrors()).toBe(false);
      expect(result.internalError()).toBe(failure);
    });
  });
});

// src/__tests__/cli/utils/report.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';
import { EXIT_INTERNAL, EXIT_INVALID, EXIT_VALID, exitCodeFor, formatReport } from '../../../cli/utils/report.js';
import { ValidationErrors } from '../../../core/validation-errors.js';
import { InvalidValidationError } from '../../../utils/errors.js';

describe('report', () => {
  let failed: ValidationErrors;
  let internal: ValidationErrors;

  beforeEach(() => {
    chalk.level = 0;

    failed = ValidationErrors.empty();
    failed.addError('Name', 'required', 'Name is required');
    failed.addError('Name', 'min', 'Name must be at least 3');
    failed.addError('Email', 'email', 'Email must be a valid email address');

    internal = ValidationErrors.fromInternal(
      new InvalidValidationError("Undefined validation function 'bogus' on field ''", 'bogus', '')
    );
  });

  describe('exitCodeFor', () => {
    it('should map results to exit codes', () => {
      expect(exitCodeFor(ValidationErrors.empty())).toBe(EXIT_VALID);
      expect(exitCodeFor(failed)).toBe(EXIT_INVALID);
      expect(exitCodeFor(internal)).toBe(EXIT_INTERNAL);
    });
  });

  describe('formatReport', () => {
    it('should print valid for a clean result', () => {
      expect(formatReport(ValidationErrors.empty())).toBe('valid');
    });

    it('should list failures per field', () => {
      expect(formatReport(failed)).toBe(
        [
          'Name:',
          '    required: Name is required',
          '    min: Name must be at least 3',
          'Email:',
          '    email: Email must be a valid email address',
        ].join('\n')
      );
    });


    it('should describe internal errors with a suggestion', () => {
      expect(formatReport(internal)).toBe(
        [
          "InvalidValidationError: Undefined validation function 'bogus' on field ''",
          '  Register the rule with addValidation() or enable its format checker before validating.',
        ].join('\n')
      );
    });

    it('should print failures as JSON', () => {
      expect(JSON.parse(formatReport(failed, true))).toEqual({
        Name: { required: 'Name is required', min: 'Name must be at least 3' },
        Email: { email: 'Email must be a valid email address' },
      });
      expect(formatReport(ValidationErrors.empty(), true)).toBe('{}');
    });

    it('should print internal errors as JSON', () => {
      expect(JSON.parse(formatReport(internal, true))).toEqual({
        internalError: {
          name: 'InvalidValidationError',
          message: "Undefined validation function 'bogus' on field ''",
          rule: 'bogus',
          field: '',
          suggestion: 'Register the rule with addValidation() or enable its format checker before validating.',
        },
      });
    });
  });
});

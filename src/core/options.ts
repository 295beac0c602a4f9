// src/core/options.ts

import { FieldAliases, FieldLevel, RuleFunc } from '../engine/types.js';
import {
  isAlphaNumeric,
  isAlphaNumericWithPersian,
  isValidIranianBankCard,
  isValidIranianIBAN,
  isValidIranianIdNumber,
  isValidIranianMobile,
  isValidIranianNationalCode,
  isValidIranianPhone,
  isValidIranianPostalCode,
  isValidUsername,
} from '../funcs/format-checkers.js';
import { isValidJalaaliDateTime } from '../funcs/jalaali.js';
import { Translator } from '../i18n/types.js';
import { I18nValidator, Option } from './i18n-validator.js';

/** Locale -> message template. The '' locale is the translator's default. */
export type LocaleMessages = Record<string, string>;

/**
 * Use `translator` for error messages, with catalog keys prefixed by
 * `prefix` ('' for none).
 */
export function withTranslator(translator: Translator, prefix = ''): Option {
  return (validator) => {
    validator.useTranslator(translator, prefix);
  };
}

const ALIAS_ORDER: (keyof FieldAliases)[] = ['field', 'json', 'form', 'xml'];

/**
 * Report fields under their first alias among field, json, form and xml
 * (text before the first comma). Without an alias, or with '-', the
 * property key is used.
 */
export function withAliasResolver(): Option {
  return (validator) => {
    validator.engine.registerFieldNameResolver((structField, definition) => {
      let name = '';
      for (const key of ALIAS_ORDER) {
        const alias = definition[key]?.split(',')[0].trim();
        if (alias) {
          name = alias;
          break;
        }
      }

      return name === '' || name === '-' ? structField : name;
    });
  };
}

function fieldText(fl: FieldLevel): string {
  if (typeof fl.value === 'string') return fl.value;
  if (typeof fl.value === 'number' || typeof fl.value === 'bigint') return String(fl.value);
  return '';
}

/** Characters of a rule parameter, one entry per code point. */
function toChars(text: string): string[] {
  return Array.from(text);
}

/**
 * Register `fn` under the given (or default) rule name along with its
 * messages. Without messages the English default goes to the default
 * locale.
 */
function formatOption(
  defaultRule: string,
  defaultMessage: string,
  fn: RuleFunc,
  messages?: LocaleMessages,
  rule?: string
): Option {
  const tag = rule?.trim() || defaultRule;
  const localized = messages ?? { '': defaultMessage };

  return (validator: I18nValidator) => {
    validator.addValidation(tag, fn);
    for (const [locale, message] of Object.entries(localized)) {
      validator.addTranslation(locale, tag, message);
    }
  };
}

export function withUsernameValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'username',
    'Only letters, numbers, and underscores are allowed',
    (fl) => isValidUsername(fieldText(fl)),
    messages,
    rule
  );
}

/** `alnum`, or `alnum=-_` to also allow the listed characters. */
export function withAlphaNumericValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'alnum',
    'Only english letters and numbers are allowed',
    (fl) => isAlphaNumeric(fieldText(fl), ...toChars(fl.param)),
    messages,
    rule
  );
}

export function withAlphaNumericPersianValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'alnum_fa',
    'Only english letters, persian letters, and numbers are allowed',
    (fl) => isAlphaNumericWithPersian(fieldText(fl), ...toChars(fl.param)),
    messages,
    rule
  );
}

export function withIranianPhoneValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'phone',
    'Must be a valid 11-digit iranian phone number',
    (fl) => isValidIranianPhone(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianMobileValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'mobile',
    'Must be a valid 11-digit iranian mobile number',
    (fl) => isValidIranianMobile(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianPostalCodeValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'postal_code',
    'Must be a valid 10-digit iranian postal code',
    (fl) => isValidIranianPostalCode(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianIdNumberValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'id_number',
    'Must be a valid iranian birth certificate number',
    (fl) => isValidIranianIdNumber(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianNationalCodeValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'national_code',
    'Must be a valid 10 digit iranian national id number',
    (fl) => isValidIranianNationalCode(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianCreditNumberValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'credit_number',
    'Must be a valid 16 digit iranian credit card number',
    (fl) => isValidIranianBankCard(fieldText(fl)),
    messages,
    rule
  );
}

export function withIranianIBANValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'iban',
    'Must be a valid 24 digit iranian IBAN number',
    (fl) => isValidIranianIBAN(fieldText(fl)),
    messages,
    rule
  );
}

/**
 * `jalaali` checks the default layout (YYYY-MM-DDTHH:mm:ssZ);
 * `jalaali=YYYY/MM/DD` checks the given one.
 */
export function withJalaaliValidator(messages?: LocaleMessages, rule?: string): Option {
  return formatOption(
    'jalaali',
    'Must be a valid jalaali datetime',
    (fl) => isValidJalaaliDateTime(fieldText(fl), fl.param || undefined),
    messages,
    rule
  );
}

export const FORMAT_NAMES = [
  'username',
  'alnum',
  'alnum_fa',
  'phone',
  'mobile',
  'postal_code',
  'id_number',
  'national_code',
  'credit_number',
  'iban',
  'jalaali',
] as const;

export type FormatName = (typeof FORMAT_NAMES)[number];

/** Option factories by default rule name, for configuration files. */
export const FORMAT_OPTIONS: Record<FormatName, (messages?: LocaleMessages, rule?: string) => Option> = {
  username: withUsernameValidator,
  alnum: withAlphaNumericValidator,
  alnum_fa: withAlphaNumericPersianValidator,
  phone: withIranianPhoneValidator,
  mobile: withIranianMobileValidator,
  postal_code: withIranianPostalCodeValidator,
  id_number: withIranianIdNumberValidator,
  national_code: withIranianNationalCodeValidator,
  credit_number: withIranianCreditNumberValidator,
  iban: withIranianIBANValidator,
  jalaali: withJalaaliValidator,
};

// src/funcs/format-checkers.ts

const USERNAME = /^[a-zA-Z0-9_]+$/;
const IRANIAN_PHONE = /^0[1-9][0-9]{9}$/;
const IRANIAN_MOBILE = /^09[0-9]{9}$/;
const TEN_DIGITS = /^[0-9]{10}$/;
const ID_NUMBER = /^[0-9]{1,10}$/;
const SIXTEEN_DIGITS = /^[0-9]{16}$/;
const IRANIAN_IBAN = /^IR[0-9]{24}$/;

const ENGLISH_ALNUM = /[a-zA-Z0-9]/u;
// Persian letters (including the Arabic-script forms used in Persian), Persian digits and ZWNJ
const PERSIAN_ALNUM = /[ء-غف-يپچژکگی۰-۹‌]/u;

function onlyAllowed(text: string, allowed: (ch: string) => boolean): boolean {
  if (text === '') return false;
  for (const ch of text) {
    if (!allowed(ch)) return false;
  }
  return true;
}

/** Letters, numbers and underscores only. */
export function isValidUsername(username: string): boolean {
  return USERNAME.test(username);
}

/**
 * English letters and digits, plus any character listed in `extra`
 * (each entry one character, e.g. from `alnum=-_`).
 */
export function isAlphaNumeric(text: string, ...extra: string[]): boolean {
  return onlyAllowed(text, (ch) => ENGLISH_ALNUM.test(ch) || extra.includes(ch));
}

/** Like isAlphaNumeric, also accepting Persian letters and digits. */
export function isAlphaNumericWithPersian(text: string, ...extra: string[]): boolean {
  return onlyAllowed(
    text,
    (ch) => ENGLISH_ALNUM.test(ch) || PERSIAN_ALNUM.test(ch) || extra.includes(ch)
  );
}

/** 11-digit landline number starting with 0 (e.g. 02112345678). */
export function isValidIranianPhone(phone: string): boolean {
  return IRANIAN_PHONE.test(phone);
}

/** 11-digit mobile number starting with 09. */
export function isValidIranianMobile(mobile: string): boolean {
  return IRANIAN_MOBILE.test(mobile);
}

export function isValidIranianPostalCode(postalCode: string): boolean {
  return TEN_DIGITS.test(postalCode);
}

/** Birth certificate number: 1 to 10 digits. */
export function isValidIranianIdNumber(id: string): boolean {
  return ID_NUMBER.test(id);
}

/**
 * National code: 10 digits where the last is a mod-11 check digit over the
 * first nine weighted 10..2.
 */
export function isValidIranianNationalCode(nationalCode: string): boolean {
  if (!TEN_DIGITS.test(nationalCode)) {
    return false;
  }

  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += Number(nationalCode[i]) * (10 - i);
  }

  const remainder = sum % 11;
  const checkDigit = Number(nationalCode[9]);

  return remainder < 2 ? checkDigit === remainder : checkDigit === 11 - remainder;
}

/** 16-digit card number passing the Luhn check. */
export function isValidIranianBankCard(cardNumber: string): boolean {
  if (!SIXTEEN_DIGITS.test(cardNumber)) {
    return false;
  }

  let sum = 0;
  let alternate = false;

  for (let i = cardNumber.length - 1; i >= 0; i--) {
    let n = Number(cardNumber[i]);
    if (alternate) {
      n *= 2;
      if (n > 9) {
        n -= 9;
      }
    }
    sum += n;
    alternate = !alternate;
  }

  return sum % 10 === 0;
}

/**
 * Iranian IBAN (Sheba), with or without the leading "IR": 24 digits after the
 * country code, checked with ISO 13616 mod 97.
 */
export function isValidIranianIBAN(iban: string): boolean {
  const normalized = iban.startsWith('IR') ? iban : `IR${iban}`;
  if (!IRANIAN_IBAN.test(normalized)) {
    return false;
  }

  // Move "IR" + check digits to the end; I=18, R=27
  const checkDigits = normalized.slice(2, 4);
  const rearranged = `${normalized.slice(4)}1827${checkDigits}`;

  return BigInt(rearranged) % 97n === 1n;
}

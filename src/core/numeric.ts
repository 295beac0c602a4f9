// src/core/numeric.ts

export type NumericValue =
  | { kind: 'int'; value: number | bigint }
  | { kind: 'float'; value: number };

export interface CoercedParam {
  /** Number (bigint past the safe range) when the parameter is numeric, else the original text */
  param: string | number | bigint;
  /** Plural count derived from the parameter, 0 when it is not numeric */
  count: number;
}

const INTEGER = /^[+-]?[0-9]+$/;
const DECIMAL = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a rule parameter as a 64-bit integer, falling back to a plain
 * decimal. Integers past the safe range stay exact as bigint; past the
 * 64-bit range they are read as floats. Exponents, hex and locale formats
 * are not numeric.
 */
export function parseNumeric(text: string): NumericValue | undefined {
  if (INTEGER.test(text)) {
    const value = Number(text);
    if (Number.isSafeInteger(value)) {
      return { kind: 'int', value };
    }
    const big = BigInt(text.replace(/^\+/, ''));
    if (big >= INT64_MIN && big <= INT64_MAX) {
      return { kind: 'int', value: big };
    }
  }

  if (DECIMAL.test(text)) {
    return { kind: 'float', value: Number(text) };
  }

  return undefined;
}

export function coerceParam(text: string): CoercedParam {
  const numeric = parseNumeric(text);
  if (!numeric) {
    return { param: text, count: 0 };
  }
  if (typeof numeric.value === 'bigint') {
    return { param: numeric.value, count: Number(numeric.value) };
  }
  // Floats truncate toward zero
  return { param: numeric.value, count: Math.trunc(numeric.value) };
}

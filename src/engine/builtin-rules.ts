// src/engine/builtin-rules.ts

import { z } from 'zod';
import { InvalidValidationError } from '../utils/errors.js';
import { isValidIP, isValidIPPort } from '../funcs/network.js';
import { FieldLevel, RuleFunc } from './types.js';

const emailSchema = z.string().email();
const urlSchema = z.string().url();
const uuidSchema = z.string().uuid();

const ALPHA = /^[a-zA-Z]+$/;
const ALPHANUM = /^[a-zA-Z0-9]+$/;
const NUMERIC = /^[-+]?[0-9]+(?:\.[0-9]+)?$/;
const BOOLEAN_STRINGS = new Set(['1', 'true', 'TRUE', 'True', '0', 'false', 'FALSE', 'False']);

/**
 * undefined, null and '' count as "no value" for required and omitempty.
 */
export function isEmptyValue(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function numericParam(fl: FieldLevel, rule: string): number {
  const n = Number(fl.param);
  if (fl.param.trim() === '' || Number.isNaN(n)) {
    throw new InvalidValidationError(
      `Bad param '${fl.param}' for rule '${rule}' on field '${fl.field}'`,
      rule,
      fl.field
    );
  }
  return n;
}

/**
 * Size a value for the comparison rules: character count for strings,
 * element count for arrays, maps, sets and plain objects, the number itself
 * for numbers. Other values cannot be measured.
 */
function measure(value: unknown): number | undefined {
  if (typeof value === 'string') return Array.from(value).length;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value);
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'object' && value !== null) return Object.keys(value).length;
  return undefined;
}

function compareSize(test: (size: number, limit: number) => boolean, rule: string): RuleFunc {
  return (fl) => {
    const limit = numericParam(fl, rule);
    const size = measure(fl.value);
    return size !== undefined && test(size, limit);
  };
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function textRule(test: (text: string, param: string) => boolean): RuleFunc {
  return (fl) => {
    const text = asText(fl.value);
    return text !== undefined && test(text, fl.param);
  };
}

/**
 * The value a cross-field rule compares against: the sibling named by the
 * parameter inside a struct, or the `other` value of varWithValue.
 */
function comparisonTarget(fl: FieldLevel, rule: string): unknown {
  if (fl.param === '') {
    return fl.other;
  }
  if (!fl.parent) {
    throw new InvalidValidationError(
      `Rule '${rule}=${fl.param}' refers to a sibling field but '${fl.field}' is not inside a struct`,
      rule,
      fl.field
    );
  }
  return Object.hasOwn(fl.parent, fl.param) ? fl.parent[fl.param] : undefined;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return Object.is(a, b);
}

function compareFields(test: (value: number, target: number) => boolean, rule: string): RuleFunc {
  return (fl) => {
    const target = comparisonTarget(fl, rule);
    const a = measure(fl.value);
    const b = measure(target);
    return a !== undefined && b !== undefined && test(a, b);
  };
}

function equals(fl: FieldLevel, rule: string): boolean {
  if (typeof fl.value === 'string') return fl.value === fl.param;
  if (typeof fl.value === 'boolean') return String(fl.value) === fl.param;
  const size = measure(fl.value);
  return size !== undefined && size === numericParam(fl, rule);
}

export const BUILTIN_RULES: ReadonlyMap<string, RuleFunc> = new Map<string, RuleFunc>([
  ['required', (fl) => !isEmptyValue(fl.value)],

  ['len', compareSize((size, limit) => size === limit, 'len')],
  ['min', compareSize((size, limit) => size >= limit, 'min')],
  ['max', compareSize((size, limit) => size <= limit, 'max')],
  ['gt', compareSize((size, limit) => size > limit, 'gt')],
  ['gte', compareSize((size, limit) => size >= limit, 'gte')],
  ['lt', compareSize((size, limit) => size < limit, 'lt')],
  ['lte', compareSize((size, limit) => size <= limit, 'lte')],
  ['eq', (fl) => equals(fl, 'eq')],
  ['ne', (fl) => !equals(fl, 'ne')],
  ['oneof', textRule((text, param) => param.split(' ').filter(Boolean).includes(text))],

  ['email', textRule((text) => emailSchema.safeParse(text).success)],
  ['url', textRule((text) => urlSchema.safeParse(text).success)],
  ['uuid', textRule((text) => uuidSchema.safeParse(text).success)],
  ['alpha', textRule((text) => ALPHA.test(text))],
  ['alphanum', textRule((text) => ALPHANUM.test(text))],
  ['numeric', textRule((text) => NUMERIC.test(text))],
  ['number', textRule((text) => /^[0-9]+$/.test(text))],
  ['boolean', textRule((text) => BOOLEAN_STRINGS.has(text))],
  ['lowercase', textRule((text) => text !== '' && text === text.toLowerCase())],
  ['uppercase', textRule((text) => text !== '' && text === text.toUpperCase())],
  ['contains', textRule((text, param) => text.includes(param))],
  ['excludes', textRule((text, param) => !text.includes(param))],
  ['startswith', textRule((text, param) => text.startsWith(param))],
  ['endswith', textRule((text, param) => text.endsWith(param))],
  ['ip', textRule((text) => isValidIP(text))],
  ['ip_port', textRule((text) => isValidIPPort(text))],

  ['eqfield', (fl) => sameValue(fl.value, comparisonTarget(fl, 'eqfield'))],
  ['nefield', (fl) => !sameValue(fl.value, comparisonTarget(fl, 'nefield'))],
  ['gtfield', compareFields((a, b) => a > b, 'gtfield')],
  ['gtefield', compareFields((a, b) => a >= b, 'gtefield')],
  ['ltfield', compareFields((a, b) => a < b, 'ltfield')],
  ['ltefield', compareFields((a, b) => a <= b, 'ltefield')],
]);

// src/engine/rule-parser.ts

import { InvalidValidationError } from '../utils/errors.js';

export interface RuleTag {
  name: string;
  param: string;
}

/**
 * One comma-separated element of a rule expression. `alternatives` holds a
 * single tag unless the element used `|`, in which case any passing
 * alternative satisfies it.
 */
export interface ParsedTag {
  /** Element text as written, reported as the failing rule */
  raw: string;
  alternatives: RuleTag[];
}

export interface ParsedRules {
  omitEmpty: boolean;
  tags: ParsedTag[];
}

const OMIT_EMPTY = 'omitempty';

const cache = new Map<string, ParsedRules>();

function unescapeParam(param: string): string {
  return param.replace(/0x2C/g, ',').replace(/0x7C/g, '|');
}

function parseTag(text: string, expression: string): RuleTag {
  const eq = text.indexOf('=');
  const name = (eq === -1 ? text : text.slice(0, eq)).trim();
  const param = eq === -1 ? '' : unescapeParam(text.slice(eq + 1));

  if (name === '') {
    throw new InvalidValidationError(`Invalid rule expression '${expression}': empty rule name`);
  }
  if (name === OMIT_EMPTY) {
    throw new InvalidValidationError(
      `Invalid rule expression '${expression}': omitempty must be the first rule`,
      OMIT_EMPTY
    );
  }

  return { name, param };
}

/**
 * Parse a rule expression such as `omitempty,min=3,alpha|numeric`.
 * Results are cached per expression.
 */
export function parseRules(expression: string): ParsedRules {
  const cached = cache.get(expression);
  if (cached) return cached;

  const parts = expression.split(',').map((p) => p.trim());
  const parsed: ParsedRules = { omitEmpty: false, tags: [] };

  // A blank expression validates nothing
  if (parts.length === 1 && parts[0] === '') {
    cache.set(expression, parsed);
    return parsed;
  }

  parts.forEach((part, index) => {
    if (index === 0 && part === OMIT_EMPTY) {
      parsed.omitEmpty = true;
      return;
    }
    parsed.tags.push({
      raw: part,
      alternatives: part.split('|').map((alt) => parseTag(alt, expression)),
    });
  });

  cache.set(expression, parsed);
  return parsed;
}

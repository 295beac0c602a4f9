// src/funcs/jalaali.ts

import jalaali from 'jalaali-js';

type LayoutPart = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'offset';

interface CompiledLayout {
  pattern: RegExp;
  parts: LayoutPart[];
}

/** Date and time with a UTC offset, e.g. 1402-06-31T08:30:00+03:30 */
export const DEFAULT_JALAALI_LAYOUT = 'YYYY-MM-DDTHH:mm:ssZ';

const TOKENS: ReadonlyArray<readonly [string, LayoutPart, string]> = [
  ['YYYY', 'year', '([0-9]{4})'],
  ['MM', 'month', '([0-9]{2})'],
  ['DD', 'day', '([0-9]{2})'],
  ['HH', 'hour', '([0-9]{2})'],
  ['mm', 'minute', '([0-9]{2})'],
  ['ss', 'second', '([0-9]{2})'],
  ['Z', 'offset', '(Z|[+-][0-9]{2}:[0-9]{2})'],
];

const layouts = new Map<string, CompiledLayout>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileLayout(layout: string): CompiledLayout {
  const cached = layouts.get(layout);
  if (cached) return cached;

  let source = '';
  const parts: LayoutPart[] = [];
  let i = 0;
  while (i < layout.length) {
    const token = TOKENS.find(([name]) => layout.startsWith(name, i));
    if (token) {
      const [name, part, group] = token;
      source += group;
      parts.push(part);
      i += name.length;
    } else {
      source += escapeRegExp(layout[i]);
      i++;
    }
  }

  const compiled = { pattern: new RegExp(`^${source}$`), parts };
  layouts.set(layout, compiled);
  return compiled;
}

function validOffset(offset: string): boolean {
  if (offset === 'Z') return true;
  return Number(offset.slice(1, 3)) <= 23 && Number(offset.slice(4, 6)) <= 59;
}

/**
 * Jalaali (Persian calendar) date or datetime in `layout`, built from the
 * tokens YYYY, MM, DD, HH, mm, ss and Z (`Z` or `+03:30`). Other layout
 * characters must match literally. A layout without year, month and day
 * never matches.
 */
export function isValidJalaaliDateTime(text: string, layout: string = DEFAULT_JALAALI_LAYOUT): boolean {
  const { pattern, parts } = compileLayout(layout);
  const match = pattern.exec(text);
  if (!match) {
    return false;
  }

  const values = new Map<LayoutPart, string>();
  parts.forEach((part, index) => values.set(part, match[index + 1]));

  const year = values.get('year');
  const month = values.get('month');
  const day = values.get('day');
  if (year === undefined || month === undefined || day === undefined) {
    return false;
  }
  if (!jalaali.isValidJalaaliDate(Number(year), Number(month), Number(day))) {
    return false;
  }

  const within = (part: LayoutPart, max: number): boolean => {
    const value = values.get(part);
    return value === undefined || Number(value) <= max;
  };
  const offset = values.get('offset');

  return (
    within('hour', 23) &&
    within('minute', 59) &&
    within('second', 59) &&
    (offset === undefined || validOffset(offset))
  );
}

// src/i18n/types.ts

/**
 * Alternative forms of a message, chosen by the CLDR plural category of the
 * count. The message itself is the `other` form.
 */
export interface PluralOptions {
  zero?: string;
  one?: string;
  two?: string;
  few?: string;
  many?: string;
}

/**
 * Locale-keyed message store with plural support.
 */
export interface Translator {
  /** Locale used when a call passes '' or a lookup misses */
  readonly defaultLocale: string;

  addMessage(locale: string, key: string, message: string, plural?: PluralOptions): void;

  /**
   * Lookup by count; returns '' when the key is unknown. `count` picks the
   * form and is also available as {count}.
   */
  plural(locale: string, key: string, count: number, values?: Record<string, unknown>): string;
}

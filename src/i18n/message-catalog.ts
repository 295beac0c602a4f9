// src/i18n/message-catalog.ts

import { interpolateTemplate } from '../utils/template-interpolator.js';
import { Logger } from '../utils/logger.js';
import { PluralOptions, Translator } from './types.js';

interface MessageEntry {
  other: string;
  plural: PluralOptions;
}

/**
 * In-memory Translator. Lookups try the exact locale, then its base
 * language ('fa-IR' -> 'fa'), then the default locale.
 */
export class MessageCatalog implements Translator {
  readonly defaultLocale: string;
  private readonly locales = new Set<string>();
  private readonly messages = new Map<string, Map<string, MessageEntry>>();
  private readonly pluralRules = new Map<string, Intl.PluralRules>();

  constructor(defaultLocale: string, ...locales: string[]) {
    this.defaultLocale = normalizeLocale(defaultLocale);
    this.locales.add(this.defaultLocale);
    for (const locale of locales) {
      this.locales.add(normalizeLocale(locale));
    }
  }

  supportedLocales(): string[] {
    return [...this.locales];
  }

  addMessage(locale: string, key: string, message: string, plural: PluralOptions = {}): void {
    const target = this.resolveLocale(locale);
    this.locales.add(target);

    let table = this.messages.get(target);
    if (!table) {
      table = new Map();
      this.messages.set(target, table);
    }
    table.set(key, { other: message, plural: { ...plural } });
  }

  hasMessage(locale: string, key: string): boolean {
    return this.lookup(locale, key) !== undefined;
  }

  plural(locale: string, key: string, count: number, values: Record<string, unknown> = {}): string {
    const found = this.lookup(locale, key);
    if (!found) return '';

    const template = this.selectForm(found.locale, found.entry, count);
    return interpolateTemplate(template, { count, ...values });
  }

  private resolveLocale(locale: string): string {
    const trimmed = locale.trim();
    return trimmed === '' ? this.defaultLocale : normalizeLocale(trimmed);
  }

  private lookup(locale: string, key: string): { locale: string; entry: MessageEntry } | undefined {
    const requested = this.resolveLocale(locale);
    const base = requested.split('-')[0];

    for (const candidate of [requested, base, this.defaultLocale]) {
      const entry = this.messages.get(candidate)?.get(key);
      if (entry) return { locale: candidate, entry };
    }
    return undefined;
  }

  private selectForm(locale: string, entry: MessageEntry, count: number): string {
    if (count === 0 && entry.plural.zero !== undefined) {
      return entry.plural.zero;
    }

    const category = this.rulesFor(locale).select(count);
    if (category === 'other') {
      return entry.other;
    }
    return entry.plural[category] ?? entry.other;
  }

  private rulesFor(locale: string): Intl.PluralRules {
    let rules = this.pluralRules.get(locale);
    if (!rules) {
      try {
        rules = new Intl.PluralRules(locale);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        Logger.warn(`Cannot select plural forms for locale '${locale}': ${reason}`);
        rules = new Intl.PluralRules('en');
      }
      this.pluralRules.set(locale, rules);
    }
    return rules;
  }
}

/** 'fa_IR' -> 'fa-IR' */
function normalizeLocale(locale: string): string {
  return locale.trim().replace(/_/g, '-');
}

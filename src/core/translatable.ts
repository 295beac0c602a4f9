// src/core/translatable.ts

/**
 * Implemented by validated values that word their own error messages.
 * Returning '' defers to the shared catalog.
 */
export interface Translatable {
  translateError(locale: string, rule: string, field: string): string;
}

/**
 * Implemented by validated values that supply localized field titles.
 * Returning '' keeps the engine-reported name.
 */
export interface TranslatableField {
  translateTitle(locale: string, field: string): string;
}

export function isTranslatable(value: unknown): value is Translatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'translateError' in value &&
    typeof value.translateError === 'function'
  );
}

export function isTranslatableField(value: unknown): value is TranslatableField {
  return (
    typeof value === 'object' &&
    value !== null &&
    'translateTitle' in value &&
    typeof value.translateTitle === 'function'
  );
}

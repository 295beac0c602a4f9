// src/utils/template-interpolator.ts

/**
 * Replace {variable} placeholders in a message template.
 * Unknown variables are left as-is.
 */
export function interpolateTemplate(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = context[key];
    if (value === undefined || value === null) {
      return match; // Keep placeholder if no value
    }
    return String(value);
  });
}

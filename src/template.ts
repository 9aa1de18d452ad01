import type { TemplateVariables } from './types.js';

const ALLOWED_TEMPLATE_KEYS: ReadonlySet<string> = new Set(
  ['PACKAGE_NAME'] satisfies Array<keyof TemplateVariables>
);

const MAX_VALUE_LENGTH = 1000;

function isTemplateKey(key: string): key is keyof TemplateVariables {
  return ALLOWED_TEMPLATE_KEYS.has(key);
}

function sanitizeValue(value: string): string {
  return value
    .slice(0, MAX_VALUE_LENGTH)
    .replace(/[\x00-\x1F\x7F]/g, '');
}

/**
 * Substitutes `{{KEY}}` placeholders in a single pass. Unknown keys are left
 * untouched, and braces that come from a value are never expanded again.
 */
export function renderTemplate(
  template: string,
  variables: TemplateVariables
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    if (!isTemplateKey(key)) return match;
    return sanitizeValue(variables[key]);
  });
}

export function countPlaceholders(template: string, key: keyof TemplateVariables): number {
  return template.split(`{{${key}}}`).length - 1;
}

export function validateTemplateVariables(variables: TemplateVariables): TemplateVariables {
  const name = variables.PACKAGE_NAME;
  if (typeof name !== 'string' || name.length === 0 || name.length >= MAX_VALUE_LENGTH) {
    throw new Error(`Invalid template value for PACKAGE_NAME`);
  }
  return { PACKAGE_NAME: name };
}

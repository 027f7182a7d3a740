/**
 * Placeholder substitution for command argument lists and environment templates.
 */

import { PLACEHOLDERS, type Placeholder } from '../../types/index.js';
import { TemplateError } from '../../utils/errors.js';

export type Substitutions = Partial<Record<Placeholder, string>>;

const PLACEHOLDER_PATTERN = /\{([^{}\s]+)\}/g;

export function isPlaceholder(key: string): key is Placeholder {
  return PLACEHOLDERS.some(placeholder => placeholder === key);
}

function lookup(substitutions: Substitutions, key: string): string | undefined {
  return isPlaceholder(key) ? substitutions[key] : undefined;
}

/**
 * Every placeholder in `template` that `substitutions` cannot resolve,
 * in order of first appearance.
 */
export function findUnresolvedPlaceholders(template: string[], substitutions: Substitutions): string[] {
  const unresolved: string[] = [];
  for (const token of template) {
    for (const match of token.matchAll(PLACEHOLDER_PATTERN)) {
      const key = match[1];
      if (lookup(substitutions, key) === undefined && !unresolved.includes(key)) {
        unresolved.push(key);
      }
    }
  }
  return unresolved;
}

/**
 * Substitute every token of `template` independently.
 * @throws TemplateError naming the first placeholder that has no value
 */
export function renderTemplate(template: string[], substitutions: Substitutions): string[] {
  const unresolved = findUnresolvedPlaceholders(template, substitutions);
  if (unresolved.length > 0) {
    throw new TemplateError(unresolved[0], template);
  }
  return template.map(token =>
    token.replace(PLACEHOLDER_PATTERN, (_whole, key: string) => lookup(substitutions, key) ?? '')
  );
}

/**
 * Single-string convenience over renderTemplate (PATH entries, variable values)
 */
export function renderValue(value: string, substitutions: Substitutions): string {
  return renderTemplate([value], substitutions)[0];
}

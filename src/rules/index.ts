/**
 * Rules
 *
 * Built-in rules in registration order; that order breaks ties between
 * findings at the same position.
 */

import { duplicateDocumentation } from './duplicate-documentation.js';
import { duplicateName } from './duplicate-name.js';
import { emptySection } from './empty-section.js';
import { invalidNameChar } from './invalid-name-char.js';
import { missingDocKeyword } from './missing-doc-keyword.js';
import { RuleRegistry } from './registry.js';
import { structuralWarning } from './structural-warning.js';
import type { Rule } from './types.js';

export const BUILTIN_RULES: readonly Rule[] = [
  missingDocKeyword,
  invalidNameChar,
  duplicateDocumentation,
  structuralWarning,
  duplicateName,
  emptySection,
];

/**
 * A registry holding every built-in rule
 */
export function createDefaultRegistry(): RuleRegistry {
  const registry = new RuleRegistry();
  BUILTIN_RULES.forEach(rule => registry.register(rule));
  return registry;
}

export * from './types.js';
export { RuleRegistry } from './registry.js';
export { RuleEngine, type EvaluationResult } from './engine.js';
export { DEFAULT_ALLOWED_CHAR_PATTERN, findInvalidChars } from './invalid-name-char.js';
export { normalizeName } from './duplicate-name.js';

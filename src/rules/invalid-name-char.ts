/**
 * invalid-name-char - test case and keyword names may only use allowed characters
 *
 * The allowed set is a single-character pattern (`allowedCharPattern`),
 * matched with the `u` flag so Unicode property escapes work. Embedded
 * variables such as `${name}` are not checked.
 */

import { describeError } from '../errors.js';
import type { BlockNode } from '../types.js';
import type { Rule, RuleContext } from './types.js';

export const DEFAULT_ALLOWED_CHAR_PATTERN = '[\\p{L}\\p{N} _]';

const EMBEDDED_VARIABLE = /[$@&%]\{[^}]*\}/g;

const compiled = new Map<string, RegExp>();

function allowedCharMatcher(pattern: string): RegExp {
  let matcher = compiled.get(pattern);
  if (!matcher) {
    matcher = new RegExp(`^(?:${pattern})$`, 'u');
    compiled.set(pattern, matcher);
  }
  return matcher;
}

/**
 * Distinct characters of `name` outside the allowed set, in order of appearance
 */
export function findInvalidChars(name: string, pattern: string = DEFAULT_ALLOWED_CHAR_PATTERN): string[] {
  const allowed = allowedCharMatcher(pattern);
  const invalid = new Set<string>();
  for (const char of name.replace(EMBEDDED_VARIABLE, '')) {
    if (!allowed.test(char)) {
      invalid.add(char);
    }
  }
  return [...invalid];
}

function checkName(block: BlockNode, context: RuleContext): void {
  const pattern = context.options.allowedCharPattern;
  const invalid = findInvalidChars(block.name, typeof pattern === 'string' ? pattern : DEFAULT_ALLOWED_CHAR_PATTERN);
  if (invalid.length === 0) {
    return;
  }

  const label = block.kind === 'Keyword' ? 'Keyword' : 'Test case';
  context.report({
    subject: block,
    position: block.position,
    message: `${label} name "${block.name}" contains invalid character(s): ${invalid.map(c => `"${c}"`).join(', ')}`,
  });
}

export const invalidNameChar: Rule = {
  id: 'invalid-name-char',
  description: 'Test case or keyword name contains a character outside the allowed set',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  optionsSchema: {
    type: 'object',
    properties: {
      allowedCharPattern: { type: 'string', minLength: 1, default: DEFAULT_ALLOWED_CHAR_PATTERN },
    },
    additionalProperties: false,
  },

  checkOptions(options) {
    const pattern = options.allowedCharPattern;
    if (typeof pattern !== 'string') {
      return undefined;
    }
    try {
      allowedCharMatcher(pattern);
      return undefined;
    } catch (error) {
      return `allowedCharPattern is not a valid regular expression: ${describeError(error)}`;
    }
  },

  visitTestCase: checkName,
  visitKeyword: checkName,
};

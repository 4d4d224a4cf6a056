/**
 * Inline Directive Parser
 *
 * Parses `roblint: disable=<id>[,<id>...]` directives from comment text.
 */

import type { Comment } from '../types.js';
import { ALL_RULES, type Directive, type DirectiveScope } from './types.js';

/**
 * Regular expression for matching directives
 *
 * Format: roblint: disable[=<id>[,<id>...]] | roblint: enable[=<id>[,<id>...]]
 *
 * Examples:
 *   # roblint: disable=missing-doc-keyword
 *   # ROBLINT: disable = invalid-name-char , duplicate-name
 *   # roblint: disable
 */
const DIRECTIVE_REGEX = /\broblint:\s*(disable|enable)(?:\s*=\s*([\w-]+(?:\s*,\s*[\w-]+)*))?/gi;

/**
 * Parse every directive in one comment
 *
 * @param comment - Comment attached to the tree
 * @param scope - Scope the directive gets from where the comment sits
 * @returns Directives in order of appearance, possibly none
 */
export function parseDirectives(comment: Comment, scope: DirectiveScope): Directive[] {
  const directives: Directive[] = [];

  for (const match of comment.text.matchAll(DIRECTIVE_REGEX)) {
    const [, action, idList] = match;

    directives.push({
      action: action.toLowerCase() === 'enable' ? 'enable' : 'disable',
      ruleIds: parseRuleIds(idList),
      position: comment.position,
      scope,
      originalComment: comment.text,
    });
  }

  return directives;
}

function parseRuleIds(idList: string | undefined): string[] {
  if (!idList) {
    return [ALL_RULES];
  }

  const ids = idList
    .split(',')
    .map(id => id.trim().toLowerCase())
    .filter(id => id.length > 0);

  return [...new Set(ids)];
}

/**
 * Generate a directive comment disabling the given rules
 */
export function generateDirectiveComment(ruleIds: readonly string[]): string {
  return `# roblint: disable=${ruleIds.join(',')}`;
}

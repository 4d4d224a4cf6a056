/**
 * Unused Directive Detector
 *
 * Finds directive ids that suppressed nothing, usually because the defect
 * they were added for has been fixed.
 */

import type { Finding } from '../types.js';
import type { SuppressionMatcher } from './matcher.js';
import { ALL_RULES, type SuppressionTable, type UnusedDirective } from './types.js';

export const UNUSED_DIRECTIVE_ID = 'unused-directive';

/**
 * Detect unused disable directives
 *
 * Ids of rules that are not enabled in this run are skipped: they could not
 * have matched anything. Unknown ids are skipped for the same reason.
 *
 * @param table - Side table built for the file
 * @param matcher - Matcher that filtered this file's findings
 * @param enabledRules - Rule ids evaluated in this run
 */
export function detectUnusedDirectives(
  table: SuppressionTable,
  matcher: SuppressionMatcher,
  enabledRules: ReadonlySet<string>
): UnusedDirective[] {
  const unused: UnusedDirective[] = [];

  for (const directive of table.directives) {
    if (directive.action !== 'disable') {
      continue;
    }
    for (const ruleId of directive.ruleIds) {
      if (ruleId !== ALL_RULES && !enabledRules.has(ruleId)) {
        continue;
      }
      if (!matcher.wasUsed(directive, ruleId)) {
        unused.push({ directive, ruleId });
      }
    }
  }

  return unused;
}

/**
 * Turn unused directives into warning findings
 */
export function toUnusedDirectiveFindings(unused: readonly UnusedDirective[]): Finding[] {
  return unused.map(({ directive, ruleId }) => ({
    ruleId: UNUSED_DIRECTIVE_ID,
    severity: 'warning',
    position: directive.position,
    message: `Directive disables "${ruleId}" but nothing was suppressed`,
    subject: directive.scope.type === 'node' ? directive.scope.subject : { id: 0, kind: 'File' },
    kind: 'UnusedDirective',
  }));
}


/**
 * duplicate-documentation - a second `[Documentation]` under one node
 *
 * The parser keeps the first and records a diagnostic; this rule turns the
 * diagnostic into a finding about the owning test case or keyword.
 */

import type { Rule } from './types.js';

export const duplicateDocumentation: Rule = {
  id: 'duplicate-documentation',
  description: 'Test case or keyword declares [Documentation] more than once',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  visitSuite(tree, context) {
    for (const diagnostic of context.diagnostics) {
      if (diagnostic.code !== 'DuplicateDocumentation') {
        continue;
      }
      context.report({
        subject: diagnostic.subject ?? tree,
        position: diagnostic.position,
        message: diagnostic.message,
        kind: 'StructuralWarning',
      });
    }
  },
};

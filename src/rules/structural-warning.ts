/**
 * structural-warning - parser diagnostics as findings
 */

import type { Rule } from './types.js';

export const structuralWarning: Rule = {
  id: 'structural-warning',
  description: 'File structure the parser had to work around',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  visitSuite(tree, context) {
    for (const diagnostic of context.diagnostics) {
      // Reported by duplicate-documentation
      if (diagnostic.code === 'DuplicateDocumentation') {
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

/**
 * missing-doc-keyword - user keywords must declare `[Documentation]`
 *
 * Test cases are not checked.
 */

import type { Rule } from './types.js';

export const missingDocKeyword: Rule = {
  id: 'missing-doc-keyword',
  description: 'Keyword has no documentation',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  visitKeyword(keyword, context) {
    if (keyword.documentation?.trim()) {
      return;
    }
    context.report({
      subject: keyword,
      position: keyword.position,
      message: `Missing documentation in keyword "${keyword.name}"`,
    });
  },
};

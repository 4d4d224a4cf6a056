/**
 * empty-section - a section header with nothing under it
 */

import type { Rule } from './types.js';

export const emptySection: Rule = {
  id: 'empty-section',
  description: 'Section contains no settings, variables, test cases or keywords',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  visitSection(section, context) {
    if (section.sectionKind === 'Comments' || section.children.length > 0) {
      return;
    }
    context.report({
      subject: section,
      position: section.position,
      message: `Section "${section.header}" is empty`,
    });
  },
};

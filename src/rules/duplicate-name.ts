/**
 * duplicate-name - two test cases or keywords with the same name in a section
 *
 * Names compare case-insensitively with spaces and underscores ignored.
 */

import type { Rule } from './types.js';

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[\s_]/g, '');
}

export const duplicateName: Rule = {
  id: 'duplicate-name',
  description: 'Test case or keyword name repeats an earlier one in the same section',
  defaultSeverity: 'warning',
  enabledByDefault: true,

  visitSection(section, context) {
    if (section.sectionKind !== 'TestCases' && section.sectionKind !== 'Keywords') {
      return;
    }

    const seen = new Map<string, number>();
    for (const block of section.children) {
      const key = normalizeName(block.name);
      const firstLine = seen.get(key);
      if (firstLine === undefined) {
        seen.set(key, block.position.line);
        continue;
      }
      const label = block.kind === 'Keyword' ? 'keyword' : 'test case';
      context.report({
        subject: block,
        position: block.position,
        message: `Duplicate ${label} name "${block.name}" (first defined on line ${firstLine})`,
      });
    }
  },
};

import { describe, it, expect } from 'vitest';
import { describeRule, formatRuleDetails, formatRuleList } from '../src/cli/rules.js';
import { DEFAULT_ALLOWED_CHAR_PATTERN, createDefaultRegistry } from '../src/rules/index.js';
import { invalidNameChar } from '../src/rules/invalid-name-char.js';
import { missingDocKeyword } from '../src/rules/missing-doc-keyword.js';

describe('rules command output', () => {
  it('lists every built-in rule in registration order, aligned', () => {
    const lines = formatRuleList(createDefaultRegistry());

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('missing-doc-keyword    ' + '  warning  enabled   Keyword has no documentation');
    expect(lines.map(line => line.split(' ')[0])).toEqual([
      'missing-doc-keyword',
      'invalid-name-char',
      'duplicate-documentation',
      'structural-warning',
      'duplicate-name',
      'empty-section',
    ]);
  });

  it('describes rule options from the schema', () => {
    expect(describeRule(invalidNameChar).options).toEqual([
      { name: 'allowedCharPattern', type: 'string', default: DEFAULT_ALLOWED_CHAR_PATTERN },
    ]);
    expect(describeRule(missingDocKeyword).options).toEqual([]);
  });

  it('shows options and the inline directive', () => {
    expect(formatRuleDetails(invalidNameChar)).toEqual([
      'invalid-name-char',
      '  Test case or keyword name contains a character outside the allowed set',
      '  Default severity: warning',
      '  Enabled by default: yes',
      '  Options:',
      `    allowedCharPattern (string) default: ${JSON.stringify(DEFAULT_ALLOWED_CHAR_PATTERN)}`,
      '  Disable inline: # roblint: disable=invalid-name-char',
    ]);
  });

  it('leaves out the options block for rules without options', () => {
    expect(formatRuleDetails(missingDocKeyword)).not.toContain('  Options:');
  });
});

/**
 * Inline directive tests
 */

import { describe, it, expect } from 'vitest';
import { parseSuite } from '../src/parser.js';
import {
  SuppressionMatcher,
  detectUnusedDirectives,
  generateDirectiveComment,
  parseDirectives,
  resolveSuppressions,
  toUnusedDirectiveFindings,
} from '../src/suppressions/index.js';
import type { Comment, Finding } from '../src/types.js';

function comment(text: string, line = 1, column = 1): Comment {
  return { text, position: { line, column }, placement: 'trailing' };
}

function finding(overrides: Partial<Finding>): Finding {
  return {
    ruleId: 'missing-doc-keyword',
    severity: 'warning',
    position: { line: 1, column: 1 },
    message: 'test finding',
    subject: { id: 0, kind: 'File' },
    kind: 'Rule',
    ...overrides,
  };
}

describe('parseDirectives', () => {
  it('reads ids case-insensitively with loose spacing', () => {
    const [directive] = parseDirectives(comment('# ROBLINT: disable = Missing-Doc-Keyword , invalid-name-char'), {
      type: 'block',
    });

    expect(directive.action).toBe('disable');
    expect(directive.ruleIds).toEqual(['missing-doc-keyword', 'invalid-name-char']);
  });

  it('reads several directives from one comment', () => {
    const directives = parseDirectives(comment('# roblint: disable=a,a  roblint: enable=c'), { type: 'block' });
    expect(directives.map(d => [d.action, d.ruleIds])).toEqual([
      ['disable', ['a']],
      ['enable', ['c']],
    ]);
  });

  it('treats a bare directive as all rules', () => {
    expect(parseDirectives(comment('# roblint: disable'), { type: 'block' })[0].ruleIds).toEqual(['all']);
  });

  it('ignores comments without directives', () => {
    expect(parseDirectives(comment('# just a note about roblint'), { type: 'block' })).toEqual([]);
  });

  it('requires roblint to start a word', () => {
    expect(parseDirectives(comment('# notroblint: disable=x'), { type: 'block' })).toEqual([]);
    expect(parseDirectives(comment('#roblint: disable=x'), { type: 'block' })[0].ruleIds).toEqual(['x']);
  });

  it('generates a directive comment', () => {
    expect(generateDirectiveComment(['a', 'b'])).toBe('# roblint: disable=a,b');
  });
});

describe('resolveSuppressions', () => {
  const text = [
    '*** Keywords ***',
    'Suppressed Keyword    # roblint: disable=missing-doc-keyword',
    '    Log    x    # roblint: disable=invalid-name-char, DUPLICATE-NAME',
    '# roblint: disable',
    'Other Keyword',
    '    No Operation',
    '# roblint: enable',
  ].join('\n');
  const table = resolveSuppressions(parseSuite(text).tree);

  it('scopes header directives to the node and statement directives to the statement', () => {
    expect([...(table.byNode.get(2) ?? [])]).toEqual(['missing-doc-keyword']);
    expect([...(table.byNode.get(3) ?? [])]).toEqual(['invalid-name-char', 'duplicate-name']);
    expect(table.byNode.has(4)).toBe(false);
  });

  it('turns standalone directives into line blocks', () => {
    expect(table.blocks.map(b => [b.ruleId, b.startLine, b.endLine])).toEqual([['all', 4, 7]]);
  });

  it('lists every directive in file order', () => {
    expect(table.directives.map(d => [d.position.line, d.action])).toEqual([
      [2, 'disable'],
      [3, 'disable'],
      [4, 'disable'],
      [7, 'enable'],
    ]);
  });

  it('runs an unterminated block to the end of the file', () => {
    const open = resolveSuppressions(parseSuite(['*** Test Cases ***', '# roblint: disable=invalid-name-char', 'T.'].join('\n')).tree);
    expect(open.blocks.map(b => [b.ruleId, b.startLine, b.endLine])).toEqual([
      ['invalid-name-char', 2, Number.MAX_SAFE_INTEGER],
    ]);
  });

  it('does not widen a section header directive to its children', () => {
    const scoped = resolveSuppressions(
      parseSuite(['*** Keywords ***    # roblint: disable=missing-doc-keyword', 'K', '    No Operation'].join('\n')).tree
    );
    expect([...scoped.byNode.keys()]).toEqual([1]);
  });

  describe('SuppressionMatcher', () => {
    it('drops findings covered by node scope or a block and counts them', () => {
      const matcher = new SuppressionMatcher(table);

      expect(matcher.check(finding({ subject: { id: 2, kind: 'Keyword' }, position: { line: 2, column: 1 } }))).toMatchObject({
        suppressed: true,
        matchedId: 'missing-doc-keyword',
      });
      expect(matcher.check(finding({ subject: { id: 4, kind: 'Keyword' }, position: { line: 5, column: 1 } }))).toMatchObject({
        suppressed: true,
        matchedId: 'all',
      });
      expect(matcher.check(finding({ subject: { id: 1, kind: 'Section' }, position: { line: 1, column: 1 } })).suppressed).toBe(
        false
      );
      expect(matcher.getSuppressedCount()).toBe(2);
    });

    it('never drops internal rule errors', () => {
      const matcher = new SuppressionMatcher(table);
      const internal = finding({ subject: { id: 4, kind: 'Keyword' }, position: { line: 5, column: 1 }, kind: 'InternalRuleError' });

      expect(matcher.check(internal).suppressed).toBe(false);
    });

    it('does not let a statement directive cover its parent node', () => {
      const matcher = new SuppressionMatcher(table);
      const onParent = finding({ ruleId: 'invalid-name-char', subject: { id: 2, kind: 'Keyword' }, position: { line: 2, column: 1 } });

      expect(matcher.check(onParent).suppressed).toBe(false);
    });
  });

  describe('detectUnusedDirectives', () => {
    it('reports directive ids that suppressed nothing', () => {
      const matcher = new SuppressionMatcher(table);
      matcher.check(finding({ subject: { id: 2, kind: 'Keyword' }, position: { line: 2, column: 1 } }));
      matcher.check(finding({ subject: { id: 4, kind: 'Keyword' }, position: { line: 5, column: 1 } }));

      const unused = detectUnusedDirectives(
        table,
        matcher,
        new Set(['missing-doc-keyword', 'invalid-name-char', 'duplicate-name'])
      );

      expect(unused.map(u => [u.directive.position, u.ruleId])).toEqual([
        [{ line: 3, column: 17 }, 'invalid-name-char'],
        [{ line: 3, column: 17 }, 'duplicate-name'],
      ]);
      expect(toUnusedDirectiveFindings(unused)[0]).toEqual({
        ruleId: 'unused-directive',
        severity: 'warning',
        position: { line: 3, column: 17 },
        message: 'Directive disables "invalid-name-char" but nothing was suppressed',
        subject: { id: 3, kind: 'Statement' },
        kind: 'UnusedDirective',
      });
    });

    it('counts a block as used when a node directive covers the same finding', () => {
      const overlapping = resolveSuppressions(
        parseSuite(
          [
            '*** Keywords ***',
            '# roblint: disable=missing-doc-keyword',
            'K    # roblint: disable=missing-doc-keyword',
            '    No Operation',
          ].join('\n')
        ).tree
      );
      const matcher = new SuppressionMatcher(overlapping);

      expect(matcher.check(finding({ subject: { id: 2, kind: 'Keyword' }, position: { line: 3, column: 1 } })).suppressed).toBe(
        true
      );
      expect(detectUnusedDirectives(overlapping, matcher, new Set(['missing-doc-keyword']))).toEqual([]);
    });

    it('skips ids of rules that did not run', () => {
      const matcher = new SuppressionMatcher(table);
      const unused = detectUnusedDirectives(table, matcher, new Set(['empty-section']));

      expect(unused.map(u => u.ruleId)).toEqual(['all']);
    });
  });
});

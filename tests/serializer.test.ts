/**
 * Serializer tests
 */

import { describe, it, expect } from 'vitest';
import { parseSuite } from '../src/parser.js';
import { serialize } from '../src/serializer.js';
import type { SuiteTree } from '../src/types.js';

/**
 * The modeled fields of every test case and keyword
 */
function modeled(tree: SuiteTree) {
  return tree.sections.flatMap(section =>
    section.sectionKind === 'TestCases' || section.sectionKind === 'Keywords'
      ? section.children.map(block => ({
          name: block.name,
          documentation: block.documentation,
          arguments: block.kind === 'Keyword' ? block.arguments : [],
          statements: block.statements.map(s => [s.name, ...s.args]),
        }))
      : []
  );
}

describe('serialize', () => {
  it('writes canonical four-space rows', () => {
    const { tree } = parseSuite(
      [
        '*** Keywords ***',
        'My Keyword\t# roblint: disable=missing-doc-keyword',
        '  [Arguments]\t${x}\t${y}=1',
        '\tLog  ${x}  \\',
      ].join('\n')
    );

    expect(serialize(tree)).toBe(
      '*** Keywords ***\n' +
        'My Keyword    # roblint: disable=missing-doc-keyword\n' +
        '    [Arguments]    ${x}    ${y}=1\n' +
        '    Log    ${x}    \\\n'
    );
  });

  it('writes documentation rows as continuations', () => {
    const { tree } = parseSuite(
      ['*** Keywords ***', 'Doc', '    [Documentation]    First line', '    ...    Second line'].join('\n')
    );

    expect(serialize(tree)).toBe(
      '*** Keywords ***\nDoc\n    [Documentation]    First line\n    ...    Second line\n'
    );
  });

  it('reproduces names, documentation, arguments and statements when re-parsed', () => {
    const source = [
      '# preamble',
      '*** Settings ***',
      'Library    Collections',
      '',
      '*** Test Cases ***',
      'Test With Invalid Char.    [Tags]    smoke',
      '    [Documentation]    Checks    things',
      '    ...    across rows',
      '    # about the call',
      '    Log Many    a    \\    c',
      '    ...    d',
      '',
      '*** Keywords ***',
      'Keyword With Args    # roblint: disable=invalid-name-char',
      '    [Documentation]    Has docs    # roblint: disable=missing-doc-keyword',
      '    [Arguments]    ${a}    ${b}=x=y',
      '    Should Be Equal    ${a}    expected=1',
    ].join('\n');

    const first = parseSuite(source).tree;
    const second = parseSuite(serialize(first)).tree;

    expect(modeled(second)).toEqual(modeled(first));
    expect(modeled(first)[0]).toEqual({
      name: 'Test With Invalid Char.',
      documentation: 'Checks things\nacross rows',
      arguments: [],
      statements: [
        ['[Tags]', 'smoke'],
        ['Log Many', 'a', '', 'c', 'd'],
      ],
    });
  });

  it('is stable after one round', () => {
    const source = ['*** Test Cases ***', 'T', '    Log    x    # why', '', 'U', '    No Operation'].join('\n');
    const once = serialize(parseSuite(source).tree);

    expect(serialize(parseSuite(once).tree)).toBe(once);
  });
});

/**
 * Serializer - writes a suite tree back as canonical suite text
 *
 * Only the modeled fields are written: names, documentation, arguments,
 * statement cells, settings and variables. Comments are kept where the tree
 * holds them.
 */

import { EMPTY_CELL_MARKER } from './tokenizer.js';
import type { BlockNode, Comment, SectionNode, StatementNode, SuiteTree } from './types.js';

const SEPARATOR = '    ';

const SECTION_TITLES: Record<SectionNode['sectionKind'], string> = {
  Settings: '*** Settings ***',
  Variables: '*** Variables ***',
  TestCases: '*** Test Cases ***',
  Keywords: '*** Keywords ***',
  Comments: '*** Comments ***',
};

export function serialize(tree: SuiteTree): string {
  const out: string[] = [];

  for (const comment of tree.comments) {
    out.push(comment.text);
  }

  tree.sections.forEach((section, index) => {
    if (index > 0 || out.length > 0) {
      out.push('');
    }
    writeSection(out, section);
  });

  return out.join('\n') + '\n';
}

function writeSection(out: string[], section: SectionNode): void {
  out.push(withComment(SECTION_TITLES[section.sectionKind], section.headerComment ? [section.headerComment] : []));

  switch (section.sectionKind) {
    case 'Settings':
    case 'Variables':
      for (const entry of section.children) {
        writeComments(out, entry.comments, '');
        out.push(withComment(row([entry.name, ...entry.values]), entry.trailingComments));
      }
      break;
    case 'TestCases':
    case 'Keywords':
      section.children.forEach((block, index) => {
        if (index > 0) {
          out.push('');
        }
        writeBlock(out, block);
      });
      break;
    case 'Comments':
      break;
  }

  writeComments(out, section.comments, '');
}

function writeBlock(out: string[], block: BlockNode): void {
  writeComments(out, block.comments.filter(c => c.position.line < block.position.line), '');

  // Declaration-row comments share the header so they keep their node scope
  out.push(withComment(cell(block.name), block.declarationComments));

  if (block.documentation !== undefined) {
    const [firstRow, ...moreRows] = block.documentation.split('\n');
    out.push(SEPARATOR + row(['[Documentation]', ...(firstRow ? [firstRow] : [])]));
    for (const docRow of moreRows) {
      out.push(SEPARATOR + row(['...', ...(docRow ? [docRow] : [])]));
    }
  }

  if (block.kind === 'Keyword' && block.arguments.length > 0) {
    const specs = block.arguments.map(arg => (arg.defaultValue === undefined ? arg.name : `${arg.name}=${arg.defaultValue}`));
    out.push(SEPARATOR + row(['[Arguments]', ...specs]));
  }

  for (const statement of block.statements) {
    writeStatement(out, statement);
  }

  writeComments(out, block.comments.filter(c => c.position.line >= block.position.line), SEPARATOR);
}

function writeStatement(out: string[], statement: StatementNode): void {
  writeComments(out, statement.comments, SEPARATOR);
  out.push(SEPARATOR + withComment(row([statement.name, ...statement.args]), statement.trailingComments));
}

function writeComments(out: string[], comments: readonly Comment[], indent: string): void {
  for (const comment of comments) {
    out.push(indent + comment.text);
  }
}

function withComment(text: string, comments: readonly Comment[]): string {
  if (comments.length === 0) {
    return text;
  }
  return text + SEPARATOR + comments.map(c => c.text).join(' ');
}

function row(cells: readonly string[]): string {
  return cells.map(cell).join(SEPARATOR);
}

/**
 * Empty cells need the explicit `\` marker to survive re-tokenizing
 */
function cell(text: string): string {
  return text.length === 0 ? EMPTY_CELL_MARKER : text;
}

/**
 * Directive Resolver
 *
 * Walks the suite tree once and builds the suppression side table:
 * - a directive trailing a declaration row (test case / keyword header,
 *   `[Documentation]`, `[Arguments]`) disables rules for that node
 * - a directive trailing a statement, setting or variable disables rules for
 *   that entry only
 * - a directive trailing a section header disables rules for the section node
 * - a directive on a standalone comment line opens a disabled block that
 *   runs until a matching `enable` line or the end of the file
 */

import type { Comment, NodeRef, SuiteTree } from '../types.js';
import { parseDirectives } from './parser.js';
import { ALL_RULES, type Directive, type DisabledBlock, type SuppressionTable } from './types.js';

export function resolveSuppressions(tree: SuiteTree): SuppressionTable {
  const byNode = new Map<number, Set<string>>();
  const directives: Directive[] = [];
  const standalone: Directive[] = [];

  function addNodeComments(subject: NodeRef, comments: readonly Comment[]): void {
    for (const comment of comments) {
      for (const directive of parseDirectives(comment, { type: 'node', subject: { id: subject.id, kind: subject.kind } })) {
        directives.push(directive);
        if (directive.action !== 'disable') {
          continue;
        }
        const ids = byNode.get(subject.id) ?? new Set<string>();
        directive.ruleIds.forEach(id => ids.add(id));
        byNode.set(subject.id, ids);
      }
    }
  }

  function addStandaloneComments(comments: readonly Comment[]): void {
    for (const comment of comments) {
      for (const directive of parseDirectives(comment, { type: 'block' })) {
        directives.push(directive);
        standalone.push(directive);
      }
    }
  }

  addStandaloneComments(tree.comments);

  for (const section of tree.sections) {
    addNodeComments(section, section.headerComment ? [section.headerComment] : []);
    addStandaloneComments(section.comments);

    switch (section.sectionKind) {
      case 'Settings':
      case 'Variables':
        for (const entry of section.children) {
          addStandaloneComments(entry.comments);
          addNodeComments(entry, entry.trailingComments);
        }
        break;
      case 'TestCases':
      case 'Keywords':
        for (const block of section.children) {
          addNodeComments(block, block.declarationComments);
          addStandaloneComments(block.comments);
          for (const statement of block.statements) {
            addStandaloneComments(statement.comments);
            addNodeComments(statement, statement.trailingComments);
          }
        }
        break;
      case 'Comments':
        break;
    }
  }

  return {
    byNode,
    blocks: buildBlocks(standalone),
    directives: directives.sort(byPosition),
  };
}

/**
 * Turns standalone disable/enable directives into per-rule line ranges
 */
function buildBlocks(standalone: Directive[]): DisabledBlock[] {
  const blocks: DisabledBlock[] = [];
  const open = new Map<string, Directive>();

  function close(ruleId: string, endLine: number): void {
    const start = open.get(ruleId);
    if (!start) {
      return;
    }
    blocks.push({ ruleId, startLine: start.position.line, endLine, directive: start });
    open.delete(ruleId);
  }

  for (const directive of [...standalone].sort(byPosition)) {
    const line = directive.position.line;
    for (const ruleId of directive.ruleIds) {
      if (directive.action === 'disable') {
        if (!open.has(ruleId)) {
          open.set(ruleId, directive);
        }
      } else if (ruleId === ALL_RULES) {
        for (const openId of [...open.keys()]) {
          close(openId, line);
        }
      } else {
        close(ruleId, line);
      }
    }
  }

  for (const openId of [...open.keys()]) {
    close(openId, Number.MAX_SAFE_INTEGER);
  }

  return blocks.sort((a, b) => a.startLine - b.startLine || a.ruleId.localeCompare(b.ruleId));
}

function byPosition(a: Directive, b: Directive): number {
  return a.position.line - b.position.line || a.position.column - b.position.column;
}

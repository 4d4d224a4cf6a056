/**
 * Structural Parser - builds a suite tree from tokenized lines
 *
 * Indentation is the structural signal: an unindented line opens a section,
 * a test case or a keyword, an indented line is a statement of the current
 * test case or keyword. The parser never fails; anything it cannot place is
 * reported as a diagnostic and skipped.
 */

import { tokenize } from './tokenizer.js';
import type {
  ArgumentSpec,
  BlockNode,
  Comment,
  DiagnosticCode,
  KeywordNode,
  Line,
  NodeRef,
  ParseDiagnostic,
  ParseResult,
  SectionKind,
  SectionNode,
  SettingNode,
  SourcePosition,
  StatementNode,
  SuiteTree,
  TestCaseNode,
  Token,
  VariableNode,
} from './types.js';

const SECTION_NAMES: Record<string, SectionKind> = {
  settings: 'Settings',
  setting: 'Settings',
  metadata: 'Settings',
  variables: 'Variables',
  variable: 'Variables',
  keywords: 'Keywords',
  keyword: 'Keywords',
  userkeywords: 'Keywords',
  userkeyword: 'Keywords',
  testcases: 'TestCases',
  testcase: 'TestCases',
  tasks: 'TestCases',
  task: 'TestCases',
  comments: 'Comments',
  comment: 'Comments',
};

const IMPORT_SETTINGS = new Set(['library', 'resource', 'variables']);

interface StatementDraft {
  id: number;
  name: string;
  args: string[];
  setting: boolean;
  position: SourcePosition;
  trailingComments: Comment[];
  comments: Comment[];
}

interface BlockDraft {
  id: number;
  kind: 'TestCase' | 'Keyword';
  name: string;
  position: SourcePosition;
  documentationRows?: string[];
  arguments?: ArgumentSpec[];
  statements: StatementDraft[];
  declarationComments: Comment[];
  comments: Comment[];
}

interface EntryDraft {
  id: number;
  name: string;
  values: string[];
  position: SourcePosition;
  trailingComments: Comment[];
  comments: Comment[];
}

interface SectionDraft {
  id: number;
  kind: SectionKind | 'Unknown';
  header: string;
  position: SourcePosition;
  headerComment?: Comment;
  comments: Comment[];
  entries: EntryDraft[];
  blocks: BlockNode[];
}

/**
 * What a `...` row continues
 */
type ContinuationTarget =
  | { type: 'statement'; statement: StatementDraft }
  | { type: 'documentation'; block: BlockDraft }
  | { type: 'arguments'; block: BlockDraft }
  | { type: 'entry'; entry: EntryDraft }
  | { type: 'ignored' };

/**
 * Parser state threaded through the line loop
 */
interface ParserState {
  nextId: number;
  sections: SectionNode[];
  diagnostics: ParseDiagnostic[];
  preambleComments: Comment[];
  section?: SectionDraft;
  block?: BlockDraft;
  target?: ContinuationTarget;
  pendingComments: Comment[];
}

/**
 * Parses suite text in one step
 */
export function parseSuite(text: string): ParseResult {
  return parse(tokenize(text));
}

/**
 * Builds the suite tree from tokenized lines
 */
export function parse(lines: readonly Line[]): ParseResult {
  const state: ParserState = {
    nextId: 1,
    sections: [],
    diagnostics: [],
    preambleComments: [],
    pendingComments: [],
  };

  for (const line of lines) {
    consumeLine(state, line);
  }
  closeSection(state);

  const tree: SuiteTree = {
    id: 0,
    kind: 'File',
    sections: state.sections,
    comments: state.preambleComments,
  };

  return { tree, diagnostics: state.diagnostics };
}

function consumeLine(state: ParserState, line: Line): void {
  // Blank lines never open or close anything
  if (line.blank) {
    return;
  }

  if (line.cells.length === 0) {
    consumeStandaloneComment(state, line);
    return;
  }

  const first = line.cells[0];
  if (!line.indented && isSectionHeader(line.cells)) {
    openSection(state, line);
    return;
  }

  const section = state.section;
  if (!section) {
    addDiagnostic(state, 'StatementOutsideSection', 'Data found before the first section header', first.position);
    if (line.trailingComment) {
      state.preambleComments.push(line.trailingComment);
    }
    return;
  }

  switch (section.kind) {
    case 'Unknown':
    case 'Comments':
      return;
    case 'Settings':
    case 'Variables':
      consumeEntryLine(state, section, line);
      return;
    case 'TestCases':
    case 'Keywords':
      consumeBlockLine(state, section, line);
      return;
  }
}

function consumeStandaloneComment(state: ParserState, line: Line): void {
  const comment = line.trailingComment;
  if (!comment) {
    return;
  }
  if (!state.section) {
    state.preambleComments.push(comment);
    return;
  }
  if (state.section.kind === 'Unknown' || state.section.kind === 'Comments') {
    state.section.comments.push(comment);
    return;
  }
  state.pendingComments.push(comment);
}

function openSection(state: ParserState, line: Line): void {
  closeSection(state);

  const header = sectionHeaderText(line.cells);
  const normalized = header.replace(/^[*\s]+|[*\s]+$/g, '').replace(/\s+/g, '').toLowerCase();
  const kind = Object.hasOwn(SECTION_NAMES, normalized) ? SECTION_NAMES[normalized] : 'Unknown';

  const section: SectionDraft = {
    id: state.nextId++,
    kind,
    header,
    position: line.position,
    headerComment: line.trailingComment,
    comments: [],
    entries: [],
    blocks: [],
  };

  if (kind === 'Unknown') {
    addDiagnostic(state, 'UnknownSection', `Unrecognized section "${header}"; its content is ignored`, line.position, section);
  }

  state.section = section;
  state.target = undefined;
}

/**
 * `*** <name> ***`: leading and closing asterisks around a name
 */
function isSectionHeader(cells: readonly Token[]): boolean {
  const [first] = cells;
  if (first.kind !== 'Cell' || !first.text.startsWith('*')) {
    return false;
  }
  return /^\*+[^*]+\*+$/.test(sectionHeaderText(cells));
}

/**
 * Joins header cells up to the closing asterisks, so `***   Test Cases   ***`
 * and `*** Test Cases ***` read the same
 */
function sectionHeaderText(cells: readonly Token[]): string {
  const parts: string[] = [];
  for (const [index, cell] of cells.entries()) {
    parts.push(cell.text);
    const onlyAsterisks = /^\*+$/.test(cell.text);
    if (cell.text.endsWith('*') && !(index === 0 && onlyAsterisks)) {
      break;
    }
  }
  return parts.join(' ');
}

function consumeEntryLine(state: ParserState, section: SectionDraft, line: Line): void {
  const [first, ...rest] = line.cells;

  if (first.kind === 'Continuation') {
    continueTarget(state, rest, line.trailingComment, first.position);
    return;
  }

  const entry: EntryDraft = {
    id: state.nextId++,
    name: first.text,
    values: rest.map(cell => cell.text),
    position: first.position,
    trailingComments: line.trailingComment ? [line.trailingComment] : [],
    comments: takePendingComments(state),
  };
  section.entries.push(entry);
  state.target = { type: 'entry', entry };
}

function consumeBlockLine(state: ParserState, section: SectionDraft, line: Line): void {
  const [first, ...rest] = line.cells;

  if (first.kind === 'Continuation') {
    continueTarget(state, rest, line.trailingComment, first.position);
    return;
  }

  if (line.indented) {
    if (!state.block) {
      addDiagnostic(state, 'OrphanedStatement', 'Statement is not inside a test case or keyword', first.position);
      state.target = { type: 'ignored' };
      return;
    }
    consumeBodyCells(state, state.block, line.cells, line.trailingComment);
    return;
  }

  closeBlock(state);

  if (first.text.trim().length === 0) {
    addDiagnostic(state, 'EmptyName', 'Test case or keyword name is empty', first.position);
    state.target = { type: 'ignored' };
    return;
  }

  const block: BlockDraft = {
    id: state.nextId++,
    kind: section.kind === 'Keywords' ? 'Keyword' : 'TestCase',
    name: first.text.trim(),
    position: first.position,
    statements: [],
    declarationComments: [],
    comments: takePendingComments(state),
  };
  state.block = block;
  state.target = undefined;

  // A comment on the header line belongs to the node, even when a statement follows the name
  if (line.trailingComment) {
    block.declarationComments.push(line.trailingComment);
  }
  if (rest.length > 0) {
    consumeBodyCells(state, block, rest, undefined);
  }
}

function consumeBodyCells(
  state: ParserState,
  block: BlockDraft,
  cells: readonly Token[],
  comment: Comment | undefined
): void {
  const [first, ...rest] = cells;
  const values = rest.map(cell => cell.text);
  const marker = normalizeSettingMarker(first.text);

  if (marker === 'documentation') {
    if (comment) {
      block.declarationComments.push(comment);
    }
    if (block.documentationRows) {
      addDiagnostic(
        state,
        'DuplicateDocumentation',
        `Duplicate [Documentation] in "${block.name}"; only the first is kept`,
        first.position,
        block
      );
      state.target = { type: 'ignored' };
      return;
    }
    block.documentationRows = [values.join(' ')];
    state.target = { type: 'documentation', block };
    return;
  }

  if (marker === 'arguments' && block.kind === 'Keyword') {
    if (comment) {
      block.declarationComments.push(comment);
    }
    if (block.arguments) {
      addDiagnostic(
        state,
        'DuplicateArguments',
        `Duplicate [Arguments] in "${block.name}"; only the first is kept`,
        first.position,
        block
      );
      state.target = { type: 'ignored' };
      return;
    }
    block.arguments = values.map(parseArgumentSpec);
    state.target = { type: 'arguments', block };
    return;
  }

  const statement: StatementDraft = {
    id: state.nextId++,
    name: first.text,
    args: values,
    setting: /^\[.*\]$/.test(first.text),
    position: first.position,
    trailingComments: comment ? [comment] : [],
    comments: takePendingComments(state),
  };
  block.statements.push(statement);
  state.target = { type: 'statement', statement };
}

function continueTarget(
  state: ParserState,
  cells: readonly Token[],
  comment: Comment | undefined,
  position: SourcePosition
): void {
  const target = state.target;
  const values = cells.map(cell => cell.text);

  if (!target) {
    addDiagnostic(state, 'OrphanedContinuation', 'Continuation marker "..." has nothing to continue', position);
    return;
  }

  switch (target.type) {
    case 'statement':
      target.statement.args.push(...values);
      if (comment) {
        target.statement.trailingComments.push(comment);
      }
      return;
    case 'documentation':
      target.block.documentationRows?.push(values.join(' '));
      if (comment) {
        target.block.declarationComments.push(comment);
      }
      return;
    case 'arguments':
      target.block.arguments?.push(...values.map(parseArgumentSpec));
      if (comment) {
        target.block.declarationComments.push(comment);
      }
      return;
    case 'entry':
      target.entry.values.push(...values);
      if (comment) {
        target.entry.trailingComments.push(comment);
      }
      return;
    case 'ignored':
      return;
  }
}

/**
 * Splits a keyword argument declaration at its first `=`
 */
export function parseArgumentSpec(text: string): ArgumentSpec {
  const index = text.indexOf('=');
  if (index <= 0) {
    return { name: text };
  }
  return { name: text.slice(0, index), defaultValue: text.slice(index + 1) };
}

/**
 * `[ Documentation ]` -> `documentation`; anything else -> undefined
 */
function normalizeSettingMarker(text: string): string | undefined {
  const match = /^\[(.*)\]$/.exec(text);
  if (!match) {
    return undefined;
  }
  return match[1].replace(/\s+/g, '').toLowerCase();
}

function takePendingComments(state: ParserState): Comment[] {
  const comments = state.pendingComments;
  state.pendingComments = [];
  return comments;
}

function closeBlock(state: ParserState): void {
  const block = state.block;
  const section = state.section;
  if (!block || !section) {
    return;
  }

  block.comments.push(...takePendingComments(state));
  section.blocks.push(finalizeBlock(block));
  state.block = undefined;
  state.target = undefined;
}

function finalizeBlock(block: BlockDraft): BlockNode {
  const statements: StatementNode[] = block.statements.map(statement => ({ kind: 'Statement' as const, ...statement }));
  const documentation = block.documentationRows?.join('\n');
  const base = {
    id: block.id,
    name: block.name,
    documentation,
    statements,
    position: block.position,
    declarationComments: block.declarationComments,
    comments: block.comments,
  };

  if (block.kind === 'Keyword') {
    return { ...base, kind: 'Keyword', arguments: block.arguments ?? [] };
  }
  return { ...base, kind: 'TestCase' };
}

function closeSection(state: ParserState): void {
  closeBlock(state);

  const section = state.section;
  if (!section) {
    return;
  }

  const comments = [...section.comments, ...takePendingComments(state)];
  const base = {
    id: section.id,
    kind: 'Section' as const,
    header: section.header,
    position: section.position,
    headerComment: section.headerComment,
    comments,
  };

  switch (section.kind) {
    case 'Settings':
      state.sections.push({ ...base, sectionKind: 'Settings', children: section.entries.map(toSetting) });
      break;
    case 'Variables':
      state.sections.push({ ...base, sectionKind: 'Variables', children: section.entries.map(toVariable) });
      break;
    case 'TestCases':
      state.sections.push({ ...base, sectionKind: 'TestCases', children: section.blocks.filter(isTestCase) });
      break;
    case 'Keywords':
      state.sections.push({ ...base, sectionKind: 'Keywords', children: section.blocks.filter(isKeyword) });
      break;
    case 'Comments':
      state.sections.push({ ...base, sectionKind: 'Comments', children: [] });
      break;
    case 'Unknown':
      break;
  }

  state.section = undefined;
  state.target = undefined;
}

function toSetting(entry: EntryDraft): SettingNode {
  return { ...entry, kind: 'Setting', import: IMPORT_SETTINGS.has(entry.name.toLowerCase()) };
}

function toVariable(entry: EntryDraft): VariableNode {
  return { ...entry, kind: 'Variable' };
}

function isTestCase(block: BlockNode): block is TestCaseNode {
  return block.kind === 'TestCase';
}

function isKeyword(block: BlockNode): block is KeywordNode {
  return block.kind === 'Keyword';
}

function addDiagnostic(
  state: ParserState,
  code: DiagnosticCode,
  message: string,
  position: SourcePosition,
  subject?: NodeRef | SectionDraft | BlockDraft
): void {
  state.diagnostics.push({
    code,
    message,
    position,
    subject: subject ? { id: subject.id, kind: toSubjectKind(subject) } : undefined,
  });
}

function toSubjectKind(subject: NodeRef | SectionDraft | BlockDraft): NodeRef['kind'] {
  if ('entries' in subject) {
    return 'Section';
  }
  return subject.kind;
}

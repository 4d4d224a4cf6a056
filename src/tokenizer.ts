/**
 * Tokenizer - splits suite text into lines of cells
 *
 * Cells are separated by a tab or by two or more spaces. A single space is
 * part of the cell. `#` opens a comment that runs to the end of the line.
 */

import { TokenizeError } from './errors.js';
import type { Comment, Line, SourcePosition, Token } from './types.js';

export const CONTINUATION_MARKER = '...';
export const EMPTY_CELL_MARKER = '\\';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Decodes raw file bytes as strict UTF-8, dropping a leading BOM.
 *
 * @throws TokenizeError pointing at the first undecodable byte
 */
export function decodeSource(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes);
  } catch {
    const offset = findInvalidUtf8Offset(bytes);
    const before = new TextDecoder('utf-8').decode(bytes.subarray(0, offset));
    throw new TokenizeError('Invalid UTF-8 byte sequence', positionAtEnd(before));
  }
}

/**
 * Splits text into tokenized lines. Never fails on structure; only text that
 * cannot be encoded as UTF-8 is rejected.
 */
export function tokenize(rawText: string): Line[] {
  const text = rawText.startsWith('\uFEFF') ? rawText.slice(1) : rawText;

  const surrogate = LONE_SURROGATE.exec(text);
  if (surrogate) {
    throw new TokenizeError('Unpaired UTF-16 surrogate', positionAtEnd(text.slice(0, surrogate.index)));
  }

  const rawLines = text.split(/\r\n|\r|\n/);
  // A terminating newline does not start another line
  if (rawLines.length > 1 && rawLines[rawLines.length - 1] === '') {
    rawLines.pop();
  }

  return rawLines.map((raw, index) => tokenizeLine(raw, index + 1));
}

/**
 * Tokenizes a single line (without its line terminator)
 */
export function tokenizeLine(raw: string, lineNumber: number): Line {
  const cells: Token[] = [];
  let comment: { text: string; column: number } | undefined;

  let cellStart = -1;
  let cellText = '';

  function flushCell(): void {
    const text = cellText.trimEnd();
    if (cellStart >= 0 && text.length > 0) {
      cells.push(createCell(text, lineNumber, cellStart + 1));
    }
    cellStart = -1;
    cellText = '';
  }

  let index = 0;
  while (index < raw.length) {
    const char = raw[index];

    if (isSeparatorAt(raw, index)) {
      flushCell();
      while (index < raw.length && (raw[index] === ' ' || raw[index] === '\t')) {
        index += 1;
      }
      continue;
    }

    if (char === '#' && opensComment(raw, index)) {
      flushCell();
      comment = { text: raw.slice(index).trimEnd(), column: index + 1 };
      break;
    }

    if (cellStart < 0) {
      // A lone space before the first character of a cell is not content
      if (char === ' ') {
        index += 1;
        continue;
      }
      cellStart = index;
    }
    cellText += char;
    index += 1;
  }
  flushCell();

  const position: SourcePosition = { line: lineNumber, column: 1 };
  const indented = isSeparatorAt(raw, 0);

  let trailingComment: Comment | undefined;
  if (comment) {
    trailingComment = {
      text: comment.text,
      position: { line: lineNumber, column: comment.column },
      placement: cells.length === 0 ? 'standalone' : 'trailing',
    };
  }

  return {
    position,
    indented,
    blank: cells.length === 0 && trailingComment === undefined,
    cells: markContinuation(cells),
    trailingComment,
  };
}

function createCell(text: string, line: number, column: number): Token {
  const position = { line, column };
  if (text === EMPTY_CELL_MARKER) {
    return { text: '', position, kind: 'Blank' };
  }
  return { text, position, kind: 'Cell' };
}

/**
 * Marks the first data cell of a line as a continuation when it is `...`
 */
function markContinuation(cells: readonly Token[]): Token[] {
  return cells.map((cell, index) =>
    index === 0 && cell.kind === 'Cell' && cell.text === CONTINUATION_MARKER
      ? { ...cell, kind: 'Continuation' as const }
      : cell
  );
}

function isSeparatorAt(raw: string, index: number): boolean {
  const char = raw[index];
  if (char === '\t') {
    return true;
  }
  if (char !== ' ') {
    return false;
  }
  const next = raw[index + 1];
  return next === ' ' || next === '\t';
}

/**
 * Any `#` not escaped with a backslash starts a comment
 */
function opensComment(raw: string, index: number): boolean {
  return index === 0 || raw[index - 1] !== '\\';
}

function positionAtEnd(text: string): SourcePosition {
  const lines = text.split(/\r\n|\r|\n/);
  return {
    line: lines.length,
    column: lines[lines.length - 1].length + 1,
  };
}

/**
 * Byte offset of the first invalid UTF-8 sequence
 */
function findInvalidUtf8Offset(bytes: Uint8Array): number {
  let index = 0;
  while (index < bytes.length) {
    const byte = bytes[index];
    let length: number;
    let min: number;

    if (byte < 0x80) {
      index += 1;
      continue;
    } else if ((byte & 0xe0) === 0xc0) {
      length = 2;
      min = 0x80;
    } else if ((byte & 0xf0) === 0xe0) {
      length = 3;
      min = 0x800;
    } else if ((byte & 0xf8) === 0xf0) {
      length = 4;
      min = 0x10000;
    } else {
      return index;
    }

    if (index + length > bytes.length) {
      return index;
    }

    let codePoint = byte & (0xff >> (length + 1));
    for (let offset = 1; offset < length; offset++) {
      const continuation = bytes[index + offset];
      if ((continuation & 0xc0) !== 0x80) {
        return index;
      }
      codePoint = (codePoint << 6) | (continuation & 0x3f);
    }

    if (codePoint < min || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      return index;
    }
    index += length;
  }
  return bytes.length;
}

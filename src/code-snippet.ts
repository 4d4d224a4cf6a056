/**
 * Code Snippet Extraction Module
 *
 * Extracts source lines around a finding, with context lines.
 */

export interface CodeSnippet {
  lines: CodeLine[];
  startLine: number;
  endLine: number;
  /** Column of the finding on its line */
  column: number;
}

export interface CodeLine {
  lineNumber: number;
  content: string;
  isFinding: boolean;
}

/**
 * Extracts a snippet from in-memory source text
 *
 * @param source - Decoded file contents
 * @param line - 1-based line of the finding
 * @param column - 1-based column of the finding
 * @param contextLines - Number of lines to show before and after
 * @returns Snippet, or null when the line is outside the text
 */
export function extractCodeSnippet(
  source: string,
  line: number,
  column: number = 1,
  contextLines: number = 0
): CodeSnippet | null {
  const lines = source.split(/\r\n|\r|\n/);
  if (line < 1 || line > lines.length) {
    return null;
  }

  const startLine = Math.max(1, line - contextLines);
  const endLine = Math.min(lines.length, line + contextLines);

  const snippetLines: CodeLine[] = [];
  for (let i = startLine; i <= endLine; i++) {
    snippetLines.push({
      lineNumber: i,
      content: lines[i - 1],
      isFinding: i === line,
    });
  }

  return { lines: snippetLines, startLine, endLine, column };
}

/**
 * Formats a snippet for terminal display, with a caret under the column
 *
 * @param maxLineLength - Longer lines are truncated
 */
export function formatSnippetForTerminal(snippet: CodeSnippet, maxLineLength: number = 120): string[] {
  const output: string[] = [];
  const maxLineNumWidth = String(snippet.endLine).length;

  for (const line of snippet.lines) {
    const lineNum = String(line.lineNumber).padStart(maxLineNumWidth, ' ');
    let content = line.content.replace(/\t/g, ' ');

    if (content.length > maxLineLength) {
      content = content.substring(0, maxLineLength - 3) + '...';
    }

    const prefix = line.isFinding ? '>' : ' ';
    output.push(`${prefix} ${lineNum} | ${content}`);

    if (line.isFinding && snippet.column <= content.length) {
      output.push(`  ${' '.repeat(maxLineNumWidth)} | ${' '.repeat(snippet.column - 1)}^`);
    }
  }

  return output;
}

/**
 * Reporter - renders findings as text or JSON
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { BatchResult, FileReport } from './analyzer.js';
import { extractCodeSnippet, formatSnippetForTerminal } from './code-snippet.js';
import type { FileFinding, Severity, SubjectKind } from './types.js';

export const TOOL_NAME = 'roblint';
export const TOOL_VERSION = '0.1.0'; // Should match package.json

export interface RunSummary {
  total: number;
  error_count: number;
  warning_count: number;
  suppressed_count: number;
  passed: boolean;
}

export interface JsonFinding {
  file: string;
  ruleId: string;
  severity: Severity;
  line: number;
  column: number;
  message: string;
  subjectKind: SubjectKind;
  kind: FileFinding['kind'];
}

export interface RunReport {
  tool: string;
  version: string;
  files_analyzed: number;
  findings: JsonFinding[];
  summary: RunSummary;
}

/**
 * Builds the machine-readable record of a run
 */
export function generateRunReport(result: Pick<BatchResult, 'reports' | 'findings'>): RunReport {
  return {
    tool: TOOL_NAME,
    version: TOOL_VERSION,
    files_analyzed: result.reports.length,
    findings: result.findings.map(toJsonFinding),
    summary: generateSummary(result.findings, countSuppressed(result.reports)),
  };
}

/**
 * Generates summary statistics
 */
export function generateSummary(findings: readonly FileFinding[], suppressedCount: number = 0): RunSummary {
  const errorCount = findings.filter(f => f.severity === 'error').length;
  const warningCount = findings.filter(f => f.severity === 'warning').length;

  return {
    total: findings.length,
    error_count: errorCount,
    warning_count: warningCount,
    suppressed_count: suppressedCount,
    passed: errorCount === 0,
  };
}

function toJsonFinding(finding: FileFinding): JsonFinding {
  return {
    file: finding.file,
    ruleId: finding.ruleId,
    severity: finding.severity,
    line: finding.position.line,
    column: finding.position.column,
    message: finding.message,
    subjectKind: finding.subject.kind,
    kind: finding.kind,
  };
}

export function formatJsonReport(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * `<file>:<line>:<column> [E|W] <ruleId> <message>`
 */
export function formatFinding(finding: FileFinding): string {
  const { line, column } = finding.position;
  const marker = finding.severity === 'error' ? 'E' : 'W';
  return `${finding.file}:${line}:${column} [${marker}] ${finding.ruleId} ${finding.message}`;
}

export function formatSummaryLine(summary: RunSummary, filesAnalyzed: number): string {
  return (
    `${filesAnalyzed} file(s) analyzed: ${summary.total} finding(s) ` +
    `(${summary.error_count} error(s), ${summary.warning_count} warning(s)), ` +
    `${summary.suppressed_count} suppressed`
  );
}

export interface TextReportOptions {
  /** Show the offending source line under each finding */
  snippets?: boolean;
}

/**
 * Plain-text report, one finding per line followed by the summary line
 */
export function formatTextReport(reports: readonly FileReport[], options: TextReportOptions = {}): string[] {
  const output: string[] = [];
  const all: FileFinding[] = [];

  for (const report of reports) {
    for (const finding of report.findings) {
      const fileFinding = { ...finding, file: report.file };
      all.push(fileFinding);
      output.push(formatFinding(fileFinding));
      if (options.snippets) {
        output.push(...snippetLines(report, fileFinding));
      }
    }
  }

  output.push(formatSummaryLine(generateSummary(all, countSuppressed(reports)), reports.length));
  return output;
}

/**
 * Prints the text report with colours
 */
export function printTextReport(reports: readonly FileReport[], options: TextReportOptions = {}): void {
  const all: FileFinding[] = [];

  for (const report of reports) {
    for (const finding of report.findings) {
      const fileFinding = { ...finding, file: report.file };
      all.push(fileFinding);
      console.log(getSeverityColor(finding.severity)(formatFinding(fileFinding)));
      if (options.snippets) {
        for (const line of snippetLines(report, fileFinding)) {
          console.log(line.trimStart().startsWith('>') ? chalk.red(line) : chalk.dim(line));
        }
      }
    }
  }

  const summary = generateSummary(all, countSuppressed(reports));
  const statusIcon = summary.passed ? chalk.green('✓') : chalk.red('✗');
  console.log(`\n${statusIcon} ${chalk.bold(formatSummaryLine(summary, reports.length))}`);
}

function snippetLines(report: FileReport, finding: FileFinding): string[] {
  if (report.source === undefined) {
    return [];
  }
  const snippet = extractCodeSnippet(report.source, finding.position.line, finding.position.column);
  return snippet ? formatSnippetForTerminal(snippet, 100).map(line => `    ${line}`) : [];
}

function countSuppressed(reports: readonly FileReport[]): number {
  return reports.reduce((sum, report) => sum + report.suppressedCount, 0);
}

/**
 * Gets the color function for a severity level
 */
function getSeverityColor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'error':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
  }
}

/**
 * Writes report text to a file, creating its directory
 */
export function writeReport(content: string, outputPath: string): void {
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(outputPath, content.endsWith('\n') ? content : content + '\n', 'utf-8');
}

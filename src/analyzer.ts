/**
 * Analyzer - runs the lint pipeline over one source or a batch of files
 *
 * tokenize -> parse -> resolve directives -> evaluate rules
 */

import { readFile as readFileFromDisk } from 'node:fs/promises';
import { FindingsCollector } from './collector.js';
import { ConfigError, TokenizeError, describeError } from './errors.js';
import { logger } from './logger.js';
import { parse } from './parser.js';
import { RuleEngine, createDefaultRegistry, type RuleRegistry } from './rules/index.js';
import { resolveSuppressions, type UnusedDirective } from './suppressions/index.js';
import { decodeSource, tokenize } from './tokenizer.js';
import type { FileFinding, Finding, Line, LintConfig, SourcePosition } from './types.js';

export const PARSE_ERROR_ID = 'parse-error';

export const DEFAULT_CONCURRENCY = 4;

/**
 * Result for a single file
 */
export interface FileReport {
  file: string;
  findings: Finding[];
  suppressedCount: number;
  unusedDirectives: UnusedDirective[];
  /** Decoded text, kept for source snippets; absent when the file could not be read or decoded */
  source?: string;
}

export interface AnalyzerOptions {
  /** Defaults to the built-in rules */
  registry?: RuleRegistry;
  config?: LintConfig;
}

export interface AnalyzeFilesOptions {
  /** Reads one file; defaults to reading from disk */
  readFile?: (file: string) => Promise<Uint8Array>;
  /** Maximum files in flight at once */
  concurrency?: number;
  /** Once aborted no new file is started; files in flight still finish */
  signal?: AbortSignal;
  onFileAnalyzed?: (report: FileReport) => void;
}

export interface BatchResult {
  reports: FileReport[];
  findings: FileFinding[];
  cancelled: boolean;
  /** Files never started because the run was cancelled */
  skipped: string[];
}

/**
 * Coordinates analysis; one instance holds one validated rule configuration
 */
export class Analyzer {
  private readonly engine: RuleEngine;
  private filesAnalyzed = 0;
  private parseFailures = 0;
  private findingsReported = 0;
  private suppressed = 0;

  /**
   * @throws ConfigError when the rule configuration is invalid
   */
  constructor(options: AnalyzerOptions = {}) {
    this.engine = new RuleEngine(options.registry ?? createDefaultRegistry(), options.config ?? {});
  }

  /**
   * Analyzes in-memory text
   */
  analyzeSource(file: string, text: string): FileReport {
    let lines: Line[];
    try {
      lines = tokenize(text);
    } catch (error) {
      if (error instanceof TokenizeError) {
        return this.record(parseFailure(file, `Failed to parse file: ${error.message}`, error.position));
      }
      throw error;
    }

    const parsed = parse(lines);
    const suppressions = resolveSuppressions(parsed.tree);
    const result = this.engine.evaluate(parsed, suppressions);

    return this.record({
      file,
      findings: result.findings,
      suppressedCount: result.suppressedCount,
      unusedDirectives: result.unusedDirectives,
      source: text,
    });
  }

  /**
   * Analyzes raw bytes, which must be UTF-8
   */
  analyzeBytes(file: string, bytes: Uint8Array): FileReport {
    let text: string;
    try {
      text = decodeSource(bytes);
    } catch (error) {
      if (error instanceof TokenizeError) {
        return this.record(parseFailure(file, `Failed to parse file: ${error.message}`, error.position));
      }
      throw error;
    }
    return this.analyzeSource(file, text);
  }

  /**
   * Analyzes files with bounded concurrency. Results come back in input
   * order regardless of completion order.
   */
  async analyzeFiles(files: readonly string[], options: AnalyzeFilesOptions = {}): Promise<BatchResult> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const readFile = options.readFile ?? ((file: string) => readFileFromDisk(file));
    const { signal } = options;
    const collector = new FindingsCollector();
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < files.length && !signal?.aborted) {
        const index = next++;
        const file = files[index];
        logger.debug(`Analyzing ${file}`);

        const report = await this.readAndAnalyze(file, readFile);
        collector.add(index, report);
        options.onFileAnalyzed?.(report);
      }
    };

    const workers = Array.from({ length: Math.min(concurrency, files.length) }, () => worker());
    await Promise.all(workers);

    const skipped = files.filter((_, index) => !collector.has(index));
    if (skipped.length > 0) {
      logger.debug(`Cancelled; ${skipped.length} file(s) not analyzed`);
    }

    return {
      reports: collector.getReports(),
      findings: collector.getFindings(),
      cancelled: signal?.aborted ?? false,
      skipped,
    };
  }

  getStats() {
    return {
      filesAnalyzed: this.filesAnalyzed,
      parseFailures: this.parseFailures,
      rulesEnabled: this.engine.getEnabledRules().size,
      findings: this.findingsReported,
      suppressed: this.suppressed,
    };
  }

  private async readAndAnalyze(file: string, readFile: (file: string) => Promise<Uint8Array>): Promise<FileReport> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(file);
    } catch (error) {
      return this.record(parseFailure(file, `Failed to read file: ${describeError(error)}`));
    }
    return this.analyzeBytes(file, bytes);
  }

  private record(report: FileReport): FileReport {
    this.filesAnalyzed++;
    this.findingsReported += report.findings.length;
    this.suppressed += report.suppressedCount;
    if (report.findings.some(f => f.kind === 'ParseFailure')) {
      this.parseFailures++;
    }
    return report;
  }
}

function parseFailure(file: string, message: string, position: SourcePosition = { line: 1, column: 1 }): FileReport {
  return {
    file,
    findings: [
      {
        ruleId: PARSE_ERROR_ID,
        severity: 'error',
        position,
        message,
        subject: { id: 0, kind: 'File' },
        kind: 'ParseFailure',
      },
    ],
    suppressedCount: 0,
    unusedDirectives: [],
  };
}

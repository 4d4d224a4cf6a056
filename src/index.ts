#!/usr/bin/env node

/**
 * CLI Entry Point - lints keyword-driven test suites
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { Analyzer, type BatchResult } from './analyzer.js';
import { printRuleList, createRulesCommand } from './cli/rules.js';
import { loadConfig, resolveConfig, type OutputFormat, type RoblintConfig } from './config-loader.js';
import { ConfigError, describeError } from './errors.js';
import { discoverFiles } from './file-discovery.js';
import { logger } from './logger.js';
import {
  TOOL_VERSION,
  formatJsonReport,
  formatTextReport,
  generateRunReport,
  generateSummary,
  printTextReport,
  writeReport,
} from './reporter.js';
import { generateReports } from './reporters/index.js';
import { createDefaultRegistry } from './rules/index.js';

const EXIT_OK = 0;
const EXIT_FINDINGS = 1;
const EXIT_CONFIG_ERROR = 2;
const EXIT_INTERNAL_ERROR = 3;

interface CliOptions {
  include?: string[];
  exclude?: string[];
  ignore?: string[];
  configure?: string[];
  format?: OutputFormat;
  output?: string;
  reports?: string[];
  concurrency?: number;
  failOnWarnings?: boolean;
  reportUnusedDirectives?: boolean;
  snippets: boolean;
  config?: string;
  listRules?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return [...previous, ...items];
}

function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError('Expected "text" or "json".');
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('roblint')
  .description('Static analysis for keyword-driven test suites')
  .version(TOOL_VERSION);

program.addCommand(createRulesCommand());

program
  .argument('[paths...]', 'Files or directories to lint (default: .)')
  .option('--include <rules>', 'Run only these rules (comma-separated, repeatable)', collectList)
  .option('--exclude <rules>', 'Disable these rules (comma-separated, repeatable)', collectList)
  .option('--ignore <glob>', 'Skip files matching the glob (repeatable)', collect)
  .option('-c, --configure <rule:param:value>', 'Set a rule option or severity (repeatable)', collect)
  .option('-f, --format <format>', 'Output format: text or json', parseFormat)
  .option('-o, --output <path>', 'Write the report to a file instead of stdout')
  .option('--reports <names>', 'Extra reports: rules_by_id, rules_by_error_type, all', collectList)
  .option('--concurrency <n>', 'Files analyzed at once', parsePositiveInt)
  .option('--fail-on-warnings', 'Exit with error code if warnings are found')
  .option('--report-unused-directives', 'Report inline directives that suppress nothing')
  .option('--no-snippets', 'Do not show source lines in text output')
  .option('--config <path>', 'Path to a configuration file')
  .option('--list-rules', 'List available rules and exit')
  .option('--verbose', 'Print debug output')
  .action(async (paths: string[], options: CliOptions) => {
    process.exitCode = await main(paths, options);
  });

await program.parseAsync(process.argv);

async function main(paths: string[], options: CliOptions): Promise<number> {
  logger.setVerbose(options.verbose ?? false);

  try {
    const registry = createDefaultRegistry();
    if (options.listRules) {
      printRuleList(registry);
      return EXIT_OK;
    }

    const loaded = loadConfig(process.cwd(), options.config);
    if (loaded.path) {
      logger.debug(`Using configuration ${loaded.path}`);
    }

    const config = resolveConfig(loaded.config, {
      paths,
      include: options.include,
      excludeRules: options.exclude,
      exclude: options.ignore,
      configure: options.configure,
      format: options.format,
      output: options.output,
      reports: options.reports,
      concurrency: options.concurrency,
      failOnWarnings: options.failOnWarnings,
      reportUnusedDirectives: options.reportUnusedDirectives,
    });

    const analyzer = new Analyzer({ registry, config });
    const files = await discoverFiles(config.paths, { extensions: config.extensions, exclude: config.exclude });
    if (files.length === 0) {
      logger.warn('No files to analyze');
    } else {
      logger.info(`Analyzing ${files.length} file(s)...`);
    }

    const result = await analyzeWithInterrupt(analyzer, files, config);
    const stats = analyzer.getStats();
    logger.debug(
      `${stats.filesAnalyzed} file(s), ${stats.rulesEnabled} rule(s), ` +
        `${stats.findings} finding(s), ${stats.suppressed} suppressed, ${stats.parseFailures} parse failure(s)`
    );

    emitResults(result, config, options.snippets);
    return exitCodeFor(result, config);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_CONFIG_ERROR;
    }
    console.error(chalk.red(`Unexpected error: ${describeError(error)}`));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return EXIT_INTERNAL_ERROR;
  }
}

/**
 * Ctrl+C stops new files from starting; files in flight still complete
 */
async function analyzeWithInterrupt(analyzer: Analyzer, files: string[], config: RoblintConfig): Promise<BatchResult> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted; finishing files already in progress');
    controller.abort();
  };

  process.once('SIGINT', onInterrupt);
  try {
    const result = await analyzer.analyzeFiles(files, {
      concurrency: config.concurrency,
      signal: controller.signal,
    });
    if (result.cancelled) {
      logger.warn(`${result.skipped.length} file(s) were not analyzed`);
    }
    return result;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function emitResults(result: BatchResult, config: RoblintConfig, snippets: boolean): void {
  const extraReports = generateReports(config.reports, result.findings);

  if (config.format === 'json') {
    const json = formatJsonReport(generateRunReport(result));
    if (config.output) {
      writeReport(json, config.output);
      logger.success(`Report written to ${config.output}`);
    } else {
      console.log(json);
    }
    extraReports.forEach(report => logger.info(report));
    return;
  }

  if (config.output) {
    writeReport([...formatTextReport(result.reports), ...extraReports].join('\n'), config.output);
    logger.success(`Report written to ${config.output}`);
    return;
  }

  printTextReport(result.reports, { snippets });
  extraReports.forEach(report => console.log(`\n${report}`));
}

function exitCodeFor(result: BatchResult, config: RoblintConfig): number {
  const summary = generateSummary(result.findings);
  if (summary.error_count > 0) {
    return EXIT_FINDINGS;
  }
  if (config.failOnWarnings && summary.warning_count > 0) {
    return EXIT_FINDINGS;
  }
  return EXIT_OK;
}

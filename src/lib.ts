/**
 * Library entry point
 */

export * from './types.js';
export * from './errors.js';
export { tokenize, tokenizeLine, decodeSource, CONTINUATION_MARKER, EMPTY_CELL_MARKER } from './tokenizer.js';
export { parse, parseSuite, parseArgumentSpec } from './parser.js';
export { serialize } from './serializer.js';
export * from './suppressions/index.js';
export * from './rules/index.js';
export {
  Analyzer,
  PARSE_ERROR_ID,
  DEFAULT_CONCURRENCY,
  type AnalyzerOptions,
  type AnalyzeFilesOptions,
  type BatchResult,
  type FileReport,
} from './analyzer.js';
export { FindingsCollector } from './collector.js';
export {
  loadConfig,
  parseConfig,
  resolveConfig,
  parseConfigureOption,
  findConfigFile,
  CONFIG_FILENAMES,
  DEFAULT_EXTENSIONS,
  type ConfigFile,
  type CliOverrides,
  type RoblintConfig,
  type OutputFormat,
} from './config-loader.js';
export { discoverFiles, type DiscoveryOptions } from './file-discovery.js';
export {
  TOOL_NAME,
  TOOL_VERSION,
  generateRunReport,
  generateSummary,
  formatFinding,
  formatJsonReport,
  formatTextReport,
  type RunReport,
  type RunSummary,
  type JsonFinding,
} from './reporter.js';
export { generateReports, REPORTS } from './reporters/index.js';

/**
 * Configuration File Loader
 *
 * Loads `.roblintrc.json` / `.roblintrc.yaml` from the project root,
 * validates it against the bundled JSON schema and merges command-line
 * overrides on top.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import type { SchemaObject } from 'ajv/dist/2020.js';
import { DEFAULT_CONCURRENCY } from './analyzer.js';
import { ConfigError, describeError } from './errors.js';
import type { LintConfig } from './types.js';
import { compileSchema, type SchemaValidator } from './validation.js';

export const CONFIG_FILENAMES = ['.roblintrc.json', '.roblintrc.yaml', '.roblintrc.yml'] as const;

export const DEFAULT_EXTENSIONS = ['.robot', '.resource'];

export type OutputFormat = 'text' | 'json';

/**
 * Shape of a configuration file; every field is optional
 */
export interface ConfigFile {
  paths?: string[];
  extensions?: string[];
  /** Globs of files to skip */
  exclude?: string[];
  include?: string[];
  excludeRules?: string[];
  rules?: Record<string, Record<string, unknown>>;
  format?: OutputFormat;
  output?: string;
  reports?: string[];
  concurrency?: number;
  failOnWarnings?: boolean;
  reportUnusedDirectives?: boolean;
}

/**
 * Values given on the command line; they win over the file
 */
export interface CliOverrides {
  paths?: string[];
  include?: string[];
  excludeRules?: string[];
  exclude?: string[];
  /** `<rule>:<param>:<value>` entries */
  configure?: string[];
  format?: OutputFormat;
  output?: string;
  reports?: string[];
  concurrency?: number;
  failOnWarnings?: boolean;
  reportUnusedDirectives?: boolean;
}

/**
 * Fully resolved run configuration
 */
export interface RoblintConfig extends LintConfig {
  paths: string[];
  extensions: string[];
  exclude: string[];
  format: OutputFormat;
  output?: string;
  reports: string[];
  concurrency: number;
  failOnWarnings: boolean;
  reportUnusedDirectives: boolean;
}

export interface ConfigureOption {
  ruleId: string;
  param: string;
  value: string;
}

let validator: SchemaValidator<ConfigFile> | undefined;

function configValidator(): SchemaValidator<ConfigFile> {
  if (!validator) {
    const schemaPath = new URL('../schema/roblintrc.schema.json', import.meta.url);
    const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    validator = compileSchema<ConfigFile>(schema);
  }
  return validator;
}

/**
 * First configuration file found in the project root, if any
 */
export function findConfigFile(projectRoot: string): string | undefined {
  return CONFIG_FILENAMES.map(name => path.join(projectRoot, name)).find(candidate => fs.existsSync(candidate));
}

/**
 * Parse and validate configuration text. JSON is read by the YAML parser too.
 *
 * @param content - File contents
 * @param source - Name used in error messages
 * @throws ConfigError when the text does not parse or fails the schema
 */
export function parseConfig(content: string, source: string): ConfigFile {
  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to load ${source}: ${describeError(error)}`, { cause: error });
  }

  // An empty file parses to null
  if (data === null || data === undefined) {
    return {};
  }

  const check = configValidator();
  if (!check.isValid(data)) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${check.errors().map(e => `  ${e}`).join('\n')}`);
  }
  return data;
}

/**
 * Load configuration from an explicit path or the project root
 *
 * @param projectRoot - Directory searched for a configuration file
 * @param explicitPath - `--config` value; must exist when given
 * @returns Configuration and the file it came from, empty when none exists
 */
export function loadConfig(projectRoot: string, explicitPath?: string): { config: ConfigFile; path?: string } {
  const configPath = explicitPath ? path.resolve(projectRoot, explicitPath) : findConfigFile(projectRoot);
  if (!configPath) {
    return { config: {} };
  }
  if (explicitPath && !fs.existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to load ${configPath}: ${describeError(error)}`, { cause: error });
  }
  return { config: parseConfig(content, configPath), path: configPath };
}

/**
 * Parse a `--configure` value. The value part may itself contain colons.
 *
 * @throws ConfigError when rule, param or value is missing
 */
export function parseConfigureOption(option: string): ConfigureOption {
  const match = /^([^:]+):([^:]+):(.*)$/.exec(option);
  if (!match || match[3].length === 0) {
    throw new ConfigError(`Provided invalid config: '${option}' (general pattern: <rule>:<param>:<value>)`);
  }
  const [, ruleId, param, value] = match;
  return { ruleId: ruleId.trim(), param: param.trim(), value };
}

/**
 * Merge defaults, file values and command-line overrides
 */
export function resolveConfig(file: ConfigFile = {}, overrides: CliOverrides = {}): RoblintConfig {
  const rules: Record<string, Record<string, unknown>> = {};
  for (const [ruleId, options] of Object.entries(file.rules ?? {})) {
    rules[ruleId] = { ...options };
  }
  for (const entry of overrides.configure ?? []) {
    const { ruleId, param, value } = parseConfigureOption(entry);
    rules[ruleId] = { ...rules[ruleId], [param]: value };
  }

  return {
    paths: nonEmpty(overrides.paths) ?? file.paths ?? ['.'],
    extensions: file.extensions ?? DEFAULT_EXTENSIONS,
    exclude: [...(file.exclude ?? []), ...(overrides.exclude ?? [])],
    include: nonEmpty(overrides.include) ?? file.include,
    excludeRules: [...(file.excludeRules ?? []), ...(overrides.excludeRules ?? [])],
    rules,
    format: overrides.format ?? file.format ?? 'text',
    output: overrides.output ?? file.output,
    reports: overrides.reports ?? file.reports ?? [],
    concurrency: overrides.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
    failOnWarnings: overrides.failOnWarnings ?? file.failOnWarnings ?? false,
    reportUnusedDirectives: overrides.reportUnusedDirectives ?? file.reportUnusedDirectives ?? false,
  };
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

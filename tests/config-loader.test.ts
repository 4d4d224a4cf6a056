/**
 * Configuration loading and merging
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../src/errors.js';
import {
  DEFAULT_EXTENSIONS,
  loadConfig,
  parseConfig,
  parseConfigureOption,
  resolveConfig,
} from '../src/config-loader.js';

describe('parseConfig', () => {
  it('reads JSON', () => {
    const config = parseConfig('{"excludeRules": ["empty-section"], "concurrency": 2}', '.roblintrc.json');
    expect(config).toEqual({ excludeRules: ['empty-section'], concurrency: 2 });
  });

  it('reads YAML', () => {
    const config = parseConfig(
      ['format: json', 'rules:', '  invalid-name-char:', '    severity: error'].join('\n'),
      '.roblintrc.yaml'
    );
    expect(config).toEqual({ format: 'json', rules: { 'invalid-name-char': { severity: 'error' } } });
  });

  it('treats an empty file as no configuration', () => {
    expect(parseConfig('', 'empty.yaml')).toEqual({});
  });

  it('names the offending field', () => {
    expect(() => parseConfig('format: xml', 'bad.yaml')).toThrow(
      'Invalid configuration in bad.yaml:\n  /format must be equal to one of the allowed values'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('colour: true', 'bad.yaml')).toThrow('/ must NOT have additional properties');
  });

  it('rejects a concurrency below one', () => {
    expect(() => parseConfig('concurrency: 0', 'bad.yaml')).toThrow(ConfigError);
  });

  it('wraps syntax errors', () => {
    expect(() => parseConfig('paths: [a, b', 'broken.yaml')).toThrow(/^Failed to load broken\.yaml: /);
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'roblint-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns nothing when no file exists', () => {
    expect(loadConfig(root)).toEqual({ config: {} });
  });

  it('finds a configuration file in the project root', () => {
    fs.writeFileSync(path.join(root, '.roblintrc.yml'), 'failOnWarnings: true\n');

    expect(loadConfig(root)).toEqual({
      config: { failOnWarnings: true },
      path: path.join(root, '.roblintrc.yml'),
    });
  });

  it('prefers the JSON file', () => {
    fs.writeFileSync(path.join(root, '.roblintrc.json'), '{"format": "json"}');
    fs.writeFileSync(path.join(root, '.roblintrc.yaml'), 'format: text\n');

    expect(loadConfig(root).config).toEqual({ format: 'json' });
  });

  it('requires an explicit path to exist', () => {
    expect(() => loadConfig(root, 'custom.yaml')).toThrow(
      `Configuration file not found: ${path.join(root, 'custom.yaml')}`
    );
  });
});

describe('parseConfigureOption', () => {
  it('splits rule, parameter and value', () => {
    expect(parseConfigureOption('invalid-name-char:allowedCharPattern:[a-z]')).toEqual({
      ruleId: 'invalid-name-char',
      param: 'allowedCharPattern',
      value: '[a-z]',
    });
  });

  it('keeps colons in the value', () => {
    expect(parseConfigureOption('rule:param:a:b').value).toBe('a:b');
  });

  it.each(['rule', 'rule:param', 'rule:param:', ':param:value'])('rejects "%s"', option => {
    expect(() => parseConfigureOption(option)).toThrow(
      `Provided invalid config: '${option}' (general pattern: <rule>:<param>:<value>)`
    );
  });
});

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual({
      paths: ['.'],
      extensions: DEFAULT_EXTENSIONS,
      exclude: [],
      include: undefined,
      excludeRules: [],
      rules: {},
      format: 'text',
      output: undefined,
      reports: [],
      concurrency: 4,
      failOnWarnings: false,
      reportUnusedDirectives: false,
    });
  });

  it('lets the command line win and adds up exclusions', () => {
    const config = resolveConfig(
      {
        paths: ['suites'],
        include: ['missing-doc-keyword'],
        excludeRules: ['empty-section'],
        exclude: ['generated/**'],
        format: 'json',
        concurrency: 8,
      },
      {
        paths: ['other'],
        excludeRules: ['duplicate-name'],
        exclude: ['tmp/**'],
        format: 'text',
        include: [],
      }
    );

    expect(config.paths).toEqual(['other']);
    expect(config.include).toEqual(['missing-doc-keyword']);
    expect(config.excludeRules).toEqual(['empty-section', 'duplicate-name']);
    expect(config.exclude).toEqual(['generated/**', 'tmp/**']);
    expect(config.format).toBe('text');
    expect(config.concurrency).toBe(8);
  });

  it('applies --configure on top of file rule settings', () => {
    const config = resolveConfig(
      { rules: { 'invalid-name-char': { severity: 'error' } } },
      { configure: ['invalid-name-char:allowedCharPattern:[a-z ]', 'duplicate-name:severity:warning'] }
    );

    expect(config.rules).toEqual({
      'invalid-name-char': { severity: 'error', allowedCharPattern: '[a-z ]' },
      'duplicate-name': { severity: 'warning' },
    });
  });
});

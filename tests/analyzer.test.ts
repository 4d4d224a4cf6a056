/**
 * Analyzer tests: the fixture suite end to end, and batch runs
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { Analyzer } from '../src/analyzer.js';
import { FindingsCollector } from '../src/collector.js';
import { ConfigError } from '../src/errors.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/suite.robot', import.meta.url));

const encoder = new TextEncoder();

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * In-memory stand-in for the file system
 */
function memoryReader(files: Record<string, string>, delays: Record<string, number> = {}) {
  return async (file: string): Promise<Uint8Array> => {
    await delay(delays[file] ?? 0);
    const text = files[file];
    if (text === undefined) {
      throw new Error(`ENOENT: no such file '${file}'`);
    }
    return encoder.encode(text);
  };
}

const missingDoc = (name: string) => `*** Keywords ***\n${name}\n    No Operation\n`;

describe('Fixture suite', () => {
  const text = fs.readFileSync(FIXTURE, 'utf-8');

  it('reports exactly the expected defects', () => {
    const report = new Analyzer().analyzeSource('suite.robot', text);

    expect(report.findings.map(f => [f.ruleId, f.position.line, f.message])).toEqual([
      ['invalid-name-char', 13, 'Test case name "Test With Invalid Char." contains invalid character(s): "."'],
      ['missing-doc-keyword', 17, 'Missing documentation in keyword "Missing Keyword Documentation"'],
      ['invalid-name-char', 27, 'Keyword name "Keyword With Invalid Char?" contains invalid character(s): "?"'],
    ]);
    expect(report.suppressedCount).toBe(1);
    expect(report.unusedDirectives).toEqual([]);
  });

  it('does not report the suppressed or documented keywords', () => {
    const report = new Analyzer().analyzeSource('suite.robot', text);
    const messages = report.findings.map(f => f.message).join('\n');

    expect(messages).not.toContain('"Missing Doc But Disabled Rule"');
    expect(messages).not.toContain('"My Internal Keyword"');
  });
});

describe('Analyzer', () => {
  it('turns undecodable bytes into a parse-error finding', () => {
    const report = new Analyzer().analyzeBytes('bad.robot', Uint8Array.from([0x2a, 0xff]));

    expect(report.findings).toEqual([
      {
        ruleId: 'parse-error',
        severity: 'error',
        position: { line: 1, column: 2 },
        message: 'Failed to parse file: Invalid UTF-8 byte sequence (line 1, column 2)',
        subject: { id: 0, kind: 'File' },
        kind: 'ParseFailure',
      },
    ]);
    expect(report.source).toBeUndefined();
  });

  it('honours a header directive when a statement shares the header line', () => {
    const report = new Analyzer({ config: { reportUnusedDirectives: true } }).analyzeSource(
      'inline.robot',
      '*** Test Cases ***\nBad Name.    Log    x    # roblint: disable=invalid-name-char'
    );

    expect(report.findings).toEqual([]);
    expect(report.suppressedCount).toBe(1);
    expect(report.unusedDirectives).toEqual([]);
  });

  it('keeps results in input order whatever order files finish in', async () => {
    const files = { 'a.robot': missingDoc('Alpha'), 'b.robot': missingDoc('Beta'), 'c.robot': missingDoc('Gamma') };
    const readFile = memoryReader(files, { 'a.robot': 30, 'b.robot': 15, 'c.robot': 0 });

    const result = await new Analyzer().analyzeFiles(['a.robot', 'b.robot', 'c.robot'], { readFile, concurrency: 3 });

    expect(result.reports.map(r => r.file)).toEqual(['a.robot', 'b.robot', 'c.robot']);
    expect(result.findings.map(f => `${f.file}:${f.position.line} ${f.ruleId}`)).toEqual([
      'a.robot:2 missing-doc-keyword',
      'b.robot:2 missing-doc-keyword',
      'c.robot:2 missing-doc-keyword',
    ]);
    expect(result.cancelled).toBe(false);
    expect(result.skipped).toEqual([]);
  });

  it('never runs more files at once than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const readFile = async (): Promise<Uint8Array> => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
      return encoder.encode('*** Test Cases ***\nT\n    No Operation\n');
    };

    const files = ['1.robot', '2.robot', '3.robot', '4.robot', '5.robot'];
    const result = await new Analyzer().analyzeFiles(files, { readFile, concurrency: 2 });

    expect(peak).toBe(2);
    expect(result.reports).toHaveLength(5);
  });

  it('reports unreadable files and carries on', async () => {
    const readFile = memoryReader({ 'ok.robot': missingDoc('Fine') });

    const result = await new Analyzer().analyzeFiles(['missing.robot', 'ok.robot'], { readFile });

    expect(result.findings.map(f => [f.file, f.ruleId, f.message])).toEqual([
      ['missing.robot', 'parse-error', "Failed to read file: ENOENT: no such file 'missing.robot'"],
      ['ok.robot', 'missing-doc-keyword', 'Missing documentation in keyword "Fine"'],
    ]);
  });

  it('stops starting files once cancelled but finishes the one in flight', async () => {
    const controller = new AbortController();
    const files = { 'a.robot': missingDoc('A'), 'b.robot': missingDoc('B'), 'c.robot': missingDoc('C') };
    const read = memoryReader(files);
    const readFile = async (file: string): Promise<Uint8Array> => {
      controller.abort();
      return read(file);
    };

    const result = await new Analyzer().analyzeFiles(Object.keys(files), {
      readFile,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(result.cancelled).toBe(true);
    expect(result.reports.map(r => r.file)).toEqual(['a.robot']);
    expect(result.findings).toHaveLength(1);
    expect(result.skipped).toEqual(['b.robot', 'c.robot']);
  });

  it('starts nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await new Analyzer().analyzeFiles(['a.robot'], {
      readFile: memoryReader({ 'a.robot': '' }),
      signal: controller.signal,
    });

    expect(result.reports).toEqual([]);
    expect(result.skipped).toEqual(['a.robot']);
  });

  it('rejects a concurrency below one', async () => {
    await expect(new Analyzer().analyzeFiles(['a.robot'], { concurrency: 0 })).rejects.toThrow(ConfigError);
  });

  it('keeps running totals', async () => {
    const analyzer = new Analyzer();
    await analyzer.analyzeFiles(['a.robot', 'gone.robot'], { readFile: memoryReader({ 'a.robot': missingDoc('A') }) });

    expect(analyzer.getStats()).toEqual({
      filesAnalyzed: 2,
      parseFailures: 1,
      rulesEnabled: 6,
      findings: 2,
      suppressed: 0,
    });
  });

  it('rejects invalid rule configuration up front', () => {
    expect(() => new Analyzer({ config: { include: ['nope'] } })).toThrow(ConfigError);
  });
});

describe('FindingsCollector', () => {
  const report = (file: string) => ({ file, findings: [], suppressedCount: 0, unusedDirectives: [] });

  it('returns reports in input order', () => {
    const collector = new FindingsCollector();
    collector.add(2, report('c'));
    collector.add(0, report('a'));
    collector.add(1, report('b'));

    expect(collector.getReports().map(r => r.file)).toEqual(['a', 'b', 'c']);
    expect(collector.size).toBe(3);
  });

  it('accepts each input once', () => {
    const collector = new FindingsCollector();
    collector.add(0, report('a'));

    expect(() => collector.add(0, report('a'))).toThrow('Results for input #0 (a) were already collected');
  });
});

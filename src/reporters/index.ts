/**
 * Reporters Module - extra summary reports selected with `--reports`
 */

import { ConfigError } from '../errors.js';
import type { FileFinding } from '../types.js';
import { generateRulesByIdReport } from './rules-by-id.js';
import { generateRulesBySeverityReport } from './rules-by-severity.js';

export interface ReportDefinition {
  description: string;
  generate(findings: readonly FileFinding[]): string;
}

export const REPORTS: Readonly<Record<string, ReportDefinition>> = {
  rules_by_id: {
    description: 'Number of findings per rule id',
    generate: generateRulesByIdReport,
  },
  rules_by_error_type: {
    description: 'Number of findings per severity',
    generate: generateRulesBySeverityReport,
  },
};

/**
 * Runs the named reports in the order given; `all` selects every report
 *
 * @throws ConfigError for an unknown report name
 */
export function generateReports(names: readonly string[], findings: readonly FileFinding[]): string[] {
  const selected = names.includes('all') ? Object.keys(REPORTS) : [...new Set(names)];
  return selected.map(name => {
    const report = Object.hasOwn(REPORTS, name) ? REPORTS[name] : undefined;
    if (!report) {
      throw new ConfigError(`Unknown report "${name}"; available: ${Object.keys(REPORTS).join(', ')}, all`);
    }
    return report.generate(findings);
  });
}

export { countByRuleId, generateRulesByIdReport, type RuleCount } from './rules-by-id.js';
export { generateRulesBySeverityReport } from './rules-by-severity.js';

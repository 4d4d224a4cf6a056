/**
 * rules_by_error_type - number of findings per severity
 */

import type { FileFinding } from '../types.js';

export function generateRulesBySeverityReport(findings: readonly FileFinding[]): string {
  if (findings.length === 0) {
    return 'Found 0 issues';
  }
  const errors = findings.filter(f => f.severity === 'error').length;
  const warnings = findings.length - errors;
  return `Found ${findings.length} issues: ${errors} error(s), ${warnings} warning(s).`;
}

/**
 * rules_by_id - number of findings per rule id
 */

import type { FileFinding } from '../types.js';

export interface RuleCount {
  ruleId: string;
  count: number;
}

/**
 * Counts per rule id, most frequent first, ties by id
 */
export function countByRuleId(findings: readonly FileFinding[]): RuleCount[] {
  const counts = new Map<string, number>();
  for (const finding of findings) {
    counts.set(finding.ruleId, (counts.get(finding.ruleId) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([ruleId, count]) => ({ ruleId, count }))
    .sort((a, b) => b.count - a.count || a.ruleId.localeCompare(b.ruleId));
}

export function generateRulesByIdReport(findings: readonly FileFinding[]): string {
  const counts = countByRuleId(findings);
  if (counts.length === 0) {
    return 'Issues by ids:\nNo issues found';
  }
  const width = Math.max(...counts.map(c => c.ruleId.length));
  return ['Issues by ids:', ...counts.map(c => `${c.ruleId.padEnd(width)} : ${c.count}`)].join('\n');
}

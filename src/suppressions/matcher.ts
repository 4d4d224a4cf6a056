/**
 * Suppression Matcher
 *
 * Checks findings against the side table and records which directive ids
 * were used, so unused ones can be reported afterwards.
 */

import type { Finding } from '../types.js';
import { ALL_RULES, type Directive, type DisabledBlock, type SuppressionCheckResult, type SuppressionTable } from './types.js';

/**
 * Tracks directive usage for one evaluation; the table stays untouched
 */
export class SuppressionMatcher {
  private readonly table: SuppressionTable;
  private readonly used = new Set<string>();
  private suppressedCount = 0;

  constructor(table: SuppressionTable) {
    this.table = table;
  }

  /**
   * Check if a finding is suppressed. Internal rule errors, parse failures
   * and unused-directive reports are never suppressed.
   */
  check(finding: Finding): SuppressionCheckResult {
    if (finding.kind !== 'Rule' && finding.kind !== 'StructuralWarning') {
      return { suppressed: false };
    }

    const blocks = this.coveringBlocks(finding);
    const result = this.matchNode(finding) ?? this.matchBlock(blocks) ?? { suppressed: false };
    if (result.suppressed) {
      this.suppressedCount++;
      if (result.directive && result.matchedId) {
        this.used.add(usageKey(result.directive, result.matchedId));
      }
      // Every covering block counts as used
      blocks.forEach(block => this.used.add(usageKey(block.directive, block.ruleId)));
    }
    return result;
  }

  /**
   * Was this id of this directive used by any check so far?
   */
  wasUsed(directive: Directive, ruleId: string): boolean {
    return this.used.has(usageKey(directive, ruleId));
  }

  getSuppressedCount(): number {
    return this.suppressedCount;
  }

  private matchNode(finding: Finding): SuppressionCheckResult | undefined {
    const ids = this.table.byNode.get(finding.subject.id);
    if (!ids) {
      return undefined;
    }

    const matchedId = ids.has(finding.ruleId) ? finding.ruleId : ids.has(ALL_RULES) ? ALL_RULES : undefined;
    if (!matchedId) {
      return undefined;
    }

    // Header and declaration rows may repeat the same id; all of them count as used
    const matching = this.table.directives.filter(
      d =>
        d.action === 'disable' &&
        d.scope.type === 'node' &&
        d.scope.subject.id === finding.subject.id &&
        d.ruleIds.includes(matchedId)
    );
    matching.forEach(d => this.used.add(usageKey(d, matchedId)));
    return { suppressed: true, directive: matching[0], matchedId };
  }

  private coveringBlocks(finding: Finding): DisabledBlock[] {
    const line = finding.position.line;
    return this.table.blocks.filter(
      b => (b.ruleId === finding.ruleId || b.ruleId === ALL_RULES) && b.startLine <= line && line <= b.endLine
    );
  }

  private matchBlock(blocks: readonly DisabledBlock[]): SuppressionCheckResult | undefined {
    const [block] = blocks;
    if (!block) {
      return undefined;
    }
    return { suppressed: true, directive: block.directive, matchedId: block.ruleId };
  }
}

function usageKey(directive: Directive, ruleId: string): string {
  return `${directive.position.line}:${directive.position.column}:${ruleId}`;
}

/**
 * Rule Engine - runs enabled rules over a suite tree
 *
 * Every rule sees the whole tree; a hook that throws produces an
 * InternalRuleError finding for the node being visited and the walk goes on.
 * Findings are ordered by line, then column, then rule registration order,
 * and suppressed findings are dropped before the list is returned.
 */

import { RuleEvaluationError } from '../errors.js';
import { logger } from '../logger.js';
import { SuppressionMatcher, detectUnusedDirectives, toUnusedDirectiveFindings } from '../suppressions/index.js';
import type { SuppressionTable, UnusedDirective } from '../suppressions/index.js';
import type { Finding, LintConfig, NodeRef, ParseResult, SourcePosition } from '../types.js';
import type { RuleRegistry } from './registry.js';
import type { ResolvedRuleConfig, Rule, RuleContext } from './types.js';

export interface EvaluationResult {
  findings: Finding[];
  /** Findings dropped by directives */
  suppressedCount: number;
  unusedDirectives: UnusedDirective[];
}

export class RuleEngine {
  private readonly registry: RuleRegistry;
  private readonly enabledRules: ReadonlySet<string>;
  private readonly ruleConfigs = new Map<string, ResolvedRuleConfig>();
  private readonly reportUnusedDirectives: boolean;

  /**
   * Resolves and validates configuration once; the engine can then evaluate
   * any number of trees.
   *
   * @throws ConfigError when the configuration names unknown rules or options
   */
  constructor(registry: RuleRegistry, config: LintConfig = {}) {
    this.registry = registry;
    this.enabledRules = registry.resolveEnabled(config);
    this.reportUnusedDirectives = config.reportUnusedDirectives ?? false;

    for (const rule of registry.list()) {
      this.ruleConfigs.set(rule.id, registry.resolveConfig(rule.id, config.rules?.[rule.id]));
    }
    for (const ruleId of Object.keys(config.rules ?? {})) {
      // Surfaces options for unregistered rules as configuration errors
      if (!registry.has(ruleId)) {
        registry.resolveConfig(ruleId);
      }
    }
  }

  getEnabledRules(): ReadonlySet<string> {
    return this.enabledRules;
  }

  /**
   * Evaluates the enabled rules (or an explicit subset) over one parsed file
   */
  evaluate(
    parsed: ParseResult,
    suppressions: SuppressionTable,
    enabledRules: ReadonlySet<string> = this.enabledRules
  ): EvaluationResult {
    const collected: Array<{ finding: Finding; order: number }> = [];

    for (const rule of this.registry.list()) {
      if (!enabledRules.has(rule.id)) {
        continue;
      }
      const order = this.registry.order(rule.id);
      for (const finding of this.runRule(rule, parsed)) {
        collected.push({ finding, order });
      }
    }

    const matcher = new SuppressionMatcher(suppressions);
    const kept = sortFindings(collected).filter(finding => !matcher.check(finding).suppressed);

    const unusedDirectives = detectUnusedDirectives(suppressions, matcher, enabledRules);
    const findings = this.reportUnusedDirectives
      ? sortFindings([
          ...kept.map(finding => ({ finding, order: this.registry.order(finding.ruleId) })),
          ...toUnusedDirectiveFindings(unusedDirectives).map(finding => ({ finding, order: Number.MAX_SAFE_INTEGER })),
        ])
      : kept;

    return {
      findings,
      suppressedCount: matcher.getSuppressedCount(),
      unusedDirectives,
    };
  }

  /**
   * Walks the tree for one rule and returns what it reported
   */
  private runRule(rule: Rule, parsed: ParseResult): Finding[] {
    const { tree, diagnostics } = parsed;
    const config = this.ruleConfigs.get(rule.id) ?? { severity: rule.defaultSeverity, options: {} };
    const findings: Finding[] = [];

    const context: RuleContext = {
      tree,
      diagnostics,
      options: config.options,
      report(report) {
        findings.push({
          ruleId: rule.id,
          severity: config.severity,
          position: report.position,
          message: report.message,
          subject: { id: report.subject.id, kind: report.subject.kind },
          kind: report.kind ?? 'Rule',
        });
      },
    };

    const guard = (subject: NodeRef, position: SourcePosition, visit: () => void): void => {
      try {
        visit();
      } catch (error) {
        const failure = new RuleEvaluationError(rule.id, error);
        logger.debug(failure.stack ?? failure.message);
        findings.push({
          ruleId: rule.id,
          severity: 'error',
          position,
          message: failure.message,
          subject: { id: subject.id, kind: subject.kind },
          kind: 'InternalRuleError',
        });
      }
    };

    const { visitSuite, visitSection, visitTestCase, visitKeyword, visitStatement } = rule;

    if (visitSuite) {
      guard(tree, { line: 1, column: 1 }, () => visitSuite.call(rule, tree, context));
    }

    for (const section of tree.sections) {
      if (visitSection) {
        guard(section, section.position, () => visitSection.call(rule, section, context));
      }

      if (section.sectionKind !== 'TestCases' && section.sectionKind !== 'Keywords') {
        continue;
      }

      for (const block of section.children) {
        if (block.kind === 'TestCase' && visitTestCase) {
          guard(block, block.position, () => visitTestCase.call(rule, block, context));
        }
        if (block.kind === 'Keyword' && visitKeyword) {
          guard(block, block.position, () => visitKeyword.call(rule, block, context));
        }
        if (visitStatement) {
          for (const statement of block.statements) {
            guard(statement, statement.position, () => visitStatement.call(rule, statement, block, context));
          }
        }
      }
    }

    return findings;
  }
}

/**
 * Stable ordering by line, column, then rule order
 */
function sortFindings(entries: Array<{ finding: Finding; order: number }>): Finding[] {
  return [...entries]
    .sort(
      (a, b) =>
        a.finding.position.line - b.finding.position.line ||
        a.finding.position.column - b.finding.position.column ||
        a.order - b.order
    )
    .map(entry => entry.finding);
}

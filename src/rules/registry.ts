/**
 * Rule Registry - open set of rules keyed by id
 */

import { ConfigError, DuplicateRuleError } from '../errors.js';
import type { LintConfig, Severity } from '../types.js';
import { compileSchema, type SchemaValidator } from '../validation.js';
import type { ResolvedRuleConfig, Rule } from './types.js';

/** Ids with a meaning of their own in directives and reports */
const RESERVED_IDS = new Set(['all', 'parse-error', 'unused-directive']);

const SEVERITIES: readonly Severity[] = ['error', 'warning'];

export class RuleRegistry {
  private readonly rules = new Map<string, Rule>();
  private readonly validators = new Map<string, SchemaValidator<Record<string, unknown>>>();

  /**
   * Registers a rule. Rule order is registration order and breaks ties when
   * findings share a position.
   *
   * @throws DuplicateRuleError when the id is taken
   */
  register(rule: Rule): this {
    if (this.rules.has(rule.id) || RESERVED_IDS.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    this.rules.set(rule.id, rule);
    return this;
  }

  get(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  list(): Rule[] {
    return [...this.rules.values()];
  }

  /**
   * Position of the rule in registration order, -1 when unknown
   */
  order(id: string): number {
    return [...this.rules.keys()].indexOf(id);
  }

  /**
   * Resolves the enabled rule set: `include` narrows to the listed rules,
   * `excludeRules` removes rules, otherwise each rule's default applies.
   *
   * @throws ConfigError naming an unknown rule id
   */
  resolveEnabled(config: LintConfig = {}): Set<string> {
    for (const id of [...(config.include ?? []), ...(config.excludeRules ?? [])]) {
      if (!this.rules.has(id)) {
        throw new ConfigError(`Unknown rule "${id}"`);
      }
    }

    const include = config.include && config.include.length > 0 ? new Set(config.include) : undefined;
    const exclude = new Set(config.excludeRules ?? []);

    const enabled = new Set<string>();
    for (const rule of this.rules.values()) {
      const selected = include ? include.has(rule.id) : rule.enabledByDefault;
      if (selected && !exclude.has(rule.id)) {
        enabled.add(rule.id);
      }
    }
    return enabled;
  }

  /**
   * Validates raw configuration for one rule and applies schema defaults
   *
   * @throws ConfigError for an unknown rule, a bad severity or invalid options
   */
  resolveConfig(ruleId: string, raw: Record<string, unknown> = {}): ResolvedRuleConfig {
    const rule = this.rules.get(ruleId);
    if (!rule) {
      throw new ConfigError(`Unknown rule "${ruleId}"`);
    }

    const { severity: rawSeverity, ...rest } = raw;
    const severity = rawSeverity === undefined ? rule.defaultSeverity : parseSeverity(ruleId, rawSeverity);

    const options: Record<string, unknown> = { ...rest };
    if (!rule.optionsSchema) {
      const [unknownOption] = Object.keys(options);
      if (unknownOption !== undefined) {
        throw new ConfigError(`Rule "${ruleId}" has no option "${unknownOption}"`);
      }
      return { severity, options };
    }

    const validator = this.validatorFor(rule);
    if (!validator.isValid(options)) {
      throw new ConfigError(`Invalid options for rule "${ruleId}": ${validator.errors().join('; ')}`);
    }

    const problem = rule.checkOptions?.(options);
    if (problem) {
      throw new ConfigError(`Invalid options for rule "${ruleId}": ${problem}`);
    }

    return { severity, options };
  }

  private validatorFor(rule: Rule): SchemaValidator<Record<string, unknown>> {
    let validator = this.validators.get(rule.id);
    if (!validator) {
      validator = compileSchema<Record<string, unknown>>(rule.optionsSchema ?? {}, {
        coerceTypes: true,
        useDefaults: true,
      });
      this.validators.set(rule.id, validator);
    }
    return validator;
  }
}

function parseSeverity(ruleId: string, value: unknown): Severity {
  const normalized = typeof value === 'string' ? value.toLowerCase() : value;
  const severity = SEVERITIES.find(s => s === normalized);
  if (!severity) {
    throw new ConfigError(`Invalid severity for rule "${ruleId}": expected one of ${SEVERITIES.join(', ')}`);
  }
  return severity;
}

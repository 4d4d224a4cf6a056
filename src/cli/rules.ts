/**
 * CLI Commands for Rule Inspection
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createDefaultRegistry, type Rule, type RuleRegistry } from '../rules/index.js';
import { generateDirectiveComment } from '../suppressions/index.js';

/**
 * Create rules subcommand
 */
export function createRulesCommand(): Command {
  const rules = new Command('rules');

  rules
    .description('List and describe the available rules')
    .addCommand(createListCommand())
    .addCommand(createShowCommand());

  return rules;
}

function createListCommand(): Command {
  const list = new Command('list');

  list
    .description('List all rules')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const registry = createDefaultRegistry();
      if (options.json) {
        console.log(JSON.stringify(registry.list().map(describeRule), null, 2));
        return;
      }
      printRuleList(registry);
    });

  return list;
}

function createShowCommand(): Command {
  const show = new Command('show');

  show
    .description('Show details for one rule')
    .argument('<id>', 'Rule id')
    .action((id: string) => {
      const rule = createDefaultRegistry().get(id.toLowerCase());
      if (!rule) {
        console.error(chalk.red(`Error: Unknown rule "${id}"`));
        process.exitCode = 1;
        return;
      }
      formatRuleDetails(rule).forEach(line => console.log(line));
    });

  return show;
}

export interface RuleDescription {
  id: string;
  description: string;
  severity: string;
  enabledByDefault: boolean;
  options: Array<{ name: string; type?: string; default?: unknown }>;
}

export function describeRule(rule: Rule): RuleDescription {
  return {
    id: rule.id,
    description: rule.description,
    severity: rule.defaultSeverity,
    enabledByDefault: rule.enabledByDefault,
    options: ruleOptions(rule),
  };
}

function ruleOptions(rule: Rule): RuleDescription['options'] {
  const properties: unknown = rule.optionsSchema?.properties;
  if (!isRecord(properties)) {
    return [];
  }
  return Object.entries(properties).map(([name, schema]) => ({
    name,
    type: isRecord(schema) && typeof schema.type === 'string' ? schema.type : undefined,
    default: isRecord(schema) ? schema.default : undefined,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One line per rule: id, default severity, default state, description
 */
export function formatRuleList(registry: RuleRegistry): string[] {
  const rules = registry.list();
  const width = Math.max(0, ...rules.map(rule => rule.id.length));
  return rules.map(rule => {
    const state = rule.enabledByDefault ? 'enabled' : 'disabled';
    return `${rule.id.padEnd(width)}  ${rule.defaultSeverity.padEnd(7)}  ${state.padEnd(8)}  ${rule.description}`;
  });
}

export function printRuleList(registry: RuleRegistry): void {
  console.log(chalk.bold(`\nRules (${registry.list().length}):\n`));
  formatRuleList(registry).forEach(line => console.log(`  ${line}`));
  console.log('');
}

export function formatRuleDetails(rule: Rule): string[] {
  const details = describeRule(rule);
  const lines = [
    `${details.id}`,
    `  ${details.description}`,
    `  Default severity: ${details.severity}`,
    `  Enabled by default: ${details.enabledByDefault ? 'yes' : 'no'}`,
  ];

  if (details.options.length > 0) {
    lines.push('  Options:');
    for (const option of details.options) {
      const type = option.type ? ` (${option.type})` : '';
      const defaultValue = option.default === undefined ? '' : ` default: ${JSON.stringify(option.default)}`;
      lines.push(`    ${option.name}${type}${defaultValue}`);
    }
  }

  lines.push(`  Disable inline: ${generateDirectiveComment([rule.id])}`);
  return lines;
}

/**
 * Rule contract
 *
 * A rule is a side-effect-free visitor over one suite tree. The engine calls
 * whichever hooks the rule defines, in file order, and collects what the rule
 * reports through its context.
 */

import type {
  FindingKind,
  KeywordNode,
  NodeRef,
  ParseDiagnostic,
  RuleOptions,
  SectionNode,
  Severity,
  SourcePosition,
  StatementNode,
  SuiteTree,
  TestCaseNode,
  BlockNode,
} from '../types.js';
import type { SchemaObject } from 'ajv/dist/2020.js';

/**
 * What a rule hands to `context.report`
 */
export interface RuleReport {
  subject: NodeRef;
  position: SourcePosition;
  message: string;
  /** Defaults to `Rule` */
  kind?: Extract<FindingKind, 'Rule' | 'StructuralWarning'>;
}

export interface RuleContext {
  readonly tree: SuiteTree;
  readonly diagnostics: readonly ParseDiagnostic[];
  /** Validated options, schema defaults applied */
  readonly options: RuleOptions;
  report(report: RuleReport): void;
}

export interface Rule {
  /** Unique id used by configuration and inline directives */
  readonly id: string;
  readonly description: string;
  readonly defaultSeverity: Severity;
  readonly enabledByDefault: boolean;

  /**
   * JSON Schema (object) for rule options, `severity` excluded. Values set
   * with `--configure` arrive as strings and are coerced against it.
   */
  readonly optionsSchema?: SchemaObject;

  /** Checks that the schema cannot express; returns an error message */
  checkOptions?(options: RuleOptions): string | undefined;

  visitSuite?(tree: SuiteTree, context: RuleContext): void;
  visitSection?(section: SectionNode, context: RuleContext): void;
  visitTestCase?(testCase: TestCaseNode, context: RuleContext): void;
  visitKeyword?(keyword: KeywordNode, context: RuleContext): void;
  visitStatement?(statement: StatementNode, owner: BlockNode, context: RuleContext): void;
}

/**
 * Severity and options of a rule after configuration
 */
export interface ResolvedRuleConfig {
  severity: Severity;
  options: RuleOptions;
}

/**
 * Core type definitions for suite linting
 */

export type Severity = 'error' | 'warning';

/**
 * 1-based line and column of a token, node or finding
 */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

export type TokenKind = 'Cell' | 'Continuation' | 'Blank';

export interface Token {
  readonly text: string;
  readonly position: SourcePosition;
  readonly kind: TokenKind;
}

/**
 * Comment text attached to a line. `standalone` comments occupy a line of
 * their own, `trailing` comments follow the last data cell.
 */
export interface Comment {
  readonly text: string;
  readonly position: SourcePosition;
  readonly placement: 'trailing' | 'standalone';
}

/**
 * A tokenized source line
 */
export interface Line {
  readonly position: SourcePosition;
  /** Leading separator present (body line) */
  readonly indented: boolean;
  /** No data cells and no comment */
  readonly blank: boolean;
  /** Data cells only; a `...` marker appears as a leading Continuation token */
  readonly cells: readonly Token[];
  readonly trailingComment?: Comment;
}

export type SectionKind = 'Settings' | 'Variables' | 'Keywords' | 'TestCases' | 'Comments';

export type SubjectKind =
  | 'File'
  | 'Section'
  | 'Setting'
  | 'Variable'
  | 'TestCase'
  | 'Keyword'
  | 'Statement';

/**
 * Identity of a tree node, used as the key for suppressions and findings
 */
export interface NodeRef {
  readonly id: number;
  readonly kind: SubjectKind;
}

export interface StatementNode extends NodeRef {
  readonly kind: 'Statement';
  /** Keyword-call name, or the bracketed setting marker such as `[Tags]` */
  readonly name: string;
  readonly args: readonly string[];
  /** Bracketed setting like `[Tags]` or `[Setup]` */
  readonly setting: boolean;
  readonly position: SourcePosition;
  /** Trailing comments of the statement row and its `...` continuations */
  readonly trailingComments: readonly Comment[];
  /** Standalone comments that precede this statement */
  readonly comments: readonly Comment[];
}

export interface ArgumentSpec {
  readonly name: string;
  readonly defaultValue?: string;
}

interface BlockNodeBase extends NodeRef {
  /** Name as typed, trimmed, punctuation preserved */
  readonly name: string;
  readonly documentation?: string;
  readonly statements: readonly StatementNode[];
  readonly position: SourcePosition;
  /** Trailing comments of the header, `[Documentation]` and `[Arguments]` rows */
  readonly declarationComments: readonly Comment[];
  /** Standalone comments with no following statement in this node */
  readonly comments: readonly Comment[];
}

export interface TestCaseNode extends BlockNodeBase {
  readonly kind: 'TestCase';
}

export interface KeywordNode extends BlockNodeBase {
  readonly kind: 'Keyword';
  readonly arguments: readonly ArgumentSpec[];
}

export type BlockNode = TestCaseNode | KeywordNode;

export interface SettingNode extends NodeRef {
  readonly kind: 'Setting';
  readonly name: string;
  readonly values: readonly string[];
  /** Library, Resource and Variables imports */
  readonly import: boolean;
  readonly position: SourcePosition;
  readonly trailingComments: readonly Comment[];
  readonly comments: readonly Comment[];
}

export interface VariableNode extends NodeRef {
  readonly kind: 'Variable';
  readonly name: string;
  readonly values: readonly string[];
  readonly position: SourcePosition;
  readonly trailingComments: readonly Comment[];
  readonly comments: readonly Comment[];
}

interface SectionBase extends NodeRef {
  readonly kind: 'Section';
  /** Header text as typed, e.g. `*** Test Cases ***` */
  readonly header: string;
  readonly position: SourcePosition;
  readonly headerComment?: Comment;
  /** Standalone comments not attached to any child */
  readonly comments: readonly Comment[];
}

export interface SettingsSection extends SectionBase {
  readonly sectionKind: 'Settings';
  readonly children: readonly SettingNode[];
}

export interface VariablesSection extends SectionBase {
  readonly sectionKind: 'Variables';
  readonly children: readonly VariableNode[];
}

export interface TestCasesSection extends SectionBase {
  readonly sectionKind: 'TestCases';
  readonly children: readonly TestCaseNode[];
}

export interface KeywordsSection extends SectionBase {
  readonly sectionKind: 'Keywords';
  readonly children: readonly KeywordNode[];
}

export interface CommentsSection extends SectionBase {
  readonly sectionKind: 'Comments';
  readonly children: readonly never[];
}

export type SectionNode =
  | SettingsSection
  | VariablesSection
  | TestCasesSection
  | KeywordsSection
  | CommentsSection;

export type DiagnosticCode =
  | 'StatementOutsideSection'
  | 'UnknownSection'
  | 'OrphanedStatement'
  | 'OrphanedContinuation'
  | 'DuplicateDocumentation'
  | 'DuplicateArguments'
  | 'EmptyName';

/**
 * Non-fatal parser diagnostic. `subject` is the node the diagnostic is about,
 * when there is one.
 */
export interface ParseDiagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly position: SourcePosition;
  readonly subject?: NodeRef;
}

/**
 * Root of the parsed file. Immutable once returned by the parser.
 */
export interface SuiteTree extends NodeRef {
  readonly kind: 'File';
  readonly sections: readonly SectionNode[];
  /** Comments found before the first section header */
  readonly comments: readonly Comment[];
}

export interface ParseResult {
  readonly tree: SuiteTree;
  readonly diagnostics: readonly ParseDiagnostic[];
}

export type FindingKind = 'Rule' | 'StructuralWarning' | 'InternalRuleError' | 'ParseFailure' | 'UnusedDirective';

/**
 * A defect reported for a single file
 */
export interface Finding {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly position: SourcePosition;
  readonly message: string;
  readonly subject: NodeRef;
  readonly kind: FindingKind;
}

/**
 * A finding qualified by the file it came from, as handed to reporters
 */
export interface FileFinding extends Finding {
  readonly file: string;
}

/**
 * Per-rule configuration values (`severity` plus rule-specific options)
 */
export type RuleOptions = Readonly<Record<string, unknown>>;

/**
 * Configuration consumed by the engine
 */
export interface LintConfig {
  /** Only these rules, when given */
  include?: string[];
  /** Rules removed from the enabled set */
  excludeRules?: string[];
  rules?: Record<string, Record<string, unknown>>;
  reportUnusedDirectives?: boolean;
}

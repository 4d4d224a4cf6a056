/**
 * Suppression System Types
 *
 * Directives are read from comments once per parsed file and kept in a side
 * table; the suite tree itself is never modified.
 */

import type { NodeRef, SourcePosition } from '../types.js';

/** Pseudo rule id matching every rule */
export const ALL_RULES = 'all';

/**
 * Where a directive applies
 *
 * - `node`: findings whose subject is exactly this node
 * - `block`: findings on lines inside a disabled range
 */
export type DirectiveScope =
  | { type: 'node'; subject: NodeRef }
  | { type: 'block' };

/**
 * A single `roblint: disable=...` or `roblint: enable=...` occurrence
 */
export interface Directive {
  action: 'disable' | 'enable';

  /** Rule ids as written, lower-cased; `all` when none were given */
  ruleIds: string[];

  /** Position of the comment holding the directive */
  position: SourcePosition;

  scope: DirectiveScope;

  /** Full comment text */
  originalComment: string;
}

/**
 * Line range disabled for one rule id by standalone directives
 */
export interface DisabledBlock {
  ruleId: string;
  startLine: number;
  /** Inclusive; open blocks run to the end of the file */
  endLine: number;
  directive: Directive;
}

/**
 * Side table consulted by the engine
 */
export interface SuppressionTable {
  /** Node id -> rule ids disabled for that node */
  readonly byNode: ReadonlyMap<number, ReadonlySet<string>>;
  readonly blocks: readonly DisabledBlock[];
  readonly directives: readonly Directive[];
}

/**
 * Result of checking whether a finding is suppressed
 */
export interface SuppressionCheckResult {
  suppressed: boolean;

  /** The directive that matched (if any) */
  directive?: Directive;

  /** Rule id entry of the directive that matched, `all` included */
  matchedId?: string;
}

/**
 * A directive rule id that suppressed nothing in this run
 */
export interface UnusedDirective {
  directive: Directive;
  ruleId: string;
}

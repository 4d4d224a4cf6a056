/**
 * Error taxonomy
 */

import type { SourcePosition } from './types.js';

export class RoblintError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Text that cannot be decoded or re-encoded as UTF-8. Fatal for one file only.
 */
export class TokenizeError extends RoblintError {
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super(`${message} (line ${position.line}, column ${position.column})`);
    this.position = position;
  }
}

export class ConfigError extends RoblintError {}

export class DuplicateRuleError extends RoblintError {
  readonly ruleId: string;

  constructor(ruleId: string) {
    super(`Rule "${ruleId}" is already registered`);
    this.ruleId = ruleId;
  }
}

/**
 * Wraps whatever a rule hook threw. The engine turns it into an
 * InternalRuleError finding instead of propagating it.
 */
export class RuleEvaluationError extends RoblintError {
  readonly ruleId: string;

  constructor(ruleId: string, cause: unknown) {
    super(`Rule "${ruleId}" failed: ${describeError(cause)}`, { cause });
    this.ruleId = ruleId;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Suppression System
 *
 * Public API for inline `roblint:` directives.
 */

// Types
export * from './types.js';

// Directive parsing
export { parseDirectives, generateDirectiveComment } from './parser.js';

// Side table construction
export { resolveSuppressions } from './resolver.js';

// Suppression checking
export { SuppressionMatcher } from './matcher.js';

// Unused directive detection
export {
  UNUSED_DIRECTIVE_ID,
  detectUnusedDirectives,
  toUnusedDirectiveFindings
} from './unused-detector.js';

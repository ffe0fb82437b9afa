/**
 * arith-rewrites - Width-aware rewrite rules for hardware datapath equivalence
 *
 * Rules carry explicit bit-widths and signs on every arithmetic operand,
 * are checked for width consistency when defined, and fire only when their
 * side conditions hold for the widths found in the e-graph.
 */

// Rules
export { ArithRule, rule, when } from './arith/Rule.js';
export type { RuleCondition, WidthLookup } from './arith/Rule.js';
export { createRewrites, findRule } from './arith/Rewrites.js';
export { checkWidthConsistency } from './arith/Consistency.js';
export { extractAssignment } from './arith/Assignment.js';
export type { Assignment, Match } from './arith/Assignment.js';
export { toSolverRules, toSolverRuleSet } from './arith/Export.js';
export { formatRule, formatMatch, formatMatches } from './arith/Report.js';

// Width arithmetic
export {
  addNoOverflow,
  mulNoOverflow,
  shiftNoOverflow,
  maxPlus1,
  widthOfLeftShift,
  SIGNED,
  UNSIGNED
} from './arith/Width.js';

// Errors
export {
  PatternSyntaxError,
  WidthConsistencyError,
  RuleDefinitionError,
  ConstantConflictError
} from './Errors.js';

// Solver
export * from './egraph/index.js';

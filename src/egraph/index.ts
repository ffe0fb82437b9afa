/**
 * E-Graph Module
 *
 * In-process equality saturation over width-annotated bit-vector arithmetic.
 */

// Core e-graph
export { EGraph } from './EGraph.js';
export type { EClass } from './EGraph.js';
export { enodeKey, enodeChildren, enodeWithChildren, ARITH_OPS, OP_SYMBOLS } from './ENode.js';
export type { EClassId, ENode, ArithOp, Sign, BinaryChildren } from './ENode.js';
export type { ArithGraph, SearchMatches } from './Graph.js';

// Pattern matching
export {
  parsePattern,
  parsePatterns,
  matchPattern,
  instantiatePattern,
  patternToString,
  patternsEqual,
  patternVars,
  patternChildren,
  binarySlots
} from './Pattern.js';
export type { Pattern, BinaryPattern, OperandPattern, Substitution } from './Pattern.js';

// Term loading
export { addTerm, addTerms } from './Convert.js';

// Saturation
export { saturate, applyRewriteOnce, provesEquivalent } from './Rewriter.js';
export type {
  Rewrite,
  RewriteCondition,
  SaturationStats,
  SaturationOptions,
  StopReason,
  EquivalenceResult
} from './Rewriter.js';

/**
 * Concrete width values of a match, resolved through constant folding
 */

import type { EClassId } from '../egraph/ENode.js';
import type { ArithGraph } from '../egraph/Graph.js';
import { patternVars } from '../egraph/Pattern.js';
import type { Pattern, Substitution } from '../egraph/Pattern.js';

/**
 * Pattern variable -> known width (or sign) value. Partial: variables whose
 * e-class has no known constant are absent.
 */
export type Assignment = Map<string, number>;

/**
 * Diagnostic record for one left-hand-side match
 */
export interface Match {
  eclass: EClassId;
  assign: Assignment;
  conditionResult: boolean;
}

/**
 * Resolve every variable of `pattern` bound by `subst` to its constant,
 * in order of first appearance in the pattern
 */
export function extractAssignment(
  graph: ArithGraph,
  subst: Substitution,
  pattern: Pattern
): Assignment {
  const assign: Assignment = new Map();
  for (const name of patternVars(pattern)) {
    const id = subst.get(name);
    if (id === undefined) continue;
    const value = graph.constantOf(id);
    if (value !== undefined) {
      assign.set(name, value);
    }
  }
  return assign;
}

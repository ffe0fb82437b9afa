/**
 * Loading ground terms (patterns without variables) into the e-graph
 */

import type { EGraph } from './EGraph.js';
import type { EClassId } from './ENode.js';
import { parsePattern, parsePatterns, patternVars, instantiatePattern } from './Pattern.js';
import type { Pattern } from './Pattern.js';

/**
 * Add a ground term to the e-graph, returning its e-class ID
 *
 * @example
 * addTerm(egraph, '(+ 17 16 unsign A 16 unsign B)');
 */
export function addTerm(egraph: EGraph, term: Pattern | string): EClassId {
  const pattern = typeof term === 'string' ? parsePattern(term) : term;
  const vars = patternVars(pattern);
  if (vars.length > 0) {
    throw new Error(`Term must not contain pattern variables: ${vars.map(v => `?${v}`).join(', ')}`);
  }
  return instantiatePattern(egraph, pattern, new Map());
}

/**
 * Add every term of a whitespace-separated source text, in order
 */
export function addTerms(egraph: EGraph, source: string): EClassId[] {
  return parsePatterns(source).map(term => addTerm(egraph, term));
}

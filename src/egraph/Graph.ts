/**
 * The two capabilities the rule engine needs from an equality-saturation
 * graph. Anything that can search patterns and resolve width constants can
 * host the rewrite rules; `EGraph` is the in-process implementation.
 */

import type { EClassId } from './ENode.js';
import type { Pattern, Substitution } from './Pattern.js';

/**
 * All substitutions under which a pattern matches one e-class
 */
export interface SearchMatches {
  eclass: EClassId;
  substs: Substitution[];
}

export interface ArithGraph {
  /** Non-mutating search for every instance of `pattern` */
  search(pattern: Pattern): SearchMatches[];

  /**
   * Known constant width (or sign, as UNSIGNED/SIGNED) of an e-class,
   * undefined when the analysis cannot derive one
   */
  constantOf(id: EClassId): number | undefined;
}

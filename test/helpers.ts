/**
 * Shared lookups for rule and solver tests
 */

import { createRewrites, findRule } from '../src/arith/Rewrites.js';
import { toSolverRules, toSolverRuleSet } from '../src/arith/Export.js';
import type { ArithRule } from '../src/arith/Rule.js';
import type { Rewrite } from '../src/egraph/Rewriter.js';

const catalog = createRewrites();

/**
 * Catalog rule by name; throws so a typo fails the test loudly
 */
export function getRule(name: string): ArithRule {
  const found = findRule(catalog, name);
  if (!found) {
    throw new Error(`No rule named ${name}`);
  }
  return found;
}

/**
 * The solver rewrite exported for one catalog rule
 */
export function getRewrite(name: string): Rewrite {
  const [rewrite] = toSolverRules(getRule(name));
  return rewrite;
}

/**
 * Every catalog rule in solver format
 */
export function catalogRewrites(): Rewrite[] {
  return toSolverRuleSet(catalog);
}

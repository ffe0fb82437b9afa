/**
 * Export of width-aware rules to the saturation engine's rewrite format
 */

import type { Rewrite } from '../egraph/Rewriter.js';
import type { ArithRule } from './Rule.js';

/**
 * Convert a rule into solver rewrites. A conditional rule gets a guard that
 * resolves its condition variables to constant widths; a variable without a
 * known constant fails the match.
 */
export function toSolverRules(rule: ArithRule): Rewrite[] {
  const [searcher, applier] = rule.patterns();
  const { condition } = rule;

  if (!condition) {
    return [{ name: rule.name, searcher, applier }];
  }

  return [{
    name: rule.name,
    searcher,
    applier,
    condition: (graph, _eclass, subst) => {
      const values: number[] = [];
      for (const name of condition.vars) {
        const id = subst.get(name);
        const value = id === undefined ? undefined : graph.constantOf(id);
        if (value === undefined) {
          return false;
        }
        values.push(value);
      }
      return rule.evaluate(values);
    }
  }];
}

/**
 * All rules in solver format, in catalog order
 */
export function toSolverRuleSet(rules: readonly ArithRule[]): Rewrite[] {
  return rules.flatMap(r => toSolverRules(r));
}

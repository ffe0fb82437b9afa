/**
 * Width-Aware Rewrite Rules
 *
 * We use our own rule type instead of bare solver rewrites so that rules can
 * be introspected: their conditions can be evaluated on concrete widths and
 * their matches inspected when a rule does not fire as expected.
 */

import { parsePattern, patternChildren, patternVars } from '../egraph/Pattern.js';
import type { Pattern } from '../egraph/Pattern.js';
import type { ArithGraph } from '../egraph/Graph.js';
import { checkWidthConsistency } from './Consistency.js';
import { extractAssignment } from './Assignment.js';
import type { Assignment, Match } from './Assignment.js';
import { RuleDefinitionError } from '../Errors.js';

/**
 * Reads the value bound to a condition variable
 */
export type WidthLookup<V extends string> = (name: V) => number;

/**
 * Side condition of a rule: the variables it reads, in order, and the
 * predicate over their values in that same order
 */
export interface RuleCondition {
  readonly vars: readonly string[];
  readonly check: (values: readonly number[]) => boolean;
}

/**
 * Build a side condition whose predicate reads variables by name
 *
 * @example
 * when(['wo', 'wab'], w => w('wab') >= w('wo'))
 */
export function when<V extends string>(
  vars: readonly V[],
  check: (w: WidthLookup<V>) => boolean
): RuleCondition {
  return Object.freeze({
    vars: Object.freeze([...vars]),
    check: (values: readonly number[]) => check(name => values[vars.indexOf(name)])
  });
}

export class ArithRule {
  private constructor(
    readonly name: string,
    /** most general lhs pattern */
    readonly lhs: Pattern,
    /** rhs pattern with all widths derived from the lhs */
    readonly rhs: Pattern,
    readonly condition: RuleCondition | undefined
  ) {
    Object.freeze(this);
  }

  /**
   * Parse and validate a rule. Malformed patterns, inconsistent widths and
   * variables the lhs does not bind are definition errors and throw.
   */
  static create(name: string, lhs: string, rhs: string, condition?: RuleCondition): ArithRule {
    const lhsPattern = parsePattern(lhs);
    checkWidthConsistency(lhsPattern);
    const rhsPattern = parsePattern(rhs);
    checkWidthConsistency(rhsPattern);

    const bound = new Set(patternVars(lhsPattern));
    const unboundRhs = patternVars(rhsPattern).filter(v => !bound.has(v));
    if (unboundRhs.length > 0) {
      throw new RuleDefinitionError(`rhs uses unbound variables ${unboundRhs.map(v => `?${v}`).join(', ')}`, name);
    }
    const unboundCond = (condition?.vars ?? []).filter(v => !bound.has(v));
    if (unboundCond.length > 0) {
      throw new RuleDefinitionError(`condition reads unbound variables ${unboundCond.map(v => `?${v}`).join(', ')}`, name);
    }

    return new ArithRule(name, freezePattern(lhsPattern), freezePattern(rhsPattern), condition);
  }

  /**
   * Variables the condition reads, in the order `evaluate` expects values
   */
  get conditionVars(): readonly string[] {
    return this.condition?.vars ?? [];
  }

  patterns(): [Pattern, Pattern] {
    return [this.lhs, this.rhs];
  }

  /**
   * Evaluate the condition on values given in `conditionVars` order.
   * Unconditional rules always hold.
   */
  evaluate(values: readonly number[]): boolean {
    return this.condition ? this.condition.check(values) : true;
  }

  /**
   * Evaluate the condition on a (possibly partial) assignment.
   * A condition variable missing from the assignment fails the condition.
   */
  evaluateAssignment(assign: Assignment): boolean {
    const values: number[] = [];
    for (const name of this.conditionVars) {
      const value = assign.get(name);
      if (value === undefined) {
        return false;
      }
      values.push(value);
    }
    return this.evaluate(values);
  }

  /**
   * Find all matches of the left-hand-side and return information about them.
   * Useful when debugging why a rule does not fire where you expect it to.
   * Does not modify the graph.
   */
  findMatches(graph: ArithGraph): Match[] {
    return graph.search(this.lhs).flatMap(({ eclass, substs }) =>
      substs.map(subst => {
        const assign = extractAssignment(graph, subst, this.lhs);
        return { eclass, assign, conditionResult: this.evaluateAssignment(assign) };
      })
    );
  }
}

/**
 * Create a rule from pattern strings
 */
export function rule(name: string, lhs: string, rhs: string, condition?: RuleCondition): ArithRule {
  return ArithRule.create(name, lhs, rhs, condition);
}

function freezePattern(pattern: Pattern): Pattern {
  patternChildren(pattern).forEach(freezePattern);
  if (pattern.tag === 'pbinary') {
    Object.freeze(pattern.a);
    Object.freeze(pattern.b);
  }
  return Object.freeze(pattern);
}

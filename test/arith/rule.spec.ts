import { describe, it, expect } from 'vitest';
import { ArithRule, rule, when } from '../../src/arith/Rule.js';
import { createRewrites } from '../../src/arith/Rewrites.js';
import { extractAssignment } from '../../src/arith/Assignment.js';
import { toSolverRules, toSolverRuleSet } from '../../src/arith/Export.js';
import { EGraph } from '../../src/egraph/EGraph.js';
import { addTerm } from '../../src/egraph/Convert.js';
import { saturate } from '../../src/egraph/Rewriter.js';
import { PatternSyntaxError, RuleDefinitionError } from '../../src/Errors.js';
import { getRule, catalogRewrites } from '../helpers.js';

const SHIFTS = '(<< 17 17 unsign (<< 17 16 unsign A 2 unsign B) 2 unsign C)';

describe('Rule construction', () => {
  it('should keep name and both patterns', () => {
    const r = ArithRule.create('commute-add', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?b)', '(+ ?wo ?wb ?sb ?b ?wa ?sa ?a)');
    const [lhs, rhs] = r.patterns();

    expect(r.name).toBe('commute-add');
    expect(lhs.tag).toBe('pbinary');
    expect(rhs.tag).toBe('pbinary');
    expect(r.conditionVars).toEqual([]);
  });

  it('should reject malformed pattern text', () => {
    expect(() => rule('broken', '(+ ?a)', '?a')).toThrow(PatternSyntaxError);
  });

  it('should reject rhs variables the lhs does not bind', () => {
    expect(() => rule('bad', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?b)', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?c)'))
      .toThrow(RuleDefinitionError);
    expect(() => rule('bad', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?b)', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?c)'))
      .toThrow("Invalid rule 'bad': rhs uses unbound variables ?c");
  });

  it('should reject condition variables the lhs does not bind', () => {
    expect(() => rule(
      'bad-cond',
      '(+ ?wo ?wa ?sa ?a ?wb ?sb ?b)',
      '(+ ?wo ?wb ?sb ?b ?wa ?sa ?a)',
      when(['wz'], w => w('wz') > 0)
    )).toThrow("Invalid rule 'bad-cond': condition reads unbound variables ?wz");
  });

  it('should keep condition variables in the order given', () => {
    expect(getRule('merge-left-shift').conditionVars).toEqual(['wo', 'wab']);
    expect(getRule('unmerge-left-shift').conditionVars).toEqual(['wbc', 'wb', 'wc']);
    expect(getRule('mult-to-add').conditionVars).toEqual(['wb', 'sb', 'wo']);
    expect(getRule('left-shift-mult').conditionVars).toEqual(['wab', 'wa', 'wb', 'wo', 'wc']);
  });

  it('should freeze rules and their patterns', () => {
    const rules = createRewrites();
    const r = getRule('merge-left-shift');
    const [lhs] = r.patterns();

    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(lhs)).toBe(true);
    if (lhs.tag === 'pbinary') {
      expect(Object.isFrozen(lhs.a)).toBe(true);
      expect(Object.isFrozen(lhs.a.expr)).toBe(true);
    }
  });

  it('should build a fresh catalog on every call', () => {
    const first = createRewrites();
    const second = createRewrites();

    expect(first).not.toBe(second);
    expect(first.map(r => r.name)).toEqual([
      'commute-add',
      'commute-mul',
      'merge-left-shift',
      'unmerge-left-shift',
      'mult-to-add',
      'left-shift-mult'
    ]);
  });
});

describe('Condition evaluation', () => {
  it('should read named values in declaration order', () => {
    const cond = when(['x', 'y'], w => w('x') > w('y'));

    expect(cond.vars).toEqual(['x', 'y']);
    expect(cond.check([2, 1])).toBe(true);
    expect(cond.check([1, 2])).toBe(false);
  });

  it('should hold unconditionally for rules without a condition', () => {
    expect(getRule('commute-add').evaluate([])).toBe(true);
    expect(getRule('commute-mul').evaluateAssignment(new Map())).toBe(true);
  });

  it('should gate merge-left-shift on the intermediate width', () => {
    const merge = getRule('merge-left-shift');

    expect(merge.evaluate([17, 17])).toBe(true);
    expect(merge.evaluate([16, 17])).toBe(true);
    expect(merge.evaluate([17, 16])).toBe(false);
  });

  it('should gate unmerge-left-shift on a non-wrapping shift amount', () => {
    const unmerge = getRule('unmerge-left-shift');

    expect(unmerge.evaluate([3, 2, 2])).toBe(true);
    expect(unmerge.evaluate([2, 2, 2])).toBe(false);
    expect(unmerge.evaluate([5, 4, 1])).toBe(true);
    expect(unmerge.evaluate([4, 4, 1])).toBe(false);
  });

  it('should keep the three-way condition of mult-to-add', () => {
    const multToAdd = getRule('mult-to-add');

    // [wb, sb, wo] with sb: 0 = unsigned, 1 = signed
    expect(multToAdd.evaluate([2, 0, 8])).toBe(true);
    expect(multToAdd.evaluate([1, 0, 8])).toBe(false);
    expect(multToAdd.evaluate([2, 1, 8])).toBe(false);
    expect(multToAdd.evaluate([3, 1, 8])).toBe(true);
    expect(multToAdd.evaluate([1, 0, 1])).toBe(true);
    expect(multToAdd.evaluate([2, 1, 2])).toBe(true);
  });

  it('should reject left-shift-mult when either order could overflow', () => {
    const shiftMult = getRule('left-shift-mult');

    // [wab, wa, wb, wo, wc]
    expect(shiftMult.evaluate([16, 8, 8, 19, 2])).toBe(true);
    // product truncated before the shift
    expect(shiftMult.evaluate([15, 8, 8, 19, 2])).toBe(false);
    // shifted product does not fit the output
    expect(shiftMult.evaluate([16, 8, 8, 18, 2])).toBe(false);
  });

  it('should evaluate assignments by name', () => {
    const merge = getRule('merge-left-shift');

    expect(merge.evaluateAssignment(new Map([['wab', 17], ['wo', 17]]))).toBe(true);
    expect(merge.evaluateAssignment(new Map([['wo', 17], ['wab', 16], ['wa', 16]]))).toBe(false);
  });

  it('should fail the condition when a variable has no value', () => {
    expect(getRule('merge-left-shift').evaluateAssignment(new Map([['wo', 17]]))).toBe(false);
  });
});

describe('Assignments and matches', () => {
  it('should resolve every variable with a known constant', () => {
    const eg = new EGraph();
    addTerm(eg, SHIFTS);
    const merge = getRule('merge-left-shift');
    const [lhs] = merge.patterns();

    const [{ substs }] = eg.search(lhs);
    const assign = extractAssignment(eg, substs[0], lhs);

    expect([...assign]).toEqual([
      ['wo', 17], ['wab', 17], ['sa', 0], ['wa', 16], ['wb', 2], ['wc', 2]
    ]);
  });

  it('should report where a rule matches and whether it may fire', () => {
    const eg = new EGraph();
    const root = addTerm(eg, SHIFTS);

    const matches = getRule('merge-left-shift').findMatches(eg);

    expect(matches.length).toBe(1);
    expect(matches[0].eclass).toBe(root);
    expect(matches[0].conditionResult).toBe(true);
    expect(matches[0].assign.get('wab')).toBe(17);
  });

  it('should report a match whose condition fails', () => {
    const eg = new EGraph();
    addTerm(eg, '(<< 17 16 unsign (<< 16 16 unsign A 2 unsign B) 2 unsign C)');

    const matches = getRule('merge-left-shift').findMatches(eg);

    expect(matches.length).toBe(1);
    expect(matches[0].conditionResult).toBe(false);
  });

  it('should treat an unresolved width as a failed condition', () => {
    const eg = new EGraph();
    addTerm(eg, '(<< W 17 unsign (<< 17 16 unsign A 2 unsign B) 2 unsign C)');
    const merge = getRule('merge-left-shift');

    const [match] = merge.findMatches(eg);

    expect(match.assign.has('wo')).toBe(false);
    expect(match.conditionResult).toBe(false);

    const [rewrite] = toSolverRules(merge);
    const [{ eclass, substs }] = eg.search(rewrite.searcher);
    expect(rewrite.condition?.(eg, eclass, substs[0])).toBe(false);
  });

  it('should find nothing where the lhs does not occur', () => {
    const eg = new EGraph();
    addTerm(eg, '(+ 17 16 unsign A 16 unsign B)');

    expect(getRule('left-shift-mult').findMatches(eg)).toEqual([]);
  });

  it('should report each match once after congruent terms merge', () => {
    const eg = new EGraph();
    const ab = addTerm(eg, '(+ 18 17 unsign (+ 17 16 unsign A 16 unsign B) 16 unsign C)');
    const ba = addTerm(eg, '(+ 18 17 unsign (+ 17 16 unsign B 16 unsign A) 16 unsign C)');
    saturate(eg, catalogRewrites());
    const commute = getRule('commute-add');
    const [lhs] = commute.patterns();

    expect(eg.find(ab)).toBe(eg.find(ba));
    // outer sum and inner sum, each in both operand orders
    expect(commute.findMatches(eg).length).toBe(4);
    for (const { substs } of eg.search(lhs)) {
      const keys = substs.map(subst => JSON.stringify([...subst]));
      expect(new Set(keys).size).toBe(keys.length);
    }
    expect(eg.getNodes(ab).length).toBe(2);
  });

  it('should not modify the e-graph', () => {
    const eg = new EGraph();
    addTerm(eg, SHIFTS);
    addTerm(eg, '(<< 17 16 unsign A 3 unsign (+ 3 2 unsign B 2 unsign C))');
    addTerm(eg, '(* 16 16 unsign A 2 unsign 2)');
    saturate(eg, catalogRewrites());

    const classesBefore = eg.getClassIds();
    const constantsBefore = classesBefore.map(id => eg.constantOf(id));
    const dumpBefore = eg.dump();

    for (const r of createRewrites()) {
      r.findMatches(eg);
    }

    expect(eg.getClassIds()).toEqual(classesBefore);
    expect(classesBefore.map(id => eg.constantOf(id))).toEqual(constantsBefore);
    expect(eg.dump()).toBe(dumpBefore);
  });
});

describe('Solver export', () => {
  it('should export an unconditional rule without a guard', () => {
    const rewrites = toSolverRules(getRule('commute-add'));

    expect(rewrites.length).toBe(1);
    expect(rewrites[0].name).toBe('commute-add');
    expect(rewrites[0].condition).toBeUndefined();
  });

  it('should export a conditional rule with a guard', () => {
    const [rewrite] = toSolverRules(getRule('merge-left-shift'));
    const [lhs, rhs] = getRule('merge-left-shift').patterns();

    expect(rewrite.searcher).toBe(lhs);
    expect(rewrite.applier).toBe(rhs);
    expect(rewrite.condition).toBeDefined();
  });

  it('should evaluate the guard on resolved widths', () => {
    const eg = new EGraph();
    addTerm(eg, SHIFTS);
    const [rewrite] = toSolverRules(getRule('merge-left-shift'));

    const [{ eclass, substs }] = eg.search(rewrite.searcher);

    expect(rewrite.condition?.(eg, eclass, substs[0])).toBe(true);
  });

  it('should flatten the catalog in order', () => {
    const names = toSolverRuleSet(createRewrites()).map(r => r.name);

    expect(names).toEqual([
      'commute-add',
      'commute-mul',
      'merge-left-shift',
      'unmerge-left-shift',
      'mult-to-add',
      'left-shift-mult'
    ]);
  });
});

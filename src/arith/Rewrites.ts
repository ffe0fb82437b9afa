/**
 * Arithmetic Rewrite Rules for Datapath Equivalence
 *
 * Every binary node is written `(op outW widthA signA a widthB signB b)`.
 * Right-hand sides never choose widths of their own: new width slots are
 * computed from the matched widths with `max+1` and `wlsh`.
 */

import { rule, when } from './Rule.js';
import type { ArithRule } from './Rule.js';
import {
  addNoOverflow,
  mulNoOverflow,
  shiftNoOverflow,
  widthOfLeftShift,
  SIGNED,
  UNSIGNED
} from './Width.js';

/**
 * Build the rule catalog. Each call returns a fresh, frozen list.
 */
export function createRewrites(): readonly ArithRule[] {
  return Object.freeze([
    // a + b => b + a
    rule('commute-add', '(+ ?wo ?wa ?sa ?a ?wb ?sb ?b)', '(+ ?wo ?wb ?sb ?b ?wa ?sa ?a)'),

    // a * b => b * a
    rule('commute-mul', '(* ?wo ?wa ?sa ?a ?wb ?sb ?b)', '(* ?wo ?wb ?sb ?b ?wa ?sa ?a)'),

    // (a << b) << c => a << (b + c)
    // b, c and (b + c) are unsigned and (b + c) must not wrap, otherwise the
    // merged shift would differ. The shifted value keeps its sign.
    rule(
      'merge-left-shift',
      '(<< ?wo ?wab ?sa (<< ?wab ?wa ?sa ?a ?wb unsign ?b) ?wc unsign ?c)',
      '(<< ?wo ?wa ?sa ?a (max+1 ?wb ?wc) unsign (+ (max+1 ?wb ?wc) ?wb unsign ?b ?wc unsign ?c))',
      // the intermediate shift must not truncate below the final width
      when(['wo', 'wab'], w => w('wab') >= w('wo'))
    ),

    // a << (b + c) => (a << b) << c
    rule(
      'unmerge-left-shift',
      '(<< ?wo ?wa ?sa ?a ?wbc unsign (+ ?wbc ?wb unsign ?b ?wc unsign ?c))',
      // intermediate width is the minimum that cannot overflow
      '(<< ?wo (wlsh ?wa ?wb) ?sa (<< (wlsh ?wa ?wb) ?wa ?sa ?a ?wb unsign ?b) ?wc unsign ?c)',
      when(['wbc', 'wb', 'wc'], w => addNoOverflow(w('wbc'), w('wb'), w('wc')))
    ),

    // a * 2 => a + a
    rule(
      'mult-to-add',
      '(* ?wo ?wa ?sa ?a ?wb ?sb 2)',
      '(+ ?wo ?wa ?sa ?a ?wa ?sa ?a)',
      // (!sb && wb > 1) || (sb && wb > 2) || (wo <= wb)
      when(['wb', 'sb', 'wo'], w =>
        (w('sb') === UNSIGNED && w('wb') > 1)
        || (w('sb') === SIGNED && w('wb') > 2)
        || w('wo') <= w('wb'))
    ),

    // (a * b) << c => (a << c) * b
    // TODO: allow signed operands; all signs are currently forced to unsign
    rule(
      'left-shift-mult',
      '(<< ?wo ?wab unsign (* ?wab ?wa unsign ?a ?wb unsign ?b) ?wc unsign ?c)',
      '(* ?wo (wlsh ?wa ?wc) unsign (<< (wlsh ?wa ?wc) ?wa unsign ?a ?wc unsign ?c) ?wb unsign ?b)',
      // neither evaluation order may overflow:
      // lhs: wab >= wa + wb && wo >= wab + max_shift(wc)
      // rhs: wo >= wlsh(wa, wc) + wb
      when(['wab', 'wa', 'wb', 'wo', 'wc'], w =>
        mulNoOverflow(w('wab'), w('wa'), w('wb'))
        && shiftNoOverflow(w('wo'), w('wab'), w('wc'))
        && mulNoOverflow(w('wo'), widthOfLeftShift(w('wa'), w('wc')), w('wb')))
    )
  ]);
}

/**
 * Look up a rule by name
 */
export function findRule(rules: readonly ArithRule[], name: string): ArithRule | undefined {
  return rules.find(r => r.name === name);
}

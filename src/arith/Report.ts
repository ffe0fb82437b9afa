/**
 * Human-readable output for rules and their matches
 */

import { patternToString } from '../egraph/Pattern.js';
import type { ArithRule } from './Rule.js';
import type { Match } from './Assignment.js';

export function formatRule(rule: ArithRule): string {
  const [lhs, rhs] = rule.patterns();
  const vars = rule.conditionVars;
  const condition = vars.length > 0 ? ` if ${vars.map(v => `?${v}`).join(' ')}` : '';
  return `${rule.name}: ${patternToString(lhs)} => ${patternToString(rhs)}${condition}`;
}

export function formatMatch(match: Match): string {
  const values = [...match.assign].map(([name, value]) => ` ?${name}=${value}`).join('');
  return `e${match.eclass} [cond=${match.conditionResult}]${values}`;
}

export function formatMatches(rule: ArithRule, matches: Match[]): string {
  const header = `${rule.name}: ${matches.length} ${matches.length === 1 ? 'match' : 'matches'}`;
  return [header, ...matches.map(m => `  ${formatMatch(m)}`)].join('\n');
}

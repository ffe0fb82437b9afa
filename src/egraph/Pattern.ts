/**
 * Pattern Matching for Width-Annotated Rewrite Rules
 *
 * Patterns are expression templates with variables (?a, ?wo, ?sa, etc.)
 * that can match against e-classes in the e-graph. Every binary arithmetic
 * node carries its output width and the width and sign of both operands.
 */

import type { EGraph } from './EGraph.js';
import { ARITH_OPS, OP_SYMBOLS } from './ENode.js';
import type { ENode, EClassId, ArithOp, Sign } from './ENode.js';
import { PatternSyntaxError } from '../Errors.js';

/**
 * One operand slot of a binary node: declared width, sign and expression
 */
export interface OperandPattern {
  width: Pattern;
  sign: Pattern;
  expr: Pattern;
}

export interface BinaryPattern {
  tag: 'pbinary';
  op: ArithOp;
  width: Pattern;
  a: OperandPattern;
  b: OperandPattern;
}

/**
 * Pattern AST
 */
export type Pattern =
  | { tag: 'pvar'; name: string }              // ?a, ?wo - matches any e-class
  | { tag: 'pconst'; value: number }           // 16, 2 - matches literal
  | { tag: 'psign'; sign: Sign }               // sign, unsign
  | { tag: 'psymbol'; name: string }           // A - named bit-vector input
  | { tag: 'pmaxPlus1'; left: Pattern; right: Pattern }
  | { tag: 'pwidthLsh'; left: Pattern; right: Pattern }
  | BinaryPattern;

/**
 * A substitution mapping pattern variables to e-class IDs
 */
export type Substitution = Map<string, EClassId>;

const BINARY_OPERATORS: ReadonlyMap<string, ArithOp> = new Map(
  ARITH_OPS.map((op): [string, ArithOp] => [OP_SYMBOLS[op], op])
);

/**
 * Parse a pattern string into a Pattern AST
 *
 * Syntax:
 *   ?a, ?wo                         - pattern variables
 *   0, 2, 16                        - integer literals
 *   sign, unsign                    - signedness
 *   A, B                            - symbols
 *   (+ ?wo ?wa ?sa ?a ?wb ?sb ?b)   - binary op: + - * << >> >>>
 *   (max+1 ?wa ?wb)                 - max(wa, wb) + 1
 *   (wlsh ?wa ?wb)                  - width of a left shift
 */
export function parsePattern(input: string): Pattern {
  const patterns = parsePatterns(input);
  if (patterns.length === 0) {
    throw new PatternSyntaxError('Empty pattern', input);
  }
  if (patterns.length > 1) {
    throw new PatternSyntaxError(`Unexpected token after pattern: ${patternToString(patterns[1])}`, input);
  }
  return patterns[0];
}

/**
 * Parse a whitespace-separated sequence of patterns
 */
export function parsePatterns(input: string): Pattern[] {
  const tokens = tokenize(input);
  let pos = 0;

  function peek(): string | undefined {
    return tokens[pos];
  }

  function consume(): string {
    const token = tokens[pos++];
    if (token === undefined) {
      throw new PatternSyntaxError('Unexpected end of input', input);
    }
    return token;
  }

  function parseArgs(op: string, count: number): Pattern[] {
    const args: Pattern[] = [];
    while (peek() !== ')') {
      if (peek() === undefined) {
        throw new PatternSyntaxError('Expected )', input);
      }
      args.push(parseExpr());
    }
    consume(); // )
    if (args.length !== count) {
      throw new PatternSyntaxError(`Operator ${op} expects ${count} arguments, got ${args.length}`, input, op);
    }
    return args;
  }

  function parseExpr(): Pattern {
    const token = consume();

    if (token === '(') {
      const op = consume();
      const binary = BINARY_OPERATORS.get(op);

      if (binary !== undefined) {
        const [width, wa, sa, a, wb, sb, b] = parseArgs(op, 7);
        return {
          tag: 'pbinary',
          op: binary,
          width,
          a: { width: wa, sign: sa, expr: a },
          b: { width: wb, sign: sb, expr: b }
        };
      }
      if (op === 'max+1' || op === 'wlsh') {
        const [left, right] = parseArgs(op, 2);
        return op === 'max+1'
          ? { tag: 'pmaxPlus1', left, right }
          : { tag: 'pwidthLsh', left, right };
      }
      throw new PatternSyntaxError(`Unknown operator: ${op}`, input, op);
    }

    if (token === ')') {
      throw new PatternSyntaxError('Unexpected )', input, token);
    }

    if (token.startsWith('?')) {
      if (token.length === 1) {
        throw new PatternSyntaxError('Missing variable name after ?', input, token);
      }
      return { tag: 'pvar', name: token.slice(1) };
    }

    if (/^\d+$/.test(token)) {
      return { tag: 'pconst', value: parseInt(token, 10) };
    }

    if (token === 'sign' || token === 'unsign') {
      return { tag: 'psign', sign: token === 'sign' ? 'signed' : 'unsigned' };
    }

    if (/^[A-Za-z_][\w.$]*$/.test(token)) {
      return { tag: 'psymbol', name: token };
    }

    throw new PatternSyntaxError(`Unexpected token: ${token}`, input, token);
  }

  const result: Pattern[] = [];
  while (pos < tokens.length) {
    result.push(parseExpr());
  }
  return result;
}

/**
 * Tokenize a pattern string
 */
function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push(ch);
      i++;
      continue;
    }

    // Variable or operator or number
    let token = '';
    while (i < input.length && !/[\s()]/.test(input[i])) {
      token += input[i];
      i++;
    }
    if (token) {
      tokens.push(token);
    }
  }

  return tokens;
}

/**
 * The seven slots of a binary pattern in e-node child order
 */
export function binarySlots(pattern: BinaryPattern): Pattern[] {
  return [
    pattern.width,
    pattern.a.width, pattern.a.sign, pattern.a.expr,
    pattern.b.width, pattern.b.sign, pattern.b.expr
  ];
}

/**
 * Direct sub-patterns, left to right
 */
export function patternChildren(pattern: Pattern): Pattern[] {
  switch (pattern.tag) {
    case 'pvar':
    case 'pconst':
    case 'psign':
    case 'psymbol':
      return [];
    case 'pmaxPlus1':
    case 'pwidthLsh':
      return [pattern.left, pattern.right];
    case 'pbinary':
      return binarySlots(pattern);
  }
}

/**
 * Variables of a pattern in order of first appearance
 */
export function patternVars(pattern: Pattern): string[] {
  const seen = new Set<string>();

  function visit(p: Pattern): void {
    if (p.tag === 'pvar') {
      seen.add(p.name);
      return;
    }
    patternChildren(p).forEach(visit);
  }

  visit(pattern);
  return [...seen];
}

/**
 * Match a pattern against an e-class, returning all valid substitutions
 */
export function matchPattern(
  egraph: EGraph,
  pattern: Pattern,
  classId: EClassId
): Substitution[] {
  return matchPatternWithSubst(egraph, pattern, classId, new Map());
}

function matchPatternWithSubst(
  egraph: EGraph,
  pattern: Pattern,
  classId: EClassId,
  subst: Substitution
): Substitution[] {
  const canonId = egraph.find(classId);

  // Pattern variable - bind or check existing binding
  if (pattern.tag === 'pvar') {
    const existing = subst.get(pattern.name);
    if (existing !== undefined) {
      if (egraph.find(existing) === canonId) {
        return [new Map(subst)];
      }
      return [];
    }
    const newSubst = new Map(subst);
    newSubst.set(pattern.name, canonId);
    return [newSubst];
  }

  // Try to match against all nodes in the e-class
  const results: Substitution[] = [];
  for (const node of egraph.getNodes(canonId)) {
    results.push(...matchNodeWithPattern(egraph, pattern, node, subst));
  }
  return results;
}

function matchNodeWithPattern(
  egraph: EGraph,
  pattern: Pattern,
  node: ENode,
  subst: Substitution
): Substitution[] {
  switch (pattern.tag) {
    case 'pvar':
      // Already handled above
      throw new Error('pvar should be handled in matchPatternWithSubst');

    case 'pconst':
      return node.tag === 'const' && node.value === pattern.value ? [new Map(subst)] : [];

    case 'psign':
      return node.tag === 'sign' && node.sign === pattern.sign ? [new Map(subst)] : [];

    case 'psymbol':
      return node.tag === 'symbol' && node.name === pattern.name ? [new Map(subst)] : [];

    case 'pmaxPlus1':
      if (node.tag === 'maxPlus1') {
        return matchChildren(egraph, [pattern.left, pattern.right], node.children, subst);
      }
      return [];

    case 'pwidthLsh':
      if (node.tag === 'widthLsh') {
        return matchChildren(egraph, [pattern.left, pattern.right], node.children, subst);
      }
      return [];

    case 'pbinary':
      if (node.tag === 'binary' && node.op === pattern.op) {
        return matchChildren(egraph, binarySlots(pattern), node.children, subst);
      }
      return [];
  }
}

function matchChildren(
  egraph: EGraph,
  patterns: Pattern[],
  children: EClassId[],
  subst: Substitution
): Substitution[] {
  if (patterns.length === 0) {
    return [new Map(subst)];
  }

  const results: Substitution[] = [];
  const firstMatches = matchPatternWithSubst(egraph, patterns[0], children[0], subst);

  for (const firstSubst of firstMatches) {
    results.push(...matchChildren(egraph, patterns.slice(1), children.slice(1), firstSubst));
  }

  return results;
}

/**
 * Instantiate a pattern with a substitution, adding nodes to the e-graph
 * Returns the e-class ID of the instantiated pattern
 */
export function instantiatePattern(
  egraph: EGraph,
  pattern: Pattern,
  subst: Substitution
): EClassId {
  switch (pattern.tag) {
    case 'pvar': {
      const id = subst.get(pattern.name);
      if (id === undefined) {
        throw new Error(`Unbound pattern variable: ?${pattern.name}`);
      }
      return id;
    }

    case 'pconst':
      return egraph.add({ tag: 'const', value: pattern.value });

    case 'psign':
      return egraph.add({ tag: 'sign', sign: pattern.sign });

    case 'psymbol':
      return egraph.add({ tag: 'symbol', name: pattern.name });

    case 'pmaxPlus1': {
      const left = instantiatePattern(egraph, pattern.left, subst);
      const right = instantiatePattern(egraph, pattern.right, subst);
      return egraph.add({ tag: 'maxPlus1', children: [left, right] });
    }

    case 'pwidthLsh': {
      const left = instantiatePattern(egraph, pattern.left, subst);
      const right = instantiatePattern(egraph, pattern.right, subst);
      return egraph.add({ tag: 'widthLsh', children: [left, right] });
    }

    case 'pbinary': {
      const [w, wa, sa, a, wb, sb, b] = binarySlots(pattern).map(p => instantiatePattern(egraph, p, subst));
      return egraph.add({ tag: 'binary', op: pattern.op, children: [w, wa, sa, a, wb, sb, b] });
    }
  }
}

/**
 * Convert pattern to string for debugging
 */
export function patternToString(pattern: Pattern): string {
  switch (pattern.tag) {
    case 'pvar': return `?${pattern.name}`;
    case 'pconst': return `${pattern.value}`;
    case 'psign': return pattern.sign === 'signed' ? 'sign' : 'unsign';
    case 'psymbol': return pattern.name;
    case 'pmaxPlus1': return `(max+1 ${patternToString(pattern.left)} ${patternToString(pattern.right)})`;
    case 'pwidthLsh': return `(wlsh ${patternToString(pattern.left)} ${patternToString(pattern.right)})`;
    case 'pbinary': return `(${OP_SYMBOLS[pattern.op]} ${binarySlots(pattern).map(patternToString).join(' ')})`;
  }
}

/**
 * Structural equality of two patterns
 */
export function patternsEqual(a: Pattern, b: Pattern): boolean {
  return patternToString(a) === patternToString(b);
}

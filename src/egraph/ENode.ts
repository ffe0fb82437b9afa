/**
 * E-Node: Bit-vector arithmetic nodes in an e-graph
 *
 * E-nodes are hash-consed (deduplicated) and reference e-classes by ID.
 * Widths and signs are ordinary e-classes, so every arithmetic node threads
 * its output width and the width/sign of each operand as children.
 */

export type EClassId = number;

export type Sign = 'signed' | 'unsigned';

/**
 * Binary arithmetic operators. All share the 7-slot shape
 * (outW, widthA, signA, exprA, widthB, signB, exprB).
 */
export type ArithOp = 'add' | 'sub' | 'mul' | 'shl' | 'shr' | 'ashr';

export const ARITH_OPS: readonly ArithOp[] = ['add', 'sub', 'mul', 'shl', 'shr', 'ashr'];

/** Surface symbol of each operator in pattern text */
export const OP_SYMBOLS: Readonly<Record<ArithOp, string>> = {
  add: '+',
  sub: '-',
  mul: '*',
  shl: '<<',
  shr: '>>',
  ashr: '>>>'
};

export type BinaryChildren = [
  EClassId, EClassId, EClassId, EClassId, EClassId, EClassId, EClassId
];

export type ENode =
  | { tag: 'const'; value: number }
  | { tag: 'sign'; sign: Sign }
  | { tag: 'symbol'; name: string }
  | { tag: 'maxPlus1'; children: [EClassId, EClassId] }
  | { tag: 'widthLsh'; children: [EClassId, EClassId] }
  | { tag: 'binary'; op: ArithOp; children: BinaryChildren };

/**
 * Create a canonical string key for an e-node (for hash-consing)
 */
export function enodeKey(node: ENode): string {
  switch (node.tag) {
    case 'const':
      return `const:${node.value}`;
    case 'sign':
      return `sign:${node.sign}`;
    case 'symbol':
      return `sym:${node.name}`;
    case 'maxPlus1':
      return `max+1:${node.children[0]},${node.children[1]}`;
    case 'widthLsh':
      return `wlsh:${node.children[0]},${node.children[1]}`;
    case 'binary':
      return `${node.op}:${node.children.join(',')}`;
  }
}

/**
 * Get all e-class IDs that this node references (its children)
 */
export function enodeChildren(node: ENode): EClassId[] {
  switch (node.tag) {
    case 'const':
    case 'sign':
    case 'symbol':
      return [];
    case 'maxPlus1':
    case 'widthLsh':
    case 'binary':
      return [...node.children];
  }
}

/**
 * Create a new e-node with updated children (after canonicalization)
 */
export function enodeWithChildren(node: ENode, newChildren: EClassId[]): ENode {
  switch (node.tag) {
    case 'const':
    case 'sign':
    case 'symbol':
      return node;
    case 'maxPlus1':
      return { tag: 'maxPlus1', children: [newChildren[0], newChildren[1]] };
    case 'widthLsh':
      return { tag: 'widthLsh', children: [newChildren[0], newChildren[1]] };
    case 'binary':
      return {
        tag: 'binary',
        op: node.op,
        children: [
          newChildren[0], newChildren[1], newChildren[2], newChildren[3],
          newChildren[4], newChildren[5], newChildren[6]
        ]
      };
  }
}


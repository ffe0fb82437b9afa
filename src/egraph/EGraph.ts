/**
 * E-Graph: Equality Graph over width-annotated bit-vector arithmetic
 *
 * An e-graph efficiently represents equivalence classes of expressions.
 * It supports:
 * - Adding expressions (returns e-class ID)
 * - Merging e-classes (union)
 * - Finding canonical e-class (find)
 * - Rebuilding after merges (maintains congruence)
 * - Width constant folding: classes of widths and signs know their value
 */

import { enodeKey, enodeChildren, enodeWithChildren, OP_SYMBOLS } from './ENode.js';
import type { ENode, EClassId } from './ENode.js';
import { matchPattern } from './Pattern.js';
import type { Pattern } from './Pattern.js';
import type { ArithGraph, SearchMatches } from './Graph.js';
import { maxPlus1, widthOfLeftShift, SIGNED, UNSIGNED } from '../arith/Width.js';
import { ConstantConflictError } from '../Errors.js';

/**
 * E-Class: An equivalence class of expressions
 */
export interface EClass {
  id: EClassId;
  nodes: Set<string>;  // Set of e-node keys in this class
  parents: Set<string>; // E-node keys that reference this class
  constant: number | undefined; // Folded width or sign value
}

/**
 * E-Graph: The main data structure
 */
export class EGraph implements ArithGraph {
  private nextId: EClassId = 0;
  private classes: Map<EClassId, EClass> = new Map();
  private parent: Map<EClassId, EClassId> = new Map();  // Union-find parent
  private rank: Map<EClassId, number> = new Map();       // Union-find rank
  private hashcons: Map<string, EClassId> = new Map();   // E-node key -> e-class
  private nodeStore: Map<string, ENode> = new Map();     // Key -> actual node
  private nodeClass: Map<string, EClassId> = new Map();  // Key -> owning e-class
  private pending: EClassId[] = [];                       // Classes needing rebuild

  /**
   * Find the canonical e-class ID (with path compression)
   */
  find(id: EClassId): EClassId {
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    if (next === undefined) {
      throw new Error(`Unknown e-class: ${id}`);
    }
    // Path compression
    let current = id;
    while (current !== root) {
      const up = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = up;
    }
    return root;
  }

  /**
   * Add an e-node to the e-graph, returning its e-class ID
   * If the node already exists, returns the existing class
   */
  add(node: ENode): EClassId {
    const canonNode = this.canonicalize(node);
    const key = enodeKey(canonNode);

    const existing = this.hashcons.get(key);
    if (existing !== undefined) {
      return this.find(existing);
    }

    const id = this.nextId++;
    this.parent.set(id, id);
    this.rank.set(id, 0);

    const constant = this.fold(canonNode);
    const eclass: EClass = {
      id,
      nodes: new Set([key]),
      parents: new Set(),
      constant
    };
    this.classes.set(id, eclass);
    this.hashcons.set(key, id);
    this.nodeStore.set(key, canonNode);
    this.nodeClass.set(key, id);

    this.registerParent(key, canonNode);

    // A folded width helper is the same class as its literal value
    if (constant !== undefined && (canonNode.tag === 'maxPlus1' || canonNode.tag === 'widthLsh')) {
      const literal = this.add({ tag: 'const', value: constant });
      return this.merge(literal, id);
    }

    return id;
  }

  /**
   * Merge two e-classes, returning the new canonical ID
   */
  merge(id1: EClassId, id2: EClassId): EClassId {
    const root1 = this.find(id1);
    const root2 = this.find(id2);

    if (root1 === root2) {
      return root1;
    }

    // Union by rank
    const rank1 = this.rank.get(root1) ?? 0;
    const rank2 = this.rank.get(root2) ?? 0;

    let newRoot: EClassId;
    let oldRoot: EClassId;

    if (rank1 < rank2) {
      newRoot = root2;
      oldRoot = root1;
    } else {
      newRoot = root1;
      oldRoot = root2;
    }

    const newClass = this.requireClass(newRoot);
    const oldClass = this.requireClass(oldRoot);

    if (oldClass.constant !== undefined && newClass.constant !== undefined
      && oldClass.constant !== newClass.constant) {
      throw new ConstantConflictError(newRoot, newClass.constant, oldClass.constant);
    }

    if (rank1 === rank2) {
      this.rank.set(newRoot, rank1 + 1);
    }
    this.parent.set(oldRoot, newRoot);

    for (const nodeKey of oldClass.nodes) {
      newClass.nodes.add(nodeKey);
    }
    for (const parentKey of oldClass.parents) {
      newClass.parents.add(parentKey);
    }
    if (newClass.constant === undefined) {
      newClass.constant = oldClass.constant;
    }

    // Mark for rebuild
    this.pending.push(newRoot);

    return newRoot;
  }

  /**
   * Rebuild the e-graph to restore congruence invariants
   * Must be called after a batch of merges
   */
  rebuild(): void {
    while (this.pending.length > 0) {
      const todo = [...this.pending];
      this.pending = [];

      for (const classId of todo) {
        this.repair(this.find(classId));
      }
    }
  }

  /**
   * Repair an e-class after merges
   */
  private repair(classId: EClassId): void {
    const eclass = this.classes.get(classId);
    if (!eclass) return;

    // Collect parent nodes that need re-canonicalization
    const oldParents = new Set(eclass.parents);
    eclass.parents.clear();

    for (const parentKey of oldParents) {
      const parentNode = this.nodeStore.get(parentKey);
      const owner = this.nodeClass.get(parentKey);
      if (!parentNode || owner === undefined) continue;
      const parentClassId = this.find(owner);

      this.hashcons.delete(parentKey);

      const canonNode = this.canonicalize(parentNode);
      const newKey = enodeKey(canonNode);

      const existingClass = this.hashcons.get(newKey);
      if (existingClass !== undefined) {
        // Node already exists in another class - congruent, merge
        this.requireClass(parentClassId).nodes.delete(parentKey);
        this.forgetNode(parentKey);
        this.merge(parentClassId, existingClass);
      } else {
        this.hashcons.set(newKey, parentClassId);
        this.nodeStore.set(newKey, canonNode);
        this.nodeClass.set(newKey, parentClassId);

        const parentClass = this.classes.get(parentClassId);
        if (parentClass && newKey !== parentKey) {
          parentClass.nodes.delete(parentKey);
          parentClass.nodes.add(newKey);
          this.forgetNode(parentKey);
        }
      }
      this.registerParent(newKey, canonNode);

      // Children may have gained constants
      const folded = this.fold(canonNode);
      if (folded !== undefined && (canonNode.tag === 'maxPlus1' || canonNode.tag === 'widthLsh')) {
        this.merge(this.add({ tag: 'const', value: folded }), parentClassId);
      }
    }

    // Re-register parents for this class
    for (const nodeKey of eclass.nodes) {
      const node = this.nodeStore.get(nodeKey);
      if (!node) continue;

      for (const childId of enodeChildren(node)) {
        const childClass = this.classes.get(this.find(childId));
        if (childClass) {
          childClass.parents.add(nodeKey);
        }
      }
    }
  }

  /**
   * Constant value of a node, computed from its children's classes
   */
  private fold(node: ENode): number | undefined {
    switch (node.tag) {
      case 'const':
        return node.value;
      case 'sign':
        return node.sign === 'signed' ? SIGNED : UNSIGNED;
      case 'symbol':
      case 'binary':
        return undefined;
      case 'maxPlus1':
      case 'widthLsh': {
        const a = this.constantOf(node.children[0]);
        const b = this.constantOf(node.children[1]);
        if (a === undefined || b === undefined) {
          return undefined;
        }
        return node.tag === 'maxPlus1' ? maxPlus1(a, b) : widthOfLeftShift(a, b);
      }
    }
  }

  private registerParent(key: string, node: ENode): void {
    for (const childId of enodeChildren(node)) {
      const childClass = this.classes.get(this.find(childId));
      if (childClass) {
        childClass.parents.add(key);
      }
    }
  }

  private forgetNode(key: string): void {
    this.nodeStore.delete(key);
    this.nodeClass.delete(key);
  }

  private requireClass(id: EClassId): EClass {
    const eclass = this.classes.get(id);
    if (!eclass) {
      throw new Error(`Unknown e-class: ${id}`);
    }
    return eclass;
  }

  /**
   * Canonicalize an e-node (update children to canonical IDs)
   */
  private canonicalize(node: ENode): ENode {
    const children = enodeChildren(node);
    if (children.length === 0) {
      return node;
    }
    return enodeWithChildren(node, children.map(id => this.find(id)));
  }

  /**
   * Known constant of an e-class
   */
  constantOf(id: EClassId): number | undefined {
    return this.classes.get(this.find(id))?.constant;
  }

  /**
   * Every e-class matching `pattern`, with all substitutions
   */
  search(pattern: Pattern): SearchMatches[] {
    const results: SearchMatches[] = [];
    for (const eclass of this.getClassIds()) {
      const substs = matchPattern(this, pattern, eclass);
      if (substs.length > 0) {
        results.push({ eclass, substs });
      }
    }
    return results;
  }

  /**
   * Get all e-class IDs
   */
  getClassIds(): EClassId[] {
    const canonical = new Set<EClassId>();
    for (const id of this.classes.keys()) {
      canonical.add(this.find(id));
    }
    return [...canonical];
  }

  /**
   * Get an e-class by ID
   */
  getClass(id: EClassId): EClass | undefined {
    return this.classes.get(this.find(id));
  }

  /**
   * Get all e-nodes in an e-class
   */
  getNodes(classId: EClassId): ENode[] {
    const eclass = this.classes.get(this.find(classId));
    if (!eclass) return [];

    const nodes: ENode[] = [];
    for (const key of eclass.nodes) {
      const node = this.nodeStore.get(key);
      if (node) {
        nodes.push(this.canonicalize(node));
      }
    }
    return nodes;
  }

  /**
   * Get the number of e-classes
   */
  get size(): number {
    return this.getClassIds().length;
  }

  /**
   * Lookup e-class by node (if it exists)
   */
  lookup(node: ENode): EClassId | undefined {
    const key = enodeKey(this.canonicalize(node));
    const id = this.hashcons.get(key);
    return id !== undefined ? this.find(id) : undefined;
  }

  /**
   * Debug: print e-graph state
   */
  dump(): string {
    const lines: string[] = ['E-Graph:'];
    for (const classId of this.getClassIds()) {
      const eclass = this.classes.get(classId);
      if (!eclass) continue;

      const nodeStrs = [...eclass.nodes].map(key => {
        const node = this.nodeStore.get(key);
        return node ? this.nodeToString(node) : key;
      });
      const constant = eclass.constant !== undefined ? ` {${eclass.constant}}` : '';
      lines.push(`  [${classId}]${constant}: ${nodeStrs.join(' = ')}`);
    }
    return lines.join('\n');
  }

  /**
   * Convert e-node to readable string
   */
  private nodeToString(node: ENode): string {
    switch (node.tag) {
      case 'const': return `${node.value}`;
      case 'sign': return node.sign === 'signed' ? 'sign' : 'unsign';
      case 'symbol': return node.name;
      case 'maxPlus1': return `(max+1 e${node.children[0]} e${node.children[1]})`;
      case 'widthLsh': return `(wlsh e${node.children[0]} e${node.children[1]})`;
      case 'binary': return `(${OP_SYMBOLS[node.op]} ${node.children.map(c => `e${c}`).join(' ')})`;
    }
  }
}

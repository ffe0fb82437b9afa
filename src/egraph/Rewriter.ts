/**
 * Rewrite Engine for E-Graph Equality Saturation
 *
 * Applies rewrites until saturation (no new merges) or a resource limit.
 */

import { EGraph } from './EGraph.js';
import type { EClassId } from './ENode.js';
import type { ArithGraph } from './Graph.js';
import { instantiatePattern } from './Pattern.js';
import type { Pattern, Substitution } from './Pattern.js';
import { addTerm } from './Convert.js';

/**
 * Guard checked against a live match before the applier runs
 */
export type RewriteCondition = (graph: ArithGraph, eclass: EClassId, subst: Substitution) => boolean;

/**
 * A rewrite in solver format: wherever `searcher` matches, `applier`
 * (instantiated with the match) is equivalent, provided `condition` holds
 */
export interface Rewrite {
  name: string;
  searcher: Pattern;
  applier: Pattern;
  condition?: RewriteCondition;
}

export type StopReason = 'saturated' | 'iteration-limit' | 'size-limit';

/**
 * Statistics from a saturation run
 */
export interface SaturationStats {
  iterations: number;
  totalMatches: number;
  merges: number;
  saturated: boolean;
  stopReason: StopReason;
  classCount: number;
}

/**
 * Options for saturation
 */
export interface SaturationOptions {
  maxIterations?: number;    // Default: 30
  maxClassSize?: number;     // Stop if e-graph gets too large
  verbose?: boolean;         // Log progress
}

/**
 * Apply equality saturation to an e-graph
 *
 * Repeatedly applies rewrites until:
 * - No new equivalences are discovered (saturated)
 * - Max iterations reached
 * - E-graph size limit exceeded
 */
export function saturate(
  egraph: EGraph,
  rewrites: Rewrite[],
  options: SaturationOptions = {}
): SaturationStats {
  const {
    maxIterations = 30,
    maxClassSize = 10000,
    verbose = false
  } = options;

  egraph.rebuild();

  const stats: SaturationStats = {
    iterations: 0,
    totalMatches: 0,
    merges: 0,
    saturated: false,
    stopReason: 'iteration-limit',
    classCount: egraph.size
  };

  for (let iter = 0; iter < maxIterations; iter++) {
    if (egraph.size > maxClassSize) {
      if (verbose) {
        console.log(`[saturate] Size limit exceeded: ${egraph.size} > ${maxClassSize}`);
      }
      stats.stopReason = 'size-limit';
      break;
    }

    stats.iterations = iter + 1;

    const matches = collectMatches(egraph, rewrites);
    stats.totalMatches += matches.length;

    const mergesThisIter = applyMatches(egraph, matches);
    stats.merges += mergesThisIter;

    if (verbose) {
      console.log(`[saturate] Iter ${iter + 1}: ${matches.length} matches, ${mergesThisIter} merges, ${egraph.size} classes`);
    }

    // If no merges happened, we're saturated
    if (mergesThisIter === 0) {
      stats.saturated = true;
      stats.stopReason = 'saturated';
      if (verbose) {
        console.log(`[saturate] Saturated after ${iter + 1} iterations`);
      }
      break;
    }
  }

  stats.classCount = egraph.size;
  return stats;
}

/**
 * A match: rewrite matched at classId with substitution
 */
interface RewriteMatch {
  rewrite: Rewrite;
  classId: EClassId;
  subst: Substitution;
}

/**
 * Collect every match whose condition holds, across the e-graph
 */
function collectMatches(egraph: EGraph, rewrites: Rewrite[]): RewriteMatch[] {
  const matches: RewriteMatch[] = [];

  for (const rewrite of rewrites) {
    for (const { eclass, substs } of egraph.search(rewrite.searcher)) {
      for (const subst of substs) {
        if (rewrite.condition && !rewrite.condition(egraph, eclass, subst)) {
          continue;
        }
        matches.push({ rewrite, classId: eclass, subst });
      }
    }
  }

  return matches;
}

/**
 * Instantiate each applier and union it with its match; rebuilds afterwards
 */
function applyMatches(egraph: EGraph, matches: RewriteMatch[]): number {
  let merges = 0;

  for (const { rewrite, classId, subst } of matches) {
    const rhsId = instantiatePattern(egraph, rewrite.applier, subst);
    const lhsCanon = egraph.find(classId);
    const rhsCanon = egraph.find(rhsId);

    if (lhsCanon !== rhsCanon) {
      egraph.merge(lhsCanon, rhsCanon);
      merges++;
    }
  }

  egraph.rebuild();
  return merges;
}

/**
 * Apply a single rewrite once, returning number of merges
 */
export function applyRewriteOnce(egraph: EGraph, rewrite: Rewrite): number {
  egraph.rebuild();
  return applyMatches(egraph, collectMatches(egraph, [rewrite]));
}

/**
 * Result of an equivalence query
 */
export interface EquivalenceResult {
  equivalent: boolean;
  roots: [EClassId, EClassId];
  egraph: EGraph;
  stats: SaturationStats;
}

/**
 * Load two terms into a fresh e-graph, saturate, and report whether both
 * roots ended up in the same e-class
 */
export function provesEquivalent(
  lhs: Pattern | string,
  rhs: Pattern | string,
  rewrites: Rewrite[],
  options: SaturationOptions = {}
): EquivalenceResult {
  const egraph = new EGraph();
  const lhsId = addTerm(egraph, lhs);
  const rhsId = addTerm(egraph, rhs);
  const stats = saturate(egraph, rewrites, options);
  return {
    equivalent: egraph.find(lhsId) === egraph.find(rhsId),
    roots: [egraph.find(lhsId), egraph.find(rhsId)],
    egraph,
    stats
  };
}

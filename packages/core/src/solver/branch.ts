/**
 * Branch selection for multi-valued intersections
 *
 * Circle intersections can have two solutions. While a construction is being
 * dragged the chosen solution must not jump to the other branch, so once an
 * entity has a previous value the solution nearest to it wins. Only on first
 * resolution does the definition's branch selector pick from a canonical
 * ordering, which is implementation-defined:
 *
 * - circle/line: increasing parameter along the line direction
 * - circle/circle: the solution left of the directed center line c1 → c2 first
 */

import type { Vec2 } from '../num/vec2.js';
import { distSq2 } from '../num/vec2.js';
import { orient2DRobust } from '../num/predicates.js';
import type { Line, Circle } from '../geom/shapes.js';
import { lineParameterOf } from '../geom/shapes.js';
import type { BranchSelector } from '../symbolic/types.js';

/**
 * Order circle/line solutions along the line
 */
export function canonicalCircleLineOrder(solutions: Vec2[], l: Line): Vec2[] {
  return [...solutions].sort((p, q) => lineParameterOf(l, p) - lineParameterOf(l, q));
}

/**
 * Order circle/circle solutions: left of c1 → c2 first
 */
export function canonicalCircleCircleOrder(solutions: Vec2[], c1: Circle, c2: Circle): Vec2[] {
  return [...solutions].sort(
    (p, q) => orient2DRobust(c1.center, c2.center, q) - orient2DRobust(c1.center, c2.center, p)
  );
}

/**
 * Pick one of the canonically ordered solutions
 *
 * @param ordered Non-empty solutions in canonical order
 * @param branch Selector used when there is no previous value
 * @param hint Previous value of the entity, if any
 */
export function selectBranch(ordered: Vec2[], branch: BranchSelector, hint: Vec2 | null): Vec2 {
  if (ordered.length === 0) {
    throw new Error(`selectBranch requires at least one solution`);
  }
  if (hint) {
    let best = ordered[0];
    let bestDist = distSq2(best, hint);
    for (let i = 1; i < ordered.length; i++) {
      const d = distSq2(ordered[i], hint);
      if (d < bestDist) {
        best = ordered[i];
        bestDist = d;
      }
    }
    return best;
  }
  return ordered[Math.min(branch, ordered.length - 1)];
}

/**
 * Geometric predicates
 *
 * Orientation test built on Shewchuk-style adaptive precision robust
 * predicates via mourner/robust-predicates. The sign of an orientation
 * decides which intersection branch is "left", so it must not flip on
 * near-degenerate input.
 */

import type { Vec2 } from './vec2.js';
import { orient2d as robustOrient2d } from 'robust-predicates';

/**
 * Exact sign of the 2D cross product (b - a) × (c - a):
 * - positive: c is to the left of a → b (counter-clockwise)
 * - negative: c is to the right (clockwise)
 * - zero: collinear
 *
 * robust-predicates uses the opposite sign convention, so the result is negated.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

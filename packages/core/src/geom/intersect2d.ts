/**
 * 2D intersection primitives
 *
 * Intersections work on the infinite carriers of lines: the drawn extent of a
 * ray or segment never rejects a solution. Only the clipping helper
 * (clipLineToAabb) honours the extent, because it computes what is visible.
 *
 * All zero tests are tolerance-aware.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import { add2, sub2, mul2, dot2, cross2, length2, perp2, lengthSq2 } from '../num/vec2.js';
import { isZero } from '../num/tolerance.js';
import type { Line, Circle } from './shapes.js';
import { evalLine, extentRange } from './shapes.js';
import type { AABB } from './aabb.js';

/**
 * Intersect the carriers of two lines
 *
 * @returns The single intersection point, or null when the directions are parallel
 */
export function intersectLineLine(l1: Line, l2: Line, ctx: NumericContext): Vec2 | null {
  const cross = cross2(l1.direction, l2.direction);
  if (isZero(cross, ctx)) {
    return null;
  }
  // o1 + s*d1 = o2 + u*d2  =>  s = ((o2 - o1) × d2) / (d1 × d2)
  const s = cross2(sub2(l2.origin, l1.origin), l2.direction) / cross;
  return evalLine(l1, s);
}

/**
 * Intersect a circle with the carrier of a line
 *
 * Solutions are returned in increasing order of their parameter along the
 * line direction; a tangent line yields a single point.
 */
export function intersectCircleLine(c: Circle, l: Line, ctx: NumericContext): Vec2[] {
  // |o' + s*d|² = r² with o' = o - c and |d| = 1:
  // s² + 2s(o'·d) + |o'|² - r² = 0
  const rel = sub2(l.origin, c.center);
  const b = dot2(rel, l.direction);
  const discriminant = b * b - (lengthSq2(rel) - c.radius * c.radius);

  if (discriminant < -ctx.tol.length) {
    return [];
  }
  if (isZero(discriminant, ctx)) {
    return [evalLine(l, -b)];
  }

  const sqrtDisc = Math.sqrt(discriminant);
  return [evalLine(l, -b - sqrtDisc), evalLine(l, -b + sqrtDisc)];
}

/**
 * Intersect two circles
 *
 * Returns zero, one (tangent) or two points. Concentric circles, including
 * identical ones, have no isolated intersection and yield none. The order of
 * two solutions is not meaningful; callers that need a stable order sort them.
 */
export function intersectCircleCircle(c1: Circle, c2: Circle, ctx: NumericContext): Vec2[] {
  const centerOffset = sub2(c2.center, c1.center);
  const d = length2(centerOffset);
  const r1 = c1.radius;
  const r2 = c2.radius;

  if (isZero(d, ctx)) {
    return [];
  }
  if (d > r1 + r2 + ctx.tol.length) {
    return [];
  }
  if (d < Math.abs(r1 - r2) - ctx.tol.length) {
    return [];
  }

  // Distance from c1 along the center line to the chord through the intersections
  const a = (r1 * r1 - r2 * r2 + d * d) / (2 * d);
  const hSq = r1 * r1 - a * a;
  const h = Math.sqrt(Math.max(0, hSq));

  const u = mul2(centerOffset, 1 / d);
  const v = perp2(u);
  const foot = add2(c1.center, mul2(u, a));

  if (isZero(h, ctx)) {
    return [foot];
  }

  const results: Vec2[] = [];
  for (const sign of [-1, 1]) {
    results.push(add2(foot, mul2(v, sign * h)));
  }
  return results;
}

/**
 * Clip the drawn part of a line against a box (Liang–Barsky)
 *
 * @returns The visible sub-segment as [start, end] in the line's direction,
 * or null if nothing of the line lies inside the box
 */
export function clipLineToAabb(l: Line, box: AABB): [Vec2, Vec2] | null {
  let [tMin, tMax] = extentRange(l.extent);
  const mins: Vec2 = [box.x, box.y];
  const maxs: Vec2 = [box.x + box.width, box.y + box.height];

  for (let axis = 0; axis < 2; axis++) {
    const o = l.origin[axis];
    const d = l.direction[axis];
    if (d === 0) {
      if (o < mins[axis] || o > maxs[axis]) {
        return null;
      }
      continue;
    }
    let t0 = (mins[axis] - o) / d;
    let t1 = (maxs[axis] - o) / d;
    if (t0 > t1) {
      [t0, t1] = [t1, t0];
    }
    tMin = Math.max(tMin, t0);
    tMax = Math.min(tMax, t1);
    if (tMin > tMax) {
      return null;
    }
  }

  if (!Number.isFinite(tMin) || !Number.isFinite(tMax)) {
    // Only reachable with a zero direction
    return null;
  }
  return [evalLine(l, tMin), evalLine(l, tMax)];
}

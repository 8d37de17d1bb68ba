/**
 * Resolved (concrete) 2D shapes
 *
 * These are the numeric values a symbolic definition resolves to. Lines are
 * stored as origin + unit direction with an extent that says how much of the
 * carrier is drawn; circles as center + radius.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, sub2, mul2, dot2, length2, normalize2, dist2 } from '../num/vec2.js';

/**
 * How much of a line's infinite carrier is part of the shape
 */
export type LineExtent =
  | { kind: 'full' }
  | { kind: 'ray' }
  | { kind: 'segment'; length: number };

export const FULL: LineExtent = { kind: 'full' };
export const RAY: LineExtent = { kind: 'ray' };

export function segmentExtent(length: number): LineExtent {
  return { kind: 'segment', length };
}

/**
 * Resolved line: points are origin + s * direction for s in the extent's range
 */
export interface Line {
  kind: 'line';
  origin: Vec2;
  /** Unit direction */
  direction: Vec2;
  extent: LineExtent;
}

/**
 * Resolved circle
 */
export interface Circle {
  kind: 'circle';
  center: Vec2;
  /** Radius, never negative */
  radius: number;
}

/**
 * Resolved point
 */
export interface PointGeometry {
  kind: 'point';
  position: Vec2;
}

/**
 * Union of all resolved shapes
 */
export type Geometry = PointGeometry | Line | Circle;

export type GeometryKind = Geometry['kind'];

export function point(position: Vec2): PointGeometry {
  return { kind: 'point', position };
}

export function line(origin: Vec2, direction: Vec2, extent: LineExtent = FULL): Line {
  return { kind: 'line', origin, direction: normalize2(direction), extent };
}

export function circle(center: Vec2, radius: number): Circle {
  return { kind: 'circle', center, radius };
}

/**
 * Parameter range [min, max] of a line extent (in units of direction)
 */
export function extentRange(extent: LineExtent): [number, number] {
  switch (extent.kind) {
    case 'full':
      return [-Infinity, Infinity];
    case 'ray':
      return [0, Infinity];
    case 'segment':
      return [0, extent.length];
  }
}

/**
 * Evaluate a line at distance s along its direction (extent is not applied)
 */
export function evalLine(l: Line, s: number): Vec2 {
  return add2(l.origin, mul2(l.direction, s));
}

/**
 * Signed distance of the projection of p onto the line's carrier
 */
export function lineParameterOf(l: Line, p: Vec2): number {
  return dot2(sub2(p, l.origin), l.direction);
}

/**
 * Closest point to p on the drawn part of a line (extent applied)
 */
export function closestPointOnLine(l: Line, p: Vec2): Vec2 {
  const [min, max] = extentRange(l.extent);
  const s = Math.max(min, Math.min(max, lineParameterOf(l, p)));
  return evalLine(l, s);
}

/**
 * Closest point to p on a circle's outline
 * For p at the center every outline point is equally close; the +x point is returned.
 */
export function closestPointOnCircle(c: Circle, p: Vec2): Vec2 {
  const offset = sub2(p, c.center);
  if (length2(offset) === 0) {
    return [c.center[0] + c.radius, c.center[1]];
  }
  return add2(c.center, mul2(normalize2(offset), c.radius));
}

/**
 * Distance from p to the drawn outline of a shape
 */
export function distanceToGeometry(g: Geometry, p: Vec2): number {
  switch (g.kind) {
    case 'point':
      return dist2(g.position, p);
    case 'line':
      return dist2(closestPointOnLine(g, p), p);
    case 'circle':
      return Math.abs(dist2(g.center, p) - g.radius);
  }
}

function extentEquals(a: LineExtent, b: LineExtent): boolean {
  if (a.kind === 'segment' && b.kind === 'segment') {
    return a.length === b.length;
  }
  return a.kind === b.kind;
}

function vecEquals(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Exact structural equality of two shapes
 */
export function geometryEquals(a: Geometry | null, b: Geometry | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  if (a.kind === 'point' && b.kind === 'point') {
    return vecEquals(a.position, b.position);
  }
  if (a.kind === 'line' && b.kind === 'line') {
    return (
      vecEquals(a.origin, b.origin) &&
      vecEquals(a.direction, b.direction) &&
      extentEquals(a.extent, b.extent)
    );
  }
  if (a.kind === 'circle' && b.kind === 'circle') {
    return vecEquals(a.center, b.center) && a.radius === b.radius;
  }
  return false;
}

/**
 * Definition creators
 *
 * Small factory functions so call sites read like the construction they
 * describe: `midPoint(a, b)`, `segment(p, q)`, `centerRadius(c, r)`.
 */

import type { Vec2 } from '../num/vec2.js';
import type {
  EntityId,
  BranchSelector,
  FixedPoint,
  FreePoint,
  MidPoint,
  OnLinePoint,
  LineLineIntersectPoint,
  OnCirclePoint,
  CircleLineIntersectPoint,
  CircleCircleIntersectPoint,
  TwoPointLine,
  ParallelLine,
  PerpendicularLine,
  CenterRadiusCircle,
} from './types.js';

// ============================================================================
// Points
// ============================================================================

export function fixedPoint(position: Vec2): FixedPoint {
  return { kind: `fixed`, position };
}

export function freePoint(position: Vec2): FreePoint {
  return { kind: `free`, position };
}

export function midPoint(a: EntityId, b: EntityId): MidPoint {
  return { kind: `midPoint`, a, b };
}

export function onLine(line: EntityId, t: number): OnLinePoint {
  return { kind: `onLine`, line, t };
}

export function lineLineIntersect(line1: EntityId, line2: EntityId): LineLineIntersectPoint {
  return { kind: `lineLineIntersect`, line1, line2 };
}

export function onCircle(circle: EntityId, angle: number): OnCirclePoint {
  return { kind: `onCircle`, circle, angle };
}

export function circleLineIntersect(
  circle: EntityId,
  line: EntityId,
  branch: BranchSelector = 0
): CircleLineIntersectPoint {
  return { kind: `circleLineIntersect`, circle, line, branch };
}

export function circleCircleIntersect(
  circle1: EntityId,
  circle2: EntityId,
  branch: BranchSelector = 0
): CircleCircleIntersectPoint {
  return { kind: `circleCircleIntersect`, circle1, circle2, branch };
}

// ============================================================================
// Lines
// ============================================================================

export function straightLine(p1: EntityId, p2: EntityId): TwoPointLine {
  return { kind: `straight`, p1, p2 };
}

export function ray(p1: EntityId, p2: EntityId): TwoPointLine {
  return { kind: `ray`, p1, p2 };
}

export function segment(p1: EntityId, p2: EntityId): TwoPointLine {
  return { kind: `segment`, p1, p2 };
}

export function parallelLine(line: EntityId, point: EntityId): ParallelLine {
  return { kind: `parallel`, line, point };
}

export function perpendicularLine(line: EntityId, point: EntityId): PerpendicularLine {
  return { kind: `perpendicular`, line, point };
}

// ============================================================================
// Circles
// ============================================================================

export function centerRadius(center: EntityId, radiusPoint: EntityId): CenterRadiusCircle {
  return { kind: `centerRadius`, center, radiusPoint };
}

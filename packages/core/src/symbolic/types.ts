/**
 * Symbolic Definitions
 *
 * An entity's geometry is not stored as coordinates but as a relationship to
 * other entities: the midpoint of two points, the intersection of two lines,
 * a point on a circle at a given angle, and so on. This module defines those
 * relationships and the helpers that read the references out of them.
 *
 * Every `kind` is unique across points, lines and circles, so a definition on
 * its own tells which geometry type it resolves to.
 */

import type { Vec2 } from '../num/vec2.js';
import type { GeometryKind } from '../geom/shapes.js';

// ============================================================================
// Branded IDs
// ============================================================================

/**
 * Opaque identifier of a geometric entity, owned by the authoring layer
 */
export type EntityId = number & { __brand: 'EntityId' };

/**
 * Cast a number to an EntityId
 * @internal
 */
export function asEntityId(id: number): EntityId {
  return id as EntityId;
}

// ============================================================================
// Points
// ============================================================================

/**
 * Which of two intersection solutions to take when the entity has never been
 * resolved before. Index into the canonical solution order.
 */
export type BranchSelector = 0 | 1;

export interface FixedPoint {
  kind: `fixed`;
  position: Vec2;
}

/**
 * Like a fixed point, but the authoring layer may move it (dragging)
 */
export interface FreePoint {
  kind: `free`;
  position: Vec2;
}

export interface MidPoint {
  kind: `midPoint`;
  a: EntityId;
  b: EntityId;
}

/**
 * Point at parameter t along a line
 *
 * For full lines and rays t is a distance along the direction; for segments
 * it is a fraction of the segment length.
 */
export interface OnLinePoint {
  kind: `onLine`;
  line: EntityId;
  t: number;
}

export interface LineLineIntersectPoint {
  kind: `lineLineIntersect`;
  line1: EntityId;
  line2: EntityId;
}

export interface OnCirclePoint {
  kind: `onCircle`;
  circle: EntityId;
  /** Angle in radians from +x */
  angle: number;
}

export interface CircleLineIntersectPoint {
  kind: `circleLineIntersect`;
  circle: EntityId;
  line: EntityId;
  branch: BranchSelector;
}

export interface CircleCircleIntersectPoint {
  kind: `circleCircleIntersect`;
  circle1: EntityId;
  circle2: EntityId;
  branch: BranchSelector;
}

export type SymbolicPoint =
  | FixedPoint
  | FreePoint
  | MidPoint
  | OnLinePoint
  | LineLineIntersectPoint
  | OnCirclePoint
  | CircleLineIntersectPoint
  | CircleCircleIntersectPoint;

// ============================================================================
// Lines
// ============================================================================

/**
 * Line through two points; `straight` is infinite, `ray` starts at p1,
 * `segment` runs from p1 to p2
 */
export interface TwoPointLine {
  kind: `straight` | `ray` | `segment`;
  p1: EntityId;
  p2: EntityId;
}

export interface ParallelLine {
  kind: `parallel`;
  line: EntityId;
  point: EntityId;
}

export interface PerpendicularLine {
  kind: `perpendicular`;
  line: EntityId;
  point: EntityId;
}

export type SymbolicLine = TwoPointLine | ParallelLine | PerpendicularLine;

// ============================================================================
// Circles
// ============================================================================

/**
 * Circle around `center` passing through `radiusPoint`
 */
export interface CenterRadiusCircle {
  kind: `centerRadius`;
  center: EntityId;
  radiusPoint: EntityId;
}

export type SymbolicCircle = CenterRadiusCircle;

export type SymbolicDefinition = SymbolicPoint | SymbolicLine | SymbolicCircle;

export type SymbolicKind = SymbolicDefinition['kind'];

// ============================================================================
// Definition Helpers
// ============================================================================

/**
 * Geometry type a definition resolves to
 */
export function geometryTypeOf(def: SymbolicDefinition): GeometryKind {
  switch (def.kind) {
    case `fixed`:
    case `free`:
    case `midPoint`:
    case `onLine`:
    case `lineLineIntersect`:
    case `onCircle`:
    case `circleLineIntersect`:
    case `circleCircleIntersect`:
      return `point`;
    case `straight`:
    case `ray`:
    case `segment`:
    case `parallel`:
    case `perpendicular`:
      return `line`;
    case `centerRadius`:
      return `circle`;
  }
}

/**
 * Entities a definition refers to, in declaration order
 *
 * Duplicates are kept: `midPoint(a, a)` references `a` twice.
 */
export function getReferences(def: SymbolicDefinition): EntityId[] {
  switch (def.kind) {
    case `fixed`:
    case `free`:
      return [];
    case `midPoint`:
      return [def.a, def.b];
    case `onLine`:
      return [def.line];
    case `lineLineIntersect`:
      return [def.line1, def.line2];
    case `onCircle`:
      return [def.circle];
    case `circleLineIntersect`:
      return [def.circle, def.line];
    case `circleCircleIntersect`:
      return [def.circle1, def.circle2];
    case `straight`:
    case `ray`:
    case `segment`:
      return [def.p1, def.p2];
    case `parallel`:
    case `perpendicular`:
      return [def.line, def.point];
    case `centerRadius`:
      return [def.center, def.radiusPoint];
  }
}

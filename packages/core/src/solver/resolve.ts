/**
 * Definition Resolution
 *
 * Turns one symbolic definition into concrete geometry. Resolution is a pure
 * function of the definition, the current values of the entities it
 * references, and the entity's own previous position (for branch continuity).
 * Nothing here mutates state; the Solver decides what to store.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, sub2, mul2, length2, midpoint2, fromAngle2, perp2, dist2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import { isZero } from '../num/tolerance.js';
import type { Geometry, Line, Circle } from '../geom/shapes.js';
import { point, line, circle, evalLine, FULL, RAY, segmentExtent } from '../geom/shapes.js';
import { intersectLineLine, intersectCircleLine, intersectCircleCircle } from '../geom/intersect2d.js';
import type {
  EntityId,
  SymbolicDefinition,
  SymbolicPoint,
  SymbolicLine,
  SymbolicCircle,
} from '../symbolic/types.js';
import type { ResolveResult } from './types.js';
import { resolved, invalid } from './types.js';
import { canonicalCircleLineOrder, canonicalCircleCircleOrder, selectBranch } from './branch.js';

/**
 * Current value of a referenced entity
 *
 * - `undefined`: the entity is unknown (dangling reference)
 * - `null`: the entity exists but is invalid
 */
export type GeometryLookup = (entity: EntityId) => Geometry | null | undefined;

// ============================================================================
// Typed Lookups
// ============================================================================

function lookupGeometry(lookup: GeometryLookup, entity: EntityId): ResolveResult<Geometry> {
  const g = lookup(entity);
  if (g === undefined) return invalid('missingDependency');
  if (g === null) return invalid('invalidDependency');
  return resolved(g);
}

function lookupPoint(lookup: GeometryLookup, entity: EntityId): ResolveResult<Vec2> {
  const r = lookupGeometry(lookup, entity);
  if (!r.ok) return r;
  return r.value.kind === 'point' ? resolved(r.value.position) : invalid('typeMismatch');
}

function lookupLine(lookup: GeometryLookup, entity: EntityId): ResolveResult<Line> {
  const r = lookupGeometry(lookup, entity);
  if (!r.ok) return r;
  return r.value.kind === 'line' ? resolved(r.value) : invalid('typeMismatch');
}

function lookupCircle(lookup: GeometryLookup, entity: EntityId): ResolveResult<Circle> {
  const r = lookupGeometry(lookup, entity);
  if (!r.ok) return r;
  return r.value.kind === 'circle' ? resolved(r.value) : invalid('typeMismatch');
}

// ============================================================================
// Points
// ============================================================================

/**
 * Resolve a point definition to a position
 */
export function resolvePoint(
  def: SymbolicPoint,
  lookup: GeometryLookup,
  hint: Vec2 | null,
  ctx: NumericContext
): ResolveResult<Vec2> {
  switch (def.kind) {
    case 'fixed':
    case 'free':
      // Copied so the stored value never aliases the caller's vector
      return resolved([def.position[0], def.position[1]]);

    case 'midPoint': {
      const a = lookupPoint(lookup, def.a);
      if (!a.ok) return a;
      const b = lookupPoint(lookup, def.b);
      if (!b.ok) return b;
      return resolved(midpoint2(a.value, b.value));
    }

    case 'onLine': {
      const l = lookupLine(lookup, def.line);
      if (!l.ok) return l;
      const s = l.value.extent.kind === 'segment' ? def.t * l.value.extent.length : def.t;
      return resolved(evalLine(l.value, s));
    }

    case 'lineLineIntersect': {
      const l1 = lookupLine(lookup, def.line1);
      if (!l1.ok) return l1;
      const l2 = lookupLine(lookup, def.line2);
      if (!l2.ok) return l2;
      const p = intersectLineLine(l1.value, l2.value, ctx);
      return p ? resolved(p) : invalid('parallel');
    }

    case 'onCircle': {
      const c = lookupCircle(lookup, def.circle);
      if (!c.ok) return c;
      return resolved(add2(c.value.center, mul2(fromAngle2(def.angle), c.value.radius)));
    }

    case 'circleLineIntersect': {
      const c = lookupCircle(lookup, def.circle);
      if (!c.ok) return c;
      const l = lookupLine(lookup, def.line);
      if (!l.ok) return l;
      const solutions = intersectCircleLine(c.value, l.value, ctx);
      if (solutions.length === 0) return invalid('noIntersection');
      const ordered = canonicalCircleLineOrder(solutions, l.value);
      return resolved(selectBranch(ordered, def.branch, hint));
    }

    case 'circleCircleIntersect': {
      const c1 = lookupCircle(lookup, def.circle1);
      if (!c1.ok) return c1;
      const c2 = lookupCircle(lookup, def.circle2);
      if (!c2.ok) return c2;
      const solutions = intersectCircleCircle(c1.value, c2.value, ctx);
      if (solutions.length === 0) return invalid('noIntersection');
      const ordered = canonicalCircleCircleOrder(solutions, c1.value, c2.value);
      return resolved(selectBranch(ordered, def.branch, hint));
    }
  }
}

// ============================================================================
// Lines
// ============================================================================

/**
 * Resolve a line definition
 */
export function resolveLine(
  def: SymbolicLine,
  lookup: GeometryLookup,
  ctx: NumericContext
): ResolveResult<Line> {
  switch (def.kind) {
    case 'straight':
    case 'ray':
    case 'segment': {
      const p1 = lookupPoint(lookup, def.p1);
      if (!p1.ok) return p1;
      const p2 = lookupPoint(lookup, def.p2);
      if (!p2.ok) return p2;
      const delta = sub2(p2.value, p1.value);
      const length = length2(delta);
      if (isZero(length, ctx)) return invalid('degenerate');
      const extent =
        def.kind === 'straight' ? FULL : def.kind === 'ray' ? RAY : segmentExtent(length);
      return resolved(line(p1.value, delta, extent));
    }

    case 'parallel':
    case 'perpendicular': {
      const ref = lookupLine(lookup, def.line);
      if (!ref.ok) return ref;
      const through = lookupPoint(lookup, def.point);
      if (!through.ok) return through;
      const direction = def.kind === 'parallel' ? ref.value.direction : perp2(ref.value.direction);
      return resolved(line(through.value, direction, FULL));
    }
  }
}

// ============================================================================
// Circles
// ============================================================================

/**
 * Resolve a circle definition
 */
export function resolveCircle(
  def: SymbolicCircle,
  lookup: GeometryLookup,
  ctx: NumericContext
): ResolveResult<Circle> {
  const center = lookupPoint(lookup, def.center);
  if (!center.ok) return center;
  const through = lookupPoint(lookup, def.radiusPoint);
  if (!through.ok) return through;
  const radius = dist2(center.value, through.value);
  if (isZero(radius, ctx)) return invalid('degenerate');
  return resolved(circle(center.value, radius));
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Resolve any definition to geometry
 *
 * @param def The definition to resolve
 * @param lookup Current values of other entities
 * @param hint The entity's previous position (points only), for branch continuity
 * @param ctx Numeric context for tolerance
 */
export function resolveDefinition(
  def: SymbolicDefinition,
  lookup: GeometryLookup,
  hint: Vec2 | null,
  ctx: NumericContext
): ResolveResult<Geometry> {
  switch (def.kind) {
    case 'straight':
    case 'ray':
    case 'segment':
    case 'parallel':
    case 'perpendicular':
      return resolveLine(def, lookup, ctx);
    case 'centerRadius':
      return resolveCircle(def, lookup, ctx);
    default: {
      const p = resolvePoint(def, lookup, hint, ctx);
      return p.ok ? resolved(point(p.value)) : p;
    }
  }
}

/**
 * @symgeo/core - symbolic 2D geometry engine
 *
 * Entities (points, lines, circles) are defined by relationships to other
 * entities and resolved to coordinates once per frame:
 *
 * ## Primary API
 * - GeometryEngine: event intake, per-frame solve, spatial hit-testing
 * - Definition creators: midPoint, segment, centerRadius, ...
 *
 * ## Internal Modules (for advanced use)
 * - num: vectors, tolerances, predicates
 * - geom: resolved shapes, intersections, viewport transform
 * - graph: dependency graph and recompute order
 * - solver: definition resolution and the resolved-geometry store
 * - spatial: tile-based spatial hash in actual space
 */

// =============================================================================
// Engine
// =============================================================================
export {
  GeometryEngine,
  DEFAULT_ENGINE_OPTIONS,
  type EngineOptions,
  type FrameResult,
} from './engine/GeometryEngine.js';

export {
  GeometryEventQueue,
  inserted,
  removed,
  modified,
  type GeometryEvent,
  type InsertedEvent,
  type RemovedEvent,
  type ModifiedEvent,
} from './engine/events.js';

// =============================================================================
// Symbolic definitions
// =============================================================================
export type {
  EntityId,
  BranchSelector,
  SymbolicDefinition,
  SymbolicPoint,
  SymbolicLine,
  SymbolicCircle,
  SymbolicKind,
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
} from './symbolic/types.js';

export { asEntityId, geometryTypeOf, getReferences } from './symbolic/types.js';

export {
  fixedPoint,
  freePoint,
  midPoint,
  onLine,
  lineLineIntersect,
  onCircle,
  circleLineIntersect,
  circleCircleIntersect,
  straightLine,
  ray,
  segment,
  parallelLine,
  perpendicularLine,
  centerRadius,
} from './symbolic/definitions.js';

export {
  IdAllocator,
  getGlobalAllocator,
  resetAllIds,
  allocateEntityIdGlobal,
} from './symbolic/idAllocator.js';

// =============================================================================
// Resolved geometry and viewport
// =============================================================================

// Numeric types and utilities
export { vec2, type Vec2 } from './num/vec2.js';
export { type NumericContext, createNumericContext, type Tolerances, DEFAULT_TOLERANCES } from './num/tolerance.js';

export {
  point,
  line,
  circle,
  FULL,
  RAY,
  segmentExtent,
  distanceToGeometry,
  geometryEquals,
  type Geometry,
  type GeometryKind,
  type PointGeometry,
  type Line,
  type Circle,
  type LineExtent,
} from './geom/shapes.js';

export { aabb, type AABB } from './geom/aabb.js';

export {
  Viewport,
  geometryToActual,
  type ViewportTransform,
} from './geom/viewport.js';

// =============================================================================
// Building blocks
// =============================================================================
export { DependencyGraph, linkDefinition, unlinkDefinition } from './graph/DependencyGraph.js';

export { Solver } from './solver/Solver.js';
export {
  resolveDefinition,
  resolvePoint,
  resolveLine,
  resolveCircle,
  type GeometryLookup,
} from './solver/resolve.js';
export type {
  InvalidReason,
  ResolveResult,
  ResolvedUpdate,
  SolverOptions,
} from './solver/types.js';

export {
  SpatialHashTable,
  DEFAULT_SPATIAL_HASH_OPTIONS,
  type SpatialHashOptions,
} from './spatial/SpatialHashTable.js';

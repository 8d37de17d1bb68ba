/**
 * Solver Types
 */

import type { Vec2 } from '../num/vec2.js';
import type { Tolerances } from '../num/tolerance.js';
import type { Geometry } from '../geom/shapes.js';
import type { EntityId, SymbolicDefinition } from '../symbolic/types.js';

// ============================================================================
// Resolution Results
// ============================================================================

/**
 * Why an entity currently has no resolved value
 */
export type InvalidReason =
  | 'missingDependency'  // A referenced entity does not exist (dangling)
  | 'invalidDependency'  // A referenced entity is itself invalid
  | 'typeMismatch'       // A referenced entity resolves to the wrong geometry type
  | 'parallel'           // Line-line intersection of parallel lines
  | 'noIntersection'     // Circle intersection with zero solutions
  | 'degenerate';        // Coincident defining points or zero radius

/**
 * Result of resolving one definition
 *
 * Degenerate constructions are ordinary outcomes, not exceptions:
 * ```ts
 * const result = resolveDefinition(def, lookup, hint, ctx);
 * if (result.ok) {
 *   store(result.value);
 * } else {
 *   markInvalid(result.reason);
 * }
 * ```
 */
export type ResolveResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: InvalidReason };

export function resolved<T>(value: T): ResolveResult<T> {
  return { ok: true, value };
}

export function invalid<T>(reason: InvalidReason): ResolveResult<T> {
  return { ok: false, reason };
}

// ============================================================================
// Store Records
// ============================================================================

/**
 * Everything the solver knows about one entity
 */
export interface ResolvedRecord {
  entity: EntityId;
  definition: SymbolicDefinition;
  /** Current value, or null while the entity is invalid */
  geometry: Geometry | null;
  invalidReason: InvalidReason | null;
  /**
   * Last successfully resolved position of a point entity. Kept through
   * invalid periods so intersection branches stay continuous.
   */
  hint: Vec2 | null;
}

/**
 * A change to an entity's resolved state produced by one solve pass
 */
export interface ResolvedUpdate {
  entity: EntityId;
  /** New value, or null if the entity became invalid */
  geometry: Geometry | null;
  invalidReason: InvalidReason | null;
}

// ============================================================================
// Options
// ============================================================================

export interface SolverOptions {
  /** Tolerances for zero tests (default: DEFAULT_TOLERANCES) */
  tolerances?: Partial<Tolerances>;
  /** Enable verbose logging */
  verbose?: boolean;
}

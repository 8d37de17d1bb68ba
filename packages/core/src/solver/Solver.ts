/**
 * Solver - symbolic to concrete resolution
 *
 * Owns the resolved-geometry store and is its only writer. Given a set of
 * changed entities it walks the dependency graph's recompute order and
 * re-resolves every entity in it, dependencies first.
 *
 * Validity is evaluated fresh on every pass: an entity whose inputs are
 * invalid is itself invalid, and it recovers on the first pass after its
 * inputs do.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext } from '../num/tolerance.js';
import type { Geometry, Line, Circle } from '../geom/shapes.js';
import { geometryEquals } from '../geom/shapes.js';
import type { DependencyGraph } from '../graph/DependencyGraph.js';
import type { EntityId, SymbolicDefinition } from '../symbolic/types.js';
import type { InvalidReason, ResolvedRecord, ResolvedUpdate, SolverOptions } from './types.js';
import type { GeometryLookup } from './resolve.js';
import { resolveDefinition } from './resolve.js';

export class Solver {
  private readonly graph: DependencyGraph;
  private readonly records = new Map<EntityId, ResolvedRecord>();
  private readonly ctx: NumericContext;
  private readonly verbose: boolean;
  private readonly lookup: GeometryLookup;

  constructor(graph: DependencyGraph, options?: SolverOptions) {
    this.graph = graph;
    this.ctx = createNumericContext(options?.tolerances);
    this.verbose = options?.verbose ?? false;
    this.lookup = (entity) => {
      const record = this.records.get(entity);
      return record ? record.geometry : undefined;
    };
  }

  // ==========================================================================
  // Definitions
  // ==========================================================================

  /**
   * Register an entity's definition. It stays unresolved until the next solve().
   */
  define(entity: EntityId, definition: SymbolicDefinition): void {
    if (this.records.has(entity)) {
      throw new Error(`Entity ${entity} is already defined`);
    }
    this.records.set(entity, {
      entity,
      definition,
      geometry: null,
      invalidReason: null,
      hint: null,
    });
  }

  /**
   * Drop an entity and its resolved value
   */
  undefine(entity: EntityId): boolean {
    return this.records.delete(entity);
  }

  /**
   * Move a free point. Takes effect on the next solve().
   */
  setFreePosition(entity: EntityId, position: Vec2): void {
    const record = this.records.get(entity);
    if (!record) {
      throw new Error(`Cannot move unknown entity ${entity}`);
    }
    if (record.definition.kind !== 'free') {
      throw new Error(`Entity ${entity} is a ${record.definition.kind} point, only free points can be moved`);
    }
    record.definition = { kind: 'free', position: [position[0], position[1]] };
  }

  // ==========================================================================
  // Solving
  // ==========================================================================

  /**
   * Re-resolve the changed entities and everything that depends on them
   *
   * @returns One update per entity whose value or validity changed, in recompute order
   */
  solve(changed: Iterable<EntityId>): ResolvedUpdate[] {
    const order = this.graph.recomputeOrder(changed);
    const updates: ResolvedUpdate[] = [];

    for (const entity of order) {
      const record = this.records.get(entity);
      if (!record) {
        // Removed this frame; dependents see it as missing
        continue;
      }

      const result = resolveDefinition(record.definition, this.lookup, record.hint, this.ctx);
      const geometry = result.ok ? result.value : null;
      const invalidReason = result.ok ? null : result.reason;

      const changedValue = !geometryEquals(record.geometry, geometry);
      const changedReason = record.invalidReason !== invalidReason;

      record.geometry = geometry;
      record.invalidReason = invalidReason;
      if (geometry?.kind === 'point') {
        record.hint = geometry.position;
      }

      if (changedValue || changedReason) {
        updates.push({ entity, geometry, invalidReason });
        if (this.verbose && invalidReason) {
          console.log(`[Solver] entity ${entity} (${record.definition.kind}) invalid: ${invalidReason}`);
        }
      }
    }

    if (this.verbose) {
      console.log(`[Solver] resolved ${order.length} entities, ${updates.length} changed`);
    }
    return updates;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  has(entity: EntityId): boolean {
    return this.records.has(entity);
  }

  getDefinition(entity: EntityId): SymbolicDefinition | undefined {
    return this.records.get(entity)?.definition;
  }

  /**
   * Current value, or null if the entity is invalid or unknown
   */
  getGeometry(entity: EntityId): Geometry | null {
    return this.records.get(entity)?.geometry ?? null;
  }

  getPoint(entity: EntityId): Vec2 | null {
    const g = this.getGeometry(entity);
    return g?.kind === 'point' ? g.position : null;
  }

  getLine(entity: EntityId): Line | null {
    const g = this.getGeometry(entity);
    return g?.kind === 'line' ? g : null;
  }

  getCircle(entity: EntityId): Circle | null {
    const g = this.getGeometry(entity);
    return g?.kind === 'circle' ? g : null;
  }

  isValid(entity: EntityId): boolean {
    return this.getGeometry(entity) !== null;
  }

  getInvalidReason(entity: EntityId): InvalidReason | null {
    return this.records.get(entity)?.invalidReason ?? null;
  }

  /**
   * All defined entities, in definition order
   */
  entities(): EntityId[] {
    return Array.from(this.records.keys());
  }
}

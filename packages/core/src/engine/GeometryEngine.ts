/**
 * GeometryEngine - per-frame driver
 *
 * Ties the three core components together. Once per frame, tick():
 *
 * 1. drains the inbound event queue in emission order, updating dependency
 *    edges and the solver's definitions, and collects the entities to recompute;
 * 2. solves them and everything downstream, in dependency order;
 * 3. refreshes the spatial hash for every entity whose value changed.
 *
 * The steps never interleave, so readers between frames only ever see the
 * fully settled result of the previous tick.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Tolerances } from '../num/tolerance.js';
import type { AABB } from '../geom/aabb.js';
import type { Geometry } from '../geom/shapes.js';
import { distanceToGeometry } from '../geom/shapes.js';
import type { ViewportTransform } from '../geom/viewport.js';
import { geometryToActual } from '../geom/viewport.js';
import type { EntityId, SymbolicDefinition, SymbolicKind } from '../symbolic/types.js';
import { getReferences } from '../symbolic/types.js';
import { DependencyGraph, linkDefinition, unlinkDefinition } from '../graph/DependencyGraph.js';
import { Solver } from '../solver/Solver.js';
import type { ResolvedUpdate } from '../solver/types.js';
import { SpatialHashTable, DEFAULT_SPATIAL_HASH_OPTIONS } from '../spatial/SpatialHashTable.js';
import type { GeometryEvent } from './events.js';
import { GeometryEventQueue, inserted, removed, modified } from './events.js';

/**
 * Options for the engine
 */
export interface EngineOptions {
  /** Spatial hash tile edge length in pixels (default: 40) */
  tileSize?: number;
  /** Tolerances for the solver's zero tests */
  tolerances?: Partial<Tolerances>;
  /** Enable verbose logging in the engine and its components */
  verbose?: boolean;
}

export const DEFAULT_ENGINE_OPTIONS: Required<Omit<EngineOptions, 'tolerances'>> = {
  tileSize: DEFAULT_SPATIAL_HASH_OPTIONS.tileSize,
  verbose: false,
};

/**
 * Outcome of one frame
 */
export interface FrameResult {
  /** Entities whose value or validity changed, in recompute order */
  updates: ResolvedUpdate[];
  /** Entities removed this frame */
  removed: EntityId[];
}

export class GeometryEngine {
  readonly graph: DependencyGraph;
  readonly solver: Solver;
  readonly spatial: SpatialHashTable<EntityId>;
  private readonly queue = new GeometryEventQueue();
  private readonly verbose: boolean;
  private viewport: ViewportTransform;

  constructor(viewport: ViewportTransform, options?: EngineOptions) {
    this.verbose = options?.verbose ?? DEFAULT_ENGINE_OPTIONS.verbose;
    this.graph = new DependencyGraph();
    this.solver = new Solver(this.graph, {
      tolerances: options?.tolerances,
      verbose: this.verbose,
    });
    this.spatial = new SpatialHashTable<EntityId>({
      tileSize: options?.tileSize ?? DEFAULT_ENGINE_OPTIONS.tileSize,
      verbose: this.verbose,
    });
    this.viewport = viewport;
    this.spatial.initViewport(viewport);
  }

  // ==========================================================================
  // Inbound Changes
  // ==========================================================================

  /**
   * Queue events for the next tick
   */
  submit(...events: GeometryEvent[]): void {
    this.queue.push(...events);
  }

  insert(entity: EntityId, definition: SymbolicDefinition): void {
    this.submit(inserted(entity, definition));
  }

  remove(entity: EntityId, definition: SymbolicDefinition): void {
    this.submit(removed(entity, definition));
  }

  /**
   * Queue a move of a free point
   */
  move(entity: EntityId, position: Vec2): void {
    this.submit(modified(entity, position));
  }

  get pendingEvents(): number {
    return this.queue.size;
  }

  // ==========================================================================
  // Frame
  // ==========================================================================

  /**
   * Process every queued event and settle the geometry
   *
   * A batch containing an event that cannot apply is rejected whole: the
   * error is thrown before any event of the batch touches the graph or the
   * solver, and the batch is dropped from the queue.
   */
  tick(): FrameResult {
    const events = this.queue.drain();
    this.validateBatch(events);

    const seed = new Set<EntityId>();
    const removedEntities: EntityId[] = [];

    for (const event of events) {
      switch (event.type) {
        case 'inserted':
          this.applyInsert(event.entity, event.definition);
          seed.add(event.entity);
          break;
        case 'removed':
          // Dependents lose an input; re-evaluate them so they turn invalid
          for (const dependent of this.graph.dependentsOf(event.entity)) {
            seed.add(dependent);
          }
          this.applyRemove(event.entity, event.definition);
          seed.delete(event.entity);
          removedEntities.push(event.entity);
          break;
        case 'modified':
          this.solver.setFreePosition(event.entity, event.position);
          seed.add(event.entity);
          break;
      }
    }

    const updates = this.solver.solve(seed);

    for (const entity of removedEntities) {
      this.spatial.removeFromAll(entity);
    }
    for (const update of updates) {
      this.spatial.removeFromAll(update.entity);
      if (update.geometry) {
        this.spatial.insertGeometry(update.entity, update.geometry, this.viewport);
      }
    }

    if (this.verbose && events.length > 0) {
      console.log(`[Engine] ${events.length} events, ${updates.length} updates, ${removedEntities.length} removed`);
    }
    return { updates, removed: removedEntities };
  }

  /**
   * Replay the batch against the known entity kinds without mutating anything
   */
  private validateBatch(events: GeometryEvent[]): void {
    // Kinds as of the event being checked; null once removed in this batch
    const pending = new Map<EntityId, SymbolicKind | null>();
    const kindOf = (entity: EntityId): SymbolicKind | null => {
      const kind = pending.get(entity);
      if (kind !== undefined) return kind;
      return this.solver.getDefinition(entity)?.kind ?? null;
    };

    for (const event of events) {
      const entity = event.entity;
      switch (event.type) {
        case 'inserted':
          if (kindOf(entity) !== null) {
            throw new Error(`Entity ${entity} is already defined`);
          }
          for (const reference of getReferences(event.definition)) {
            if (kindOf(reference) === null) {
              throw new Error(`Entity ${entity} references unknown entity ${reference}`);
            }
          }
          pending.set(entity, event.definition.kind);
          break;
        case 'removed':
          if (kindOf(entity) === null) {
            throw new Error(`Cannot remove unknown entity ${entity}`);
          }
          pending.set(entity, null);
          break;
        case 'modified': {
          const kind = kindOf(entity);
          if (kind === null) {
            throw new Error(`Cannot move unknown entity ${entity}`);
          }
          if (kind !== 'free') {
            throw new Error(`Entity ${entity} is a ${kind} point, only free points can be moved`);
          }
          break;
        }
      }
    }
  }

  private applyInsert(entity: EntityId, definition: SymbolicDefinition): void {
    this.solver.define(entity, definition);
    linkDefinition(this.graph, entity, definition);
  }

  private applyRemove(entity: EntityId, definition: SymbolicDefinition): void {
    this.graph.remove(entity);
    unlinkDefinition(this.graph, entity, definition);
    this.solver.undefine(entity);
  }

  // ==========================================================================
  // Viewport
  // ==========================================================================

  getViewport(): ViewportTransform {
    return this.viewport;
  }

  /**
   * Switch to a new viewport and rebuild the spatial hash from the settled geometry
   *
   * The grid is resized only when the pixel size changed; any pan or zoom
   * still moves every shape in actual space, so all entities are re-inserted.
   */
  setViewport(viewport: ViewportTransform): void {
    const resized =
      viewport.actualWidth !== this.viewport.actualWidth ||
      viewport.actualHeight !== this.viewport.actualHeight;
    this.viewport = viewport;
    if (resized) {
      this.spatial.initViewport(viewport);
    } else {
      this.spatial.clear();
    }
    for (const entity of this.solver.entities()) {
      const geometry = this.solver.getGeometry(entity);
      if (geometry) {
        this.spatial.insertGeometry(entity, geometry, viewport);
      }
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getGeometry(entity: EntityId): Geometry | null {
    return this.solver.getGeometry(entity);
  }

  isValid(entity: EntityId): boolean {
    return this.solver.isValid(entity);
  }

  /**
   * Entities near a virtual-space point, or null if it is off the surface
   */
  neighborsOfPoint(p: Vec2): EntityId[] | null {
    return this.spatial.getNeighborEntitiesOfPoint(p, this.viewport);
  }

  /**
   * Entities in the tiles an actual-space box overlaps
   */
  neighborsOfAabb(box: AABB): Set<EntityId> {
    return this.spatial.getNeighborEntitiesOfAabb(box);
  }

  /**
   * Hit-test: the entity whose drawn shape is closest to an actual-space point
   *
   * Only entities in the 3x3 tile neighbourhood are considered, so
   * maxDistance should not exceed the tile size.
   *
   * @param actual Point in pixels
   * @param maxDistance Largest accepted distance in pixels
   */
  pick(actual: Vec2, maxDistance: number): EntityId | null {
    const candidates = this.spatial.getNeighborEntitiesOfActualPoint(actual);
    if (!candidates) return null;

    let best: EntityId | null = null;
    let bestDistance = maxDistance;
    for (const entity of candidates) {
      const geometry = this.solver.getGeometry(entity);
      if (!geometry) continue;
      const d = distanceToGeometry(geometryToActual(geometry, this.viewport), actual);
      if (d <= bestDistance) {
        // Equal distances: first candidate wins
        if (best !== null && d === bestDistance) continue;
        best = entity;
        bestDistance = d;
      }
    }
    return best;
  }
}

/**
 * Dependency Graph
 *
 * Records, for every entity, the set of entities whose symbolic definition
 * names it (its dependents). Edges are added when a definition is inserted
 * and removed when it is removed, one edge per reference, so the graph always
 * mirrors the live definitions.
 *
 * Definitions may only reference entities that already exist, which keeps the
 * graph acyclic by construction. The traversal still checks: a cycle means the
 * edges were built wrong and the traversal throws instead of looping.
 */

import type { EntityId, SymbolicDefinition } from '../symbolic/types.js';
import { getReferences } from '../symbolic/types.js';

export class DependencyGraph {
  /** entity -> entities that depend on it */
  private readonly dependents = new Map<EntityId, Set<EntityId>>();

  /**
   * Record that `dependent` is derived from `dependency`. Idempotent.
   */
  add(dependency: EntityId, dependent: EntityId): void {
    if (dependency === dependent) {
      throw new Error(`Entity ${dependency} cannot depend on itself`);
    }
    let set = this.dependents.get(dependency);
    if (!set) {
      set = new Set();
      this.dependents.set(dependency, set);
    }
    set.add(dependent);
  }

  /**
   * Delete the entity's own dependent set
   *
   * The entity stays in other entities' dependent sets until
   * removeDependent() is called for each reference it held.
   */
  remove(entity: EntityId): void {
    this.dependents.delete(entity);
  }

  /**
   * Remove one edge
   */
  removeDependent(dependency: EntityId, dependent: EntityId): void {
    const set = this.dependents.get(dependency);
    if (!set) return;
    set.delete(dependent);
    if (set.size === 0) {
      this.dependents.delete(dependency);
    }
  }

  /**
   * Direct dependents of an entity
   */
  dependentsOf(entity: EntityId): ReadonlySet<EntityId> {
    return this.dependents.get(entity) ?? EMPTY;
  }

  /**
   * Whether the entity has any dependents
   */
  has(entity: EntityId): boolean {
    return this.dependents.has(entity);
  }

  /**
   * Number of entities with at least one dependent
   */
  get size(): number {
    return this.dependents.size;
  }

  /**
   * Everything that must be recomputed when `seed` changes, dependencies first
   *
   * Returns the seed entities and every entity reachable from them along
   * dependent edges, each exactly once, topologically ordered over the
   * reachable subgraph. Plain level order is not enough: with edges
   * a→c, a→b, b→c a BFS would emit c before b.
   */
  recomputeOrder(seed: Iterable<EntityId>): EntityId[] {
    // Collect the reachable set
    const reachable = new Set<EntityId>();
    const queue: EntityId[] = [];
    for (const entity of seed) {
      if (!reachable.has(entity)) {
        reachable.add(entity);
        queue.push(entity);
      }
    }
    for (let head = 0; head < queue.length; head++) {
      for (const dependent of this.dependentsOf(queue[head])) {
        if (!reachable.has(dependent)) {
          reachable.add(dependent);
          queue.push(dependent);
        }
      }
    }

    // In-degrees restricted to the reachable subgraph
    const inDegree = new Map<EntityId, number>();
    for (const entity of reachable) {
      inDegree.set(entity, inDegree.get(entity) ?? 0);
      for (const dependent of this.dependentsOf(entity)) {
        inDegree.set(dependent, (inDegree.get(dependent) ?? 0) + 1);
      }
    }

    // Kahn's algorithm, seeded in discovery order for a stable result
    const order: EntityId[] = [];
    const ready = queue.filter(entity => inDegree.get(entity) === 0);
    for (let head = 0; head < ready.length; head++) {
      const entity = ready[head];
      order.push(entity);
      for (const dependent of this.dependentsOf(entity)) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length !== reachable.size) {
      const stuck = [...reachable].filter(entity => (inDegree.get(entity) ?? 0) > 0);
      throw new Error(`Dependency cycle detected among entities [${stuck.join(', ')}]`);
    }
    return order;
  }
}

const EMPTY: ReadonlySet<EntityId> = new Set();

// ============================================================================
// Definition Links
// ============================================================================

/**
 * Add one edge per reference of an inserted definition
 */
export function linkDefinition(
  graph: DependencyGraph,
  entity: EntityId,
  def: SymbolicDefinition
): void {
  for (const dependency of getReferences(def)) {
    graph.add(dependency, entity);
  }
}

/**
 * Remove the edges linkDefinition() added for the same definition
 */
export function unlinkDefinition(
  graph: DependencyGraph,
  entity: EntityId,
  def: SymbolicDefinition
): void {
  for (const dependency of getReferences(def)) {
    graph.removeDependent(dependency, entity);
  }
}

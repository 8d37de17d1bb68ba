/**
 * Geometry change events
 *
 * The authoring layer describes edits as an ordered stream of events. The
 * engine buffers them in a GeometryEventQueue and drains the queue once per
 * frame, in emission order.
 */

import type { Vec2 } from '../num/vec2.js';
import type { EntityId, SymbolicDefinition } from '../symbolic/types.js';

export interface InsertedEvent {
  type: 'inserted';
  entity: EntityId;
  definition: SymbolicDefinition;
}

/**
 * Carries the definition being removed so its edges can be unlinked
 */
export interface RemovedEvent {
  type: 'removed';
  entity: EntityId;
  definition: SymbolicDefinition;
}

/**
 * Direct edit of a free point's coordinate
 */
export interface ModifiedEvent {
  type: 'modified';
  entity: EntityId;
  position: Vec2;
}

export type GeometryEvent = InsertedEvent | RemovedEvent | ModifiedEvent;

export function inserted(entity: EntityId, definition: SymbolicDefinition): InsertedEvent {
  return { type: 'inserted', entity, definition };
}

export function removed(entity: EntityId, definition: SymbolicDefinition): RemovedEvent {
  return { type: 'removed', entity, definition };
}

export function modified(entity: EntityId, position: Vec2): ModifiedEvent {
  return { type: 'modified', entity, position };
}

/**
 * FIFO buffer between the authoring layer and the engine
 *
 * Events pushed while a frame is being processed wait for the next drain.
 */
export class GeometryEventQueue {
  private pending: GeometryEvent[] = [];

  push(...events: GeometryEvent[]): void {
    this.pending.push(...events);
  }

  /**
   * Take every pending event, oldest first
   */
  drain(): GeometryEvent[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  get size(): number {
    return this.pending.length;
  }
}

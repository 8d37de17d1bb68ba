/**
 * ID Allocator
 *
 * Entity ids belong to the authoring layer; the engine never invents them.
 * This allocator is the convenience the authoring layer (and the tests) use
 * to hand out fresh ids:
 *
 * 1. Test isolation - tests can reset IDs to avoid cross-test interference
 * 2. Multi-document support - each document can own an IdAllocator instance
 *
 * Tests should call resetAllIds() in beforeEach.
 */

import type { EntityId } from './types.js';
import { asEntityId } from './types.js';

/**
 * Allocator for entity IDs
 */
export class IdAllocator {
  private _nextEntityId: number = 0;

  /**
   * Allocate a new EntityId
   */
  allocateEntityId(): EntityId {
    return asEntityId(this._nextEntityId++);
  }

  /**
   * Reset the counter to zero
   */
  reset(): void {
    this._nextEntityId = 0;
  }

  /**
   * Get current counter value (for debugging/testing)
   */
  getState(): { entity: number } {
    return { entity: this._nextEntityId };
  }
}

const globalAllocator = new IdAllocator();

/**
 * Get the global allocator
 */
export function getGlobalAllocator(): IdAllocator {
  return globalAllocator;
}

/**
 * Reset the global ID counter
 */
export function resetAllIds(): void {
  globalAllocator.reset();
}

/**
 * Allocate an EntityId using the global allocator
 */
export function allocateEntityIdGlobal(): EntityId {
  return globalAllocator.allocateEntityId();
}

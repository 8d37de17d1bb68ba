/**
 * Axis-aligned bounding boxes in actual (pixel) space
 *
 * (x, y) is the top-left corner; y grows downwards.
 */

import type { Vec2 } from '../num/vec2.js';

export interface AABB {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function aabb(x: number, y: number, width: number, height: number): AABB {
  return { x, y, width, height };
}

/**
 * Point of the box (boundary or interior) closest to p
 */
export function closestPointInAabb(box: AABB, p: Vec2): Vec2 {
  return [
    Math.max(box.x, Math.min(box.x + box.width, p[0])),
    Math.max(box.y, Math.min(box.y + box.height, p[1])),
  ];
}

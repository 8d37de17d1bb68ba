/**
 * Viewport transform
 *
 * Geometry is resolved in virtual space (y up, arbitrary units). The spatial
 * index works in actual space: pixels of the drawing surface, origin at the
 * top-left corner, y down. The host application owns the viewport; the core
 * only consumes the ViewportTransform interface.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, sub2, length2, normalize2 } from '../num/vec2.js';
import type { AABB } from './aabb.js';
import type { Line, Circle, Geometry } from './shapes.js';
import { segmentExtent } from './shapes.js';

/**
 * Virtual ↔ actual conversion supplied by the host
 */
export interface ViewportTransform {
  readonly actualWidth: number;
  readonly actualHeight: number;
  toActual(p: Vec2): Vec2;
  toVirtual(p: Vec2): Vec2;
  lengthToActual(length: number): number;
  lengthToVirtual(length: number): number;
  /** The drawing surface in actual space */
  actualAabb(): AABB;
}

/**
 * Viewport defined by the virtual window it shows and the pixel size of the surface
 */
export class Viewport implements ViewportTransform {
  /** Center of the visible window in virtual space */
  readonly center: Vec2;
  /** Width and height of the visible window in virtual units */
  readonly virtualSize: Vec2;
  /** Width and height of the drawing surface in pixels */
  readonly actualSize: Vec2;

  constructor(center: Vec2, virtualSize: Vec2, actualSize: Vec2) {
    if (virtualSize[0] <= 0 || virtualSize[1] <= 0) {
      throw new Error(`Viewport virtual size must be positive, got [${virtualSize}]`);
    }
    this.center = center;
    this.virtualSize = virtualSize;
    this.actualSize = actualSize;
  }

  get actualWidth(): number {
    return this.actualSize[0];
  }

  get actualHeight(): number {
    return this.actualSize[1];
  }

  private get scaleX(): number {
    return this.actualSize[0] / this.virtualSize[0];
  }

  private get scaleY(): number {
    return this.actualSize[1] / this.virtualSize[1];
  }

  toActual(p: Vec2): Vec2 {
    return [
      (p[0] - this.center[0]) * this.scaleX + this.actualSize[0] / 2,
      (this.center[1] - p[1]) * this.scaleY + this.actualSize[1] / 2,
    ];
  }

  toVirtual(p: Vec2): Vec2 {
    return [
      (p[0] - this.actualSize[0] / 2) / this.scaleX + this.center[0],
      this.center[1] - (p[1] - this.actualSize[1] / 2) / this.scaleY,
    ];
  }

  // Lengths use the horizontal scale; viewports keep their aspect ratio.
  lengthToActual(length: number): number {
    return length * this.scaleX;
  }

  lengthToVirtual(length: number): number {
    return length / this.scaleX;
  }

  actualAabb(): AABB {
    return { x: 0, y: 0, width: this.actualSize[0], height: this.actualSize[1] };
  }
}

/**
 * Map a virtual-space line to actual space
 */
export function lineToActual(l: Line, vp: ViewportTransform): Line {
  const origin = vp.toActual(l.origin);
  const tip = vp.toActual(add2(l.origin, l.direction));
  const scaledDir = sub2(tip, origin);
  const scale = length2(scaledDir);
  const direction = normalize2(scaledDir);
  const extent = l.extent.kind === 'segment' ? segmentExtent(l.extent.length * scale) : l.extent;
  return { kind: 'line', origin, direction, extent };
}

/**
 * Map a virtual-space circle to actual space
 */
export function circleToActual(c: Circle, vp: ViewportTransform): Circle {
  return { kind: 'circle', center: vp.toActual(c.center), radius: vp.lengthToActual(c.radius) };
}

/**
 * Map any resolved shape to actual space
 */
export function geometryToActual(g: Geometry, vp: ViewportTransform): Geometry {
  switch (g.kind) {
    case 'point':
      return { kind: 'point', position: vp.toActual(g.position) };
    case 'line':
      return lineToActual(g, vp);
    case 'circle':
      return circleToActual(g, vp);
  }
}

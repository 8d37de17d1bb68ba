/**
 * Spatial Hash Table
 *
 * A grid of square tiles over the drawing surface in actual (pixel) space.
 * Each tile holds the entities whose drawn shape touches it, so hit-testing
 * only has to look at the few entities near the cursor.
 *
 * Tiles are half-open: tile i covers [i * size, (i + 1) * size). A shape that
 * ends exactly on a tile edge does not enter the next tile.
 *
 * Shapes are inserted in virtual space and mapped through the viewport. The
 * grid must be re-initialised whenever the surface's pixel size changes;
 * callers then re-insert every live entity.
 */

import type { Vec2 } from '../num/vec2.js';
import { dist2 } from '../num/vec2.js';
import type { AABB } from '../geom/aabb.js';
import { closestPointInAabb } from '../geom/aabb.js';
import type { Line, Circle, Geometry } from '../geom/shapes.js';
import { clipLineToAabb } from '../geom/intersect2d.js';
import type { ViewportTransform } from '../geom/viewport.js';
import { lineToActual, circleToActual } from '../geom/viewport.js';

/**
 * Options for the spatial hash
 */
export interface SpatialHashOptions {
  /** Tile edge length in pixels (default: 40) */
  tileSize?: number;
  /** Enable verbose logging */
  verbose?: boolean;
}

export const DEFAULT_SPATIAL_HASH_OPTIONS: Required<SpatialHashOptions> = {
  tileSize: 40,
  verbose: false,
};

/**
 * Segments whose horizontal extent is below this many pixels are walked as a
 * single column
 */
const VERTICAL_EPSILON = 1e-9;

/**
 * Fraction of a tile within which a coordinate counts as lying on the tile edge
 */
const EDGE_EPSILON = 1e-9;

export class SpatialHashTable<T> {
  readonly tileSize: number;
  private readonly verbose: boolean;
  private xTiles = 0;
  private yTiles = 0;
  private table: Set<T>[] = [];

  constructor(options?: SpatialHashOptions) {
    this.tileSize = options?.tileSize ?? DEFAULT_SPATIAL_HASH_OPTIONS.tileSize;
    this.verbose = options?.verbose ?? DEFAULT_SPATIAL_HASH_OPTIONS.verbose;
    if (!(this.tileSize > 0)) {
      throw new Error(`Tile size must be positive, got ${this.tileSize}`);
    }
  }

  // ==========================================================================
  // Grid
  // ==========================================================================

  /**
   * Resize the grid to the viewport's pixel size and clear every tile
   */
  initViewport(vp: ViewportTransform): void {
    this.xTiles = Math.max(0, Math.ceil(vp.actualWidth / this.tileSize));
    this.yTiles = Math.max(0, Math.ceil(vp.actualHeight / this.tileSize));
    this.table = Array.from({ length: this.xTiles * this.yTiles }, () => new Set<T>());
    if (this.verbose) {
      console.log(`[SpatialHash] grid ${this.xTiles}x${this.yTiles} (tile ${this.tileSize}px)`);
    }
  }

  /**
   * Number of tiles horizontally and vertically
   */
  get dimensions(): { x: number; y: number } {
    return { x: this.xTiles, y: this.yTiles };
  }

  get tileCount(): number {
    return this.table.length;
  }

  /**
   * Entities registered in one tile
   */
  entitiesInTile(xTile: number, yTile: number): ReadonlySet<T> {
    return this.table[this.tileIndex(xTile, yTile)];
  }

  /**
   * Empty every tile, keeping the grid size
   */
  clear(): void {
    for (const tile of this.table) {
      tile.clear();
    }
  }

  // ==========================================================================
  // Insertion
  // ==========================================================================

  /**
   * Insert a point (virtual space). Points off the surface are ignored.
   */
  insertPoint(entity: T, p: Vec2, vp: ViewportTransform): void {
    const tile = this.tileOf(vp.toActual(p));
    if (tile !== null) {
      this.table[tile].add(entity);
    }
  }

  /**
   * Insert a line (virtual space) into every tile its visible part crosses
   */
  insertLine(entity: T, l: Line, vp: ViewportTransform): void {
    const clipped = clipLineToAabb(lineToActual(l, vp), vp.actualAabb());
    if (!clipped) return;

    // Walk left to right
    let [p1, p2] = clipped;
    if (p1[0] > p2[0]) {
      [p1, p2] = [p2, p1];
    }

    if (p2[0] - p1[0] < VERTICAL_EPSILON) {
      this.insertColumnRun(entity, this.firstTile(p1[0]), p1[1], p2[1]);
      return;
    }

    const slope = (p2[1] - p1[1]) / (p2[0] - p1[0]);
    const firstColumn = this.firstTile(p1[0]);
    const lastColumn = this.lastTile(p1[0], p2[0]);

    for (let column = firstColumn; column <= lastColumn; column++) {
      // Part of the segment inside this column
      const xa = Math.max(p1[0], column * this.tileSize);
      const xb = Math.min(p2[0], (column + 1) * this.tileSize);
      if (xb < xa) continue;
      const ya = p1[1] + (xa - p1[0]) * slope;
      const yb = p1[1] + (xb - p1[0]) * slope;
      this.insertColumnRun(entity, column, ya, yb);
    }
  }

  /**
   * Insert a circle (virtual space) into every tile overlapping its disc
   */
  insertCircle(entity: T, c: Circle, vp: ViewportTransform): void {
    const { center, radius } = circleToActual(c, vp);
    const left = Math.max(0, this.firstTile(center[0] - radius));
    const top = Math.max(0, this.firstTile(center[1] - radius));
    const right = Math.min(this.xTiles - 1, this.firstTile(center[0] + radius));
    const bottom = Math.min(this.yTiles - 1, this.firstTile(center[1] + radius));

    for (let j = top; j <= bottom; j++) {
      for (let i = left; i <= right; i++) {
        const tileBox: AABB = {
          x: i * this.tileSize,
          y: j * this.tileSize,
          width: this.tileSize,
          height: this.tileSize,
        };
        if (dist2(closestPointInAabb(tileBox, center), center) <= radius) {
          this.table[this.tileIndex(i, j)].add(entity);
        }
      }
    }
  }

  /**
   * Insert any resolved shape
   */
  insertGeometry(entity: T, g: Geometry, vp: ViewportTransform): void {
    switch (g.kind) {
      case 'point':
        this.insertPoint(entity, g.position, vp);
        break;
      case 'line':
        this.insertLine(entity, g, vp);
        break;
      case 'circle':
        this.insertCircle(entity, g, vp);
        break;
    }
  }

  /**
   * Remove an entity from every tile
   */
  removeFromAll(entity: T): void {
    for (const tile of this.table) {
      tile.delete(entity);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Entities in the tile under p (virtual space) and its up to 8 neighbours
   *
   * @returns Unique entities, or null if p is off the surface
   */
  getNeighborEntitiesOfPoint(p: Vec2, vp: ViewportTransform): T[] | null {
    return this.getNeighborEntitiesOfActualPoint(vp.toActual(p));
  }

  /**
   * Same as getNeighborEntitiesOfPoint, for a point already in actual space
   */
  getNeighborEntitiesOfActualPoint(actual: Vec2): T[] | null {
    const center = this.tileOf(actual);
    if (center === null) return null;

    const cx = center % this.xTiles;
    const cy = Math.floor(center / this.xTiles);
    const result = new Set<T>();
    for (let j = Math.max(0, cy - 1); j <= Math.min(this.yTiles - 1, cy + 1); j++) {
      for (let i = Math.max(0, cx - 1); i <= Math.min(this.xTiles - 1, cx + 1); i++) {
        for (const entity of this.table[this.tileIndex(i, j)]) {
          result.add(entity);
        }
      }
    }
    return Array.from(result);
  }

  /**
   * Union of the tiles a box (actual space) overlaps
   */
  getNeighborEntitiesOfAabb(box: AABB): Set<T> {
    const iMin = Math.max(0, this.firstTile(box.x));
    const jMin = Math.max(0, this.firstTile(box.y));
    const iMax = Math.min(this.xTiles - 1, this.firstTile(box.x + box.width));
    const jMax = Math.min(this.yTiles - 1, this.firstTile(box.y + box.height));

    const result = new Set<T>();
    for (let j = jMin; j <= jMax; j++) {
      for (let i = iMin; i <= iMax; i++) {
        for (const entity of this.table[this.tileIndex(i, j)]) {
          result.add(entity);
        }
      }
    }
    return result;
  }

  // ==========================================================================
  // Tile Math
  // ==========================================================================

  /**
   * Tile containing coordinate a (unbounded)
   */
  private firstTile(a: number): number {
    return Math.floor(a / this.tileSize + EDGE_EPSILON);
  }

  /**
   * Last tile entered by the interval [a, b] (unbounded). An interval ending
   * exactly on a tile edge stops in the tile before it.
   */
  private lastTile(a: number, b: number): number {
    const first = this.firstTile(a);
    if (b - a <= EDGE_EPSILON * this.tileSize) {
      return first;
    }
    return Math.max(first, Math.ceil(b / this.tileSize - EDGE_EPSILON) - 1);
  }

  /**
   * Insert into the rows covered by [ya, yb] within one column
   */
  private insertColumnRun(entity: T, column: number, ya: number, yb: number): void {
    if (column < 0 || column >= this.xTiles) return;
    const lo = Math.min(ya, yb);
    const hi = Math.max(ya, yb);
    const firstRow = Math.max(0, this.firstTile(lo));
    const lastRow = Math.min(this.yTiles - 1, this.lastTile(lo, hi));
    for (let row = firstRow; row <= lastRow; row++) {
      this.table[this.tileIndex(column, row)].add(entity);
    }
  }

  /**
   * Flat index of the tile under an actual-space point, or null if off the grid
   */
  private tileOf(p: Vec2): number | null {
    const i = Math.floor(p[0] / this.tileSize);
    const j = Math.floor(p[1] / this.tileSize);
    if (i < 0 || i >= this.xTiles || j < 0 || j >= this.yTiles) {
      return null;
    }
    return this.tileIndex(i, j);
  }

  private tileIndex(i: number, j: number): number {
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || i >= this.xTiles || j < 0 || j >= this.yTiles) {
      throw new Error(`Tile (${i}, ${j}) is outside the ${this.xTiles}x${this.yTiles} grid`);
    }
    return j * this.xTiles + i;
  }
}

/**
 * Tests for the per-frame engine driver
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { GeometryEngine } from "../../src/engine/GeometryEngine.js";
import { inserted, modified, removed } from "../../src/engine/events.js";
import { Viewport } from "../../src/geom/viewport.js";
import { allocateEntityIdGlobal, resetAllIds } from "../../src/symbolic/idAllocator.js";
import { asEntityId } from "../../src/symbolic/types.js";
import { fixedPoint, freePoint, midPoint, segment } from "../../src/symbolic/definitions.js";
import { vec2 } from "../../src/num/vec2.js";

// 160x160 pixels over [-2, 2]²: 4x4 tiles of 40px, 40px per unit
const viewport = new Viewport(vec2(0, 0), vec2(4, 4), vec2(160, 160));

describe("GeometryEngine", () => {
  beforeEach(() => {
    resetAllIds();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /**
   * a (20, 20), b (100, 20) and c (20, 60) in pixels, with s the segment a-b
   */
  function createScene() {
    const engine = new GeometryEngine(viewport);
    const a = allocateEntityIdGlobal();
    const b = allocateEntityIdGlobal();
    const c = allocateEntityIdGlobal();
    const s = allocateEntityIdGlobal();
    const defs = {
      a: freePoint(vec2(-1.5, 1.5)),
      b: fixedPoint(vec2(0.5, 1.5)),
      c: fixedPoint(vec2(-1.5, 0.5)),
      s: segment(a, b),
    };
    engine.insert(a, defs.a);
    engine.insert(b, defs.b);
    engine.insert(c, defs.c);
    engine.insert(s, defs.s);
    const first = engine.tick();
    return { engine, a, b, c, s, defs, first };
  }

  describe("tick", () => {
    it("should resolve inserted entities in dependency order", () => {
      const { engine, a, b, c, s, first } = createScene();
      expect(first.updates.map((u) => u.entity)).toEqual([a, b, c, s]);
      expect(first.removed).toEqual([]);
      expect(engine.getGeometry(s)).toEqual({
        kind: "line",
        origin: [-1.5, 1.5],
        direction: [1, 0],
        extent: { kind: "segment", length: 2 },
      });
      expect(engine.pendingEvents).toBe(0);
    });

    it("should index resolved entities in the spatial hash", () => {
      const { engine, a, b, s } = createScene();
      expect([...engine.spatial.entitiesInTile(0, 0)]).toEqual([a, s]);
      expect(engine.spatial.entitiesInTile(2, 0).has(b)).toBe(true);
      expect(engine.spatial.entitiesInTile(1, 0).has(s)).toBe(true);
      expect(engine.spatial.entitiesInTile(3, 0).has(s)).toBe(false);
    });

    it("should return an empty frame when nothing is queued", () => {
      const { engine } = createScene();
      expect(engine.tick()).toEqual({ updates: [], removed: [] });
    });

    it("should apply events in emission order within one frame", () => {
      const engine = new GeometryEngine(viewport);
      const p = allocateEntityIdGlobal();
      const q = allocateEntityIdGlobal();
      const m = allocateEntityIdGlobal();
      engine.submit(
        inserted(p, freePoint(vec2(0, 0))),
        inserted(q, fixedPoint(vec2(1, 1))),
        inserted(m, midPoint(p, q)),
        modified(p, vec2(1, 0))
      );
      engine.tick();
      expect(engine.getGeometry(m)).toEqual({ kind: "point", position: [1, 0.5] });
    });
  });

  describe("rejected batches", () => {
    it("should apply nothing from a batch with an unknown reference", () => {
      const engine = new GeometryEngine(viewport);
      const p = allocateEntityIdGlobal();
      const m = allocateEntityIdGlobal();
      engine.submit(inserted(p, freePoint(vec2(0.5, 0.5))), inserted(m, midPoint(p, asEntityId(99))));
      expect(() => engine.tick()).toThrow(`Entity ${m} references unknown entity 99`);

      expect(engine.solver.has(p)).toBe(false);
      expect(engine.solver.has(m)).toBe(false);
      expect(engine.pendingEvents).toBe(0);
      expect(engine.tick()).toEqual({ updates: [], removed: [] });
    });

    it("should accept the valid events once resubmitted alone", () => {
      const engine = new GeometryEngine(viewport);
      const p = allocateEntityIdGlobal();
      engine.submit(inserted(p, freePoint(vec2(0.5, 0.5))), inserted(allocateEntityIdGlobal(), midPoint(p, asEntityId(99))));
      expect(() => engine.tick()).toThrow("references unknown entity 99");

      engine.insert(p, freePoint(vec2(0.5, 0.5)));
      const frame = engine.tick();
      expect(frame.updates).toEqual([{ entity: p, geometry: { kind: "point", position: [0.5, 0.5] }, invalidReason: null }]);
      // (0.5, 0.5) is (100, 60) in pixels
      expect(engine.neighborsOfPoint(vec2(0.5, 0.5))).toContain(p);
      expect(engine.spatial.entitiesInTile(2, 1).has(p)).toBe(true);
    });

    it("should not apply earlier moves of a batch that moves a fixed point", () => {
      const { engine, a, b, defs } = createScene();
      engine.move(a, vec2(-1.5, -0.5));
      engine.move(b, vec2(0, 0));
      expect(() => engine.tick()).toThrow(`Entity ${b} is a fixed point, only free points can be moved`);

      expect(engine.getGeometry(a)).toEqual({ kind: "point", position: [-1.5, 1.5] });
      expect(engine.solver.getDefinition(a)).toEqual(defs.a);
      expect(engine.spatial.entitiesInTile(0, 0).has(a)).toBe(true);
      expect(engine.spatial.entitiesInTile(0, 2).has(a)).toBe(false);
    });

    it("should check events against removals earlier in the batch", () => {
      const { engine, a, b, s, defs } = createScene();
      engine.submit(removed(s, defs.s), inserted(allocateEntityIdGlobal(), midPoint(a, s)));
      expect(() => engine.tick()).toThrow(`references unknown entity ${s}`);
      expect(engine.isValid(s)).toBe(true);
      expect(engine.graph.dependentsOf(b).has(s)).toBe(true);

      engine.submit(removed(a, defs.a), modified(a, vec2(0, 0)));
      expect(() => engine.tick()).toThrow(`Cannot move unknown entity ${a}`);
      expect(engine.isValid(a)).toBe(true);
    });

    it("should reject inserting an entity that already exists", () => {
      const { engine, a, defs } = createScene();
      engine.insert(a, defs.a);
      expect(() => engine.tick()).toThrow(`Entity ${a} is already defined`);
    });
  });

  describe("modified events", () => {
    it("should move a free point and re-index it and its dependents", () => {
      const { engine, a, s } = createScene();
      engine.move(a, vec2(-1.5, -0.5));
      const frame = engine.tick();

      expect(frame.updates.map((u) => u.entity)).toEqual([a, s]);
      expect(engine.getGeometry(a)).toEqual({ kind: "point", position: [-1.5, -0.5] });
      expect(engine.spatial.entitiesInTile(0, 0).has(a)).toBe(false);
      expect(engine.spatial.entitiesInTile(0, 2).has(a)).toBe(true);
    });

    it("should not follow later writes to the caller's vectors", () => {
      const engine = new GeometryEngine(viewport);
      const p = allocateEntityIdGlobal();
      const start = vec2(0.5, 0.5);
      engine.insert(p, freePoint(start));
      engine.tick();
      start[0] = -1.5;
      expect(engine.getGeometry(p)).toEqual({ kind: "point", position: [0.5, 0.5] });
      expect(engine.spatial.entitiesInTile(2, 1).has(p)).toBe(true);

      const drag = vec2(-1.5, -1.5);
      engine.move(p, drag);
      engine.tick();
      drag[1] = 1.5;
      expect(engine.getGeometry(p)).toEqual({ kind: "point", position: [-1.5, -1.5] });
      // (-1.5, -1.5) is (20, 140) in pixels
      expect(engine.spatial.entitiesInTile(0, 3).has(p)).toBe(true);
      expect(engine.tick()).toEqual({ updates: [], removed: [] });
    });

    it("should refuse to move a point that is not free", () => {
      const { engine, b } = createScene();
      engine.move(b, vec2(0, 0));
      expect(() => engine.tick()).toThrow("only free points can be moved");
    });
  });

  describe("removed events", () => {
    it("should invalidate dependents of a removed entity", () => {
      const { engine, b, s, defs } = createScene();
      engine.remove(b, defs.b);
      const frame = engine.tick();

      expect(frame.removed).toEqual([b]);
      expect(frame.updates).toEqual([{ entity: s, geometry: null, invalidReason: "missingDependency" }]);
      expect(engine.isValid(s)).toBe(false);
      expect(engine.graph.has(b)).toBe(false);
      expect(engine.spatial.entitiesInTile(2, 0).has(b)).toBe(false);
      expect(engine.spatial.entitiesInTile(0, 0).has(s)).toBe(false);
    });

    it("should drop the edges a removed definition held", () => {
      const { engine, a, b, s, defs } = createScene();
      engine.remove(s, defs.s);
      engine.tick();
      expect(engine.graph.dependentsOf(a).size).toBe(0);
      expect(engine.graph.dependentsOf(b).size).toBe(0);
      expect([...engine.spatial.entitiesInTile(0, 0)]).toEqual([a]);
    });

    it("should handle an entity inserted and removed in the same frame", () => {
      const engine = new GeometryEngine(viewport);
      const p = allocateEntityIdGlobal();
      const def = freePoint(vec2(0, 0));
      engine.insert(p, def);
      engine.remove(p, def);
      expect(engine.tick()).toEqual({ updates: [], removed: [p] });
    });

    it("should reject removing an unknown entity", () => {
      const engine = new GeometryEngine(viewport);
      engine.remove(asEntityId(7), freePoint(vec2(0, 0)));
      expect(() => engine.tick()).toThrow("Cannot remove unknown entity 7");
    });
  });

  describe("inserted events", () => {
    it("should reject references to unknown entities", () => {
      const { engine, a } = createScene();
      engine.insert(allocateEntityIdGlobal(), midPoint(a, asEntityId(99)));
      expect(() => engine.tick()).toThrow("references unknown entity 99");
    });
  });

  describe("viewport", () => {
    it("should re-index after a pan", () => {
      const { engine, a } = createScene();
      engine.setViewport(new Viewport(vec2(-1, 1), vec2(4, 4), vec2(160, 160)));
      expect(engine.spatial.entitiesInTile(0, 0).has(a)).toBe(false);
      expect(engine.spatial.entitiesInTile(1, 1).has(a)).toBe(true);
    });

    it("should resize the grid when the surface size changes", () => {
      const { engine, a } = createScene();
      engine.setViewport(new Viewport(vec2(0, 0), vec2(4, 4), vec2(80, 80)));
      expect(engine.spatial.dimensions).toEqual({ x: 2, y: 2 });
      expect(engine.spatial.entitiesInTile(0, 0).has(a)).toBe(true);
      expect(engine.getViewport().actualWidth).toBe(80);
    });
  });

  describe("queries", () => {
    it("should pick the closest drawn shape", () => {
      const { engine, c, s } = createScene();
      expect(engine.pick(vec2(50, 22), 5)).toBe(s);
      expect(engine.pick(vec2(21, 58), 5)).toBe(c);
    });

    it("should pick nothing beyond the maximum distance", () => {
      const { engine } = createScene();
      expect(engine.pick(vec2(50, 40), 5)).toBeNull();
      expect(engine.pick(vec2(-10, 40), 5)).toBeNull();
    });

    it("should return neighbours of a point and of a box", () => {
      const { engine, a, b, c, s } = createScene();
      expect(engine.neighborsOfPoint(vec2(1.5, -1.5))).toEqual([]);
      expect(engine.neighborsOfPoint(vec2(5, 5))).toBeNull();
      expect([...engine.neighborsOfAabb({ x: 0, y: 0, width: 30, height: 30 })]).toEqual([a, s]);
      expect(new Set(engine.neighborsOfAabb({ x: 0, y: 0, width: 160, height: 160 }))).toEqual(
        new Set([a, b, c, s])
      );
    });
  });

  describe("logging", () => {
    it("should summarise each frame when verbose", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const engine = new GeometryEngine(viewport, { verbose: true });
      engine.insert(allocateEntityIdGlobal(), freePoint(vec2(0, 0)));
      engine.tick();
      expect(log).toHaveBeenCalledWith("[SpatialHash] grid 4x4 (tile 40px)");
      expect(log).toHaveBeenLastCalledWith("[Engine] 1 events, 1 updates, 0 removed");
    });
  });
});

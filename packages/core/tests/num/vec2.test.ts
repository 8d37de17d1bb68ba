import { describe, it, expect } from "vitest";
import {
  vec2,
  add2,
  sub2,
  mul2,
  dot2,
  cross2,
  perp2,
  length2,
  normalize2,
  midpoint2,
  fromAngle2,
  distSq2,
  dist2,
} from "../../src/num/vec2.js";

describe(`vec2`, () => {
  describe(`arithmetic`, () => {
    it(`should add and subtract`, () => {
      expect(add2(vec2(1, 2), vec2(3, 4))).toEqual([4, 6]);
      expect(sub2(vec2(5, 6), vec2(2, 3))).toEqual([3, 3]);
    });

    it(`should scale`, () => {
      expect(mul2(vec2(2, -3), 2)).toEqual([4, -6]);
    });

    it(`should compute dot and cross products`, () => {
      expect(dot2(vec2(1, 2), vec2(3, 4))).toBe(11);
      expect(cross2(vec2(1, 0), vec2(0, 1))).toBe(1);
      expect(cross2(vec2(0, 1), vec2(1, 0))).toBe(-1);
    });

    it(`should rotate a quarter turn counter-clockwise`, () => {
      expect(perp2(vec2(2, 3))).toEqual([-3, 2]);
      expect(cross2(vec2(2, 3), perp2(vec2(2, 3)))).toBe(13);
    });
  });

  describe(`lengths and distances`, () => {
    it(`should compute length and distance`, () => {
      expect(length2(vec2(3, 4))).toBe(5);
      expect(dist2(vec2(1, 1), vec2(4, 5))).toBe(5);
      expect(distSq2(vec2(1, 1), vec2(4, 5))).toBe(25);
    });

    it(`should normalize to unit length`, () => {
      const n = normalize2(vec2(3, 4));
      expect(n[0]).toBeCloseTo(0.6, 12);
      expect(n[1]).toBeCloseTo(0.8, 12);
    });

    it(`should leave the zero vector unchanged when normalizing`, () => {
      expect(normalize2(vec2(0, 0))).toEqual([0, 0]);
    });
  });

  describe(`construction helpers`, () => {
    it(`should compute the midpoint`, () => {
      expect(midpoint2(vec2(0, 0), vec2(4, 2))).toEqual([2, 1]);
    });

    it(`should build unit vectors from angles`, () => {
      expect(fromAngle2(0)).toEqual([1, 0]);
      const up = fromAngle2(Math.PI / 2);
      expect(up[0]).toBeCloseTo(0, 12);
      expect(up[1]).toBeCloseTo(1, 12);
    });
  });
});

import { describe, it, expect } from "vitest";
import { DEFAULT_TOLERANCES, createNumericContext, isZero } from "../../src/num/tolerance.js";

describe("tolerance", () => {
  it("should use the default tolerance", () => {
    expect(createNumericContext().tol).toEqual(DEFAULT_TOLERANCES);
  });

  it("should override the length tolerance", () => {
    expect(createNumericContext({ length: 1e-3 }).tol.length).toBe(1e-3);
  });

  it("should treat values within the length tolerance as zero", () => {
    const ctx = createNumericContext({ length: 1e-6 });
    expect(isZero(0, ctx)).toBe(true);
    expect(isZero(-5e-7, ctx)).toBe(true);
    expect(isZero(1e-5, ctx)).toBe(false);
  });
});

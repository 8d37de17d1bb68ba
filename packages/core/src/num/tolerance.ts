/**
 * Tolerance model and numeric context
 *
 * Inputs come from continuous dragging, so exact zero tests are never
 * meaningful. Every zero test in the solver and the intersection code goes
 * through isZero() with the context's length tolerance.
 */

/**
 * Tolerance values for a construction
 */
export interface Tolerances {
  /** Virtual-space length tolerance (absolute distance) */
  length: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-9,
};

/**
 * Create a numeric context, filling unspecified tolerances with the defaults
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
    },
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

import type { Tolerance, ToleranceOptions } from "@/types";

/**
 * Library-wide slack for floating point boundary decisions.
 * Touching (within this distance) counts as containing.
 */
export const EPSILON = 0.01;

export const PI = Math.PI;

/**
 * Default tolerance options
 */
export const DEFAULT_TOLERANCE_OPTIONS: ToleranceOptions = {
  epsilon: EPSILON,
};

/**
 * Creates a tolerance for the predicate suite.
 * Callers working at a different scale (e.g. metres vs. pixels) pass their own
 * epsilon instead of relying on the default.
 */
export function createTolerance(options: Partial<ToleranceOptions> = {}): Tolerance {
  const opts = { ...DEFAULT_TOLERANCE_OPTIONS, ...options };

  if (!Number.isFinite(opts.epsilon) || opts.epsilon < 0) {
    throw new Error(`Tolerance epsilon must be a finite non-negative number, got ${opts.epsilon}`);
  }

  const epsilon = opts.epsilon;
  return {
    epsilon,
    equal(a: number, b: number): boolean {
      return Math.abs(a - b) <= epsilon;
    },
  };
}

/**
 * Shared tolerance used when a predicate is called without one
 */
export const DEFAULT_TOLERANCE: Tolerance = createTolerance();

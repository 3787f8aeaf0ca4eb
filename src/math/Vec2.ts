import { DEFAULT_TOLERANCE } from "@/config/toleranceConfig";
import type { Tolerance, Vector2 } from "@/types";

/** Right-hand operand of component-wise arithmetic: a vector or a broadcast scalar */
export type Operand = Vector2 | number;

function ox(o: Operand): number {
  return typeof o === "number" ? o : o.x;
}

function oy(o: Operand): number {
  return typeof o === "number" ? o : o.y;
}

function clampScalar(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors.
 *
 * Components are plain numbers. Mixing integer-valued and fractional vectors
 * always computes in double precision; nothing is truncated unless the caller
 * asks for floor/ceil/round.
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Create a vector with both components set to the same scalar
   */
  splat(s: number): Vector2 {
    return { x: s, y: s };
  },

  /**
   * Return a zero vector
   */
  zero(): Vector2 {
    return { x: 0, y: 0 };
  },

  add(a: Vector2, b: Operand): Vector2 {
    return { x: a.x + ox(b), y: a.y + oy(b) };
  },

  subtract(a: Vector2, b: Operand): Vector2 {
    return { x: a.x - ox(b), y: a.y - oy(b) };
  },

  /**
   * Component-wise product (Hadamard product for two vectors)
   */
  multiply(a: Vector2, b: Operand): Vector2 {
    return { x: a.x * ox(b), y: a.y * oy(b) };
  },

  /**
   * Component-wise quotient. Division by a zero component yields ±Infinity or NaN.
   */
  divide(a: Vector2, b: Operand): Vector2 {
    return { x: a.x / ox(b), y: a.y / oy(b) };
  },

  /**
   * Component-wise remainder, with the sign of the dividend (JS `%`)
   */
  modulo(a: Vector2, b: Operand): Vector2 {
    return { x: a.x % ox(b), y: a.y % oy(b) };
  },

  /**
   * Scale a vector by a scalar
   */
  scale(v: Vector2, scalar: number): Vector2 {
    return { x: v.x * scalar, y: v.y * scalar };
  },

  negate(v: Vector2): Vector2 {
    return { x: -v.x, y: -v.y };
  },

  /**
   * Calculate dot product of two vectors
   */
  dot(a: Vector2, b: Vector2): number {
    return a.x * b.x + a.y * b.y;
  },

  /**
   * 2D cross product: twice the signed area of the parallelogram spanned by a and b.
   * Positive when b is counter-clockwise from a (in y-up coordinates).
   */
  cross(a: Vector2, b: Vector2): number {
    return a.x * b.y - a.y * b.x;
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector2): number {
    return Math.sqrt(Vec2.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if input is zero vector
   */
  normalize(v: Vector2): Vector2 {
    const len = Vec2.length(v);
    if (len === 0) return { x: 0, y: 0 };
    const n = 1 / len;
    return { x: v.x * n, y: v.y * n };
  },

  /**
   * Get perpendicular vector (90° counter-clockwise rotation)
   */
  perpendicular(v: Vector2): Vector2 {
    return { x: -v.y, y: v.x };
  },

  /**
   * Calculate distance between two points
   */
  distance(a: Vector2, b: Vector2): number {
    return Vec2.length(Vec2.subtract(a, b));
  },

  /**
   * Manhattan (taxicab) distance between two points
   */
  manhattan(a: Vector2, b: Vector2): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  },

  /**
   * Linear interpolation: a + t * (b - a), per component.
   * t is not clamped, so values outside [0, 1] extrapolate.
   */
  lerp(a: Vector2, b: Vector2, t: number): Vector2 {
    return { x: a.x + t * (b.x - a.x), y: a.y + t * (b.y - a.y) };
  },

  /**
   * Clamp each component into [min, max] of the matching bound component
   */
  clamp(v: Vector2, min: Vector2, max: Vector2): Vector2 {
    return { x: clampScalar(v.x, min.x, max.x), y: clampScalar(v.y, min.y, max.y) };
  },

  min(a: Vector2, b: Vector2): Vector2 {
    return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) };
  },

  max(a: Vector2, b: Vector2): Vector2 {
    return { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) };
  },

  abs(v: Vector2): Vector2 {
    return { x: Math.abs(v.x), y: Math.abs(v.y) };
  },

  floor(v: Vector2): Vector2 {
    return { x: Math.floor(v.x), y: Math.floor(v.y) };
  },

  ceil(v: Vector2): Vector2 {
    return { x: Math.ceil(v.x), y: Math.ceil(v.y) };
  },

  round(v: Vector2): Vector2 {
    return { x: Math.round(v.x), y: Math.round(v.y) };
  },

  /**
   * Angle between two vectors in radians, in [0, π].
   * Returns 0 when either vector has zero length.
   */
  angleBetween(a: Vector2, b: Vector2): number {
    const lengths = Vec2.length(a) * Vec2.length(b);
    if (lengths === 0) return 0;
    // Rounding can push the cosine just outside [-1, 1]
    return Math.acos(clampScalar(Vec2.dot(a, b) / lengths, -1, 1));
  },

  /**
   * Treat (x, y) as (radius, angle) and return the Cartesian point
   */
  toCartesian(v: Vector2): Vector2 {
    return { x: Math.cos(v.y) * v.x, y: Math.sin(v.y) * v.x };
  },

  /**
   * Return (length, angle) where angle is measured from the positive x axis
   */
  toPolar(v: Vector2): Vector2 {
    return { x: Vec2.length(v), y: Math.atan2(v.y, v.x) };
  },

  // ---------------------------------------------------------------------------
  // Comparisons. Both components must satisfy the relation, so these form a
  // partial order: two vectors can be neither lessThan nor greaterOrEqual.
  // ---------------------------------------------------------------------------

  equals(a: Vector2, b: Vector2): boolean {
    return a.x === b.x && a.y === b.y;
  },

  notEquals(a: Vector2, b: Vector2): boolean {
    return a.x !== b.x || a.y !== b.y;
  },

  lessThan(a: Vector2, b: Vector2): boolean {
    return a.x < b.x && a.y < b.y;
  },

  lessOrEqual(a: Vector2, b: Vector2): boolean {
    return a.x <= b.x && a.y <= b.y;
  },

  greaterThan(a: Vector2, b: Vector2): boolean {
    return a.x > b.x && a.y > b.y;
  },

  greaterOrEqual(a: Vector2, b: Vector2): boolean {
    return a.x >= b.x && a.y >= b.y;
  },

  /**
   * Component-wise equality within the tolerance
   */
  approxEquals(a: Vector2, b: Vector2, tolerance: Tolerance = DEFAULT_TOLERANCE): boolean {
    return tolerance.equal(a.x, b.x) && tolerance.equal(a.y, b.y);
  },

  /**
   * Format as "(x, y)"
   */
  format(v: Vector2): string {
    return `(${v.x}, ${v.y})`;
  },
};

/**
 * Core type definitions for planar-kit
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable). A bare vector doubles as a point. */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// SHAPE TYPES
// =============================================================================

/** Circle defined by its center and radius */
export interface Circle {
  readonly kind: "circle";
  readonly pos: Vector2;
  readonly radius: number;
}

/** Line segment defined by two endpoints (zero-length when they coincide) */
export interface LineSegment {
  readonly kind: "line";
  readonly start: Vector2;
  readonly end: Vector2;
}

/**
 * Axis-aligned rectangle.
 * `pos` is the top-left corner, y grows downward.
 */
export interface Rectangle {
  readonly kind: "rect";
  readonly pos: Vector2;
  readonly size: Vector2;
}

/** Any shape with an explicit kind tag */
export type Shape = Circle | LineSegment | Rectangle;

/** Anything a predicate accepts: a point or a shape */
export type Geometry = Vector2 | Shape;

/** Discriminator of a Geometry value */
export type GeometryKind = "point" | Shape["kind"];

/**
 * Rectangle side index.
 * Left..Bottom are valid indices into a rectangle; None is the "no side" sentinel.
 */
export enum Side {
  Left = 0,
  Top = 1,
  Right = 2,
  Bottom = 3,
  None = 4,
}

/** A side index that denotes an actual rectangle side */
export type RectSide = Side.Left | Side.Top | Side.Right | Side.Bottom;

// =============================================================================
// PREDICATE TYPES
// =============================================================================

/** Result of an intersection query */
export interface IntersectionResult {
  /** Intersection points, empty when the operands do not meet */
  readonly points: Vector2[];
  /** Rectangle sides touched, ascending and unique (first rectangle for rect/rect) */
  readonly sides: RectSide[];
}

/** Tolerance used for every "on the boundary counts" decision */
export interface Tolerance {
  readonly epsilon: number;
  /** |a - b| <= epsilon */
  equal(a: number, b: number): boolean;
}

/** Options accepted by createTolerance */
export interface ToleranceOptions {
  readonly epsilon: number;
}

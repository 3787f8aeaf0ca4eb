/**
 * Containment predicates
 *
 * contains(A, B) is true iff every point of B lies within or on the boundary
 * of A. Containment is not symmetric, so every ordered pair has its own
 * handler; handlers for the same container build on each other.
 *
 * Boundary decisions go through the Tolerance: "touching counts as inside".
 */

import { DEFAULT_TOLERANCE } from "@/config/toleranceConfig";
import { GeometryDebugLogger } from "@/debug/GeometryDebugLogger";
import { CircleUtils } from "@/math/CircleUtils";
import { Rect } from "@/math/Rect";
import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type { Circle, Geometry, LineSegment, Rectangle, Tolerance, Vector2 } from "@/types";
import { dispatchPair, type PairTable } from "./dispatch";

/** value >= bound, or equal within tolerance */
function atLeast(value: number, bound: number, tolerance: Tolerance): boolean {
  return value >= bound || tolerance.equal(value, bound);
}

/** value <= bound, or equal within tolerance */
function atMost(value: number, bound: number, tolerance: Tolerance): boolean {
  return value <= bound || tolerance.equal(value, bound);
}

// =============================================================================
// POINT CONTAINER
// =============================================================================

export function pointContainsPoint(p1: Vector2, p2: Vector2, tolerance: Tolerance): boolean {
  return Vec2.approxEquals(p1, p2, tolerance);
}

export function pointContainsLine(p: Vector2, l: LineSegment, tolerance: Tolerance): boolean {
  return Vec2.approxEquals(p, l.start, tolerance) && Vec2.approxEquals(p, l.end, tolerance);
}

export function pointContainsCircle(p: Vector2, c: Circle, tolerance: Tolerance): boolean {
  return tolerance.equal(c.radius, 0) && Vec2.approxEquals(p, c.pos, tolerance);
}

export function pointContainsRect(p: Vector2, r: Rectangle, tolerance: Tolerance): boolean {
  return Rect.corners(r).every((corner) => Vec2.approxEquals(p, corner, tolerance));
}

// =============================================================================
// LINE CONTAINER
// =============================================================================

/**
 * Check if a point lies on a segment.
 *
 * Projects the point onto the segment: t = dot(v, p - start) / |v|^2.
 * Inside [0, 1] the point must be within epsilon of its projection; outside,
 * within epsilon of the nearer endpoint. A zero-length segment contains only
 * points approximately equal to its start.
 */
export function lineContainsPoint(l: LineSegment, p: Vector2, tolerance: Tolerance): boolean {
  const v = Segment.vector(l);
  const lengthSq = Vec2.lengthSquared(v);

  if (lengthSq === 0) {
    GeometryDebugLogger.logDegenerate("zero-length-line", "contains(line, point)", [l.start, p]);
    return Vec2.approxEquals(l.start, p, tolerance);
  }

  const t = Vec2.dot(v, Vec2.subtract(p, l.start)) / lengthSq;
  const nearest = t < 0 ? l.start : t > 1 ? l.end : Vec2.lerp(l.start, l.end, t);

  return tolerance.equal(Vec2.distance(p, nearest), 0);
}

/**
 * Both endpoints of l2 lie on l1 (orientation of l2 does not matter)
 */
export function lineContainsLine(l1: LineSegment, l2: LineSegment, tolerance: Tolerance): boolean {
  return lineContainsPoint(l1, l2.start, tolerance) && lineContainsPoint(l1, l2.end, tolerance);
}

export function lineContainsCircle(l: LineSegment, c: Circle, tolerance: Tolerance): boolean {
  return tolerance.equal(c.radius, 0) && lineContainsPoint(l, c.pos, tolerance);
}

/**
 * Only a rectangle collapsed onto the segment can fit on it
 */
export function lineContainsRect(l: LineSegment, r: Rectangle, tolerance: Tolerance): boolean {
  return Rect.corners(r).every((corner) => lineContainsPoint(l, corner, tolerance));
}

// =============================================================================
// CIRCLE CONTAINER
// =============================================================================

/**
 * Squared distance to the center is below radius^2, or equal within tolerance
 */
export function circleContainsPoint(c: Circle, p: Vector2, tolerance: Tolerance): boolean {
  const sqrRadius = c.radius * c.radius;
  const sqrDist = Vec2.lengthSquared(Vec2.subtract(c.pos, p));

  return sqrDist < sqrRadius || tolerance.equal(sqrDist, sqrRadius);
}

export function circleContainsLine(c: Circle, l: LineSegment, tolerance: Tolerance): boolean {
  return circleContainsPoint(c, l.start, tolerance) && circleContainsPoint(c, l.end, tolerance);
}

/**
 * c1.radius >= dist(centers) + c2.radius, boundary-inclusive
 */
export function circleContainsCircle(c1: Circle, c2: Circle, tolerance: Tolerance): boolean {
  return atLeast(c1.radius, Vec2.distance(c1.pos, c2.pos) + c2.radius, tolerance);
}

/**
 * All four corners are within the circle
 */
export function circleContainsRect(c: Circle, r: Rectangle, tolerance: Tolerance): boolean {
  return Rect.corners(r).every((corner) => circleContainsPoint(c, corner, tolerance));
}

// =============================================================================
// RECTANGLE CONTAINER
// =============================================================================

/**
 * pos <= p <= pos + size on both axes
 */
export function rectContainsPoint(r: Rectangle, p: Vector2, tolerance: Tolerance): boolean {
  const end = Rect.bottomRight(r);
  return (
    atLeast(p.x, r.pos.x, tolerance) &&
    atLeast(p.y, r.pos.y, tolerance) &&
    atMost(p.x, end.x, tolerance) &&
    atMost(p.y, end.y, tolerance)
  );
}

export function rectContainsLine(r: Rectangle, l: LineSegment, tolerance: Tolerance): boolean {
  return rectContainsPoint(r, l.start, tolerance) && rectContainsPoint(r, l.end, tolerance);
}

/**
 * The circle's bounding square fits in the rectangle
 */
export function rectContainsCircle(r: Rectangle, c: Circle, tolerance: Tolerance): boolean {
  return rectContainsRect(r, CircleUtils.boundingRect(c), tolerance);
}

/**
 * r1.pos <= r2.pos and r1.end >= r2.end
 */
export function rectContainsRect(r1: Rectangle, r2: Rectangle, tolerance: Tolerance): boolean {
  return (
    rectContainsPoint(r1, r2.pos, tolerance) &&
    rectContainsPoint(r1, Rect.bottomRight(r2), tolerance)
  );
}

// =============================================================================
// DISPATCH
// =============================================================================

export const CONTAINS_TABLE: PairTable<boolean> = {
  "point:point": pointContainsPoint,
  "point:line": pointContainsLine,
  "point:circle": pointContainsCircle,
  "point:rect": pointContainsRect,
  "line:point": lineContainsPoint,
  "line:line": lineContainsLine,
  "line:circle": lineContainsCircle,
  "line:rect": lineContainsRect,
  "circle:point": circleContainsPoint,
  "circle:line": circleContainsLine,
  "circle:circle": circleContainsCircle,
  "circle:rect": circleContainsRect,
  "rect:point": rectContainsPoint,
  "rect:line": rectContainsLine,
  "rect:circle": rectContainsCircle,
  "rect:rect": rectContainsRect,
};

/**
 * Check if `container` contains `contained` (boundary-inclusive).
 *
 * @param container - Point or shape that must enclose the other operand
 * @param contained - Point or shape to test
 * @param tolerance - Slack for boundary decisions, DEFAULT_TOLERANCE if omitted
 */
export function contains(
  container: Geometry,
  contained: Geometry,
  tolerance: Tolerance = DEFAULT_TOLERANCE
): boolean {
  return dispatchPair(CONTAINS_TABLE, container, contained, tolerance);
}

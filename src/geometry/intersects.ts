/**
 * Intersection predicates
 *
 * intersects(A, B) returns the points where A and B meet. Only the canonical
 * half of the pair table is written here (see dispatch.ts); every reversed
 * ordering reuses the same formula with swapped arguments.
 *
 * Canonical formulas:
 * - point vs anything: the shape contains the point
 * - line vs line: implicit line equations solved as a 2x2 system
 * - circle vs line: closest point on the line, offset along the line direction
 * - circle vs circle: radical line construction
 * - rectangle vs X: the four sides, each delegated to line vs X
 */

import { DEFAULT_TOLERANCE } from "@/config/toleranceConfig";
import { GeometryDebugLogger } from "@/debug/GeometryDebugLogger";
import { RECT_SIDES, Rect } from "@/math/Rect";
import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type {
  Circle,
  Geometry,
  IntersectionResult,
  LineSegment,
  RectSide,
  Rectangle,
  Tolerance,
  Vector2,
} from "@/types";
import {
  circleContainsPoint,
  lineContainsPoint,
  pointContainsPoint,
  rectContainsPoint,
} from "./contains";
import { type CanonicalTable, type PairTable, dispatchPair, symmetricTable } from "./dispatch";

function hit(points: Vector2[], sides: RectSide[] = []): IntersectionResult {
  return { points, sides };
}

function noHit(): IntersectionResult {
  return { points: [], sides: [] };
}

/**
 * Append points that are not already present (within tolerance)
 */
function pushUnique(target: Vector2[], points: readonly Vector2[], tolerance: Tolerance): void {
  for (const p of points) {
    if (!target.some((q) => Vec2.approxEquals(p, q, tolerance))) {
      target.push(p);
    }
  }
}

// =============================================================================
// POINT VS X
// =============================================================================

export function intersectPointPoint(p1: Vector2, p2: Vector2, tolerance: Tolerance): IntersectionResult {
  return pointContainsPoint(p1, p2, tolerance) ? hit([p2]) : noHit();
}

export function intersectLinePoint(l: LineSegment, p: Vector2, tolerance: Tolerance): IntersectionResult {
  return lineContainsPoint(l, p, tolerance) ? hit([p]) : noHit();
}

export function intersectCirclePoint(c: Circle, p: Vector2, tolerance: Tolerance): IntersectionResult {
  return circleContainsPoint(c, p, tolerance) ? hit([p]) : noHit();
}

/**
 * The point itself when the rectangle contains it.
 * `sides` lists every side the point lies on; empty for an interior point.
 */
export function intersectRectPoint(r: Rectangle, p: Vector2, tolerance: Tolerance): IntersectionResult {
  if (!rectContainsPoint(r, p, tolerance)) {
    return noHit();
  }

  const sides = RECT_SIDES.filter((side) => lineContainsPoint(Rect.side(r, side), p, tolerance));
  return hit([p], sides);
}

// =============================================================================
// LINE VS LINE
// =============================================================================

function isOnLine(line: LineSegment, points: readonly Vector2[], tolerance: Tolerance): boolean {
  return points.every((p) => tolerance.equal(Segment.distanceToLine(line, p), 0));
}

/**
 * Either segment lies on the infinite line through the other (within tolerance)
 */
function isCollinear(l1: LineSegment, l2: LineSegment, tolerance: Tolerance): boolean {
  return (
    isOnLine(l1, [l2.start, l2.end], tolerance) || isOnLine(l2, [l1.start, l1.end], tolerance)
  );
}

/**
 * Intersect two segments.
 *
 * Each segment is written as a*x + b*y + c = 0:
 *   a = start.y - end.y
 *   b = end.x - start.x
 *   c = start.x * end.y - end.x * start.y
 *
 * With det = a1*b2 - b1*a2 != 0 the lines cross at
 *   x = (b1*c2 - b2*c1) / det
 *   y = (a2*c1 - a1*c2) / det
 * and the point counts only if both segments contain it.
 *
 * Segments are handled as parallel when det == 0 (this includes a zero-length
 * segment) or when one segment lies within epsilon of the other's line, which
 * catches collinear segments whose det is rounding noise. Then the endpoints of
 * either segment lying on the other are returned, so overlapping collinear
 * segments report where their overlap begins and ends, and disjoint parallel
 * segments report nothing.
 */
export function intersectLineLine(
  l1: LineSegment,
  l2: LineSegment,
  tolerance: Tolerance
): IntersectionResult {
  const a1 = l1.start.y - l1.end.y;
  const b1 = l1.end.x - l1.start.x;

  const a2 = l2.start.y - l2.end.y;
  const b2 = l2.end.x - l2.start.x;

  const det = a1 * b2 - b1 * a2;

  if (det === 0 || isCollinear(l1, l2, tolerance)) {
    GeometryDebugLogger.logDegenerate("parallel-lines", "intersects(line, line)", [
      l1.start,
      l1.end,
      l2.start,
      l2.end,
    ]);

    const points: Vector2[] = [];
    pushUnique(
      points,
      [l1.start, l1.end].filter((p) => lineContainsPoint(l2, p, tolerance)),
      tolerance
    );
    pushUnique(
      points,
      [l2.start, l2.end].filter((p) => lineContainsPoint(l1, p, tolerance)),
      tolerance
    );
    return hit(points);
  }

  const c1 = l1.start.x * l1.end.y - l1.end.x * l1.start.y;
  const c2 = l2.start.x * l2.end.y - l2.end.x * l2.start.y;

  const point: Vector2 = {
    x: (b1 * c2 - b2 * c1) / det,
    y: (a2 * c1 - a1 * c2) / det,
  };

  if (lineContainsPoint(l1, point, tolerance) && lineContainsPoint(l2, point, tolerance)) {
    return hit([point]);
  }

  return noHit();
}

// =============================================================================
// CIRCLE VS LINE / CIRCLE
// =============================================================================

/**
 * Squared distance to the center equals radius^2 within tolerance, the same
 * scale circleContainsPoint uses for its boundary
 */
function onCircle(c: Circle, p: Vector2, tolerance: Tolerance): boolean {
  return tolerance.equal(Vec2.lengthSquared(Vec2.subtract(c.pos, p)), c.radius * c.radius);
}

function logCollapsedCircle(c: Circle, source: string): void {
  if (c.radius === 0) {
    GeometryDebugLogger.logDegenerate("zero-radius-circle", source, [c.pos]);
  }
}

/**
 * Intersect a circle boundary with a segment.
 *
 * 1. Project the center onto the infinite line: closest = start + u * d,
 *    u = dot(d, center - start) / |d|^2
 * 2. dist = |center - closest|
 *    - dist > radius (beyond tolerance): no intersection
 *    - dist^2 ≈ radius^2: one tangent point
 *    - otherwise: closest ± normalize(d) * sqrt(r^2 - dist^2)
 * 3. Keep only the points the segment contains.
 *
 * A zero-length segment intersects when its point lies on the circle.
 * Boundary checks compare squared distances, matching circleContainsPoint.
 */
export function intersectCircleLine(
  c: Circle,
  l: LineSegment,
  tolerance: Tolerance
): IntersectionResult {
  logCollapsedCircle(c, "intersects(circle, line)");

  const d = Segment.vector(l);
  const lengthSq = Vec2.lengthSquared(d);

  if (lengthSq === 0) {
    GeometryDebugLogger.logDegenerate("zero-length-line", "intersects(circle, line)", [l.start]);
    return onCircle(c, l.start, tolerance) ? hit([l.start]) : noHit();
  }

  const u = Vec2.dot(d, Vec2.subtract(c.pos, l.start)) / lengthSq;
  const closest = Vec2.add(l.start, Vec2.scale(d, u));
  const dist = Vec2.distance(c.pos, closest);

  if (onCircle(c, closest, tolerance)) {
    // Tangent
    return lineContainsPoint(l, closest, tolerance) ? hit([closest]) : noHit();
  }

  if (dist > c.radius) {
    return noHit();
  }

  const offset = Vec2.scale(Vec2.normalize(d), Math.sqrt(c.radius * c.radius - dist * dist));
  const candidates = [Vec2.add(closest, offset), Vec2.subtract(closest, offset)];

  return hit(candidates.filter((p) => lineContainsPoint(l, p, tolerance)));
}

/**
 * Intersect two circle boundaries using the radical line.
 *
 *   d  = |c2 - c1|
 *   a  = (r1^2 - r2^2 + d^2) / 2d     distance from c1 to the radical line
 *   h^2 = r1^2 - a^2                  half the chord length, squared
 *
 * h^2 < 0 (beyond tolerance) means the circles are apart or nested. The points
 * are p ± h * perpendicular(c2 - c1) / d with p = c1 + (c2 - c1) * a / d;
 * a tangent pair collapses to one point.
 *
 * Circles sharing a center (d == 0) have no radical line and yield no points,
 * even when they coincide entirely. Any other center distance, however small,
 * goes through the construction, so an internally tangent pair with nearly
 * coincident centers still reports its touching point.
 */
export function intersectCircleCircle(
  c1: Circle,
  c2: Circle,
  tolerance: Tolerance
): IntersectionResult {
  logCollapsedCircle(c1, "intersects(circle, circle)");
  logCollapsedCircle(c2, "intersects(circle, circle)");

  const dist = Vec2.distance(c1.pos, c2.pos);

  if (tolerance.equal(dist, 0)) {
    GeometryDebugLogger.logDegenerate("concentric-circles", "intersects(circle, circle)", [
      c1.pos,
      c2.pos,
    ]);
  }

  if (dist === 0) {
    return noHit();
  }

  const sqrR1 = c1.radius * c1.radius;
  const sqrR2 = c2.radius * c2.radius;

  const adj = (sqrR1 - sqrR2 + dist * dist) / (2 * dist);
  const sqrHyp = sqrR1 - adj * adj;

  if (sqrHyp < 0 && !tolerance.equal(sqrHyp, 0)) {
    return noHit();
  }

  const hyp = Math.sqrt(Math.max(0, sqrHyp));
  const dx = c2.pos.x - c1.pos.x;
  const dy = c2.pos.y - c1.pos.y;
  const p = Vec2.add(c1.pos, Vec2.scale({ x: dx, y: dy }, adj / dist));

  const inter1: Vector2 = { x: p.x + (hyp * dy) / dist, y: p.y - (hyp * dx) / dist };
  const inter2: Vector2 = { x: p.x - (hyp * dy) / dist, y: p.y + (hyp * dx) / dist };

  return Vec2.approxEquals(inter1, inter2, tolerance) ? hit([inter1]) : hit([inter1, inter2]);
}

// =============================================================================
// RECTANGLE VS X
// =============================================================================

/**
 * Run a per-side intersection over the four sides and union the points.
 * Points shared by two sides (corners) are reported once per side.
 */
function intersectSides(
  r: Rectangle,
  perSide: (side: LineSegment) => IntersectionResult
): IntersectionResult {
  const points: Vector2[] = [];
  const sides: RectSide[] = [];

  for (const side of RECT_SIDES) {
    const result = perSide(Rect.side(r, side));
    if (result.points.length > 0) {
      points.push(...result.points);
      sides.push(side);
    }
  }

  return hit(points, sides);
}

function logCollapsedRect(r: Rectangle, source: string): void {
  if (Rect.isDegenerate(r)) {
    GeometryDebugLogger.logDegenerate("zero-size-rect", source, [r.pos, Rect.bottomRight(r)]);
  }
}

export function intersectRectLine(
  r: Rectangle,
  l: LineSegment,
  tolerance: Tolerance
): IntersectionResult {
  logCollapsedRect(r, "intersects(rect, line)");
  return intersectSides(r, (side) => intersectLineLine(side, l, tolerance));
}

/**
 * Every side of r1 against every side of r2; `sides` refers to r1.
 */
export function intersectRectRect(
  r1: Rectangle,
  r2: Rectangle,
  tolerance: Tolerance
): IntersectionResult {
  logCollapsedRect(r1, "intersects(rect, rect)");
  logCollapsedRect(r2, "intersects(rect, rect)");
  return intersectSides(r1, (side) =>
    intersectSides(r2, (other) => intersectLineLine(side, other, tolerance))
  );
}

export function intersectRectCircle(
  r: Rectangle,
  c: Circle,
  tolerance: Tolerance
): IntersectionResult {
  logCollapsedRect(r, "intersects(rect, circle)");
  return intersectSides(r, (side) => intersectCircleLine(c, side, tolerance));
}

// =============================================================================
// DISPATCH
// =============================================================================

export const CANONICAL_INTERSECTIONS: CanonicalTable<IntersectionResult> = {
  "point:point": intersectPointPoint,
  "line:point": intersectLinePoint,
  "line:line": intersectLineLine,
  "circle:point": intersectCirclePoint,
  "circle:line": intersectCircleLine,
  "circle:circle": intersectCircleCircle,
  "rect:point": intersectRectPoint,
  "rect:line": intersectRectLine,
  "rect:circle": intersectRectCircle,
  "rect:rect": intersectRectRect,
};

export const INTERSECTS_TABLE: PairTable<IntersectionResult> = symmetricTable(CANONICAL_INTERSECTIONS);

/**
 * Find where two geometries meet.
 *
 * @param a - First point or shape
 * @param b - Second point or shape
 * @param tolerance - Slack for boundary decisions, DEFAULT_TOLERANCE if omitted
 * @returns Fresh result; `points` is empty when the operands do not intersect
 */
export function intersects(
  a: Geometry,
  b: Geometry,
  tolerance: Tolerance = DEFAULT_TOLERANCE
): IntersectionResult {
  return dispatchPair(INTERSECTS_TABLE, a, b, tolerance);
}

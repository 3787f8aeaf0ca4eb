import type { LineSegment, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/**
 * Segment - Pure utility functions for line segment operations
 */
export const Segment = {
  /**
   * Create a line segment from two points
   */
  create(start: Vector2, end: Vector2): LineSegment {
    return { kind: "line", start, end };
  },

  /**
   * Vector from start to end (not normalized)
   */
  vector(segment: LineSegment): Vector2 {
    return Vec2.subtract(segment.end, segment.start);
  },

  /**
   * Get direction vector of segment (from start to end, normalized).
   * Zero vector for a zero-length segment.
   */
  direction(segment: LineSegment): Vector2 {
    return Vec2.normalize(Segment.vector(segment));
  },

  /**
   * Get length of segment
   */
  length(segment: LineSegment): number {
    return Vec2.distance(segment.start, segment.end);
  },

  /**
   * Get midpoint of segment
   */
  midpoint(segment: LineSegment): Vector2 {
    return {
      x: (segment.start.x + segment.end.x) / 2,
      y: (segment.start.y + segment.end.y) / 2,
    };
  },

  isDegenerate(segment: LineSegment): boolean {
    return Vec2.equals(segment.start, segment.end);
  },

  /**
   * Point at parameter t along the segment (0 = start, 1 = end)
   */
  pointAt(segment: LineSegment, t: number): Vector2 {
    return Vec2.lerp(segment.start, segment.end, t);
  },

  /**
   * Perpendicular distance from a point to the infinite line through the segment.
   *
   * Implicit line form: a*x + b*y + c = 0 with
   *   a = end.y - start.y
   *   b = start.x - end.x
   *   c = end.x * start.y - start.x * end.y
   *
   * Falls back to the distance from `start` for a zero-length segment.
   */
  distanceToLine(segment: LineSegment, point: Vector2): number {
    const { start, end } = segment;
    const a = end.y - start.y;
    const b = start.x - end.x;

    if (a === 0 && b === 0) {
      return Vec2.distance(point, start);
    }

    const c = end.x * start.y - start.x * end.y;
    return Math.abs(a * point.x + b * point.y + c) / Math.sqrt(a * a + b * b);
  },
};

import { DEFAULT_TOLERANCE } from "@/config/toleranceConfig";
import { RECT_SIDES, Rect } from "@/math/Rect";
import { type Geometry, type Rectangle, Side, type Tolerance, type Vector2 } from "@/types";
import { contains, lineContainsPoint } from "./contains";
import { intersects } from "./intersects";

/**
 * Check if two geometries share at least one point.
 *
 * Unlike `intersects`, which reports boundary crossings, this is also true
 * when one operand lies strictly inside the other.
 */
export function overlaps(a: Geometry, b: Geometry, tolerance: Tolerance = DEFAULT_TOLERANCE): boolean {
  return (
    intersects(a, b, tolerance).points.length > 0 ||
    contains(a, b, tolerance) ||
    contains(b, a, tolerance)
  );
}

/**
 * Find the first side (left, top, right, bottom order) that a point lies on.
 * @returns The side, or Side.None when the point is not on the boundary
 */
export function sideOf(rect: Rectangle, point: Vector2, tolerance: Tolerance = DEFAULT_TOLERANCE): Side {
  for (const side of RECT_SIDES) {
    if (lineContainsPoint(Rect.side(rect, side), point, tolerance)) {
      return side;
    }
  }
  return Side.None;
}

import { type LineSegment, type RectSide, type Rectangle, Side, type Vector2 } from "@/types";
import { Segment } from "./Segment";
import { Vec2 } from "./Vec2";

/** The four real sides, in index order */
export const RECT_SIDES: readonly RectSide[] = [Side.Left, Side.Top, Side.Right, Side.Bottom];

/**
 * Check whether a number is a valid side index (None excluded)
 */
export function isRectSide(index: number): index is RectSide {
  return Number.isInteger(index) && index >= Side.Left && index <= Side.Bottom;
}

/**
 * Rect - Pure utility functions for axis-aligned rectangles
 *
 * Coordinates follow screen convention: `pos` is the top-left corner and y
 * grows downward, so "bottom" has the larger y.
 */
export const Rect = {
  /**
   * Create a rectangle from its top-left corner and size
   * @throws Error when a size component is negative or not finite
   */
  create(pos: Vector2, size: Vector2): Rectangle {
    if (!Number.isFinite(size.x) || !Number.isFinite(size.y) || size.x < 0 || size.y < 0) {
      throw new Error(`Rectangle size must be finite and non-negative, got ${Vec2.format(size)}`);
    }
    return { kind: "rect", pos, size };
  },

  area(rect: Rectangle): number {
    return rect.size.x * rect.size.y;
  },

  perimeter(rect: Rectangle): number {
    return 2 * (rect.size.x + rect.size.y);
  },

  center(rect: Rectangle): Vector2 {
    return Vec2.add(rect.pos, Vec2.scale(rect.size, 0.5));
  },

  isDegenerate(rect: Rectangle): boolean {
    return rect.size.x === 0 || rect.size.y === 0;
  },

  topLeft(rect: Rectangle): Vector2 {
    return rect.pos;
  },

  topRight(rect: Rectangle): Vector2 {
    return { x: rect.pos.x + rect.size.x, y: rect.pos.y };
  },

  bottomLeft(rect: Rectangle): Vector2 {
    return { x: rect.pos.x, y: rect.pos.y + rect.size.y };
  },

  bottomRight(rect: Rectangle): Vector2 {
    return Vec2.add(rect.pos, rect.size);
  },

  /**
   * All four corners: top-left, top-right, bottom-left, bottom-right
   */
  corners(rect: Rectangle): Vector2[] {
    return [Rect.topLeft(rect), Rect.topRight(rect), Rect.bottomLeft(rect), Rect.bottomRight(rect)];
  },

  left(rect: Rectangle): LineSegment {
    return Segment.create(rect.pos, Rect.bottomLeft(rect));
  },

  top(rect: Rectangle): LineSegment {
    return Segment.create(rect.pos, Rect.topRight(rect));
  },

  right(rect: Rectangle): LineSegment {
    return Segment.create(Rect.topRight(rect), Rect.bottomRight(rect));
  },

  bottom(rect: Rectangle): LineSegment {
    return Segment.create(Rect.bottomLeft(rect), Rect.bottomRight(rect));
  },

  /**
   * Side segment by index
   * @throws Error when the index is not in [0, 3]
   */
  side(rect: Rectangle, index: number): LineSegment {
    if (!isRectSide(index)) {
      throw new Error(`Side index ${index} out of bounds [${Side.Left}, ${Side.Bottom}]`);
    }

    switch (index) {
      case Side.Left:
        return Rect.left(rect);
      case Side.Top:
        return Rect.top(rect);
      case Side.Right:
        return Rect.right(rect);
      case Side.Bottom:
        return Rect.bottom(rect);
    }
  },

  /**
   * All four sides, in index order
   */
  sides(rect: Rectangle): LineSegment[] {
    return RECT_SIDES.map((side) => Rect.side(rect, side));
  },
};

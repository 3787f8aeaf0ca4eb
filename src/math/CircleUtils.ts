import type { Circle, Rectangle, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/**
 * CircleUtils - Pure utility functions for circles
 */
export const CircleUtils = {
  /**
   * Create a circle from its center and radius
   * @throws Error when the radius is negative or not finite
   */
  create(pos: Vector2, radius: number): Circle {
    if (!Number.isFinite(radius) || radius < 0) {
      throw new Error(`Circle radius must be a finite non-negative number, got ${radius}`);
    }
    return { kind: "circle", pos, radius };
  },

  area(circle: Circle): number {
    return Math.PI * circle.radius * circle.radius;
  },

  circumference(circle: Circle): number {
    return 2 * Math.PI * circle.radius;
  },

  /**
   * Axis-aligned square that encloses the circle
   */
  boundingRect(circle: Circle): Rectangle {
    return {
      kind: "rect",
      pos: Vec2.subtract(circle.pos, circle.radius),
      size: Vec2.splat(circle.radius * 2),
    };
  },
};

/**
 * planar-kit
 *
 * 2D vectors, circles, segments and axis-aligned rectangles, with containment
 * and intersection predicates between every pair of them.
 */

export * from "./types";

export { DEFAULT_TOLERANCE, DEFAULT_TOLERANCE_OPTIONS, EPSILON, PI, createTolerance } from "./config/toleranceConfig";

export { Vec2, type Operand } from "./math/Vec2";
export { Segment } from "./math/Segment";
export { CircleUtils } from "./math/CircleUtils";
export { RECT_SIDES, Rect, isRectSide } from "./math/Rect";

export * from "./geometry";

export { GeometryDebugLogger, type DegenerateCase, type GeometryDebugLog } from "./debug/GeometryDebugLogger";

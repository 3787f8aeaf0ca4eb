import { createTolerance } from "@/config/toleranceConfig";
import { Vec2 } from "@/math/Vec2";
import { describe, expect, it } from "vitest";

describe("Vec2", () => {
  describe("create", () => {
    it("should create a vector with given coordinates", () => {
      const v = Vec2.create(3, 4);
      expect(v).toEqual({ x: 3, y: 4 });
    });
  });

  describe("splat", () => {
    it("should broadcast a scalar to both components", () => {
      expect(Vec2.splat(7)).toEqual({ x: 7, y: 7 });
    });
  });

  describe("zero", () => {
    it("should return zero vector", () => {
      expect(Vec2.zero()).toEqual({ x: 0, y: 0 });
    });
  });

  describe("add", () => {
    it("should add two vectors", () => {
      const a = { x: 1, y: 2 };
      const b = { x: 3, y: 4 };
      expect(Vec2.add(a, b)).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative values", () => {
      const a = { x: -1, y: 2 };
      const b = { x: 3, y: -4 };
      expect(Vec2.add(a, b)).toEqual({ x: 2, y: -2 });
    });

    it("should add a scalar to both components", () => {
      expect(Vec2.add({ x: 1, y: 2 }, 10)).toEqual({ x: 11, y: 12 });
    });
  });

  describe("subtract", () => {
    it("should subtract two vectors", () => {
      const a = { x: 5, y: 7 };
      const b = { x: 2, y: 3 };
      expect(Vec2.subtract(a, b)).toEqual({ x: 3, y: 4 });
    });

    it("should subtract a scalar from both components", () => {
      expect(Vec2.subtract({ x: 5, y: 7 }, 2)).toEqual({ x: 3, y: 5 });
    });
  });

  describe("multiply / divide / modulo", () => {
    it("should multiply component-wise", () => {
      expect(Vec2.multiply({ x: 2, y: 3 }, { x: 4, y: 5 })).toEqual({ x: 8, y: 15 });
      expect(Vec2.multiply({ x: 2, y: 3 }, 3)).toEqual({ x: 6, y: 9 });
    });

    it("should divide component-wise", () => {
      expect(Vec2.divide({ x: 6, y: 8 }, { x: 2, y: 4 })).toEqual({ x: 3, y: 2 });
      expect(Vec2.divide({ x: 6, y: 8 }, 2)).toEqual({ x: 3, y: 4 });
    });

    it("should keep fractional results when dividing integer-valued vectors", () => {
      expect(Vec2.divide({ x: 7, y: 1 }, 2)).toEqual({ x: 3.5, y: 0.5 });
    });

    it("should take the remainder with the sign of the dividend", () => {
      expect(Vec2.modulo({ x: 7, y: -7 }, 3)).toEqual({ x: 1, y: -1 });
    });
  });

  describe("scale", () => {
    it("should scale a vector by a scalar", () => {
      const v = { x: 2, y: 3 };
      expect(Vec2.scale(v, 2)).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative scalar", () => {
      const v = { x: 2, y: 3 };
      expect(Vec2.scale(v, -1)).toEqual({ x: -2, y: -3 });
    });
  });

  describe("negate", () => {
    it("should flip both components", () => {
      expect(Vec2.negate({ x: 2, y: -3 })).toEqual({ x: -2, y: 3 });
    });
  });

  describe("dot", () => {
    it("should calculate dot product", () => {
      const a = { x: 1, y: 2 };
      const b = { x: 3, y: 4 };
      expect(Vec2.dot(a, b)).toBe(11); // 1*3 + 2*4
    });

    it("should return zero for perpendicular vectors", () => {
      const a = { x: 1, y: 0 };
      const b = { x: 0, y: 1 };
      expect(Vec2.dot(a, b)).toBe(0);
    });
  });

  describe("cross", () => {
    it("should return the signed parallelogram area", () => {
      expect(Vec2.cross({ x: 1, y: 0 }, { x: 0, y: 1 })).toBe(1);
      expect(Vec2.cross({ x: 0, y: 1 }, { x: 1, y: 0 })).toBe(-1);
      expect(Vec2.cross({ x: 2, y: 3 }, { x: 4, y: 5 })).toBe(-2); // 2*5 - 3*4
    });

    it("should be zero for parallel vectors", () => {
      expect(Vec2.cross({ x: 2, y: 4 }, { x: 1, y: 2 })).toBe(0);
    });
  });

  describe("lengthSquared", () => {
    it("should calculate squared length", () => {
      const v = { x: 3, y: 4 };
      expect(Vec2.lengthSquared(v)).toBe(25); // 9 + 16
    });
  });

  describe("length", () => {
    it("should calculate vector length", () => {
      const v = { x: 3, y: 4 };
      expect(Vec2.length(v)).toBe(5); // 3-4-5 triangle
    });

    it("should return zero for zero vector", () => {
      expect(Vec2.length({ x: 0, y: 0 })).toBe(0);
    });
  });

  describe("normalize", () => {
    it("should normalize a vector to unit length", () => {
      const normalized = Vec2.normalize({ x: 3, y: 4 });
      expect(normalized.x).toBeCloseTo(0.6);
      expect(normalized.y).toBeCloseTo(0.8);
      expect(Vec2.length(normalized)).toBeCloseTo(1);
    });

    it("should handle zero vector", () => {
      expect(Vec2.normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    });

    it("should be idempotent", () => {
      const once = Vec2.normalize({ x: -7, y: 24 });
      const twice = Vec2.normalize(once);
      expect(twice.x).toBeCloseTo(once.x, 12);
      expect(twice.y).toBeCloseTo(once.y, 12);
    });
  });

  describe("perpendicular", () => {
    it("should return perpendicular vector (90° counter-clockwise)", () => {
      const perp = Vec2.perpendicular({ x: 1, y: 0 });
      expect(perp.x).toBeCloseTo(0);
      expect(perp.y).toBeCloseTo(1);
    });

    it("should be perpendicular (dot product = 0)", () => {
      const v = { x: 3, y: 7 };
      expect(Vec2.dot(v, Vec2.perpendicular(v))).toBeCloseTo(0);
    });
  });

  describe("distance", () => {
    it("should calculate distance between points", () => {
      expect(Vec2.distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });

    it("should return zero for same point", () => {
      const a = { x: 5, y: 5 };
      expect(Vec2.distance(a, a)).toBe(0);
    });
  });

  describe("manhattan", () => {
    it("should sum the absolute component differences", () => {
      expect(Vec2.manhattan({ x: 1, y: 5 }, { x: 4, y: 1 })).toBe(7);
    });
  });

  describe("lerp", () => {
    it("should interpolate between two points", () => {
      expect(Vec2.lerp({ x: 0, y: 10 }, { x: 10, y: 20 }, 0.25)).toEqual({ x: 2.5, y: 12.5 });
    });

    it("should extrapolate outside [0, 1]", () => {
      expect(Vec2.lerp({ x: 0, y: 0 }, { x: 10, y: 10 }, 2)).toEqual({ x: 20, y: 20 });
    });
  });

  describe("clamp / min / max", () => {
    it("should clamp each component independently", () => {
      const lo = { x: 0, y: 0 };
      const hi = { x: 10, y: 5 };
      expect(Vec2.clamp({ x: 12, y: -3 }, lo, hi)).toEqual({ x: 10, y: 0 });
      expect(Vec2.clamp({ x: 4, y: 2 }, lo, hi)).toEqual({ x: 4, y: 2 });
    });

    it("should take component-wise min and max", () => {
      const a = { x: 1, y: 8 };
      const b = { x: 4, y: 2 };
      expect(Vec2.min(a, b)).toEqual({ x: 1, y: 2 });
      expect(Vec2.max(a, b)).toEqual({ x: 4, y: 8 });
    });
  });

  describe("abs / floor / ceil / round", () => {
    it("should apply the operation to each component", () => {
      expect(Vec2.abs({ x: -3, y: 4 })).toEqual({ x: 3, y: 4 });
      expect(Vec2.floor({ x: 1.7, y: -1.2 })).toEqual({ x: 1, y: -2 });
      expect(Vec2.ceil({ x: 1.2, y: -1.7 })).toEqual({ x: 2, y: -1 });
      expect(Vec2.round({ x: 1.5, y: 2.4 })).toEqual({ x: 2, y: 2 });
    });
  });

  describe("angleBetween", () => {
    it("should return π/2 for perpendicular vectors of different lengths", () => {
      expect(Vec2.angleBetween({ x: 3, y: 0 }, { x: 0, y: 4 })).toBeCloseTo(Math.PI / 2);
    });

    it("should return 0 for parallel vectors of different lengths", () => {
      expect(Vec2.angleBetween({ x: 2, y: 2 }, { x: 5, y: 5 })).toBeCloseTo(0);
    });

    it("should return π for opposite vectors", () => {
      expect(Vec2.angleBetween({ x: 1, y: 0 }, { x: -3, y: 0 })).toBeCloseTo(Math.PI);
    });

    it("should use the product of the lengths, not their sum", () => {
      // dot / (|a| + |b|) would give acos(1 / 2) = π/3 here
      expect(Vec2.angleBetween({ x: 1, y: 0 }, { x: 1, y: 0 })).toBe(0);
    });

    it("should return 0 when either vector has zero length", () => {
      expect(Vec2.angleBetween({ x: 0, y: 0 }, { x: 1, y: 1 })).toBe(0);
    });
  });

  describe("polar / cartesian", () => {
    it("should convert to (length, angle)", () => {
      const polar = Vec2.toPolar({ x: 0, y: 2 });
      expect(polar.x).toBe(2);
      expect(polar.y).toBeCloseTo(Math.PI / 2);
    });

    it("should convert (radius, angle) to a point", () => {
      const p = Vec2.toCartesian({ x: 2, y: Math.PI });
      expect(p.x).toBeCloseTo(-2);
      expect(p.y).toBeCloseTo(0);
    });

    it("should round-trip a non-zero vector", () => {
      const v = { x: 3, y: -4 };
      const back = Vec2.toCartesian(Vec2.toPolar(v));
      expect(back.x).toBeCloseTo(3, 9);
      expect(back.y).toBeCloseTo(-4, 9);
    });
  });

  describe("comparisons", () => {
    it("should require both components to satisfy the relation", () => {
      const a = { x: 1, y: 2 };
      const b = { x: 3, y: 4 };
      expect(Vec2.lessThan(a, b)).toBe(true);
      expect(Vec2.lessOrEqual(a, b)).toBe(true);
      expect(Vec2.greaterThan(b, a)).toBe(true);
      expect(Vec2.greaterOrEqual(b, a)).toBe(true);
    });

    it("should form a partial order", () => {
      const a = { x: 1, y: 5 };
      const b = { x: 2, y: 3 };
      expect(Vec2.lessThan(a, b)).toBe(false);
      expect(Vec2.lessOrEqual(a, b)).toBe(false);
      expect(Vec2.greaterThan(a, b)).toBe(false);
      expect(Vec2.greaterOrEqual(a, b)).toBe(false);
    });

    it("should treat equal components as <= and >= but not < or >", () => {
      const a = { x: 2, y: 2 };
      expect(Vec2.lessOrEqual(a, a)).toBe(true);
      expect(Vec2.greaterOrEqual(a, a)).toBe(true);
      expect(Vec2.lessThan(a, a)).toBe(false);
      expect(Vec2.greaterThan(a, a)).toBe(false);
    });

    it("should compare for exact equality", () => {
      expect(Vec2.equals({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
      expect(Vec2.notEquals({ x: 1, y: 2 }, { x: 1, y: 3 })).toBe(true);
      expect(Vec2.notEquals({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(false);
    });
  });

  describe("approxEquals", () => {
    it("should accept differences within the default epsilon", () => {
      expect(Vec2.approxEquals({ x: 1, y: 1 }, { x: 1.005, y: 0.995 })).toBe(true);
      expect(Vec2.approxEquals({ x: 1, y: 1 }, { x: 1.05, y: 1 })).toBe(false);
    });

    it("should use a caller-supplied tolerance", () => {
      const loose = createTolerance({ epsilon: 0.5 });
      expect(Vec2.approxEquals({ x: 1, y: 1 }, { x: 1.4, y: 0.7 }, loose)).toBe(true);
    });
  });

  describe("format", () => {
    it("should format as (x, y)", () => {
      expect(Vec2.format({ x: 1.5, y: -2 })).toBe("(1.5, -2)");
    });
  });
});

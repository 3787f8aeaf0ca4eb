/**
 * Pair dispatch for the predicate suite
 *
 * Every predicate is a table with one handler per ordered pair of geometry
 * kinds. Symmetric predicates only implement the canonical half of the table
 * (the "larger" kind first, ranked point < line < circle < rect); the other
 * half is generated here by swapping arguments, so each formula exists once.
 */

import type {
  Circle,
  Geometry,
  GeometryKind,
  LineSegment,
  Rectangle,
  Shape,
  Tolerance,
  Vector2,
} from "@/types";

/** Concrete value type for a geometry kind */
export type GeometryOf<K extends GeometryKind> = K extends "point"
  ? Vector2
  : Extract<Shape, { kind: K }>;

/** "<kindA>:<kindB>" */
export type PairKey = `${GeometryKind}:${GeometryKind}`;

export type PairHandler<A extends GeometryKind, B extends GeometryKind, R> = (
  a: GeometryOf<A>,
  b: GeometryOf<B>,
  tolerance: Tolerance
) => R;

/** One handler for every ordered pair */
export type PairTable<R> = {
  readonly [P in PairKey]: P extends `${infer A extends GeometryKind}:${infer B extends GeometryKind}`
    ? PairHandler<A, B, R>
    : never;
};

/** Pairs whose first kind ranks at least as high as the second */
export type CanonicalKey =
  | "point:point"
  | "line:point"
  | "line:line"
  | "circle:point"
  | "circle:line"
  | "circle:circle"
  | "rect:point"
  | "rect:line"
  | "rect:circle"
  | "rect:rect";

export type CanonicalTable<R> = Pick<PairTable<R>, CanonicalKey>;

/**
 * Geometry value tagged with its kind, so a switch on `kind` narrows `value`.
 */
export type TaggedGeometry =
  | { readonly kind: "point"; readonly value: Vector2 }
  | { readonly kind: "line"; readonly value: LineSegment }
  | { readonly kind: "circle"; readonly value: Circle }
  | { readonly kind: "rect"; readonly value: Rectangle };

/**
 * Tag a geometry value. A value without a `kind` field is a point.
 */
export function tagGeometry(g: Geometry): TaggedGeometry {
  if (!("kind" in g)) {
    return { kind: "point", value: g };
  }

  switch (g.kind) {
    case "line":
      return { kind: "line", value: g };
    case "circle":
      return { kind: "circle", value: g };
    case "rect":
      return { kind: "rect", value: g };
  }
}

/**
 * Discriminator of a geometry value
 */
export function kindOf(g: Geometry): GeometryKind {
  return "kind" in g ? g.kind : "point";
}

/**
 * Complete a canonical table into a full table.
 * Reversed pairs call the canonical handler with the arguments swapped.
 */
export function symmetricTable<R>(canonical: CanonicalTable<R>): PairTable<R> {
  return {
    ...canonical,
    "point:line": (p, l, t) => canonical["line:point"](l, p, t),
    "point:circle": (p, c, t) => canonical["circle:point"](c, p, t),
    "point:rect": (p, r, t) => canonical["rect:point"](r, p, t),
    "line:circle": (l, c, t) => canonical["circle:line"](c, l, t),
    "line:rect": (l, r, t) => canonical["rect:line"](r, l, t),
    "circle:rect": (c, r, t) => canonical["rect:circle"](r, c, t),
  };
}

/**
 * Call the handler registered for the kinds of `a` and `b`, in that order.
 */
export function dispatchPair<R>(
  table: PairTable<R>,
  a: Geometry,
  b: Geometry,
  tolerance: Tolerance
): R {
  const x = tagGeometry(a);
  const y = tagGeometry(b);

  switch (x.kind) {
    case "point":
      switch (y.kind) {
        case "point":
          return table["point:point"](x.value, y.value, tolerance);
        case "line":
          return table["point:line"](x.value, y.value, tolerance);
        case "circle":
          return table["point:circle"](x.value, y.value, tolerance);
        case "rect":
          return table["point:rect"](x.value, y.value, tolerance);
      }
    case "line":
      switch (y.kind) {
        case "point":
          return table["line:point"](x.value, y.value, tolerance);
        case "line":
          return table["line:line"](x.value, y.value, tolerance);
        case "circle":
          return table["line:circle"](x.value, y.value, tolerance);
        case "rect":
          return table["line:rect"](x.value, y.value, tolerance);
      }
    case "circle":
      switch (y.kind) {
        case "point":
          return table["circle:point"](x.value, y.value, tolerance);
        case "line":
          return table["circle:line"](x.value, y.value, tolerance);
        case "circle":
          return table["circle:circle"](x.value, y.value, tolerance);
        case "rect":
          return table["circle:rect"](x.value, y.value, tolerance);
      }
    case "rect":
      switch (y.kind) {
        case "point":
          return table["rect:point"](x.value, y.value, tolerance);
        case "line":
          return table["rect:line"](x.value, y.value, tolerance);
        case "circle":
          return table["rect:circle"](x.value, y.value, tolerance);
        case "rect":
          return table["rect:rect"](x.value, y.value, tolerance);
      }
  }
}

/**
 * Geometry Module Exports
 *
 * Containment and intersection predicates over points and shapes.
 */

// Pair dispatch
export {
  dispatchPair,
  kindOf,
  symmetricTable,
  tagGeometry,
  type CanonicalKey,
  type CanonicalTable,
  type GeometryOf,
  type PairHandler,
  type PairKey,
  type PairTable,
  type TaggedGeometry,
} from "./dispatch";

// Predicates
export { contains, CONTAINS_TABLE } from "./contains";
export { intersects, CANONICAL_INTERSECTIONS, INTERSECTS_TABLE } from "./intersects";
export { overlaps, sideOf } from "./queries";

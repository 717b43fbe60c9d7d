/**
 * Pyramid Module
 *
 * Zoom-level enumeration, bounds filtering and the generator itself.
 */

export { GenerateTiles, WORLD_BOUNDS, type PyramidResult } from "./GenerateTiles";
export { enumerateZoom, tileAt, tileCount } from "./enumerate";
export { boundsToPolygon, tileIntersectsBounds } from "./containment";
export { evaluateTile } from "./evaluate";
export {
  createStrategy,
  filterSequential,
  SequentialStrategy,
  ParallelStrategy,
  type ExecutionStrategy,
} from "./strategy";
export {
  resolveOptions,
  DEFAULT_CHUNK_SIZE,
  type GeneratorOptions,
  type ResolvedOptions,
  type StrategyName,
} from "./options";
export { MIN_ZOOM, MAX_ZOOM } from "./validate";

/**
 * Projection Module
 *
 * Coordinate conversion utilities for the spherical Web Mercator tile scheme.
 */

export type {
  LngLat,
  ProjectedPoint,
  TileTuple,
  LngLatBounds,
  BoundsArray,
} from "./types";

export {
  EARTH_RADIUS,
  TILE_SIZE,
  ORIGIN_SHIFT,
  MAX_LATITUDE,
  resolution,
  pixelsToMeters,
  metersToLngLat,
} from "./mercator";

export {
  tileIsValid,
  tileBounds,
  boundsFromTile,
  tileToString,
} from "./tileCoord";

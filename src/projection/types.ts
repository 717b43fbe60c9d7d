/**
 * Projection Types
 *
 * Type definitions for the coordinate systems used by the pyramid generator.
 */

/** WGS84 longitude/latitude coordinates */
export interface LngLat {
  lng: number;
  lat: number;
}

/** Spherical Web Mercator (EPSG:3857) position in meters */
export interface ProjectedPoint {
  x: number;
  y: number;
}

/** Tile index as [z, x, y] */
export type TileTuple = [z: number, x: number, y: number];

/** Bounding box in geographic degrees */
export interface LngLatBounds {
  /** Minimum longitude */
  minX: number;
  /** Minimum latitude */
  minY: number;
  /** Maximum longitude */
  maxX: number;
  /** Maximum latitude */
  maxY: number;
}

/** Bounding box as [minLng, minLat, maxLng, maxLat] */
export type BoundsArray = [number, number, number, number];

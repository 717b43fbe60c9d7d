/**
 * Web Mercator Projection
 *
 * Conversions between tile pixels, spherical Web Mercator meters and
 * WGS84 degrees for the 256-pixel slippy-map scheme.
 */

import type { LngLat, ProjectedPoint } from "./types";

/** Radius of the Web Mercator sphere in meters */
export const EARTH_RADIUS = 6378137;

/** Tile edge length in pixels */
export const TILE_SIZE = 256;

/** Half the projected world width in meters (~20037508.34) */
export const ORIGIN_SHIFT = (2 * Math.PI * EARTH_RADIUS) / 2;

/** Latitude of the top edge of tile row 0 (~85.05 degrees) */
export const MAX_LATITUDE = 85.051128779806604;

/** Radians to degrees conversion factor */
const RAD_TO_DEG = 180 / Math.PI;

/**
 * Meters per pixel at a zoom level.
 *
 * @param z - Zoom level
 */
export function resolution(z: number): number {
  return (2 * Math.PI * EARTH_RADIUS) / TILE_SIZE / Math.pow(2, z);
}

/**
 * Convert pixel coordinates at a zoom level to projected meters.
 *
 * Pixel y grows downward from the top-left corner of the world while
 * projected y grows northward, so the y axis is flipped.
 *
 * Tile edges on the world border, the prime meridian and the equator come
 * out exact; others can carry rounding error. The east edge of tile 2/2/1
 * is 89.99999999999999 degrees, so a target touching lng 90 reaches tile
 * 2/3/1 but not 2/2/1.
 *
 * @param z - Zoom level
 * @param px - Pixel x in the 256 * 2^z grid
 * @param py - Pixel y in the 256 * 2^z grid
 */
export function pixelsToMeters(z: number, px: number, py: number): ProjectedPoint {
  const res = resolution(z);
  const x = px * res - ORIGIN_SHIFT;
  const y = -(py * res - ORIGIN_SHIFT);
  return { x, y };
}

/**
 * Convert projected meters back to WGS84 degrees.
 *
 * @param x - Easting in meters
 * @param y - Northing in meters
 */
export function metersToLngLat(x: number, y: number): LngLat {
  const lng = (x / ORIGIN_SHIFT) * 180;
  const latDeg = (y / ORIGIN_SHIFT) * 180;
  const lat =
    RAD_TO_DEG * (2 * Math.atan(Math.exp(latDeg / RAD_TO_DEG)) - Math.PI / 2);
  return { lng, lat };
}

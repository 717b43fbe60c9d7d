/**
 * Tile Coordinate Utilities
 *
 * Geographic and projected footprints of slippy-map tiles.
 */

import { InvalidTileError } from "../errors";
import type { LngLatBounds, ProjectedPoint, TileTuple } from "./types";
import { metersToLngLat, pixelsToMeters, TILE_SIZE } from "./mercator";

/**
 * Check whether x and y both lie in [0, 2^z).
 *
 * @param z - Zoom level
 * @param x - Tile column
 * @param y - Tile row
 */
export function tileIsValid(z: number, x: number, y: number): boolean {
  const size = Math.pow(2, z);
  if (x >= size || y >= size) return false;
  if (x < 0 || y < 0) return false;
  return true;
}

/**
 * Get the min and max corners of a tile in projected meters.
 *
 * The min corner comes from the tile's bottom pixel row (y + 1): rows grow
 * downward in pixel space but northings grow upward.
 *
 * @throws InvalidTileError when the index is outside the grid
 */
export function tileBounds(
  z: number,
  x: number,
  y: number
): [min: ProjectedPoint, max: ProjectedPoint] {
  if (!tileIsValid(z, x, y)) {
    throw new InvalidTileError(z, x, y);
  }
  const min = pixelsToMeters(z, x * TILE_SIZE, (y + 1) * TILE_SIZE);
  const max = pixelsToMeters(z, (x + 1) * TILE_SIZE, y * TILE_SIZE);
  return [min, max];
}

/**
 * Get tile bounds in geographic degrees.
 *
 * @throws InvalidTileError when the index is outside the grid
 */
export function boundsFromTile(z: number, x: number, y: number): LngLatBounds {
  const [min, max] = tileBounds(z, x, y);
  const sw = metersToLngLat(min.x, min.y);
  const ne = metersToLngLat(max.x, max.y);
  return { minX: sw.lng, minY: sw.lat, maxX: ne.lng, maxY: ne.lat };
}

/**
 * Get a string key for a tile, useful for logging.
 *
 * @returns String representation "z/x/y"
 */
export function tileToString(tile: TileTuple): string {
  return `${tile[0]}/${tile[1]}/${tile[2]}`;
}

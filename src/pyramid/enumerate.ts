/**
 * Per-zoom tile enumeration
 *
 * Candidates are always listed x-major: every y of column 0, then column 1,
 * and so on. Positions in that order index the parallel result buffer.
 */

import type { TileTuple } from "../projection/types";

/** Number of tiles at a zoom level (4^z) */
export function tileCount(z: number): number {
  return Math.pow(4, z);
}

/** Get the candidate at a position of the x-major order */
export function tileAt(z: number, position: number): TileTuple {
  const size = Math.pow(2, z);
  return [z, Math.floor(position / size), position % size];
}

/**
 * List every tile of a zoom level in x-major order.
 *
 * @param z - Zoom level
 * @returns 4^z tiles
 */
export function enumerateZoom(z: number): TileTuple[] {
  const size = Math.pow(2, z);
  const tiles: TileTuple[] = [];
  for (let x = 0; x < size; x++) {
    for (let y = 0; y < size; y++) {
      tiles.push([z, x, y]);
    }
  }
  return tiles;
}

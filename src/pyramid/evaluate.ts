import type { LngLatBounds, TileTuple } from "../projection/types";
import { boundsFromTile } from "../projection/tileCoord";
import { tileIntersectsBounds } from "./containment";

/**
 * Decide whether a tile survives the bounds filter.
 *
 * Reads nothing but its arguments, so it runs the same on the calling
 * thread and inside a worker.
 */
export function evaluateTile(tile: TileTuple, bounds: LngLatBounds): boolean {
  const [z, x, y] = tile;
  return tileIntersectsBounds(boundsFromTile(z, x, y), bounds);
}

/**
 * Tile / bounds intersection test
 */

import { booleanIntersects } from "@turf/boolean-intersects";
import { polygon } from "@turf/helpers";
import type { Feature, Polygon } from "geojson";
import type { LngLatBounds } from "../projection/types";

/**
 * Build a closed rectangular polygon from a bounding box.
 *
 * Ring order: SW, SE, NE, NW, SW.
 */
export function boundsToPolygon(bounds: LngLatBounds): Feature<Polygon> {
  const { minX, minY, maxX, maxY } = bounds;
  return polygon([
    [
      [minX, minY],
      [maxX, minY],
      [maxX, maxY],
      [minX, maxY],
      [minX, minY],
    ],
  ]);
}

/**
 * Test whether a tile's footprint overlaps the target bounds.
 *
 * Boundaries are inclusive: tiles that only share an edge or a corner with
 * the target count as intersecting, and so does a zero-area target lying on
 * a tile.
 */
export function tileIntersectsBounds(
  tileBounds: LngLatBounds,
  targetBounds: LngLatBounds
): boolean {
  return booleanIntersects(boundsToPolygon(tileBounds), boundsToPolygon(targetBounds));
}

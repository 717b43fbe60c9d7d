/**
 * Construction-time checks for zoom range and bounds
 *
 * Checks run in a fixed order and the first violation is thrown.
 */

import { ConfigurationError } from "../errors";
import type { LngLatBounds } from "../projection/types";

export const MIN_ZOOM = 1;
export const MAX_ZOOM = 20;

function checkZoom(name: string, zoom: number): void {
  if (!Number.isInteger(zoom)) {
    throw new ConfigurationError(`${name} must be an integer, got ${zoom}`);
  }
  if (zoom > MAX_ZOOM) {
    throw new ConfigurationError(`${name} must be less than or equal to ${MAX_ZOOM}`);
  }
  if (zoom < MIN_ZOOM) {
    throw new ConfigurationError(`${name} must be greater than or equal to ${MIN_ZOOM}`);
  }
}

/** @throws ConfigurationError */
export function validateZoomRange(minZoom: number, maxZoom: number): void {
  checkZoom("minZoom", minZoom);
  checkZoom("maxZoom", maxZoom);
  if (minZoom > maxZoom) {
    throw new ConfigurationError("minZoom must be less than or equal to maxZoom");
  }
}

/**
 * Validate [minLng, minLat, maxLng, maxLat] and convert it to named bounds.
 *
 * @throws ConfigurationError
 */
export function parseBounds(bounds: readonly number[]): LngLatBounds {
  const [minX, minY, maxX, maxY] = bounds;
  if (
    bounds.length !== 4 ||
    minX === undefined ||
    minY === undefined ||
    maxX === undefined ||
    maxY === undefined
  ) {
    throw new ConfigurationError(
      `Incorrect length for bounds: expected 4 values, got ${bounds.length}. Ex. [-180, -90, 180, 90]`
    );
  }
  if (!bounds.every((value) => typeof value === "number" && Number.isFinite(value))) {
    throw new ConfigurationError(`Bounds must be finite numbers, got [${bounds.join(", ")}]`);
  }

  if (minX < -180) {
    throw new ConfigurationError("Minimum x bounds must be greater than or equal to -180");
  }
  if (minY < -90) {
    throw new ConfigurationError("Minimum y bounds must be greater than or equal to -90");
  }
  if (maxX > 180) {
    throw new ConfigurationError("Maximum x bounds must be less than or equal to 180");
  }
  if (maxY > 90) {
    throw new ConfigurationError("Maximum y bounds must be less than or equal to 90");
  }
  if (minX > maxX) {
    throw new ConfigurationError("Minimum x bounds must be less than or equal to maximum x bounds");
  }
  if (minY > maxY) {
    throw new ConfigurationError("Minimum y bounds must be less than or equal to maximum y bounds");
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Tile Pyramid - slippy-map tile enumeration for a zoom range and bounding box
 */

export const VERSION = "0.1.0";

export { ConfigurationError, InvalidTileError } from "./errors";
export * from "./projection";
export * from "./pyramid";

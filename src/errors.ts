/**
 * Error types thrown by the generator
 */

/** Invalid zoom range, bounds or generator options */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Tile geometry requested for an index outside the 2^z grid */
export class InvalidTileError extends Error {
  readonly z: number;
  readonly x: number;
  readonly y: number;

  constructor(z: number, x: number, y: number) {
    super(`Invalid tile ${z}/${x}/${y}: x and y must be in [0, ${Math.pow(2, z)})`);
    this.name = "InvalidTileError";
    this.z = z;
    this.x = x;
    this.y = y;
  }
}

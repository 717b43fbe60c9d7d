/**
 * Tile pyramid generator
 *
 * Lists, for every zoom level of a range, the slippy-map tiles whose
 * footprint intersects a geographic bounding box.
 */

import type { BoundsArray, LngLatBounds, TileTuple } from "../projection/types";
import { enumerateZoom } from "./enumerate";
import { resolveOptions, type GeneratorOptions, type ResolvedOptions } from "./options";
import { createStrategy, filterSequential, type ExecutionStrategy } from "./strategy";
import { parseBounds, validateZoomRange } from "./validate";

/** Zoom level -> surviving tiles, zoom keys in ascending order */
export type PyramidResult = Map<number, TileTuple[]>;

/** The whole world, [minLng, minLat, maxLng, maxLat] */
export const WORLD_BOUNDS: Readonly<BoundsArray> = [-180, -90, 180, 90];

/**
 * Every zoom level is enumerated in full (4^z candidates) before filtering,
 * so zoom 16 and above exceed the maximum JavaScript array length
 * (2^32 - 1) and fail with a RangeError or run out of memory. In practice
 * keep maxZoom at 15 or below.
 */
export class GenerateTiles {
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly bounds: Readonly<LngLatBounds>;
  readonly options: ResolvedOptions;

  /**
   * @param minZoom - First zoom level, 1-20
   * @param maxZoom - Last zoom level (inclusive), 1-20
   * @param bounds - [minLng, minLat, maxLng, maxLat] in degrees
   * @param options - Strategy and logging options
   * @throws ConfigurationError for an invalid zoom range, bounds or options
   */
  constructor(
    minZoom: number,
    maxZoom: number,
    bounds: readonly number[] = WORLD_BOUNDS,
    options: GeneratorOptions = {}
  ) {
    validateZoomRange(minZoom, maxZoom);
    const parsed = parseBounds(bounds);
    const resolved = resolveOptions(options);

    this.minZoom = minZoom;
    this.maxZoom = maxZoom;
    this.bounds = Object.freeze(parsed);
    this.options = resolved;
  }

  /** True when the bounds are exactly the world extent, so nothing is filtered */
  get coversWorld(): boolean {
    const { minX, minY, maxX, maxY } = this.bounds;
    return (
      minX === WORLD_BOUNDS[0] &&
      minY === WORLD_BOUNDS[1] &&
      maxX === WORLD_BOUNDS[2] &&
      maxY === WORLD_BOUNDS[3]
    );
  }

  /** Generate the pyramid with the configured strategy */
  async generate(): Promise<PyramidResult> {
    const strategy = createStrategy(this.options);
    try {
      const result: PyramidResult = new Map();
      for (let z = this.minZoom; z <= this.maxZoom; z++) {
        const started = performance.now();
        const candidates = enumerateZoom(z);
        const tiles = this.coversWorld
          ? candidates
          : await strategy.filter(z, candidates, this.bounds);
        result.set(z, tiles);
        this.logZoom(z, candidates.length, tiles.length, strategy, started);
      }
      return result;
    } finally {
      await strategy.dispose();
    }
  }

  /** Generate the pyramid on the calling thread, whatever the configured strategy */
  generateSync(): PyramidResult {
    const result: PyramidResult = new Map();
    for (let z = this.minZoom; z <= this.maxZoom; z++) {
      const started = performance.now();
      const candidates = enumerateZoom(z);
      const tiles = this.coversWorld ? candidates : filterSequential(candidates, this.bounds);
      result.set(z, tiles);
      this.logZoom(z, candidates.length, tiles.length, null, started);
    }
    return result;
  }

  private logZoom(
    z: number,
    candidates: number,
    kept: number,
    strategy: ExecutionStrategy | null,
    started: number
  ): void {
    if (!this.options.debug) return;
    const mode = this.coversWorld ? "world" : strategy?.name ?? "sequential";
    const elapsed = performance.now() - started;
    console.log(
      `[GenerateTiles] z=${z}, candidates=${candidates}, kept=${kept}, ` +
      `strategy=${mode}, ms=${elapsed.toFixed(1)}`
    );
  }
}

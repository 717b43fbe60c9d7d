/**
 * Zoom-Level Enumerator Tests
 */

import { describe, it, expect } from "vitest";
import { tileIsValid, tileToString } from "../projection/tileCoord";
import { enumerateZoom, tileAt, tileCount } from "./enumerate";

describe("tileCount", () => {
  it("is 4^z", () => {
    expect(tileCount(0)).toBe(1);
    expect(tileCount(1)).toBe(4);
    expect(tileCount(5)).toBe(1024);
  });

  it("fits in a JavaScript array only up to zoom 15", () => {
    const maxArrayLength = Math.pow(2, 32) - 1;
    expect(tileCount(15)).toBeLessThanOrEqual(maxArrayLength);
    expect(tileCount(16)).toBeGreaterThan(maxArrayLength);
  });
});

describe("enumerateZoom", () => {
  it("lists zoom 1 in x-major order", () => {
    expect(enumerateZoom(1)).toEqual([
      [1, 0, 0],
      [1, 0, 1],
      [1, 1, 0],
      [1, 1, 1],
    ]);
  });

  it("returns 4^z distinct valid tiles", () => {
    for (let z = 0; z <= 6; z++) {
      const tiles = enumerateZoom(z);
      expect(tiles).toHaveLength(tileCount(z));
      expect(new Set(tiles.map(tileToString)).size).toBe(tiles.length);
      for (const [tz, x, y] of tiles) {
        expect(tz).toBe(z);
        expect(tileIsValid(tz, x, y)).toBe(true);
      }
    }
  });

  it("increments y fastest", () => {
    const tiles = enumerateZoom(3);
    expect(tiles[7]).toEqual([3, 0, 7]);
    expect(tiles[8]).toEqual([3, 1, 0]);
    expect(tiles[63]).toEqual([3, 7, 7]);
  });
});

describe("tileAt", () => {
  it("matches the enumeration at every position", () => {
    const tiles = enumerateZoom(4);
    tiles.forEach((tile, position) => {
      expect(tileAt(4, position)).toEqual(tile);
    });
  });
});

/**
 * Work unit for the parallel bounds filter
 */

import type { LngLatBounds } from "../projection/types";
import { tileAt } from "../pyramid/enumerate";
import { evaluateTile } from "../pyramid/evaluate";

/** A contiguous slice [start, end) of a zoom level's x-major candidates */
export interface TileTask {
  z: number;
  bounds: LngLatBounds;
  start: number;
  end: number;
}

export interface TileTaskResult {
  start: number;
  /** flags[i] is 1 when candidate start + i survives, else 0 */
  flags: Uint8Array;
}

/** Evaluate every candidate of a task */
export function runTileTask(task: TileTask): TileTaskResult {
  const flags = new Uint8Array(new ArrayBuffer(task.end - task.start));
  for (let i = 0; i < flags.length; i++) {
    flags[i] = evaluateTile(tileAt(task.z, task.start + i), task.bounds) ? 1 : 0;
  }
  return { start: task.start, flags };
}

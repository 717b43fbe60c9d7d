/**
 * Execution strategies for the bounds filter
 *
 * Both strategies return survivors in candidate order, so a zoom level
 * filtered sequentially or in parallel yields the same list.
 */

import path from "node:path";
import type { LngLatBounds, TileTuple } from "../projection/types";
import { WorkerPool } from "../workers/WorkerPool";
import type { TileTask, TileTaskResult } from "../workers/tileTask";
import { evaluateTile } from "./evaluate";
import type { ResolvedOptions, StrategyName } from "./options";

export interface ExecutionStrategy {
  readonly name: StrategyName;
  /** Keep the candidates whose footprint intersects the bounds */
  filter(z: number, candidates: TileTuple[], bounds: LngLatBounds): Promise<TileTuple[]>;
  /** Release anything held for filtering */
  dispose(): Promise<void>;
}

/** Filter candidates on the calling thread */
export function filterSequential(
  candidates: TileTuple[],
  bounds: LngLatBounds
): TileTuple[] {
  const kept: TileTuple[] = [];
  for (const tile of candidates) {
    if (evaluateTile(tile, bounds)) {
      kept.push(tile);
    }
  }
  return kept;
}

export class SequentialStrategy implements ExecutionStrategy {
  readonly name = "sequential";

  async filter(
    _z: number,
    candidates: TileTuple[],
    bounds: LngLatBounds
  ): Promise<TileTuple[]> {
    return filterSequential(candidates, bounds);
  }

  async dispose(): Promise<void> {}
}

/** Worker entry, resolved beside this module (.ts from sources, .js from dist) */
const TILE_WORKER_ENTRY = path.join(
  __dirname,
  "..",
  "workers",
  `tileWorker${path.extname(__filename)}`
);

/**
 * Filter candidates on a pool of worker threads.
 *
 * The candidate range is cut into chunks of `chunkSize`. Each result is
 * written into a buffer slot keyed by candidate position, then the buffer
 * is compacted.
 */
export class ParallelStrategy implements ExecutionStrategy {
  readonly name = "parallel";
  private readonly concurrency: number;
  private readonly chunkSize: number;
  private pool: WorkerPool<TileTask, TileTaskResult> | null = null;

  constructor(concurrency: number, chunkSize: number) {
    this.concurrency = concurrency;
    this.chunkSize = chunkSize;
  }

  async filter(
    z: number,
    candidates: TileTuple[],
    bounds: LngLatBounds
  ): Promise<TileTuple[]> {
    if (!this.pool) {
      this.pool = new WorkerPool<TileTask, TileTaskResult>(
        TILE_WORKER_ENTRY,
        this.concurrency
      );
    }
    const pool = this.pool;

    const buffer: Array<TileTuple | null> = new Array<TileTuple | null>(
      candidates.length
    ).fill(null);

    const tasks: Promise<void>[] = [];
    for (let start = 0; start < candidates.length; start += this.chunkSize) {
      const end = Math.min(start + this.chunkSize, candidates.length);
      const task = pool.post({ z, bounds, start, end }).then((result) => {
        for (let i = 0; i < result.flags.length; i++) {
          const position = result.start + i;
          buffer[position] = result.flags[i] === 1 ? candidates[position] ?? null : null;
        }
      });
      tasks.push(task);
    }
    await Promise.all(tasks);

    return buffer.filter((tile): tile is TileTuple => tile !== null);
  }

  async dispose(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) {
      await pool.terminate();
    }
  }
}

export function createStrategy(options: ResolvedOptions): ExecutionStrategy {
  switch (options.strategy) {
    case "sequential":
      return new SequentialStrategy();
    case "parallel":
      return new ParallelStrategy(options.concurrency, options.chunkSize);
  }
}

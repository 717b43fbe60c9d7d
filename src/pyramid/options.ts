/**
 * Generator options
 */

import { availableParallelism } from "node:os";
import { ConfigurationError } from "../errors";

/** How the bounds filter is applied to a zoom level's candidates */
export type StrategyName = "sequential" | "parallel";

export interface GeneratorOptions {
  /** Filtering strategy (default: sequential) */
  strategy?: StrategyName;
  /** Worker threads for the parallel strategy (default: available CPU parallelism) */
  concurrency?: number;
  /** Candidates per worker task (default: 4096) */
  chunkSize?: number;
  /** Log one line per zoom level (default: false) */
  debug?: boolean;
}

export type ResolvedOptions = Readonly<Required<GeneratorOptions>>;

export const DEFAULT_CHUNK_SIZE = 4096;

const STRATEGIES: readonly StrategyName[] = ["sequential", "parallel"];

function isStrategyName(value: string): value is StrategyName {
  return STRATEGIES.some((name) => name === value);
}

function checkPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Merge options over the defaults and validate them.
 *
 * @throws ConfigurationError for an unknown strategy or a non-positive count
 */
export function resolveOptions(options: GeneratorOptions = {}): ResolvedOptions {
  const strategy = options.strategy ?? "sequential";
  if (!isStrategyName(strategy)) {
    throw new ConfigurationError(
      `Unknown strategy "${String(strategy)}", expected one of: ${STRATEGIES.join(", ")}`
    );
  }

  const concurrency = options.concurrency ?? availableParallelism();
  checkPositiveInteger("concurrency", concurrency);

  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  checkPositiveInteger("chunkSize", chunkSize);

  return Object.freeze({
    strategy,
    concurrency,
    chunkSize,
    debug: options.debug ?? false,
  });
}

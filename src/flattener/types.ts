import type { ChunkingWarning } from "../types";
import { InvalidStrategyError } from "../utils/errors";

export const CHUNKING_STRATEGIES = [
  "finest_granularity",
  "all_levels",
  "parent_only",
] as const;

/**
 * Which sections contribute chunks:
 * - `finest_granularity`: only sections without subsections
 * - `all_levels`: every section with content, on top of its descendants
 * - `parent_only`: same output as `finest_granularity`, kept as a separate name
 */
export type ChunkingStrategy = (typeof CHUNKING_STRATEGIES)[number];

export function isChunkingStrategy(value: string): value is ChunkingStrategy {
  return CHUNKING_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Narrows a user-supplied strategy name, throwing {@link InvalidStrategyError}
 * for anything else.
 */
export function parseChunkingStrategy(value: string): ChunkingStrategy {
  if (!isChunkingStrategy(value)) {
    throw new InvalidStrategyError(value, CHUNKING_STRATEGIES);
  }
  return value;
}

export interface FlattenResult {
  chunks: string[];
  warnings: ChunkingWarning[];
}

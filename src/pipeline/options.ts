import { z } from "zod";
import { DEFAULT_DEDUP_THRESHOLD, DEFAULT_MAX_SIZE, DEFAULT_OVERLAP } from "../config";
import { parseChunkingStrategy } from "../flattener/types";
import { characterCount } from "../splitter/sizing";
import { ConfigurationError } from "../utils/errors";
import type { ChunkingOptions, ResolvedChunkingOptions } from "./types";

const chunkingOptionsSchema = z
  .object({
    maxSize: z.number().int().positive().default(DEFAULT_MAX_SIZE),
    overlap: z.number().int().nonnegative().default(DEFAULT_OVERLAP),
    bySentence: z.boolean().default(true),
    strictSizing: z.boolean().default(false),
    deduplicate: z.boolean().default(true),
    dedupThreshold: z.number().min(0).max(1).default(DEFAULT_DEDUP_THRESHOLD),
  })
  .refine((options) => options.overlap < options.maxSize, {
    message: "must be smaller than maxSize",
    path: ["overlap"],
  });

/**
 * Validates chunking options and fills in defaults. The strategy is checked
 * first so that its error lists the valid strategies.
 */
export function resolveChunkingOptions(
  options: ChunkingOptions = {},
): ResolvedChunkingOptions {
  const strategy = parseChunkingStrategy(options.strategy ?? "finest_granularity");

  const parsed = chunkingOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = String(issue.path[0] ?? "options");
    throw new ConfigurationError(
      `Invalid chunking option ${option}: ${issue.message}`,
      option,
    );
  }

  return {
    ...parsed.data,
    strategy,
    sizeFn: options.sizeFn ?? characterCount,
  };
}

import type { HeadingClassifier } from "../classifier/types";
import type { ChunkingStrategy } from "../flattener/types";
import type { SizeFunction } from "../splitter/types";
import type { ChunkingWarning, Section } from "../types";

/**
 * Options of a chunking run. Every field is optional; omitted fields take the
 * defaults from the config module.
 */
export interface ChunkingOptions {
  maxSize?: number;
  overlap?: number;
  bySentence?: boolean;
  sizeFn?: SizeFunction;
  /** One of `finest_granularity`, `all_levels`, `parent_only` */
  strategy?: string;
  /** Split every emitted chunk that exceeds `maxSize` */
  strictSizing?: boolean;
  deduplicate?: boolean;
  dedupThreshold?: number;
}

export interface ResolvedChunkingOptions {
  maxSize: number;
  overlap: number;
  bySentence: boolean;
  sizeFn: SizeFunction;
  strategy: ChunkingStrategy;
  strictSizing: boolean;
  deduplicate: boolean;
  dedupThreshold: number;
}

export interface PipelineDependencies {
  /** Defaults to a rule-based classifier for general documents */
  classifier?: HeadingClassifier;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface ChunkingResult {
  sections: Section[];
  chunks: string[];
  warnings: ChunkingWarning[];
}

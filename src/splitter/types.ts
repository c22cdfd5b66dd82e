import type { ChunkingWarning } from "../types";

/**
 * Measures a piece of text in the units `maxSize` and `overlap` are given in,
 * e.g. characters or tokens.
 */
export type SizeFunction = (text: string) => number;

export type SizeUnit = "character" | "tiktoken";

export interface SplitOptions {
  /** Upper bound on piece size, in units of `sizeFn` */
  maxSize: number;
  /** Upper bound on the text repeated at the start of the next piece */
  overlap: number;
  /** Cut only at sentence boundaries (default), or slide a raw window */
  bySentence?: boolean;
  sizeFn?: SizeFunction;
}

export interface SplitResult {
  chunks: string[];
  warnings: ChunkingWarning[];
}

/**
 * Half-open range `[start, end)` of a sentence inside its source text.
 */
export interface SentenceSpan {
  start: number;
  end: number;
}

import { DEFAULT_DEDUP_THRESHOLD, DEFAULT_FINGERPRINT_LENGTH } from "../config";
import { ConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { collapseWhitespace } from "../utils/string";

/** Annotations that chunk printers embed around the text */
const DECORATIONS: readonly RegExp[] = [
  /【Chunk \d+】.*?\n/g,
  /={50,}/g,
  /-{20,}/g,
  /\(长度: \d+ 字符\)/g,
];

export interface DeduplicatorOptions {
  /** Character-set similarity at or above which a chunk is dropped */
  threshold?: number;
  /** Number of normalized characters compared */
  fingerprintLength?: number;
}

/**
 * Drops near-duplicate chunks by comparing the character sets of their
 * normalized prefixes. Order-preserving; the first occurrence wins.
 */
export class Deduplicator {
  private readonly threshold: number;
  private readonly fingerprintLength: number;

  constructor(options: DeduplicatorOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_DEDUP_THRESHOLD;
    this.fingerprintLength = options.fingerprintLength ?? DEFAULT_FINGERPRINT_LENGTH;
    if (!(this.threshold >= 0 && this.threshold <= 1)) {
      throw new ConfigurationError(
        `Deduplication threshold must be between 0 and 1, got ${this.threshold}`,
        "dedupThreshold",
      );
    }
    if (!Number.isInteger(this.fingerprintLength) || this.fingerprintLength <= 0) {
      throw new ConfigurationError(
        `Fingerprint length must be a positive integer, got ${this.fingerprintLength}`,
        "fingerprintLength",
      );
    }
  }

  dedup(chunks: readonly string[]): string[] {
    const accepted: Set<string>[] = [];
    const result: string[] = [];

    for (const chunk of chunks) {
      const characters = new Set(this.fingerprint(chunk));
      const duplicate =
        characters.size > 0 &&
        accepted.some((seen) => jaccard(seen, characters) >= this.threshold);
      if (duplicate) {
        continue;
      }
      if (characters.size > 0) {
        accepted.push(characters);
      }
      result.push(chunk);
    }

    if (result.length < chunks.length) {
      logger.debug(`Removed ${chunks.length - result.length} near-duplicate chunks`);
    }
    return result;
  }

  /**
   * Lowercased, whitespace-collapsed prefix of the chunk with chunk-index and
   * length annotations removed.
   */
  fingerprint(chunk: string): string {
    let text = chunk;
    for (const decoration of DECORATIONS) {
      text = text.replace(decoration, "");
    }
    const normalized = collapseWhitespace(text).trim().toLowerCase();
    return Array.from(normalized).slice(0, this.fingerprintLength).join("");
  }

  similarity(a: string, b: string): number {
    return jaccard(new Set(this.fingerprint(a)), new Set(this.fingerprint(b)));
  }
}

function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const character of a) {
    if (b.has(character)) {
      intersection++;
    }
  }
  return intersection / (a.size + b.size - intersection);
}

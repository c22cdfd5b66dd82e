import { TextSplitter } from "langchain/text_splitter";
import { z } from "zod";
import type { ChunkingWarning } from "../types";
import { logger } from "../utils/logger";
import { fullTrim } from "../utils/string";
import { SplitOptionsError } from "./errors";
import { findSentences } from "./sentences";
import { characterCount } from "./sizing";
import type { SentenceSpan, SizeFunction, SplitOptions, SplitResult } from "./types";

const splitOptionsSchema = z
  .object({
    maxSize: z.number().int().positive(),
    overlap: z.number().int().nonnegative(),
  })
  .refine((options) => options.overlap < options.maxSize, {
    message: "must be smaller than maxSize",
    path: ["overlap"],
  });

/**
 * Cuts text that is larger than `maxSize` into ordered pieces.
 *
 * In sentence mode every piece is a contiguous slice of the input made of
 * whole sentences; consecutive pieces share up to `overlap` units taken from
 * the end of the previous piece. A sentence that alone exceeds `maxSize` is
 * returned as its own piece, unmodified. In raw mode the text is cut by a
 * sliding character window instead.
 */
export class SentenceSplitter {
  private readonly maxSize: number;
  private readonly overlap: number;
  private readonly bySentence: boolean;
  private readonly sizeFn: SizeFunction;

  constructor(options: SplitOptions) {
    const parsed = splitOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SplitOptionsError(
        `Invalid split options: ${issue.path.join(".")} ${issue.message}`,
        String(issue.path[0] ?? "maxSize"),
      );
    }
    this.maxSize = options.maxSize;
    this.overlap = options.overlap;
    this.bySentence = options.bySentence ?? true;
    this.sizeFn = options.sizeFn ?? characterCount;
  }

  async split(text: string): Promise<string[]> {
    const { chunks } = await this.splitWithDiagnostics(text);
    return chunks;
  }

  async splitWithDiagnostics(text: string): Promise<SplitResult> {
    if (!fullTrim(text)) {
      return { chunks: [], warnings: [] };
    }
    if (this.sizeFn(text) <= this.maxSize) {
      return { chunks: [text], warnings: [] };
    }
    if (!this.bySentence) {
      return { chunks: await this.splitRaw(text), warnings: [] };
    }
    return this.splitBySentence(text);
  }

  private async splitRaw(text: string): Promise<string[]> {
    const splitter = new CodePointWindowSplitter({
      chunkSize: this.maxSize,
      chunkOverlap: this.overlap,
      lengthFunction: this.sizeFn,
    });
    return splitter.splitText(text);
  }

  private splitBySentence(text: string): SplitResult {
    const sentences = findSentences(text);
    const chunks: string[] = [];
    const warnings: ChunkingWarning[] = [];

    // Current piece is text.slice(start, end); null while no piece is open
    let start: number | null = null;
    let end = 0;

    const open = (span: SentenceSpan) => {
      const sentence = text.slice(span.start, span.end);
      const size = this.sizeFn(sentence);
      if (size > this.maxSize) {
        logger.warn(
          `Sentence of size ${size} exceeds the maximum of ${this.maxSize}, keeping it whole`,
        );
        warnings.push({
          code: "oversized_sentence",
          message: `Sentence of size ${size} exceeds the maximum of ${this.maxSize}`,
          context: { size, maxSize: this.maxSize, offset: span.start },
        });
        chunks.push(sentence);
        start = null;
        return;
      }
      start = span.start;
      end = span.end;
    };

    for (const span of sentences) {
      if (start === null) {
        open(span);
        continue;
      }
      if (this.sizeFn(text.slice(start, span.end)) <= this.maxSize) {
        end = span.end;
        continue;
      }

      chunks.push(text.slice(start, end));
      const carried = this.findOverlapStart(text, sentences, start, end);
      if (carried && this.sizeFn(text.slice(carried.start, span.end)) <= this.maxSize) {
        if (carried.raw) {
          warnings.push({
            code: "raw_overlap",
            message: "No sentence boundary within the overlap window, carrying a raw tail",
            context: { offset: carried.start, overlap: this.overlap },
          });
        }
        start = carried.start;
        end = span.end;
      } else {
        open(span);
      }
    }

    if (start !== null) {
      chunks.push(text.slice(start, end));
    }

    logger.debug(`Split text of ${text.length} characters into ${chunks.length} pieces`);
    return { chunks, warnings };
  }

  /**
   * Start of the text carried into the next piece: the earliest sentence of the
   * closed piece whose tail fits in the overlap window, or, when even its last
   * sentence is too large, the longest raw tail that fits.
   */
  private findOverlapStart(
    text: string,
    sentences: readonly SentenceSpan[],
    start: number,
    end: number,
  ): { start: number; raw: boolean } | null {
    if (this.overlap <= 0) {
      return null;
    }

    for (const sentence of sentences) {
      if (sentence.start < start || sentence.end > end) {
        continue;
      }
      if (this.sizeFn(text.slice(sentence.start, end)) <= this.overlap) {
        return { start: sentence.start, raw: false };
      }
    }

    const rawStart = this.findRawTailStart(text, start, end);
    return rawStart === null ? null : { start: rawStart, raw: true };
  }

  private findRawTailStart(text: string, start: number, end: number): number | null {
    let low = start + 1;
    let high = end;
    // Smallest index whose tail fits; tails shrink as the index grows
    while (low < high) {
      const middle = Math.floor((low + high) / 2);
      if (this.sizeFn(text.slice(middle, end)) <= this.overlap) {
        high = middle;
      } else {
        low = middle + 1;
      }
    }

    let tailStart = low;
    while (
      tailStart < end &&
      (isLowSurrogate(text.charCodeAt(tailStart)) || /\s/.test(text[tailStart]))
    ) {
      tailStart++;
    }
    return tailStart < end ? tailStart : null;
  }
}

/**
 * Sliding window over code points, so that a surrogate pair is never cut.
 */
class CodePointWindowSplitter extends TextSplitter {
  async splitText(text: string): Promise<string[]> {
    return this.mergeSplits(Array.from(text), "");
  }
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

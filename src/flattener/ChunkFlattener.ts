import { DEFAULT_MAX_SIZE, DEFAULT_OVERLAP } from "../config";
import { SentenceSplitter } from "../splitter/SentenceSplitter";
import type { ChunkingWarning, Section } from "../types";
import { logger } from "../utils/logger";
import { type FlattenResult, parseChunkingStrategy } from "./types";

const PATH_SEPARATOR = " > ";

export interface ChunkFlattenerOptions {
  /** Pass every emitted chunk through the splitter */
  strictSizing?: boolean;
  /** Splitter used under strict sizing; defaults to the default size limits */
  splitter?: SentenceSplitter;
}

/**
 * Turns a section forest into an ordered list of chunk strings.
 *
 * A chunk of a nested section is prefixed with its heading path
 * ("第一章 总则 > 第一条 X"), so that it still reads in context once it is
 * detached from the tree.
 */
export class ChunkFlattener {
  private readonly strictSizing: boolean;
  private readonly splitter: SentenceSplitter;

  constructor(options: ChunkFlattenerOptions = {}) {
    this.strictSizing = options.strictSizing ?? false;
    this.splitter =
      options.splitter ??
      new SentenceSplitter({ maxSize: DEFAULT_MAX_SIZE, overlap: DEFAULT_OVERLAP });
  }

  async flatten(forest: readonly Section[], strategy: string): Promise<FlattenResult> {
    const parsedStrategy = parseChunkingStrategy(strategy);
    const raw: string[] = [];
    if (parsedStrategy === "all_levels") {
      this.collectAllLevels(forest, [], raw);
    } else {
      this.collectLeaves(forest, [], raw);
    }

    if (!this.strictSizing) {
      logger.debug(`Flattened ${raw.length} chunks with ${parsedStrategy}`);
      return { chunks: raw, warnings: [] };
    }

    const chunks: string[] = [];
    const warnings: ChunkingWarning[] = [];
    for (const chunk of raw) {
      const result = await this.splitter.splitWithDiagnostics(chunk);
      chunks.push(...result.chunks);
      warnings.push(...result.warnings);
    }
    logger.debug(
      `Flattened ${raw.length} chunks with ${parsedStrategy}, ${chunks.length} after size enforcement`,
    );
    return { chunks, warnings };
  }

  private collectLeaves(
    sections: readonly Section[],
    path: readonly string[],
    out: string[],
  ): void {
    for (const section of sections) {
      if (section.subsections.length > 0) {
        this.collectLeaves(section.subsections, [...path, section.heading], out);
        continue;
      }
      const chunk = section.content
        ? this.render(section, path)
        : this.fullHeading(section, path);
      if (chunk) {
        out.push(chunk);
      }
    }
  }

  private collectAllLevels(
    sections: readonly Section[],
    path: readonly string[],
    out: string[],
  ): void {
    for (const section of sections) {
      if (section.content) {
        out.push(this.render(section, path));
      }
      this.collectAllLevels(section.subsections, [...path, section.heading], out);
    }
  }

  private fullHeading(section: Section, path: readonly string[]): string {
    return path.length > 0 ? [...path, section.heading].join(PATH_SEPARATOR) : section.heading;
  }

  /**
   * Top-level sections render as their content. Nested ones get the heading
   * path, replacing the heading line their content starts with.
   */
  private render(section: Section, path: readonly string[]): string {
    if (path.length === 0) {
      return section.content;
    }
    const fullHeading = this.fullHeading(section, path);
    if (section.heading && section.content.startsWith(section.heading)) {
      return `${fullHeading}${section.content.slice(section.heading.length)}`;
    }
    return `${fullHeading}\n\n${section.content}`;
  }
}

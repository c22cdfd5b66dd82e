import {
  DEFAULT_ARTICLE_MAX_LENGTH,
  DEFAULT_FUZZY_MAX_LENGTH,
  DEFAULT_HEADING_LEVEL,
  DEFAULT_HEADING_MAX_LENGTH,
} from "../config";
import type { ClassificationResult } from "../types";
import { ConfigurationError } from "../utils/errors";
import { codePointLength, fullTrim } from "../utils/string";
import {
  ARTICLE_CONTENT_MARKERS,
  CLAUSE_PUNCTUATION,
  FUZZY_CONTENT_MARKERS,
  GENERAL_PATTERNS,
  LEGAL_PATTERNS,
  type PatternGroup,
  SENTENCE_TERMINATORS,
} from "./patterns";
import {
  type DocumentType,
  type HeadingClassifier,
  type LegalSection,
  type RuleBasedClassifierOptions,
  StructureLevel,
} from "./types";

interface CompiledGroup {
  level: StructureLevel;
  patterns: RegExp[];
}

/**
 * Classifies fragments with ordered prefix-pattern tables tuned for numbered
 * legal and contract documents.
 *
 * The tables are compiled once in the constructor and never change afterwards,
 * so one instance can serve any number of documents. Different document types
 * are different instances.
 */
export class RuleBasedClassifier implements HeadingClassifier {
  public readonly documentType: DocumentType;
  private readonly enableFuzzyMatching: boolean;
  private readonly fuzzyMaxLength: number;
  private readonly articleMaxLength: number;
  private readonly headingMaxLength: number;
  private readonly articleContentMarkers: readonly string[];
  private readonly fuzzyContentMarkers: readonly string[];
  private readonly legalGroups: readonly CompiledGroup[];
  private readonly generalGroups: readonly CompiledGroup[];

  constructor(options: RuleBasedClassifierOptions = {}) {
    this.documentType = options.documentType ?? "general";
    this.enableFuzzyMatching = options.enableFuzzyMatching ?? true;
    this.fuzzyMaxLength = options.fuzzyMaxLength ?? DEFAULT_FUZZY_MAX_LENGTH;
    this.articleMaxLength = options.articleMaxLength ?? DEFAULT_ARTICLE_MAX_LENGTH;
    this.headingMaxLength = options.headingMaxLength ?? DEFAULT_HEADING_MAX_LENGTH;
    this.articleContentMarkers = options.articleContentMarkers ?? ARTICLE_CONTENT_MARKERS;
    this.fuzzyContentMarkers = options.fuzzyContentMarkers ?? FUZZY_CONTENT_MARKERS;

    this.legalGroups = Object.freeze(
      LEGAL_PATTERNS.map((group) =>
        this.compileGroup({
          level: group.level,
          patterns: [...group.patterns, ...(options.extraPatterns?.[group.level] ?? [])],
        }),
      ),
    );
    this.generalGroups = Object.freeze(
      GENERAL_PATTERNS.map((group) => this.compileGroup(group)),
    );
  }

  async classify(text: string): Promise<ClassificationResult> {
    return this.detect(text);
  }

  async classifyBatch(texts: readonly string[]): Promise<ClassificationResult[]> {
    return texts.map((text) => this.detect(text));
  }

  /**
   * Synchronous classification used directly by callers that never need a
   * remote classifier, and as the fallback of those that do.
   */
  detect(rawText: string): ClassificationResult {
    const text = fullTrim(rawText);
    const length = codePointLength(text);
    if (length < 2 || length > this.headingMaxLength) {
      return this.contentResult();
    }

    const legalLevel = this.matchLevel(this.legalGroups, text);
    if (legalLevel !== null) {
      if (legalLevel === StructureLevel.ARTICLE && this.isArticleBody(text)) {
        return this.contentResult();
      }
      return this.headingResult(legalLevel);
    }

    if (this.documentType === "legal") {
      return this.contentResult();
    }

    const generalLevel = this.matchLevel(this.generalGroups, text);
    if (generalLevel !== null) {
      if (generalLevel === StructureLevel.ARTICLE && this.isArticleBody(text)) {
        return this.contentResult();
      }
      return this.headingResult(generalLevel);
    }

    if (this.enableFuzzyMatching && this.looksLikeShortTitle(text)) {
      return this.headingResult(DEFAULT_HEADING_LEVEL);
    }

    return this.contentResult();
  }

  /**
   * Cuts raw text into spans that each begin at a line opening with a legal
   * structural marker. Text before the first marker is not returned.
   */
  extractSections(text: string): LegalSection[] {
    const markers: Array<{ start: number; heading: string; level: StructureLevel }> = [];

    let offset = 0;
    for (const line of text.split("\n")) {
      const leading = line.length - line.trimStart().length;
      const trimmed = line.trimStart();
      for (const group of this.legalGroups) {
        const match = group.patterns
          .map((pattern) => pattern.exec(trimmed))
          .find((result) => result !== null);
        if (match) {
          markers.push({
            start: offset + leading,
            heading: fullTrim(match[0]),
            level: group.level,
          });
          break;
        }
      }
      offset += line.length + 1;
    }

    return markers.map((marker, index) => {
      const end = index + 1 < markers.length ? markers[index + 1].start : text.length;
      return {
        heading: marker.heading,
        content: fullTrim(text.slice(marker.start, end)),
        level: marker.level,
        start: marker.start,
        end,
      };
    });
  }

  private compileGroup(group: PatternGroup): CompiledGroup {
    return {
      level: group.level,
      patterns: group.patterns.map((source) => {
        try {
          return new RegExp(source, "i");
        } catch (error) {
          throw new ConfigurationError(
            `Invalid heading pattern '${source}' for level ${StructureLevel[group.level]}: ${
              error instanceof Error ? error.message : String(error)
            }`,
            "extraPatterns",
          );
        }
      }),
    };
  }

  private matchLevel(groups: readonly CompiledGroup[], text: string): StructureLevel | null {
    for (const group of groups) {
      if (group.patterns.some((pattern) => pattern.test(text))) {
        return group.level;
      }
    }
    return null;
  }

  /**
   * Article markers also open long clause bodies ("第一条 为了规范……的内容如下。").
   */
  private isArticleBody(text: string): boolean {
    return (
      codePointLength(text) > this.articleMaxLength ||
      this.articleContentMarkers.some((marker) => text.includes(marker))
    );
  }

  private looksLikeShortTitle(text: string): boolean {
    return (
      codePointLength(text) < this.fuzzyMaxLength &&
      !SENTENCE_TERMINATORS.some((terminator) => text.endsWith(terminator)) &&
      !CLAUSE_PUNCTUATION.some((mark) => text.includes(mark)) &&
      !this.fuzzyContentMarkers.some((marker) => text.includes(marker))
    );
  }

  private headingResult(level: number): ClassificationResult {
    return { isHeading: true, level, confidence: 1, source: "rules" };
  }

  private contentResult(): ClassificationResult {
    return { isHeading: false, level: DEFAULT_HEADING_LEVEL, confidence: 1, source: "rules" };
  }
}

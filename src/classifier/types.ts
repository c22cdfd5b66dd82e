import type { ClassificationResult } from "../types";

/**
 * Structural units of numbered legal and contract documents, broadest first.
 * Smaller numbers sit higher in the tree.
 */
export enum StructureLevel {
  BOOK = 1, // 编
  PART = 2, // 篇
  CHAPTER = 3, // 章
  SECTION = 4, // 节
  ARTICLE = 5, // 条
  CLAUSE = 6, // 款
  ITEM = 7, // 项
  SUBITEM = 8, // 目
  PARAGRAPH = 9, // 段
  ENUMERATION = 10, // （一）、一、
  NUMBERING = 11, // 1、 1.2
}

/**
 * "legal" consults only the legal pattern table; every other type also runs the
 * generic numbering table and the fuzzy short-line fallback.
 */
export const DOCUMENT_TYPES = ["legal", "contract", "regulation", "general"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

export interface ClassifyOptions {
  /** Aborts pending remote work; classifiers degrade to their fallback instead of throwing */
  signal?: AbortSignal;
}

/**
 * Decides whether a text fragment is a heading and at which level.
 * Implementations must not reject for content reasons.
 */
export interface HeadingClassifier {
  classify(text: string, options?: ClassifyOptions): Promise<ClassificationResult>;
  classifyBatch(
    texts: readonly string[],
    options?: ClassifyOptions,
  ): Promise<ClassificationResult[]>;
}

export interface RuleBasedClassifierOptions {
  documentType?: DocumentType;
  enableFuzzyMatching?: boolean;
  /** Extra prefix patterns per level, tried after the built-in ones of that level */
  extraPatterns?: Partial<Record<StructureLevel, readonly string[]>>;
  fuzzyMaxLength?: number;
  articleMaxLength?: number;
  headingMaxLength?: number;
  /** Words that mark an article-prefixed fragment as a clause body */
  articleContentMarkers?: readonly string[];
  /** Words that rule out a fuzzy heading */
  fuzzyContentMarkers?: readonly string[];
}

/**
 * A span of raw text that starts at a structural marker.
 */
export interface LegalSection {
  heading: string;
  content: string;
  level: StructureLevel;
  start: number;
  end: number;
}

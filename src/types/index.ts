/**
 * Kinds of fragments an upstream extractor can hand over
 */
export type ElementKind = "paragraph" | "table_cell" | "heading";

/**
 * A single text fragment in document reading order, as produced by a
 * format-specific extractor.
 */
export interface Element {
  text: string;
  isHeading: boolean;
  /** 1 is the topmost level; unset when the extractor could not tell */
  level?: number;
  kind: ElementKind;
  /** Free-form origin marker, e.g. the source style name or table id */
  sourceTag?: string;
}

/**
 * An element after heading classification: the level is always known.
 */
export interface ClassifiedElement extends Element {
  level: number;
}

/**
 * A node of the document tree. `content` holds the heading line followed by the
 * text of directly contained non-heading elements; descendants are reachable
 * only through `subsections`.
 */
export interface Section {
  readonly heading: string;
  readonly content: string;
  readonly level: number;
  readonly subsections: readonly Section[];
}

export type ClassificationSource = "rules" | "remote" | "fallback";

export interface ClassificationResult {
  isHeading: boolean;
  level: number;
  /** In [0, 1]; rule-based results always report 1 */
  confidence: number;
  source?: ClassificationSource;
}

export type ChunkingWarningCode = "oversized_sentence" | "raw_overlap" | "classifier_fallback";

/**
 * Best-effort degradation reported next to a result instead of being thrown.
 */
export interface ChunkingWarning {
  code: ChunkingWarningCode;
  message: string;
  context?: Record<string, string | number>;
}

export { classifyElements, type ClassifyElementsResult } from "./classifier/classifyElements";
export {
  ClassifierError,
  ClassifierRequestError,
  ClassifierResponseError,
} from "./classifier/errors";
export { RemoteClassifier, type RemoteClassifierOptions } from "./classifier/RemoteClassifier";
export { RuleBasedClassifier } from "./classifier/RuleBasedClassifier";
export {
  DOCUMENT_TYPES,
  type ClassifyOptions,
  type DocumentType,
  type HeadingClassifier,
  type LegalSection,
  type RuleBasedClassifierOptions,
  StructureLevel,
} from "./classifier/types";
export {
  DEFAULT_DEDUP_THRESHOLD,
  DEFAULT_MAX_SIZE,
  DEFAULT_OVERLAP,
  DOCUMENT_PROFILES,
  type DocumentProfile,
  loadRemoteClassifierSettings,
  type ProfileSettings,
  type RemoteClassifierSettings,
  resolveProfile,
} from "./config";
export { Deduplicator, type DeduplicatorOptions } from "./dedup/Deduplicator";
export { ChunkFlattener, type ChunkFlattenerOptions } from "./flattener/ChunkFlattener";
export {
  CHUNKING_STRATEGIES,
  type ChunkingStrategy,
  type FlattenResult,
  parseChunkingStrategy,
} from "./flattener/types";
export { HierarchyBuilder, walkSections } from "./hierarchy/HierarchyBuilder";
export { elementsFromText, loadElements, parseElements } from "./input/loadElements";
export { ChunkingPipeline } from "./pipeline/ChunkingPipeline";
export { CancellationError } from "./pipeline/errors";
export { resolveChunkingOptions } from "./pipeline/options";
export type {
  ChunkingOptions,
  ChunkingResult,
  PipelineDependencies,
  ProcessOptions,
  ResolvedChunkingOptions,
} from "./pipeline/types";
export { SplitOptionsError } from "./splitter/errors";
export { SentenceSplitter } from "./splitter/SentenceSplitter";
export { findSentences, splitSentences } from "./splitter/sentences";
export { characterCount, createTokenCounter, resolveSizeFunction } from "./splitter/sizing";
export type { SizeFunction, SizeUnit, SplitOptions, SplitResult } from "./splitter/types";
export type * from "./types";
export {
  ChunkingError,
  ConfigurationError,
  InputError,
  InvalidStrategyError,
} from "./utils/errors";
export { LogLevel, parseLogLevel, setLogLevel } from "./utils/logger";

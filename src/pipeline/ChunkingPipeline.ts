import { classifyElements } from "../classifier/classifyElements";
import { RuleBasedClassifier } from "../classifier/RuleBasedClassifier";
import type { HeadingClassifier } from "../classifier/types";
import { resolveProfile } from "../config";
import { Deduplicator } from "../dedup/Deduplicator";
import { ChunkFlattener } from "../flattener/ChunkFlattener";
import { HierarchyBuilder } from "../hierarchy/HierarchyBuilder";
import { SentenceSplitter } from "../splitter/SentenceSplitter";
import type { ChunkingWarning, Element, Section } from "../types";
import { logger } from "../utils/logger";
import { CancellationError } from "./errors";
import { resolveChunkingOptions } from "./options";
import type {
  ChunkingOptions,
  ChunkingResult,
  PipelineDependencies,
  ProcessOptions,
  ResolvedChunkingOptions,
} from "./types";

/**
 * Runs the chunking stages for one document at a time:
 * classify, build the section tree, flatten, deduplicate.
 *
 * An instance holds no per-document state and can process any number of
 * documents, concurrently if the injected classifier allows it.
 */
export class ChunkingPipeline {
  readonly options: ResolvedChunkingOptions;
  private readonly classifier: HeadingClassifier;
  private readonly builder = new HierarchyBuilder();
  private readonly flattener: ChunkFlattener;
  private readonly deduplicator: Deduplicator;

  /**
   * @throws {ConfigurationError} when an option is invalid
   */
  constructor(options: ChunkingOptions = {}, dependencies: PipelineDependencies = {}) {
    this.options = resolveChunkingOptions(options);
    this.classifier = dependencies.classifier ?? new RuleBasedClassifier();
    this.flattener = new ChunkFlattener({
      strictSizing: this.options.strictSizing,
      splitter: new SentenceSplitter({
        maxSize: this.options.maxSize,
        overlap: this.options.overlap,
        bySentence: this.options.bySentence,
        sizeFn: this.options.sizeFn,
      }),
    });
    this.deduplicator = new Deduplicator({ threshold: this.options.dedupThreshold });
  }

  /**
   * Creates a pipeline with the settings of a document profile. Explicit
   * options override the profile; without an injected classifier, a rule-based
   * one for the profile's document type is used.
   */
  static fromProfile(
    profile: string,
    subtype?: string,
    overrides: ChunkingOptions = {},
    dependencies: PipelineDependencies = {},
  ): ChunkingPipeline {
    const settings = resolveProfile(profile, subtype);
    return new ChunkingPipeline(
      {
        ...overrides,
        maxSize: overrides.maxSize ?? settings.maxSize,
        overlap: overrides.overlap ?? settings.overlap,
        strictSizing: overrides.strictSizing ?? settings.strictSizing,
        strategy: overrides.strategy ?? settings.strategy,
      },
      {
        classifier:
          dependencies.classifier ??
          new RuleBasedClassifier({ documentType: settings.documentType }),
      },
    );
  }

  async buildSections(
    elements: readonly Element[],
    options: ProcessOptions = {},
  ): Promise<Section[]> {
    const { sections } = await this.classifyAndBuild(elements, options.signal, []);
    return sections;
  }

  async process(
    elements: readonly Element[],
    options: ProcessOptions = {},
  ): Promise<ChunkingResult> {
    const { signal } = options;
    const warnings: ChunkingWarning[] = [];

    const { sections } = await this.classifyAndBuild(elements, signal, warnings);

    this.throwIfAborted(signal, "flattening");
    const flattened = await this.flattener.flatten(sections, this.options.strategy);
    warnings.push(...flattened.warnings);

    this.throwIfAborted(signal, "deduplication");
    const chunks = this.options.deduplicate
      ? this.deduplicator.dedup(flattened.chunks)
      : flattened.chunks;

    logger.info(
      `Produced ${chunks.length} chunks from ${elements.length} elements (${warnings.length} warnings)`,
    );
    return { sections, chunks, warnings };
  }

  private async classifyAndBuild(
    elements: readonly Element[],
    signal: AbortSignal | undefined,
    warnings: ChunkingWarning[],
  ): Promise<{ sections: Section[] }> {
    this.throwIfAborted(signal, "classification");
    const classified = await classifyElements(elements, this.classifier, { signal });
    if (classified.fallbackCount > 0) {
      warnings.push({
        code: "classifier_fallback",
        message: `${classified.fallbackCount} fragments were classified by the rule-based fallback`,
        context: { count: classified.fallbackCount },
      });
    }

    this.throwIfAborted(signal, "hierarchy building");
    return { sections: this.builder.build(classified.elements) };
  }

  private throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
      throw new CancellationError(`Chunking cancelled before ${stage}`);
    }
  }
}


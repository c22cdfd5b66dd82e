import { createHash } from "node:crypto";
import { z } from "zod";
import { DEFAULT_HEADING_LEVEL } from "../config";
import type { ClassificationResult } from "../types";
import { logger } from "../utils/logger";
import { requestChatCompletion } from "./chatCompletion";
import { ClassifierError, ClassifierResponseError } from "./errors";
import { RuleBasedClassifier } from "./RuleBasedClassifier";
import type { ClassifyOptions, HeadingClassifier } from "./types";

export interface RemoteClassifierOptions {
  apiKey: string;
  model: string;
  baseURL: string;
  /** Per-request timeout; on expiry the batch falls back to the rules */
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  maxTextsPerBatch?: number;
  /** Rough token budget of the fragments sent in one request */
  maxTokensPerBatch?: number;
  cacheEnabled?: boolean;
  /** Oldest cached fragments are evicted beyond this count */
  cacheMaxEntries?: number;
  /** Used for every fragment the remote model could not classify */
  fallback?: RuleBasedClassifier;
}

interface Batch {
  texts: string[];
  keys: string[];
}

const MAX_PROMPT_FRAGMENT_LENGTH = 200;

const modelAnswerSchema = z.array(
  z.object({
    is_heading: z.boolean(),
    level: z.coerce.number().int().min(0).max(20).optional(),
    confidence: z.coerce.number().min(0).max(1).optional(),
  }),
);

const PROMPT_HEADER = `You analyse the structure of numbered legal and contract documents.
For each numbered fragment below decide whether it is a heading and, if so, its level.

A heading is usually short (under 50 characters), does not end with a sentence
terminator (。.！!？?), and names a part, chapter, article or topic. List items that
carry a full clause ("1、代销机构依法注册……") are content, not headings.

Levels: 1 book (编), 2 part (篇), 3 chapter (章), 4 section (节), 5 article (条),
6 clause (款), 7 item (项), 8 sub-item (目), 10 enumeration (一、 or （一）),
11 plain numbering (1、 or 1.2).

Answer with a JSON array only, one object per fragment, in order:
[{"is_heading": true, "level": 3, "confidence": 0.9}, ...]

Fragments:`;

/**
 * Classifies fragments with an LLM behind an OpenAI-compatible chat API.
 *
 * Requests are batched by fragment count and estimated token budget, results are
 * cached per fragment by content hash, and any failed batch (network error,
 * timeout, abort, malformed answer) is classified by the rule-based fallback
 * instead. Callers never see a rejection from this class.
 */
export class RemoteClassifier implements HeadingClassifier {
  private readonly options: Required<Omit<RemoteClassifierOptions, "fallback">>;
  private readonly fallback: RuleBasedClassifier;
  private readonly cache = new Map<string, ClassificationResult>();

  constructor(options: RemoteClassifierOptions) {
    this.options = {
      apiKey: options.apiKey,
      model: options.model,
      baseURL: options.baseURL,
      timeoutMs: options.timeoutMs ?? 30_000,
      maxRetries: options.maxRetries ?? 3,
      retryDelayMs: options.retryDelayMs ?? 1000,
      maxTextsPerBatch: options.maxTextsPerBatch ?? 20,
      maxTokensPerBatch: options.maxTokensPerBatch ?? 3000,
      cacheEnabled: options.cacheEnabled ?? true,
      cacheMaxEntries: options.cacheMaxEntries ?? 10_000,
    };
    this.fallback = options.fallback ?? new RuleBasedClassifier();
  }

  async classify(text: string, options?: ClassifyOptions): Promise<ClassificationResult> {
    const [result] = await this.classifyBatch([text], options);
    return result;
  }

  async classifyBatch(
    texts: readonly string[],
    options: ClassifyOptions = {},
  ): Promise<ClassificationResult[]> {
    const results = new Map<string, ClassificationResult>();
    const pending: string[] = [];
    const pendingKeys = new Set<string>();

    for (const text of texts) {
      const key = this.cacheKey(text);
      const cached = this.options.cacheEnabled ? this.cache.get(key) : undefined;
      if (cached) {
        results.set(key, cached);
      } else if (!pendingKeys.has(key)) {
        pendingKeys.add(key);
        pending.push(text);
      }
    }

    if (pending.length > 0) {
      logger.debug(
        `Classifying ${pending.length} fragments remotely (${texts.length - pending.length} cached)`,
      );
    }

    for (const batch of this.createBatches(pending)) {
      const batchResults = await this.classifyRemoteBatch(batch, options.signal);
      batch.keys.forEach((key, index) => {
        results.set(key, batchResults[index]);
      });
    }

    return texts.map((text) => {
      const result = results.get(this.cacheKey(text));
      return result ?? this.fallbackResult(text);
    });
  }

  /**
   * Number of fragments currently held in the content-hash cache.
   */
  get cacheSize(): number {
    return this.cache.size;
  }

  private async classifyRemoteBatch(
    batch: Batch,
    signal: AbortSignal | undefined,
  ): Promise<ClassificationResult[]> {
    try {
      const started = Date.now();
      const answer = await requestChatCompletion({
        apiKey: this.options.apiKey,
        model: this.options.model,
        baseURL: this.options.baseURL,
        messages: [{ role: "user", content: this.buildPrompt(batch.texts) }],
        timeoutMs: this.options.timeoutMs,
        maxRetries: this.options.maxRetries,
        retryDelayMs: this.options.retryDelayMs,
        signal,
      });
      logger.debug(
        `Remote classification of ${batch.texts.length} fragments took ${Date.now() - started}ms`,
      );
      const parsed = this.parseAnswer(answer, batch.texts.length);
      if (this.options.cacheEnabled) {
        batch.keys.forEach((key, index) => {
          this.cache.set(key, parsed[index]);
        });
        this.evictOldest();
      }
      return parsed;
    } catch (error) {
      const reason = error instanceof ClassifierError ? error.message : String(error);
      logger.warn(
        `Remote classification failed for ${batch.texts.length} fragments, using rules: ${reason}`,
      );
      return batch.texts.map((text) => this.fallbackResult(text));
    }
  }

  private parseAnswer(answer: string, expectedCount: number): ClassificationResult[] {
    const start = answer.indexOf("[");
    const end = answer.lastIndexOf("]");
    if (start === -1 || end <= start) {
      throw new ClassifierResponseError("no JSON array found");
    }

    let json: unknown;
    try {
      json = JSON.parse(answer.slice(start, end + 1));
    } catch (error) {
      throw new ClassifierResponseError(
        "invalid JSON",
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = modelAnswerSchema.safeParse(json);
    if (!parsed.success) {
      throw new ClassifierResponseError(parsed.error.issues[0]?.message ?? "schema mismatch");
    }
    if (parsed.data.length !== expectedCount) {
      throw new ClassifierResponseError(
        `expected ${expectedCount} results, got ${parsed.data.length}`,
      );
    }

    return parsed.data.map((item): ClassificationResult => {
      const level = item.level !== undefined && item.level >= 1 ? item.level : undefined;
      return {
        isHeading: item.is_heading && level !== undefined,
        level: item.is_heading && level !== undefined ? level : DEFAULT_HEADING_LEVEL,
        confidence: item.confidence ?? 0.5,
        source: "remote",
      };
    });
  }

  private buildPrompt(texts: readonly string[]): string {
    const lines = texts.map((text, index) => {
      const fragment =
        text.length > MAX_PROMPT_FRAGMENT_LENGTH
          ? `${text.slice(0, MAX_PROMPT_FRAGMENT_LENGTH)}...`
          : text;
      return `${index + 1}. ${fragment}`;
    });
    return `${PROMPT_HEADER}\n${lines.join("\n")}\n`;
  }

  /**
   * Groups fragments so that each request stays under both the fragment count
   * and the estimated token budget. A single oversized fragment gets its own batch.
   */
  private createBatches(texts: readonly string[]): Batch[] {
    const batches: Batch[] = [];
    let current: Batch = { texts: [], keys: [] };
    let currentTokens = 0;

    for (const text of texts) {
      const estimated = this.estimateTokens(text);
      if (
        current.texts.length > 0 &&
        (current.texts.length >= this.options.maxTextsPerBatch ||
          currentTokens + estimated > this.options.maxTokensPerBatch)
      ) {
        batches.push(current);
        current = { texts: [], keys: [] };
        currentTokens = 0;
      }
      current.texts.push(text);
      current.keys.push(this.cacheKey(text));
      currentTokens += estimated;
    }

    if (current.texts.length > 0) {
      batches.push(current);
    }
    return batches;
  }

  // One token per CJK character, roughly one per two Latin words on top
  private estimateTokens(text: string): number {
    const words = text.split(/\s+/).filter(Boolean).length;
    return text.length + Math.floor(words / 2);
  }

  // Map iteration follows insertion order, so the first keys are the oldest
  private evictOldest(): void {
    for (const key of this.cache.keys()) {
      if (this.cache.size <= this.options.cacheMaxEntries) {
        break;
      }
      this.cache.delete(key);
    }
  }

  private cacheKey(text: string): string {
    return createHash("sha256").update(text).digest("hex");
  }

  private fallbackResult(text: string): ClassificationResult {
    return { ...this.fallback.detect(text), source: "fallback" };
  }
}

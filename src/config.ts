import { z } from "zod";
import type { DocumentType } from "./classifier/types";
import type { ChunkingStrategy } from "./flattener/types";
import { ConfigurationError } from "./utils/errors";

/**
 * Default configuration values for the chunking pipeline
 */

/** Upper bound on chunk size, in units of the active size function */
export const DEFAULT_MAX_SIZE = 2000;

/** Maximum overlap carried from one split piece into the next */
export const DEFAULT_OVERLAP = 200;

/** Character-set similarity at or above which a chunk counts as a duplicate */
export const DEFAULT_DEDUP_THRESHOLD = 0.7;

/** Number of normalized characters compared by the deduplicator */
export const DEFAULT_FINGERPRINT_LENGTH = 300;

/** Level given to plain content; also the level of fuzzily detected headings */
export const DEFAULT_HEADING_LEVEL = 10;

/** Fragments at or above this length are never treated as fuzzy headings */
export const DEFAULT_FUZZY_MAX_LENGTH = 30;

/** Article markers on fragments longer than this are read as clause bodies */
export const DEFAULT_ARTICLE_MAX_LENGTH = 50;

/** Fragments longer than this are never headings */
export const DEFAULT_HEADING_MAX_LENGTH = 200;

/** Title of the section created for content that precedes the first heading */
export const DOCUMENT_ROOT_HEADING = "Document Content";

export type DocumentProfile = "document" | "legal" | "contract" | "regulation";

export interface ProfileSettings {
  maxSize: number;
  overlap: number;
  strictSizing: boolean;
  strategy: ChunkingStrategy;
  documentType: DocumentType;
  /** Whether an LLM-backed classifier is suggested for this kind of document */
  preferRemoteClassifier: boolean;
}

type SubtypeSettings = Pick<ProfileSettings, "maxSize" | "overlap" | "strategy">;

const PROFILES: Record<DocumentProfile, ProfileSettings> = {
  document: {
    maxSize: DEFAULT_MAX_SIZE,
    overlap: DEFAULT_OVERLAP,
    strictSizing: false,
    strategy: "finest_granularity",
    documentType: "general",
    preferRemoteClassifier: false,
  },
  legal: {
    maxSize: 1500,
    overlap: 100,
    strictSizing: true,
    strategy: "finest_granularity",
    documentType: "legal",
    preferRemoteClassifier: false,
  },
  contract: {
    maxSize: 2000,
    overlap: 200,
    strictSizing: true,
    strategy: "finest_granularity",
    documentType: "contract",
    preferRemoteClassifier: false,
  },
  regulation: {
    maxSize: 1800,
    overlap: 150,
    strictSizing: true,
    strategy: "finest_granularity",
    documentType: "regulation",
    preferRemoteClassifier: true,
  },
};

const SUBTYPES: Partial<Record<DocumentProfile, Record<string, SubtypeSettings>>> = {
  contract: {
    service: { maxSize: 1800, overlap: 150, strategy: "finest_granularity" },
    purchase: { maxSize: 2200, overlap: 200, strategy: "finest_granularity" },
    employment: { maxSize: 1600, overlap: 100, strategy: "finest_granularity" },
    partnership: { maxSize: 2500, overlap: 250, strategy: "all_levels" },
    general: { maxSize: 2000, overlap: 200, strategy: "finest_granularity" },
  },
  regulation: {
    hr: { maxSize: 1600, overlap: 120, strategy: "finest_granularity" },
    finance: { maxSize: 2000, overlap: 180, strategy: "finest_granularity" },
    operation: { maxSize: 2200, overlap: 200, strategy: "all_levels" },
    safety: { maxSize: 1500, overlap: 100, strategy: "finest_granularity" },
    general: { maxSize: 1800, overlap: 150, strategy: "finest_granularity" },
  },
};

export const DOCUMENT_PROFILES: readonly DocumentProfile[] = [
  "document",
  "legal",
  "contract",
  "regulation",
];

function isDocumentProfile(value: string): value is DocumentProfile {
  return DOCUMENT_PROFILES.some((profile) => profile === value);
}

/**
 * Returns the settings of a named document profile, narrowed by an optional
 * sub-type ("service", "hr", ...). Unknown sub-types fall back to the profile's
 * "general" entry, unknown profiles are rejected.
 */
export function resolveProfile(profile: string, subtype?: string): ProfileSettings {
  if (!isDocumentProfile(profile)) {
    throw new ConfigurationError(
      `Unknown document profile '${profile}'. Valid profiles: ${DOCUMENT_PROFILES.join(", ")}`,
      "profile",
    );
  }
  const base = PROFILES[profile];
  const subtypes = SUBTYPES[profile];
  if (!subtypes || subtype === undefined) {
    return { ...base };
  }
  const overrides = subtypes[subtype] ?? subtypes.general;
  return { ...base, ...overrides };
}

const positiveInt = z.coerce.number().int().positive();

const remoteClassifierEnvSchema = z.object({
  CHUNKING_LLM_API_KEY: z.string().min(1),
  CHUNKING_LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  CHUNKING_LLM_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  CHUNKING_LLM_TIMEOUT_MS: positiveInt.default(30_000),
  CHUNKING_LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  CHUNKING_LLM_BATCH_SIZE: positiveInt.default(20),
  CHUNKING_LLM_MAX_TOKENS_PER_BATCH: positiveInt.default(3000),
});

export interface RemoteClassifierSettings {
  apiKey: string;
  model: string;
  baseURL: string;
  timeoutMs: number;
  maxRetries: number;
  maxTextsPerBatch: number;
  maxTokensPerBatch: number;
}

/**
 * Reads the LLM classifier settings from environment variables.
 */
export function loadRemoteClassifierSettings(
  env: Record<string, string | undefined> = process.env,
): RemoteClassifierSettings {
  const parsed = remoteClassifierEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid remote classifier settings: ${details}`);
  }
  const settings = parsed.data;
  return {
    apiKey: settings.CHUNKING_LLM_API_KEY,
    model: settings.CHUNKING_LLM_MODEL,
    baseURL: settings.CHUNKING_LLM_BASE_URL,
    timeoutMs: settings.CHUNKING_LLM_TIMEOUT_MS,
    maxRetries: settings.CHUNKING_LLM_MAX_RETRIES,
    maxTextsPerBatch: settings.CHUNKING_LLM_BATCH_SIZE,
    maxTokensPerBatch: settings.CHUNKING_LLM_MAX_TOKENS_PER_BATCH,
  };
}

#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import packageJson from "../package.json";
import { RemoteClassifier } from "./classifier/RemoteClassifier";
import { RuleBasedClassifier } from "./classifier/RuleBasedClassifier";
import {
  DOCUMENT_TYPES,
  type DocumentType,
  type HeadingClassifier,
  isDocumentType,
} from "./classifier/types";
import { DOCUMENT_PROFILES, loadRemoteClassifierSettings, resolveProfile } from "./config";
import { CHUNKING_STRATEGIES } from "./flattener/types";
import { loadElements } from "./input/loadElements";
import { ChunkingPipeline } from "./pipeline/ChunkingPipeline";
import type { ChunkingOptions } from "./pipeline/types";
import { resolveSizeFunction, SIZE_UNITS } from "./splitter/sizing";
import { ChunkingError, ConfigurationError } from "./utils/errors";
import { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";

interface ChunkCommandOptions {
  maxSize?: string;
  overlap?: string;
  bySentence: boolean;
  strategy?: string;
  strictSizing?: boolean;
  dedup: boolean;
  dedupThreshold?: string;
  size: string;
  profile?: string;
  subtype?: string;
  remote?: boolean;
  sections?: boolean;
}

interface ClassifyCommandOptions {
  documentType: string;
  remote?: boolean;
}

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);

function parseDocumentType(value: string): DocumentType {
  if (!isDocumentType(value)) {
    throw new ConfigurationError(
      `Unknown document type '${value}'. Valid types: ${DOCUMENT_TYPES.join(", ")}`,
      "documentType",
    );
  }
  return value;
}

/**
 * Rule-based classifier for the document type, wrapped in the LLM classifier
 * when requested. Remote settings come from CHUNKING_LLM_* variables.
 */
function createClassifier(documentType: DocumentType, remote: boolean): HeadingClassifier {
  const rules = new RuleBasedClassifier({ documentType });
  if (!remote) {
    return rules;
  }
  const settings = loadRemoteClassifierSettings();
  logger.info(`Using remote heading classification with ${settings.model}`);
  return new RemoteClassifier({ ...settings, fallback: rules });
}

async function main() {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    controller.abort();
  });

  setLogLevel(parseLogLevel(process.env.LOG_LEVEL));
  const program = new Command();

  program
    .name("hierarchical-chunker")
    .description("Split extracted document elements into hierarchy-aware chunks")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  program
    .command("chunk <file>")
    .description(
      "Chunk a document. JSON files hold an element list; " +
        "other files are read as text with one paragraph per line",
    )
    .option("-m, --max-size <number>", "Maximum chunk size, in units of --size")
    .option("-o, --overlap <number>", "Maximum overlap between split pieces")
    .option("--no-by-sentence", "Cut oversized text with a raw window instead of at sentences")
    .option(
      "-s, --strategy <strategy>",
      `Flattening strategy: ${CHUNKING_STRATEGIES.join(", ")}`,
    )
    .option("--strict-sizing", "Split every chunk larger than the maximum size")
    .option("--no-dedup", "Keep near-duplicate chunks")
    .option("--dedup-threshold <number>", "Similarity at which chunks count as duplicates")
    .option("--size <unit>", `Size unit: ${SIZE_UNITS.join(", ")}`, "character")
    .option("-p, --profile <name>", `Document profile: ${DOCUMENT_PROFILES.join(", ")}`)
    .option("--subtype <name>", "Profile sub-type, e.g. service or hr")
    .option("--remote", "Classify headings with the LLM configured in the environment")
    .option("--sections", "Print the section tree instead of the chunks")
    .action(async (file: string, options: ChunkCommandOptions) => {
      const overrides: ChunkingOptions = {
        maxSize: toNumber(options.maxSize),
        overlap: toNumber(options.overlap),
        bySentence: options.bySentence,
        sizeFn: resolveSizeFunction(options.size),
        strategy: options.strategy,
        strictSizing: options.strictSizing,
        deduplicate: options.dedup,
        dedupThreshold: toNumber(options.dedupThreshold),
      };
      const profile = options.profile
        ? resolveProfile(options.profile, options.subtype)
        : undefined;
      if (profile?.preferRemoteClassifier && !options.remote) {
        logger.info(
          `Profile '${options.profile}' is usually chunked with --remote classification`,
        );
      }
      const classifier = createClassifier(
        profile?.documentType ?? "general",
        options.remote ?? false,
      );
      const pipeline = options.profile
        ? ChunkingPipeline.fromProfile(options.profile, options.subtype, overrides, {
            classifier,
          })
        : new ChunkingPipeline(overrides, { classifier });

      const elements = await loadElements(file);
      if (options.sections) {
        const sections = await pipeline.buildSections(elements, { signal: controller.signal });
        console.log(formatOutput(sections));
        return;
      }
      const { chunks, warnings } = await pipeline.process(elements, {
        signal: controller.signal,
      });
      console.log(formatOutput({ chunks, warnings }));
    });

  program
    .command("classify <text...>")
    .description("Show how each text would be classified")
    .option(
      "-t, --document-type <type>",
      `Document type: ${DOCUMENT_TYPES.join(", ")}`,
      "general",
    )
    .option("--remote", "Classify with the LLM configured in the environment")
    .action(async (texts: string[], options: ClassifyCommandOptions) => {
      const classifier = createClassifier(
        parseDocumentType(options.documentType),
        options.remote ?? false,
      );
      const results = await classifier.classifyBatch(texts, { signal: controller.signal });
      console.log(formatOutput(texts.map((text, index) => ({ text, ...results[index] }))));
    });

  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts();
    if (options.silent) {
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof ChunkingError) {
      console.error(`Error: ${error.message}`);
    } else {
      const detail = error instanceof Error ? error.stack : String(error);
      logger.error(`Unexpected error: ${detail}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});

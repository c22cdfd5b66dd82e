import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Element } from "../types";
import { InputError } from "../utils/errors";
import { logger } from "../utils/logger";
import { fullTrim } from "../utils/string";

const elementSchema = z
  .object({
    text: z.string(),
    isHeading: z.boolean().optional(),
    is_heading: z.boolean().optional(),
    level: z.number().int().positive().nullable().optional(),
    kind: z.enum(["paragraph", "table_cell", "heading"]).optional(),
    sourceTag: z.string().optional(),
    source_tag: z.string().optional(),
  })
  .transform((raw): Element => {
    const isHeading = raw.isHeading ?? raw.is_heading ?? raw.kind === "heading";
    const sourceTag = raw.sourceTag ?? raw.source_tag;
    return {
      text: raw.text,
      isHeading,
      kind: raw.kind ?? (isHeading ? "heading" : "paragraph"),
      ...(raw.level != null ? { level: raw.level } : {}),
      ...(sourceTag !== undefined ? { sourceTag } : {}),
    };
  });

const elementFileSchema = z.union([
  z.array(elementSchema),
  z.object({ elements: z.array(elementSchema) }).transform((file) => file.elements),
]);

/**
 * Turns plain text into unclassified paragraph elements, one per non-empty line.
 */
export function elementsFromText(text: string): Element[] {
  return text
    .split(/\r?\n/)
    .map((line) => fullTrim(line))
    .filter(Boolean)
    .map((line): Element => ({ text: line, isHeading: false, kind: "paragraph" }));
}

/**
 * Parses a JSON element list, as written by an extractor. Both camelCase and
 * snake_case keys are accepted.
 */
export function parseElements(json: string, source = "<input>"): Element[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InputError(
      source,
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = elementFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InputError(
      source,
      `not an element list (${issue.path.join(".") || "root"}: ${issue.message})`,
    );
  }
  return parsed.data;
}

/**
 * Loads the elements of a document from disk. `.json` files hold an element
 * list; any other file is read as UTF-8 text with one paragraph per line.
 */
export async function loadElements(source: string): Promise<Element[]> {
  const filePath = source.replace(/^file:\/\//, "");
  logger.info(`Loading elements from ${filePath}`);

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    throw new InputError(
      filePath,
      error instanceof Error ? error.message : "Unknown error",
      error instanceof Error ? error : undefined,
    );
  }

  const elements =
    path.extname(filePath).toLowerCase() === ".json"
      ? parseElements(content, filePath)
      : elementsFromText(content);
  logger.debug(`Loaded ${elements.length} elements from ${filePath}`);
  return elements;
}

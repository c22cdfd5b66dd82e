import { getEncoding, type TiktokenEncoding } from "js-tiktoken";
import { ConfigurationError } from "../utils/errors";
import { codePointLength } from "../utils/string";
import type { SizeFunction, SizeUnit } from "./types";

/**
 * Default size function: one unit per code point.
 */
export const characterCount: SizeFunction = (text) => codePointLength(text);

/**
 * Counts tokens with a tiktoken encoding (cl100k_base matches the GPT-3.5/4
 * family). The encoder is created once per call of this factory.
 */
export function createTokenCounter(encoding: TiktokenEncoding = "cl100k_base"): SizeFunction {
  const encoder = getEncoding(encoding);
  return (text) => encoder.encode(text).length;
}

export const SIZE_UNITS: readonly SizeUnit[] = ["character", "tiktoken"];

export function resolveSizeFunction(unit: string): SizeFunction {
  switch (unit) {
    case "character":
      return characterCount;
    case "tiktoken":
      return createTokenCounter();
    default:
      throw new ConfigurationError(
        `Unknown size unit '${unit}'. Valid units: ${SIZE_UNITS.join(", ")}`,
        "size",
      );
  }
}

import type { SentenceSpan } from "./types";

const TERMINATORS = new Set([".", "!", "?", ";", "。", "！", "？", "；"]);

/** Closing marks that belong to the sentence they follow */
const CLOSERS = new Set([
  '"',
  "'",
  "”",
  "’",
  ")",
  "）",
  "]",
  "】",
  "」",
  "』",
  "》",
  "〉",
]);

const isDigit = (char: string | undefined): boolean =>
  char !== undefined && char >= "0" && char <= "9";

const isWhitespace = (char: string): boolean => /\s/.test(char);

/**
 * Locates the sentences of `text`. Every span keeps its terminator and any
 * closing quotes or brackets right after it, and is trimmed of surrounding
 * whitespace. Text after the last terminator forms a final sentence.
 *
 * A period between two digits ("1.5") does not end a sentence.
 */
export function findSentences(text: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let start = 0;
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    const decimalPoint =
      char === "." && isDigit(text[index - 1]) && isDigit(text[index + 1]);
    if (!TERMINATORS.has(char) || decimalPoint) {
      index++;
      continue;
    }

    let end = index + 1;
    while (end < text.length && (TERMINATORS.has(text[end]) || CLOSERS.has(text[end]))) {
      end++;
    }
    pushTrimmed(text, start, end, spans);
    start = end;
    index = end;
  }

  pushTrimmed(text, start, text.length, spans);
  return spans;
}

/**
 * Sentence texts of `text`, in order.
 */
export function splitSentences(text: string): string[] {
  return findSentences(text).map((span) => text.slice(span.start, span.end));
}

function pushTrimmed(text: string, start: number, end: number, spans: SentenceSpan[]): void {
  let from = start;
  let to = end;
  while (from < to && isWhitespace(text[from])) from++;
  while (to > from && isWhitespace(text[to - 1])) to--;
  if (from < to) {
    spans.push({ start: from, end: to });
  }
}

import { StructureLevel } from "./types";

const NUMERAL = "[一二三四五六七八九十百千万零〇\\d]+";
const SMALL_NUMERAL = "[一二三四五六七八九十\\d]+";

export interface PatternGroup {
  level: StructureLevel;
  patterns: readonly string[];
}

/**
 * Prefix patterns of legal and contract documents, broadest unit first.
 * The first group with a matching pattern decides the level.
 */
export const LEGAL_PATTERNS: readonly PatternGroup[] = [
  { level: StructureLevel.BOOK, patterns: [`^第${NUMERAL}编\\s*`] },
  { level: StructureLevel.PART, patterns: [`^第${NUMERAL}篇\\s*`] },
  { level: StructureLevel.CHAPTER, patterns: [`^第${NUMERAL}章\\s*`] },
  { level: StructureLevel.SECTION, patterns: [`^第${NUMERAL}节\\s*`] },
  { level: StructureLevel.ARTICLE, patterns: [`^第${NUMERAL}条\\s*`] },
  { level: StructureLevel.CLAUSE, patterns: [`^第${NUMERAL}款\\s*`] },
  { level: StructureLevel.ITEM, patterns: [`^第${NUMERAL}项\\s*`] },
  { level: StructureLevel.SUBITEM, patterns: [`^第${NUMERAL}目\\s*`] },
  { level: StructureLevel.PARAGRAPH, patterns: [] },
  {
    level: StructureLevel.ENUMERATION,
    patterns: [
      `^（${NUMERAL}）\\s*`,
      `^\\(${NUMERAL}\\)\\s*`,
      "^[一二三四五六七八九十百千万]+[、．.]\\s*",
    ],
  },
  {
    level: StructureLevel.NUMBERING,
    patterns: ["^\\d+[、．.]\\s*", "^\\d+\\.\\d+[、．.]?\\s*", "^\\d+\\)\\s*"],
  },
];

/**
 * Generic numbering used by non-legal documents, consulted only when no legal
 * pattern matched.
 */
export const GENERAL_PATTERNS: readonly PatternGroup[] = [
  { level: StructureLevel.PART, patterns: ["^Part\\s+(\\d+|[IVXLC]+)\\b"] },
  { level: StructureLevel.CHAPTER, patterns: ["^Chapter\\s+(\\d+|[IVXLC]+)\\b"] },
  { level: StructureLevel.SECTION, patterns: ["^Section\\s+\\d+"] },
  { level: StructureLevel.ARTICLE, patterns: ["^Article\\s+\\d+"] },
  {
    level: StructureLevel.ENUMERATION,
    patterns: [`^${SMALL_NUMERAL}[、．.]\\s*`, `^（${SMALL_NUMERAL}）\\s*`],
  },
  { level: StructureLevel.NUMBERING, patterns: ["^\\d+\\.\\d+\\.?\\s+", "^\\d+\\.\\s+"] },
];

/** Words that reveal an article-prefixed fragment as a clause body */
export const ARTICLE_CONTENT_MARKERS: readonly string[] = [
  "内容",
  "规定",
  "说明",
  "包含",
  "详细",
  "很长",
  "多",
];

export const FUZZY_CONTENT_MARKERS: readonly string[] = ["内容", "规定", "说明", "包含", "详细"];

export const SENTENCE_TERMINATORS: readonly string[] = [
  "。",
  ".",
  "！",
  "!",
  "？",
  "?",
  "；",
  ";",
  "：",
  ":",
];

export const CLAUSE_PUNCTUATION: readonly string[] = ["，", ",", "、"];

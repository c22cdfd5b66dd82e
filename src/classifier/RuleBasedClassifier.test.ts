import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../utils/errors";
import { RuleBasedClassifier } from "./RuleBasedClassifier";
import { StructureLevel } from "./types";

vi.mock("../utils/logger");

describe("RuleBasedClassifier", () => {
  const classifier = new RuleBasedClassifier();

  describe("legal pattern table", () => {
    it("should classify an article marker with a short title as an article heading", () => {
      expect(classifier.detect("第一条 为了规范合同管理")).toEqual({
        isHeading: true,
        level: StructureLevel.ARTICLE,
        confidence: 1,
        source: "rules",
      });
    });

    it("should downgrade an article marker that opens a clause body", () => {
      expect(classifier.detect("第一条的内容很长，包含了很多详细的规定和说明。")).toEqual({
        isHeading: false,
        level: 10,
        confidence: 1,
        source: "rules",
      });
    });

    it("should downgrade article fragments longer than the article limit", () => {
      const text = `第五条 ${"甲方应当按照约定期限向乙方支付款项".repeat(3)}`;
      expect(classifier.detect(text).isHeading).toBe(false);
    });

    it("should map each structural unit to its level", () => {
      expect(classifier.detect("第二编 物权").level).toBe(StructureLevel.BOOK);
      expect(classifier.detect("第一篇 总论").level).toBe(StructureLevel.PART);
      expect(classifier.detect("第一章 总则").level).toBe(StructureLevel.CHAPTER);
      expect(classifier.detect("第三节 附则").level).toBe(StructureLevel.SECTION);
      expect(classifier.detect("第二款 适用").level).toBe(StructureLevel.CLAUSE);
      expect(classifier.detect("第四项 其他").level).toBe(StructureLevel.ITEM);
      expect(classifier.detect("第一目 细则").level).toBe(StructureLevel.SUBITEM);
      expect(classifier.detect("（一）适用范围").level).toBe(StructureLevel.ENUMERATION);
      expect(classifier.detect("(2) 付款方式").level).toBe(StructureLevel.ENUMERATION);
      expect(classifier.detect("三、违约责任").level).toBe(StructureLevel.ENUMERATION);
      expect(classifier.detect("1. Scope").level).toBe(StructureLevel.NUMBERING);
      expect(classifier.detect("2、交付").level).toBe(StructureLevel.NUMBERING);
    });

    it("should accept Arabic numerals inside structural markers", () => {
      expect(classifier.detect("第12条 保密义务")).toMatchObject({
        isHeading: true,
        level: StructureLevel.ARTICLE,
      });
    });

    it("should trim surrounding whitespace before matching", () => {
      expect(classifier.detect("  第三节 附则  ").level).toBe(StructureLevel.SECTION);
    });
  });

  describe("general pattern table", () => {
    it("should match English structural words case-insensitively", () => {
      expect(classifier.detect("Chapter 3 Definitions").level).toBe(StructureLevel.CHAPTER);
      expect(classifier.detect("SECTION 2 Payment").level).toBe(StructureLevel.SECTION);
      expect(classifier.detect("article 7 Confidentiality")).toMatchObject({
        isHeading: true,
        level: StructureLevel.ARTICLE,
      });
    });

    it("should not consult the general table for legal documents", () => {
      const legal = new RuleBasedClassifier({ documentType: "legal" });
      expect(legal.detect("Chapter 3 Definitions").isHeading).toBe(false);
      expect(legal.detect("Payment Terms").isHeading).toBe(false);
    });
  });

  describe("fuzzy fallback", () => {
    it("should treat a short line without terminator as a heading at the default level", () => {
      expect(classifier.detect("Payment Terms")).toEqual({
        isHeading: true,
        level: 10,
        confidence: 1,
        source: "rules",
      });
    });

    it("should reject sentences, clause punctuation and content words", () => {
      expect(classifier.detect("Payment is due.").isHeading).toBe(false);
      expect(classifier.detect("甲方，乙方").isHeading).toBe(false);
      expect(classifier.detect("付款说明").isHeading).toBe(false);
      expect(classifier.detect("This agreement is made between the parties").isHeading).toBe(
        false,
      );
    });

    it("should be switchable off", () => {
      const strict = new RuleBasedClassifier({ enableFuzzyMatching: false });
      expect(strict.detect("Payment Terms").isHeading).toBe(false);
    });
  });

  describe("length limits", () => {
    it("should never classify a single character as a heading", () => {
      expect(classifier.detect("一").isHeading).toBe(false);
      expect(classifier.detect("   ").isHeading).toBe(false);
    });

    it("should never classify fragments above the heading length cap", () => {
      expect(classifier.detect(`第一章 ${"甲".repeat(200)}`).isHeading).toBe(false);
    });
  });

  describe("extra patterns", () => {
    it("should append custom patterns to the given level", () => {
      const custom = new RuleBasedClassifier({
        documentType: "legal",
        extraPatterns: { [StructureLevel.CHAPTER]: ["^Schedule\\s+[A-Z]\\b"] },
      });
      expect(custom.detect("Schedule A Pricing")).toMatchObject({
        isHeading: true,
        level: StructureLevel.CHAPTER,
      });
    });

    it("should reject invalid custom patterns at construction", () => {
      expect(
        () => new RuleBasedClassifier({ extraPatterns: { [StructureLevel.ITEM]: ["^("] } }),
      ).toThrow(ConfigurationError);
    });
  });

  describe("async contract", () => {
    it("should classify batches in input order", async () => {
      const results = await classifier.classifyBatch(["第一章 总则", "正文内容在这里。"]);
      expect(results.map((result) => result.isHeading)).toEqual([true, false]);
      expect(results[0].level).toBe(StructureLevel.CHAPTER);
    });

    it("should resolve single classifications", async () => {
      await expect(classifier.classify("第一章 总则")).resolves.toMatchObject({
        isHeading: true,
        level: StructureLevel.CHAPTER,
      });
    });
  });

  describe("extractSections", () => {
    it("should split raw text at lines opening with structural markers", () => {
      const text =
        "前言部分\n第一章 总则\n第一条 为了规范管理。\n本条适用于全体员工。\n第二条 定义\n";

      expect(classifier.extractSections(text)).toEqual([
        { heading: "第一章", content: "第一章 总则", level: StructureLevel.CHAPTER, start: 5, end: 12 },
        {
          heading: "第一条",
          content: "第一条 为了规范管理。\n本条适用于全体员工。",
          level: StructureLevel.ARTICLE,
          start: 12,
          end: 35,
        },
        { heading: "第二条", content: "第二条 定义", level: StructureLevel.ARTICLE, start: 35, end: 42 },
      ]);
    });

    it("should return nothing for text without markers", () => {
      expect(classifier.extractSections("no markers here\nat all")).toEqual([]);
    });
  });
});

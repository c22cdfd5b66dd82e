import { describe, expect, it } from "vitest";
import { findSentences, splitSentences } from "./sentences";

describe("splitSentences", () => {
  it("should keep terminators with their sentence", () => {
    expect(splitSentences("第一条 ABC。第二条 DEF。")).toEqual(["第一条 ABC。", "第二条 DEF。"]);
  });

  it("should split on Latin and full-width terminators", () => {
    expect(splitSentences("One. Two! Three? Four; 五！六？七；")).toEqual([
      "One.",
      "Two!",
      "Three?",
      "Four;",
      "五！",
      "六？",
      "七；",
    ]);
  });

  it("should not split decimal numbers", () => {
    expect(splitSentences("Rate is 1.5 percent. Done.")).toEqual(["Rate is 1.5 percent.", "Done."]);
  });

  it("should attach closing quotes and brackets", () => {
    expect(splitSentences("他说：“好。”然后离开。")).toEqual(["他说：“好。”", "然后离开。"]);
    expect(splitSentences("(See clause 3.) Next.")).toEqual(["(See clause 3.)", "Next."]);
  });

  it("should keep runs of terminators together", () => {
    expect(splitSentences("真的吗？！好。")).toEqual(["真的吗？！", "好。"]);
  });

  it("should return trailing text without a terminator", () => {
    expect(splitSentences("第一句。 第二句没有句号")).toEqual(["第一句。", "第二句没有句号"]);
  });

  it("should return nothing for blank text", () => {
    expect(splitSentences(" \n ")).toEqual([]);
  });

  it("should report trimmed offsets into the source", () => {
    expect(findSentences("  A.  B. ")).toEqual([
      { start: 2, end: 4 },
      { start: 6, end: 8 },
    ]);
  });
});

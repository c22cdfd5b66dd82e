import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { InputError } from "../utils/errors";
import { elementsFromText, loadElements, parseElements } from "./loadElements";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("loadElements", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("should read plain text as one paragraph per line", async () => {
    vol.fromJSON({ "/docs/contract.txt": "第一章 总则\r\n\n  本合同由双方订立。  \n" });

    const elements = await loadElements("/docs/contract.txt");

    expect(elements).toEqual([
      { text: "第一章 总则", isHeading: false, kind: "paragraph" },
      { text: "本合同由双方订立。", isHeading: false, kind: "paragraph" },
    ]);
  });

  it("should accept file URLs", async () => {
    vol.fromJSON({ "/docs/a.txt": "正文" });
    expect(await loadElements("file:///docs/a.txt")).toHaveLength(1);
  });

  it("should read element lists from JSON files", async () => {
    vol.fromJSON({
      "/docs/elements.json": JSON.stringify([
        { text: "Overview", is_heading: true, level: 1, source_tag: "Heading 1" },
        { text: "Body", isHeading: false, kind: "paragraph", level: null },
        { text: "cell", kind: "table_cell" },
      ]),
    });

    const elements = await loadElements("/docs/elements.json");

    expect(elements).toEqual([
      { text: "Overview", isHeading: true, level: 1, kind: "heading", sourceTag: "Heading 1" },
      { text: "Body", isHeading: false, kind: "paragraph" },
      { text: "cell", isHeading: false, kind: "table_cell" },
    ]);
  });

  it("should wrap read failures in an InputError", async () => {
    await expect(loadElements("/missing.txt")).rejects.toThrow(InputError);
  });
});

describe("parseElements", () => {
  it("should accept an object with an elements array", () => {
    expect(parseElements('{"elements":[{"text":"第一条","kind":"heading"}]}')).toEqual([
      { text: "第一条", isHeading: true, kind: "heading" },
    ]);
  });

  it("should reject malformed JSON", () => {
    expect(() => parseElements("[{", "doc.json")).toThrow(
      /^Failed to load doc\.json: invalid JSON/,
    );
  });

  it("should reject values that are not element lists", () => {
    expect(() => parseElements('[{"text": 1}]', "doc.json")).toThrow(InputError);
    expect(() => parseElements('[{"text": "a", "level": 0}]')).toThrow(InputError);
  });
});

describe("elementsFromText", () => {
  it("should skip blank lines", () => {
    expect(elementsFromText("\n\n  \n")).toEqual([]);
  });
});

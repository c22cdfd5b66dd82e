import axios from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { RemoteClassifier } from "./RemoteClassifier";
import { StructureLevel } from "./types";

vi.mock("axios");
vi.mock("../utils/logger");
const mockedAxios = vi.mocked(axios, true);

const answer = (items: unknown[], prefix = "") => ({
  data: { choices: [{ message: { content: `${prefix}${JSON.stringify(items)}` } }] },
});

type ClassifierOptions = ConstructorParameters<typeof RemoteClassifier>[0];

const createClassifier = (overrides: Partial<ClassifierOptions> = {}) =>
  new RemoteClassifier({
    apiKey: "test-key",
    model: "test-model",
    baseURL: "https://llm.test/v1/",
    retryDelayMs: 0,
    ...overrides,
  });

describe("RemoteClassifier", () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it("should map the model answer onto classification results", async () => {
    mockedAxios.post.mockResolvedValue(
      answer(
        [
          { is_heading: true, level: 3, confidence: 0.9 },
          { is_heading: false, level: 0, confidence: 0.8 },
        ],
        "Result: ",
      ),
    );
    const classifier = createClassifier();

    const results = await classifier.classifyBatch(["第一章 总则", "正文内容。"]);

    expect(results).toEqual([
      { isHeading: true, level: 3, confidence: 0.9, source: "remote" },
      { isHeading: false, level: 10, confidence: 0.8, source: "remote" },
    ]);
    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(mockedAxios.post.mock.calls[0][0]).toBe("https://llm.test/v1/chat/completions");
  });

  it("should send the bearer token and the prompt with numbered fragments", async () => {
    mockedAxios.post.mockResolvedValue(answer([{ is_heading: true, level: 5 }]));
    const classifier = createClassifier();

    await classifier.classify("第一条 定义");

    const [, body, config] = mockedAxios.post.mock.calls[0];
    expect(config?.headers).toMatchObject({ Authorization: "Bearer test-key" });
    expect(body).toMatchObject({ model: "test-model", temperature: 0.1 });
    expect(JSON.stringify(body)).toContain("1. 第一条 定义");
  });

  it("should serve repeated fragments from the content-hash cache", async () => {
    mockedAxios.post.mockResolvedValue(answer([{ is_heading: true, level: 3, confidence: 1 }]));
    const classifier = createClassifier();

    const first = await classifier.classifyBatch(["第一章 总则", "第一章 总则"]);
    const second = await classifier.classify("第一章 总则");

    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(first).toEqual([second, second]);
    expect(classifier.cacheSize).toBe(1);
  });

  it("should evict the oldest cached fragment beyond the entry limit", async () => {
    mockedAxios.post
      .mockResolvedValueOnce(answer([{ is_heading: true, level: 3 }]))
      .mockResolvedValueOnce(answer([{ is_heading: true, level: 4 }]))
      .mockResolvedValueOnce(answer([{ is_heading: true, level: 3 }]));
    const classifier = createClassifier({ cacheMaxEntries: 1 });

    await classifier.classify("第一章 总则");
    await classifier.classify("第三节 附则");
    expect(classifier.cacheSize).toBe(1);

    await classifier.classify("第三节 附则");
    expect(mockedAxios.post).toHaveBeenCalledTimes(2);

    const again = await classifier.classify("第一章 总则");
    expect(mockedAxios.post).toHaveBeenCalledTimes(3);
    expect(again.level).toBe(3);
    expect(classifier.cacheSize).toBe(1);
  });

  it("should split requests by fragment count", async () => {
    mockedAxios.post
      .mockResolvedValueOnce(
        answer([
          { is_heading: true, level: 3 },
          { is_heading: true, level: 5 },
        ]),
      )
      .mockResolvedValueOnce(answer([{ is_heading: false }]));
    const classifier = createClassifier({ maxTextsPerBatch: 2 });

    const results = await classifier.classifyBatch(["第一章 总则", "第一条 定义", "正文内容。"]);

    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
    expect(results.map((result) => result.level)).toEqual([3, 5, 10]);
    expect(results[2].confidence).toBe(0.5);
  });

  it("should fall back to the rules on a malformed answer", async () => {
    mockedAxios.post.mockResolvedValue({
      data: { choices: [{ message: { content: "I cannot help with that." } }] },
    });
    const classifier = createClassifier();

    const results = await classifier.classifyBatch(["第一章 总则"]);

    expect(results).toEqual([
      { isHeading: true, level: StructureLevel.CHAPTER, confidence: 1, source: "fallback" },
    ]);
  });

  it("should fall back when the answer has the wrong number of entries", async () => {
    mockedAxios.post.mockResolvedValue(answer([{ is_heading: true, level: 3 }]));
    const classifier = createClassifier();

    const results = await classifier.classifyBatch(["第一章 总则", "正文内容。"]);

    expect(results.map((result) => result.source)).toEqual(["fallback", "fallback"]);
    expect(results[1].isHeading).toBe(false);
  });

  it("should not retry client errors", async () => {
    mockedAxios.post.mockRejectedValue({ response: { status: 401 } });
    const classifier = createClassifier();

    const result = await classifier.classify("第一章 总则");

    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(result.source).toBe("fallback");
  });

  it("should retry server errors with backoff", async () => {
    mockedAxios.post
      .mockRejectedValueOnce({ response: { status: 503 } })
      .mockResolvedValueOnce(answer([{ is_heading: true, level: 4, confidence: 0.7 }]));
    const classifier = createClassifier();

    const result = await classifier.classify("第三节 附则");

    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ isHeading: true, level: 4, confidence: 0.7, source: "remote" });
  });

  it("should give up after the retry budget", async () => {
    mockedAxios.post.mockRejectedValue({ response: { status: 502 } });
    const classifier = createClassifier({ maxRetries: 2 });

    const result = await classifier.classify("第三节 附则");

    expect(mockedAxios.post).toHaveBeenCalledTimes(3);
    expect(result.source).toBe("fallback");
  });

  it("should not retry timeouts", async () => {
    mockedAxios.post.mockRejectedValue({ code: "ECONNABORTED", message: "timeout exceeded" });
    const classifier = createClassifier({ timeoutMs: 100 });

    const result = await classifier.classify("第三节 附则");

    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(mockedAxios.post.mock.calls[0][2]).toMatchObject({ timeout: 100 });
    expect(result).toMatchObject({ isHeading: true, level: StructureLevel.SECTION });
  });

  it("should skip the request entirely once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const classifier = createClassifier();

    const result = await classifier.classify("第三节 附则", { signal: controller.signal });

    expect(mockedAxios.post).not.toHaveBeenCalled();
    expect(result.source).toBe("fallback");
  });

  it("should not cache fallback results", async () => {
    mockedAxios.post
      .mockRejectedValueOnce({ response: { status: 400 } })
      .mockResolvedValueOnce(answer([{ is_heading: true, level: 3, confidence: 1 }]));
    const classifier = createClassifier();

    const first = await classifier.classify("第一章 总则");
    const second = await classifier.classify("第一章 总则");

    expect(first.source).toBe("fallback");
    expect(second.source).toBe("remote");
    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
  });
});

import axios, { type AxiosError } from "axios";
import { logger } from "../utils/logger";
import { ClassifierRequestError } from "./errors";

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface ChatCompletionOptions {
  apiKey: string;
  model: string;
  /** Base URL of an OpenAI-compatible API, without the trailing path */
  baseURL: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  maxRetries: number;
  /** Base delay between retries in milliseconds, doubled on every attempt */
  retryDelayMs?: number;
  signal?: AbortSignal;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

const BASE_RETRY_DELAY = 1000;

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ClassifierRequestError("Request aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ClassifierRequestError("Request aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isRetryableStatus(status: number | undefined): boolean {
  return status === undefined || status === 429 || (status >= 500 && status < 600);
}

/**
 * Sends one chat completion request to an OpenAI-compatible endpoint and returns
 * the text of the first choice. Network errors, 429 and 5xx responses are retried
 * with exponential backoff; aborts and timeouts are not.
 */
export async function requestChatCompletion({
  apiKey,
  model,
  baseURL,
  messages,
  temperature = 0.1,
  maxTokens = 1000,
  timeoutMs,
  maxRetries,
  retryDelayMs = BASE_RETRY_DELAY,
  signal,
}: ChatCompletionOptions): Promise<string> {
  const url = `${baseURL.replace(/\/+$/, "")}/chat/completions`;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new ClassifierRequestError("Request aborted before completion");
    }
    try {
      const response = await axios.post<ChatCompletionResponse>(
        url,
        { model, messages, temperature, max_tokens: maxTokens },
        {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            "Content-Type": "application/json",
          },
          timeout: timeoutMs,
          signal,
        },
      );
      const content = response.data.choices?.[0]?.message?.content;
      if (typeof content !== "string") {
        throw new ClassifierRequestError("Response contained no message content");
      }
      return content;
    } catch (error: unknown) {
      if (error instanceof ClassifierRequestError) {
        throw error;
      }
      const axiosError = error as AxiosError;
      const status = axiosError.response?.status;
      const code = axiosError.code;
      const timedOut = code === "ECONNABORTED" || code === "ETIMEDOUT";
      const aborted = code === "ERR_CANCELED" || signal?.aborted === true;

      if (!aborted && !timedOut && attempt < maxRetries && isRetryableStatus(status)) {
        const wait = retryDelayMs * 2 ** attempt;
        logger.warn(
          `Classification request attempt ${attempt + 1}/${maxRetries + 1} failed ` +
            `(Status: ${status}, Code: ${code}). Retrying in ${wait}ms...`,
        );
        await delay(wait, signal);
        continue;
      }

      throw new ClassifierRequestError(
        `Classification request failed after ${attempt + 1} attempts: ${
          axiosError.message ?? "Unknown error"
        }`,
        status,
        isRetryableStatus(status),
        error instanceof Error ? error : undefined,
      );
    }
  }
  throw new ClassifierRequestError(
    `Classification request failed after ${maxRetries + 1} attempts`,
  );
}

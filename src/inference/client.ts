import { setTimeout as delay } from "node:timers/promises";

import type { TokenBucketRateLimiter } from "./rate-limiter.js";

const DEFAULT_TIMEOUT_MS = 60_000;

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatCompletionParams = {
  temperature?: number;
  seed?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" };
};

export type RetryPolicy = {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: "none" | "full";
};

export interface ChatRequestOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  rateLimiter?: TokenBucketRateLimiter | null;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
}

export interface ChatCompletionResult {
  content: string;
  responseBody: unknown;
  latencyMs: number;
  retryCount: number;
  model: string | null;
  responseId: string | null;
}

export class InferenceServiceError extends Error {
  status?: number;
  code?: string;
  /** Transient failures (rate limits, 5xx, transport, timeouts) are retried before surfacing. */
  retryable: boolean;
  retryCount: number;
  responseBody?: unknown;

  constructor(message: string, options: {
    status?: number;
    code?: string;
    retryable: boolean;
    retryCount: number;
    responseBody?: unknown;
  }) {
    super(message);
    this.name = "InferenceServiceError";
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable;
    this.retryCount = options.retryCount;
    this.responseBody = options.responseBody;
  }
}

const parseJsonBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

const readStringField = (body: unknown, field: string): string | null => {
  if (body && typeof body === "object" && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === "string" ? value : null;
  }
  return null;
};

export const extractAssistantText = (body: unknown): string => {
  if (!body || typeof body !== "object" || !("choices" in body)) {
    return "";
  }
  const choices: unknown = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return "";
  }
  const first: unknown = choices[0];
  if (!first || typeof first !== "object" || !("message" in first)) {
    return "";
  }
  const message: unknown = first.message;
  return readStringField(message, "content") ?? "";
};

const classifyError = (
  status: number,
  body: unknown
): { retryable: boolean; code?: string; message?: string } => {
  let code: string | undefined;
  let message: string | undefined;

  if (body && typeof body === "object" && "error" in body) {
    const error: unknown = body.error;
    code = readStringField(error, "code") ?? readStringField(error, "type") ?? undefined;
    message = readStringField(error, "message") ?? undefined;
  }

  return {
    retryable: status === 408 || status === 429 || status >= 500,
    code,
    message
  };
};

const parseRetryAfterMs = (headers: Headers): number | null => {
  const raw = headers.get("retry-after");
  if (!raw) {
    return null;
  }
  const numericSeconds = Number(raw);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.round(numericSeconds * 1000);
  }
  const asDate = Date.parse(raw);
  if (Number.isNaN(asDate)) {
    return null;
  }
  return Math.max(0, asDate - Date.now());
};

export const computeBackoffMs = (retry: RetryPolicy, attempt: number, random: () => number = Math.random): number => {
  if (retry.backoffMs <= 0) {
    return 0;
  }
  const maxBackoffMs = retry.maxBackoffMs ?? 30_000;
  const exponential = retry.backoffMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(maxBackoffMs, exponential);
  if ((retry.jitter ?? "full") === "none") {
    return capped;
  }
  return Math.max(0, Math.round(capped * (0.5 + random())));
};

export const createTimeoutSignal = (
  timeoutMs: number,
  parentSignal?: AbortSignal
): { signal: AbortSignal; cancel: () => void; didTimeout: () => boolean } => {
  let timedOut = false;
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | null = null;
  let parentListenerAttached = false;
  const onParentAbort = (): void => {
    controller.abort();
    cleanup();
  };
  const cleanup = (): void => {
    if (timeout) {
      clearTimeout(timeout);
      timeout = null;
    }
    if (parentSignal && parentListenerAttached) {
      parentSignal.removeEventListener("abort", onParentAbort);
      parentListenerAttached = false;
    }
  };

  timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
    cleanup();
  }, timeoutMs);

  if (parentSignal) {
    if (parentSignal.aborted) {
      controller.abort();
    } else {
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
      parentListenerAttached = true;
    }
  }

  return {
    signal: controller.signal,
    cancel: cleanup,
    didTimeout: () => timedOut
  };
};

/**
 * POST to an OpenAI-compatible `/chat/completions` endpoint.
 *
 * Each attempt gets its own timeout. 408/429/5xx responses, transport errors
 * and timed-out attempts are retried with exponential backoff up to
 * `retry.maxRetries`; anything else fails immediately.
 */
export const chatCompletion = async (input: {
  model: string;
  messages: ChatMessage[];
  params?: ChatCompletionParams;
  options: ChatRequestOptions;
}): Promise<ChatCompletionResult> => {
  const { options } = input;
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/$/, "");
  const retry = options.retry ?? { maxRetries: 0, backoffMs: 0 };
  const requestPayload: Record<string, unknown> = {
    model: input.model,
    messages: input.messages,
    ...input.params
  };

  let attempt = 0;
  const waitBackoff = async (retryAfterMs: number | null = null): Promise<void> => {
    const computed = computeBackoffMs(retry, attempt);
    const effective = retryAfterMs !== null ? Math.max(computed, retryAfterMs) : computed;
    if (effective <= 0) {
      return;
    }
    await delay(effective, undefined, options.signal ? { signal: options.signal } : undefined);
  };

  while (true) {
    await options.rateLimiter?.take(options.signal);
    const started = Date.now();
    const timeout = createTimeoutSignal(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, options.signal);
    try {
      const response = await fetchImpl(`${baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(requestPayload),
        signal: timeout.signal
      });
      const responseBody = await parseJsonBody(response);
      const latencyMs = Date.now() - started;

      if (response.ok) {
        return {
          content: extractAssistantText(responseBody),
          responseBody,
          latencyMs,
          retryCount: attempt,
          model: readStringField(responseBody, "model"),
          responseId: readStringField(responseBody, "id")
        };
      }

      const classification = classifyError(response.status, responseBody);
      if (classification.retryable && attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff(parseRetryAfterMs(response.headers));
        continue;
      }

      throw new InferenceServiceError(
        classification.message ?? `Inference request failed with status ${response.status}`,
        {
          status: response.status,
          code: classification.code,
          retryable: classification.retryable,
          retryCount: attempt,
          responseBody
        }
      );
    } catch (error) {
      if (error instanceof InferenceServiceError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new InferenceServiceError("Inference request aborted", {
          code: "aborted",
          retryable: false,
          retryCount: attempt
        });
      }
      if (attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff();
        continue;
      }
      const timedOut = timeout.didTimeout();
      throw new InferenceServiceError(
        timedOut
          ? `Inference request timed out after ${options.timeoutMs ?? DEFAULT_TIMEOUT_MS}ms`
          : `Inference request failed: ${error instanceof Error ? error.message : String(error)}`,
        {
          code: timedOut ? "timeout" : "transport_error",
          retryable: true,
          retryCount: attempt
        }
      );
    } finally {
      timeout.cancel();
    }
  }
};

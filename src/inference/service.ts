import type { ResolvedConfig } from "../config/types.js";
import type { Condition, Role } from "../core/types.js";
import { chatCompletion, type ChatMessage } from "./client.js";
import { createRateLimiter } from "./rate-limiter.js";

export type InferenceRequest = {
  role: Role;
  condition: Condition;
  round: number;
  attempt: number;
  messages: ChatMessage[];
  temperature: number;
  seed: number;
  responseFormat: "json_object";
};

export type InferenceResponse = {
  text: string;
  model: string | null;
  latencyMs: number;
  retryCount: number;
};

/**
 * Text generation boundary. Implementations throw `InferenceServiceError` once
 * their own retries are spent; callers never retry a failed call themselves.
 */
export interface InferenceService {
  readonly name: string;
  complete(request: InferenceRequest): Promise<InferenceResponse>;
}

export const createLiveInferenceService = (input: {
  config: ResolvedConfig;
  apiKey: string;
  fetchImpl?: typeof fetch;
}): InferenceService => {
  const { inference } = input.config;
  const rateLimiter = createRateLimiter(inference.requests_per_second);

  return {
    name: `live:${inference.model}`,
    complete: async (request) => {
      const result = await chatCompletion({
        model: inference.model,
        messages: request.messages,
        params: {
          temperature: request.temperature,
          seed: request.seed,
          response_format: { type: request.responseFormat }
        },
        options: {
          apiKey: input.apiKey,
          baseUrl: inference.base_url,
          timeoutMs: inference.request_timeout_ms,
          retry: {
            maxRetries: inference.max_retries,
            backoffMs: inference.backoff_ms,
            maxBackoffMs: inference.max_backoff_ms
          },
          rateLimiter,
          fetchImpl: input.fetchImpl
        }
      });
      return {
        text: result.content,
        model: result.model,
        latencyMs: result.latencyMs,
        retryCount: result.retryCount
      };
    }
  };
};

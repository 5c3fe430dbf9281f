import type { ResolvedConfig } from "../config/types.js";
import { formatAjvErrors } from "../config/schema-validation.js";
import { extractJsonObject } from "../core/json-extraction.js";
import type { Condition, JsonObject, Role, TurnFailureReason } from "../core/types.js";
import type { ChatMessage } from "../inference/client.js";
import { InferenceServiceError } from "../inference/client.js";
import type { InferenceService } from "../inference/service.js";
import { describeError } from "../utils/errors.js";
import { missingKeys, payloadValidatorFor } from "./payload-schema.js";
import { buildRepairMessages } from "./prompts.js";

export const MAX_PROTOCOL_ATTEMPTS = 2;

export type ValidatedPayloadResult =
  | {
      status: "success";
      payload: JsonObject;
      rawText: string;
      repaired: boolean;
      attempts: number;
    }
  | {
      status: "failed";
      reason: TurnFailureReason;
      message: string;
      attempts: number;
    };

export type ValidatedPayloadRequest = {
  service: InferenceService;
  protocol: ResolvedConfig["protocol"];
  role: Role;
  condition: Condition;
  round: number;
  messages: ChatMessage[];
  temperature: number;
  seed: number;
};

type PayloadCheck =
  | { ok: true; payload: JsonObject }
  | { ok: false; missing: string[]; problems: string[] };

const checkPayload = (rawText: string, input: ValidatedPayloadRequest): PayloadCheck => {
  const extracted = extractJsonObject(rawText);
  if (!extracted) {
    return {
      ok: false,
      missing: [...input.protocol.required_keys[input.role]],
      problems: ["reply is not a JSON object"]
    };
  }
  const validate = payloadValidatorFor(input.role, input.protocol);
  if (validate(extracted.value)) {
    return { ok: true, payload: extracted.value };
  }
  return {
    ok: false,
    missing: missingKeys(extracted.value, input.role, input.protocol),
    problems: formatAjvErrors("payload", validate.errors)
  };
};

const describeServiceFailure = (error: unknown): string => {
  if (error instanceof InferenceServiceError) {
    const status = error.status !== undefined ? ` (status ${error.status})` : "";
    return `inference failed after ${error.retryCount} retries${status}: ${error.message}`;
  }
  return `inference failed: ${describeError(error)}`;
};

/**
 * Asks the service for a role payload and checks it against the protocol.
 * A malformed reply earns exactly one repair request; service failures are
 * reported as they are. Never throws for either.
 */
export const requestValidatedPayload = async (
  input: ValidatedPayloadRequest
): Promise<ValidatedPayloadResult> => {
  let messages = input.messages;
  let lastProblem = "";

  for (let attempt = 1; attempt <= MAX_PROTOCOL_ATTEMPTS; attempt += 1) {
    let rawText: string;
    try {
      const response = await input.service.complete({
        role: input.role,
        condition: input.condition,
        round: input.round,
        attempt,
        messages,
        temperature: input.temperature,
        seed: input.seed,
        responseFormat: "json_object"
      });
      rawText = response.text;
    } catch (error) {
      return {
        status: "failed",
        reason: "service_error",
        message: describeServiceFailure(error),
        attempts: attempt
      };
    }

    const check = checkPayload(rawText, input);
    if (check.ok) {
      return {
        status: "success",
        payload: check.payload,
        rawText,
        repaired: attempt > 1,
        attempts: attempt
      };
    }

    lastProblem = [
      ...(check.missing.length > 0 ? [`missing required keys: ${check.missing.join(", ")}`] : []),
      ...check.problems
    ].join("; ");
    messages = buildRepairMessages({
      messages: input.messages,
      rawText,
      requiredKeys: input.protocol.required_keys[input.role],
      missingKeys: check.missing,
      problems: check.problems
    });
  }

  return {
    status: "failed",
    reason: "protocol_violation",
    message: `${input.role} reply rejected after ${MAX_PROTOCOL_ATTEMPTS} attempts: ${lastProblem}`,
    attempts: MAX_PROTOCOL_ATTEMPTS
  };
};

import type { ValidateFunction } from "ajv";

import { compilePayloadSchema } from "../config/schema-validation.js";
import type { ResolvedConfig } from "../config/types.js";
import type { JsonObject, Role } from "../core/types.js";
import { canonicalStringify } from "../utils/fingerprint.js";

type ProtocolSettings = ResolvedConfig["protocol"];

const cache = new Map<string, ValidateFunction<JsonObject>>();

const propertySchema = (key: string, protocol: ProtocolSettings): JsonObject => {
  switch (key) {
    case "features":
      return {
        type: "array",
        items: protocol.enforce_feature_whitelist
          ? { type: "string", enum: [...protocol.feature_whitelist] }
          : { type: "string" }
      };
    case "steps":
      return { type: "array", items: { type: "string" } };
    case "decision":
      return { type: "string", minLength: 1 };
    default:
      return {};
  }
};

/** JSON schema a role's payload must satisfy under the given protocol settings. */
export const buildPayloadSchema = (role: Role, protocol: ProtocolSettings): JsonObject => {
  const required = [...protocol.required_keys[role]];
  const properties: JsonObject = {};
  for (const key of required) {
    properties[key] = propertySchema(key, protocol);
  }
  return {
    type: "object",
    required,
    properties
  };
};

export const payloadValidatorFor = (
  role: Role,
  protocol: ProtocolSettings
): ValidateFunction<JsonObject> => {
  const schema = buildPayloadSchema(role, protocol);
  const cacheKey = canonicalStringify(schema);
  const cached = cache.get(cacheKey);
  if (cached) {
    return cached;
  }
  const compiled = compilePayloadSchema(schema);
  cache.set(cacheKey, compiled);
  return compiled;
};

/** Required keys absent from a payload, in declaration order. */
export const missingKeys = (payload: JsonObject, role: Role, protocol: ProtocolSettings): string[] =>
  protocol.required_keys[role].filter((key) => !(key in payload));

import type { JsonObject } from "./types.js";

export type JsonExtractionMethod = "strict" | "fenced" | "unfenced";

export type JsonExtraction = {
  value: JsonObject;
  method: JsonExtractionMethod;
};

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseObjectCandidate = (raw: string): JsonObject | null => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const extractFencedObject = (content: string): JsonObject | null => {
  const regex = /```(?:json)?\s*([\s\S]*?)```/gi;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content))) {
    const candidate = match[1]?.trim();
    if (!candidate) {
      continue;
    }
    const parsed = parseObjectCandidate(candidate);
    if (parsed) {
      return parsed;
    }
  }
  return null;
};

/** First balanced `{...}` span that parses as an object, string-literal aware. */
export const extractUnfencedObject = (content: string): JsonObject | null => {
  for (let i = 0; i < content.length; i += 1) {
    if (content[i] !== "{") {
      continue;
    }
    let depth = 0;
    let inString = false;
    let escaping = false;
    for (let j = i; j < content.length; j += 1) {
      const char = content[j];
      if (inString) {
        if (escaping) {
          escaping = false;
          continue;
        }
        if (char === "\\") {
          escaping = true;
          continue;
        }
        if (char === "\"") {
          inString = false;
        }
        continue;
      }
      if (char === "\"") {
        inString = true;
        continue;
      }
      if (char === "{") depth += 1;
      if (char === "}") depth -= 1;
      if (depth !== 0) {
        continue;
      }
      const parsed = parseObjectCandidate(content.slice(i, j + 1));
      if (parsed) {
        return parsed;
      }
      break;
    }
  }
  return null;
};

export const extractJsonObject = (content: string): JsonExtraction | null => {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const strict = parseObjectCandidate(trimmed);
  if (strict) {
    return { value: strict, method: "strict" };
  }

  const fenced = extractFencedObject(trimmed);
  if (fenced) {
    return { value: fenced, method: "fenced" };
  }

  const unfenced = extractUnfencedObject(trimmed);
  if (unfenced) {
    return { value: unfenced, method: "unfenced" };
  }

  return null;
};

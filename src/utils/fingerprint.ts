import { createHash } from "node:crypto";

import { isJsonObject } from "../core/json-extraction.js";

const canonicalizeValue = (value: unknown): string => {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalizeValue(item)).join(",")}]`;
  }

  if (!isJsonObject(value)) {
    return JSON.stringify(value);
  }

  const body = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entryValue]) => `${JSON.stringify(key)}:${canonicalizeValue(entryValue)}`)
    .join(",");

  return `{${body}}`;
};

/** JSON with object keys sorted, so equal values always serialize identically. */
export const canonicalStringify = (value: unknown): string => canonicalizeValue(value);

export const sha256Hex = (data: string | Buffer): string =>
  createHash("sha256").update(data).digest("hex");

export const fingerprint = (value: unknown): string => sha256Hex(canonicalStringify(value));

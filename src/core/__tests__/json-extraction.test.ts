import { describe, expect, it } from "vitest";

import { extractJsonObject } from "../json-extraction.js";

describe("extractJsonObject", () => {
  it("parses a bare object strictly", () => {
    expect(extractJsonObject(' {"decision": "APPROVE"} ')).toEqual({
      value: { decision: "APPROVE" },
      method: "strict"
    });
  });

  it("falls back to a fenced block", () => {
    const content = 'Here you go:\n```json\n{"features": ["rate"]}\n```\nthanks';
    expect(extractJsonObject(content)).toEqual({ value: { features: ["rate"] }, method: "fenced" });
  });

  it("finds the first balanced object in prose, ignoring braces in strings", () => {
    const content = 'Answer: {"steps": ["use {rate}"], "features": []} and more {';
    expect(extractJsonObject(content)).toEqual({
      value: { steps: ["use {rate}"], features: [] },
      method: "unfenced"
    });
  });

  it("rejects arrays, empty text and broken JSON", () => {
    expect(extractJsonObject("[1, 2]")).toBeNull();
    expect(extractJsonObject("   ")).toBeNull();
    expect(extractJsonObject('{"features": [')).toBeNull();
  });
});

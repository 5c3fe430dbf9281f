import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createDefaultConfig } from "../config/defaults.js";
import type { MusweepConfig, ResolvedConfig } from "../config/types.js";
import type { InferenceRequest, InferenceService } from "../inference/service.js";

type ConfigPatch = {
  [K in keyof MusweepConfig]?: Partial<MusweepConfig[K]>;
};

export const makeConfig = (patch: ConfigPatch = {}): ResolvedConfig => {
  const base = createDefaultConfig();
  return {
    inference: { ...base.inference, ...patch.inference },
    grid: { ...base.grid, ...patch.grid },
    influence: { ...base.influence, ...patch.influence },
    feedback: { ...base.feedback, ...patch.feedback },
    conversation: { ...base.conversation, ...patch.conversation },
    protocol: { ...base.protocol, ...patch.protocol },
    execution: { ...base.execution, ...patch.execution },
    output: { ...base.output, ...patch.output }
  };
};

export const makeTempDir = (): string => mkdtempSync(join(tmpdir(), "musweep-test-"));

export type ScriptedReply = string | Error | ((request: InferenceRequest) => string | Error);

/**
 * Service stub answering per role. A reply list is consumed in order; the
 * last entry repeats once the list runs out.
 */
export const scriptedService = (
  replies: Partial<Record<InferenceRequest["role"], ScriptedReply[]>>
): InferenceService & { requests: InferenceRequest[] } => {
  const requests: InferenceRequest[] = [];
  const cursors = new Map<string, number>();

  return {
    name: "scripted",
    requests,
    complete: async (request) => {
      requests.push(request);
      const list = replies[request.role] ?? [];
      const cursor = cursors.get(request.role) ?? 0;
      cursors.set(request.role, cursor + 1);
      const entry = list[Math.min(cursor, list.length - 1)];
      if (entry === undefined) {
        throw new Error(`no scripted reply for ${request.role}`);
      }
      const reply = typeof entry === "function" ? entry(request) : entry;
      if (reply instanceof Error) {
        throw reply;
      }
      return { text: reply, model: "scripted", latencyMs: 1, retryCount: 0 };
    }
  };
};

export const PLANNER_REPLY = JSON.stringify({
  features: ["packets", "rate", "entropy"],
  steps: ["track packets", "score rate", "flag entropy"]
});
export const RESEARCHER_REPLY = JSON.stringify({ features: ["packets", "rate", "entropy"] });
export const APPROVE_REPLY = JSON.stringify({ decision: "APPROVE" });
export const REVISE_REPLY = JSON.stringify({ decision: "REVISE" });

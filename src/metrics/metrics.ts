import type { Conversation, CriticDecision, JsonObject, Role, Turn } from "../core/types.js";
import { canonicalStringify } from "../utils/fingerprint.js";
import { TAG_SYNONYMS } from "./tag-synonyms.js";

const normalizeTag = (value: unknown): string | null => {
  if (typeof value !== "string" && typeof value !== "number") {
    return null;
  }
  const normalized = String(value).toLowerCase().split(/\s+/).filter(Boolean).join(" ");
  return normalized.length > 0 ? normalized : null;
};

/** Lowercased, whitespace-collapsed `features` entries of a payload. */
export const extractFeatureTags = (payload: Readonly<JsonObject> | undefined): Set<string> => {
  const tags = new Set<string>();
  const features = payload?.features;
  if (!Array.isArray(features)) {
    return tags;
  }
  for (const feature of features) {
    const tag = normalizeTag(feature);
    if (tag) {
      tags.add(tag);
    }
  }
  return tags;
};

export const canonicalizeTag = (tag: string): string => {
  const token = tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return TAG_SYNONYMS[token] ?? token;
};

export const canonicalTags = (
  payload: Readonly<JsonObject> | undefined,
  whitelist: ReadonlyArray<string>
): Set<string> => {
  const allowed = new Set(whitelist);
  const tags = new Set<string>();
  extractFeatureTags(payload).forEach((tag) => {
    const canonical = canonicalizeTag(tag);
    if (allowed.has(canonical)) {
      tags.add(canonical);
    }
  });
  return tags;
};

/** Jaccard index; `null` when both sets are empty. */
export const jaccard = (a: ReadonlySet<string>, b: ReadonlySet<string>): number | null => {
  if (a.size === 0 && b.size === 0) {
    return null;
  }
  let intersection = 0;
  a.forEach((item) => {
    if (b.has(item)) {
      intersection += 1;
    }
  });
  return intersection / (a.size + b.size - intersection);
};

export const criticDecision = (payload: Readonly<JsonObject> | undefined): CriticDecision | null => {
  const decision = payload?.decision;
  if (typeof decision !== "string") {
    return null;
  }
  const normalized = decision.trim().toUpperCase();
  return normalized === "APPROVE" || normalized === "REVISE" ? normalized : null;
};

export const findTurn = (
  turns: ReadonlyArray<Turn>,
  role: Role,
  roundIndex: number
): Turn | undefined => turns.find((turn) => turn.role === role && turn.roundIndex === roundIndex);

export const terminalRound = (conversation: Conversation): number | null => {
  const last = conversation.rounds[conversation.rounds.length - 1];
  return last ? last.round : null;
};

const terminalPair = (conversation: Conversation): [Turn, Turn] | null => {
  if (conversation.status === "failed") {
    return null;
  }
  const round = terminalRound(conversation);
  if (round === null) {
    return null;
  }
  const planner = findTurn(conversation.turns, "planner", round);
  const researcher = findTurn(conversation.turns, "researcher", round);
  return planner && researcher ? [planner, researcher] : null;
};

export const agreementRate = (conversation: Conversation): number | null => {
  const pair = terminalPair(conversation);
  if (!pair) {
    return null;
  }
  return jaccard(extractFeatureTags(pair[0].payload), extractFeatureTags(pair[1].payload));
};

export const canonicalOverlap = (
  conversation: Conversation,
  whitelist: ReadonlyArray<string>
): number | null => {
  const pair = terminalPair(conversation);
  if (!pair) {
    return null;
  }
  return jaccard(canonicalTags(pair[0].payload, whitelist), canonicalTags(pair[1].payload, whitelist));
};

/** First round whose termination check held, otherwise the round cap. */
export const roundsToApproval = (
  conversation: Conversation,
  maxRounds: number = conversation.maxRounds
): number | null => {
  if (conversation.status === "failed") {
    return null;
  }
  const satisfied = conversation.rounds.find((round) => round.satisfied);
  return satisfied ? satisfied.round : maxRounds;
};

const changedFields = (previous: Readonly<JsonObject>, current: Readonly<JsonObject>): number => {
  const keys = new Set([...Object.keys(previous), ...Object.keys(current)]);
  let changed = 0;
  keys.forEach((key) => {
    if (canonicalStringify(previous[key]) !== canonicalStringify(current[key])) {
      changed += 1;
    }
  });
  return changed;
};

/** Payload fields the role changed between consecutive rounds, summed over the conversation. */
export const revisionDepth = (conversation: Conversation, role: Role): number | null => {
  if (conversation.status === "failed") {
    return null;
  }
  const turns = conversation.turns
    .filter((turn) => turn.role === role)
    .sort((a, b) => a.roundIndex - b.roundIndex);
  let depth = 0;
  for (let i = 1; i < turns.length; i += 1) {
    depth += changedFields(turns[i - 1].payload, turns[i].payload);
  }
  return depth;
};

export const selfAgreement = (
  conversation: Conversation,
  role: Role,
  fromRound: number,
  toRound: number
): number | null => {
  if (conversation.status === "failed") {
    return null;
  }
  const from = findTurn(conversation.turns, role, fromRound);
  const to = findTurn(conversation.turns, role, toRound);
  if (!from || !to) {
    return null;
  }
  return jaccard(extractFeatureTags(from.payload), extractFeatureTags(to.payload));
};

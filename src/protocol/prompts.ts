import type { ChatMessage } from "../inference/client.js";
import type { Role, Turn } from "../core/types.js";

const FORMAT_HINT = [
  "Return exactly ONE JSON object. No prose, no explanations, no markdown, no code fences.",
  "If you cannot comply, output {}."
].join("\n");

const SYSTEM_PROMPTS: Record<Role, string> = {
  planner: "Role: Planner. Produce a short, step-wise plan with clear priorities.",
  researcher: "Role: Researcher. Extract key signals/features and provide concise evidence.",
  critic: "Role: Critic. Point out risks/gaps. Reply APPROVE when the plan is sufficient."
};

const SHAPES: Record<Role, string> = {
  planner: '{ "features": ["<name1>", "<name2>", "<name3>"], "steps": ["<step1>", "<step2>", "<step3>"] }',
  researcher: '{ "features": ["<name1>", "<name2>", "<name3>"] }',
  critic: '{ "decision": "APPROVE" or "REVISE" }'
};

const formatAllowed = (whitelist: ReadonlyArray<string>): string =>
  JSON.stringify(whitelist);

const taskFor = (role: Role, seed: number, allowed: string): string => {
  switch (role) {
    case "planner":
      return [
        `Task: [seed=${seed}] Propose exactly 3 streaming features for malware triage and a 3-step plan that uses exactly those features.`,
        "Each step MUST explicitly mention by name one or more of the chosen features.",
        `Choose features ONLY from this allowed set (use exact tokens): ${allowed}.`
      ].join("\n");
    case "researcher":
      return [
        `Task: [seed=${seed}] List exactly 3 streaming features (names only) computable in real time for malware triage.`,
        `Choose ONLY from this allowed set (use exact tokens): ${allowed}.`
      ].join("\n");
    case "critic":
      return [
        "You will receive the latest PLANNER and RESEARCHER JSON objects.",
        "APPROVE only if ALL are true:",
        '  1) PLANNER has "features" (3) and "steps" (>= 2), RESEARCHER has "features" (3).',
        `  2) All features in both objects belong to ${allowed}.`,
        "  3) Planner and Researcher share at least 2 out of 3 features.",
        "  4) At least 2 of the Planner's steps mention features used by the Planner.",
        "Otherwise REVISE."
      ].join("\n");
  }
};

export type RankedFeature = {
  feature: string;
  weight: number;
};

export type TurnPromptInput = {
  role: Role;
  roundIndex: number;
  seed: number;
  whitelist: ReadonlyArray<string>;
  history: ReadonlyArray<Turn>;
  mu: number;
  lambdaGate: number;
  ranking: ReadonlyArray<RankedFeature>;
};

const latestByRole = (history: ReadonlyArray<Turn>): Map<Role, Turn> => {
  const latest = new Map<Role, Turn>();
  history.forEach((turn) => latest.set(turn.role, turn));
  return latest;
};

const formatContext = (role: Role, history: ReadonlyArray<Turn>): string | null => {
  const latest = latestByRole(history);
  const lines: string[] = [];
  for (const [peer, turn] of latest) {
    if (peer === role && role === "critic") {
      continue;
    }
    const label = peer === role ? "YOUR PREVIOUS ANSWER" : peer.toUpperCase();
    lines.push(`${label} (round ${turn.roundIndex}):\n${JSON.stringify(turn.payload)}`);
  }
  return lines.length > 0 ? lines.join("\n\n") : null;
};

const formatRanking = (input: TurnPromptInput): string | null => {
  if (input.ranking.length === 0) {
    return null;
  }
  const ranked = input.ranking
    .map((entry) => `${entry.feature}=${entry.weight.toFixed(3)}`)
    .join(", ");
  return [
    `[influence] mu=${input.mu.toFixed(3)} lambda=${input.lambdaGate.toFixed(3)}`,
    `Feature weights (own vs peers, highest first): ${ranked}`
  ].join("\n");
};

export const buildTurnMessages = (input: TurnPromptInput): ChatMessage[] => {
  const allowed = formatAllowed(input.whitelist);
  const sections = [
    FORMAT_HINT,
    `Return:\n${SHAPES[input.role]}`,
    taskFor(input.role, input.seed, allowed),
    `Round ${input.roundIndex}.`
  ];
  const context = formatContext(input.role, input.history);
  if (context) {
    sections.push(context);
  }
  const ranking = formatRanking(input);
  if (ranking) {
    sections.push(ranking);
  }

  return [
    { role: "system", content: SYSTEM_PROMPTS[input.role] },
    { role: "user", content: sections.join("\n\n") }
  ];
};

/** Follow-up after a rejected answer: the first request and answer plus the problems found. */
export const buildRepairMessages = (input: {
  messages: ReadonlyArray<ChatMessage>;
  rawText: string;
  requiredKeys: ReadonlyArray<string>;
  missingKeys: ReadonlyArray<string>;
  problems: ReadonlyArray<string>;
}): ChatMessage[] => {
  const lines = [
    "Your previous reply did not follow the response protocol.",
    `Required keys: ${input.requiredKeys.join(", ")}.`
  ];
  if (input.missingKeys.length > 0) {
    lines.push(`Missing keys: ${input.missingKeys.join(", ")}.`);
  }
  if (input.problems.length > 0) {
    lines.push(`Problems: ${input.problems.join("; ")}.`);
  }
  lines.push(FORMAT_HINT);

  return [
    ...input.messages,
    { role: "assistant", content: input.rawText },
    { role: "user", content: lines.join("\n") }
  ];
};

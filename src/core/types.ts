export const ROLES = ["planner", "researcher", "critic"] as const;

export type Role = (typeof ROLES)[number];

export type Condition = "baseline" | "influence";

export type JsonObject = Record<string, unknown>;

/**
 * One configuration tuple of the sweep. The exact field tuple is the identity
 * used for ledger deduplication.
 */
export type GridPoint = {
  readonly alpha: number;
  readonly beta: number;
  readonly k: number;
  readonly tau: number;
  readonly seed: number;
  readonly adversarial: boolean;
};

export type PeerScores = Partial<Record<Role, number>>;

export type AgentState = {
  role: Role;
  mu: number;
  temperature: number;
  lambdaGate: number;
  peerScores: PeerScores;
};

export type Turn = {
  readonly role: Role;
  readonly roundIndex: number;
  readonly payload: Readonly<JsonObject>;
  readonly rawText: string;
  readonly repaired: boolean;
};

export type TurnFailureReason = "protocol_violation" | "service_error";

export type TurnFailure = {
  role: Role;
  roundIndex: number;
  reason: TurnFailureReason;
  message: string;
  attempts: number;
};

export type TurnResult =
  | { status: "success"; turn: Turn }
  | { status: "failed"; failure: TurnFailure };

export type TerminationReason = "approved" | "agreement" | "round_cap" | "failed";

export type CriticDecision = "APPROVE" | "REVISE";

export type RoundRecord = {
  round: number;
  agreement: number | null;
  decision: CriticDecision | null;
  satisfied: boolean;
};

export type Conversation = {
  readonly condition: Condition;
  readonly point: GridPoint;
  readonly status: "completed" | "failed";
  readonly turns: ReadonlyArray<Turn>;
  readonly rounds: ReadonlyArray<RoundRecord>;
  readonly terminationReason: TerminationReason;
  readonly approvalRound: number | null;
  readonly maxRounds: number;
  readonly failure?: TurnFailure;
  readonly agents: ReadonlyArray<AgentState>;
};

export type ResultRow = {
  beta: number;
  k: number;
  tau: number;
  alpha: number;
  seed: number;
  adversarial: boolean;
  mu_planner: number;
  mu_researcher: number;
  mu_critic: number;
  RoundsToApproval_baseline: number | null;
  RoundsToApproval_influence: number | null;
  AgreementRate_baseline: number | null;
  AgreementRate_influence: number | null;
  RevisionDepth_between_rounds: number | null;
  PlannerResearcher_Canonical_baseline: number | null;
  PlannerResearcher_Canonical_influence: number | null;
  Planner_SelfAgreement: number | null;
  Researcher_SelfAgreement: number | null;
};

export const LEDGER_COLUMNS = [
  "beta",
  "k",
  "tau",
  "alpha",
  "seed",
  "adversarial",
  "mu_planner",
  "mu_researcher",
  "mu_critic",
  "RoundsToApproval_baseline",
  "RoundsToApproval_influence",
  "AgreementRate_baseline",
  "AgreementRate_influence",
  "RevisionDepth_between_rounds",
  "PlannerResearcher_Canonical_baseline",
  "PlannerResearcher_Canonical_influence",
  "Planner_SelfAgreement",
  "Researcher_SelfAgreement"
] as const satisfies ReadonlyArray<keyof ResultRow>;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

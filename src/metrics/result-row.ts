import type { Conversation, GridPoint, ResultRow, Role } from "../core/types.js";
import {
  agreementRate,
  canonicalOverlap,
  revisionDepth,
  roundsToApproval,
  selfAgreement,
  terminalRound
} from "./metrics.js";

const roundNumber = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const roundTo = (value: number | null, digits: number): number | null =>
  value === null ? null : roundNumber(value, digits);

const sumOrNull = (values: Array<number | null>): number | null =>
  values.some((value) => value === null)
    ? null
    : values.reduce<number>((total, value) => total + (value ?? 0), 0);

const selfAgreementAcrossRun = (conversation: Conversation, role: Role): number | null => {
  const last = terminalRound(conversation);
  return last === null ? null : selfAgreement(conversation, role, 1, last);
};

/** Flattens the two conversations of a grid point into one ledger row. */
export const assembleResultRow = (input: {
  point: GridPoint;
  mu: Record<Role, number>;
  baseline: Conversation;
  influence: Conversation;
  whitelist: ReadonlyArray<string>;
}): ResultRow => {
  const { point, baseline, influence, whitelist } = input;

  return {
    beta: point.beta,
    k: point.k,
    tau: point.tau,
    alpha: point.alpha,
    seed: point.seed,
    adversarial: point.adversarial,
    mu_planner: roundNumber(input.mu.planner, 4),
    mu_researcher: roundNumber(input.mu.researcher, 4),
    mu_critic: roundNumber(input.mu.critic, 4),
    RoundsToApproval_baseline: roundsToApproval(baseline),
    RoundsToApproval_influence: roundsToApproval(influence),
    AgreementRate_baseline: roundTo(agreementRate(baseline), 4),
    AgreementRate_influence: roundTo(agreementRate(influence), 4),
    RevisionDepth_between_rounds: sumOrNull([
      revisionDepth(influence, "planner"),
      revisionDepth(influence, "researcher")
    ]),
    PlannerResearcher_Canonical_baseline: roundTo(canonicalOverlap(baseline, whitelist), 3),
    PlannerResearcher_Canonical_influence: roundTo(canonicalOverlap(influence, whitelist), 3),
    Planner_SelfAgreement: roundTo(selfAgreementAcrossRun(influence, "planner"), 3),
    Researcher_SelfAgreement: roundTo(selfAgreementAcrossRun(influence, "researcher"), 3)
  };
};

/** A row counts as failed when either conversation left no round count. */
export const isFailedRow = (row: Pick<ResultRow, "RoundsToApproval_baseline" | "RoundsToApproval_influence">): boolean =>
  row.RoundsToApproval_baseline === null || row.RoundsToApproval_influence === null;

import type { CriticDecision, Role, TerminationReason } from "../core/types.js";

export type ConversationState =
  | { kind: "awaiting_role"; role: Role; round: number }
  | { kind: "terminated"; round: number; reason: TerminationReason };

export type ConversationEvent =
  | { kind: "turn_accepted"; role: Role; check?: TerminationCheck }
  | { kind: "turn_failed"; role: Role };

export type TerminationCheck = {
  decision: CriticDecision | null;
  agreement: number | null;
};

export type TerminationPolicy = {
  maxRounds: number;
  agreementThreshold: number;
  stopOnApprove: boolean;
};

export const INITIAL_STATE: ConversationState = { kind: "awaiting_role", role: "planner", round: 1 };

const NEXT_ROLE: Record<Role, Role | null> = {
  planner: "researcher",
  researcher: "critic",
  critic: null
};

/** Whether a finished round ends the conversation, and why. */
export const evaluateTermination = (
  check: TerminationCheck,
  policy: Pick<TerminationPolicy, "agreementThreshold" | "stopOnApprove">
): "approved" | "agreement" | null => {
  if (policy.stopOnApprove && check.decision === "APPROVE") {
    return "approved";
  }
  if (check.agreement !== null && check.agreement >= policy.agreementThreshold) {
    return "agreement";
  }
  return null;
};

export const transition = (
  state: ConversationState,
  event: ConversationEvent,
  policy: TerminationPolicy
): ConversationState => {
  if (state.kind === "terminated") {
    throw new Error(`Conversation already terminated (${state.reason})`);
  }
  if (event.role !== state.role) {
    throw new Error(`Expected a ${state.role} turn in round ${state.round}, got ${event.role}`);
  }
  if (event.kind === "turn_failed") {
    return { kind: "terminated", round: state.round, reason: "failed" };
  }

  const next = NEXT_ROLE[state.role];
  if (next) {
    return { kind: "awaiting_role", role: next, round: state.round };
  }
  if (!event.check) {
    throw new Error(`Critic turn in round ${state.round} arrived without a termination check`);
  }

  const reason = evaluateTermination(event.check, policy);
  if (reason) {
    return { kind: "terminated", round: state.round, reason };
  }
  if (state.round >= policy.maxRounds) {
    return { kind: "terminated", round: state.round, reason: "round_cap" };
  }
  return { kind: "awaiting_role", role: "planner", round: state.round + 1 };
};

import { Agent } from "../agents/agent.js";
import type { ResolvedConfig } from "../config/types.js";
import {
  ROLES,
  type Condition,
  type Conversation,
  type GridPoint,
  type Role,
  type RoundRecord,
  type Turn,
  type TurnFailure
} from "../core/types.js";
import type { InfluenceProfile } from "../influence/profile.js";
import type { InferenceService } from "../inference/service.js";
import { criticDecision, extractFeatureTags, findTurn, jaccard } from "../metrics/metrics.js";
import {
  evaluateTermination,
  INITIAL_STATE,
  transition,
  type ConversationState,
  type TerminationPolicy
} from "./state-machine.js";

export type RunConversationInput = {
  point: GridPoint;
  condition: Condition;
  profile: InfluenceProfile;
  config: ResolvedConfig;
  service: InferenceService;
  onTurnRepaired?: (turn: Turn) => void;
};

const closeRound = (
  turns: ReadonlyArray<Turn>,
  round: number,
  policy: TerminationPolicy
): RoundRecord => {
  const planner = findTurn(turns, "planner", round);
  const researcher = findTurn(turns, "researcher", round);
  const critic = findTurn(turns, "critic", round);
  const agreement = jaccard(extractFeatureTags(planner?.payload), extractFeatureTags(researcher?.payload));
  const decision = criticDecision(critic?.payload);
  return {
    round,
    agreement,
    decision,
    satisfied: evaluateTermination({ agreement, decision }, policy) !== null
  };
};

/**
 * Runs planner, researcher and critic in turn until the critic approves, the
 * pair agrees, the round cap is hit or a turn fails.
 */
export const runConversation = async (input: RunConversationInput): Promise<Conversation> => {
  const { point, condition, profile, config, service } = input;
  const policy: TerminationPolicy = {
    maxRounds: config.conversation.max_rounds,
    agreementThreshold: config.conversation.agreement_threshold,
    stopOnApprove: config.conversation.stop_on_approve
  };

  const agents = new Map<Role, Agent>(
    ROLES.map((role) => [
      role,
      new Agent({
        role,
        point,
        condition,
        mu: profile.mu[role],
        peerScores: profile.peerScores[role],
        config,
        service
      })
    ])
  );

  const turns: Turn[] = [];
  const rounds: RoundRecord[] = [];
  let failure: TurnFailure | undefined;
  let state: ConversationState = INITIAL_STATE;

  while (state.kind === "awaiting_role") {
    const { role, round } = state;
    const agent = agents.get(role);
    if (!agent) {
      throw new Error(`No agent for role ${role}`);
    }

    const result = await agent.produceTurn(turns, round);
    if (result.status === "failed") {
      failure = result.failure;
      state = transition(state, { kind: "turn_failed", role }, policy);
      continue;
    }

    turns.push(result.turn);
    if (result.turn.repaired) {
      input.onTurnRepaired?.(result.turn);
    }

    if (role === "critic") {
      const record = closeRound(turns, round, policy);
      rounds.push(record);
      state = transition(
        state,
        { kind: "turn_accepted", role, check: { agreement: record.agreement, decision: record.decision } },
        policy
      );
    } else {
      state = transition(state, { kind: "turn_accepted", role }, policy);
    }
  }

  const approvalRound = rounds.find((record) => record.satisfied)?.round ?? null;

  return {
    condition,
    point,
    status: failure ? "failed" : "completed",
    turns,
    rounds,
    terminationReason: state.reason,
    approvalRound,
    maxRounds: policy.maxRounds,
    ...(failure ? { failure } : {}),
    agents: ROLES.flatMap((role) => {
      const agent = agents.get(role);
      return agent ? [agent.state()] : [];
    })
  };
};

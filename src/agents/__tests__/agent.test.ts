import { describe, expect, it } from "vitest";

import { APPROVE_REPLY, makeConfig, PLANNER_REPLY, scriptedService } from "../../__tests__/helpers.js";
import type { Condition, JsonObject, Role, Turn } from "../../core/types.js";
import { Agent, scorePeerTurn } from "../agent.js";
import { mixFeatureWeights } from "../mixing.js";

const turn = (role: Role, roundIndex: number, payload: JsonObject): Turn => ({
  role,
  roundIndex,
  payload,
  rawText: JSON.stringify(payload),
  repaired: false
});

describe("mixFeatureWeights", () => {
  it("blends own and score-weighted peer features", () => {
    const ranked = mixFeatureWeights({
      candidates: ["packets", "rate", "iat", "entropy"],
      own: new Set(["packets", "rate"]),
      peers: [
        { role: "researcher", tags: new Set(["rate", "iat"]), score: 0.75 },
        { role: "critic", tags: new Set(), score: 0.25 }
      ],
      lambdaGate: 0.5
    });

    expect(ranked).toEqual([
      { feature: "rate", weight: 0.875 },
      { feature: "packets", weight: 0.5 },
      { feature: "iat", weight: 0.375 }
    ]);
  });

  it("weights peers uniformly when no scores exist and keeps candidate order on ties", () => {
    expect(
      mixFeatureWeights({
        candidates: ["packets", "rate"],
        own: new Set(["rate"]),
        peers: [{ role: "researcher", tags: new Set(["packets"]), score: 0 }],
        lambdaGate: 0.5
      })
    ).toEqual([
      { feature: "packets", weight: 0.5 },
      { feature: "rate", weight: 0.5 }
    ]);
  });
});

describe("scorePeerTurn", () => {
  const config = makeConfig();
  const score = (observer: Role, peerTurn: Turn, adversarial = false, ownTurn?: Turn) =>
    scorePeerTurn({ observer, peerTurn, ownTurn, adversarial, config });

  it("scores critic decisions", () => {
    expect(score("planner", turn("critic", 1, { decision: "approve" }))).toBe(0.9);
    expect(score("planner", turn("critic", 1, { decision: "REVISE" }))).toBe(0.3);
    expect(score("planner", turn("critic", 1, { decision: "APPROVE" }), true)).toBe(0.1);
    expect(score("planner", turn("critic", 1, { decision: "maybe" }))).toBeNull();
  });

  it("lets the critic score the whitelisted share of producer features", () => {
    const producer = turn("planner", 1, { features: ["Packet Count", "made_up"] });
    expect(score("critic", producer)).toBe(0.5);
    expect(score("critic", producer, true)).toBe(0.4);
    expect(score("critic", turn("planner", 1, { features: [] }))).toBe(0);
  });

  it("scores producers against each other by feature overlap", () => {
    const own = turn("planner", 1, { features: ["packets", "rate"] });
    const peer = turn("researcher", 1, { features: ["rate", "iat"] });
    expect(score("planner", peer, false, own)).toBeCloseTo(1 / 3);
    expect(score("planner", peer)).toBe(0);
  });
});

describe("Agent", () => {
  const point = { alpha: 0.8, beta: 0.5, k: 6, tau: 0.5, seed: 4, adversarial: false };
  const history = [
    turn("planner", 1, JSON.parse(PLANNER_REPLY)),
    turn("researcher", 1, { features: ["packets", "rate"] }),
    turn("critic", 1, JSON.parse(APPROVE_REPLY))
  ];
  const plannerFor = (condition: Condition, service: ReturnType<typeof scriptedService>) =>
    new Agent({ role: "planner", point, condition, mu: 0.5, config: makeConfig(), service });

  it("derives temperature and gate from mu", () => {
    const agent = plannerFor("influence", scriptedService({}));
    expect(agent.temperature).toBeCloseTo(0.3);
    expect(agent.lambdaGate).toBe(0.5);
  });

  it("ranks features for the influence condition only", async () => {
    const service = scriptedService({ planner: [PLANNER_REPLY] });
    await plannerFor("influence", service).produceTurn(history, 2);
    await plannerFor("baseline", service).produceTurn(history, 2);

    const [influencePrompt, baselinePrompt] = service.requests.map((request) => request.messages[1].content);
    expect(influencePrompt).toContain(
      "[influence] mu=0.500 lambda=0.500\nFeature weights (own vs peers, highest first): packets=0.750, rate=0.750, entropy=0.500"
    );
    expect(baselinePrompt).not.toContain("[influence]");
  });

  it("updates peer scores once per observed turn", async () => {
    const agent = plannerFor("influence", scriptedService({ planner: [PLANNER_REPLY] }));

    const result = await agent.produceTurn(history, 2);
    expect(result.status).toBe("success");
    const after = agent.state().peerScores;
    expect(after.researcher).toBeCloseTo(1 / 3);
    expect(after.critic).toBeCloseTo(0.45);

    await agent.produceTurn(history, 2);
    expect(agent.state().peerScores).toEqual(after);
  });

  it("returns a failure instead of throwing when the service is down", async () => {
    const agent = plannerFor("baseline", scriptedService({ planner: [new Error("connection refused")] }));

    const result = await agent.produceTurn([], 1);

    expect(result).toEqual({
      status: "failed",
      failure: {
        role: "planner",
        roundIndex: 1,
        reason: "service_error",
        message: "inference failed: connection refused",
        attempts: 1
      }
    });
    expect(agent.state().peerScores).toEqual({});
  });
});

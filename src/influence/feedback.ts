import { ROLES, type PeerScores, type Role } from "../core/types.js";

const clampScore = (score: number): number => Math.min(1, Math.max(0, score));

/**
 * Exponential moving average of the scores one agent receives from each peer.
 * Lives for a single conversation.
 */
export class FeedbackAccumulator {
  private readonly scores = new Map<Role, number>();
  private readonly prior: number | null;

  /** @param prior starting value on first contact; `null` seeds with the first score seen. */
  constructor(prior: number | null = 0, initial: PeerScores = {}) {
    this.prior = prior;
    for (const peer of ROLES) {
      const score = initial[peer];
      if (score !== undefined) {
        this.scores.set(peer, clampScore(score));
      }
    }
  }

  receiveFeedback(peer: Role, score: number, beta: number): number {
    if (!Number.isFinite(beta) || beta < 0 || beta > 1) {
      throw new RangeError(`beta must be within [0, 1], got ${beta}`);
    }
    const incoming = clampScore(score);
    const old = this.scores.get(peer) ?? this.prior ?? incoming;
    const updated = beta * incoming + (1 - beta) * old;
    this.scores.set(peer, updated);
    return updated;
  }

  score(peer: Role): number | undefined {
    return this.scores.get(peer);
  }

  mu(): number {
    if (this.scores.size === 0) {
      return 0;
    }
    let total = 0;
    this.scores.forEach((value) => {
      total += value;
    });
    return total / this.scores.size;
  }

  snapshot(): PeerScores {
    const record: PeerScores = {};
    this.scores.forEach((value, peer) => {
      record[peer] = value;
    });
    return record;
  }
}

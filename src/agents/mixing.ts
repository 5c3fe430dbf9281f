import type { Role } from "../core/types.js";
import type { RankedFeature } from "../protocol/prompts.js";

export type PeerFeatureView = {
  role: Role;
  tags: ReadonlySet<string>;
  score: number;
};

/**
 * Blends an agent's own feature choice with its peers' choices.
 *
 * weight(f) = (1 - λ) * own(f) + λ * Σ s_j * peer_j(f) / Σ s_j, with memberships
 * 0 or 1 and s_j the running peer scores (uniform when every score is 0).
 * Only features with a positive weight are returned, heaviest first, ties in
 * candidate order.
 */
export const mixFeatureWeights = (input: {
  candidates: ReadonlyArray<string>;
  own: ReadonlySet<string>;
  peers: ReadonlyArray<PeerFeatureView>;
  lambdaGate: number;
}): RankedFeature[] => {
  const { own, peers, lambdaGate } = input;
  const scoreTotal = peers.reduce((total, peer) => total + Math.max(0, peer.score), 0);
  const peerWeight = (peer: PeerFeatureView): number =>
    scoreTotal > 0 ? Math.max(0, peer.score) / scoreTotal : 1 / peers.length;

  return input.candidates
    .map((feature, order) => {
      const ownPart = own.has(feature) ? 1 : 0;
      const peerPart = peers.reduce(
        (total, peer) => total + (peer.tags.has(feature) ? peerWeight(peer) : 0),
        0
      );
      return {
        feature,
        order,
        weight: (1 - lambdaGate) * ownPart + lambdaGate * peerPart
      };
    })
    .filter((entry) => entry.weight > 0)
    .sort((a, b) => b.weight - a.weight || a.order - b.order)
    .map(({ feature, weight }) => ({ feature, weight }));
};

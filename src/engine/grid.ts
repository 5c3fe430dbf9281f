import type { ResolvedConfig } from "../config/types.js";
import type { GridPoint } from "../core/types.js";
import { createSeededRng, seededShuffle } from "../utils/seeded-rng.js";

/** Identity of a grid point; equal keys mean the same ledger row. */
export const gridPointKey = (point: GridPoint): string =>
  [
    `beta=${point.beta}`,
    `k=${point.k}`,
    `tau=${point.tau}`,
    `alpha=${point.alpha}`,
    `seed=${point.seed}`,
    `adv=${point.adversarial ? 1 : 0}`
  ].join("|");

/**
 * Cartesian product of the grid sets, nested adversarial > beta > k > tau >
 * alpha > seed. With `shuffle_seed` set the order is a seeded permutation.
 */
export const enumerateGrid = (grid: ResolvedConfig["grid"]): GridPoint[] => {
  const points: GridPoint[] = [];
  for (const adversarial of grid.adversarial) {
    for (const beta of grid.beta) {
      for (const k of grid.k) {
        for (const tau of grid.tau) {
          for (const alpha of grid.alpha) {
            for (const seed of grid.seed) {
              points.push({ alpha, beta, k, tau, seed, adversarial });
            }
          }
        }
      }
    }
  }
  if (grid.shuffle_seed === null) {
    return points;
  }
  return seededShuffle(points, createSeededRng("grid", grid.shuffle_seed));
};

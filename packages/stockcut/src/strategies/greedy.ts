/**
 * Greedy search: exhaustive position/orientation scan scored by
 * `placementScore`. The ultimate fallback of the decision pipeline.
 *
 * Cost is bounded by an attempt budget: every examined position counts as
 * one attempt, and the search stops as soon as the budget is spent.
 */

import type { GreedyConfig, Observation, Placement } from "../types";
import { defaultPolicyConfig } from "../types";
import { canPlace, orientations, placementScore, stockSize } from "../geometry";
import { area, eligibleProducts } from "./products";

export interface GreedyResult {
  placement: Placement | null;
  /** Positions examined. Never exceeds the budget. */
  attempts: number;
  score: number;
}

export function greedySearch(
  observation: Observation,
  config?: GreedyConfig
): GreedyResult {
  const { maxAttempts, rotationBonus } = { ...defaultPolicyConfig.greedy, ...config };

  const products = eligibleProducts(observation).sort(
    (a, b) => area(b.size) - area(a.size)
  );

  let best: Placement | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  let attempts = 0;

  for (const product of products) {
    for (const size of orientations(product.size)) {
      const [w, h] = size;
      const rotated = size[0] !== product.size[0];

      for (const [stockIdx, grid] of observation.stocks.entries()) {
        const { width, height } = stockSize(grid);
        if (width < w || height < h) continue;

        for (let y = 0; y <= height - h; y++) {
          for (let x = 0; x <= width - w; x++) {
            if (attempts >= maxAttempts) {
              return { placement: best, attempts, score: bestScore };
            }
            attempts++;

            if (!canPlace(grid, [x, y], size)) continue;

            let score = placementScore(grid, [x, y], size);
            if (rotated && score > 0) score *= rotationBonus;

            if (score > bestScore) {
              bestScore = score;
              best = { stockIdx, size, position: [x, y] };
            }
          }
        }
      }
    }
  }

  return { placement: best, attempts, score: bestScore };
}

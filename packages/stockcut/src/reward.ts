/**
 * Reward shaping for realized placements.
 *
 * The reward is a sum of independent terms, each reported in the breakdown:
 *
 *   proximity    scatter penalty (no neighbors on a stock with material)
 *                or adjacency reward
 *   topDown      penalty for empty cells left above the piece
 *   edge         +8 at the top-left corner, +4 on the top or left edge
 *   newStock     penalty for opening a stock with a small piece
 *   utilization  30 × change of the corrected filled ratio
 *   isolation    penalty for empty cells around the piece
 *
 * Terms are computed from the observation AFTER the placement was applied;
 * the grid as it was before is recovered by clearing the footprint.
 * Every exponential term is capped.
 */

import type { Observation, Placement } from "./types";
import {
  adjacentWeight,
  distanceToNearestFilled,
  emptyNeighborCount,
  filledRatio,
  gapsAbove,
  stockSize,
  usedArea,
  usedStockCount,
  withoutFootprint,
} from "./geometry";

export const NO_PLACEMENT_REWARD = -10;

export interface RewardBreakdown {
  proximity: number;
  topDown: number;
  edge: number;
  newStock: number;
  utilization: number;
  isolation: number;
  /** Fixed penalty when no placement was made. */
  noPlacement: number;
  total: number;
  /** Corrected filled ratio after the placement. */
  filledRatio: number;
}

function breakdown(terms: Omit<RewardBreakdown, "total">): RewardBreakdown {
  const total =
    terms.proximity +
    terms.topDown +
    terms.edge +
    terms.newStock +
    terms.utilization +
    terms.isolation +
    terms.noPlacement;
  return { ...terms, total };
}

export class RewardShaper {
  private previousFilledRatio = 0;

  /** Corrected filled ratio the next utilization term is measured against. */
  get baseline(): number {
    return this.previousFilledRatio;
  }

  /** Start a new episode. */
  reset(filledRatio: number = 0): void {
    this.previousFilledRatio = filledRatio;
  }

  shape(placement: Placement | null, after: Observation): RewardBreakdown {
    if (!placement) {
      return breakdown({
        proximity: 0,
        topDown: 0,
        edge: 0,
        newStock: 0,
        utilization: 0,
        isolation: 0,
        noPlacement: NO_PLACEMENT_REWARD,
        filledRatio: this.previousFilledRatio,
      });
    }

    const grid = after.stocks[placement.stockIdx];
    if (!grid) {
      throw new Error(`Placement targets missing stock ${placement.stockIdx}`);
    }

    const { position, size } = placement;
    const [x, y] = position;
    const [w, h] = size;
    const { width, height } = stockSize(grid);
    const pieceArea = w * h;
    const before = withoutFootprint(grid, position, size);

    // 1. Scatter penalty / adjacency reward
    let proximity = 0;
    const adjacency = adjacentWeight(grid, position, size);
    if (adjacency === 0) {
      if (usedArea(before) > 0) {
        const distance = distanceToNearestFilled(before, position);
        proximity = -5.0 * Math.min(8, Math.pow(1.5, Math.min(distance, 4)));
      }
    } else {
      proximity = 2.0 * Math.min(5, Math.pow(1.2, Math.min(adjacency, 4)));
    }

    // 2. Top-down fill violation
    const above = gapsAbove(grid, position, w);
    const topDown = above > 0 ? -1.0 * Math.min(10, Math.pow(1.2, Math.min(above, 5))) : 0;

    // 3. Corner / edge bonus
    const edge = x === 0 && y === 0 ? 8.0 : x === 0 || y === 0 ? 4.0 : 0;

    // 4. New low-utilization stock
    let newStock = 0;
    if (usedArea(grid) === pieceArea && pieceArea < width * height * 0.3) {
      const used = usedStockCount(after.stocks);
      newStock = -5.0 * Math.min(8, Math.pow(1.2, Math.min(used, 5)));
    }

    // 5. Utilization progress
    const ratio = filledRatio(after.stocks);
    const utilization = 30.0 * (ratio - this.previousFilledRatio);
    this.previousFilledRatio = ratio;

    // 6. Isolation
    const empties = emptyNeighborCount(grid, position, size);
    const isolation = empties > 0 ? -2.0 * Math.min(5, Math.pow(1.2, Math.min(empties, 4))) : 0;

    return breakdown({
      proximity,
      topDown,
      edge,
      newStock,
      utilization,
      isolation,
      noPlacement: 0,
      filledRatio: ratio,
    });
  }
}

/**
 * Learned action decoding.
 *
 * A discrete action index is a hint, not a placement:
 *
 *   index = rotated · S·P + stock · P + (cx · G + cy),   P = G·G
 *
 * The stock part is clamped to the stocks actually observed, and the coarse
 * cell (cx, cy) is scaled onto the stock's own dimensions. Every eligible
 * product is then tried in both orientations at that cell, and the best
 * valid one by `patternScore` wins.
 */

import type { ActionSpaceConfig, DecoderConfig, Observation, Placement, Size } from "../types";
import { defaultPolicyConfig } from "../types";
import { canPlace, orientations, patternScore, stockSize } from "../geometry";
import { eligibleProducts } from "./products";
import { clamp } from "../vec";

export interface ActionHint {
  rotated: boolean;
  stockIdx: number;
  /** Coarse cell on the G×G grid. */
  cell: [cx: number, cy: number];
}

export function actionSpaceSize(config?: ActionSpaceConfig): number {
  const { maxStocks, coarseGrid } = { ...defaultPolicyConfig.actionSpace, ...config };
  return 2 * maxStocks * coarseGrid * coarseGrid;
}

/**
 * Split an action index into rotation flag, stock index and coarse cell.
 * The stock index is clamped to `stockCount − 1`.
 */
export function splitAction(
  action: number,
  stockCount: number,
  config?: ActionSpaceConfig
): ActionHint {
  const { maxStocks, coarseGrid } = { ...defaultPolicyConfig.actionSpace, ...config };
  const positionsPerStock = coarseGrid * coarseGrid;
  const half = maxStocks * positionsPerStock;

  const rotated = action >= half;
  const local = rotated ? action - half : action;
  const stockIdx = clamp(Math.floor(local / positionsPerStock), 0, stockCount - 1);
  const position = local % positionsPerStock;

  return {
    rotated,
    stockIdx,
    cell: [Math.floor(position / coarseGrid), position % coarseGrid],
  };
}

/**
 * Realize an action hint as a concrete placement, or null when nothing
 * eligible fits at the hinted cell.
 */
export function decodeAction(
  action: number,
  observation: Observation,
  config?: { actionSpace?: ActionSpaceConfig; decoder?: DecoderConfig }
): Placement | null {
  if (observation.stocks.length === 0) return null;

  const { coarseGrid } = { ...defaultPolicyConfig.actionSpace, ...config?.actionSpace };
  const { rotationBonus } = { ...defaultPolicyConfig.decoder, ...config?.decoder };

  const hint = splitAction(action, observation.stocks.length, config?.actionSpace);
  const grid = observation.stocks[hint.stockIdx];
  if (!grid) return null;

  const { width, height } = stockSize(grid);
  const [cx, cy] = hint.cell;

  let best: Placement | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const product of eligibleProducts(observation)) {
    const candidates = orientations(product.size);
    // The rotated half of the action space asks for the rotated orientation first.
    if (hint.rotated) candidates.reverse();

    for (const size of candidates) {
      const [w, h] = size;
      const x = Math.min(Math.floor((cx * width) / coarseGrid), width - w);
      const y = Math.min(Math.floor((cy * height) / coarseGrid), height - h);
      if (!canPlace(grid, [x, y], size)) continue;

      let score = patternScore(grid, [x, y], size);
      if (isRotated(size, product.size)) score *= rotationBonus;

      if (score > bestScore) {
        bestScore = score;
        best = { stockIdx: hint.stockIdx, size, position: [x, y] };
      }
    }
  }

  return best;
}

/**
 * First valid placement found by random sampling: for every stock, eligible
 * product and orientation, up to `trials` random positions.
 */
export function randomValidPlacement(
  observation: Observation,
  random: () => number,
  trials: number = defaultPolicyConfig.decoder.randomTrials
): Placement | null {
  for (const [stockIdx, grid] of observation.stocks.entries()) {
    const { width, height } = stockSize(grid);

    for (const product of eligibleProducts(observation)) {
      for (const size of orientations(product.size)) {
        const [w, h] = size;
        if (w > width || h > height) continue;

        for (let t = 0; t < trials; t++) {
          const x = Math.floor(random() * (width - w + 1));
          const y = Math.floor(random() * (height - h + 1));
          if (canPlace(grid, [x, y], size)) {
            return { stockIdx, size, position: [x, y] };
          }
        }
      }
    }
  }
  return null;
}

function isRotated(size: Size, declared: Size): boolean {
  return size[0] !== declared[0] || size[1] !== declared[1];
}

/**
 * Action sampling over the actor's logits.
 *
 * Early in training the logits of the preferred stock are boosted and the
 * distribution is flattened by a temperature; both effects decay with the
 * step counter.
 */

import type { ExplorationConfig, Vec } from "./types";
import { argmax, logSoftmax } from "./vec";

export interface SampledAction {
  action: number;
  /** Log-probability under the boosted and tempered distribution. */
  logProb: number;
}

export function boostAt(step: number, config: Required<ExplorationConfig>): number {
  return Math.max(config.initialBoost - step / config.boostDecaySteps, config.minBoost);
}

export function temperatureAt(step: number, config: Required<ExplorationConfig>): number {
  return Math.max(
    config.initialTemperature - step / config.temperatureDecaySteps,
    config.minTemperature
  );
}

/**
 * Add `boost` to the un-rotated actions of `stockIdx`, then divide every
 * logit by `temperature`. A stock index outside the action space is ignored.
 */
export function shapeLogits(
  logits: readonly number[],
  stockIdx: number | null,
  positionsPerStock: number,
  maxStocks: number,
  boost: number,
  temperature: number
): Vec {
  const shaped = [...logits];
  if (stockIdx !== null && stockIdx >= 0 && stockIdx < maxStocks) {
    const start = stockIdx * positionsPerStock;
    for (let i = start; i < start + positionsPerStock && i < shaped.length; i++) {
      shaped[i] = (shaped[i] ?? 0) + boost;
    }
  }
  return shaped.map((l) => l / temperature);
}

/**
 * Draw from the categorical distribution over `logits`, or take its mode
 * when `deterministic` is set.
 */
export function sampleCategorical(
  logits: readonly number[],
  random: () => number,
  deterministic: boolean = false
): SampledAction {
  if (logits.length === 0) {
    throw new Error("Cannot sample from an empty distribution");
  }

  const logProbs = logSoftmax(logits);
  let action = logProbs.length - 1;

  if (deterministic) {
    action = argmax(logProbs);
  } else {
    const u = random();
    let cumulative = 0;
    for (const [i, lp] of logProbs.entries()) {
      cumulative += Math.exp(lp);
      if (u < cumulative) {
        action = i;
        break;
      }
    }
  }

  return { action, logProb: logProbs[action] ?? Number.NEGATIVE_INFINITY };
}

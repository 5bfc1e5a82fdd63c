/**
 * Generalized advantage estimation.
 */

import type { Vec } from "./types";
import { standardize } from "./vec";

/**
 * GAE over one trajectory buffer, walked backwards.
 *
 *   δ_t = r_t + γ·V_{t+1}·(1 − done_t) − V_t
 *   A_t = δ_t + γ·λ·(1 − done_t)·A_{t+1}
 *
 * The value after the last record is taken as 0.
 */
export function computeGae(
  rewards: readonly number[],
  values: readonly number[],
  dones: readonly boolean[],
  gamma: number,
  lambda: number
): Vec {
  if (rewards.length !== values.length || rewards.length !== dones.length) {
    throw new Error(
      `GAE input length mismatch: rewards ${rewards.length}, values ${values.length}, dones ${dones.length}`
    );
  }

  const advantages = new Array<number>(rewards.length).fill(0);
  let last = 0;

  for (let t = rewards.length - 1; t >= 0; t--) {
    const reward = rewards[t] ?? 0;
    const value = values[t] ?? 0;
    const nextValue = values[t + 1] ?? 0;
    const notDone = dones[t] ? 0 : 1;

    const delta = reward + gamma * nextValue * notDone - value;
    last = delta + gamma * lambda * notDone * last;
    advantages[t] = last;
  }

  return advantages;
}

export interface Targets {
  advantages: Vec;
  returns: Vec;
}

/**
 * Advantages and returns (advantage + value), both standardized.
 */
export function computeTargets(
  rewards: readonly number[],
  values: readonly number[],
  dones: readonly boolean[],
  gamma: number,
  lambda: number,
  epsilon: number = 1e-8
): Targets {
  const raw = computeGae(rewards, values, dones, gamma, lambda);
  const returns = raw.map((a, i) => a + (values[i] ?? 0));
  return {
    advantages: standardize(raw, epsilon),
    returns: standardize(returns, epsilon),
  };
}

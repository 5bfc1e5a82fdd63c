/**
 * State encoding for the actor and critic.
 *
 * Layout of the feature vector:
 *   [ stock slots × 3 | product slots × 3 | filled ratio, step ]
 *
 * Stock slot:   width / scale, height / scale, occupancy ratio
 * Product slot: width / scale, height / scale, min(quantity, cap) / cap
 *
 * The product slot count is fixed when the encoder is created from the first
 * observation and never changes: later observations with more product types
 * are truncated, fewer are zero padded.
 */

import type { EncoderConfig, Observation, StepInfo, Vec } from "./types";
import { stockSize, stockUtilization } from "./geometry";
import { mean, sampleStd, zeros } from "./vec";

const STOCK_FEATURES = 3;
const PRODUCT_FEATURES = 3;
const GLOBAL_FEATURES = 2;

export class StateEncoder {
  readonly dimension: number;

  constructor(
    readonly maxStocks: number,
    readonly maxProducts: number,
    private config: Required<EncoderConfig>
  ) {
    this.dimension =
      maxStocks * STOCK_FEATURES + maxProducts * PRODUCT_FEATURES + GLOBAL_FEATURES;
  }

  /**
   * Size the product slots from the first observation.
   */
  static fromObservation(
    observation: Observation,
    maxStocks: number,
    config: Required<EncoderConfig>
  ): StateEncoder {
    return new StateEncoder(maxStocks, observation.products.length, config);
  }

  encode(observation: Observation, info: StepInfo, step: number): Vec {
    const { sizeScale, quantityCap, stepScale } = this.config;
    const features: number[] = [];

    for (const grid of observation.stocks.slice(0, this.maxStocks)) {
      const { width, height } = stockSize(grid);
      features.push(width / sizeScale, height / sizeScale, stockUtilization(grid));
    }
    features.push(...zeros(this.maxStocks * STOCK_FEATURES - features.length));

    // Depleted entries are skipped, so active products pack to the front.
    const productFeatures: number[] = [];
    for (const product of observation.products.slice(0, this.maxProducts)) {
      if (product.quantity <= 0) continue;
      const [w, h] = product.size;
      productFeatures.push(
        w / sizeScale,
        h / sizeScale,
        Math.min(product.quantity, quantityCap) / quantityCap
      );
    }
    productFeatures.push(...zeros(this.maxProducts * PRODUCT_FEATURES - productFeatures.length));

    return [...features, ...productFeatures, info.filledRatio, step / stepScale];
  }
}

/**
 * Running mean/std state normalizer.
 *
 * Statistics are advanced by the caller after encoding, with an exponential
 * decay towards the scalar mean and sample std of the newest encoding.
 */
export class RunningNormalizer {
  mean: Vec;
  std: Vec;

  constructor(
    readonly dimension: number,
    private decay: number = 0.99,
    private epsilon: number = 1e-8
  ) {
    this.mean = zeros(dimension);
    this.std = new Array<number>(dimension).fill(1);
  }

  normalize(state: Vec): Vec {
    return state.map((v, i) => (v - (this.mean[i] ?? 0)) / ((this.std[i] ?? 1) + this.epsilon));
  }

  update(state: Vec): void {
    const m = mean(state);
    const s = sampleStd(state);
    const keep = this.decay;
    const take = 1 - this.decay;
    this.mean = this.mean.map((v) => keep * v + take * m);
    this.std = this.std.map((v) => keep * v + take * s);
  }

  snapshot(): { mean: Vec; std: Vec } {
    return { mean: [...this.mean], std: [...this.std] };
  }

  restore(stats: { mean: Vec; std: Vec }): void {
    if (stats.mean.length !== this.dimension || stats.std.length !== this.dimension) {
      throw new Error(
        `Normalizer dim mismatch: expected ${this.dimension}, got ${stats.mean.length}/${stats.std.length}`
      );
    }
    this.mean = [...stats.mean];
    this.std = [...stats.std];
  }
}

/**
 * Reduce-on-plateau learning-rate schedule.
 *
 * Tracks the best metric seen so far. A step improves on the best when it
 * beats it by more than the relative threshold; after more than `patience`
 * steps without improvement the rate is multiplied by `factor` and the count
 * starts over.
 */

export type PlateauMode = "min" | "max";

export interface PlateauScheduleConfig {
  mode: PlateauMode;
  factor: number;
  patience: number;
  /** Relative improvement required to reset patience. */
  threshold?: number;
  minLearningRate?: number;
}

export class PlateauSchedule {
  private best: number;
  private badSteps = 0;
  private rate: number;
  private threshold: number;
  private minLearningRate: number;

  constructor(
    initialLearningRate: number,
    private config: PlateauScheduleConfig
  ) {
    this.rate = initialLearningRate;
    this.threshold = config.threshold ?? 1e-4;
    this.minLearningRate = config.minLearningRate ?? 0;
    this.best = config.mode === "min" ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  }

  get learningRate(): number {
    return this.rate;
  }

  /** Restore the rate from a checkpoint; the plateau counters start over. */
  set learningRate(rate: number) {
    this.rate = rate;
    this.badSteps = 0;
  }

  /**
   * Record one metric value. Returns true when the rate was reduced.
   */
  step(metric: number): boolean {
    if (this.isImprovement(metric)) {
      this.best = metric;
      this.badSteps = 0;
    } else {
      this.badSteps++;
    }

    if (this.badSteps > this.config.patience) {
      this.badSteps = 0;
      const reduced = Math.max(this.rate * this.config.factor, this.minLearningRate);
      if (this.rate - reduced > 1e-8) {
        this.rate = reduced;
        return true;
      }
    }
    return false;
  }

  private isImprovement(metric: number): boolean {
    if (!Number.isFinite(metric)) return false;
    return this.config.mode === "min"
      ? metric < this.best * (1 - this.threshold)
      : metric > this.best * (1 + this.threshold);
  }
}

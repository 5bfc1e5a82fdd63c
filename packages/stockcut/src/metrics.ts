/**
 * Training metrics for cutting-stock episodes.
 *
 * Tracks per-placement pattern quality (edge contact, corners), short
 * running windows of reward and fill, and one history entry per completed
 * episode with the best scores seen so far.
 */

import type { Observation, Placement } from "./types";
import { isGoodPattern, spaceUtilization, stockSize, totalDemand, withoutFootprint } from "./geometry";
import { mean } from "./vec";

export const RUNNING_WINDOW = 10;

export interface PatternEvaluation {
  /** Number of axes (0–2) on which the piece touches a stock border. */
  edgeContact: number;
  isCorner: boolean;
  pieceArea: number;
  /** Piece sits on the top or left edge. */
  positionQuality: boolean;
  /** Utilization heuristic of the placement on the stock as it was before. */
  spaceUtilization: number;
  goodPattern: boolean;
}

export interface EpisodeRecord {
  episode: number;
  filledRatio: number;
  reward: number;
}

export interface BestScores {
  filledRatio: number;
  reward: number;
  /** Episode that produced the best reward; -1 before any episode. */
  episode: number;
}

class RunningWindow {
  private values: number[] = [];

  constructor(private capacity: number) {}

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) this.values.shift();
  }

  /** Overwrite the newest value; no-op when the window is empty. */
  replaceLast(value: number): void {
    if (this.values.length > 0) this.values[this.values.length - 1] = value;
  }

  get average(): number {
    return mean(this.values);
  }

  toArray(): number[] {
    return [...this.values];
  }
}

export class CuttingStockMetrics {
  readonly edgeUtilization: number[] = [];
  readonly cornerPlacements: number[] = [];
  readonly episodes: EpisodeRecord[] = [];
  readonly best: BestScores = {
    filledRatio: 0,
    reward: Number.NEGATIVE_INFINITY,
    episode: -1,
  };

  private reward = new RunningWindow(RUNNING_WINDOW);
  private filledRatio = new RunningWindow(RUNNING_WINDOW);
  private wasteRatio = new RunningWindow(RUNNING_WINDOW);

  /** Record the reward and corrected filled ratio of one step. */
  recordStep(reward: number, filledRatio: number): void {
    this.reward.push(reward);
    this.filledRatio.push(filledRatio);
    this.wasteRatio.push(1 - filledRatio);
  }

  /** Replace the newest filled ratio with a corrected value. */
  correctFilledRatio(filledRatio: number): void {
    this.filledRatio.replaceLast(filledRatio);
    this.wasteRatio.replaceLast(1 - filledRatio);
  }

  get runningAverages(): { reward: number; filledRatio: number; wasteRatio: number } {
    return {
      reward: this.reward.average,
      filledRatio: this.filledRatio.average,
      wasteRatio: this.wasteRatio.average,
    };
  }

  get recentFilledRatios(): number[] {
    return this.filledRatio.toArray();
  }

  addEpisodeData(episode: number, filledRatio: number, reward: number): void {
    this.episodes.push({ episode, filledRatio, reward });
    if (filledRatio > this.best.filledRatio) {
      this.best.filledRatio = filledRatio;
    }
    if (reward > this.best.reward) {
      this.best.reward = reward;
      this.best.episode = episode;
    }
  }

  /**
   * Record a finished episode, but only once every product has been placed.
   * Returns the recorded entry, or null when demand remains.
   */
  logEpisodeSummary(
    filledRatio: number,
    reward: number,
    observation: Observation
  ): EpisodeRecord | null {
    if (totalDemand(observation) !== 0) return null;
    const episode = this.episodes.length;
    this.addEpisodeData(episode, filledRatio, reward);
    return { episode, filledRatio, reward };
  }

  /**
   * Score a placement against the stock it landed on. `observation` is the
   * state after the placement was applied.
   */
  evaluateCuttingPattern(
    observation: Observation,
    placement: Placement | null
  ): PatternEvaluation | null {
    if (!placement) return null;
    const grid = observation.stocks[placement.stockIdx];
    if (!grid) return null;

    const { width, height } = stockSize(grid);
    const [x, y] = placement.position;
    const [w, h] = placement.size;

    const onVerticalEdge = x === 0 || x + w === width;
    const onHorizontalEdge = y === 0 || y + h === height;
    const edgeContact = (onVerticalEdge ? 1 : 0) + (onHorizontalEdge ? 1 : 0);
    const isCorner = onVerticalEdge && onHorizontalEdge;

    this.edgeUtilization.push(edgeContact);
    this.cornerPlacements.push(isCorner ? 1 : 0);

    const before = withoutFootprint(grid, placement.position, placement.size);
    return {
      edgeContact,
      isCorner,
      pieceArea: w * h,
      positionQuality: x === 0 || y === 0,
      spaceUtilization: spaceUtilization(before, placement.position, placement.size),
      goodPattern: isGoodPattern(before, placement.position, placement.size),
    };
  }
}

import { expect, test } from "vitest";
import { CuttingStockMetrics, RUNNING_WINDOW, type Observation } from "../src";
import { emptyGrid, fillRect } from "./fixtures";

test("Metrics: corner placement on an empty stock", () => {
  const metrics = new CuttingStockMetrics();
  const observation: Observation = {
    stocks: [fillRect(emptyGrid(10, 10), [0, 0], [4, 4])],
    products: [],
  };

  const evaluation = metrics.evaluateCuttingPattern(observation, {
    stockIdx: 0,
    size: [4, 4],
    position: [0, 0],
  });

  expect(evaluation).not.toBeNull();
  expect(evaluation?.edgeContact).toBe(2);
  expect(evaluation?.isCorner).toBe(true);
  expect(evaluation?.pieceArea).toBe(16);
  expect(evaluation?.positionQuality).toBe(true);
  expect(evaluation?.spaceUtilization).toBeCloseTo(2.16, 10);
  expect(evaluation?.goodPattern).toBe(true);
  expect(metrics.edgeUtilization).toEqual([2]);
  expect(metrics.cornerPlacements).toEqual([1]);
});

test("Metrics: interior placement touches no edge", () => {
  const metrics = new CuttingStockMetrics();
  const observation: Observation = {
    stocks: [fillRect(emptyGrid(10, 10), [3, 3], [2, 2])],
    products: [],
  };

  const evaluation = metrics.evaluateCuttingPattern(observation, {
    stockIdx: 0,
    size: [2, 2],
    position: [3, 3],
  });

  expect(evaluation?.edgeContact).toBe(0);
  expect(evaluation?.isCorner).toBe(false);
  expect(evaluation?.goodPattern).toBe(false);
});

test("Metrics: nothing is evaluated without a placement", () => {
  const metrics = new CuttingStockMetrics();
  expect(metrics.evaluateCuttingPattern({ stocks: [], products: [] }, null)).toBeNull();
  expect(metrics.edgeUtilization).toEqual([]);
});

test("Metrics: running windows keep the newest values", () => {
  const metrics = new CuttingStockMetrics();
  for (let i = 0; i < RUNNING_WINDOW + 2; i++) {
    metrics.recordStep(i, 0.5);
  }
  metrics.correctFilledRatio(0.7);

  expect(metrics.recentFilledRatios).toHaveLength(RUNNING_WINDOW);
  expect(metrics.recentFilledRatios.at(-1)).toBe(0.7);
  // rewards 2..11
  expect(metrics.runningAverages.reward).toBeCloseTo(6.5, 10);
  expect(metrics.runningAverages.wasteRatio).toBeCloseTo((9 * 0.5 + 0.3) / 10, 10);
});

test("Metrics: episodes are logged only when demand is met", () => {
  const metrics = new CuttingStockMetrics();
  const pending: Observation = { stocks: [], products: [{ size: [1, 1], quantity: 2 }] };
  const done: Observation = { stocks: [], products: [{ size: [1, 1], quantity: 0 }] };

  expect(metrics.logEpisodeSummary(0.8, 12, pending)).toBeNull();
  expect(metrics.logEpisodeSummary(0.8, 12, done)).toEqual({
    episode: 0,
    filledRatio: 0.8,
    reward: 12,
  });
  metrics.logEpisodeSummary(0.9, 5, done);

  expect(metrics.episodes).toHaveLength(2);
  expect(metrics.best).toEqual({ filledRatio: 0.9, reward: 12, episode: 0 });
});

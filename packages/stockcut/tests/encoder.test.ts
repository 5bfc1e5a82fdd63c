import { expect, test } from "vitest";
import { RunningNormalizer, StateEncoder, defaultPolicyConfig, type Observation } from "../src";
import { fillRect, emptyGrid } from "./fixtures";

const observation: Observation = {
  stocks: [fillRect(emptyGrid(5, 4), [0, 0], [2, 1])],
  products: [
    { size: [2, 3], quantity: 12 },
    { size: [1, 1], quantity: 0 },
    { size: [4, 1], quantity: 2 },
  ],
};

test("Encoder: dimension is 3 per stock slot, 3 per product slot, plus 2", () => {
  const encoder = new StateEncoder(100, 4, defaultPolicyConfig.encoder);
  expect(encoder.dimension).toBe(300 + 12 + 2);
});

test("Encoder: product slots are fixed by the first observation", () => {
  const encoder = StateEncoder.fromObservation(observation, 2, defaultPolicyConfig.encoder);
  expect(encoder.maxProducts).toBe(3);
  expect(encoder.dimension).toBe(6 + 9 + 2);
});

test("Encoder: depleted products are skipped and later products truncated", () => {
  const encoder = new StateEncoder(2, 2, defaultPolicyConfig.encoder);
  const state = encoder.encode(observation, { filledRatio: 0.1 }, 500);
  expect(state).toEqual([
    0.5, 0.4, 0.1, 0, 0, 0,
    0.2, 0.3, 1, 0, 0, 0,
    0.1, 0.5,
  ]);
});

test("Encoder: stocks beyond the slot count are truncated", () => {
  const encoder = new StateEncoder(1, 1, defaultPolicyConfig.encoder);
  const state = encoder.encode(
    { stocks: [emptyGrid(10, 10), emptyGrid(20, 20)], products: [] },
    { filledRatio: 0 },
    0
  );
  expect(state).toEqual([1, 1, 0, 0, 0, 0, 0, 0]);
});

test("Normalizer: starts at zero mean and unit std", () => {
  const normalizer = new RunningNormalizer(2);
  const [a, b] = normalizer.normalize([1, 2]);
  expect(a).toBeCloseTo(1, 6);
  expect(b).toBeCloseTo(2, 6);
});

test("Normalizer: decays towards the scalar mean and sample std of each state", () => {
  const normalizer = new RunningNormalizer(2, 0.99);
  normalizer.update([1, 3]);

  const { mean, std } = normalizer.snapshot();
  expect(mean[0]).toBeCloseTo(0.02, 10);
  expect(mean[1]).toBeCloseTo(0.02, 10);
  expect(std[0]).toBeCloseTo(0.99 + 0.01 * Math.SQRT2, 10);
});

test("Normalizer: restore rejects a dimension mismatch", () => {
  const normalizer = new RunningNormalizer(2);
  expect(() => normalizer.restore({ mean: [0, 0, 0], std: [1, 1, 1] })).toThrow(/dim mismatch/);
  normalizer.restore({ mean: [1, 2], std: [3, 4] });
  expect(normalizer.snapshot()).toEqual({ mean: [1, 2], std: [3, 4] });
});

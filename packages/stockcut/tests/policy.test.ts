import { expect, test, vi } from "vitest";
import { CuttingStockPolicy, PolicyNotInitializedError, type Observation } from "../src";
import { emptyGrid, fillRect, testPolicyConfig } from "./fixtures";

function observation(): Observation {
  return {
    stocks: [emptyGrid(10, 10), emptyGrid(8, 8)],
    products: [
      { size: [2, 2], quantity: 10 },
      { size: [3, 1], quantity: 4 },
    ],
  };
}

/** Start learning from the first step. */
const learning = { exploration: { warmupSteps: 0, structuredDemandFraction: 1 } };

test("Policy: operations before initialize are rejected", async () => {
  const policy = new CuttingStockPolicy(testPolicyConfig());
  expect(policy.initialized).toBe(false);
  expect(() => policy.decide(observation())).toThrow(PolicyNotInitializedError);
  await expect(policy.update()).rejects.toThrow(PolicyNotInitializedError);
  await expect(policy.save("never")).rejects.toThrow(PolicyNotInitializedError);
});

test("Policy: initialize is idempotent", () => {
  const logger = { log: vi.fn(), warn: vi.fn() };
  const policy = new CuttingStockPolicy(testPolicyConfig({ logger }));
  policy.initialize(observation());
  policy.initialize(observation());

  const initLogs = logger.log.mock.calls.filter(([message]) =>
    String(message).startsWith("Initialized policy")
  );
  expect(initLogs).toHaveLength(1);
  expect(policy.initialized).toBe(true);
  policy.dispose();
});

test("Policy: structured corner placement, then nothing left to place", async () => {
  const policy = new CuttingStockPolicy(testPolicyConfig());
  const start: Observation = {
    stocks: [emptyGrid(10, 10)],
    products: [{ size: [4, 4], quantity: 1 }],
  };
  policy.initialize(start);

  const decision = policy.decide(start);
  expect(decision).toEqual({
    placement: { stockIdx: 0, size: [4, 4], position: [0, 0] },
    source: "structured",
  });
  expect(policy.phase).toBe("exploring");

  const after: Observation = {
    stocks: [fillRect(emptyGrid(10, 10), [0, 0], [4, 4])],
    products: [{ size: [4, 4], quantity: 0 }],
  };
  const report = await policy.reportOutcome({ observation: after, done: true });

  expect(report.reward).toBeCloseTo(2.6528, 10);
  expect(report.update).toBeNull();
  expect(policy.metrics.episodes).toHaveLength(1);

  expect(policy.decide(after)).toEqual({ placement: null, source: "none" });
  expect(policy.steps).toBe(2);
  policy.dispose();
});

test("Policy: an environment reward overrides the shaped reward", async () => {
  const policy = new CuttingStockPolicy(testPolicyConfig());
  const obs = observation();
  policy.initialize(obs);
  policy.decide(obs);

  const report = await policy.reportOutcome({ observation: obs, done: false, reward: 7 });
  expect(report.reward).toBe(7);
  policy.dispose();
});

test("Policy: outcome without a decision is rejected", async () => {
  const policy = new CuttingStockPolicy(testPolicyConfig());
  policy.initialize(observation());
  await expect(policy.reportOutcome({ observation: observation(), done: false })).rejects.toThrow(
    /without a preceding decision/
  );
  policy.dispose();
});

test("Policy: learned decisions fill the buffer and trigger an update", async () => {
  const policy = new CuttingStockPolicy(
    testPolicyConfig({ ...learning, ppo: { updateEvery: 4, epochs: 1 } })
  );
  const obs = observation();
  policy.initialize(obs);

  for (let i = 0; i < 3; i++) {
    const decision = policy.decide(obs);
    expect(typeof decision.action).toBe("number");
    const report = await policy.reportOutcome({ observation: obs, done: false, reward: 1 });
    expect(report.update).toBeNull();
  }
  expect(policy.phase).toBe("exploiting");
  expect(policy.bufferedExperience).toBe(3);

  policy.decide(obs);
  const report = await policy.reportOutcome({ observation: obs, done: true, reward: 1 });

  expect(report.update?.samples).toBe(4);
  expect(report.update?.meanReward).toBe(1);
  expect(policy.bufferedExperience).toBe(0);
  expect(await policy.update()).toBeNull();
  policy.dispose();
});

test("Policy: a decision without an outcome is closed by the next one", async () => {
  const logger = { log: vi.fn(), warn: vi.fn() };
  const policy = new CuttingStockPolicy(testPolicyConfig({ ...learning, logger }));
  const obs = observation();
  policy.initialize(obs);

  policy.decide(obs);
  policy.decide(obs);
  expect(logger.warn).toHaveBeenCalledWith(
    "decide() called before the previous outcome was reported"
  );
  expect(policy.bufferedExperience).toBe(1);

  await policy.reportOutcome({ observation: obs, done: false, reward: 0 });
  expect(policy.bufferedExperience).toBe(2);
  policy.dispose();
});

test("Policy: evaluation mode records no experience", async () => {
  const policy = new CuttingStockPolicy(testPolicyConfig({ ...learning, training: false }));
  const obs = observation();
  policy.initialize(obs);

  const decision = policy.decide(obs);
  expect(decision.source).not.toBe("none");
  await policy.reportOutcome({ observation: obs, done: false, reward: 1 });

  expect(policy.bufferedExperience).toBe(0);
  expect(await policy.update()).toBeNull();
  policy.dispose();
});

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import {
  CheckpointError,
  CuttingStockPolicy,
  checkpointPath,
  readCheckpoint,
  type Observation,
  type PolicyConfig,
} from "../src";
import { emptyGrid, testPolicyConfig } from "./fixtures";

let directory = "";

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), "stockcut-ckpt-"));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

const obs: Observation = {
  stocks: [emptyGrid(10, 10), emptyGrid(6, 6)],
  products: [
    { size: [2, 2], quantity: 10 },
    { size: [3, 1], quantity: 4 },
  ],
};

function config(overrides?: PolicyConfig): PolicyConfig {
  return testPolicyConfig({
    exploration: { warmupSteps: 0, structuredDemandFraction: 1 },
    ppo: { updateEvery: 2, epochs: 1 },
    checkpoint: { directory },
    ...overrides,
  });
}

async function trainedPolicy(): Promise<CuttingStockPolicy> {
  const policy = new CuttingStockPolicy(config());
  policy.initialize(obs);
  for (let i = 0; i < 2; i++) {
    policy.decide(obs);
    await policy.reportOutcome({ observation: obs, done: i === 1, reward: 1 });
  }
  return policy;
}

test("Checkpoint: names get the checkpoint suffix once", () => {
  expect(checkpointPath("models", "run")).toBe(join("models", "run.ckpt.json"));
  expect(checkpointPath("models", "run.ckpt.json")).toBe(join("models", "run.ckpt.json"));
});

test("Checkpoint: save then load restores weights, optimizers and counters", async () => {
  const source = await trainedPolicy();
  expect(await source.save("model")).toBe(true);

  const target = new CuttingStockPolicy(config());
  target.initialize(obs);
  expect(await target.load("model")).toBe(true);
  expect(target.steps).toBe(2);
  expect(target.phase).toBe("exploiting");
  expect(target.learningRates).toEqual(source.learningRates);

  expect(await target.save("copy")).toBe(true);
  const original = await readCheckpoint(checkpointPath(directory, "model"));
  const copy = await readCheckpoint(checkpointPath(directory, "copy"));

  expect(copy.actor).toEqual(original.actor);
  expect(copy.critic).toEqual(original.critic);
  expect(copy.normalizer).toEqual(original.normalizer);
  expect(copy.optimizers.actor).toHaveLength(original.optimizers.actor.length);
  expect(copy.optimizers.actor.slice(1)).toEqual(original.optimizers.actor.slice(1));

  source.dispose();
  target.dispose();
});

test("Checkpoint: loading discards experience collected before it", async () => {
  const source = await trainedPolicy();
  expect(await source.save("model")).toBe(true);

  const target = new CuttingStockPolicy(config());
  target.initialize(obs);
  target.decide(obs);
  await target.reportOutcome({ observation: obs, done: false, reward: 1 });
  target.decide(obs);
  expect(target.bufferedExperience).toBe(1);

  expect(await target.load("model")).toBe(true);
  expect(target.bufferedExperience).toBe(0);
  await expect(target.reportOutcome({ observation: obs, done: false })).rejects.toThrow(
    /without a preceding decision/
  );

  source.dispose();
  target.dispose();
});

test("Checkpoint: a missing file leaves the policy untouched", async () => {
  const warn = vi.fn();
  const policy = new CuttingStockPolicy(config({ logger: { log: vi.fn(), warn } }));
  policy.initialize(obs);

  expect(await policy.load("absent")).toBe(false);
  expect(warn).toHaveBeenCalledTimes(1);
  expect(policy.steps).toBe(0);
  policy.dispose();
});

test("Checkpoint: corrupt or malformed files are rejected", async () => {
  await writeFile(checkpointPath(directory, "corrupt"), "{not json");
  await writeFile(checkpointPath(directory, "old"), JSON.stringify({ version: 0 }));

  await expect(readCheckpoint(checkpointPath(directory, "corrupt"))).rejects.toThrow(CheckpointError);
  await expect(readCheckpoint(checkpointPath(directory, "old"))).rejects.toThrow(/malformed/);

  const policy = new CuttingStockPolicy(config());
  policy.initialize(obs);
  expect(await policy.load("corrupt")).toBe(false);
  expect(await policy.load("old")).toBe(false);
  policy.dispose();
});

test("Checkpoint: mismatched network shapes are rejected before anything changes", async () => {
  const source = await trainedPolicy();
  expect(await source.save("model")).toBe(true);

  const warn = vi.fn();
  const target = new CuttingStockPolicy(
    config({ network: { actorHiddenSizes: [4] }, logger: { log: vi.fn(), warn } })
  );
  target.initialize(obs);
  const before = target.learningRates;

  expect(await target.load("model")).toBe(false);
  expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^Failed to load checkpoint: actor weight 0/));
  expect(target.steps).toBe(0);
  expect(target.phase).toBe("exploring");
  expect(target.learningRates).toEqual(before);

  source.dispose();
  target.dispose();
});

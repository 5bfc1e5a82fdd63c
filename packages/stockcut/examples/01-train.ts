/**
 * Example 01: Training on a fixed order
 *
 * Demonstrates:
 * - Policy lifecycle (initialize → episodes → save)
 * - Shaped rewards and PPO updates every 128 decisions
 * - Structured JSONL analytics with StatsLogger
 *
 * Expected outcome:
 * - Early episodes are placed mostly by the structured strategy
 * - Once exploiting, the learned stage takes over with greedy as fallback
 * - Filled ratio of finished episodes trends upwards
 */

import { CuttingStockPolicy, StatsLogger, usedStockCount } from "../src";
import { CuttingStockEnvironment } from "./harness";

const EPISODES = 50;

async function main() {
  const environment = new CuttingStockEnvironment({
    stocks: [
      [10, 10],
      [10, 10],
      [12, 8],
      [8, 12],
    ],
    products: [
      { size: [4, 4], quantity: 4 },
      { size: [3, 2], quantity: 6 },
      { size: [5, 2], quantity: 3 },
      { size: [2, 2], quantity: 5 },
    ],
  });

  const policy = new CuttingStockPolicy({
    actionSpace: { maxStocks: 4 },
    exploration: { warmupSteps: 500 },
  });

  const stats = await StatsLogger.create({
    experiment: "Stock Cutting PPO",
    config: {
      episodes: EPISODES,
      actionSpace: policy.config.actionSpace,
      exploration: policy.config.exploration,
      ppo: policy.config.ppo,
    },
  });

  console.log(`\n${"═".repeat(63)}`);
  console.log(`  Experiment: Stock Cutting PPO`);
  console.log(`${"═".repeat(63)}\n`);
  console.log(`Episodes: ${EPISODES}`);
  console.log(`Run dir: ${stats.getRunDir()}\n`);

  let updates = 0;

  for (let episode = 0; episode < EPISODES; episode++) {
    let { observation, info } = environment.reset();
    policy.initialize(observation);
    policy.startEpisode(observation);

    let steps = 0;
    let reward = 0;
    let done = false;

    while (!done) {
      const decision = policy.decide(observation, info);
      const result = environment.step(decision.placement);
      const outcome = await policy.reportOutcome({
        observation: result.observation,
        info: result.info,
        done: result.done,
      });

      reward += outcome.reward;
      steps++;
      ({ observation, info, done } = result);

      if (outcome.update) {
        stats.logUpdate({ update: ++updates, step: policy.steps, ...outcome.update });
      }
    }

    stats.logEpisode({
      episode,
      steps,
      reward,
      filledRatio: info.filledRatio,
      stocksUsed: usedStockCount(observation.stocks),
      phase: policy.phase,
    });

    if ((episode + 1) % 10 === 0) {
      const averages = policy.metrics.runningAverages;
      console.log(
        `Episode ${episode + 1}: reward ${reward.toFixed(2)}, filled ${info.filledRatio.toFixed(3)}, ` +
          `avg reward ${averages.reward.toFixed(2)}, phase ${policy.phase}`
      );
    }
  }

  await policy.save("01-train");
  await stats.close();

  const { best } = policy.metrics;
  console.log("\n✓ Training complete!");
  console.log(`  Best filled ratio: ${best.filledRatio.toFixed(3)}`);
  console.log(`  Best reward: ${best.reward.toFixed(2)} (episode ${best.episode})`);

  policy.dispose();
}

main().catch(console.error);

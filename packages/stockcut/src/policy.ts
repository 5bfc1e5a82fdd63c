/**
 * CuttingStockPolicy: learned placement policy for 2D cutting stock.
 *
 * Owns every piece of mutable state (encoder, normalizer, networks,
 * optimizers, experience buffer, reward baseline, exploration phase) and
 * exposes an explicit lifecycle:
 *
 *   initialize(obs) → [startEpisode(obs) → (decide → reportOutcome)*]* → save/load
 *
 * Decisions run through a strategy pipeline:
 *
 *   1. structured  corner/edge placement of the largest product (exploring only)
 *   2. learned     actor sample decoded into a concrete placement
 *   3. random      random valid placement (only when an action was sampled)
 *   4. greedy      bounded exhaustive search
 *
 * Updates and checkpoint I/O share one concurrency-1 queue, so they never
 * interleave.
 */

import * as tf from "@tensorflow/tfjs";
import Queue from "queue";
import type {
  Decision,
  Observation,
  Outcome,
  Phase,
  Placement,
  PolicyConfig,
  ResolvedPolicyConfig,
  StepInfo,
} from "./types";
import { resolvePolicyConfig } from "./types";
import { filledRatio, totalDemand } from "./geometry";
import { RunningNormalizer, StateEncoder } from "./encoder";
import { ActorNetwork, CriticNetwork } from "./networks";
import { boostAt, sampleCategorical, shapeLogits, temperatureAt } from "./sampling";
import { ExperienceBuffer } from "./buffer";
import { PPOTrainer, type UpdateReport } from "./ppo";
import { RewardShaper, type RewardBreakdown } from "./reward";
import { CuttingStockMetrics } from "./metrics";
import {
  CHECKPOINT_VERSION,
  checkpointPath,
  deserializeTensor,
  readCheckpoint,
  sameShape,
  serializeTensor,
  writeCheckpoint,
  type CheckpointBundle,
  type SerializedTensor,
} from "./checkpoint";
import { CheckpointError, PolicyNotInitializedError } from "./errors";
import {
  ExplorationPhase,
  actionSpaceSize,
  decodeAction,
  findBestFittingStock,
  greedySearch,
  largestProduct,
  randomValidPlacement,
  resolveDecision,
  structuredPlacement,
  type Stage,
} from "./strategies";

export interface OutcomeReport {
  /** Reward credited to the decision: the environment's, or the shaped one. */
  reward: number;
  /** Shaped reward terms for the decision. */
  breakdown: RewardBreakdown;
  /** Present when this outcome filled the buffer and triggered an update. */
  update: UpdateReport | null;
}

interface PolicyContext {
  encoder: StateEncoder;
  normalizer: RunningNormalizer;
  actor: ActorNetwork;
  critic: CriticNetwork;
  trainer: PPOTrainer;
}

/** Action sampled by the learned stage of the current decision. */
interface LearnedAttempt {
  action: number | null;
}

export class CuttingStockPolicy {
  readonly config: ResolvedPolicyConfig;
  readonly metrics = new CuttingStockMetrics();

  private queue: Queue;
  private context: PolicyContext | null = null;
  private buffer = new ExperienceBuffer();
  private shaper = new RewardShaper();
  private exploration: ExplorationPhase;

  private step = 0;
  private initialDemand = 0;
  private episodeReward = 0;
  private lastDecision: Decision | null = null;

  constructor(config?: PolicyConfig) {
    this.config = resolvePolicyConfig(config);
    this.queue = new Queue({ autostart: true, concurrency: 1 });
    this.exploration = new ExplorationPhase(
      this.config.exploration.warmupSteps,
      this.config.exploration.structuredDemandFraction
    );
  }

  get initialized(): boolean {
    return this.context !== null;
  }

  get phase(): Phase {
    return this.exploration.phase;
  }

  /** Decisions made so far. */
  get steps(): number {
    return this.step;
  }

  /** Finalized experience waiting for the next update. */
  get bufferedExperience(): number {
    return this.buffer.size;
  }

  get learningRates(): { actor: number; critic: number } {
    return this.require("learningRates").trainer.learningRates;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Fix the state dimensions from the first observation and build the
   * networks. Later calls are no-ops.
   */
  initialize(observation: Observation): void {
    if (this.context) return;

    const { actionSpace, encoder: encoderConfig, network, ppo, logger } = this.config;
    const encoder = StateEncoder.fromObservation(observation, actionSpace.maxStocks, encoderConfig);
    const normalizer = new RunningNormalizer(
      encoder.dimension,
      encoderConfig.normalizerDecay,
      encoderConfig.epsilon
    );
    const actor = new ActorNetwork(
      encoder.dimension,
      actionSpaceSize(actionSpace),
      network.actorHiddenSizes
    );
    const critic = new CriticNetwork(
      encoder.dimension,
      network.criticHiddenSizes,
      network.criticDropout
    );
    const trainer = new PPOTrainer(this.queue, actor, critic, ppo, logger);

    this.context = { encoder, normalizer, actor, critic, trainer };
    this.startEpisode(observation);

    logger.log(
      `Initialized policy: state dim ${encoder.dimension}, action dim ${actor.actionDim}, ${encoder.maxProducts} product types`
    );
  }

  /**
   * Reset per-episode bookkeeping from the episode's first observation.
   */
  startEpisode(observation: Observation): void {
    this.require("startEpisode");

    if (this.buffer.hasPending) {
      this.config.logger.warn("Episode started with an unreported decision; closing it as terminal");
      this.buffer.finalize(0, true);
    }

    this.initialDemand = totalDemand(observation);
    this.shaper.reset(filledRatio(observation.stocks));
    this.episodeReward = 0;
    this.lastDecision = null;
  }

  dispose(): void {
    if (!this.context) return;
    this.context.trainer.dispose();
    this.context.actor.dispose();
    this.context.critic.dispose();
    this.context = null;
  }

  // ==========================================================================
  // Decisions
  // ==========================================================================

  /**
   * Choose one placement for `observation`. Never throws once initialized:
   * every failure falls through to the next strategy, and a decision with a
   * null placement means nothing fits.
   */
  decide(observation: Observation, info?: StepInfo): Decision {
    const context = this.require("decide");

    if (this.lastDecision) {
      this.config.logger.warn("decide() called before the previous outcome was reported");
      if (this.buffer.hasPending) this.buffer.finalize(0, false);
    }

    const stepInfo = info ?? { filledRatio: filledRatio(observation.stocks) };
    const remaining = totalDemand(observation);
    const phase = this.exploration.advance(
      this.step,
      this.initialDemand > 0 ? remaining / this.initialDemand : 0
    );

    const learned: LearnedAttempt = { action: null };
    const stages: Stage[] = [];

    if (phase === "exploring") {
      stages.push({ source: "structured", attempt: () => structuredPlacement(observation) });
    }
    stages.push(
      {
        source: "learned",
        attempt: () => this.learnedPlacement(context, observation, stepInfo, learned),
      },
      {
        source: "random",
        attempt: () =>
          learned.action === null
            ? null
            : randomValidPlacement(observation, this.config.random, this.config.decoder.randomTrials),
      },
      {
        source: "greedy",
        attempt: () => greedySearch(observation, this.config.greedy).placement,
      }
    );

    const resolved = resolveDecision(stages);
    const decision: Decision =
      learned.action === null ? resolved : { ...resolved, action: learned.action };

    this.step++;
    this.lastDecision = decision;
    return decision;
  }

  private learnedPlacement(
    context: PolicyContext,
    observation: Observation,
    info: StepInfo,
    learned: LearnedAttempt
  ): Placement | null {
    try {
      if (!largestProduct(observation)) return null;
      const preferredStock = findBestFittingStock(observation);
      if (preferredStock === null) return null;

      const { actionSpace, exploration, training } = this.config;

      const raw = context.encoder.encode(observation, info, this.step);
      const state = context.normalizer.normalize(raw);
      context.normalizer.update(raw);

      const logits = shapeLogits(
        context.actor.predict(state),
        preferredStock,
        actionSpace.coarseGrid * actionSpace.coarseGrid,
        actionSpace.maxStocks,
        boostAt(this.step, exploration),
        temperatureAt(this.step, exploration)
      );
      const { action, logProb } = sampleCategorical(logits, this.config.random, !training);
      learned.action = action;

      if (training) {
        this.buffer.append({ state, action, logProb, value: context.critic.predict(state) });
      }

      return decodeAction(action, observation, this.config);
    } catch (error) {
      this.config.logger.warn(`Learned placement failed, falling back: ${describe(error)}`);
      return null;
    }
  }

  // ==========================================================================
  // Outcomes & updates
  // ==========================================================================

  /**
   * Close out the previous decision with its outcome. Shapes the reward
   * when the environment gives none, records metrics, and runs an update
   * once enough experience has been collected.
   */
  async reportOutcome(outcome: Outcome): Promise<OutcomeReport> {
    this.require("reportOutcome");

    const decision = this.lastDecision;
    if (!decision) {
      throw new Error("reportOutcome() called without a preceding decision");
    }
    this.lastDecision = null;

    const breakdown = this.shaper.shape(decision.placement, outcome.observation);
    const reward = outcome.reward ?? breakdown.total;
    this.episodeReward += reward;

    this.metrics.recordStep(reward, outcome.info?.filledRatio ?? breakdown.filledRatio);
    this.metrics.correctFilledRatio(breakdown.filledRatio);
    this.metrics.evaluateCuttingPattern(outcome.observation, decision.placement);

    if (this.config.training && this.buffer.hasPending) {
      this.buffer.finalize(reward, outcome.done);
    }

    if (outcome.done) {
      this.metrics.logEpisodeSummary(breakdown.filledRatio, this.episodeReward, outcome.observation);
      this.episodeReward = 0;
    }

    let update: UpdateReport | null = null;
    if (this.config.training && this.buffer.size >= this.config.ppo.updateEvery) {
      update = await this.update();
    }

    return { reward, breakdown, update };
  }

  /**
   * Run one PPO update over every finalized record and empty the buffer.
   * Resolves to null when there was nothing to learn from.
   */
  async update(): Promise<UpdateReport | null> {
    const context = this.require("update");
    if (!this.config.training) return null;

    const experiences = this.buffer.drain();
    return context.trainer.update(experiences);
  }

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  /**
   * Write a checkpoint named `name` (suffixed `.ckpt.json`) to the
   * checkpoint directory. Failures are logged and reported as false.
   */
  async save(name: string): Promise<boolean> {
    const context = this.require("save");
    const file = checkpointPath(this.config.checkpoint.directory, name);

    try {
      await this.enqueue(async () => {
        const trainer = await context.trainer.snapshot();
        const bundle: CheckpointBundle = {
          version: CHECKPOINT_VERSION,
          encoder: {
            maxStocks: context.encoder.maxStocks,
            maxProducts: context.encoder.maxProducts,
          },
          actor: context.actor.model.getWeights().map((w) => serializeTensor(w)),
          critic: context.critic.model.getWeights().map((w) => serializeTensor(w)),
          optimizers: trainer.optimizers,
          learningRates: trainer.learningRates,
          normalizer: context.normalizer.snapshot(),
          step: this.step,
          phase: this.exploration.phase,
        };
        await writeCheckpoint(file, bundle);
      });
    } catch (error) {
      this.config.logger.warn(`Failed to save checkpoint: ${describe(error)}`);
      return false;
    }

    this.config.logger.log(`Saved checkpoint ${file}`);
    return true;
  }

  /**
   * Restore a checkpoint written by `save`. The bundle is validated against
   * the current networks before anything is applied; on failure the policy
   * keeps its in-memory state and false is returned. Experience collected
   * under the previous weights is discarded.
   */
  async load(name: string): Promise<boolean> {
    const context = this.require("load");
    const file = checkpointPath(this.config.checkpoint.directory, name);

    try {
      await this.enqueue(async () => {
        const bundle = await readCheckpoint(file);
        validateBundle(context, bundle);

        setModelWeights(context.actor.model, bundle.actor);
        setModelWeights(context.critic.model, bundle.critic);
        await context.trainer.restore(bundle);
        context.normalizer.restore(bundle.normalizer);
        this.step = bundle.step;
        this.exploration.restore(bundle.phase);
        this.buffer.clear();
        this.lastDecision = null;
      });
    } catch (error) {
      this.config.logger.warn(`Failed to load checkpoint: ${describe(error)}`);
      return false;
    }

    this.config.logger.log(`Loaded checkpoint ${file}`);
    return true;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private require(operation: string): PolicyContext {
    if (!this.context) throw new PolicyNotInitializedError(operation);
    return this.context;
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await job());
        } catch (error) {
          reject(error);
        }
      });
    });
  }
}

function validateBundle(context: PolicyContext, bundle: CheckpointBundle): void {
  const { encoder } = context;
  if (
    bundle.encoder.maxStocks !== encoder.maxStocks ||
    bundle.encoder.maxProducts !== encoder.maxProducts
  ) {
    throw new CheckpointError(
      `Encoder mismatch: checkpoint has ${bundle.encoder.maxStocks} stocks / ${bundle.encoder.maxProducts} products, policy has ${encoder.maxStocks} / ${encoder.maxProducts}`
    );
  }
  validateWeights("actor", bundle.actor, context.actor.model);
  validateWeights("critic", bundle.critic, context.critic.model);
  if (
    bundle.normalizer.mean.length !== encoder.dimension ||
    bundle.normalizer.std.length !== encoder.dimension
  ) {
    throw new CheckpointError(`Normalizer dimension mismatch: expected ${encoder.dimension}`);
  }
  context.trainer.validate(bundle);
}

function validateWeights(label: string, weights: readonly SerializedTensor[], model: tf.LayersModel): void {
  const expected = model.weights.map((w) => w.shape);
  if (weights.length !== expected.length) {
    throw new CheckpointError(`${label} has ${weights.length} weights, expected ${expected.length}`);
  }
  weights.forEach((w, i) => {
    const shape = expected[i] ?? [];
    if (!sameShape(w.shape, shape)) {
      throw new CheckpointError(`${label} weight ${i} has shape [${w.shape}], expected [${shape}]`);
    }
  });
}

function setModelWeights(model: tf.LayersModel, weights: readonly SerializedTensor[]): void {
  const tensors = weights.map(deserializeTensor);
  model.setWeights(tensors);
  tensors.forEach((t) => t.dispose());
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

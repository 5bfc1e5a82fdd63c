/**
 * PPO trainer for the actor-critic pair.
 *
 * One update consumes a whole buffer of finalized experience:
 *
 *   1. GAE advantages and returns, both standardized
 *   2. `epochs` full-batch passes of the clipped surrogate objective
 *   3. plateau schedules step on mean reward (actor) and final critic loss
 *      (critic); a reduced rate rebuilds that network's Adam optimizer
 *      with its moments carried over
 *
 * Updates run on the shared queue so that no two updates, and no update and
 * checkpoint, ever interleave.
 */

import * as tf from "@tensorflow/tfjs";
import type Queue from "queue";
import type { Logger, PPOConfig } from "./types";
import type { Experience } from "./buffer";
import type { ActorNetwork, CriticNetwork } from "./networks";
import { computeTargets } from "./advantage";
import { PlateauSchedule } from "./schedule";
import { deserializeTensor, sameShape, serializeTensor, type SerializedTensor } from "./checkpoint";
import { CheckpointError } from "./errors";
import { mean } from "./vec";

export interface UpdateReport {
  samples: number;
  /** Losses of the final pass. */
  actorLoss: number;
  criticLoss: number;
  entropy: number;
  meanReward: number;
  actorLearningRate: number;
  criticLearningRate: number;
}

export interface TrainerSnapshot {
  optimizers: { actor: SerializedTensor[]; critic: SerializedTensor[] };
  learningRates: { actor: number; critic: number };
}

interface PassLosses {
  actorLoss: number;
  criticLoss: number;
  entropy: number;
}

export class PPOTrainer {
  private actorOptimizer: tf.AdamOptimizer;
  private criticOptimizer: tf.AdamOptimizer;
  private actorSchedule: PlateauSchedule;
  private criticSchedule: PlateauSchedule;

  constructor(
    private queue: Queue,
    private actor: ActorNetwork,
    private critic: CriticNetwork,
    private config: Required<PPOConfig>,
    private logger: Logger
  ) {
    this.actorOptimizer = tf.train.adam(config.actorLearningRate);
    this.criticOptimizer = tf.train.adam(config.criticLearningRate);
    this.actorSchedule = new PlateauSchedule(config.actorLearningRate, {
      mode: "max",
      factor: config.lrFactor,
      patience: config.lrPatience,
    });
    this.criticSchedule = new PlateauSchedule(config.criticLearningRate, {
      mode: "min",
      factor: config.lrFactor,
      patience: config.lrPatience,
    });
  }

  get learningRates(): { actor: number; critic: number } {
    return {
      actor: this.actorSchedule.learningRate,
      critic: this.criticSchedule.learningRate,
    };
  }

  /**
   * Run one PPO update over `experiences`. Resolves to null when there is
   * nothing to learn from.
   */
  async update(experiences: readonly Experience[]): Promise<UpdateReport | null> {
    if (experiences.length === 0) return null;

    return new Promise<UpdateReport>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await this.runUpdate(experiences));
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  // ==========================================================================
  // Update
  // ==========================================================================

  private async runUpdate(experiences: readonly Experience[]): Promise<UpdateReport> {
    const { gamma, lambda, epsilon, epochs } = this.config;
    const rewards = experiences.map((e) => e.reward);
    const values = experiences.map((e) => e.value);
    const dones = experiences.map((e) => e.done);
    const { advantages, returns } = computeTargets(rewards, values, dones, gamma, lambda, epsilon);

    this.logger.log(`Updating networks with ${experiences.length} samples...`);

    const states = tf.tensor2d(experiences.map((e) => e.state));
    const actions = tf.tensor1d(experiences.map((e) => e.action), "int32");
    const oldLogProbs = tf.tensor1d(experiences.map((e) => e.logProb));
    const oldValues = tf.tensor1d(values);
    const advantageTensor = tf.tensor1d(advantages);
    const returnTensor = tf.tensor1d(returns);

    let losses: PassLosses = { actorLoss: 0, criticLoss: 0, entropy: 0 };
    try {
      for (let epoch = 0; epoch < epochs; epoch++) {
        losses = this.trainPass(states, actions, oldLogProbs, oldValues, advantageTensor, returnTensor);
      }
    } finally {
      states.dispose();
      actions.dispose();
      oldLogProbs.dispose();
      oldValues.dispose();
      advantageTensor.dispose();
      returnTensor.dispose();
    }

    const meanReward = mean(rewards);
    if (this.actorSchedule.step(meanReward)) {
      this.actorOptimizer = await rebuildAdam(this.actorOptimizer, this.actorSchedule.learningRate);
      this.logger.log(`Actor learning rate reduced to ${this.actorSchedule.learningRate}`);
    }
    if (this.criticSchedule.step(losses.criticLoss)) {
      this.criticOptimizer = await rebuildAdam(this.criticOptimizer, this.criticSchedule.learningRate);
      this.logger.log(`Critic learning rate reduced to ${this.criticSchedule.learningRate}`);
    }

    this.logger.log(
      `Losses - Actor: ${losses.actorLoss.toFixed(3)}, Critic: ${losses.criticLoss.toFixed(3)}, Entropy: ${losses.entropy.toFixed(3)}`
    );

    return {
      samples: experiences.length,
      ...losses,
      meanReward,
      actorLearningRate: this.actorSchedule.learningRate,
      criticLearningRate: this.criticSchedule.learningRate,
    };
  }

  /**
   * One full-batch gradient step on both networks.
   *
   *   actor:  −mean(min(r·A, clip(r, 1 ± ε)·A)) − c_H · H
   *   critic: c_V · mean(max((V − R)², (V_old + clip(V − V_old, ± ε) − R)²)) + c_L2 · Σθ²
   */
  private trainPass(
    states: tf.Tensor2D,
    actions: tf.Tensor1D,
    oldLogProbs: tf.Tensor1D,
    oldValues: tf.Tensor1D,
    advantages: tf.Tensor1D,
    returns: tf.Tensor1D
  ): PassLosses {
    const { clipEpsilon, entropyCoef, valueCoef, criticL2 } = this.config;
    const losses: PassLosses = { actorLoss: 0, criticLoss: 0, entropy: 0 };

    tf.tidy(() => {
      const actorStep = tf.variableGrads(() => {
        const logProbsAll = tf.logSoftmax(this.actor.forward(states));
        const oneHot = tf.cast(tf.oneHot(actions, this.actor.actionDim), "float32");
        const newLogProbs = tf.sum(tf.mul(logProbsAll, oneHot), 1);
        const entropy = tf.neg(tf.mean(tf.sum(tf.mul(tf.exp(logProbsAll), logProbsAll), 1)));

        const ratio = tf.exp(tf.sub(newLogProbs, oldLogProbs));
        const clipped = tf.clipByValue(ratio, 1 - clipEpsilon, 1 + clipEpsilon);
        const surrogate = tf.minimum(tf.mul(ratio, advantages), tf.mul(clipped, advantages));
        const actorLoss = tf.neg(tf.mean(surrogate));

        losses.actorLoss = actorLoss.asScalar().arraySync();
        losses.entropy = entropy.asScalar().arraySync();
        return tf.sub(actorLoss, tf.mul(entropyCoef, entropy)).asScalar();
      });
      this.applyClipped(actorStep.grads, this.actorOptimizer);

      const criticStep = tf.variableGrads(() => {
        const predicted = this.critic.forward(states);
        const clippedValues = tf.add(
          oldValues,
          tf.clipByValue(tf.sub(predicted, oldValues), -clipEpsilon, clipEpsilon)
        );
        const unclippedLoss = tf.square(tf.sub(predicted, returns));
        const clippedLoss = tf.square(tf.sub(clippedValues, returns));
        const valueLoss = tf.mul(valueCoef, tf.mean(tf.maximum(unclippedLoss, clippedLoss)));

        const penalty = tf.addN(this.critic.parameters().map((p) => tf.sum(tf.square(p))));
        const criticLoss = tf.add(valueLoss, tf.mul(criticL2, penalty)).asScalar();

        losses.criticLoss = criticLoss.arraySync();
        return criticLoss;
      });
      this.applyClipped(criticStep.grads, this.criticOptimizer);
    });

    return losses;
  }

  /**
   * Scale gradients so their global L2 norm is at most `maxGradNorm`,
   * then apply them.
   */
  private applyClipped(grads: tf.NamedTensorMap, optimizer: tf.Optimizer): void {
    const gradients = Object.values(grads);
    let squared = 0;
    for (const grad of gradients) {
      squared += tf.sum(tf.square(grad)).dataSync()[0] ?? 0;
    }
    const norm = Math.sqrt(squared);
    const coef = this.config.maxGradNorm / (norm + 1e-6);

    if (coef >= 1) {
      optimizer.applyGradients(grads);
      return;
    }

    const scaled: tf.NamedTensorMap = {};
    for (const [name, grad] of Object.entries(grads)) {
      scaled[name] = tf.mul(grad, coef);
    }
    optimizer.applyGradients(scaled);
  }

  // ==========================================================================
  // Checkpointing
  // ==========================================================================

  async snapshot(): Promise<TrainerSnapshot> {
    return {
      optimizers: {
        actor: await serializeOptimizer(this.actorOptimizer),
        critic: await serializeOptimizer(this.criticOptimizer),
      },
      learningRates: this.learningRates,
    };
  }

  /**
   * Throw if `snapshot` does not fit the current networks. Nothing is modified.
   */
  validate(snapshot: TrainerSnapshot): void {
    validateOptimizerState("actor", snapshot.optimizers.actor, this.actor.model);
    validateOptimizerState("critic", snapshot.optimizers.critic, this.critic.model);
  }

  /** Replace both optimizers and learning rates. Call `validate` first. */
  async restore(snapshot: TrainerSnapshot): Promise<void> {
    this.actorSchedule.learningRate = snapshot.learningRates.actor;
    this.criticSchedule.learningRate = snapshot.learningRates.critic;
    this.actorOptimizer = await restoreAdam(
      this.actorOptimizer,
      snapshot.learningRates.actor,
      snapshot.optimizers.actor
    );
    this.criticOptimizer = await restoreAdam(
      this.criticOptimizer,
      snapshot.learningRates.critic,
      snapshot.optimizers.critic
    );
  }

  dispose(): void {
    this.actorOptimizer.dispose();
    this.criticOptimizer.dispose();
  }
}

// ============================================================================
// Optimizer state helpers
// ============================================================================

/**
 * Adam keeps its learning rate private, so a new rate means a new optimizer
 * seeded with the old one's iteration count and moments.
 */
async function rebuildAdam(old: tf.AdamOptimizer, learningRate: number): Promise<tf.AdamOptimizer> {
  const weights = await old.getWeights();
  const next = tf.train.adam(learningRate);
  await next.setWeights(weights);
  weights[0]?.tensor.dispose();
  old.dispose();
  return next;
}

async function restoreAdam(
  old: tf.AdamOptimizer,
  learningRate: number,
  state: readonly SerializedTensor[]
): Promise<tf.AdamOptimizer> {
  const weights = state.map((s, i) => ({ name: s.name ?? `slot_${i}`, tensor: deserializeTensor(s) }));
  const next = tf.train.adam(learningRate);
  await next.setWeights(weights);
  for (const w of weights) w.tensor.dispose();
  old.dispose();
  return next;
}

async function serializeOptimizer(optimizer: tf.AdamOptimizer): Promise<SerializedTensor[]> {
  const weights = await optimizer.getWeights();
  const serialized = weights.map((w) => serializeTensor(w.tensor, w.name));
  weights[0]?.tensor.dispose();
  return serialized;
}

/**
 * Adam state is `[iterations, m_1..m_k, v_1..v_k]`, or just `[iterations]`
 * before the first step; each moment matches its trainable weight's shape.
 */
function validateOptimizerState(
  label: string,
  state: readonly SerializedTensor[],
  model: tf.LayersModel
): void {
  const shapes = model.trainableWeights.map((w) => w.shape);
  const iterations = state[0];
  if (!iterations || iterations.values.length !== 1) {
    throw new CheckpointError(`${label} optimizer state is missing its iteration count`);
  }
  const moments = state.slice(1);
  if (moments.length === 0) return;
  if (moments.length !== 2 * shapes.length) {
    throw new CheckpointError(
      `${label} optimizer state has ${moments.length} moments, expected ${2 * shapes.length}`
    );
  }
  moments.forEach((moment, i) => {
    const expected = shapes[i % shapes.length] ?? [];
    if (!sameShape(moment.shape, expected)) {
      throw new CheckpointError(
        `${label} optimizer moment ${i} has shape [${moment.shape}], expected [${expected}]`
      );
    }
  });
}

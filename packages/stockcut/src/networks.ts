/**
 * Actor and critic networks.
 *
 * Both are plain MLPs over the encoded state:
 *
 *   Actor:  Dense → LayerNorm → ReLU (per hidden size) → Dense(action space)
 *   Critic: Dense → LayerNorm → ReLU → Dropout (first block only) … → Dense(1)
 *
 * Hidden layers use He-normal kernels; output layers start near zero so the
 * initial policy is close to uniform and the initial value close to 0.
 */

import * as tf from "@tensorflow/tfjs";
import type { Vec } from "./types";

interface MlpOptions {
  inputDim: number;
  hiddenSizes: number[];
  outputDim: number;
  /** Dropout rate after the first hidden block; 0 disables it. */
  dropout?: number;
  name: string;
}

function buildMlp(options: MlpOptions): tf.LayersModel {
  const inputs = tf.input({ shape: [options.inputDim] });
  let x: tf.SymbolicTensor = inputs;

  options.hiddenSizes.forEach((size, i) => {
    x = tf.layers
      .dense({ units: size, kernelInitializer: tf.initializers.heNormal({}) })
      .apply(x) as tf.SymbolicTensor;
    x = tf.layers.layerNormalization().apply(x) as tf.SymbolicTensor;
    x = tf.layers.activation({ activation: "relu" }).apply(x) as tf.SymbolicTensor;
    if (i === 0 && options.dropout && options.dropout > 0) {
      x = tf.layers.dropout({ rate: options.dropout }).apply(x) as tf.SymbolicTensor;
    }
  });

  const outputs = tf.layers
    .dense({
      units: options.outputDim,
      kernelInitializer: tf.initializers.randomNormal({ mean: 0, stddev: 0.01 }),
      biasInitializer: "zeros",
    })
    .apply(x) as tf.SymbolicTensor;

  return tf.model({ inputs, outputs, name: options.name });
}

function isBatch(input: Vec | Vec[]): input is Vec[] {
  return Array.isArray(input[0]);
}

/** Run the model in inference mode on a batch of states. */
function predictRows(model: tf.LayersModel, states: Vec[]): number[][] {
  const output = tf.tidy(() => model.predict(tf.tensor2d(states)) as tf.Tensor);
  const rows = output.arraySync() as number[][];
  output.dispose();
  return rows;
}

/**
 * Maps a state to one logit per discrete action.
 */
export class ActorNetwork {
  readonly model: tf.LayersModel;

  constructor(
    readonly stateDim: number,
    readonly actionDim: number,
    hiddenSizes: number[]
  ) {
    this.model = buildMlp({
      inputDim: stateDim,
      hiddenSizes,
      outputDim: actionDim,
      name: "actor",
    });
  }

  predict(state: Vec): Vec;
  predict(states: Vec[]): Vec[];
  predict(input: Vec | Vec[]): Vec | Vec[] {
    if (input.length === 0) return [];
    if (isBatch(input)) return predictRows(this.model, input);
    return predictRows(this.model, [input])[0] ?? [];
  }

  /** Differentiable forward pass: logits of shape [batch, actionDim]. */
  forward(states: tf.Tensor2D): tf.Tensor2D {
    return this.model.apply(states, { training: true }) as tf.Tensor2D;
  }

  dispose(): void {
    this.model.dispose();
  }
}

/**
 * Maps a state to a scalar value estimate.
 */
export class CriticNetwork {
  readonly model: tf.LayersModel;

  constructor(
    readonly stateDim: number,
    hiddenSizes: number[],
    dropout: number
  ) {
    this.model = buildMlp({
      inputDim: stateDim,
      hiddenSizes,
      outputDim: 1,
      dropout,
      name: "critic",
    });
  }

  /** One value per state; an empty batch gives an empty array. */
  predict(state: Vec): number;
  predict(states: Vec[]): number[];
  predict(input: Vec | Vec[]): number | number[] {
    if (input.length === 0) return [];
    if (isBatch(input)) return predictRows(this.model, input).map((row) => row[0] ?? 0);
    return predictRows(this.model, [input])[0]?.[0] ?? 0;
  }

  /** Differentiable forward pass with dropout active: values of shape [batch]. */
  forward(states: tf.Tensor2D): tf.Tensor1D {
    const output = this.model.apply(states, { training: true }) as tf.Tensor2D;
    return tf.squeeze<tf.Tensor1D>(output, [1]);
  }

  /** Current values of every trainable parameter, for weight penalties. */
  parameters(): tf.Tensor[] {
    return this.model.trainableWeights.map((w) => w.read());
  }

  dispose(): void {
    this.model.dispose();
  }
}

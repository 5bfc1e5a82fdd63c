/**
 * Checkpoint bundles.
 *
 * A checkpoint is one JSON document holding the weights of both networks,
 * both optimizer states, the learning rates, the normalizer statistics and
 * the encoder geometry. Reading validates the whole document before anything
 * is handed back, so a caller either gets a complete bundle or an error.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import * as tf from "@tensorflow/tfjs";
import { z } from "zod";
import { CheckpointError } from "./errors";

export const CHECKPOINT_SUFFIX = ".ckpt.json";
export const CHECKPOINT_VERSION = 1;

const tensorSchema = z
  .object({
    name: z.string().optional(),
    shape: z.array(z.number().int().nonnegative()),
    values: z.array(z.number()),
  })
  .refine((t) => t.values.length === t.shape.reduce((a, b) => a * b, 1), {
    message: "values length does not match shape",
  });

const checkpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  encoder: z.object({
    maxStocks: z.number().int().positive(),
    maxProducts: z.number().int().nonnegative(),
  }),
  actor: z.array(tensorSchema),
  critic: z.array(tensorSchema),
  optimizers: z.object({
    actor: z.array(tensorSchema),
    critic: z.array(tensorSchema),
  }),
  learningRates: z.object({
    actor: z.number().positive(),
    critic: z.number().positive(),
  }),
  normalizer: z.object({
    mean: z.array(z.number()),
    std: z.array(z.number()),
  }),
  step: z.number().int().nonnegative(),
  phase: z.enum(["exploring", "exploiting"]),
});

export type SerializedTensor = z.infer<typeof tensorSchema>;
export type CheckpointBundle = z.infer<typeof checkpointSchema>;

/** Resolve a checkpoint name inside `directory`, adding the suffix if missing. */
export function checkpointPath(directory: string, name: string): string {
  const file = name.endsWith(CHECKPOINT_SUFFIX) ? name : `${name}${CHECKPOINT_SUFFIX}`;
  return join(directory, file);
}

export function serializeTensor(tensor: tf.Tensor, name?: string): SerializedTensor {
  return {
    ...(name === undefined ? {} : { name }),
    shape: [...tensor.shape],
    values: Array.from(tensor.dataSync()),
  };
}

export function deserializeTensor(serialized: SerializedTensor): tf.Tensor {
  return tf.tensor(serialized.values, serialized.shape);
}

export function sameShape(
  a: readonly (number | null)[],
  b: readonly (number | null)[]
): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

export async function writeCheckpoint(file: string, bundle: CheckpointBundle): Promise<void> {
  try {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify(bundle));
  } catch (error) {
    throw new CheckpointError(`Failed to write checkpoint ${file}`, { cause: error });
  }
}

export async function readCheckpoint(file: string): Promise<CheckpointBundle> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    throw new CheckpointError(`Failed to read checkpoint ${file}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CheckpointError(`Checkpoint ${file} is not valid JSON`, { cause: error });
  }

  const parsed = checkpointSchema.safeParse(json);
  if (!parsed.success) {
    throw new CheckpointError(
      `Checkpoint ${file} is malformed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return parsed.data;
}

/**
 * stockcut: learned placement policy for 2D cutting stock
 *
 * - Actor-critic policy trained on-line with PPO
 * - Structured, greedy and random placement fallbacks
 * - Pattern heuristics shared by the decoder, the greedy search and the
 *   reward shaper
 */

export { CuttingStockPolicy, type OutcomeReport } from "./policy";
export { StateEncoder, RunningNormalizer } from "./encoder";
export { ActorNetwork, CriticNetwork } from "./networks";
export {
  boostAt,
  temperatureAt,
  shapeLogits,
  sampleCategorical,
  type SampledAction,
} from "./sampling";
export { ExperienceBuffer, type Experience, type PendingExperience } from "./buffer";
export { computeGae, computeTargets, type Targets } from "./advantage";
export { PlateauSchedule, type PlateauMode, type PlateauScheduleConfig } from "./schedule";
export { PPOTrainer, type UpdateReport, type TrainerSnapshot } from "./ppo";
export { RewardShaper, NO_PLACEMENT_REWARD, type RewardBreakdown } from "./reward";
export {
  CuttingStockMetrics,
  RUNNING_WINDOW,
  type PatternEvaluation,
  type EpisodeRecord,
  type BestScores,
} from "./metrics";
export {
  CHECKPOINT_SUFFIX,
  checkpointPath,
  readCheckpoint,
  writeCheckpoint,
  type CheckpointBundle,
} from "./checkpoint";
export { PolicyNotInitializedError, BufferError, CheckpointError } from "./errors";
export * from "./strategies";
export * from "./geometry";
export * from "./types";
export * from "./harness";

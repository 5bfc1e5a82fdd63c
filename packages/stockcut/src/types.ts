/**
 * stockcut: Core Types
 *
 * Observation and decision shapes shared by the geometry helpers, the
 * placement strategies and the learned policy:
 * - Occupancy grids (stocks)
 * - Product demand entries
 * - Placements (the decision handed back to the environment)
 * - Configuration for every tunable constant of the policy
 */

export type Vec = number[];

/** Width/height pair, always in grid cells. */
export type Size = [width: number, height: number];

/** Top-left corner of a placement, in grid cells. */
export type Position = [x: number, y: number];

/** Cell value marking an empty cell. Any other value is an occupant id. */
export const EMPTY = -1;

/**
 * A stock sheet's occupancy grid, indexed `grid[y][x]`.
 * The policy never writes to it; placements are applied by the environment.
 */
export type Grid = ReadonlyArray<ReadonlyArray<number>>;

export interface ProductDemand {
  size: Size;
  quantity: number;
}

export interface Observation {
  stocks: Grid[];
  products: ProductDemand[];
}

/** Side channel reported with every observation. */
export interface StepInfo {
  filledRatio: number;
}

export interface Placement {
  stockIdx: number;
  /** Chosen orientation; may be the product's size rotated by 90°. */
  size: Size;
  position: Position;
}

/**
 * Which stage of the decision pipeline produced a placement.
 * "none" means every stage came back empty.
 */
export type DecisionSource = "structured" | "learned" | "random" | "greedy" | "none";

export interface Decision {
  placement: Placement | null;
  source: DecisionSource;
  /** Discrete action sampled from the actor, when the learned stage ran. */
  action?: number;
}

/** Exploration phase of the decision pipeline. Only ever moves forward. */
export type Phase = "exploring" | "exploiting";

/**
 * Outcome of the previous decision, reported one step later.
 */
export interface Outcome {
  observation: Observation;
  done: boolean;
  /** Environment reward. When omitted the policy shapes its own. */
  reward?: number;
  info?: StepInfo;
}

// ============================================================================
// Configuration
// ============================================================================

export interface ActionSpaceConfig {
  /** Stocks addressable by the action space; later stocks are truncated. */
  maxStocks?: number;
  /** Side of the coarse position grid laid over every stock. */
  coarseGrid?: number;
}

export interface EncoderConfig {
  /** Divisor applied to widths and heights. */
  sizeScale?: number;
  /** Quantities are capped at this value before scaling. */
  quantityCap?: number;
  /** Divisor applied to the step counter. */
  stepScale?: number;
  /** Decay of the running normalizer (new = decay·old + (1 − decay)·sample). */
  normalizerDecay?: number;
  epsilon?: number;
}

export interface NetworkConfig {
  actorHiddenSizes?: number[];
  criticHiddenSizes?: number[];
  criticDropout?: number;
}

export interface ExplorationConfig {
  /** Warm-up steps during which structured placement stays active. */
  warmupSteps?: number;
  /** Structured placement stays active while remaining demand exceeds this fraction. */
  structuredDemandFraction?: number;
  /** Logit boost for the preferred stock at step 0; decays to `minBoost`. */
  initialBoost?: number;
  minBoost?: number;
  boostDecaySteps?: number;
  /** Sampling temperature at step 0; decays to `minTemperature`. */
  initialTemperature?: number;
  minTemperature?: number;
  temperatureDecaySteps?: number;
}

export interface DecoderConfig {
  /** Score multiplier for a valid rotated placement. */
  rotationBonus?: number;
  /** Random trials per stock/product/orientation in the random fallback. */
  randomTrials?: number;
}

export interface GreedyConfig {
  /** Positions examined before the search gives up. */
  maxAttempts?: number;
  /** Multiplier for positive scores of rotated placements. */
  rotationBonus?: number;
}

export interface PPOConfig {
  gamma?: number;
  lambda?: number;
  clipEpsilon?: number;
  /** Full-batch optimization passes per update. */
  epochs?: number;
  entropyCoef?: number;
  valueCoef?: number;
  /** L2 penalty over every critic parameter. */
  criticL2?: number;
  maxGradNorm?: number;
  actorLearningRate?: number;
  criticLearningRate?: number;
  /** Learning-rate plateau schedule. */
  lrFactor?: number;
  lrPatience?: number;
  /** Buffer length that triggers an update. */
  updateEvery?: number;
  epsilon?: number;
}

export interface CheckpointConfig {
  directory?: string;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export interface PolicyConfig {
  actionSpace?: ActionSpaceConfig;
  encoder?: EncoderConfig;
  network?: NetworkConfig;
  exploration?: ExplorationConfig;
  decoder?: DecoderConfig;
  greedy?: GreedyConfig;
  ppo?: PPOConfig;
  checkpoint?: CheckpointConfig;
  /** Record experience and run updates. Off for evaluation. */
  training?: boolean;
  /** Uniform [0, 1) source for sampling and the random fallback. */
  random?: () => number;
  logger?: Logger;
}

export const defaultPolicyConfig = {
  actionSpace: {
    maxStocks: 100,
    coarseGrid: 5,
  },
  encoder: {
    sizeScale: 10,
    quantityCap: 10,
    stepScale: 1000,
    normalizerDecay: 0.99,
    epsilon: 1e-8,
  },
  network: {
    actorHiddenSizes: [256, 128],
    criticHiddenSizes: [128, 32],
    criticDropout: 0.1,
  },
  exploration: {
    warmupSteps: 2000,
    structuredDemandFraction: 0.7,
    initialBoost: 3.0,
    minBoost: 1.0,
    boostDecaySteps: 10000,
    initialTemperature: 1.0,
    minTemperature: 0.1,
    temperatureDecaySteps: 20000,
  },
  decoder: {
    rotationBonus: 1.1,
    randomTrials: 10,
  },
  greedy: {
    maxAttempts: 1000,
    rotationBonus: 1.05,
  },
  ppo: {
    gamma: 0.99,
    lambda: 0.95,
    clipEpsilon: 0.2,
    epochs: 10,
    entropyCoef: 0.01,
    valueCoef: 0.25,
    criticL2: 0.01,
    maxGradNorm: 0.1,
    actorLearningRate: 3e-4,
    criticLearningRate: 1e-3,
    lrFactor: 0.5,
    lrPatience: 5,
    updateEvery: 128,
    epsilon: 1e-8,
  },
  checkpoint: {
    directory: "saved_models",
  },
  training: true,
};

/** Policy configuration with every default filled in. */
export interface ResolvedPolicyConfig {
  actionSpace: Required<ActionSpaceConfig>;
  encoder: Required<EncoderConfig>;
  network: Required<NetworkConfig>;
  exploration: Required<ExplorationConfig>;
  decoder: Required<DecoderConfig>;
  greedy: Required<GreedyConfig>;
  ppo: Required<PPOConfig>;
  checkpoint: Required<CheckpointConfig>;
  training: boolean;
  random: () => number;
  logger: Logger;
}

/**
 * Deep merge a partial configuration over the defaults.
 */
export function resolvePolicyConfig(config?: PolicyConfig): ResolvedPolicyConfig {
  return {
    actionSpace: { ...defaultPolicyConfig.actionSpace, ...config?.actionSpace },
    encoder: { ...defaultPolicyConfig.encoder, ...config?.encoder },
    network: {
      ...defaultPolicyConfig.network,
      ...config?.network,
    },
    exploration: { ...defaultPolicyConfig.exploration, ...config?.exploration },
    decoder: { ...defaultPolicyConfig.decoder, ...config?.decoder },
    greedy: { ...defaultPolicyConfig.greedy, ...config?.greedy },
    ppo: { ...defaultPolicyConfig.ppo, ...config?.ppo },
    checkpoint: { ...defaultPolicyConfig.checkpoint, ...config?.checkpoint },
    training: config?.training ?? defaultPolicyConfig.training,
    random: config?.random ?? Math.random,
    logger: config?.logger ?? console,
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
};

/**
 * Training harness
 *
 * Analytics logging for training runs
 */

export { StatsLogger } from "./stats-logger";
export type {
  UpdateMetrics,
  EpisodeMetrics,
  RunMetadata,
  StatsLoggerConfig,
} from "./stats-logger";

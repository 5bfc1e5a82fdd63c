/**
 * StatsLogger: Structured analytics logging for training runs
 *
 * Creates directory structure:
 *   runs/{run-id}/
 *     metadata.json    - Run configuration and timestamp
 *     updates.jsonl    - One line per PPO update
 *     episodes.jsonl   - One line per finished episode
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { UpdateReport } from "../ppo";
import type { Logger } from "../types";

/**
 * PPO update metrics
 */
export interface UpdateMetrics extends UpdateReport {
  update: number;
  step: number;
}

/**
 * Per-episode metrics
 */
export interface EpisodeMetrics {
  episode: number;
  steps: number;
  reward: number;
  filledRatio: number;
  stocksUsed: number;
  phase: string;
  [key: string]: number | string; // Allow additional custom metrics
}

/**
 * Run metadata
 */
export interface RunMetadata {
  runId: string;
  timestamp: string;
  experiment: string;
  config: Record<string, unknown>;
}

/**
 * StatsLogger configuration
 */
export interface StatsLoggerConfig {
  baseDir?: string; // Base directory for runs (default: "runs")
  runId?: string; // Custom run ID (default: auto-generated)
  logger?: Logger; // Receives write failures (default: console)
}

/**
 * StatsLogger: Manages structured logging for training runs
 */
export class StatsLogger {
  private constructor(
    private runId: string,
    private runDir: string,
    private updateLog: WriteStream,
    private episodeLog: WriteStream
  ) {}

  /**
   * Create a new StatsLogger instance
   */
  static async create(
    metadata: Omit<RunMetadata, "runId" | "timestamp">,
    config?: StatsLoggerConfig
  ): Promise<StatsLogger> {
    const baseDir = config?.baseDir ?? "runs";
    const runId =
      config?.runId ?? `${metadata.experiment.toLowerCase().replace(/\s+/g, "-")}-${Date.now()}`;
    const runDir = join(baseDir, runId);

    await mkdir(runDir, { recursive: true });

    const fullMetadata: RunMetadata = {
      runId,
      timestamp: new Date().toISOString(),
      ...metadata,
    };
    await writeFile(join(runDir, "metadata.json"), JSON.stringify(fullMetadata, null, 2));

    const logger = config?.logger ?? console;
    const updateLog = openLog(join(runDir, "updates.jsonl"), logger);
    const episodeLog = openLog(join(runDir, "episodes.jsonl"), logger);

    return new StatsLogger(runId, runDir, updateLog, episodeLog);
  }

  /**
   * Log one PPO update
   */
  logUpdate(metrics: UpdateMetrics): void {
    this.updateLog.write(JSON.stringify(metrics) + "\n");
  }

  /**
   * Log one finished episode
   */
  logEpisode(metrics: EpisodeMetrics): void {
    this.episodeLog.write(JSON.stringify(metrics) + "\n");
  }

  /**
   * Get run directory path
   */
  getRunDir(): string {
    return this.runDir;
  }

  /**
   * Get run ID
   */
  getRunId(): string {
    return this.runId;
  }

  /**
   * Flush and close all file writers
   */
  async close(): Promise<void> {
    await Promise.all([endStream(this.updateLog), endStream(this.episodeLog)]);
  }
}

function openLog(path: string, logger: Logger): WriteStream {
  const stream = createWriteStream(path, { flags: "a" });
  stream.on("error", (error) => logger.warn(`Failed to write ${path}: ${error.message}`));
  return stream;
}

function endStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.destroyed) {
      resolve();
      return;
    }
    stream.once("close", () => resolve());
    stream.end();
  });
}

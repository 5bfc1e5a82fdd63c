/**
 * Experience buffer for on-policy updates.
 *
 * Each decision appends a record whose reward and termination are not yet
 * known. The record waits in a single pending slot until the next outcome
 * finalizes it; only finalized records are handed to the update.
 */

import type { Vec } from "./types";
import { BufferError } from "./errors";

export interface PendingExperience {
  /** Normalized state the action was sampled from. */
  state: Vec;
  action: number;
  /** Log-probability of `action` under the sampling distribution. */
  logProb: number;
  /** Critic estimate of the state. */
  value: number;
}

export interface Experience extends PendingExperience {
  reward: number;
  done: boolean;
}

export class ExperienceBuffer {
  private entries: Experience[] = [];
  private pending: PendingExperience | null = null;

  /**
   * Open a record for a new decision. Only one record may be pending.
   */
  append(experience: PendingExperience): void {
    if (this.pending) {
      throw new BufferError("append() called while a previous record is still pending");
    }
    this.pending = { ...experience, state: [...experience.state] };
  }

  /**
   * Complete the pending record with its reward and termination flag.
   */
  finalize(reward: number, done: boolean): Experience {
    if (!this.pending) {
      throw new BufferError("finalize() called without a pending record");
    }
    const entry: Experience = { ...this.pending, reward, done };
    this.entries.push(entry);
    this.pending = null;
    return entry;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  /** Finalized records. */
  get size(): number {
    return this.entries.length;
  }

  /** Take every finalized record, leaving the buffer without finalized entries. */
  drain(): Experience[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  /** Drop every record, pending included. */
  clear(): void {
    this.entries = [];
    this.pending = null;
  }
}

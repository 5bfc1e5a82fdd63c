/**
 * Decision pipeline.
 *
 * Strategies run lazily in priority order; each either produces a
 * placement or returns null to pass the decision on. The first placement
 * wins and is tagged with the stage that produced it.
 */

import type { Decision, DecisionSource, Phase, Placement } from "../types";

export interface Stage {
  source: Exclude<DecisionSource, "none">;
  attempt: () => Placement | null;
}

export function resolveDecision(stages: readonly Stage[]): Decision {
  for (const stage of stages) {
    const placement = stage.attempt();
    if (placement) {
      return { placement, source: stage.source };
    }
  }
  return { placement: null, source: "none" };
}

/**
 * Two-state exploration schedule.
 *
 * Starts in "exploring" (structured placement active) and latches into
 * "exploiting" once the step counter has passed the warm-up AND the
 * remaining-demand fraction has dropped to the threshold. It never goes back.
 */
export class ExplorationPhase {
  private current: Phase = "exploring";

  constructor(
    private warmupSteps: number,
    private demandFraction: number
  ) {}

  get phase(): Phase {
    return this.current;
  }

  advance(step: number, remainingFraction: number): Phase {
    if (
      this.current === "exploring" &&
      step >= this.warmupSteps &&
      remainingFraction <= this.demandFraction
    ) {
      this.current = "exploiting";
    }
    return this.current;
  }

  /** Resume from a saved phase. */
  restore(phase: Phase): void {
    this.current = phase;
  }
}

import { z } from "zod";

// MR review label
export const ReviewLabel = z.enum([
  "needs_review", // waiting for the first (or a fresh) review
  "changes_requested", // Lead or tests found problems
  "ready_for_merge", // approved or fixed and green
]);
export type ReviewLabel = z.infer<typeof ReviewLabel>;

const LABEL_RANK: Record<ReviewLabel, number> = {
  needs_review: 0,
  changes_requested: 1,
  ready_for_merge: 2,
};

// Within one review cycle a label only moves forward.
export function isForwardTransition(from: ReviewLabel, to: ReviewLabel): boolean {
  return LABEL_RANK[to] > LABEL_RANK[from];
}

export function advanceLabel(current: ReviewLabel, next: ReviewLabel): ReviewLabel {
  return isForwardTransition(current, next) ? next : current;
}

/**
 * Tracks the label of one MR across review cycles.
 * `advance` never moves backwards; `reset` is reserved for a new commit.
 */
export class LabelCycle {
  private current: ReviewLabel;
  private readonly history: ReviewLabel[];

  constructor(initial: ReviewLabel = "needs_review") {
    this.current = initial;
    this.history = [initial];
  }

  get label(): ReviewLabel {
    return this.current;
  }

  get transitions(): readonly ReviewLabel[] {
    return this.history;
  }

  // Returns true when the label actually changed (i.e. a write is needed)
  advance(next: ReviewLabel): boolean {
    if (!isForwardTransition(this.current, next)) {
      return false;
    }
    this.current = next;
    this.history.push(next);
    return true;
  }

  reset(): boolean {
    if (this.current === "needs_review") {
      return false;
    }
    this.current = "needs_review";
    this.history.push("needs_review");
    return true;
  }
}

import {
  MergeRequestHandle,
  createNullLogger,
  type Logger,
  type ReviewLabel,
} from "@reviewloop/core";
import type { PreviousReview, ReviewInput, ReviewResult } from "@reviewloop/review";
import type { HostingClient, ReviewEvent } from "@reviewloop/vcs";

export interface LiveReviewer {
  run(input: ReviewInput): Promise<ReviewResult>;
}

export interface ReviewDriverOptions {
  hosting: HostingClient;
  reviewer: LiveReviewer;
  ctoInstructions?: string;
  logger?: Logger;
}

export type DriverOutcome =
  | { status: "reviewed"; label: ReviewLabel }
  | { status: "skipped"; reason: string };

/**
 * Replays the review state machine against a live MR. Live reviews have no
 * checkout, so they end after the Architect round with inline suggestions.
 */
export class ReviewDriver {
  private readonly options: ReviewDriverOptions;
  private readonly logger: Logger;
  // Last review per MR, handed to the Lead when a new commit arrives
  private readonly previousReviews = new Map<string, PreviousReview>();

  constructor(options: ReviewDriverOptions) {
    this.options = options;
    this.logger = options.logger ?? createNullLogger("review-driver");
  }

  async handle(event: ReviewEvent): Promise<DriverOutcome> {
    const { hosting } = this.options;
    const logger = this.logger.child({ mrId: event.mr_id });
    const commit = event.commit_sha.slice(0, 8);
    const snapshot = await hosting.getMergeRequest(event.mr_id);

    if (event.event_type === "commit_pushed") {
      if (snapshot.currentLabel === "ready_for_merge") {
        const reason = `commit ${commit} ignored: already ready_for_merge`;
        logger.info(reason);
        return { status: "skipped", reason };
      }
      if (snapshot.currentLabel !== "needs_review") {
        logger.info(`Commit ${commit} resets ${snapshot.currentLabel} to needs_review`);
        snapshot.currentLabel = "needs_review";
      }
    }

    logger.info(`Reviewing ${event.event_type} at ${commit}`);
    const handle = new MergeRequestHandle(snapshot, () => hosting.getDiff(event.mr_id));
    const previous = event.event_type === "commit_pushed"
      ? this.previousReviews.get(event.mr_id)
      : undefined;
    const result = await this.options.reviewer.run({
      handle,
      title: snapshot.title ?? event.source_branch,
      description: snapshot.description ?? "",
      ctoInstructions: this.options.ctoInstructions ?? "",
      previous,
    });
    this.previousReviews.set(event.mr_id, {
      verdict: result.verdict,
      suggestions: result.suggestions,
    });
    return { status: "reviewed", label: result.finalLabel };
  }
}

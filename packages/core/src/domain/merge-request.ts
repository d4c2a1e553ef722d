import { z } from "zod";
import { ReviewLabel } from "./label";

// "<repo>#<number>", e.g. "acme/bank#12" or "group/project#3"
export const MergeRequestId = z
  .string()
  .regex(/^.+#\d+$/, "merge request id must look like <repo>#<number>");
export type MergeRequestId = z.infer<typeof MergeRequestId>;

export interface MergeRequestRef {
  repo: string;
  number: number;
}

export function formatMergeRequestId(ref: MergeRequestRef): string {
  return `${ref.repo}#${ref.number}`;
}

export function parseMergeRequestId(mrId: string): MergeRequestRef {
  const index = mrId.lastIndexOf("#");
  const repo = index > 0 ? mrId.slice(0, index) : "";
  const number = Number.parseInt(mrId.slice(index + 1), 10);
  if (!repo || !Number.isInteger(number) || number <= 0) {
    throw new Error(`Invalid merge request id: ${mrId}`);
  }
  return { repo, number };
}

export const ReviewCommentSchema = z.object({
  id: z.string(),
  body: z.string(),
  filePath: z.string().optional(),
  line: z.number().int().positive().optional(),
});
export type ReviewComment = z.infer<typeof ReviewCommentSchema>;

export interface MergeRequestSnapshot {
  mrId: string;
  repo: string;
  sourceBranch: string;
  targetBranch: string;
  webUrl?: string;
  title?: string;
  description?: string;
  currentLabel: ReviewLabel;
}

/**
 * One live or simulated MR. The diff is fetched on first use and cached;
 * `invalidateDiff` is called when a new commit lands.
 */
export class MergeRequestHandle {
  readonly mrId: string;
  readonly repo: string;
  readonly sourceBranch: string;
  readonly targetBranch: string;
  readonly webUrl?: string;
  currentLabel: ReviewLabel;
  readonly comments: ReviewComment[] = [];
  private diffCache: string | null = null;
  private readonly fetchDiff: () => Promise<string>;

  constructor(snapshot: MergeRequestSnapshot, fetchDiff: () => Promise<string>) {
    this.mrId = snapshot.mrId;
    this.repo = snapshot.repo;
    this.sourceBranch = snapshot.sourceBranch;
    this.targetBranch = snapshot.targetBranch;
    this.webUrl = snapshot.webUrl;
    this.currentLabel = snapshot.currentLabel;
    this.fetchDiff = fetchDiff;
  }

  async loadDiff(): Promise<string> {
    if (this.diffCache === null) {
      this.diffCache = await this.fetchDiff();
    }
    return this.diffCache;
  }

  invalidateDiff(): void {
    this.diffCache = null;
  }

  recordComment(comment: ReviewComment): void {
    this.comments.push(comment);
  }
}

import {
  HostingError,
  describeError,
  getErrorStatus,
  withTimeout,
  type MergeRequestSnapshot,
  type ReviewLabel,
} from "@reviewloop/core";

export type HostingKind = "github" | "gitlab" | "local";

export interface HostingDescription {
  kind: HostingKind;
  // false when branches live only in the local working tree
  remote: boolean;
}

export interface RepositoryRef {
  name: string; // "owner/repo" or "group/project"
  webUrl?: string;
  // Authenticated URL for `git push`; absent for local hosting
  pushUrl?: string;
  defaultBranch: string;
  created: boolean;
}

export interface CreateMergeRequestInput {
  repo: string;
  sourceBranch: string;
  targetBranch: string;
  title: string;
  description?: string;
  // Checkout holding both branches; read by hosting clients without a remote
  workingTree?: string;
}

export interface CreatedMergeRequest {
  mrId: string;
  number: number;
  webUrl?: string;
}

export interface CommentLocation {
  filePath: string;
  line: number;
}

/**
 * Operations the provisioner, the review state machine and the webhook server
 * need from GitHub, GitLab or the local stand-in. MR ids are `<repo>#<number>`.
 */
export interface HostingClient {
  describe(): HostingDescription;
  ensureRepository(name: string): Promise<RepositoryRef>;
  createMergeRequest(input: CreateMergeRequestInput): Promise<CreatedMergeRequest>;
  getMergeRequest(mrId: string): Promise<MergeRequestSnapshot>;
  getDiff(mrId: string): Promise<string>;
  postComment(mrId: string, body: string, location?: CommentLocation): Promise<string>;
  setLabel(mrId: string, label: ReviewLabel): Promise<void>;
  getCurrentLabel(mrId: string): Promise<ReviewLabel>;
}

// Label names as they appear on the hosting service
export const HOSTING_LABEL_NAMES: Record<ReviewLabel, string> = {
  needs_review: "needs-review",
  changes_requested: "changes-requested",
  ready_for_merge: "ready-for-merge",
};

const REVIEW_LABELS: readonly ReviewLabel[] = ["ready_for_merge", "changes_requested", "needs_review"];

export function isReviewLabelName(name: string): boolean {
  return REVIEW_LABELS.some((label) => HOSTING_LABEL_NAMES[label] === name);
}

// Most advanced review label present; MRs without one are waiting for review
export function labelFromNames(names: readonly string[]): ReviewLabel {
  for (const label of REVIEW_LABELS) {
    if (names.includes(HOSTING_LABEL_NAMES[label])) {
      return label;
    }
  }
  return "needs_review";
}

export function joinRepoPath(owner: string | undefined, name: string): string {
  if (name.includes("/") || !owner) {
    return name;
  }
  return `${owner}/${name}`;
}

// "acme/bank" -> { owner: "acme", repo: "bank" }
export function splitRepoPath(path: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = path.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Expected <owner>/<repo>, got "${path}"`);
  }
  return { owner, repo };
}

/**
 * Runs one hosting API call under the hosting timeout. Anything thrown comes
 * back as a HostingError carrying the HTTP status when there was one.
 */
export async function hostingCall<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  try {
    return await withTimeout(
      label,
      timeoutMs,
      operation,
      (name, ms) => new HostingError(`${name} timed out after ${ms}ms`),
    );
  } catch (error) {
    if (error instanceof HostingError) {
      throw error;
    }
    throw new HostingError(`${label} failed: ${describeError(error)}`, {
      cause: error,
      status: getErrorStatus(error),
    });
  }
}

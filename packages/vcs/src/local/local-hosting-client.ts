import {
  HostingError,
  formatMergeRequestId,
  parseMergeRequestId,
  type MergeRequestSnapshot,
  type ReviewComment,
  type ReviewLabel,
} from "@reviewloop/core";
import { getDiffBetweenRefs } from "../git";
import type {
  CommentLocation,
  CreateMergeRequestInput,
  CreatedMergeRequest,
  HostingClient,
  HostingDescription,
  RepositoryRef,
} from "../hosting";

interface LocalMergeRequest {
  snapshot: MergeRequestSnapshot;
  workingTree?: string;
  // Set directly by tests and dry runs that have no checkout
  diff?: string;
  comments: ReviewComment[];
}

export interface LabelWrite {
  mrId: string;
  label: ReviewLabel;
}

/**
 * In-process hosting service. MRs exist only in memory; diffs come from the
 * provisioned working tree. Serves offline evaluation runs and tests.
 */
export class LocalHostingClient implements HostingClient {
  readonly labelWrites: LabelWrite[] = [];
  private readonly mergeRequests = new Map<string, LocalMergeRequest>();
  private readonly repositories = new Set<string>();
  private nextNumber = 1;
  private nextCommentId = 1;
  // Comment locations rejected as if they were outside the diff
  private readonly rejectInlineComments: boolean;

  constructor(options: { rejectInlineComments?: boolean } = {}) {
    this.rejectInlineComments = options.rejectInlineComments ?? false;
  }

  describe(): HostingDescription {
    return { kind: "local", remote: false };
  }

  async ensureRepository(name: string): Promise<RepositoryRef> {
    const created = !this.repositories.has(name);
    this.repositories.add(name);
    return { name, defaultBranch: "main", created };
  }

  async createMergeRequest(input: CreateMergeRequestInput): Promise<CreatedMergeRequest> {
    const number = this.nextNumber;
    this.nextNumber += 1;
    const mrId = formatMergeRequestId({ repo: input.repo, number });
    this.mergeRequests.set(mrId, {
      snapshot: {
        mrId,
        repo: input.repo,
        sourceBranch: input.sourceBranch,
        targetBranch: input.targetBranch,
        title: input.title,
        description: input.description,
        currentLabel: "needs_review",
      },
      workingTree: input.workingTree,
      comments: [],
    });
    this.repositories.add(input.repo);
    return { mrId, number };
  }

  // Registers an MR whose diff is known up front (webhook tests, dry runs)
  seedMergeRequest(snapshot: MergeRequestSnapshot, diff: string): void {
    parseMergeRequestId(snapshot.mrId);
    this.mergeRequests.set(snapshot.mrId, { snapshot: { ...snapshot }, diff, comments: [] });
  }

  updateDiff(mrId: string, diff: string): void {
    this.require(mrId).diff = diff;
  }

  commentsFor(mrId: string): readonly ReviewComment[] {
    return this.require(mrId).comments;
  }

  private require(mrId: string): LocalMergeRequest {
    const mr = this.mergeRequests.get(mrId);
    if (!mr) {
      throw new HostingError(`local: merge request ${mrId} not found`, { status: 404 });
    }
    return mr;
  }

  async getMergeRequest(mrId: string): Promise<MergeRequestSnapshot> {
    return { ...this.require(mrId).snapshot };
  }

  async getDiff(mrId: string): Promise<string> {
    const mr = this.require(mrId);
    if (mr.diff !== undefined) {
      return mr.diff;
    }
    if (!mr.workingTree) {
      throw new HostingError(`local: merge request ${mrId} has no working tree`);
    }
    const result = await getDiffBetweenRefs(
      mr.workingTree,
      mr.snapshot.targetBranch,
      mr.snapshot.sourceBranch,
    );
    if (!result.success) {
      throw new HostingError(`local: git diff failed for ${mrId}: ${result.stderr}`);
    }
    return result.stdout;
  }

  async postComment(mrId: string, body: string, location?: CommentLocation): Promise<string> {
    const mr = this.require(mrId);
    if (location && this.rejectInlineComments) {
      throw new HostingError(`local: ${location.filePath}:${location.line} is not part of the diff`, {
        status: 422,
      });
    }
    const id = String(this.nextCommentId);
    this.nextCommentId += 1;
    mr.comments.push({ id, body, filePath: location?.filePath, line: location?.line });
    return id;
  }

  async setLabel(mrId: string, label: ReviewLabel): Promise<void> {
    this.require(mrId).snapshot.currentLabel = label;
    this.labelWrites.push({ mrId, label });
  }

  async getCurrentLabel(mrId: string): Promise<ReviewLabel> {
    return this.require(mrId).snapshot.currentLabel;
  }
}

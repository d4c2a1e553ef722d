import { z } from "zod";
import {
  HostingError,
  formatMergeRequestId,
  parseMergeRequestId,
  type MergeRequestSnapshot,
  type ReviewLabel,
} from "@reviewloop/core";
import {
  HOSTING_LABEL_NAMES,
  hostingCall,
  joinRepoPath,
  labelFromNames,
  type CommentLocation,
  type CreateMergeRequestInput,
  type CreatedMergeRequest,
  type HostingClient,
  type HostingDescription,
  type RepositoryRef,
} from "../hosting";

export interface GitLabHostingOptions {
  baseUrl: string; // e.g. https://gitlab.com
  token: string;
  // Namespace path for bare project names, and its id for project creation
  namespace?: string;
  namespaceId?: number;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const ProjectSchema = z.object({
  id: z.number(),
  path_with_namespace: z.string(),
  web_url: z.string(),
  http_url_to_repo: z.string(),
  default_branch: z.string().nullable().optional(),
});

const MergeRequestSchema = z.object({
  iid: z.number(),
  web_url: z.string(),
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  source_branch: z.string(),
  target_branch: z.string(),
  labels: z.array(z.string()).default([]),
  diff_refs: z
    .object({
      base_sha: z.string(),
      head_sha: z.string(),
      start_sha: z.string(),
    })
    .nullable()
    .optional(),
});
type GitLabMergeRequest = z.infer<typeof MergeRequestSchema>;

const DiffFileSchema = z.object({
  old_path: z.string(),
  new_path: z.string(),
  diff: z.string(),
  new_file: z.boolean(),
  deleted_file: z.boolean(),
});

const NoteSchema = z.object({ id: z.number() });
const DiscussionSchema = z.object({ id: z.string() });

// Merge requests through the REST v4 API, authenticated with a private token
export class GitLabHostingClient implements HostingClient {
  private readonly options: GitLabHostingOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitLabHostingOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  describe(): HostingDescription {
    return { kind: "gitlab", remote: true };
  }

  private apiUrl(path: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, "")}/api/v4${path}`;
  }

  private projectPath(project: string): string {
    return `/projects/${encodeURIComponent(project)}`;
  }

  private async request<T>(
    label: string,
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown>,
  ): Promise<T> {
    return hostingCall(`gitlab ${label}`, this.options.timeoutMs, async (signal) => {
      const response = await this.fetchImpl(this.apiUrl(path), {
        method,
        headers: {
          "PRIVATE-TOKEN": this.options.token,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        ...(body && { body: JSON.stringify(body) }),
        signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new HostingError(
          `gitlab ${label} failed: ${response.status} ${response.statusText} ${detail.slice(0, 300)}`.trim(),
          { status: response.status },
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new HostingError(`gitlab ${label} returned an unexpected payload`);
      }
      return parsed.data;
    });
  }

  private pushUrl(httpUrl: string): string {
    const url = new URL(httpUrl);
    url.username = "oauth2";
    url.password = this.options.token;
    return url.toString();
  }

  private toRepositoryRef(project: z.infer<typeof ProjectSchema>, created: boolean): RepositoryRef {
    return {
      name: project.path_with_namespace,
      webUrl: project.web_url,
      pushUrl: this.pushUrl(project.http_url_to_repo),
      defaultBranch: project.default_branch ?? "main",
      created,
    };
  }

  async ensureRepository(name: string): Promise<RepositoryRef> {
    const path = joinRepoPath(this.options.namespace, name);
    try {
      const existing = await this.request("getProject", "GET", this.projectPath(path), ProjectSchema);
      return this.toRepositoryRef(existing, false);
    } catch (error) {
      if (!(error instanceof HostingError) || error.status !== 404) {
        throw error;
      }
    }

    const projectName = path.split("/").pop() ?? path;
    const created = await this.request("createProject", "POST", "/projects", ProjectSchema, {
      name: projectName,
      path: projectName,
      visibility: "private",
      ...(this.options.namespaceId !== undefined && { namespace_id: this.options.namespaceId }),
    });
    return this.toRepositoryRef(created, true);
  }

  async createMergeRequest(input: CreateMergeRequestInput): Promise<CreatedMergeRequest> {
    const project = joinRepoPath(this.options.namespace, input.repo);
    const created = await this.request(
      "createMergeRequest",
      "POST",
      `${this.projectPath(project)}/merge_requests`,
      MergeRequestSchema,
      {
        source_branch: input.sourceBranch,
        target_branch: input.targetBranch,
        title: input.title,
        description: input.description ?? "",
        labels: HOSTING_LABEL_NAMES.needs_review,
        remove_source_branch: false,
      },
    );
    return {
      mrId: formatMergeRequestId({ repo: project, number: created.iid }),
      number: created.iid,
      webUrl: created.web_url,
    };
  }

  private async fetchMergeRequest(mrId: string): Promise<GitLabMergeRequest> {
    const ref = parseMergeRequestId(mrId);
    return this.request(
      "getMergeRequest",
      "GET",
      `${this.projectPath(ref.repo)}/merge_requests/${ref.number}`,
      MergeRequestSchema,
    );
  }

  async getMergeRequest(mrId: string): Promise<MergeRequestSnapshot> {
    const ref = parseMergeRequestId(mrId);
    const mr = await this.fetchMergeRequest(mrId);
    return {
      mrId,
      repo: ref.repo,
      sourceBranch: mr.source_branch,
      targetBranch: mr.target_branch,
      webUrl: mr.web_url,
      title: mr.title,
      description: mr.description ?? undefined,
      currentLabel: labelFromNames(mr.labels),
    };
  }

  async getDiff(mrId: string): Promise<string> {
    const ref = parseMergeRequestId(mrId);
    const files = await this.request(
      "getDiff",
      "GET",
      `${this.projectPath(ref.repo)}/merge_requests/${ref.number}/diffs?per_page=100`,
      z.array(DiffFileSchema),
    );
    return files
      .map((file) => {
        const header = [
          `diff --git a/${file.old_path} b/${file.new_path}`,
          file.new_file ? "--- /dev/null" : `--- a/${file.old_path}`,
          file.deleted_file ? "+++ /dev/null" : `+++ b/${file.new_path}`,
        ];
        return [...header, file.diff.replace(/\n$/, "")].join("\n");
      })
      .join("\n");
  }

  async postComment(mrId: string, body: string, location?: CommentLocation): Promise<string> {
    const ref = parseMergeRequestId(mrId);
    const base = `${this.projectPath(ref.repo)}/merge_requests/${ref.number}`;

    if (location) {
      const mr = await this.fetchMergeRequest(mrId);
      if (!mr.diff_refs) {
        throw new HostingError(`gitlab postComment failed: ${mrId} has no diff refs yet`);
      }
      const discussion = await this.request("postComment", "POST", `${base}/discussions`, DiscussionSchema, {
        body,
        position: {
          position_type: "text",
          base_sha: mr.diff_refs.base_sha,
          start_sha: mr.diff_refs.start_sha,
          head_sha: mr.diff_refs.head_sha,
          new_path: location.filePath,
          old_path: location.filePath,
          new_line: location.line,
        },
      });
      return discussion.id;
    }

    const note = await this.request("postComment", "POST", `${base}/notes`, NoteSchema, { body });
    return String(note.id);
  }

  // Keeps exactly one review label on the MR
  async setLabel(mrId: string, label: ReviewLabel): Promise<void> {
    const ref = parseMergeRequestId(mrId);
    const wanted = HOSTING_LABEL_NAMES[label];
    const others = Object.values(HOSTING_LABEL_NAMES).filter((name) => name !== wanted);
    await this.request(
      "setLabel",
      "PUT",
      `${this.projectPath(ref.repo)}/merge_requests/${ref.number}`,
      MergeRequestSchema,
      { add_labels: wanted, remove_labels: others.join(",") },
    );
  }

  async getCurrentLabel(mrId: string): Promise<ReviewLabel> {
    const mr = await this.fetchMergeRequest(mrId);
    return labelFromNames(mr.labels);
  }
}

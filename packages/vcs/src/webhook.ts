import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { MergeRequestId, formatMergeRequestId } from "@reviewloop/core";

// Verify the X-Hub-Signature-256 header GitHub sends with each delivery
export function verifyGitHubWebhookSignature(
  payload: string | Buffer,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature) {
    return false;
  }

  // sha256=<hex>
  const parts = signature.split("=");
  if (parts.length !== 2 || parts[0] !== "sha256") {
    return false;
  }

  const signatureHex = parts[1];
  if (!signatureHex) {
    return false;
  }

  const hmac = createHmac("sha256", secret);
  hmac.update(typeof payload === "string" ? payload : payload.toString("utf8"));
  const expected = Buffer.from(hmac.digest("hex"), "hex");
  const received = Buffer.from(signatureHex, "hex");

  // timingSafeEqual throws on length mismatch
  if (received.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(received, expected);
}

// GitLab sends the shared secret verbatim in X-Gitlab-Token
export function verifyGitLabToken(token: string | undefined, secret: string): boolean {
  if (!token) {
    return false;
  }
  const received = Buffer.from(token, "utf8");
  const expected = Buffer.from(secret, "utf8");
  if (received.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(received, expected);
}

export const ReviewEventType = z.enum(["mr_opened", "commit_pushed"]);
export type ReviewEventType = z.infer<typeof ReviewEventType>;

// Canonical inbound event; the native hook payloads are normalised into this
export const ReviewEventSchema = z.object({
  event_type: ReviewEventType,
  mr_id: MergeRequestId,
  source_branch: z.string().min(1),
  commit_sha: z.string().min(1),
});
export type ReviewEvent = z.infer<typeof ReviewEventSchema>;

export type NormalizedEvent =
  | { kind: "event"; event: ReviewEvent }
  | { kind: "ignored"; reason: string }
  | { kind: "invalid"; reason: string };

function invalid(error: z.ZodError): NormalizedEvent {
  const reason = error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return { kind: "invalid", reason };
}

export function parseReviewEvent(payload: unknown): NormalizedEvent {
  const parsed = ReviewEventSchema.safeParse(payload);
  return parsed.success ? { kind: "event", event: parsed.data } : invalid(parsed.error);
}

// Pull request event payload (the fields used here)
const GitHubPullRequestPayload = z.object({
  action: z.string(),
  number: z.number().int().positive(),
  pull_request: z.object({
    head: z.object({
      ref: z.string(),
      sha: z.string(),
    }),
    state: z.string().optional(),
  }),
  repository: z.object({
    full_name: z.string(),
  }),
});

const GITHUB_OPEN_ACTIONS = new Set(["opened", "reopened", "ready_for_review"]);

export function normalizeGitHubEvent(eventName: string | undefined, payload: unknown): NormalizedEvent {
  if (eventName === "ping") {
    return { kind: "ignored", reason: "ping" };
  }
  if (eventName !== "pull_request") {
    return { kind: "ignored", reason: `unsupported event ${eventName ?? "(none)"}` };
  }
  const parsed = GitHubPullRequestPayload.safeParse(payload);
  if (!parsed.success) {
    return invalid(parsed.error);
  }

  const { action, number, pull_request: pr, repository } = parsed.data;
  let eventType: ReviewEventType;
  if (GITHUB_OPEN_ACTIONS.has(action)) {
    eventType = "mr_opened";
  } else if (action === "synchronize") {
    eventType = "commit_pushed";
  } else {
    return { kind: "ignored", reason: `pull_request action ${action}` };
  }

  return {
    kind: "event",
    event: {
      event_type: eventType,
      mr_id: formatMergeRequestId({ repo: repository.full_name, number }),
      source_branch: pr.head.ref,
      commit_sha: pr.head.sha,
    },
  };
}

// Merge request hook payload (the fields used here)
const GitLabMergeRequestPayload = z.object({
  object_kind: z.literal("merge_request"),
  project: z.object({
    path_with_namespace: z.string(),
  }),
  object_attributes: z.object({
    iid: z.number().int().positive(),
    action: z.string().optional(),
    source_branch: z.string(),
    oldrev: z.string().optional(),
    last_commit: z.object({
      id: z.string(),
    }),
  }),
});

export function normalizeGitLabEvent(eventName: string | undefined, payload: unknown): NormalizedEvent {
  if (eventName !== undefined && eventName !== "Merge Request Hook") {
    return { kind: "ignored", reason: `unsupported event ${eventName}` };
  }
  const parsed = GitLabMergeRequestPayload.safeParse(payload);
  if (!parsed.success) {
    return invalid(parsed.error);
  }

  const { project, object_attributes: attributes } = parsed.data;
  let eventType: ReviewEventType;
  if (attributes.action === "open" || attributes.action === "reopen") {
    eventType = "mr_opened";
  } else if (attributes.action === "update" && attributes.oldrev) {
    // Updates without oldrev are title/label edits, not new commits
    eventType = "commit_pushed";
  } else {
    return { kind: "ignored", reason: `merge_request action ${attributes.action ?? "(none)"}` };
  }

  return {
    kind: "event",
    event: {
      event_type: eventType,
      mr_id: formatMergeRequestId({ repo: project.path_with_namespace, number: attributes.iid }),
      source_branch: attributes.source_branch,
      commit_sha: attributes.last_commit.id,
    },
  };
}

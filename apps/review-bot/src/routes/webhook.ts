import { Hono, type Context } from "hono";
import { describeError, type Logger } from "@reviewloop/core";
import {
  normalizeGitHubEvent,
  normalizeGitLabEvent,
  parseReviewEvent,
  verifyGitHubWebhookSignature,
  verifyGitLabToken,
  type NormalizedEvent,
  type ReviewEvent,
} from "@reviewloop/vcs";
import type { WebhookSecrets } from "../config";
import { inFlightKey, type InFlightRegistry } from "../in-flight";

export interface ReviewEventHandler {
  handle(event: ReviewEvent): Promise<unknown>;
}

export interface WebhookRouteOptions {
  handler: ReviewEventHandler;
  registry: InFlightRegistry;
  secrets: WebhookSecrets;
  logger: Logger;
}

type JsonBody = { ok: true; value: unknown } | { ok: false; reason: string };

function parseJsonBody(raw: string): JsonBody {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

export function createWebhookRoute(options: WebhookRouteOptions): Hono {
  const { handler, registry, secrets, logger } = options;
  const webhookRoute = new Hono();

  function dispatch(c: Context, source: string, normalized: NormalizedEvent): Response {
    switch (normalized.kind) {
      case "invalid":
        logger.warn(`[${source}] Malformed payload: ${normalized.reason}`);
        return c.json({ error: "Invalid payload", reason: normalized.reason }, 400);
      case "ignored":
        logger.debug(`[${source}] Ignored: ${normalized.reason}`);
        return c.json({ status: "ignored", reason: normalized.reason }, 200);
      case "event": {
        const { event } = normalized;
        const key = inFlightKey(event.mr_id, event.commit_sha);
        const accepted = registry.submit(event.mr_id, event.commit_sha, async () => {
          await handler.handle(event);
        });
        if (!accepted) {
          logger.info(`[${source}] Duplicate delivery for ${key} while in flight`);
          return c.json({ status: "duplicate", key }, 200);
        }
        logger.info(`[${source}] Accepted ${event.event_type} for ${key}`);
        return c.json({ status: "accepted", key }, 202);
      }
    }
  }

  // Canonical payload: {event_type, mr_id, source_branch, commit_sha}
  webhookRoute.post("/", async (c) => {
    const rawBody = await c.req.text();
    if (
      secrets.webhookSecret &&
      !verifyGitHubWebhookSignature(rawBody, c.req.header("X-Hub-Signature-256"), secrets.webhookSecret)
    ) {
      logger.warn("[webhook] Invalid signature");
      return c.json({ error: "Invalid signature" }, 401);
    }
    const body = parseJsonBody(rawBody);
    if (!body.ok) {
      return c.json({ error: "Invalid JSON payload", reason: body.reason }, 400);
    }
    return dispatch(c, "webhook", parseReviewEvent(body.value));
  });

  webhookRoute.post("/github", async (c) => {
    const rawBody = await c.req.text();
    if (
      secrets.githubWebhookSecret &&
      !verifyGitHubWebhookSignature(
        rawBody,
        c.req.header("X-Hub-Signature-256"),
        secrets.githubWebhookSecret,
      )
    ) {
      logger.warn("[github] Invalid signature");
      return c.json({ error: "Invalid signature" }, 401);
    }
    const body = parseJsonBody(rawBody);
    if (!body.ok) {
      return c.json({ error: "Invalid JSON payload", reason: body.reason }, 400);
    }
    return dispatch(c, "github", normalizeGitHubEvent(c.req.header("X-GitHub-Event"), body.value));
  });

  webhookRoute.post("/gitlab", async (c) => {
    if (
      secrets.gitlabWebhookToken &&
      !verifyGitLabToken(c.req.header("X-Gitlab-Token"), secrets.gitlabWebhookToken)
    ) {
      logger.warn("[gitlab] Invalid token");
      return c.json({ error: "Invalid token" }, 401);
    }
    const body = parseJsonBody(await c.req.text());
    if (!body.ok) {
      return c.json({ error: "Invalid JSON payload", reason: body.reason }, 400);
    }
    return dispatch(c, "gitlab", normalizeGitLabEvent(c.req.header("X-Gitlab-Event"), body.value));
  });

  return webhookRoute;
}

import { Hono } from "hono";
import { logger as accessLogger } from "hono/logger";
import { createNullLogger, type Logger } from "@reviewloop/core";
import type { WebhookSecrets } from "./config";
import type { InFlightRegistry } from "./in-flight";
import { createHealthRoute } from "./routes/health";
import { createWebhookRoute, type ReviewEventHandler } from "./routes/webhook";

export interface ReviewBotAppOptions {
  handler: ReviewEventHandler;
  registry: InFlightRegistry;
  secrets?: WebhookSecrets;
  logger?: Logger;
  accessLog?: boolean;
}

export function createApp(options: ReviewBotAppOptions): Hono {
  const logger = options.logger ?? createNullLogger("review-bot");
  const app = new Hono();

  if (options.accessLog ?? false) {
    app.use("*", accessLogger());
  }

  app.route("/health", createHealthRoute(options.registry));
  app.route(
    "/webhook",
    createWebhookRoute({
      handler: options.handler,
      registry: options.registry,
      secrets: options.secrets ?? {},
      logger,
    }),
  );

  app.get("/", (c) => {
    return c.json({
      name: "reviewloop-review-bot",
      version: "0.1.0",
      description: "Webhook-driven Lead/Architect merge request review",
    });
  });

  return app;
}

import { z } from "zod";
import { envInt, envString, parseEnv } from "@reviewloop/core";

export interface WebhookSecrets {
  // HMAC secret for the canonical endpoint (X-Hub-Signature-256 format)
  webhookSecret?: string;
  githubWebhookSecret?: string;
  gitlabWebhookToken?: string;
}

export interface ReviewBotConfig extends WebhookSecrets {
  port: number;
  ctoInstructions: string;
}

const ReviewBotEnvSchema = z.object({
  REVIEW_BOT_PORT: envInt(4310),
  REVIEW_BOT_INSTRUCTIONS: envString(),
  WEBHOOK_SECRET: envString(),
  GITHUB_WEBHOOK_SECRET: envString(),
  GITLAB_WEBHOOK_TOKEN: envString(),
});

export function loadReviewBotConfig(env: NodeJS.ProcessEnv = process.env): ReviewBotConfig {
  const parsed = parseEnv("review-bot", ReviewBotEnvSchema, env);
  return {
    port: parsed.REVIEW_BOT_PORT,
    ctoInstructions: parsed.REVIEW_BOT_INSTRUCTIONS ?? "",
    webhookSecret: parsed.WEBHOOK_SECRET,
    githubWebhookSecret: parsed.GITHUB_WEBHOOK_SECRET,
    gitlabWebhookToken: parsed.GITLAB_WEBHOOK_TOKEN,
  };
}

import "dotenv/config";
import { serve } from "@hono/node-server";
import {
  createLogger,
  describeError,
  loadAgentRetryPolicy,
  setupProcessLogging,
} from "@reviewloop/core";
import { createAgentClient, loadAgentConfig } from "@reviewloop/llm";
import { ReviewStateMachine } from "@reviewloop/review";
import { createHostingClient, loadHostingConfig } from "@reviewloop/vcs";
import { createApp } from "./app";
import { loadReviewBotConfig } from "./config";
import { InFlightRegistry } from "./in-flight";
import { ReviewDriver } from "./review-driver";

setupProcessLogging(process.env.REVIEWLOOP_LOG_NAME ?? "review-bot", { label: "ReviewBot" });

const logger = createLogger("review-bot");
const config = loadReviewBotConfig();
const agentConfig = loadAgentConfig();
const hostingConfig = loadHostingConfig();
if (hostingConfig.provider === "local") {
  logger.warn("HOSTING_PROVIDER is local; webhook events can only reference seeded merge requests");
}

const agent = createAgentClient(agentConfig);
const hosting = createHostingClient(hostingConfig, { logger: logger.child({ component: "hosting" }) });
const driver = new ReviewDriver({
  hosting,
  reviewer: new ReviewStateMachine({
    agents: { lead: agent, architect: agent },
    hosting,
    logger: logger.child({ component: "review" }),
    retryPolicy: loadAgentRetryPolicy(),
    agentTimeoutMs: agentConfig.timeoutMs,
  }),
  ctoInstructions: config.ctoInstructions,
  logger,
});
const registry = new InFlightRegistry((key, error) => {
  logger.error(`Review for ${key} failed; label left unchanged: ${describeError(error)}`);
});

const app = createApp({ handler: driver, registry, secrets: config, logger, accessLog: true });

const { provider, model } = agent.describe();
logger.info(
  `Review bot listening on port ${config.port} (agent ${provider}/${model}, hosting ${hostingConfig.provider})`,
);

serve({
  fetch: app.fetch,
  port: config.port,
});

let shuttingDown = false;

async function handleShutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}. Waiting for ${registry.size} in-flight review(s)...`);
  await registry.drain();
  process.exit(0);
}

process.once("SIGINT", () => {
  void handleShutdown("SIGINT");
});

process.once("SIGTERM", () => {
  void handleShutdown("SIGTERM");
});

import "dotenv/config";
import {
  createLogger,
  loadAgentRetryPolicy,
  setupProcessLogging,
  type Scenario,
} from "@reviewloop/core";
import { createAgentClient, loadAgentConfig } from "@reviewloop/llm";
import { ReviewStateMachine } from "@reviewloop/review";
import { createHostingClient, loadHostingConfig } from "@reviewloop/vcs";
import { USAGE, parseCliArgs } from "./cli";
import { loadEvaluatorConfig } from "./config";
import { ScenarioOrchestrator } from "./orchestrator";
import { RepositoryProvisioner } from "./provisioner";
import { buildReport, formatReportTable, writeReportFile } from "./report";
import { loadScenarios } from "./scenario-registry";
import { runTests } from "./test-runner/test-runner";

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  setupProcessLogging("evaluator", { label: "Evaluator" });
  const logger = createLogger("evaluator");

  const config = loadEvaluatorConfig(process.env, {
    scenariosDir: cli.scenariosDir,
    only: cli.only,
    reportPath: cli.reportPath,
    keepWorkingTrees: cli.keepWorkingTrees || undefined,
  });
  const agentConfig = loadAgentConfig(process.env, {
    provider: cli.provider,
    model: cli.model,
    baseUrl: cli.baseUrl,
  });
  const hostingConfig = loadHostingConfig(process.env, { provider: cli.hosting });

  // One client serves both review roles
  const agent = createAgentClient(agentConfig);
  const hosting = createHostingClient(hostingConfig, { logger: logger.child({ component: "hosting" }) });
  const scenarios = await loadScenarios(config.scenariosDir, config.only);
  if (scenarios.length === 0) {
    logger.error(`No scenarios found in ${config.scenariosDir}`);
    process.exitCode = 1;
    return;
  }

  const { provider, model } = agent.describe();
  logger.info(
    `Starting suite: ${scenarios.length} scenario(s), agent ${provider}/${model}, hosting ${hostingConfig.provider}`,
  );

  const orchestrator = new ScenarioOrchestrator({
    provisioner: new RepositoryProvisioner({
      hosting,
      workRoot: config.workRoot,
      repoPrefix: config.repoPrefix,
      keepWorkingTrees: config.keepWorkingTrees,
      logger: logger.child({ component: "provisioner" }),
    }),
    reviewer: new ReviewStateMachine({
      agents: { lead: agent, architect: agent },
      hosting,
      logger: logger.child({ component: "review" }),
      retryPolicy: loadAgentRetryPolicy(process.env),
      agentTimeoutMs: agentConfig.timeoutMs,
    }),
    hosting,
    runTests: (scenario: Scenario, workingTree: string, signal?: AbortSignal) =>
      runTests(scenario.testCommand, workingTree, {
        timeoutMs: config.testTimeoutMs,
        expectedTests: scenario.expectedTests,
        logger: logger.child({ component: "test-runner", scenarioId: scenario.id }),
        signal,
      }),
    scenarioTimeoutMs: config.scenarioTimeoutMs,
    postBenchmarkComment: config.postBenchmarkComment,
    logger,
  });

  const startedAt = new Date();
  const outcomes = await orchestrator.runSuite(scenarios);
  const report = buildReport({
    agent: agent.describe(),
    hosting: hostingConfig.provider,
    startedAt,
    finishedAt: new Date(),
    outcomes,
  });

  console.log(`\n${formatReportTable(report)}`);
  if (config.reportPath) {
    await writeReportFile(config.reportPath, report);
    logger.info(`Report written to ${config.reportPath}`);
  }
  if (report.counts.error > 0 || report.counts.fail > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Evaluator crashed:", error);
  process.exit(1);
});

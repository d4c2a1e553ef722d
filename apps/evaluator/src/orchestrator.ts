import {
  compareScenarios,
  createNullLogger,
  describeError,
  withTimeout,
  type Logger,
  type PatchResult,
  type ReviewLabel,
  type ReviewVerdict,
  type Scenario,
  type ScenarioOutcome,
  type Suggestion,
  type TestResult,
} from "@reviewloop/core";
import { FsWorkspace, type ReviewInput, type ReviewResult } from "@reviewloop/review";
import { commitAll, type HostingClient } from "@reviewloop/vcs";
import type { ProvisionedScenario } from "./provisioner";
import { formatBenchmarkComment } from "./report";
import { classifyError, isScenarioPassed } from "./scorer";

export interface ScenarioProvisioner {
  provision(scenario: Scenario, signal?: AbortSignal): Promise<ProvisionedScenario>;
}

export interface ScenarioReviewer {
  run(input: ReviewInput): Promise<ReviewResult>;
}

export type ScenarioTestRunner = (
  scenario: Scenario,
  workingTree: string,
  signal?: AbortSignal,
) => Promise<TestResult>;

export interface OrchestratorOptions {
  provisioner: ScenarioProvisioner;
  reviewer: ScenarioReviewer;
  hosting: HostingClient;
  runTests: ScenarioTestRunner;
  // Wall-clock budget per scenario; 0 disables it
  scenarioTimeoutMs: number;
  postBenchmarkComment?: boolean;
  logger?: Logger;
}

// Whatever a scenario got through before it finished or failed
interface ScenarioProgress {
  mrId: string | null;
  mrUrl: string | null;
  preFix: TestResult | null;
  postFix: TestResult | null;
  verdict: ReviewVerdict | null;
  verdictParsed: boolean;
  suggestions: Suggestion[];
  patches: PatchResult[];
  finalLabel: ReviewLabel | null;
  transitions: ReviewLabel[];
}

function emptyProgress(): ScenarioProgress {
  return {
    mrId: null,
    mrUrl: null,
    preFix: null,
    postFix: null,
    verdict: null,
    verdictParsed: false,
    suggestions: [],
    patches: [],
    finalLabel: null,
    transitions: [],
  };
}

/**
 * Runs the suite one scenario at a time in ascending difficulty. Every
 * scenario yields exactly one outcome; infrastructure failures become ERROR
 * and the suite moves on.
 */
export class ScenarioOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.logger = options.logger ?? createNullLogger("orchestrator");
  }

  async runSuite(scenarios: readonly Scenario[]): Promise<ScenarioOutcome[]> {
    const ordered = [...scenarios].sort(compareScenarios);
    const outcomes: ScenarioOutcome[] = [];
    for (const [index, scenario] of ordered.entries()) {
      this.logger.info(`Running scenario ${index + 1}/${ordered.length}: ${scenario.id}`);
      outcomes.push(await this.runScenario(scenario));
    }
    return outcomes;
  }

  async runScenario(scenario: Scenario): Promise<ScenarioOutcome> {
    const logger = this.logger.child({ scenarioId: scenario.id });
    const startedAt = Date.now();
    const progress = emptyProgress();

    const controller = new AbortController();
    const running = this.execute(scenario, progress, controller.signal, logger);

    try {
      await withTimeout(`scenario ${scenario.id}`, this.options.scenarioTimeoutMs, (deadline) => {
        deadline.addEventListener("abort", () => controller.abort(), { once: true });
        return running;
      });
      const scenarioPassed = isScenarioPassed(scenario, progress.postFix);
      logger.info(scenarioPassed ? "Scenario passed" : "Scenario failed");
      return {
        scenarioId: scenario.id,
        category: scenarioPassed ? "PASS" : "FAIL",
        errorKind: null,
        errorMessage: null,
        ...progress,
        scenarioPassed,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      const errorKind = classifyError(error);
      const errorMessage = describeError(error);
      logger.stepFailed(scenario.id, `${errorKind}: ${errorMessage}`);
      // The next scenario starts only once this one has stopped and cleaned up
      controller.abort();
      await running.catch((stopped: unknown) => {
        logger.debug(`Scenario work stopped: ${describeError(stopped)}`);
      });
      // Patches already written stay in place
      return {
        scenarioId: scenario.id,
        category: "ERROR",
        errorKind,
        errorMessage,
        ...progress,
        scenarioPassed: false,
        durationMs: Date.now() - startedAt,
      };
    }
  }

  private async execute(
    scenario: Scenario,
    progress: ScenarioProgress,
    signal: AbortSignal,
    logger: Logger,
  ): Promise<void> {
    logger.stepStart("provision", scenario.title);
    const provisioned = await this.options.provisioner.provision(scenario, signal);
    progress.mrId = provisioned.handle.mrId;
    progress.mrUrl = provisioned.handle.webUrl ?? null;

    try {
      signal.throwIfAborted();
      logger.stepStart("pre-fix", `Running ${scenario.testCommand}`);
      const preFix = await this.options.runTests(scenario, provisioned.workingTree, signal);
      progress.preFix = preFix;

      signal.throwIfAborted();
      const review = await this.options.reviewer.run({
        handle: provisioned.handle,
        title: scenario.title,
        description: scenario.description,
        ctoInstructions: scenario.ctoInstructions,
        workspace: new FsWorkspace(provisioned.workingTree),
        retest: () => this.options.runTests(scenario, provisioned.workingTree, signal),
        signal,
      });
      progress.verdict = review.verdict;
      progress.verdictParsed = review.verdictPass !== "default";
      progress.suggestions = review.suggestions;
      progress.patches = review.patches;
      progress.finalLabel = review.finalLabel;
      progress.transitions = review.labelTransitions;

      signal.throwIfAborted();
      // An approved MR is still tested as submitted
      const postFix =
        review.postFix ?? (await this.options.runTests(scenario, provisioned.workingTree, signal));
      progress.postFix = postFix;

      signal.throwIfAborted();
      if (review.patches.some((patch) => patch.status === "applied")) {
        const commit = await commitAll(
          provisioned.workingTree,
          "fix: apply review suggestions (automated)",
        );
        if (commit.success) {
          await provisioned.pushSourceBranch();
        } else {
          logger.warn(`Could not commit the applied fixes: ${commit.stderr}`);
        }
      }

      signal.throwIfAborted();
      if (this.options.postBenchmarkComment ?? true) {
        await this.postBenchmark(provisioned, scenario, preFix, postFix, logger);
      }
    } finally {
      await provisioned.cleanup();
    }
  }

  private async postBenchmark(
    provisioned: ProvisionedScenario,
    scenario: Scenario,
    preFix: TestResult,
    postFix: TestResult,
    logger: Logger,
  ): Promise<void> {
    const body = formatBenchmarkComment(preFix, postFix, isScenarioPassed(scenario, postFix));
    try {
      const id = await this.options.hosting.postComment(provisioned.handle.mrId, body);
      provisioned.handle.recordComment({ id, body });
    } catch (error) {
      logger.warn(`Could not post the benchmark comment: ${describeError(error)}`);
    }
  }
}

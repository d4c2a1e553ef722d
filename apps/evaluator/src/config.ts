import { z } from "zod";
import { envBoolean, envInt, envString, parseEnv } from "@reviewloop/core";
import { DEFAULT_SCENARIOS_DIR } from "./scenario-registry";

export interface EvaluatorConfig {
  scenariosDir: string;
  only: string[];
  reportPath?: string;
  workRoot?: string;
  repoPrefix: string;
  scenarioTimeoutMs: number;
  testTimeoutMs: number;
  keepWorkingTrees: boolean;
  postBenchmarkComment: boolean;
}

const EvaluatorEnvSchema = z.object({
  EVALUATOR_SCENARIOS_DIR: envString(),
  EVALUATOR_REPORT_PATH: envString(),
  EVALUATOR_WORKDIR: envString(),
  EVALUATOR_REPO_PREFIX: envString(),
  EVALUATOR_KEEP_WORKTREES: envBoolean(false),
  EVALUATOR_BENCHMARK_COMMENT: envBoolean(true),
  SCENARIO_TIMEOUT_MS: envInt(600000),
  TEST_TIMEOUT_MS: envInt(120000),
});

export function loadEvaluatorConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EvaluatorConfig> = {},
): EvaluatorConfig {
  const parsed = parseEnv("evaluator", EvaluatorEnvSchema, env);
  return {
    scenariosDir: overrides.scenariosDir ?? parsed.EVALUATOR_SCENARIOS_DIR ?? DEFAULT_SCENARIOS_DIR,
    only: overrides.only ?? [],
    reportPath: overrides.reportPath ?? parsed.EVALUATOR_REPORT_PATH,
    workRoot: overrides.workRoot ?? parsed.EVALUATOR_WORKDIR,
    repoPrefix: overrides.repoPrefix ?? parsed.EVALUATOR_REPO_PREFIX ?? "reviewloop-",
    scenarioTimeoutMs: overrides.scenarioTimeoutMs ?? parsed.SCENARIO_TIMEOUT_MS,
    testTimeoutMs: overrides.testTimeoutMs ?? parsed.TEST_TIMEOUT_MS,
    keepWorkingTrees: overrides.keepWorkingTrees ?? parsed.EVALUATOR_KEEP_WORKTREES,
    postBenchmarkComment: overrides.postBenchmarkComment ?? parsed.EVALUATOR_BENCHMARK_COMMENT,
  };
}

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  countOutcomes,
  formatScore,
  type OutcomeCounts,
  type ScenarioOutcome,
  type TestResult,
} from "@reviewloop/core";
import type { AgentDescription } from "@reviewloop/llm";
import type { HostingKind } from "@reviewloop/vcs";

export interface EvaluationReport {
  agent: AgentDescription;
  hosting: HostingKind;
  startedAt: string;
  finishedAt: string;
  counts: OutcomeCounts;
  outcomes: ScenarioOutcome[];
}

export function buildReport(input: {
  agent: AgentDescription;
  hosting: HostingKind;
  startedAt: Date;
  finishedAt: Date;
  outcomes: ScenarioOutcome[];
}): EvaluationReport {
  return {
    agent: input.agent,
    hosting: input.hosting,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    counts: countOutcomes(input.outcomes),
    outcomes: input.outcomes,
  };
}

function score(result: TestResult | null): string {
  return result ? formatScore(result) : "-";
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + " ".repeat(width - value.length);
}

// Plain-text table for the console
export function formatReportTable(report: EvaluationReport): string {
  const header = ["Scenario", "Result", "Pre", "Post", "Applied", "Label", "Time"];
  const rows = report.outcomes.map((outcome) => [
    outcome.scenarioId,
    outcome.category === "ERROR" ? `ERROR(${outcome.errorKind ?? "unknown"})` : outcome.category,
    score(outcome.preFix),
    score(outcome.postFix),
    `${outcome.patches.filter((patch) => patch.status === "applied").length}/${outcome.suggestions.length}`,
    outcome.finalLabel ?? "-",
    `${(outcome.durationMs / 1000).toFixed(1)}s`,
  ]);
  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const line = (cells: string[]) =>
    cells.map((cell, column) => pad(cell, widths[column] ?? cell.length)).join("  ").trimEnd();

  const { counts } = report;
  return [
    `Agent: ${report.agent.provider}/${report.agent.model}  Hosting: ${report.hosting}`,
    "",
    line(header),
    line(widths.map((width) => "-".repeat(width))),
    ...rows.map(line),
    "",
    `Total ${counts.total}  PASS ${counts.pass}  FAIL ${counts.fail}  ERROR ${counts.error}`,
  ].join("\n");
}

export async function writeReportFile(path: string, report: EvaluationReport): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
}

function outputTail(result: TestResult): string {
  return `${result.stdout}\n${result.stderr}`.trim().slice(-800).replaceAll("```", "");
}

function stageRow(stage: string, result: TestResult, details: string): string {
  const green = result.failedCount === 0 && result.executionError === null;
  return `| **${stage}** | ${green ? "🟢 Passed" : "🔴 Failed"} | **${formatScore(result)}** | ${details} |`;
}

// Pre/post comparison posted on the scenario MR
export function formatBenchmarkComment(
  preFix: TestResult,
  postFix: TestResult,
  scenarioPassed: boolean,
): string {
  return [
    "### 🧪 Automated Benchmark Report",
    "",
    "| Stage | Status | Score | Details |",
    "|-------|:------:|:-----:|---------|",
    stageRow("Pre-Fix", preFix, "Submitted code"),
    stageRow("Post-Fix", postFix, "Review suggestions applied"),
    "",
    `**Conclusion:** ${scenarioPassed ? "🏆 **BENCHMARK PASSED**" : "💀 **BENCHMARK FAILED**"}`,
    "",
    "<details><summary>🔍 Test logs</summary>",
    "",
    "**Pre-Fix output:**",
    "```",
    outputTail(preFix),
    "```",
    "",
    "**Post-Fix output:**",
    "```",
    outputTail(postFix),
    "```",
    "</details>",
  ].join("\n");
}

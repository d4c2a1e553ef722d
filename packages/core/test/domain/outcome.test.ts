import { describe, expect, it } from "vitest";
import { countOutcomes, type ScenarioOutcome } from "../../src/domain/outcome";
import { formatScore, isGreen, type TestResult } from "../../src/domain/test-result";

const result: TestResult = {
  passedCount: 3,
  failedCount: 1,
  failureDetails: ["FAILED tests/test_wallet.py::test_overdraft"],
  command: "python -m pytest -q tests",
  exitCode: 1,
  stdout: "",
  stderr: "",
  durationMs: 10,
  executionError: null,
};

function outcome(category: ScenarioOutcome["category"]): ScenarioOutcome {
  return {
    scenarioId: category.toLowerCase(),
    category,
    errorKind: category === "ERROR" ? "timeout" : null,
    errorMessage: null,
    verdict: null,
    verdictParsed: false,
    suggestions: [],
    patches: [],
    preFix: null,
    postFix: null,
    scenarioPassed: category === "PASS",
    mrId: null,
    mrUrl: null,
    finalLabel: null,
    transitions: [],
    durationMs: 0,
  };
}

describe("test results", () => {
  it("formats passed over total", () => {
    expect(formatScore(result)).toBe("3/4");
    expect(isGreen(result)).toBe(false);
    expect(isGreen({ ...result, failedCount: 0 })).toBe(true);
  });
});

describe("countOutcomes", () => {
  it("tallies each category", () => {
    expect(countOutcomes([outcome("PASS"), outcome("ERROR"), outcome("PASS"), outcome("FAIL")])).toEqual({
      total: 4,
      pass: 2,
      fail: 1,
      error: 1,
    });
  });
});

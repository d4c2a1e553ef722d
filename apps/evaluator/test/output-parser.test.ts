import { describe, expect, it } from "vitest";
import { parseTestOutput } from "../src/test-runner/output-parser";

describe("parseTestOutput", () => {
  it("reads pytest summaries including errors", () => {
    const output = [
      "..F",
      "=========================== short test summary info ============================",
      "FAILED tests/test_bank.py::test_two_concurrent_deposits - assert 50 == 100",
      "ERROR tests/test_bank.py::test_setup - ImportError",
      "1 failed, 2 passed, 1 error in 0.12s",
    ].join("\n");

    expect(parseTestOutput(output)).toEqual({
      framework: "pytest",
      passed: 2,
      failed: 2,
      failureDetails: [
        "FAILED tests/test_bank.py::test_two_concurrent_deposits - assert 50 == 100",
        "ERROR tests/test_bank.py::test_setup - ImportError",
      ],
    });
  });

  it("reads jest summaries", () => {
    const output = [
      "  ● Account › deposits concurrently",
      "",
      "Test Suites: 1 failed, 1 total",
      "Tests:       1 failed, 3 passed, 4 total",
    ].join("\n");

    expect(parseTestOutput(output)).toEqual({
      framework: "jest",
      passed: 3,
      failed: 1,
      failureDetails: ["Account › deposits concurrently"],
    });
  });

  it("reads vitest summaries", () => {
    const output = [
      " FAIL  test/bank.test.ts > Account > deposits concurrently",
      "",
      " Test Files  1 failed (1)",
      "      Tests  1 failed | 5 passed (6)",
    ].join("\n");

    expect(parseTestOutput(output)).toEqual({
      framework: "vitest",
      passed: 5,
      failed: 1,
      failureDetails: ["test/bank.test.ts > Account > deposits concurrently"],
    });
  });

  it("reads node:test TAP output", () => {
    const output = [
      "TAP version 13",
      "ok 1 - deposits once",
      "not ok 2 - deposits concurrently",
      "1..2",
      "# tests 2",
      "# pass 1",
      "# fail 1",
    ].join("\n");

    expect(parseTestOutput(output)).toEqual({
      framework: "node",
      passed: 1,
      failed: 1,
      failureDetails: ["deposits concurrently"],
    });
  });

  it("returns null without a summary", () => {
    expect(parseTestOutput("Traceback (most recent call last):\nModuleNotFoundError")).toBeNull();
  });
});

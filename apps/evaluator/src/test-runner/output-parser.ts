export type TestFramework = "pytest" | "jest" | "vitest" | "node";

export interface ParsedTestOutput {
  framework: TestFramework;
  passed: number;
  failed: number;
  failureDetails: string[];
}

const MAX_FAILURE_DETAILS = 20;

function countOf(text: string, pattern: RegExp): number {
  const match = text.match(pattern);
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

function collect(output: string, pattern: RegExp): string[] {
  const details = new Set<string>();
  for (const match of output.matchAll(pattern)) {
    const detail = match[1]?.trim();
    if (detail) {
      details.add(detail);
    }
    if (details.size >= MAX_FAILURE_DETAILS) {
      break;
    }
  }
  return Array.from(details);
}

// Tests:       1 failed, 2 passed, 3 total
function parseJest(output: string): ParsedTestOutput | null {
  const summary = output.match(/^Tests:\s+(.+)$/m)?.[1];
  if (!summary) {
    return null;
  }
  return {
    framework: "jest",
    passed: countOf(summary, /(\d+) passed/),
    failed: countOf(summary, /(\d+) failed/),
    failureDetails: collect(output, /^\s*● (.+)$/gm),
  };
}

//       Tests  1 failed | 2 passed (3)
function parseVitest(output: string): ParsedTestOutput | null {
  const summary = output.match(/^\s*Tests\s{2,}(.+?)\s*\(\d+\)\s*$/m)?.[1];
  if (!summary) {
    return null;
  }
  return {
    framework: "vitest",
    passed: countOf(summary, /(\d+) passed/),
    failed: countOf(summary, /(\d+) failed/),
    failureDetails: collect(output, /^\s*FAIL\s+(.+)$/gm),
  };
}

// TAP ("# pass 2") or the default node:test reporter ("ℹ pass 2")
function parseNodeTest(output: string): ParsedTestOutput | null {
  const passMatch = output.match(/^(?:#|ℹ) pass (\d+)\s*$/m);
  if (!passMatch) {
    return null;
  }
  return {
    framework: "node",
    passed: countOf(passMatch[0], /(\d+)/),
    failed: countOf(output, /^(?:#|ℹ) fail (\d+)\s*$/m),
    failureDetails: collect(output, /^\s*not ok \d+ - (.+)$/gm),
  };
}

// ===== 1 failed, 2 passed, 1 error in 0.12s =====
function parsePytest(output: string): ParsedTestOutput | null {
  if (!/\b\d+ (?:passed|failed|errors?)\b/.test(output)) {
    return null;
  }
  return {
    framework: "pytest",
    passed: countOf(output, /(\d+) passed/),
    failed: countOf(output, /(\d+) failed/) + countOf(output, /(\d+) errors?\b/),
    failureDetails: collect(output, /^((?:FAILED|ERROR) .+)$/gm),
  };
}

/**
 * Reads pass/fail tallies from a test framework's console output. Returns
 * null when no known summary line is present.
 */
export function parseTestOutput(output: string): ParsedTestOutput | null {
  return parseJest(output) ?? parseVitest(output) ?? parseNodeTest(output) ?? parsePytest(output);
}

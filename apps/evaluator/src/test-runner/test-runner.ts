import {
  TestExecutionError,
  createNullLogger,
  type Logger,
  type TestResult,
} from "@reviewloop/core";
import { runCommand, type CommandResult } from "./command-runner";
import { parseTestOutput } from "./output-parser";

export interface TestRunOptions {
  timeoutMs: number;
  // Tests the scenario is expected to run; reported as failed when nothing runs
  expectedTests: number;
  env?: Record<string, string>;
  logger?: Logger;
  signal?: AbortSignal;
}

function tail(text: string, length = 2000): string {
  return text.length > length ? text.slice(-length) : text;
}

function notRun(result: CommandResult, error: TestExecutionError, expectedTests: number): TestResult {
  return {
    passedCount: 0,
    failedCount: Math.max(1, expectedTests),
    failureDetails: [error.message],
    command: result.command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: result.durationMs,
    executionError: error.message,
  };
}

/**
 * Runs a test command in the working tree and tallies the result. Commands
 * that cannot start, time out or print no recognizable summary on failure
 * count as all expected tests failed.
 */
export async function runTests(
  command: string,
  cwd: string,
  options: TestRunOptions,
): Promise<TestResult> {
  const logger = options.logger ?? createNullLogger("test-runner");
  const result = await runCommand(command, cwd, {
    timeoutMs: options.timeoutMs,
    // Lets `pytest` import modules from the repository root
    env: { PYTHONPATH: cwd, ...options.env },
    signal: options.signal,
  });

  if (result.spawnError !== null) {
    const error = new TestExecutionError(command, `Could not run "${command}": ${result.spawnError}`);
    logger.warn(error.message);
    return notRun(result, error, options.expectedTests);
  }
  if (result.timedOut) {
    const error = new TestExecutionError(command, `"${command}" timed out after ${options.timeoutMs}ms`);
    logger.warn(error.message);
    return notRun(result, error, options.expectedTests);
  }

  const output = `${result.stdout}\n${result.stderr}`;
  const parsed = parseTestOutput(output);
  const base = {
    command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: result.durationMs,
    executionError: null,
  };

  if (!parsed) {
    if (result.exitCode === 0) {
      logger.warn(`No test summary found in the output of "${command}"`);
      return { ...base, passedCount: 0, failedCount: 0, failureDetails: [] };
    }
    return {
      ...base,
      passedCount: 0,
      failedCount: Math.max(1, options.expectedTests),
      failureDetails: [`exit code ${result.exitCode ?? "unknown"}: ${tail(output).trim()}`],
    };
  }

  let failedCount = parsed.failed;
  const failureDetails = [...parsed.failureDetails];
  if (result.exitCode !== 0 && failedCount === 0) {
    failedCount = 1;
    failureDetails.push(`exit code ${result.exitCode ?? "unknown"} with no failing test reported`);
  }

  logger.info(`${parsed.framework}: ${parsed.passed} passed, ${failedCount} failed`, {
    durationMs: result.durationMs,
  });
  return { ...base, passedCount: parsed.passed, failedCount, failureDetails };
}

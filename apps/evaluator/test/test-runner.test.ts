import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OUTPUT_LIMIT, buildCommandPath, runCommand } from "../src/test-runner/command-runner";
import { runTests } from "../src/test-runner/test-runner";

const FAKE_PYTEST = fileURLToPath(new URL("./fixtures/fake-pytest.mjs", import.meta.url));
const NODE = `"${process.execPath}"`;

describe("runTests", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "reviewloop-tests-"));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("tallies a failing run", async () => {
    const command = `${NODE} "${FAKE_PYTEST}" 0 2`;
    const result = await runTests(command, cwd, { timeoutMs: 10000, expectedTests: 2 });

    expect(result).toMatchObject({
      passedCount: 0,
      failedCount: 2,
      exitCode: 1,
      executionError: null,
      command,
    });
    expect(result.failureDetails).toEqual([
      "FAILED tests/test_bank.py::test_case_1 - assert 50 == 100",
      "FAILED tests/test_bank.py::test_case_2 - assert 50 == 100",
    ]);
  });

  it("tallies a passing run", async () => {
    const result = await runTests(`${NODE} "${FAKE_PYTEST}" 2 0`, cwd, {
      timeoutMs: 10000,
      expectedTests: 2,
    });

    expect(result).toMatchObject({ passedCount: 2, failedCount: 0, exitCode: 0, failureDetails: [] });
  });

  it("counts every expected test as failed when the command cannot start", async () => {
    const result = await runTests("reviewloop-missing-interpreter -q", cwd, {
      timeoutMs: 10000,
      expectedTests: 3,
    });

    expect(result.passedCount).toBe(0);
    expect(result.failedCount).toBe(3);
    expect(result.failureDetails).toHaveLength(1);
    expect(result.executionError).toContain('Could not run "reviewloop-missing-interpreter -q"');
  });

  it("refuses commands with shell operators", async () => {
    const result = await runTests("pytest && echo done", cwd, { timeoutMs: 10000, expectedTests: 2 });

    expect(result.failedCount).toBe(2);
    expect(result.executionError).toBe(
      'Could not run "pytest && echo done": Unsupported command format. Shell operators are not allowed.',
    );
  });

  it("counts a failing exit without a summary as failed", async () => {
    const result = await runTests(`${NODE} -e "process.exit(3)"`, cwd, {
      timeoutMs: 10000,
      expectedTests: 2,
    });

    expect(result).toMatchObject({ passedCount: 0, failedCount: 2, exitCode: 3, executionError: null });
  });
});

describe("buildCommandPath", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "reviewloop-path-"));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("keeps PATH as-is without a virtualenv", () => {
    expect(buildCommandPath(cwd, ["/usr/bin", "", "/bin"].join(delimiter))).toBe(
      ["/usr/bin", "/bin"].join(delimiter),
    );
  });

  it("puts the working tree's virtualenv first", async () => {
    const bin = join(cwd, ".venv", process.platform === "win32" ? "Scripts" : "bin");
    await mkdir(bin, { recursive: true });

    expect(buildCommandPath(cwd, "/usr/bin")).toBe([bin, "/usr/bin"].join(delimiter));
    expect(buildCommandPath(cwd, undefined)).toBe(bin);
  });
});

describe("runCommand", () => {
  it("stops the process when its signal aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const result = await runCommand(`${NODE} -e "setInterval(Number, 1000)"`, tmpdir(), {
      timeoutMs: 10000,
      signal: controller.signal,
    });

    expect(result.exitCode).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.spawnError).toMatch(/aborted/i);
  });

  it("caps output on bytes without splitting multi-byte characters", async () => {
    const result = await runCommand(
      `${NODE} -e "process.stdout.write('\\u00e9'.repeat(${OUTPUT_LIMIT}))"`,
      tmpdir(),
      { timeoutMs: 10000 },
    );

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("\u00e9".repeat(OUTPUT_LIMIT / 2));
  });
});

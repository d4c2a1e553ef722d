import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  MergeRequestHandle,
  ProviderError,
  ProvisioningError,
  parseScenario,
  type Scenario,
  type TestResult,
} from "@reviewloop/core";
import { ScriptedAgentClient } from "@reviewloop/llm";
import { ReviewStateMachine } from "@reviewloop/review";
import { LocalHostingClient } from "@reviewloop/vcs";
import { ScenarioOrchestrator, type ScenarioProvisioner } from "../src/orchestrator";
import type { ProvisionedScenario } from "../src/provisioner";
import { DEFAULT_SCENARIOS_DIR, loadScenarios } from "../src/scenario-registry";

const SEEDED_BANK = [
  "import threading",
  "import time",
  "",
  "",
  "class Account:",
  "    def __init__(self, balance=0):",
  "        self.balance = balance",
  "        self._lock = threading.Lock()",
  "",
  "    def deposit(self, amount):",
  "        # The lock made deposits slow under load",
  "        current = self.balance",
  "        time.sleep(0.01)",
  "        self.balance = current + amount",
  "        return self.balance",
  "",
].join("\n");

const REJECT =
  "<verdict><decision>CHANGES_REQUESTED</decision><risk>HIGH</risk><summary>Deposits race.</summary></verdict>";
const APPROVE =
  "<verdict><decision>APPROVE</decision><risk>LOW</risk><summary>Fine.</summary></verdict>";

const LOCK_FIX = [
  "<suggestions><suggestion>",
  "<file>bank.py</file>",
  "<line>11</line>",
  "<original>",
  "        # The lock made deposits slow under load",
  "        current = self.balance",
  "        time.sleep(0.01)",
  "        self.balance = current + amount",
  "</original>",
  "<replacement>",
  "        with self._lock:",
  "            current = self.balance",
  "            time.sleep(0.01)",
  "            self.balance = current + amount",
  "</replacement>",
  "<rationale>Concurrent deposits lose updates.</rationale>",
  "</suggestion></suggestions>",
].join("\n");

function tally(passed: number, failed: number): TestResult {
  return {
    passedCount: passed,
    failedCount: failed,
    failureDetails: failed > 0 ? ["FAILED tests/test_bank.py::test_two_concurrent_deposits"] : [],
    command: "python -m pytest -q tests",
    exitCode: failed > 0 ? 1 : 0,
    stdout: `${failed > 0 ? `${failed} failed` : `${passed} passed`} in 0.05s`,
    stderr: "",
    durationMs: 50,
    executionError: null,
  };
}

// Bank tests pass once deposit() holds the lock again
async function fakeTests(_scenario: Scenario, workingTree: string): Promise<TestResult> {
  const source = await readFile(join(workingTree, "bank.py"), "utf8");
  return source.includes("with self._lock:") ? tally(2, 0) : tally(0, 2);
}

class FakeProvisioner implements ScenarioProvisioner {
  readonly cleaned: string[] = [];

  constructor(
    private readonly hosting: LocalHostingClient,
    private readonly root: string,
  ) {}

  async provision(scenario: Scenario): Promise<ProvisionedScenario> {
    const workingTree = join(this.root, scenario.id);
    await mkdir(workingTree, { recursive: true });
    await writeFile(join(workingTree, "bank.py"), SEEDED_BANK, "utf8");
    const snapshot = {
      mrId: `${scenario.id}#1`,
      repo: scenario.id,
      sourceBranch: "feat/faster-deposits",
      targetBranch: "main",
      currentLabel: "needs_review" as const,
    };
    this.hosting.seedMergeRequest(snapshot, scenario.seedDiff);
    return {
      scenario,
      workingTree,
      repo: scenario.id,
      baseBranch: "main",
      sourceBranch: snapshot.sourceBranch,
      handle: new MergeRequestHandle(snapshot, () => this.hosting.getDiff(snapshot.mrId)),
      pushSourceBranch: async () => {},
      cleanup: async () => {
        this.cleaned.push(scenario.id);
      },
    };
  }
}

describe("ScenarioOrchestrator", () => {
  let root: string;
  let race: Scenario;
  let hosting: LocalHostingClient;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "reviewloop-orchestrator-"));
    const [loaded] = await loadScenarios(DEFAULT_SCENARIOS_DIR, ["race-condition-deposit"]);
    if (!loaded) {
      throw new Error("race-condition-deposit scenario is missing");
    }
    race = loaded;
    hosting = new LocalHostingClient();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function orchestrator(
    lead: ScriptedAgentClient,
    architect: ScriptedAgentClient,
    provisioner: ScenarioProvisioner = new FakeProvisioner(hosting, root),
    scenarioTimeoutMs = 0,
  ): ScenarioOrchestrator {
    return new ScenarioOrchestrator({
      provisioner,
      reviewer: new ReviewStateMachine({ agents: { lead, architect }, hosting }),
      hosting,
      runTests: fakeTests,
      scenarioTimeoutMs,
    });
  }

  it("passes the race condition scenario once the lock is restored", async () => {
    const provisioner = new FakeProvisioner(hosting, root);
    const runner = orchestrator(
      new ScriptedAgentClient([REJECT]),
      new ScriptedAgentClient([LOCK_FIX]),
      provisioner,
    );

    const outcome = await runner.runScenario(race);

    expect(outcome).toMatchObject({
      scenarioId: "race-condition-deposit",
      category: "PASS",
      errorKind: null,
      scenarioPassed: true,
      mrId: "race-condition-deposit#1",
      finalLabel: "ready_for_merge",
      transitions: ["needs_review", "changes_requested", "ready_for_merge"],
    });
    expect(outcome.verdict).toMatchObject({ decision: "changes_requested", risk: "high" });
    expect(outcome.preFix).toMatchObject({ passedCount: 0, failedCount: 2 });
    expect(outcome.postFix).toMatchObject({ passedCount: 2, failedCount: 0 });
    expect(outcome.patches.map((patch) => patch.status)).toEqual(["applied"]);
    expect(provisioner.cleaned).toEqual(["race-condition-deposit"]);

    const comments = hosting.commentsFor("race-condition-deposit#1");
    expect(comments).toHaveLength(3);
    expect(comments[2]?.body).toContain("🏆 **BENCHMARK PASSED**");
    expect(comments[2]?.body).toContain("| **Pre-Fix** | 🔴 Failed | **0/2** | Submitted code |");
  });

  it("reproduces the pre-fix result when there is nothing to apply", async () => {
    const runner = orchestrator(
      new ScriptedAgentClient([REJECT]),
      new ScriptedAgentClient(["<no-suggestions/>"]),
    );

    const outcome = await runner.runScenario(race);

    expect(outcome.category).toBe("FAIL");
    expect(outcome.patches).toEqual([]);
    expect(outcome.postFix).toEqual(outcome.preFix);
    expect(outcome.finalLabel).toBe("changes_requested");
  });

  it("records exactly one outcome per scenario and keeps going after failures", async () => {
    const provisionFails = parseScenario({ ...race, id: "b-provision", expectedDifficulty: 1 });
    const approvesBug = parseScenario({ ...race, id: "c-approve", expectedDifficulty: 2 });
    const providerDown = parseScenario({ ...race, id: "a-provider", expectedDifficulty: 3 });
    const fake = new FakeProvisioner(hosting, root);
    const provisioner: ScenarioProvisioner = {
      provision: async (scenario) => {
        if (scenario.id === "b-provision") {
          throw new ProvisioningError(scenario.id, "hosting API unavailable");
        }
        return fake.provision(scenario);
      },
    };
    const runner = orchestrator(
      new ScriptedAgentClient([APPROVE, new ProviderError("scripted", "connection refused")]),
      new ScriptedAgentClient([]),
      provisioner,
    );

    const outcomes = await runner.runSuite([providerDown, approvesBug, provisionFails]);

    expect(outcomes.map((outcome) => [outcome.scenarioId, outcome.category, outcome.errorKind])).toEqual([
      ["b-provision", "ERROR", "provisioning"],
      ["c-approve", "FAIL", null],
      ["a-provider", "ERROR", "provider"],
    ]);
    expect(outcomes[1]?.postFix).toMatchObject({ passedCount: 0, failedCount: 2 });
    expect(outcomes[2]?.preFix).toMatchObject({ passedCount: 0, failedCount: 2 });
    expect(outcomes[2]?.errorMessage).toBe("[scripted] connection refused");
    expect(fake.cleaned).toEqual(["c-approve", "a-provider"]);
  });

  it("marks a scenario that exceeds its budget as a timeout", async () => {
    const fake = new FakeProvisioner(hosting, root);
    const slow: ScenarioProvisioner = {
      provision: async (scenario, signal) => {
        await new Promise((resolve) => setTimeout(resolve, 60));
        signal?.throwIfAborted();
        return fake.provision(scenario);
      },
    };
    const runner = orchestrator(new ScriptedAgentClient([]), new ScriptedAgentClient([]), slow, 20);

    const outcome = await runner.runScenario(race);

    expect(outcome).toMatchObject({
      category: "ERROR",
      errorKind: "timeout",
      errorMessage: "scenario race-condition-deposit timed out after 20ms",
      scenarioPassed: false,
      mrId: null,
    });
    expect(hosting.labelWrites).toEqual([]);
  });

  it("stops a timed-out review before it writes and cleans up before returning", async () => {
    const provisioner = new FakeProvisioner(hosting, root);
    const slowLead = new ScriptedAgentClient([
      async () => {
        await new Promise((resolve) => setTimeout(resolve, 250));
        return REJECT;
      },
      REJECT,
    ]);
    const runner = orchestrator(
      slowLead,
      new ScriptedAgentClient([LOCK_FIX, LOCK_FIX]),
      provisioner,
      80,
    );
    const next = parseScenario({ ...race, id: "second-race", expectedDifficulty: race.expectedDifficulty + 1 });
    const quick = new ScenarioOrchestrator({
      provisioner,
      reviewer: new ReviewStateMachine({
        agents: { lead: new ScriptedAgentClient([APPROVE]), architect: new ScriptedAgentClient([]) },
        hosting,
      }),
      hosting,
      runTests: fakeTests,
      scenarioTimeoutMs: 0,
    });

    const outcome = await runner.runScenario(race);
    expect(provisioner.cleaned).toEqual(["race-condition-deposit"]);
    await quick.runScenario(next);

    expect(outcome).toMatchObject({ category: "ERROR", errorKind: "timeout" });
    expect(slowLead.calls).toHaveLength(1);
    expect(hosting.labelWrites).toEqual([{ mrId: "second-race#1", label: "ready_for_merge" }]);
    expect(hosting.commentsFor("race-condition-deposit#1")).toEqual([]);
    expect(await readFile(join(root, "race-condition-deposit", "bank.py"), "utf8")).toBe(SEEDED_BANK);
    expect(provisioner.cleaned).toEqual(["race-condition-deposit", "second-race"]);
  });
});

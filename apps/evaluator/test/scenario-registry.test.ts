import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_SCENARIOS_DIR, ScenarioLoadError, loadScenarios } from "../src/scenario-registry";

describe("loadScenarios", () => {
  it("loads the bundled suite in ascending difficulty", async () => {
    const scenarios = await loadScenarios(DEFAULT_SCENARIOS_DIR);

    expect(scenarios.map((scenario) => [scenario.id, scenario.expectedDifficulty])).toEqual([
      ["deposit-overwrite", 1],
      ["float-interest", 1],
      ["overdraft-check", 2],
      ["race-condition-deposit", 2],
      ["sql-injection-lookup", 3],
    ]);
    expect(Object.isFrozen(scenarios[0])).toBe(true);
  });

  it("restricts the suite to selected ids", async () => {
    const scenarios = await loadScenarios(DEFAULT_SCENARIOS_DIR, ["race-condition-deposit"]);

    expect(scenarios).toHaveLength(1);
    expect(scenarios[0]?.testCommand).toBe("python -m pytest -q tests");
    expect(scenarios[0]?.expectedTests).toBe(2);
  });

  it("rejects unknown ids", async () => {
    await expect(loadScenarios(DEFAULT_SCENARIOS_DIR, ["nope"])).rejects.toThrow(
      "Unknown scenario id(s): nope",
    );
  });

  it("reports the file of an invalid scenario", async () => {
    const dir = await mkdtemp(join(tmpdir(), "reviewloop-scenarios-"));
    try {
      await writeFile(join(dir, "broken.json"), JSON.stringify({ id: "Broken Id" }), "utf8");

      const error = await loadScenarios(dir).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ScenarioLoadError);
      expect(error).toMatchObject({ message: expect.stringContaining("Invalid scenario file broken.json") });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

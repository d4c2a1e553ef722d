import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { compareScenarios, parseScenario, type Scenario } from "@reviewloop/core";

export const DEFAULT_SCENARIOS_DIR = fileURLToPath(new URL("../scenarios", import.meta.url));

export class ScenarioLoadError extends Error {
  constructor(file: string, cause: unknown) {
    super(`Invalid scenario file ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "ScenarioLoadError";
  }
}

/**
 * Loads every `*.json` scenario in `dir`, sorted for the suite. `only`
 * restricts the result to the given ids; unknown ids are an error.
 */
export async function loadScenarios(dir: string, only: readonly string[] = []): Promise<Scenario[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith(".json")).sort();
  const scenarios: Scenario[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    let scenario: Scenario;
    try {
      scenario = parseScenario(JSON.parse(await readFile(join(dir, file), "utf8")));
    } catch (error) {
      throw new ScenarioLoadError(file, error);
    }
    if (seen.has(scenario.id)) {
      throw new ScenarioLoadError(file, new Error(`duplicate scenario id ${scenario.id}`));
    }
    seen.add(scenario.id);
    scenarios.push(scenario);
  }

  const unknown = only.filter((id) => !seen.has(id));
  if (unknown.length > 0) {
    throw new Error(`Unknown scenario id(s): ${unknown.join(", ")}`);
  }
  const selected = only.length > 0 ? scenarios.filter((scenario) => only.includes(scenario.id)) : scenarios;
  return selected.sort(compareScenarios);
}

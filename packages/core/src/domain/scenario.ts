import { z } from "zod";

const FileMap = z.record(z.string().min(1), z.string());

// Synthetic MR scenario used by the evaluation suite
export const ScenarioSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9._-]*$/, "scenario id must be a lowercase slug"),
  title: z.string().min(1),
  description: z.string(),
  baseFiles: FileMap, // "before" state, including the verifying tests
  seedDiff: z.string().min(1), // the junior's change as a unified diff
  ctoInstructions: z.string(),
  testCommand: z.string().min(1),
  expectedDifficulty: z.number().int().positive(),
  expectedTests: z.number().int().positive(), // minimum passing tests after the fix
  branch: z.string().min(1).optional(),
});
export type Scenario = Readonly<z.infer<typeof ScenarioSchema>>;

export function parseScenario(raw: unknown): Scenario {
  return Object.freeze(ScenarioSchema.parse(raw));
}

// Suite order: ascending difficulty, ties broken by id
export function compareScenarios(left: Scenario, right: Scenario): number {
  if (left.expectedDifficulty !== right.expectedDifficulty) {
    return left.expectedDifficulty - right.expectedDifficulty;
  }
  return left.id.localeCompare(right.id);
}

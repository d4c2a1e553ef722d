import { z } from "zod";
import { ReviewVerdictSchema, SuggestionSchema } from "./review";
import { TestResultSchema } from "./test-result";

export const OutcomeCategory = z.enum(["PASS", "FAIL", "ERROR"]);
export type OutcomeCategory = z.infer<typeof OutcomeCategory>;

export const ErrorKind = z.enum(["provider", "provisioning", "hosting", "timeout", "unknown"]);
export type ErrorKind = z.infer<typeof ErrorKind>;

export const PatchStatus = z.enum(["applied", "unapplied"]);
export type PatchStatus = z.infer<typeof PatchStatus>;

export const PatchResultSchema = z.object({
  suggestion: SuggestionSchema,
  status: PatchStatus,
  match: z.enum(["exact", "fuzzy"]).nullable(),
  line: z.number().int().positive().nullable(), // first replaced line
  reason: z.enum(["file_not_found", "read_failed", "no_match", "write_failed"]).nullable(),
});
export type PatchResult = z.infer<typeof PatchResultSchema>;

export const ScenarioOutcomeSchema = z.object({
  scenarioId: z.string(),
  category: OutcomeCategory,
  errorKind: ErrorKind.nullable(),
  errorMessage: z.string().nullable(),
  verdict: ReviewVerdictSchema.nullable(),
  verdictParsed: z.boolean(),
  suggestions: z.array(SuggestionSchema),
  patches: z.array(PatchResultSchema),
  preFix: TestResultSchema.nullable(),
  postFix: TestResultSchema.nullable(),
  scenarioPassed: z.boolean(),
  mrId: z.string().nullable(),
  mrUrl: z.string().nullable(),
  finalLabel: z.string().nullable(),
  transitions: z.array(z.string()),
  durationMs: z.number().nonnegative(),
});
export type ScenarioOutcome = z.infer<typeof ScenarioOutcomeSchema>;

export interface OutcomeCounts {
  total: number;
  pass: number;
  fail: number;
  error: number;
}

export function countOutcomes(outcomes: readonly ScenarioOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { total: outcomes.length, pass: 0, fail: 0, error: 0 };
  for (const outcome of outcomes) {
    switch (outcome.category) {
      case "PASS":
        counts.pass += 1;
        break;
      case "FAIL":
        counts.fail += 1;
        break;
      case "ERROR":
        counts.error += 1;
        break;
    }
  }
  return counts;
}

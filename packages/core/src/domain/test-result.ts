import { z } from "zod";

export const TestResultSchema = z.object({
  passedCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  failureDetails: z.array(z.string()),
  command: z.string(),
  exitCode: z.number().int().nullable(),
  stdout: z.string(),
  stderr: z.string(),
  durationMs: z.number().nonnegative(),
  executionError: z.string().nullable(), // set when the command could not run at all
});
export type TestResult = z.infer<typeof TestResultSchema>;

export function isGreen(result: TestResult): boolean {
  return result.failedCount === 0 && result.passedCount > 0;
}

export function formatScore(result: TestResult): string {
  const total = result.passedCount + result.failedCount;
  return `${result.passedCount}/${total}`;
}

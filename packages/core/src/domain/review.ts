import { z } from "zod";

// Lead decision
export const ReviewDecision = z.enum(["approve", "changes_requested", "ready_for_merge"]);
export type ReviewDecision = z.infer<typeof ReviewDecision>;

// Risk level reported by the Lead
export const RiskLevel = z.enum(["low", "medium", "high"]);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const ReviewVerdictSchema = z.object({
  decision: ReviewDecision,
  risk: RiskLevel,
  summary: z.string(),
  rawResponse: z.string(), // kept for audit when parsing falls back
  architectInstructions: z.string().optional(),
});
export type ReviewVerdict = z.infer<typeof ReviewVerdictSchema>;

export const SuggestionSchema = z.object({
  filePath: z.string().min(1),
  lineAnchor: z.number().int().nonnegative(), // 1-based; 0 = unknown
  originalSnippet: z.string().min(1),
  proposedSnippet: z.string(),
  rationale: z.string(),
});
export type Suggestion = z.infer<typeof SuggestionSchema>;

export function isApprovingDecision(decision: ReviewDecision): boolean {
  return decision === "approve" || decision === "ready_for_merge";
}

// The fallback verdict used when the Lead output cannot be parsed
export function defaultVerdict(rawResponse: string): ReviewVerdict {
  return {
    decision: "changes_requested",
    risk: "high",
    summary: "",
    rawResponse,
  };
}

import {
  ParseError,
  defaultVerdict,
  type ReviewDecision,
  type ReviewVerdict,
  type RiskLevel,
} from "@reviewloop/core";
import { VERDICT_TAGS, extractTag, normalizeToken, stripCodeFences, unwrapBlock } from "./tags";

export type VerdictParseResult =
  | { kind: "parsed"; verdict: ReviewVerdict; pass: "primary" | "fallback" }
  | { kind: "default"; verdict: ReviewVerdict; rawText: string; error: ParseError };

const DECISION_TOKENS: Record<string, ReviewDecision> = {
  approve: "approve",
  approved: "approve",
  lgtm: "approve",
  changes_requested: "changes_requested",
  request_changes: "changes_requested",
  block: "changes_requested",
  blocked: "changes_requested",
  reject: "changes_requested",
  ready_for_merge: "ready_for_merge",
};

// Hosting label names the older prompts produced
const STATUS_LABEL_TOKENS: Record<string, ReviewDecision> = {
  ready_for_merge: "ready_for_merge",
  changes_requested: "changes_requested",
  needs_review: "changes_requested",
};

const RISK_TOKENS: Record<string, RiskLevel> = {
  low: "low",
  medium: "medium",
  moderate: "medium",
  high: "high",
  critical: "high",
};

function lookup<T>(table: Record<string, T>, raw: string | null): T | undefined {
  if (raw === null) {
    return undefined;
  }
  const token = normalizeToken(raw);
  return Object.hasOwn(table, token) ? table[token] : undefined;
}

function optionalText(raw: string | null): string | undefined {
  const value = raw === null ? "" : unwrapBlock(raw).trim();
  return value.length > 0 ? value : undefined;
}

// Exact grammar: a lowercase <verdict> block with a decision and a risk inside
function primaryPass(text: string): ReviewVerdict | null {
  const block = extractTag(text, VERDICT_TAGS.block);
  if (block === null) {
    return null;
  }
  const decision = lookup(DECISION_TOKENS, extractTag(block, VERDICT_TAGS.decision));
  const risk = lookup(RISK_TOKENS, extractTag(block, VERDICT_TAGS.risk));
  if (!decision || !risk) {
    return null;
  }
  return {
    decision,
    risk,
    summary: optionalText(extractTag(block, VERDICT_TAGS.summary)) ?? "",
    rawResponse: text,
    architectInstructions: optionalText(extractTag(block, VERDICT_TAGS.architectInstructions)),
  };
}

// Stricter extraction: no fences, any tag case, tags anywhere in the text
function fallbackPass(text: string): ReviewVerdict | null {
  const cleaned = stripCodeFences(text);
  const decision =
    lookup(DECISION_TOKENS, extractTag(cleaned, VERDICT_TAGS.decision, true)) ??
    lookup(STATUS_LABEL_TOKENS, extractTag(cleaned, VERDICT_TAGS.statusLabel, true));
  if (!decision) {
    return null;
  }
  return {
    decision,
    risk: lookup(RISK_TOKENS, extractTag(cleaned, VERDICT_TAGS.risk, true)) ?? "high",
    summary: optionalText(extractTag(cleaned, VERDICT_TAGS.summary, true)) ?? "",
    rawResponse: text,
    architectInstructions: optionalText(
      extractTag(cleaned, VERDICT_TAGS.architectInstructions, true),
    ),
  };
}

/**
 * Parses the Lead response. Never throws: unparseable text yields the default
 * verdict (changes_requested, high risk, empty summary) with the raw text kept.
 */
export function parseVerdict(text: string): VerdictParseResult {
  const primary = primaryPass(text);
  if (primary) {
    return { kind: "parsed", verdict: primary, pass: "primary" };
  }
  const fallback = fallbackPass(text);
  if (fallback) {
    return { kind: "parsed", verdict: fallback, pass: "fallback" };
  }
  return {
    kind: "default",
    verdict: defaultVerdict(text),
    rawText: text,
    error: new ParseError("no recognizable verdict tags in Lead response", text),
  };
}

import { createTwoFilesPatch } from "diff";
import type { PatchResult, ReviewLabel, ReviewVerdict, Suggestion } from "@reviewloop/core";
import { HOSTING_LABEL_NAMES } from "@reviewloop/vcs";

const decisionEmoji: Record<ReviewVerdict["decision"], string> = {
  approve: "✅",
  ready_for_merge: "✅",
  changes_requested: "❌",
};

const decisionLabel: Record<ReviewVerdict["decision"], string> = {
  approve: "Approved",
  ready_for_merge: "Ready for merge",
  changes_requested: "Changes Requested",
};

const riskEmoji: Record<ReviewVerdict["risk"], string> = {
  low: "🟢",
  medium: "🟡",
  high: "🔴",
};

// Top-level comment carrying the Lead verdict
export function formatLeadComment(
  verdict: ReviewVerdict,
  options: { parsed: boolean; label: ReviewLabel; suggestionCount: number },
): string {
  let comment = `## ${decisionEmoji[verdict.decision]} Lead Review: ${decisionLabel[verdict.decision]}\n\n`;
  comment += `**Risk:** ${riskEmoji[verdict.risk]} ${verdict.risk}\n`;
  comment += `**Status:** \`${HOSTING_LABEL_NAMES[options.label]}\`\n\n`;

  if (verdict.summary) {
    comment += `${verdict.summary}\n\n`;
  }

  if (!options.parsed) {
    comment += "> ⚠️ The Lead response could not be parsed; defaulting to changes requested.\n\n";
    comment += "<details><summary>Raw response</summary>\n\n```\n";
    comment += `${verdict.rawResponse.slice(0, 4000)}\n`;
    comment += "```\n</details>\n\n";
  }

  if (options.suggestionCount > 0) {
    comment += `The Architect left ${options.suggestionCount} inline suggestion${options.suggestionCount === 1 ? "" : "s"}.\n\n`;
  }

  comment += "---\n";
  comment += "_Reviewed by reviewloop_\n";
  return comment;
}

function suggestionDiff(suggestion: Suggestion): string {
  return createTwoFilesPatch(
    suggestion.filePath,
    suggestion.filePath,
    `${suggestion.originalSnippet.replace(/\n+$/, "")}\n`,
    `${suggestion.proposedSnippet.replace(/\n+$/, "")}\n`,
    "",
    "",
    { context: 3 },
  )
    .split("\n")
    .filter((line) => !line.startsWith("===") && !line.startsWith("Index:"))
    .join("\n")
    .trim();
}

// Inline comment for one Architect suggestion
export function formatSuggestionComment(suggestion: Suggestion, patch?: PatchResult): string {
  let comment = "**🛠 Suggested fix**";
  if (patch) {
    comment +=
      patch.status === "applied"
        ? ` (applied, ${patch.match ?? "exact"} match)`
        : ` (not applied: ${patch.reason ?? "unknown"})`;
  }
  comment += "\n\n";
  if (suggestion.rationale) {
    comment += `${suggestion.rationale}\n\n`;
  }
  comment += "```diff\n";
  comment += `${suggestionDiff(suggestion)}\n`;
  comment += "```\n";
  return comment;
}

// Used when the hosting service rejects the inline position
export function formatDetachedSuggestionComment(
  suggestion: Suggestion,
  line: number,
  patch?: PatchResult,
): string {
  return `\`${suggestion.filePath}:${line}\`\n\n${formatSuggestionComment(suggestion, patch)}`;
}

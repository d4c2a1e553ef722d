import type { ReviewVerdict, Suggestion } from "@reviewloop/core";

const MAX_DIFF_CHARS = 20000;

function truncateDiff(diff: string): string {
  return diff.length > MAX_DIFF_CHARS
    ? `${diff.slice(0, MAX_DIFF_CHARS)}\n... (truncated)`
    : diff;
}

export const LEAD_SYSTEM_PROMPT = `
You are a Senior Technical Lead reviewing a merge request at a financial institution.
Your job is not to fix syntax but to judge correctness, architectural integrity and risk.

Answer with exactly one block in this format and nothing else:

<verdict>
<decision>APPROVE | CHANGES_REQUESTED</decision>
<risk>LOW | MEDIUM | HIGH</risk>
<summary>
Two to four sentences for the MR author: what the change does and what is wrong with it.
</summary>
<architect_instructions>
Directives for the code reviewer who writes the fixes: what to hunt for and where.
</architect_instructions>
</verdict>

Rules:
1. APPROVE only when the change is correct as submitted.
2. HIGH risk means data loss, corruption, security exposure or a production outage.
3. Do not output markdown or code fences.
`.trim();

export const ARCHITECT_SYSTEM_PROMPT = `
You are a Principal Software Architect. You received a diff and directives from your Tech Lead.
Find at most the three most critical defects and rewrite the offending code.

Only report code that will crash, corrupt data (race conditions, logic errors, float money math),
open a security hole or leak resources. Ignore style, naming and minor optimizations.

Answer in this format and nothing else:

<suggestions>
<suggestion>
<file>path/relative/to/repo.py</file>
<line>line number of the first original line in the new version of the file</line>
<original>
exact lines from the file, with their indentation
</original>
<replacement>
the corrected lines, same indentation, no comments explaining the fix
</replacement>
<rationale>one sentence on why the original breaks in production</rationale>
</suggestion>
</suggestions>

If nothing needs fixing, answer <no-suggestions/>.
Keep function names, signatures and overall structure unchanged.
`.trim();

// What the last review of the same merge request found
export interface PreviousReview {
  verdict: ReviewVerdict;
  suggestions: Suggestion[];
}

export interface LeadPromptInput {
  title: string;
  description: string;
  ctoInstructions: string;
  diff: string;
  previous?: PreviousReview;
}

function formatPreviousReview(previous: PreviousReview): string {
  const lines = [
    "## Previous review",
    `Decision: ${previous.verdict.decision} (risk ${previous.verdict.risk})`,
    previous.verdict.summary || "(the Lead gave no summary)",
  ];
  if (previous.suggestions.length > 0) {
    lines.push("", "Previously reported issues:");
    previous.suggestions.forEach((suggestion, index) => {
      const location = suggestion.lineAnchor > 0
        ? `${suggestion.filePath}:${suggestion.lineAnchor}`
        : suggestion.filePath;
      lines.push(`${index + 1}. ${location}: ${suggestion.rationale || "(no rationale)"}`);
    });
  }
  lines.push("", "Check whether this commit fixes these issues or introduces new ones.");
  return lines.join("\n");
}

export function buildLeadPrompt(input: LeadPromptInput): string {
  const previous = input.previous ? `\n\n${formatPreviousReview(input.previous)}` : "";
  return `
## Merge request
Title: ${input.title}

${input.description || "(no description)"}

## Review brief from the CTO
${input.ctoInstructions || "(none)"}${previous}

## Diff
\`\`\`diff
${truncateDiff(input.diff)}
\`\`\`
`.trim();
}

export interface ArchitectPromptInput {
  verdict: ReviewVerdict;
  ctoInstructions: string;
  diff: string;
}

export function buildArchitectPrompt(input: ArchitectPromptInput): string {
  const sections = [
    "## Tech Lead summary",
    input.verdict.summary || "(the Lead gave no summary)",
    "",
    `Risk: ${input.verdict.risk}`,
  ];
  if (input.verdict.architectInstructions) {
    sections.push("", "## Directives from the Tech Lead", input.verdict.architectInstructions);
  }
  sections.push(
    "",
    "## Review brief from the CTO",
    input.ctoInstructions || "(none)",
    "",
    "## Diff",
    "```diff",
    truncateDiff(input.diff),
    "```",
  );
  return sections.join("\n");
}

// Tag names shared with the prompt templates

export const VERDICT_TAGS = {
  block: "verdict",
  decision: "decision",
  risk: "risk",
  summary: "summary",
  architectInstructions: "architect_instructions",
  // Older prompts emitted a hosting label instead of a decision
  statusLabel: "status_label",
} as const;

export const SUGGESTION_TAGS = {
  block: "suggestions",
  entry: "suggestion",
  file: "file",
  line: "line",
  original: "original",
  replacement: "replacement",
  rationale: "rationale",
  none: "no-suggestions",
} as const;

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
}

function tagPattern(tag: string, caseInsensitive: boolean, global = false): RegExp {
  const name = escapeTag(tag);
  const flags = `${caseInsensitive ? "i" : ""}${global ? "g" : ""}`;
  return new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}\\s*>`, flags);
}

// Inner text of the first <tag>...</tag>, or null
export function extractTag(text: string, tag: string, caseInsensitive = false): string | null {
  const match = text.match(tagPattern(tag, caseInsensitive));
  return match?.[1] ?? null;
}

export function extractAllTags(text: string, tag: string, caseInsensitive = false): string[] {
  return Array.from(text.matchAll(tagPattern(tag, caseInsensitive, true)), (match) => match[1] ?? "");
}

export function hasEmptyTag(text: string, tag: string, caseInsensitive = false): boolean {
  const name = escapeTag(tag);
  return new RegExp(`<${name}\\s*/>`, caseInsensitive ? "i" : "").test(text);
}

// Drop markdown fence lines anywhere in the text
export function stripCodeFences(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !/^\s*```[\w-]*\s*$/.test(line))
    .join("\n");
}

/**
 * Tag bodies usually start and end with a newline. Drop exactly one on each side
 * plus a fence wrapped around the whole body; indentation inside is kept.
 */
export function unwrapBlock(body: string): string {
  let value = body.replace(/^[ \t]*\r?\n/, "").replace(/\r?\n[ \t]*$/, "");
  const fenced = value.match(/^\s*```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n\s*```\s*$/);
  if (fenced) {
    value = fenced[1] ?? "";
  }
  return value;
}

// APPROVE / changes-requested / Ready For Merge -> approve / changes_requested / ready_for_merge
export function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, "_").replace(/[`*"'.]/g, "");
}

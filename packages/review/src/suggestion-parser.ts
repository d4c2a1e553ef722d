import { ParseError, SuggestionSchema, type Suggestion } from "@reviewloop/core";
import {
  SUGGESTION_TAGS,
  extractAllTags,
  extractTag,
  hasEmptyTag,
  stripCodeFences,
  unwrapBlock,
} from "./tags";

export type SuggestionParseResult =
  | { kind: "parsed"; suggestions: Suggestion[]; skipped: ParseError[] }
  | { kind: "default"; suggestions: []; rawText: string; error: ParseError };

function parseAnchor(raw: string | null): number {
  const match = raw?.match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : 0;
}

function parseEntry(body: string, index: number, caseInsensitive: boolean): Suggestion | ParseError {
  const read = (tag: string) => extractTag(body, tag, caseInsensitive);
  const candidate = {
    filePath: (read(SUGGESTION_TAGS.file) ?? "").trim().replace(/^\.?\//, ""),
    lineAnchor: parseAnchor(read(SUGGESTION_TAGS.line)),
    originalSnippet: unwrapBlock(read(SUGGESTION_TAGS.original) ?? ""),
    proposedSnippet: unwrapBlock(read(SUGGESTION_TAGS.replacement) ?? ""),
    rationale: unwrapBlock(read(SUGGESTION_TAGS.rationale) ?? "").trim(),
  };
  const parsed = SuggestionSchema.safeParse(candidate);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    return new ParseError(`suggestion ${index + 1} is missing ${fields}`, body);
  }
  return parsed.data;
}

function collect(entries: string[], caseInsensitive: boolean): SuggestionParseResult {
  const suggestions: Suggestion[] = [];
  const skipped: ParseError[] = [];
  entries.forEach((body, index) => {
    const entry = parseEntry(body, index, caseInsensitive);
    if (entry instanceof ParseError) {
      skipped.push(entry);
    } else {
      suggestions.push(entry);
    }
  });
  return { kind: "parsed", suggestions, skipped };
}

/**
 * Parses the Architect response into an ordered list of suggestions. An empty
 * list is a valid answer. Entries missing a file or an original snippet are
 * skipped and reported; the parser never throws.
 */
export function parseSuggestions(text: string): SuggestionParseResult {
  const block = extractTag(text, SUGGESTION_TAGS.block);
  if (block !== null) {
    return collect(extractAllTags(block, SUGGESTION_TAGS.entry), false);
  }
  if (hasEmptyTag(text, SUGGESTION_TAGS.none) || hasEmptyTag(text, SUGGESTION_TAGS.block)) {
    return { kind: "parsed", suggestions: [], skipped: [] };
  }

  // Stricter pass over the whole text
  const cleaned = stripCodeFences(text);
  const entries = extractAllTags(cleaned, SUGGESTION_TAGS.entry, true);
  if (entries.length > 0) {
    return collect(entries, true);
  }
  if (hasEmptyTag(cleaned, SUGGESTION_TAGS.none, true)) {
    return { kind: "parsed", suggestions: [], skipped: [] };
  }
  return {
    kind: "default",
    suggestions: [],
    rawText: text,
    error: new ParseError("no recognizable suggestion tags in Architect response", text),
  };
}

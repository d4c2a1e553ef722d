import {
  PatchApplicationError,
  createNullLogger,
  describeError,
  type Logger,
  type PatchResult,
  type Suggestion,
} from "@reviewloop/core";
import { normalizeWhitespace, similarityRatio } from "./similarity";
import type { Workspace } from "./workspace";

export const FUZZY_WINDOW_LINES = 5;
export const SIMILARITY_THRESHOLD = 0.85;

export interface SnippetMatch {
  kind: "exact" | "fuzzy";
  start: number; // character offset
  end: number;
  line: number; // 1-based line of the first replaced character
  // Indent to apply to the replacement (fuzzy matches only)
  reindent?: { from: string; to: string };
}

function lineAt(content: string, offset: number): number {
  let line = 1;
  for (let index = 0; index < offset; index++) {
    if (content.charCodeAt(index) === 10) {
      line += 1;
    }
  }
  return line;
}

function distance(line: number, anchor: number): number {
  return anchor > 0 ? Math.abs(line - anchor) : line;
}

function findExact(content: string, snippet: string, anchor: number): SnippetMatch | null {
  let best: SnippetMatch | null = null;
  let from = content.indexOf(snippet);
  while (from !== -1) {
    const line = lineAt(content, from);
    if (!best || distance(line, anchor) < distance(best.line, anchor)) {
      best = { kind: "exact", start: from, end: from + snippet.length, line };
    }
    from = content.indexOf(snippet, from + 1);
  }
  return best;
}

function leadingIndent(lines: readonly string[]): string {
  const first = lines.find((line) => line.trim().length > 0) ?? "";
  return first.match(/^[ \t]*/)?.[0] ?? "";
}

function lineOffsets(lines: readonly string[]): number[] {
  const offsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    offsets.push(offset);
    offset += line.length + 1;
  }
  return offsets;
}

// Line window of the snippet's height within +-5 lines of the anchor
function findFuzzy(content: string, snippet: string, anchor: number): SnippetMatch | null {
  if (anchor <= 0) {
    return null;
  }
  const lines = content.split("\n");
  const snippetLines = snippet.replace(/\n+$/, "").split("\n");
  const height = snippetLines.length;
  const target = normalizeWhitespace(snippet);
  if (target.length === 0) {
    return null;
  }

  const offsets = lineOffsets(lines);
  const firstStart = Math.max(1, anchor - FUZZY_WINDOW_LINES);
  const lastStart = Math.min(lines.length - height + 1, anchor + FUZZY_WINDOW_LINES);

  let best: { start: number; score: number } | null = null;
  for (let start = firstStart; start <= lastStart; start++) {
    const window = lines.slice(start - 1, start - 1 + height);
    const candidate = normalizeWhitespace(window.join("\n"));
    const score = candidate === target ? 1 : similarityRatio(candidate, target);
    if (score < SIMILARITY_THRESHOLD) {
      continue;
    }
    if (
      !best ||
      score > best.score ||
      (score === best.score && Math.abs(start - anchor) < Math.abs(best.start - anchor))
    ) {
      best = { start, score };
    }
  }
  if (!best) {
    return null;
  }

  const window = lines.slice(best.start - 1, best.start - 1 + height);
  const lastLine = window[window.length - 1] ?? "";
  const startOffset = offsets[best.start - 1] ?? 0;
  const endOffset = (offsets[best.start - 2 + height] ?? startOffset) + lastLine.length;
  return {
    kind: "fuzzy",
    start: startOffset,
    end: endOffset,
    line: best.start,
    reindent: { from: leadingIndent(snippetLines), to: leadingIndent(window) },
  };
}

export function locateSnippet(content: string, snippet: string, anchor: number): SnippetMatch | null {
  const exact = findExact(content, snippet, anchor);
  if (exact) {
    return exact;
  }
  // Models often pad snippets with blank lines
  const trimmed = snippet.replace(/^(?:[ \t]*\n)+/, "").replace(/(?:\n[ \t]*)+$/, "");
  if (trimmed.length > 0 && trimmed !== snippet) {
    const trimmedExact = findExact(content, trimmed, anchor);
    if (trimmedExact) {
      return trimmedExact;
    }
  }
  return findFuzzy(content, trimmed.length > 0 ? trimmed : snippet, anchor);
}

function reindentBlock(text: string, from: string, to: string): string {
  if (from === to) {
    return text;
  }
  return text
    .split("\n")
    .map((line) => (line.startsWith(from) ? to + line.slice(from.length) : line))
    .join("\n");
}

export function replaceMatch(content: string, match: SnippetMatch, replacement: string): string {
  const text = match.reindent
    ? reindentBlock(replacement.replace(/\n+$/, ""), match.reindent.from, match.reindent.to)
    : replacement;
  return content.slice(0, match.start) + text + content.slice(match.end);
}

function unapplied(
  suggestion: Suggestion,
  reason: NonNullable<PatchResult["reason"]>,
): PatchResult {
  return { suggestion, status: "unapplied", match: null, line: null, reason };
}

/**
 * Applies each suggestion in order against the current file contents. A
 * suggestion that cannot be located is recorded as unapplied and the rest of
 * the batch continues.
 */
export async function applySuggestions(
  workspace: Workspace,
  suggestions: readonly Suggestion[],
  logger: Logger = createNullLogger("patcher"),
): Promise<PatchResult[]> {
  const results: PatchResult[] = [];

  for (const suggestion of suggestions) {
    let content: string | null;
    try {
      content = await workspace.readFile(suggestion.filePath);
    } catch (error) {
      logger.warn(`Suggestion unapplied: read failed: ${describeError(error)}`, {
        filePath: suggestion.filePath,
      });
      results.push(unapplied(suggestion, "read_failed"));
      continue;
    }
    if (content === null) {
      const error = new PatchApplicationError(suggestion.filePath, "file not found");
      logger.warn(`Suggestion unapplied: ${error.message}`, { filePath: suggestion.filePath });
      results.push(unapplied(suggestion, "file_not_found"));
      continue;
    }

    const match = locateSnippet(content, suggestion.originalSnippet, suggestion.lineAnchor);
    if (!match) {
      const error = new PatchApplicationError(
        suggestion.filePath,
        `original snippet not found near line ${suggestion.lineAnchor}`,
      );
      logger.warn(`Suggestion unapplied: ${error.message}`, { filePath: suggestion.filePath });
      results.push(unapplied(suggestion, "no_match"));
      continue;
    }

    try {
      await workspace.writeFile(
        suggestion.filePath,
        replaceMatch(content, match, suggestion.proposedSnippet),
      );
    } catch (error) {
      logger.warn(`Suggestion unapplied: write failed: ${describeError(error)}`, {
        filePath: suggestion.filePath,
      });
      results.push(unapplied(suggestion, "write_failed"));
      continue;
    }

    logger.debug(`Applied ${match.kind} match`, {
      filePath: suggestion.filePath,
      line: match.line,
    });
    results.push({
      suggestion,
      status: "applied",
      match: match.kind,
      line: match.line,
      reason: null,
    });
  }

  return results;
}

import { diffChars } from "diff";

// 2*M/T over a character diff, where M counts unchanged characters
export function similarityRatio(left: string, right: string): number {
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }
  let matched = 0;
  for (const change of diffChars(left, right)) {
    if (!change.added && !change.removed) {
      matched += change.value.length;
    }
  }
  return (2 * matched) / total;
}

// Trim each line and collapse inner whitespace runs
export function normalizeWhitespace(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/\s+/g, " "))
    .filter((line) => line.length > 0)
    .join("\n");
}

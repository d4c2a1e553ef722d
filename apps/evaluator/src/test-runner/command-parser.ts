// Test commands run without a shell, so pipes, redirects and chaining are refused
export const SHELL_CONTROL_PATTERN = /&&|\|\||[|;&<>`]/;

export interface ParsedCommand {
  executable: string;
  args: string[];
  env: Record<string, string>;
}

// One argument: quoted runs, escaped characters and plain characters, back to back
const WORD = /(?:"(?:[^"\\]|\\[\s\S])*"|'[^']*'|\\[\s\S]|[^\s"'\\])+/y;
const SEGMENT = /"((?:[^"\\]|\\[\s\S])*)"|'([^']*)'|\\([\s\S])|([^\s"'\\]+)/g;
const ENV_ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=([\s\S]*)$/;

function unquote(word: string): string {
  let value = "";
  for (const [, doubleQuoted, singleQuoted, escaped, bare] of word.matchAll(SEGMENT)) {
    if (doubleQuoted !== undefined) {
      value += doubleQuoted.replace(/\\(["\\$`\n])/g, "$1");
    } else {
      value += singleQuoted ?? escaped ?? bare ?? "";
    }
  }
  return value;
}

// null on an unterminated quote or a trailing backslash
function splitWords(command: string): string[] | null {
  const words: string[] = [];
  let index = 0;
  while (index < command.length) {
    if (/\s/.test(command.charAt(index))) {
      index += 1;
      continue;
    }
    WORD.lastIndex = index;
    const match = WORD.exec(command);
    if (!match) {
      return null;
    }
    words.push(unquote(match[0]));
    index = WORD.lastIndex;
  }
  return words;
}

// `CI=1 python -m pytest -q tests` -> python ["-m", "pytest", "-q", "tests"] with CI=1
export function parseCommand(command: string): ParsedCommand | null {
  const trimmed = command.trim();
  if (!trimmed || SHELL_CONTROL_PATTERN.test(trimmed)) {
    return null;
  }

  const words = splitWords(trimmed);
  if (!words) {
    return null;
  }

  const env: Record<string, string> = {};
  let position = 0;
  for (const word of words) {
    const assignment = ENV_ASSIGNMENT.exec(word);
    if (!assignment) {
      break;
    }
    env[assignment[1] ?? ""] = assignment[2] ?? "";
    position += 1;
  }

  const [executable, ...args] = words.slice(position);
  return executable ? { executable, args, env } : null;
}

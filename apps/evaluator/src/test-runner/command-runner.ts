import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { delimiter, join } from "node:path";
import { parseCommand } from "./command-parser";

export interface CommandResult {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  // Set when the process never started (bad syntax, missing executable)
  spawnError: string | null;
}

// Bytes kept per stream
export const OUTPUT_LIMIT = 200_000;
const KILL_GRACE_MS = 2000;

// A virtualenv inside the working tree wins over the interpreter on PATH
export function buildCommandPath(cwd: string, currentPath: string | undefined): string {
  const entries = (currentPath ?? "").split(delimiter).filter((entry) => entry.trim().length > 0);
  const venvBin = join(cwd, ".venv", process.platform === "win32" ? "Scripts" : "bin");
  if (existsSync(venvBin) && !entries.includes(venvBin)) {
    entries.unshift(venvBin);
  }
  return entries.join(delimiter);
}

// Keeps raw bytes up to the limit; decoding once avoids splitting multi-byte characters
class CappedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  append(chunk: Buffer): void {
    const room = OUTPUT_LIMIT - this.size;
    if (room <= 0) {
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

export async function runCommand(
  command: string,
  cwd: string,
  options: { timeoutMs: number; env?: Record<string, string>; signal?: AbortSignal },
): Promise<CommandResult> {
  const startedAt = Date.now();
  const parsed = parseCommand(command);
  if (!parsed) {
    return {
      command,
      exitCode: null,
      stdout: "",
      stderr: "",
      durationMs: 0,
      timedOut: false,
      spawnError: "Unsupported command format. Shell operators are not allowed.",
    };
  }

  const env: NodeJS.ProcessEnv = { ...process.env, ...options.env, ...parsed.env };
  env.PATH = buildCommandPath(cwd, env.PATH);

  const stdout = new CappedOutput();
  const stderr = new CappedOutput();
  let timedOut = false;

  return new Promise((resolve) => {
    // Aborting kills the process; the abort surfaces as a spawn error
    const child = spawn(parsed.executable, parsed.args, { cwd, env, signal: options.signal });

    // SIGTERM first; SIGKILL if the process ignores it
    const timer =
      options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
            setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS).unref();
          }, options.timeoutMs)
        : undefined;

    let settled = false;
    const settle = (exitCode: number | null, spawnError: string | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      resolve({
        command,
        exitCode,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs: Date.now() - startedAt,
        timedOut,
        spawnError,
      });
    };

    child.stdout.on("data", (chunk: Buffer) => stdout.append(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.append(chunk));
    child.on("close", (code) => settle(code, null));
    child.on("error", (error) => settle(null, error.message));
  });
}

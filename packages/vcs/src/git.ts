import { spawn } from "node:child_process";

// Result of git operation
export interface GitResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export const GIT_AUTHOR_NAME = "reviewloop";
export const GIT_AUTHOR_EMAIL = "bot@reviewloop.local";

const DEFAULT_GIT_TIMEOUT_MS = 900000;

export interface GitOptions {
  // Piped to stdin
  input?: string;
  timeoutMs?: number;
}

function gitTimeoutFromEnv(env: NodeJS.ProcessEnv): number {
  const raw = Number.parseInt(env.REVIEWLOOP_GIT_TIMEOUT_MS ?? "", 10);
  return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_GIT_TIMEOUT_MS;
}

export async function execGit(args: string[], cwd: string, options: GitOptions = {}): Promise<GitResult> {
  const timeoutMs = options.timeoutMs ?? gitTimeoutFromEnv(process.env);
  const child = spawn("git", args, {
    cwd,
    env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
  });

  const out: Buffer[] = [];
  const err: Buffer[] = [];
  child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
  child.stderr.on("data", (chunk: Buffer) => err.push(chunk));

  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    child.kill("SIGTERM");
    setTimeout(() => child.kill("SIGKILL"), 2000).unref();
  }, timeoutMs);

  // EPIPE when git exits before reading stdin; the exit code reports the failure
  child.stdin.on("error", () => undefined);
  child.stdin.end(options.input);

  const outcome = await new Promise<{ code: number | null; spawnError?: Error }>((resolve) => {
    child.once("error", (spawnError) => resolve({ code: null, spawnError }));
    child.once("close", (code) => resolve({ code }));
  });
  clearTimeout(timer);

  const stdout = Buffer.concat(out).toString("utf8");
  if (outcome.spawnError) {
    return { success: false, stdout, stderr: outcome.spawnError.message, exitCode: -1 };
  }
  const notes = [Buffer.concat(err).toString("utf8")];
  if (timedOut) {
    notes.push(`[git] Command timed out after ${Math.round(timeoutMs / 1000)}s: git ${args.join(" ")}`);
  }
  return {
    success: outcome.code === 0,
    stdout: stdout.trim(),
    stderr: notes.join("\n").trim(),
    exitCode: outcome.code ?? -1,
  };
}

export async function initRepo(cwd: string, baseBranch = "main"): Promise<GitResult> {
  const initResult = await execGit(["init"], cwd);
  if (!initResult.success) {
    return initResult;
  }
  // Works on git versions without `init -b`
  return execGit(["symbolic-ref", "HEAD", `refs/heads/${baseBranch}`], cwd);
}

// Stage everything and commit as the bot identity
export async function commitAll(cwd: string, message: string): Promise<GitResult> {
  const addResult = await execGit(["add", "-A"], cwd);
  if (!addResult.success) {
    return addResult;
  }
  return execGit(
    [
      "-c",
      `user.name=${GIT_AUTHOR_NAME}`,
      "-c",
      `user.email=${GIT_AUTHOR_EMAIL}`,
      "commit",
      "--allow-empty",
      "-m",
      message,
    ],
    cwd,
  );
}

export async function branchExists(cwd: string, branchName: string): Promise<boolean> {
  const result = await execGit(["rev-parse", "--verify", "--quiet", `refs/heads/${branchName}`], cwd);
  return result.success;
}

// Create a new branch from baseRef and check it out; fails when the name is taken
export async function createBranch(
  cwd: string,
  branchName: string,
  baseRef: string,
): Promise<GitResult> {
  return execGit(["checkout", "-b", branchName, baseRef], cwd);
}

export async function checkoutBranch(cwd: string, branchName: string): Promise<GitResult> {
  return execGit(["checkout", branchName], cwd);
}

export async function getCurrentBranch(cwd: string): Promise<string | null> {
  const result = await execGit(["rev-parse", "--abbrev-ref", "HEAD"], cwd);
  if (result.success) {
    return result.stdout;
  }

  // Empty repo (no commits)
  const symbolicResult = await execGit(["symbolic-ref", "--short", "HEAD"], cwd);
  return symbolicResult.success ? symbolicResult.stdout : null;
}

// Apply a unified diff to the working tree
export async function applyPatch(cwd: string, patch: string): Promise<GitResult> {
  const normalized = patch.endsWith("\n") ? patch : `${patch}\n`;
  const check = await execGit(["apply", "--check", "--whitespace=nowarn", "-"], cwd, { input: normalized });
  if (!check.success) {
    return check;
  }
  return execGit(["apply", "--whitespace=nowarn", "-"], cwd, { input: normalized });
}

export async function getDiffBetweenRefs(
  cwd: string,
  baseRef: string,
  headRef: string,
): Promise<GitResult> {
  return execGit(["diff", "--no-color", `${baseRef}...${headRef}`], cwd);
}

export async function setRemote(cwd: string, name: string, url: string): Promise<GitResult> {
  const existing = await execGit(["remote", "get-url", name], cwd);
  if (existing.success) {
    return execGit(["remote", "set-url", name, url], cwd);
  }
  return execGit(["remote", "add", name, url], cwd);
}

// Push
export async function push(
  cwd: string,
  branch: string,
  options: { remote?: string; force?: boolean } = {},
): Promise<GitResult> {
  const args = ["push", options.remote ?? "origin", `${branch}:${branch}`];
  if (options.force) {
    args.push("--force");
  }
  return execGit(args, cwd);
}

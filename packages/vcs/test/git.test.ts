import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  branchExists,
  commitAll,
  createBranch,
  execGit,
  getCurrentBranch,
  initRepo,
} from "../src/git";

describe("git helpers", () => {
  let repoPath: string;

  beforeEach(async () => {
    repoPath = await mkdtemp(join(tmpdir(), "reviewloop-git-"));
  });

  afterEach(async () => {
    await rm(repoPath, { recursive: true, force: true });
  });

  it("reports the unborn branch of an empty repository", async () => {
    expect((await initRepo(repoPath, "trunk")).success).toBe(true);
    expect(await getCurrentBranch(repoPath)).toBe("trunk");
  });

  it("commits as the bot identity and tracks branches", async () => {
    await initRepo(repoPath);
    await writeFile(join(repoPath, "bank.py"), "balance = 0\n");
    expect((await commitAll(repoPath, "seed")).success).toBe(true);

    const author = await execGit(["log", "-1", "--format=%an <%ae>"], repoPath);
    expect(author.stdout).toBe("reviewloop <bot@reviewloop.local>");

    expect(await branchExists(repoPath, "feature")).toBe(false);
    expect((await createBranch(repoPath, "feature", "main")).success).toBe(true);
    expect(await branchExists(repoPath, "feature")).toBe(true);
    expect((await createBranch(repoPath, "feature", "main")).success).toBe(false);
  });

  it("returns a failed result instead of throwing", async () => {
    const result = await execGit(["not-a-command"], repoPath);

    expect(result.success).toBe(false);
    expect(result.exitCode).not.toBe(0);
    expect(result.stderr).toContain("not-a-command");
  });
});

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HostingError } from "@reviewloop/core";
import { applyPatch, commitAll, createBranch, initRepo } from "../src/git";
import { LocalHostingClient } from "../src/local/local-hosting-client";

describe("LocalHostingClient", () => {
  let repoPath: string;

  beforeEach(async () => {
    repoPath = await mkdtemp(join(tmpdir(), "reviewloop-local-hosting-"));
  });

  afterEach(async () => {
    await rm(repoPath, { recursive: true, force: true });
  });

  it("computes the MR diff from the working tree branches", async () => {
    await initRepo(repoPath, "main");
    await writeFile(join(repoPath, "bank.py"), "balance = 0\n", "utf8");
    await commitAll(repoPath, "base");
    await createBranch(repoPath, "review/bank", "main");
    const patch = [
      "--- a/bank.py",
      "+++ b/bank.py",
      "@@ -1 +1 @@",
      "-balance = 0",
      "+balance = 100",
      "",
    ].join("\n");
    expect((await applyPatch(repoPath, patch)).success).toBe(true);
    await commitAll(repoPath, "seed");

    const client = new LocalHostingClient();
    const mr = await client.createMergeRequest({
      repo: "bank",
      sourceBranch: "review/bank",
      targetBranch: "main",
      title: "Seed",
      workingTree: repoPath,
    });

    expect(mr).toEqual({ mrId: "bank#1", number: 1 });
    const diff = await client.getDiff(mr.mrId);
    expect(diff).toContain("-balance = 0");
    expect(diff).toContain("+balance = 100");
    expect(await client.getCurrentLabel(mr.mrId)).toBe("needs_review");
  });

  it("records labels and comments", async () => {
    const client = new LocalHostingClient();
    client.seedMergeRequest(
      {
        mrId: "acme/bank#5",
        repo: "acme/bank",
        sourceBranch: "fix",
        targetBranch: "main",
        currentLabel: "needs_review",
      },
      "diff --git a/x b/x",
    );

    await client.setLabel("acme/bank#5", "changes_requested");
    const first = await client.postComment("acme/bank#5", "summary");
    const second = await client.postComment("acme/bank#5", "inline", { filePath: "x", line: 3 });

    expect(await client.getCurrentLabel("acme/bank#5")).toBe("changes_requested");
    expect(client.labelWrites).toEqual([{ mrId: "acme/bank#5", label: "changes_requested" }]);
    expect([first, second]).toEqual(["1", "2"]);
    expect(client.commentsFor("acme/bank#5")).toEqual([
      { id: "1", body: "summary", filePath: undefined, line: undefined },
      { id: "2", body: "inline", filePath: "x", line: 3 },
    ]);
    expect(await client.getDiff("acme/bank#5")).toBe("diff --git a/x b/x");
  });

  it("can reject inline comments like a hosting service outside the diff", async () => {
    const client = new LocalHostingClient({ rejectInlineComments: true });
    client.seedMergeRequest(
      { mrId: "r#1", repo: "r", sourceBranch: "s", targetBranch: "main", currentLabel: "needs_review" },
      "",
    );
    await expect(client.postComment("r#1", "inline", { filePath: "x", line: 1 })).rejects.toMatchObject({
      status: 422,
    });
    await expect(client.postComment("r#1", "top")).resolves.toBe("1");
  });

  it("raises HostingError for unknown MRs", async () => {
    const client = new LocalHostingClient();
    await expect(client.getDiff("nope#1")).rejects.toBeInstanceOf(HostingError);
  });
});

import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { ProviderError, describeError } from "@reviewloop/core";
import { ScriptedAgentClient, type ScriptedResponse } from "@reviewloop/llm";
import { ReviewStateMachine } from "@reviewloop/review";
import { LocalHostingClient } from "@reviewloop/vcs";
import { createApp } from "../src/app";
import type { WebhookSecrets } from "../src/config";
import { InFlightRegistry } from "../src/in-flight";
import { ReviewDriver } from "../src/review-driver";

const DIFF = [
  "diff --git a/bank.py b/bank.py",
  "--- a/bank.py",
  "+++ b/bank.py",
  "@@ -10,4 +10,4 @@",
  "     def deposit(self, amount):",
  "-        with self._lock:",
  "-            self.balance += amount",
  "+        self.balance += amount",
].join("\n");

const APPROVE =
  "<verdict><decision>APPROVE</decision><risk>LOW</risk><summary>Fine.</summary></verdict>";
const REJECT =
  "<verdict><decision>CHANGES_REQUESTED</decision><risk>HIGH</risk><summary>Unlocked deposit.</summary></verdict>";

const opened = {
  event_type: "mr_opened",
  mr_id: "acme/bank#7",
  source_branch: "feat/faster-deposits",
  commit_sha: "abc1234",
};

function createHarness(options: {
  lead: ScriptedResponse[];
  architect?: ScriptedResponse[];
  secrets?: WebhookSecrets;
}) {
  const hosting = new LocalHostingClient();
  hosting.seedMergeRequest(
    {
      mrId: "acme/bank#7",
      repo: "acme/bank",
      sourceBranch: "feat/faster-deposits",
      targetBranch: "main",
      title: "Faster deposits",
      currentLabel: "needs_review",
    },
    DIFF,
  );
  const lead = new ScriptedAgentClient(options.lead);
  const architect = new ScriptedAgentClient(options.architect ?? []);
  const failures: Array<[string, string]> = [];
  const registry = new InFlightRegistry((key, error) => {
    failures.push([key, describeError(error)]);
  });
  const driver = new ReviewDriver({
    hosting,
    reviewer: new ReviewStateMachine({ agents: { lead, architect }, hosting }),
  });
  const app = createApp({ handler: driver, registry, secrets: options.secrets });

  const post = (path: string, body: string, headers: Record<string, string> = {}) =>
    app.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });

  return { app, hosting, lead, architect, registry, failures, post };
}

describe("review bot webhook", () => {
  it("reports health", async () => {
    const { app } = createHarness({ lead: [] });

    const response = await app.request("/health");

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok", inFlight: 0 });
  });

  it("rejects malformed payloads", async () => {
    const { post, lead } = createHarness({ lead: [] });

    const notJson = await post("/webhook", "{not json");
    const missingSha = await post(
      "/webhook",
      JSON.stringify({ event_type: "mr_opened", mr_id: "acme/bank#7", source_branch: "feat/x" }),
    );
    const badId = await post("/webhook", JSON.stringify({ ...opened, mr_id: "acme/bank" }));

    expect(notJson.status).toBe(400);
    expect(missingSha.status).toBe(400);
    expect(await missingSha.json()).toMatchObject({ reason: "commit_sha: Required" });
    expect(badId.status).toBe(400);
    expect(lead.calls).toHaveLength(0);
  });

  it("accepts an opened MR and labels it once the review finishes", async () => {
    const { post, registry, hosting } = createHarness({ lead: [APPROVE] });

    const response = await post("/webhook", JSON.stringify(opened));
    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ status: "accepted", key: "acme/bank#7@abc1234" });

    await registry.drain();
    expect(hosting.labelWrites).toEqual([{ mrId: "acme/bank#7", label: "ready_for_merge" }]);
    expect(hosting.commentsFor("acme/bank#7")).toHaveLength(1);
  });

  it("ignores a duplicate delivery while the first is in flight", async () => {
    let release: (response: string) => void = () => {};
    const gate = new Promise<string>((resolve) => {
      release = resolve;
    });
    const { post, registry, hosting, lead } = createHarness({ lead: [() => gate] });

    const first = await post("/webhook", JSON.stringify(opened));
    const second = await post("/webhook", JSON.stringify(opened));

    expect(first.status).toBe(202);
    expect(second.status).toBe(200);
    expect(await second.json()).toEqual({ status: "duplicate", key: "acme/bank#7@abc1234" });
    expect(registry.has("acme/bank#7", "abc1234")).toBe(true);

    release(APPROVE);
    await registry.drain();

    expect(lead.calls).toHaveLength(1);
    expect(hosting.labelWrites).toHaveLength(1);
    expect(registry.size).toBe(0);
  });

  it("serializes events for the same MR", async () => {
    let release: (response: string) => void = () => {};
    const gate = new Promise<string>((resolve) => {
      release = resolve;
    });
    const { post, registry, hosting, lead } = createHarness({
      lead: [() => gate, APPROVE],
      architect: ["<no-suggestions/>"],
    });

    await post("/webhook", JSON.stringify(opened));
    const pushed = await post(
      "/webhook",
      JSON.stringify({ ...opened, event_type: "commit_pushed", commit_sha: "def5678" }),
    );
    expect(pushed.status).toBe(202);
    expect(lead.calls.length).toBeLessThanOrEqual(1);

    release(REJECT);
    await registry.drain();

    expect(lead.calls).toHaveLength(2);
    expect(hosting.labelWrites.map((write) => write.label)).toEqual([
      "changes_requested",
      "ready_for_merge",
    ]);
  });

  it("logs a failed review and leaves the label alone", async () => {
    const { post, registry, hosting, failures } = createHarness({
      lead: [new ProviderError("scripted", "connection refused")],
    });

    await post("/webhook", JSON.stringify(opened));
    await registry.drain();

    expect(failures).toEqual([["acme/bank#7@abc1234", "[scripted] connection refused"]]);
    expect(hosting.labelWrites).toEqual([]);
    expect(registry.size).toBe(0);
  });

  it("checks the canonical endpoint signature when a secret is set", async () => {
    const secret = "test-secret";
    const { post } = createHarness({ lead: [APPROVE], secrets: { webhookSecret: secret } });
    const body = JSON.stringify(opened);
    const signature = `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`;

    const unsigned = await post("/webhook", body);
    const signed = await post("/webhook", body, { "X-Hub-Signature-256": signature });

    expect(unsigned.status).toBe(401);
    expect(signed.status).toBe(202);
  });

  it("normalizes GitHub pull request deliveries", async () => {
    const { post, registry, hosting } = createHarness({ lead: [APPROVE] });
    const payload = JSON.stringify({
      action: "opened",
      number: 7,
      pull_request: { head: { ref: "feat/faster-deposits", sha: "abc1234" } },
      repository: { full_name: "acme/bank" },
    });

    const ping = await post("/webhook/github", "{}", { "X-GitHub-Event": "ping" });
    const response = await post("/webhook/github", payload, { "X-GitHub-Event": "pull_request" });

    expect(ping.status).toBe(200);
    expect(await ping.json()).toEqual({ status: "ignored", reason: "ping" });
    expect(response.status).toBe(202);
    await registry.drain();
    expect(hosting.labelWrites).toEqual([{ mrId: "acme/bank#7", label: "ready_for_merge" }]);
  });

  it("requires the GitLab token when one is configured", async () => {
    const { post } = createHarness({ lead: [], secrets: { gitlabWebhookToken: "test-secret" } });

    const response = await post("/webhook/gitlab", "{}", {
      "X-Gitlab-Event": "Merge Request Hook",
      "X-Gitlab-Token": "wrong",
    });

    expect(response.status).toBe(401);
  });
});

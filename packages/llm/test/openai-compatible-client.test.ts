import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "@reviewloop/core";
import { OpenAICompatibleAgentClient } from "../src/openai-compatible/openai-compatible-client";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("OpenAICompatibleAgentClient", () => {
  it("posts a chat completion and returns the first choice", async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: "<summary>ok</summary>" } }] }),
    );
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://localhost:6655/v1/",
      model: "qwen3-30b",
      apiKey: "test-secret",
      timeoutMs: 1000,
      providerName: "local",
      fetchImpl,
    });

    const text = await client.complete("system", "user", { temperature: 0.3, maxTokens: 50 });

    expect(text).toBe("<summary>ok</summary>");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:6655/v1/chat/completions");
    const headers = new Headers(init?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-secret");
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: "qwen3-30b",
      temperature: 0.3,
      max_tokens: 50,
      messages: [
        { role: "system", content: "system" },
        { role: "user", content: "user" },
      ],
    });
  });

  it("strips an outer markdown fence", async () => {
    const fetchImpl = vi.fn(async () =>
      jsonResponse({ choices: [{ message: { content: "```xml\n<decision>APPROVE</decision>\n```" } }] }),
    );
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://localhost:6655/v1",
      model: "m",
      timeoutMs: 1000,
      fetchImpl,
    });

    await expect(client.complete("s", "u")).resolves.toBe("<decision>APPROVE</decision>");
  });

  it("raises ProviderError on non-2xx responses", async () => {
    const fetchImpl = vi.fn(async () => new Response("overloaded", { status: 503 }));
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://localhost:6655/v1",
      model: "m",
      timeoutMs: 1000,
      providerName: "local",
      fetchImpl,
    });

    const error = await client.complete("s", "u").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ provider: "local", status: 503 });
  });

  it("raises ProviderError when the endpoint is unreachable", async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://localhost:1/v1",
      model: "m",
      timeoutMs: 1000,
      providerName: "local",
      fetchImpl,
    });

    await expect(client.complete("s", "u")).rejects.toThrow("[local] request failed: fetch failed");
  });

  it("returns empty content as-is", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ choices: [{ message: { content: null } }] }));
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://x/v1",
      model: "m",
      timeoutMs: 1000,
      providerName: "openai",
      fetchImpl,
    });

    await expect(client.complete("s", "u")).resolves.toBe("");
  });

  it("raises ProviderError when there are no choices", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ choices: [] }));
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://x/v1",
      model: "m",
      timeoutMs: 1000,
      providerName: "openai",
      fetchImpl,
    });

    await expect(client.complete("s", "u")).rejects.toThrow(
      "[openai] response did not contain any choices",
    );
  });

  it("raises ProviderError when the request exceeds its timeout", async () => {
    const fetchImpl = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const client = new OpenAICompatibleAgentClient({
      baseUrl: "http://x/v1",
      model: "m",
      timeoutMs: 20,
      providerName: "local",
      fetchImpl,
    });

    const error = await client.complete("s", "u").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderError);
    expect(String(error)).toContain("local completion timed out after 20ms");
  });
});

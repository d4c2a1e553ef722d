import { z } from "zod";
import { ProviderError, describeError, withTimeout } from "@reviewloop/core";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  stripOuterCodeFence,
  type AgentClient,
  type AgentDescription,
  type CompletionOptions,
} from "../agent-client";

export interface OpenAICompatibleOptions {
  baseUrl: string; // e.g. http://localhost:6655/v1
  model: string;
  apiKey?: string;
  timeoutMs: number;
  topP?: number;
  providerName?: string; // "local" or "openai" in logs and reports
  fetchImpl?: typeof fetch;
}

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

// Chat-completions client for OpenAI and OpenAI-compatible local servers (vLLM, llama.cpp)
export class OpenAICompatibleAgentClient implements AgentClient {
  private readonly options: OpenAICompatibleOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAICompatibleOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  describe(): AgentDescription {
    return {
      provider: this.options.providerName ?? "openai-compatible",
      model: this.options.model,
    };
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const provider = this.describe().provider;
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const body = {
      model: this.options.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(this.options.topP !== undefined && { top_p: this.options.topP }),
      stream: false,
    };

    const payload = await withTimeout(
      `${provider} completion`,
      this.options.timeoutMs,
      async (signal) => {
        let response: Response;
        try {
          response = await this.fetchImpl(url, {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              Accept: "application/json",
              Authorization: `Bearer ${this.options.apiKey ?? "EMPTY"}`,
            },
            body: JSON.stringify(body),
            signal,
          });
        } catch (error) {
          throw new ProviderError(provider, `request failed: ${describeError(error)}`, {
            cause: error,
          });
        }

        if (!response.ok) {
          const detail = await response.text().catch(() => "");
          throw new ProviderError(
            provider,
            `HTTP ${response.status} ${response.statusText} ${detail.slice(0, 300)}`.trim(),
            { status: response.status },
          );
        }
        const json: unknown = await response.json();
        return json;
      },
      (label, ms) => new ProviderError(provider, `${label} timed out after ${ms}ms`),
    );

    const parsed = ChatCompletionResponse.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(provider, "response did not contain any choices");
    }
    // An empty answer is still an answer; the tag parsers default it
    return stripOuterCodeFence(parsed.data.choices[0]?.message.content ?? "");
  }
}

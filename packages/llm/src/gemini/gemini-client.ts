import { GoogleGenAI } from "@google/genai";
import { ProviderError, describeError, withTimeout } from "@reviewloop/core";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  stripOuterCodeFence,
  type AgentClient,
  type AgentDescription,
  type CompletionOptions,
} from "../agent-client";

export interface GeminiOptions {
  model: string;
  apiKey?: string;
  // Vertex AI mode when a project is given
  googleCloudProject?: string;
  googleCloudLocation?: string;
  timeoutMs: number;
}

// The subset of GoogleGenAI used here, so tests can hand in a stand-in
export interface GeminiModels {
  generateContent(params: {
    model: string;
    contents: string;
    config?: {
      systemInstruction?: string;
      temperature?: number;
      maxOutputTokens?: number;
      abortSignal?: AbortSignal;
    };
  }): Promise<{ text?: string }>;
}

function createModels(options: GeminiOptions): GeminiModels {
  const ai = options.googleCloudProject
    ? new GoogleGenAI({
        vertexai: true,
        project: options.googleCloudProject,
        location: options.googleCloudLocation ?? "us-central1",
      })
    : new GoogleGenAI({ apiKey: options.apiKey });
  return ai.models;
}

export class GeminiAgentClient implements AgentClient {
  private readonly options: GeminiOptions;
  private readonly models: GeminiModels;

  constructor(options: GeminiOptions, models?: GeminiModels) {
    this.options = options;
    this.models = models ?? createModels(options);
  }

  describe(): AgentDescription {
    return { provider: "gemini", model: this.options.model };
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const text = await withTimeout(
      "gemini completion",
      this.options.timeoutMs,
      async (signal) => {
        try {
          const result = await this.models.generateContent({
            model: this.options.model,
            contents: userPrompt,
            config: {
              systemInstruction: systemPrompt,
              temperature: options.temperature ?? DEFAULT_TEMPERATURE,
              maxOutputTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
              abortSignal: signal,
            },
          });
          return result.text ?? "";
        } catch (error) {
          throw new ProviderError("gemini", describeError(error), { cause: error });
        }
      },
      (label, ms) => new ProviderError("gemini", `${label} timed out after ${ms}ms`),
    );

    return stripOuterCodeFence(text);
  }
}

import { z } from "zod";
import { envInt, envNumber, envString, parseEnv } from "@reviewloop/core";
import type { AgentClient } from "./agent-client";
import { GeminiAgentClient } from "./gemini/gemini-client";
import { OpenAICompatibleAgentClient } from "./openai-compatible/openai-compatible-client";

export const AgentProvider = z.enum(["local", "openai", "gemini"]);
export type AgentProvider = z.infer<typeof AgentProvider>;

export const DEFAULT_LOCAL_URL = "http://localhost:6655/v1";
export const DEFAULT_OPENAI_URL = "https://api.openai.com/v1";

const DEFAULT_MODELS: Record<AgentProvider, string> = {
  local: "qwen3-30b",
  openai: "gpt-4-turbo",
  gemini: "gemini-flash-latest",
};

export interface AgentConfig {
  provider: AgentProvider;
  model: string;
  baseUrl: string;
  apiKey?: string;
  googleCloudProject?: string;
  googleCloudLocation?: string;
  timeoutMs: number;
  topP?: number;
}

const AgentEnvSchema = z.object({
  AGENT_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value.trim().toLowerCase() : undefined),
    AgentProvider.default("gemini"),
  ),
  AGENT_MODEL: envString(),
  AGENT_BASE_URL: envString(),
  AGENT_TIMEOUT_MS: envInt(120000),
  AGENT_TOP_P: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value : undefined),
    z.coerce.number().min(0).max(1).optional(),
  ),
  OPENAI_API_KEY: envString(),
  LOCAL_LLM_API_KEY: envString(),
  GEMINI_API_KEY: envString(),
  GOOGLE_CLOUD_PROJECT: envString(),
  GOOGLE_CLOUD_LOCATION: envString(),
});

export function loadAgentConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AgentConfig> = {},
): AgentConfig {
  const parsed = parseEnv("agent", AgentEnvSchema, env);
  const provider = overrides.provider ?? parsed.AGENT_PROVIDER;
  const apiKey =
    provider === "openai"
      ? parsed.OPENAI_API_KEY
      : provider === "gemini"
        ? parsed.GEMINI_API_KEY
        : parsed.LOCAL_LLM_API_KEY;
  const defaultUrl = provider === "openai" ? DEFAULT_OPENAI_URL : DEFAULT_LOCAL_URL;

  return {
    provider,
    model: overrides.model ?? parsed.AGENT_MODEL ?? DEFAULT_MODELS[provider],
    baseUrl: overrides.baseUrl ?? parsed.AGENT_BASE_URL ?? defaultUrl,
    apiKey: overrides.apiKey ?? apiKey,
    googleCloudProject: overrides.googleCloudProject ?? parsed.GOOGLE_CLOUD_PROJECT,
    googleCloudLocation: overrides.googleCloudLocation ?? parsed.GOOGLE_CLOUD_LOCATION,
    timeoutMs: overrides.timeoutMs ?? parsed.AGENT_TIMEOUT_MS,
    topP: overrides.topP ?? parsed.AGENT_TOP_P,
  };
}

export function createAgentClient(config: AgentConfig): AgentClient {
  switch (config.provider) {
    case "gemini":
      if (!config.apiKey && !config.googleCloudProject) {
        throw new Error("Gemini provider needs GEMINI_API_KEY or GOOGLE_CLOUD_PROJECT");
      }
      return new GeminiAgentClient({
        model: config.model,
        apiKey: config.apiKey,
        googleCloudProject: config.googleCloudProject,
        googleCloudLocation: config.googleCloudLocation,
        timeoutMs: config.timeoutMs,
      });
    case "openai":
      if (!config.apiKey) {
        throw new Error("OpenAI provider needs OPENAI_API_KEY");
      }
      return new OpenAICompatibleAgentClient({
        baseUrl: config.baseUrl,
        model: config.model,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        topP: config.topP,
        providerName: "openai",
      });
    case "local":
      return new OpenAICompatibleAgentClient({
        baseUrl: config.baseUrl,
        model: config.model,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        topP: config.topP ?? 0.8,
        providerName: "local",
      });
  }
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface AgentDescription {
  provider: string;
  model: string;
}

/**
 * Uniform text-completion capability. Implementations return raw model text;
 * callers parse structured tags out of it. Failures surface as ProviderError and
 * are never retried here.
 */
export interface AgentClient {
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string>;
  describe(): AgentDescription;
}

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 4000;

// Some models wrap the whole answer in a markdown fence
export function stripOuterCodeFence(text: string): string {
  let cleaned = text.trim();
  const opening = cleaned.match(/^```[a-zA-Z0-9_-]*\s*\n?/);
  if (opening) {
    cleaned = cleaned.slice(opening[0].length);
    if (cleaned.endsWith("```")) {
      cleaned = cleaned.slice(0, -3);
    }
  }
  return cleaned.trim();
}

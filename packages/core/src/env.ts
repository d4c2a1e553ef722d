import { z } from "zod";
import type { RetryPolicy } from "./retry";

// Empty strings in .env files mean "unset"
export function blankToUndefined(value: unknown): unknown {
  if (typeof value === "string" && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

export const envString = () => z.preprocess(blankToUndefined, z.string().optional());

export const envInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().default(fallback));

export const envNumber = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().default(fallback));

export const envBoolean = (fallback: boolean) =>
  z.preprocess((value) => {
    const normalized = blankToUndefined(value);
    if (typeof normalized !== "string") {
      return normalized;
    }
    return !["false", "0", "no", "off"].includes(normalized.trim().toLowerCase());
  }, z.boolean().default(fallback));

export class ConfigError extends Error {
  constructor(scope: string, issues: z.ZodIssue[]) {
    const details = issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    super(`Invalid ${scope} configuration: ${details}`);
    this.name = "ConfigError";
  }
}

export function parseEnv<TSchema extends z.ZodTypeAny>(
  scope: string,
  schema: TSchema,
  env: NodeJS.ProcessEnv,
): z.infer<TSchema> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(scope, result.error.issues);
  }
  return result.data;
}

const RetryEnvSchema = z.object({
  AGENT_MAX_ATTEMPTS: envInt(1),
  AGENT_RETRY_DELAY_MS: envInt(2000),
  AGENT_RETRY_MAX_DELAY_MS: envInt(30000),
  AGENT_RETRY_BACKOFF: envNumber(2),
});

export function loadAgentRetryPolicy(env: NodeJS.ProcessEnv = process.env): RetryPolicy {
  const parsed = parseEnv("retry", RetryEnvSchema, env);
  return {
    maxAttempts: Math.max(1, parsed.AGENT_MAX_ATTEMPTS),
    initialDelayMs: Math.max(0, parsed.AGENT_RETRY_DELAY_MS),
    maxDelayMs: Math.max(0, parsed.AGENT_RETRY_MAX_DELAY_MS),
    backoffMultiplier: Math.max(1, parsed.AGENT_RETRY_BACKOFF),
  };
}

import { z } from "zod";
import { envInt, envString, parseEnv, type Logger } from "@reviewloop/core";
import { GitHubHostingClient } from "./github/github-hosting-client";
import { GitLabHostingClient } from "./gitlab/gitlab-hosting-client";
import { LocalHostingClient } from "./local/local-hosting-client";
import type { HostingClient, HostingKind } from "./hosting";

export const HostingProvider = z.enum(["local", "github", "gitlab"]);

export interface HostingConfig {
  provider: HostingKind;
  timeoutMs: number;
  github: {
    token?: string;
    owner?: string;
  };
  gitlab: {
    baseUrl: string;
    token?: string;
    namespace?: string;
    namespaceId?: number;
  };
}

const HostingEnvSchema = z.object({
  HOSTING_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value.trim().toLowerCase() : undefined),
    HostingProvider.default("local"),
  ),
  HOSTING_TIMEOUT_MS: envInt(30000),
  GITHUB_TOKEN: envString(),
  GITHUB_OWNER: envString(),
  GITLAB_URL: envString(),
  GITLAB_TOKEN: envString(),
  GITLAB_NAMESPACE: envString(),
  GITLAB_NAMESPACE_ID: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value : undefined),
    z.coerce.number().int().positive().optional(),
  ),
});

export function loadHostingConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { provider?: HostingKind; timeoutMs?: number } = {},
): HostingConfig {
  const parsed = parseEnv("hosting", HostingEnvSchema, env);
  return {
    provider: overrides.provider ?? parsed.HOSTING_PROVIDER,
    timeoutMs: overrides.timeoutMs ?? parsed.HOSTING_TIMEOUT_MS,
    github: {
      token: parsed.GITHUB_TOKEN,
      owner: parsed.GITHUB_OWNER,
    },
    gitlab: {
      baseUrl: parsed.GITLAB_URL ?? "https://gitlab.com",
      token: parsed.GITLAB_TOKEN,
      namespace: parsed.GITLAB_NAMESPACE,
      namespaceId: parsed.GITLAB_NAMESPACE_ID,
    },
  };
}

export function createHostingClient(
  config: HostingConfig,
  options: { logger?: Logger } = {},
): HostingClient {
  switch (config.provider) {
    case "github":
      if (!config.github.token) {
        throw new Error("GitHub hosting needs GITHUB_TOKEN");
      }
      return new GitHubHostingClient({
        token: config.github.token,
        owner: config.github.owner,
        timeoutMs: config.timeoutMs,
        logger: options.logger,
      });
    case "gitlab":
      if (!config.gitlab.token) {
        throw new Error("GitLab hosting needs GITLAB_TOKEN");
      }
      return new GitLabHostingClient({
        baseUrl: config.gitlab.baseUrl,
        token: config.gitlab.token,
        namespace: config.gitlab.namespace,
        namespaceId: config.gitlab.namespaceId,
        timeoutMs: config.timeoutMs,
      });
    case "local":
      return new LocalHostingClient();
  }
}

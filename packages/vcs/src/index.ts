export * from "./hosting";
export * from "./git";
export * from "./webhook";
export * from "./config";
export { GitHubHostingClient, type GitHubHostingOptions } from "./github/github-hosting-client";
export { GitLabHostingClient, type GitLabHostingOptions } from "./gitlab/gitlab-hosting-client";
export { LocalHostingClient, type LabelWrite } from "./local/local-hosting-client";

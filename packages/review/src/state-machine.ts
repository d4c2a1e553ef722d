import {
  HostingError,
  LabelCycle,
  NO_RETRY,
  ProviderError,
  createNullLogger,
  isApprovingDecision,
  retryOrThrow,
  withTimeout,
  type Logger,
  type MergeRequestHandle,
  type PatchResult,
  type RetryPolicy,
  type ReviewLabel,
  type ReviewVerdict,
  type Suggestion,
  type TestResult,
} from "@reviewloop/core";
import type { AgentClient, CompletionOptions } from "@reviewloop/llm";
import type { HostingClient } from "@reviewloop/vcs";
import {
  formatDetachedSuggestionComment,
  formatLeadComment,
  formatSuggestionComment,
} from "./comments";
import { applySuggestions } from "./patcher";
import {
  ARCHITECT_SYSTEM_PROMPT,
  LEAD_SYSTEM_PROMPT,
  buildArchitectPrompt,
  buildLeadPrompt,
  type PreviousReview,
} from "./prompts";
import { parseSuggestions } from "./suggestion-parser";
import { parseVerdict, type VerdictParseResult } from "./verdict-parser";
import type { Workspace } from "./workspace";

export type ReviewState =
  | "NEEDS_REVIEW"
  | "LEAD_REVIEWED"
  | "ARCHITECT_REVIEWED"
  | "APPROVED"
  | "PATCHED"
  | "RE_TESTED"
  | "TERMINAL";

export interface ReviewAgents {
  lead: AgentClient;
  architect: AgentClient;
}

export interface ReviewStateMachineOptions {
  agents: ReviewAgents;
  hosting: HostingClient;
  logger?: Logger;
  retryPolicy?: RetryPolicy;
  // Extra bound around each agent call; 0 leaves it to the client
  agentTimeoutMs?: number;
  completion?: CompletionOptions;
  retryWait?: (ms: number) => Promise<void>;
}

export interface ReviewInput {
  handle: MergeRequestHandle;
  title: string;
  description: string;
  ctoInstructions: string;
  // Without a checkout the review stops after the Architect round
  workspace?: Workspace;
  retest?: () => Promise<TestResult>;
  // Set on follow-up reviews after a push
  previous?: PreviousReview;
  // Once aborted, no further agent call, patch or hosting write starts
  signal?: AbortSignal;
}

export interface ReviewResult {
  states: ReviewState[];
  verdict: ReviewVerdict;
  verdictPass: "primary" | "fallback" | "default";
  architectRan: boolean;
  suggestions: Suggestion[];
  skippedSuggestions: number;
  patches: PatchResult[];
  postFix: TestResult | null;
  finalLabel: ReviewLabel;
  labelTransitions: ReviewLabel[];
  commentIds: string[];
}

/**
 * Lead review, then (unless approved) Architect suggestions, patching and a
 * re-test. Labels only move forward and are written once, at the end.
 */
export class ReviewStateMachine {
  private readonly agents: ReviewAgents;
  private readonly hosting: HostingClient;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly agentTimeoutMs: number;
  private readonly completion: CompletionOptions;
  private readonly retryWait?: (ms: number) => Promise<void>;

  constructor(options: ReviewStateMachineOptions) {
    this.agents = options.agents;
    this.hosting = options.hosting;
    this.logger = options.logger ?? createNullLogger("review");
    this.retryPolicy = options.retryPolicy ?? NO_RETRY;
    this.agentTimeoutMs = options.agentTimeoutMs ?? 0;
    this.completion = options.completion ?? {};
    this.retryWait = options.retryWait;
  }

  private async callAgent(
    role: "lead" | "architect",
    systemPrompt: string,
    userPrompt: string,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<string> {
    const client = this.agents[role];
    const { provider } = client.describe();
    return retryOrThrow(
      async (attempt) => {
        signal?.throwIfAborted();
        const response = await withTimeout(
          `${role} review`,
          this.agentTimeoutMs,
          () => client.complete(systemPrompt, userPrompt, this.completion),
          (label, ms) => new ProviderError(provider, `${label} timed out after ${ms}ms`),
        );
        logger.agentInteraction(role, attempt, userPrompt, response);
        return response;
      },
      this.retryPolicy,
      logger,
      this.retryWait,
    );
  }

  private async postSuggestionComment(
    input: ReviewInput,
    suggestion: Suggestion,
    patch: PatchResult | undefined,
    logger: Logger,
  ): Promise<string> {
    const line = patch?.line ?? suggestion.lineAnchor;
    const { mrId } = input.handle;
    input.signal?.throwIfAborted();
    if (line >= 1) {
      const body = formatSuggestionComment(suggestion, patch);
      try {
        const id = await this.hosting.postComment(mrId, body, { filePath: suggestion.filePath, line });
        input.handle.recordComment({ id, body, filePath: suggestion.filePath, line });
        return id;
      } catch (error) {
        if (!(error instanceof HostingError)) {
          throw error;
        }
        logger.warn(`Inline comment rejected, posting top-level instead: ${error.message}`, {
          filePath: suggestion.filePath,
          line,
        });
      }
    }
    const body = formatDetachedSuggestionComment(suggestion, Math.max(line, 0), patch);
    const id = await this.hosting.postComment(mrId, body);
    input.handle.recordComment({ id, body });
    return id;
  }

  async run(input: ReviewInput): Promise<ReviewResult> {
    const { handle } = input;
    const logger = this.logger.child({ mrId: handle.mrId });
    const states: ReviewState[] = ["NEEDS_REVIEW"];
    const labels = new LabelCycle(handle.currentLabel);
    const initialLabel = labels.label;

    const diff = await handle.loadDiff();

    logger.stepStart("lead", "Lead review");
    const leadStarted = Date.now();
    const leadResponse = await this.callAgent(
      "lead",
      LEAD_SYSTEM_PROMPT,
      buildLeadPrompt({
        title: input.title,
        description: input.description,
        ctoInstructions: input.ctoInstructions,
        diff,
        previous: input.previous,
      }),
      logger,
      input.signal,
    );
    const parsedVerdict: VerdictParseResult = parseVerdict(leadResponse);
    const verdict = parsedVerdict.verdict;
    if (parsedVerdict.kind === "default") {
      logger.warn(`Lead verdict defaulted: ${parsedVerdict.error.message}`);
    }
    states.push("LEAD_REVIEWED");
    logger.stepComplete("lead", Date.now() - leadStarted);
    logger.info(`Lead decision: ${verdict.decision} (risk ${verdict.risk})`);

    let suggestions: Suggestion[] = [];
    let skippedSuggestions = 0;
    let patches: PatchResult[] = [];
    let postFix: TestResult | null = null;
    let architectRan = false;

    if (isApprovingDecision(verdict.decision)) {
      states.push("APPROVED");
      labels.advance("ready_for_merge");
    } else {
      labels.advance("changes_requested");

      logger.stepStart("architect", "Architect review");
      const architectStarted = Date.now();
      const architectResponse = await this.callAgent(
        "architect",
        ARCHITECT_SYSTEM_PROMPT,
        buildArchitectPrompt({ verdict, ctoInstructions: input.ctoInstructions, diff }),
        logger,
        input.signal,
      );
      architectRan = true;
      const parsedSuggestions = parseSuggestions(architectResponse);
      suggestions = parsedSuggestions.suggestions;
      if (parsedSuggestions.kind === "default") {
        logger.warn(`No suggestions parsed: ${parsedSuggestions.error.message}`);
      } else {
        skippedSuggestions = parsedSuggestions.skipped.length;
        for (const skipped of parsedSuggestions.skipped) {
          logger.warn(`Suggestion skipped: ${skipped.message}`);
        }
      }
      states.push("ARCHITECT_REVIEWED");
      logger.stepComplete("architect", Date.now() - architectStarted);
      logger.info(`Architect produced ${suggestions.length} suggestion(s)`);

      if (input.workspace) {
        input.signal?.throwIfAborted();
        patches = await applySuggestions(input.workspace, suggestions, logger);
        states.push("PATCHED");
        const applied = patches.filter((patch) => patch.status === "applied").length;
        logger.info(`Applied ${applied}/${patches.length} suggestion(s)`);

        if (input.retest) {
          postFix = await input.retest();
          states.push("RE_TESTED");
          if (postFix.failedCount === 0 && postFix.executionError === null) {
            labels.advance("ready_for_merge");
          }
        }
      } else {
        logger.info("No working tree attached; stopping after the Architect round");
      }
    }

    input.signal?.throwIfAborted();
    const commentIds: string[] = [];
    const leadBody = formatLeadComment(verdict, {
      parsed: parsedVerdict.kind === "parsed",
      label: labels.label,
      suggestionCount: suggestions.length,
    });
    const leadCommentId = await this.hosting.postComment(handle.mrId, leadBody);
    handle.recordComment({ id: leadCommentId, body: leadBody });
    commentIds.push(leadCommentId);

    for (const [index, suggestion] of suggestions.entries()) {
      commentIds.push(await this.postSuggestionComment(input, suggestion, patches[index], logger));
    }

    input.signal?.throwIfAborted();
    if (labels.label !== initialLabel) {
      await this.hosting.setLabel(handle.mrId, labels.label);
      handle.currentLabel = labels.label;
    }
    states.push("TERMINAL");
    logger.info(`Review finished with label ${labels.label}`);

    return {
      states,
      verdict,
      verdictPass: parsedVerdict.kind === "parsed" ? parsedVerdict.pass : "default",
      architectRan,
      suggestions,
      skippedSuggestions,
      patches,
      postFix,
      finalLabel: labels.label,
      labelTransitions: [...labels.transitions],
      commentIds,
    };
  }
}

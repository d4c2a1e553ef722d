import { ProviderError } from "@reviewloop/core";
import type { AgentClient, AgentDescription, CompletionOptions } from "../agent-client";

export interface RecordedCall {
  systemPrompt: string;
  userPrompt: string;
  options: CompletionOptions;
}

export type ScriptedResponse =
  | string
  | Error
  | ((call: RecordedCall) => string | Promise<string>);

/**
 * Replays canned responses in order. Used for dry runs of the suite and as the
 * test double for the Lead/Architect rounds.
 */
export class ScriptedAgentClient implements AgentClient {
  readonly calls: RecordedCall[] = [];
  private readonly queue: ScriptedResponse[];
  private readonly model: string;

  constructor(responses: ScriptedResponse[], model = "scripted") {
    this.queue = [...responses];
    this.model = model;
  }

  describe(): AgentDescription {
    return { provider: "scripted", model: this.model };
  }

  enqueue(...responses: ScriptedResponse[]): void {
    this.queue.push(...responses);
  }

  get remaining(): number {
    return this.queue.length;
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const call: RecordedCall = { systemPrompt, userPrompt, options };
    this.calls.push(call);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new ProviderError("scripted", "no scripted response left");
    }
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === "function") {
      return next(call);
    }
    return next;
  }
}

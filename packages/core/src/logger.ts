// Structured logger shared by the evaluator and the review bot

export type LogLevel = "debug" | "info" | "warn" | "error";

// Identifiers a child logger can bind; the first one set is shown in text output
const CONTEXT_KEYS = ["scenarioId", "mrId", "runId"] as const;
type ContextKey = (typeof CONTEXT_KEYS)[number];

export type LogContext = Partial<Record<ContextKey, string>>;

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig extends LogContext {
  component: string;
  minLevel?: LogLevel;
  jsonOutput?: boolean;
  // Defaults to console; tests pass a collector
  sink?: LogSink;
}

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVEL_ORDER.some((level) => level === value);
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function formatText(entry: LogEntry): string {
  const clock = entry.timestamp.slice(11, 19);
  const tag = CONTEXT_KEYS.map((key) => entry[key]).find((value) => value !== undefined);
  const scope = tag === undefined ? "" : `[${tag}]`;
  const meta = entry.metadata ? ` ${JSON.stringify(entry.metadata)}` : "";
  return `${clock} ${entry.level.toUpperCase().padEnd(5)} [${entry.component}]${scope} ${entry.message}${meta}`;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = {
      minLevel: "info",
      jsonOutput: process.env.LOG_FORMAT === "json",
      ...config,
    };
  }

  child(overrides: Partial<LoggerConfig>): Logger {
    return new Logger({ ...this.config, ...overrides });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.minLevel ?? "info");
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.enabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    for (const key of CONTEXT_KEYS) {
      const value = this.config[key];
      if (value) {
        entry[key] = value;
      }
    }
    if (metadata) {
      entry.metadata = metadata;
    }
    const write = this.config.sink ?? consoleSink;
    write(level, this.config.jsonOutput ? JSON.stringify(entry) : formatText(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.emit("error", message, metadata);
  }

  stepStart(step: string, description: string): void {
    this.info(`[${step}] ${description}`, { step, event: "step_start" });
  }

  stepComplete(step: string, durationMs: number): void {
    this.info(`[${step}] Completed in ${durationMs}ms`, { step, event: "step_complete", durationMs });
  }

  stepFailed(step: string, error: string): void {
    this.error(`[${step}] Failed: ${error}`, { step, event: "step_failed", error });
  }

  retry(attempt: number, maxAttempts: number, reason: string): void {
    this.warn(`Retrying (${attempt}/${maxAttempts}): ${reason}`, {
      event: "retry",
      attempt,
      maxAttempts,
      reason,
    });
  }

  // Full response dump for post-mortem of agent rounds
  agentInteraction(agent: string, attempt: number, prompt: string, response: string): void {
    this.debug(`[${agent}] attempt ${attempt}`, {
      event: "agent_interaction",
      promptChars: prompt.length,
      response,
    });
  }
}

export function createLogger(
  component: string,
  context: Omit<LoggerConfig, "component"> = {},
  env: NodeJS.ProcessEnv = process.env,
): Logger {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return new Logger({
    component,
    minLevel: isLogLevel(level) ? level : "info",
    jsonOutput: env.LOG_FORMAT === "json",
    ...context,
  });
}

// Silent logger for tests and library defaults
export function createNullLogger(component = "null"): Logger {
  return new Logger({ component, sink: () => undefined });
}

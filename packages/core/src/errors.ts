export type ReviewLoopErrorCode =
  | "provider"
  | "parse"
  | "provisioning"
  | "patch_application"
  | "test_execution"
  | "hosting"
  | "timeout";

export class ReviewLoopError extends Error {
  readonly code: ReviewLoopErrorCode;

  constructor(code: ReviewLoopErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Agent Client unreachable, errored, or returned nothing
export class ProviderError extends ReviewLoopError {
  readonly provider: string;
  readonly status?: number;

  constructor(
    provider: string,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super("provider", `[${provider}] ${message}`, options);
    this.provider = provider;
    this.status = options?.status;
  }
}

// Malformed structured tags. Recovered locally, never surfaced as a failure.
export class ParseError extends ReviewLoopError {
  readonly rawText: string;

  constructor(message: string, rawText: string) {
    super("parse", message);
    this.rawText = rawText;
  }
}

// Repository, branch, or MR creation failed
export class ProvisioningError extends ReviewLoopError {
  readonly scenarioId: string;

  constructor(scenarioId: string, message: string, options?: { cause?: unknown }) {
    super("provisioning", `Provisioning ${scenarioId} failed: ${message}`, options);
    this.scenarioId = scenarioId;
  }
}

// One suggestion could not be applied. Recorded as `unapplied`.
export class PatchApplicationError extends ReviewLoopError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super("patch_application", message);
    this.filePath = filePath;
  }
}

// The test command could not run at all
export class TestExecutionError extends ReviewLoopError {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super("test_execution", message, options);
    this.command = command;
  }
}

// Hosting-service read/write failed outside provisioning
export class HostingError extends ReviewLoopError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("hosting", message, options);
    this.status = options?.status;
  }
}

export class TimeoutError extends ReviewLoopError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error && "message" in error) {
    return String((error as { message?: unknown }).message ?? "Unknown error");
  }
  return String(error);
}

export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error && "status" in error) {
    const status = Number((error as { status?: unknown }).status);
    if (Number.isFinite(status)) {
      return status;
    }
  }
  return undefined;
}

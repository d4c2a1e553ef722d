export function inFlightKey(mrId: string, commitSha: string): string {
  return `${mrId}@${commitSha}`;
}

export type JobErrorHandler = (key: string, error: unknown) => void;

/**
 * Deliveries currently being processed, keyed on (mr_id, commit_sha). The key
 * is claimed before anything is awaited, so a duplicate delivery that arrives
 * while the first is queued or running is turned away. Jobs for the same MR
 * run one after another; different MRs proceed concurrently.
 */
export class InFlightRegistry {
  private readonly keys = new Set<string>();
  private readonly tails = new Map<string, Promise<void>>();
  private readonly onError: JobErrorHandler;

  constructor(onError: JobErrorHandler) {
    this.onError = onError;
  }

  has(mrId: string, commitSha: string): boolean {
    return this.keys.has(inFlightKey(mrId, commitSha));
  }

  get size(): number {
    return this.keys.size;
  }

  // Resolves when the job has finished, or returns null for a duplicate
  submit(mrId: string, commitSha: string, job: () => Promise<void>): Promise<void> | null {
    const key = inFlightKey(mrId, commitSha);
    if (this.keys.has(key)) {
      return null;
    }
    this.keys.add(key);

    const previous = this.tails.get(mrId) ?? Promise.resolve();
    const run: Promise<void> = previous
      .then(job)
      .catch((error: unknown) => this.onError(key, error))
      .finally(() => {
        this.keys.delete(key);
        if (this.tails.get(mrId) === run) {
          this.tails.delete(mrId);
        }
      });
    this.tails.set(mrId, run);
    return run;
  }

  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}

import { TimeoutError } from "./errors";

/**
 * Runs `operation` with an abort signal and rejects once `timeoutMs` elapses.
 * A non-positive or non-finite timeout disables the bound.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  createError: (label: string, timeoutMs: number) => Error = (l, ms) => new TimeoutError(l, ms),
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return operation(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(createError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

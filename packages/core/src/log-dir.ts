import { fileURLToPath } from "node:url";
import { resolve } from "node:path";

export const DEFAULT_LOG_DIR = fileURLToPath(new URL("../../../raw-logs", import.meta.url));

export function resolveLogDir(options: {
  fallbackDir?: string;
  env?: NodeJS.ProcessEnv;
} = {}): string {
  const env = options.env ?? process.env;
  const candidate = env.REVIEWLOOP_LOG_DIR?.trim();
  if (candidate) {
    return resolve(candidate);
  }
  return resolve(options.fallbackDir ?? DEFAULT_LOG_DIR);
}

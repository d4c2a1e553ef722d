import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import { resolveLogDir } from "./log-dir";

export interface ProcessLoggingOptions {
  label?: string;
  logDir?: string;
}

export interface ProcessLog {
  path: string;
  // Restores the original writers; resolves once the file is flushed
  close(): Promise<void>;
}

function tee(target: NodeJS.WriteStream, file: WriteStream): () => void {
  const original = target.write;
  const write = original.bind(target);
  target.write = ((chunk, encoding, callback) => {
    file.write(chunk);
    return write(chunk, encoding as never, callback as never);
  }) as typeof target.write;
  return () => {
    target.write = original;
  };
}

// Copies everything the process prints into <logDir>/<logName>.log
export function setupProcessLogging(
  logName: string,
  options: ProcessLoggingOptions = {},
): ProcessLog | undefined {
  const logDir = options.logDir ?? resolveLogDir();

  try {
    mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error(`[Logger] Could not create log dir ${logDir}:`, error);
    return undefined;
  }

  const path = join(logDir, `${logName}.log`);
  const file = createWriteStream(path, { flags: "a" });
  file.write(`\n=== ${logName} started ${new Date().toISOString()} (pid ${process.pid}) ===\n`);

  const restoreStdout = tee(process.stdout, file);
  const restoreStderr = tee(process.stderr, file);
  let closed = false;
  const close = () =>
    new Promise<void>((resolve) => {
      if (closed) {
        resolve();
        return;
      }
      closed = true;
      restoreStdout();
      restoreStderr();
      file.end(resolve);
    });
  process.once("exit", () => {
    void close();
  });

  console.log(`[Logger] ${options.label ?? logName} output is copied to ${path}`);
  return { path, close };
}

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve } from "node:path";

// File access for the patch applier, rooted at one working tree
export interface Workspace {
  readonly root: string;
  // null when the file does not exist
  readFile(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export class FsWorkspace implements Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  // Suggestion paths come from model output; keep them inside the tree
  private resolvePath(path: string): string {
    const target = resolve(this.root, path);
    const rel = relative(this.root, target);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(`Path escapes the working tree: ${path}`);
    }
    return target;
  }

  async readFile(path: string): Promise<string | null> {
    let target: string;
    try {
      target = this.resolvePath(path);
    } catch {
      return null;
    }
    try {
      return await readFile(target, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const target = this.resolvePath(path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf8");
  }
}

// Map-backed workspace for tests and dry runs
export class MemoryWorkspace implements Workspace {
  readonly root = "memory:";
  readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  async readFile(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }
}

import { access, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import {
  MergeRequestHandle,
  ProvisioningError,
  createNullLogger,
  describeError,
  type Logger,
  type Scenario,
} from "@reviewloop/core";
import {
  applyPatch,
  branchExists,
  checkoutBranch,
  commitAll,
  createBranch,
  initRepo,
  push,
  setRemote,
  type GitResult,
  type HostingClient,
} from "@reviewloop/vcs";

export interface ProvisionedScenario {
  scenario: Scenario;
  workingTree: string;
  repo: string;
  baseBranch: string;
  sourceBranch: string;
  handle: MergeRequestHandle;
  // Pushes follow-up commits (applied fixes) when the hosting service has a remote
  pushSourceBranch(): Promise<void>;
  cleanup(): Promise<void>;
}

export interface ProvisionerOptions {
  hosting: HostingClient;
  // Parent directory for working trees; a fresh temp dir per scenario when unset
  workRoot?: string;
  repoPrefix?: string;
  baseBranch?: string;
  keepWorkingTrees?: boolean;
  logger?: Logger;
  now?: () => number;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Turns a scenario into a working tree with a base branch, a source branch
 * carrying the seed diff, and an open MR between them.
 */
export class RepositoryProvisioner {
  private readonly hosting: HostingClient;
  private readonly options: ProvisionerOptions;
  private readonly logger: Logger;
  private readonly baseBranch: string;
  private readonly now: () => number;

  constructor(options: ProvisionerOptions) {
    this.hosting = options.hosting;
    this.options = options;
    this.logger = options.logger ?? createNullLogger("provisioner");
    this.baseBranch = options.baseBranch ?? "main";
    this.now = options.now ?? Date.now;
  }

  private async git(scenario: Scenario, step: string, run: () => Promise<GitResult>): Promise<void> {
    const result = await run();
    if (!result.success) {
      throw new ProvisioningError(scenario.id, `${step}: ${result.stderr || result.stdout}`);
    }
  }

  private async prepareWorkingTree(scenario: Scenario): Promise<{ dir: string; reused: boolean }> {
    if (!this.options.workRoot) {
      return { dir: await mkdtemp(join(tmpdir(), `reviewloop-${scenario.id}-`)), reused: false };
    }
    const dir = join(this.options.workRoot, scenario.id);
    await mkdir(dir, { recursive: true });
    return { dir, reused: await pathExists(join(dir, ".git")) };
  }

  private async writeBaseFiles(scenario: Scenario, dir: string): Promise<void> {
    for (const [path, content] of Object.entries(scenario.baseFiles)) {
      const target = join(dir, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf8");
    }
  }

  // Preferred name first; a taken name becomes <branch>-<id>-<timestamp>
  private async resolveSourceBranch(scenario: Scenario, dir: string): Promise<string> {
    const preferred = scenario.branch ?? `review/${scenario.id}`;
    if (!(await branchExists(dir, preferred))) {
      return preferred;
    }
    const renamed = `${preferred}-${scenario.id}-${this.now()}`;
    this.logger.warn(`Branch ${preferred} already exists, using ${renamed}`);
    return renamed;
  }

  async provision(scenario: Scenario, signal?: AbortSignal): Promise<ProvisionedScenario> {
    const logger = this.logger.child({ scenarioId: scenario.id });
    const { dir, reused } = await this.prepareWorkingTree(scenario);
    const cleanup = async (): Promise<void> => {
      if (!this.options.keepWorkingTrees) {
        await rm(dir, { recursive: true, force: true });
      }
    };

    try {
      if (reused) {
        logger.info(`Reusing working tree ${dir}`);
        await this.git(scenario, "checkout base", () => checkoutBranch(dir, this.baseBranch));
      } else {
        await this.git(scenario, "git init", () => initRepo(dir, this.baseBranch));
      }
      await this.writeBaseFiles(scenario, dir);
      await this.git(scenario, "commit base", () =>
        commitAll(dir, "Init: base architecture and tests"),
      );

      const sourceBranch = await this.resolveSourceBranch(scenario, dir);
      await this.git(scenario, `create branch ${sourceBranch}`, () =>
        createBranch(dir, sourceBranch, this.baseBranch),
      );
      await this.git(scenario, "apply seed diff", () => applyPatch(dir, scenario.seedDiff));
      await this.git(scenario, "commit seed diff", () =>
        commitAll(dir, `feat: ${scenario.title}`),
      );

      // Nothing reaches the hosting service once the scenario is abandoned
      signal?.throwIfAborted();
      const repository = await this.hosting.ensureRepository(
        `${this.options.repoPrefix ?? ""}${scenario.id}`,
      );
      const remote = this.hosting.describe().remote;
      if (remote) {
        if (!repository.pushUrl) {
          throw new ProvisioningError(scenario.id, `no push URL for ${repository.name}`);
        }
        const pushUrl = repository.pushUrl;
        await this.git(scenario, "set remote", () => setRemote(dir, "origin", pushUrl));
        await this.git(scenario, "push base", () =>
          push(dir, this.baseBranch, { force: repository.created }),
        );
        await this.git(scenario, "push source", () => push(dir, sourceBranch, { force: true }));
      }

      signal?.throwIfAborted();
      const created = await this.hosting.createMergeRequest({
        repo: repository.name,
        sourceBranch,
        targetBranch: this.baseBranch,
        title: `Feat: ${scenario.title}`,
        description: scenario.description,
        workingTree: dir,
      });
      logger.info(`Opened ${created.mrId}${created.webUrl ? ` (${created.webUrl})` : ""}`);

      const handle = new MergeRequestHandle(
        {
          mrId: created.mrId,
          repo: repository.name,
          sourceBranch,
          targetBranch: this.baseBranch,
          webUrl: created.webUrl,
          currentLabel: "needs_review",
        },
        () => this.hosting.getDiff(created.mrId),
      );

      return {
        scenario,
        workingTree: dir,
        repo: repository.name,
        baseBranch: this.baseBranch,
        sourceBranch,
        handle,
        pushSourceBranch: async () => {
          if (remote) {
            await this.git(scenario, "push fixes", () => push(dir, sourceBranch));
          }
        },
        cleanup,
      };
    } catch (error) {
      await cleanup();
      if (error instanceof ProvisioningError) {
        throw error;
      }
      throw new ProvisioningError(scenario.id, describeError(error), { cause: error });
    }
  }
}

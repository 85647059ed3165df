import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { Assistant } from "./assistant.js";
import { CliAssistant, offlineAssistant } from "./assistant.js";
import type { Backend } from "./backends.js";
import { BackendDispatcher, createBackend } from "./backends.js";
import { BranchNamer, branchSlug } from "./branches.js";
import { buildPullRequestDraft, planPR } from "./builder.js";
import type { RunConfig } from "./config.js";
import type { ErrorCode } from "./errors.js";
import { NightshiftError, PrerequisiteMissing, errorMessage } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import type { GroupReport } from "./group.js";
import { GroupRunner } from "./group.js";
import { componentLogger, logFailure, repositoryLogPath } from "./log.js";
import { buildCompareUrl, ghAuthenticated, ghAvailable } from "./providers.js";
import { PublishPipeline } from "./publish.js";
import { groupTasks, parseTasks } from "./tasks.js";
import type { Repository, TaskGroup } from "./types.js";
import { appendLog, getRemoteUrl, gitTry, pathExists, refExists, sleep, tsCompact } from "./utils.js";
import { WorkspaceManager } from "./workspaces.js";

const log = componentLogger("orchestrator");

export type PlannedGroup = {
  lead: string;
  members: string[];
  specifications: string[];
  branch: string;
  workspace: string;
};

export type RepositoryReport = {
  repository: string;
  path: string;
  status: "processed" | "planned" | "no-tasks" | "failed";
  baseBranch?: string;
  logPath: string;
  groups: GroupReport[];
  plan: PlannedGroup[];
  error?: string;
};

export type RunReport = {
  dryRun: boolean;
  repositories: RepositoryReport[];
  aborted?: { code: ErrorCode; message: string };
};

export type CleanReport = Array<{ repository: string; removed: string[] }>;

export type OrchestratorDeps = {
  runner: CommandRunner;
  assistant?: Assistant;
  backend?: Backend;
  clock?: () => Date;
  // settle wait before PR creation
  wait?: (ms: number) => Promise<void>;
  runStamp?: string;
};

/** 0: every group succeeded, 2: some group or repository failed, 1: the run was aborted. */
export function exitCodeFor(report: RunReport): 0 | 1 | 2 {
  if (report.aborted) return 1;
  const failed = report.repositories.some(r => r.status === "failed" || r.groups.some(g => g.state === "failed"));
  return failed ? 2 : 0;
}

function planFor(group: TaskGroup): Omit<PlannedGroup, "branch" | "workspace"> {
  const all = [group.leadTask, ...group.memberTasks];
  return {
    lead: group.leadTask.title,
    members: group.memberTasks.map(t => t.title),
    specifications: all.flatMap(t => (t.specificationLink ? [t.specificationLink] : [])),
  };
}

export class Orchestrator {
  private assistant: Assistant;
  private readonly workspaces: WorkspaceManager;
  private readonly dispatcher: BackendDispatcher;
  private readonly publisher: PublishPipeline;
  private readonly runner: CommandRunner;
  private readonly clock: () => Date;
  readonly runStamp: string;

  constructor(private readonly config: RunConfig, deps: OrchestratorDeps) {
    this.runner = deps.runner;
    this.clock = deps.clock ?? (() => new Date());
    this.runStamp = deps.runStamp ?? tsCompact(this.clock());
    this.assistant = deps.assistant ?? new CliAssistant(config.assistant, this.runner);
    this.workspaces = new WorkspaceManager(config, this.runner);
    this.dispatcher = new BackendDispatcher(config, deps.backend ?? createBackend(config, this.runner), this.runner, this.clock);
    this.publisher = new PublishPipeline(config, this.runner, deps.wait ?? sleep);
  }

  /** Throws PrerequisiteMissing or BackendUnavailableHard. */
  checkPrerequisites(): void {
    if (!this.runner.exists("git")) {
      throw new PrerequisiteMissing("git", ["Install git and make sure it is on PATH"]);
    }
    if (this.assistant instanceof CliAssistant && !this.assistant.available()) {
      log.info("{command} CLI not found; task parsing, branch names and commit messages use built-in rules", {
        command: this.config.assistant.command,
      });
      this.assistant = offlineAssistant;
    }
    if (this.config.dryRun) return;
    if (this.config.createPullRequests) {
      if (!ghAvailable(this.runner)) {
        throw new PrerequisiteMissing("gh", ["Install the GitHub CLI: https://cli.github.com", "Or run without pull request creation"]);
      }
      if (!ghAuthenticated(this.runner)) {
        throw new PrerequisiteMissing("gh authentication", ["Run: gh auth login"]);
      }
    }
    this.dispatcher.checkAvailability();
  }

  async discoverRepositories(): Promise<Repository[]> {
    const { taskFile } = this.config;
    let candidates: string[];
    if (this.config.repositories.length > 0) {
      candidates = [...this.config.repositories];
    } else {
      if (!(await pathExists(this.config.root))) {
        log.warn("Root directory {root} does not exist", { root: this.config.root });
        return [];
      }
      const files = await fg(`*/${fg.escapePath(taskFile)}`, { cwd: this.config.root, absolute: true, onlyFiles: true });
      candidates = files.sort().map(f => path.dirname(f));
    }

    const repos: Repository[] = [];
    for (const dir of candidates) {
      const name = path.basename(dir);
      if (!(await pathExists(path.join(dir, ".git")))) {
        log.info("Skipping {path}: not a git repository", { repository: name, path: dir });
        continue;
      }
      const file = path.join(dir, taskFile);
      if (!(await pathExists(file))) {
        log.info("Skipping {path}: no {taskFile}", { repository: name, path: dir, taskFile });
        continue;
      }
      repos.push({ name, path: dir, taskFile: file });
    }
    return repos;
  }

  detectBaseBranch(repository: Repository): string | null {
    const { baseBranch, remote } = this.config;
    const has = (branch: string) =>
      refExists(this.runner, `refs/heads/${branch}`, repository.path) ||
      refExists(this.runner, `refs/remotes/${remote}/${branch}`, repository.path);

    if (has(baseBranch)) return baseBranch;

    const ctx = { repository: repository.name, configured: baseBranch };
    const head = gitTry(this.runner, ["symbolic-ref", "--short", `refs/remotes/${remote}/HEAD`], repository.path);
    if (head && head.startsWith(`${remote}/`)) {
      const detected = head.slice(remote.length + 1);
      log.warn("Base branch {configured} not found; using remote default {detected}", { ...ctx, detected });
      return detected;
    }
    for (const candidate of ["main", "master"]) {
      if (has(candidate)) {
        log.warn("Base branch {configured} not found; using {detected}", { ...ctx, detected: candidate });
        return candidate;
      }
    }
    return null;
  }

  async processRepository(repository: Repository): Promise<RepositoryReport> {
    const rlog = log.with({ repository: repository.name });
    const logPath = repositoryLogPath(this.config, repository, this.runStamp);
    const report: RepositoryReport = { repository: repository.name, path: repository.path, status: "processed", logPath, groups: [], plan: [] };
    const failed = (error: string): RepositoryReport => {
      rlog.error("{error}", { error });
      return { ...report, status: "failed", error };
    };

    rlog.info("Processing repository {path}", { path: repository.path });

    let document: string;
    try {
      document = await fs.readFile(repository.taskFile, "utf8");
    } catch (e) {
      return failed(`Could not read ${repository.taskFile}: ${errorMessage(e)}`);
    }

    const groups = groupTasks(parseTasks(document, this.assistant));
    if (groups.length === 0) {
      rlog.info("No pending tasks in {taskFile}", { taskFile: repository.taskFile });
      return { ...report, status: "no-tasks" };
    }
    rlog.info("Found {count} task group(s)", { count: groups.length });

    const baseBranch = this.detectBaseBranch(repository);
    if (!baseBranch) {
      return failed(`No base branch found (tried ${this.config.baseBranch}, remote HEAD, main, master); skipping repository`);
    }

    const namer = new BranchNamer(this.clock);
    const named = groups.map(group => ({ group, branch: namer.next(branchSlug(group.leadTask.title, this.assistant)) }));

    if (this.config.dryRun) {
      const remoteUrl = getRemoteUrl(this.runner, this.config.remote, repository.path);
      const plan = named.map(({ group, branch }) => {
        const workspace = { path: this.workspaces.pathFor(repository, branch), branchName: branch, baseBranch, repositoryPath: repository.path };
        const draft = buildPullRequestDraft([group.leadTask, ...group.memberTasks], workspace);
        rlog.info("[dry-run] {branch} from {base} at {workspace}\n{draft}", {
          branch,
          base: baseBranch,
          workspace: workspace.path,
          draft: planPR(draft, buildCompareUrl(remoteUrl, baseBranch, branch)),
        });
        return { ...planFor(group), branch, workspace: workspace.path };
      });
      return { ...report, status: "planned", baseBranch, plan };
    }

    await appendLog(logPath, `=== ${repository.name} (${repository.path}) base ${baseBranch} ===`);
    const groupRunner = new GroupRunner(
      {
        config: this.config,
        runner: this.runner,
        assistant: this.assistant,
        workspaces: this.workspaces,
        dispatcher: this.dispatcher,
        publisher: this.publisher,
      },
      repository,
      baseBranch,
      logPath,
    );
    for (const { group, branch } of named) {
      rlog.info("Task group {lead} on {branch}", { lead: group.leadTask.title, branch });
      report.groups.push(await groupRunner.run(group, branch));
    }
    return { ...report, baseBranch };
  }

  /** Processes every repository in order. Only run-aborting errors end the loop early. */
  async run(): Promise<RunReport> {
    const report: RunReport = { dryRun: this.config.dryRun, repositories: [] };
    try {
      this.checkPrerequisites();
      const repositories = await this.discoverRepositories();
      if (repositories.length === 0) log.warn("No repositories with {taskFile} found", { taskFile: this.config.taskFile });
      for (const repository of repositories) {
        try {
          report.repositories.push(await this.processRepository(repository));
        } catch (e) {
          if (e instanceof NightshiftError && e.abortsRun) throw e;
          log.error("Repository {repository} failed: {error}", { repository: repository.name, error: errorMessage(e) });
          report.repositories.push({
            repository: repository.name,
            path: repository.path,
            status: "failed",
            logPath: repositoryLogPath(this.config, repository, this.runStamp),
            groups: [],
            plan: [],
            error: errorMessage(e),
          });
        }
      }
    } catch (e) {
      if (!(e instanceof NightshiftError) || !e.abortsRun) throw e;
      logFailure(log, e);
      report.aborted = { code: e.code, message: e.message };
    }
    return report;
  }

  /** Removes leftover workspaces of every discovered repository. */
  async clean(): Promise<CleanReport> {
    if (!this.runner.exists("git")) {
      throw new PrerequisiteMissing("git", ["Install git and make sure it is on PATH"]);
    }
    const out: CleanReport = [];
    for (const repository of await this.discoverRepositories()) {
      out.push({ repository: repository.name, removed: await this.workspaces.bulkCleanup(repository) });
    }
    return out;
  }
}

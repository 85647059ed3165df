import type { Assistant } from "./assistant.js";
import type { BackendDispatcher } from "./backends.js";
import { commitChanges } from "./commit.js";
import type { RunConfig } from "./config.js";
import type { ErrorCode } from "./errors.js";
import { BackendExecutionFailed, CommitFailed, NightshiftError, WorkspaceCreationFailed, errorMessage } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import { componentLogger, logFailure } from "./log.js";
import type { PublishPipeline } from "./publish.js";
import { loadSpecification } from "./specs.js";
import type { PublishOutcome, Repository, Task, TaskGroup, Workspace } from "./types.js";
import { tasksOf } from "./types.js";
import type { WorkspaceManager } from "./workspaces.js";

const log = componentLogger("group");

type Base = { group: TaskGroup; branchName: string; done: Task[]; commits: number };

export type Idle = Base & { kind: "idle" };
export type WorkspaceReady = Base & { kind: "workspace-ready"; workspace: Workspace };
export type Implementing = Base & { kind: "implementing"; workspace: Workspace; task: Task };
export type Committed = Base & { kind: "committed"; workspace: Workspace };
export type Published = Base & { kind: "published"; workspace: Workspace; outcome: PublishOutcome };
export type Failed = Base & {
  kind: "failed";
  workspace: Workspace | null;
  code: ErrorCode;
  message: string;
  outcome?: PublishOutcome;
};

/** idle -> workspace-ready -> (implementing -> committed)* -> published | failed */
export type GroupState = Idle | WorkspaceReady | Implementing | Committed | Published | Failed;

export type GroupReport = {
  lead: string;
  branch: string;
  workspace: string | null;
  state: "published" | "failed";
  done: string[];
  skipped: string[];
  commits: number;
  outcome?: PublishOutcome;
  error?: { code: ErrorCode; message: string };
};

export type GroupRunnerDeps = {
  config: Pick<RunConfig, "cleanupWorkspaces" | "specMaxBytes">;
  runner: CommandRunner;
  assistant: Assistant;
  workspaces: WorkspaceManager;
  dispatcher: BackendDispatcher;
  publisher: PublishPipeline;
};

function fail(from: Base & { workspace?: Workspace | null }, err: NightshiftError, outcome?: PublishOutcome): Failed {
  return {
    kind: "failed",
    group: from.group,
    branchName: from.branchName,
    done: from.done,
    commits: from.commits,
    workspace: from.workspace ?? null,
    code: err.code,
    message: err.message,
    ...(outcome ? { outcome } : {}),
  };
}

/** Drives one task group of one repository through its states. */
export class GroupRunner {
  constructor(
    private readonly deps: GroupRunnerDeps,
    private readonly repository: Repository,
    private readonly baseBranch: string,
    private readonly logPath?: string,
  ) {}

  idle(group: TaskGroup, branchName: string): Idle {
    return { kind: "idle", group, branchName, done: [], commits: 0 };
  }

  async openWorkspace(state: Idle): Promise<WorkspaceReady | Failed> {
    try {
      const workspace = await this.deps.workspaces.create(this.repository, state.branchName, this.baseBranch);
      return { ...state, kind: "workspace-ready", workspace };
    } catch (e) {
      const err = e instanceof NightshiftError ? e : new WorkspaceCreationFailed(errorMessage(e), this.ctx(state));
      logFailure(log, err);
      return fail(state, err);
    }
  }

  async implement(state: WorkspaceReady | Committed, task: Task): Promise<Implementing | Failed> {
    const ctx = { ...this.ctx(state), task: task.title };
    try {
      const specification = task.specificationLink
        ? await loadSpecification(this.repository.path, task.specificationLink, this.deps.config.specMaxBytes)
        : null;
      if (specification?.content) {
        log.info("Loaded specification {link}: {bytes} bytes", { ...ctx, link: task.specificationLink, bytes: specification.bytes });
      } else if (task.specificationLink) {
        log.info("Using task title only (specification not available)", ctx);
      }
      const result = await this.deps.dispatcher.dispatch({
        repositoryName: this.repository.name,
        workspace: state.workspace,
        task,
        specification,
        logPath: this.logPath,
      });
      if (!result.succeeded) {
        const err = new BackendExecutionFailed(result.exitCode, { ...ctx, logPath: result.logPath });
        logFailure(log, err);
        if (result.logExcerpt) log.error("Backend output (tail):\n{excerpt}", { ...ctx, excerpt: result.logExcerpt });
        return fail(state, err);
      }
      return { kind: "implementing", group: state.group, branchName: state.branchName, done: state.done, commits: state.commits, workspace: state.workspace, task };
    } catch (e) {
      if (e instanceof NightshiftError && e.abortsRun) throw e;
      const err = e instanceof NightshiftError ? e : new BackendExecutionFailed(-1, { ...ctx, cause: errorMessage(e) });
      logFailure(log, err);
      return fail(state, err);
    }
  }

  async commit(state: Implementing): Promise<Committed | Failed> {
    try {
      const res = await commitChanges(this.deps.runner, state.workspace, state.task, { assistant: this.deps.assistant, logPath: this.logPath });
      return {
        kind: "committed",
        group: state.group,
        branchName: state.branchName,
        workspace: state.workspace,
        done: [...state.done, state.task],
        commits: state.commits + (res.committed ? 1 : 0),
      };
    } catch (e) {
      const err = e instanceof NightshiftError
        ? e
        : new CommitFailed(errorMessage(e), { ...this.ctx(state), task: state.task.title });
      logFailure(log, err);
      return fail(state, err);
    }
  }

  async publish(state: Committed): Promise<Published | Failed> {
    const outcome = await this.deps.publisher.publish(state.workspace, state.done, { logPath: this.logPath });
    if (outcome.state === "failed-push" || outcome.state === "failed-publish-partial") {
      const code: ErrorCode = outcome.state === "failed-push" ? "PUSH_FAILED" : "PUBLISH_PARTIAL";
      return fail(state, new NightshiftError(outcome.error, code, this.ctx(state)), outcome);
    }
    return { ...state, kind: "published", outcome };
  }

  /** Full lifecycle. The workspace is removed on the way out when cleanup is configured, whatever happened. */
  async run(group: TaskGroup, branchName: string): Promise<GroupReport> {
    const opened = await this.openWorkspace(this.idle(group, branchName));
    if (opened.kind === "failed") return this.report(opened, tasksOf(group));

    const workspace = opened.workspace;
    const all = tasksOf(group);
    try {
      let current: WorkspaceReady | Committed = opened;
      for (const task of all) {
        const implementing = await this.implement(current, task);
        if (implementing.kind === "failed") return this.report(implementing, all);
        const committed = await this.commit(implementing);
        if (committed.kind === "failed") return this.report(committed, all);
        current = committed;
      }
      // a group always holds its lead, so the loop has run at least once
      if (current.kind === "workspace-ready") {
        return this.report(fail(current, new CommitFailed("group has no tasks", this.ctx(current))), all);
      }
      return this.report(await this.publish(current), all);
    } finally {
      if (this.deps.config.cleanupWorkspaces) {
        log.info("Cleaning up workspace {path}", { ...this.ctx(opened), path: workspace.path });
        await this.deps.workspaces.remove(workspace);
      } else {
        log.info("Workspace preserved at {path}", { ...this.ctx(opened), path: workspace.path });
      }
    }
  }

  private ctx(state: Base) {
    return { repository: this.repository.name, branch: state.branchName };
  }

  private report(state: Published | Failed, all: readonly Task[]): GroupReport {
    const doneSet = new Set(state.done);
    const skipped = state.kind === "failed" ? all.filter(t => !doneSet.has(t)) : [];
    for (const t of skipped) {
      log.error("Task not implemented: {task}", { ...this.ctx(state), task: t.title });
    }
    return {
      lead: state.group.leadTask.title,
      branch: state.branchName,
      workspace: state.workspace?.path ?? null,
      state: state.kind,
      done: state.done.map(t => t.title),
      skipped: skipped.map(t => t.title),
      commits: state.commits,
      ...(state.outcome ? { outcome: state.outcome } : {}),
      ...(state.kind === "failed" ? { error: { code: state.code, message: state.message } } : {}),
    };
  }
}

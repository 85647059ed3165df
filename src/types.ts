export type Task = {
  readonly title: string;
  readonly specificationLink?: string;
  // 0 = top-level, >0 = subtask
  readonly depth: number;
  readonly sourceOrder: number;
};

export type TaskGroup = {
  readonly leadTask: Task;
  // Subtasks following the lead, in document order. The lead is not repeated here.
  readonly memberTasks: readonly Task[];
};

export type Repository = {
  name: string;
  path: string;
  taskFile: string;
};

export type Workspace = {
  readonly path: string;
  readonly branchName: string;
  readonly baseBranch: string;
  readonly repositoryPath: string;
};

export type BackendMode = "backend" | "marker";

export type BackendResult = {
  succeeded: boolean;
  exitCode: number;
  logExcerpt: string;
  mode: BackendMode;
  logPath?: string;
};

export type PullRequestDraft = {
  readonly title: string;
  readonly body: string;
  readonly headBranch: string;
  readonly baseBranch: string;
};

export type LocalOnlyReason = "no-remote" | "publish-disabled" | "nothing-to-publish";

export type PublishOutcome =
  | { state: "done-local-only"; reason: LocalOnlyReason }
  | { state: "failed-push"; error: string }
  | { state: "failed-publish-partial"; error: string; compareUrl: string | null }
  | { state: "done-published"; url: string };

export function tasksOf(group: TaskGroup): Task[] {
  return [group.leadTask, ...group.memberTasks];
}

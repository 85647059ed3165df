import type { Assistant } from "./assistant.js";
import { commitMessagePrompt, offlineAssistant, withFallback } from "./assistant.js";
import type { CommandRunner } from "./exec.js";
import { outputOf } from "./exec.js";
import { CommitFailed } from "./errors.js";
import { componentLogger } from "./log.js";
import type { Task, Workspace } from "./types.js";
import { appendLog } from "./utils.js";

const log = componentLogger("commit");

const CONVENTIONAL = /^[a-z]+(\([^)]+\))?!?: \S/;

export type CommitResult =
  | { committed: false }
  | { committed: true; sha: string; message: string };

export function fallbackCommitMessage(title: string) {
  return `feat: ${title.toLowerCase()}`;
}

export function commitMessage(title: string, assistant: Assistant = offlineAssistant): string {
  return withFallback(
    "commit message",
    () => {
      const first = (assistant.ask(commitMessagePrompt(title)) ?? "").split(/\r?\n/)[0]?.trim() ?? "";
      return CONVENTIONAL.test(first) ? first : null;
    },
    () => fallbackCommitMessage(title),
  );
}

/**
 * Stages everything in the workspace and commits it. An empty diff is not an
 * error: the backend may legitimately have had nothing to change.
 */
export async function commitChanges(
  runner: CommandRunner,
  workspace: Workspace,
  task: Task,
  opts: { assistant?: Assistant; logPath?: string } = {},
): Promise<CommitResult> {
  const ctx = { branch: workspace.branchName, task: task.title };
  const cwd = workspace.path;

  const add = runner.run("git", ["add", "-A"], { cwd });
  if (add.status !== 0) throw new CommitFailed(outputOf(add) || "git add failed", ctx);

  const diff = runner.run("git", ["diff", "--cached", "--quiet"], { cwd });
  if (diff.status === 0) {
    log.info("No changes to commit for task: {task}", ctx);
    return { committed: false };
  }
  if (diff.status !== 1) throw new CommitFailed(outputOf(diff) || "git diff --cached failed", ctx);

  const message = commitMessage(task.title, opts.assistant);
  const commit = runner.run("git", ["commit", "-m", message], { cwd });
  await appendLog(opts.logPath, outputOf(commit));
  if (commit.status !== 0) throw new CommitFailed(outputOf(commit) || "git commit failed", ctx);

  const rev = runner.run("git", ["rev-parse", "HEAD"], { cwd });
  const sha = rev.status === 0 ? rev.stdout.trim() : "";
  log.info("Committed changes for: {task} ({message})", { ...ctx, message });
  return { committed: true, sha, message };
}

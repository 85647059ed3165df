import type { RunConfig } from "./config.js";
import { buildPullRequestDraft } from "./builder.js";
import type { CommandRunner } from "./exec.js";
import { PublishPartial, PushFailed, errorMessage } from "./errors.js";
import { componentLogger, logFailure } from "./log.js";
import { baseRef, buildCompareUrl, commitsAhead, createPRWithGh, pushBranch } from "./providers.js";
import type { PublishOutcome, Task, Workspace } from "./types.js";
import { appendLog, getRemoteUrl, sleep } from "./utils.js";

const log = componentLogger("publish");

export type PublishConfig = Pick<RunConfig, "remote" | "createPullRequests" | "draftPullRequests" | "settleMs">;

/**
 * no remote            -> done-local-only
 * publishing disabled  -> done-local-only
 * nothing on branch    -> done-local-only
 * push fails           -> failed-push
 * settle, gh pr create -> failed-publish-partial | done-published
 *
 * The branch is never deleted on any of these paths.
 */
export class PublishPipeline {
  constructor(
    private readonly config: PublishConfig,
    private readonly runner: CommandRunner,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async publish(workspace: Workspace, tasks: readonly Task[], opts: { logPath?: string } = {}): Promise<PublishOutcome> {
    const { remote } = this.config;
    const branch = workspace.branchName;
    const ctx = { branch, repository: workspace.repositoryPath };

    const remoteUrl = getRemoteUrl(this.runner, remote, workspace.repositoryPath);
    if (!remoteUrl) {
      log.info("Repository has no '{remote}' remote; changes remain committed to local branch {branch}", { ...ctx, remote });
      return { state: "done-local-only", reason: "no-remote" };
    }
    if (!this.config.createPullRequests) {
      log.info("Publishing disabled; changes remain committed to local branch {branch}", ctx);
      return { state: "done-local-only", reason: "publish-disabled" };
    }
    const ahead = commitsAhead(this.runner, baseRef(this.runner, remote, workspace.baseBranch, workspace.path), branch, workspace.path);
    if (ahead === 0) {
      log.info("Branch {branch} has no commits beyond {base}; nothing to publish", { ...ctx, base: workspace.baseBranch });
      return { state: "done-local-only", reason: "nothing-to-publish" };
    }

    log.info("Pushing {branch} to {remote}", { ...ctx, remote });
    try {
      await appendLog(opts.logPath, pushBranch(this.runner, remote, branch, workspace.path));
    } catch (e) {
      const err = new PushFailed(errorMessage(e), { ...ctx, remote });
      logFailure(log, err);
      return { state: "failed-push", error: err.message };
    }

    if (this.config.settleMs > 0) {
      log.info("Waiting {seconds}s before creating pull request", { ...ctx, seconds: Math.round(this.config.settleMs / 1000) });
      await this.wait(this.config.settleMs);
    }

    const draft = buildPullRequestDraft(tasks, workspace);
    try {
      const url = createPRWithGh(this.runner, draft, { draft: this.config.draftPullRequests, cwd: workspace.repositoryPath });
      await appendLog(opts.logPath, `Pull request: ${url}`);
      log.info("Created pull request {url} (base: {base})", { ...ctx, url, base: draft.baseBranch });
      return { state: "done-published", url };
    } catch (e) {
      const compareUrl = buildCompareUrl(remoteUrl, draft.baseBranch, draft.headBranch);
      const err = new PublishPartial(errorMessage(e), { ...ctx, base: draft.baseBranch, compareUrl });
      logFailure(log, err);
      return { state: "failed-publish-partial", error: err.message, compareUrl };
    }
  }
}

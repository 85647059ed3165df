import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import fg from "fast-glob";
import type { RunConfig } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { outputOf } from "./exec.js";
import { WorkspaceCreationFailed, errorMessage } from "./errors.js";
import { repositoryKey, sanitizeBranchForPath } from "./home.js";
import { componentLogger } from "./log.js";
import type { Repository, Workspace } from "./types.js";
import { ensureDir, git, pathExists, refExists } from "./utils.js";

const log = componentLogger("workspaces");

export type WorktreeEntry = {
  path: string;
  head?: string;
  // full ref, e.g. refs/heads/feat/x-1760000000-1
  branch?: string;
  detached?: boolean;
  bare?: boolean;
};

export function parseWorktreeList(porcelain: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let cur: WorktreeEntry | null = null;
  for (const line of porcelain.split(/\r?\n/)) {
    if (line.startsWith("worktree ")) {
      cur = { path: line.slice("worktree ".length) };
      entries.push(cur);
    } else if (!cur) {
      continue;
    } else if (line.startsWith("HEAD ")) {
      cur.head = line.slice("HEAD ".length);
    } else if (line.startsWith("branch ")) {
      cur.branch = line.slice("branch ".length);
    } else if (line === "detached") {
      cur.detached = true;
    } else if (line === "bare") {
      cur.bare = true;
    }
  }
  return entries;
}

function realpathOr(p: string) {
  try { return fss.realpathSync(p); } catch { return path.resolve(p); }
}

function samePath(a: string, b: string) {
  return path.resolve(a) === path.resolve(b) || realpathOr(a) === realpathOr(b);
}

function isInside(root: string, p: string) {
  const rel = path.relative(realpathOr(root), realpathOr(p));
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * One git worktree per task group, all under `worktreesDir`, named
 * `<repository>-<sha8 of its path>-<branch>`. Directories are only ever deleted through `remove`,
 * which always finishes with `git worktree prune`.
 */
export class WorkspaceManager {
  constructor(
    private readonly config: Pick<RunConfig, "worktreesDir" | "remote">,
    private readonly runner: CommandRunner,
  ) {}

  pathFor(repository: Repository, branchName: string): string {
    return path.join(this.config.worktreesDir, `${repositoryKey(repository)}-${sanitizeBranchForPath(branchName)}`);
  }

  list(repository: Repository): WorktreeEntry[] {
    return parseWorktreeList(git(this.runner, ["worktree", "list", "--porcelain"], repository.path));
  }

  async create(repository: Repository, branchName: string, baseBranch: string): Promise<Workspace> {
    const target = this.pathFor(repository, branchName);
    const ctx = { repository: repository.name, branch: branchName };
    const workspace: Workspace = { path: target, branchName, baseBranch, repositoryPath: repository.path };

    if ((await pathExists(target)) || this.safeList(repository).some(e => samePath(e.path, target))) {
      log.info("Removing existing workspace {path}", { ...ctx, path: target });
      await this.remove(workspace);
    }

    let entries: WorktreeEntry[];
    try {
      entries = this.list(repository);
    } catch (e) {
      throw new WorkspaceCreationFailed(errorMessage(e), ctx);
    }
    const holder = entries.find(e => e.branch === `refs/heads/${branchName}`);
    if (holder) {
      throw new WorkspaceCreationFailed(`branch is already checked out at ${holder.path}`, ctx);
    }

    try {
      await ensureDir(this.config.worktreesDir);
    } catch (e) {
      throw new WorkspaceCreationFailed(errorMessage(e), ctx);
    }

    // An existing branch that is not checked out anywhere is attached as-is so its commits survive.
    const args = refExists(this.runner, `refs/heads/${branchName}`, repository.path)
      ? ["worktree", "add", target, branchName]
      : ["worktree", "add", "-b", branchName, target, this.startPoint(repository, baseBranch)];
    const res = this.runner.run("git", args, { cwd: repository.path });
    if (res.status !== 0) {
      throw new WorkspaceCreationFailed(outputOf(res) || `git ${args.join(" ")} failed`, ctx);
    }
    log.info("Workspace created at {path}", { ...ctx, path: target });
    return workspace;
  }

  /** Never throws. Directory deletion and prune run even when `git worktree remove` succeeded. */
  async remove(workspace: Workspace): Promise<void> {
    const ctx = { repository: path.basename(workspace.repositoryPath), branch: workspace.branchName, path: workspace.path };
    const res = this.runner.run("git", ["worktree", "remove", "--force", workspace.path], { cwd: workspace.repositoryPath });
    if (res.status !== 0) {
      log.warn("git worktree remove failed for {path}: {output}", { ...ctx, output: outputOf(res) });
    }
    if (isInside(this.config.worktreesDir, workspace.path)) {
      try {
        await fs.rm(workspace.path, { recursive: true, force: true });
      } catch (e) {
        log.warn("Could not delete workspace directory {path}: {error}", { ...ctx, error: errorMessage(e) });
      }
    } else {
      log.warn("Refusing to delete {path}: not under the workspaces directory", ctx);
    }
    const prune = this.runner.run("git", ["worktree", "prune"], { cwd: workspace.repositoryPath });
    if (prune.status !== 0) {
      log.warn("git worktree prune failed: {output}", { ...ctx, output: outputOf(prune) });
    }
  }

  /** Removes leftover workspaces of `repository` from interrupted runs. Returns the removed paths. */
  async bulkCleanup(repository: Repository): Promise<string[]> {
    const removed: string[] = [];
    if (await pathExists(this.config.worktreesDir)) {
      const dirs = await fg(`${fg.escapePath(repositoryKey(repository))}-*`, {
        cwd: this.config.worktreesDir,
        onlyDirectories: true,
        absolute: true,
        deep: 1,
      });
      const registered = this.safeList(repository);
      for (const dir of dirs.sort()) {
        const entry = registered.find(e => samePath(e.path, dir));
        if (!entry && !(await this.pointsInto(dir, repository))) continue;
        log.info("Cleaning up workspace {path}", { repository: repository.name, path: dir });
        await this.remove({
          path: dir,
          branchName: entry?.branch?.replace(/^refs\/heads\//, "") ?? "",
          baseBranch: "",
          repositoryPath: repository.path,
        });
        removed.push(dir);
      }
    }
    const prune = this.runner.run("git", ["worktree", "prune"], { cwd: repository.path });
    if (prune.status !== 0) log.warn("git worktree prune failed: {output}", { repository: repository.name, output: outputOf(prune) });
    return removed;
  }

  private startPoint(repository: Repository, baseBranch: string) {
    if (refExists(this.runner, `refs/heads/${baseBranch}`, repository.path)) return baseBranch;
    const remoteRef = `refs/remotes/${this.config.remote}/${baseBranch}`;
    if (refExists(this.runner, remoteRef, repository.path)) return `${this.config.remote}/${baseBranch}`;
    return baseBranch;
  }

  private safeList(repository: Repository): WorktreeEntry[] {
    try { return this.list(repository); } catch { return []; }
  }

  // A worktree's `.git` is a file: "gitdir: <repo>/.git/worktrees/<name>"
  private async pointsInto(dir: string, repository: Repository): Promise<boolean> {
    try {
      const raw = await fs.readFile(path.join(dir, ".git"), "utf8");
      const m = /^gitdir:\s*(.+)$/m.exec(raw);
      if (!m) return false;
      const gitdir = path.resolve(dir, m[1].trim());
      const worktreesRoot = path.join(repository.path, ".git", "worktrees");
      return isInside(worktreesRoot, gitdir);
    } catch {
      return false;
    }
  }
}

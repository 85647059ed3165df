import { describe, it, expect, beforeEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { createNodeRunner } from "../exec.js";
import { repositoryKey } from "../home.js";
import { WorkspaceCreationFailed } from "../errors.js";
import type { Repository } from "../types.js";
import { refExists } from "../utils.js";
import { WorkspaceManager, parseWorktreeList } from "../workspaces.js";
import { makeTempDir, makeTempRepo, runGit } from "./helpers.js";

describe("parseWorktreeList", () => {
  it("reads porcelain output", () => {
    const out = [
      "worktree /r/app",
      "HEAD 1111111111111111111111111111111111111111",
      "branch refs/heads/main",
      "",
      "worktree /w/app-feat-x",
      "HEAD 2222222222222222222222222222222222222222",
      "detached",
      "",
    ].join("\n");
    expect(parseWorktreeList(out)).toEqual([
      { path: "/r/app", head: "1111111111111111111111111111111111111111", branch: "refs/heads/main" },
      { path: "/w/app-feat-x", head: "2222222222222222222222222222222222222222", detached: true },
    ]);
  });
});

describe("WorkspaceManager (git)", () => {
  const runner = createNodeRunner();
  let base: string;
  let repository: Repository;
  let manager: WorkspaceManager;

  beforeEach(async () => {
    base = await makeTempDir();
    const repoPath = await makeTempRepo(path.join(base, "app"));
    repository = { name: "app", path: repoPath, taskFile: path.join(repoPath, "TASKS.md") };
    manager = new WorkspaceManager({ worktreesDir: path.join(base, "worktrees"), remote: "origin" }, runner);
  });

  const live = (target: string) => manager.list(repository).filter(e => e.path === target);

  it("creates a worktree on a new branch from the base", async () => {
    const ws = await manager.create(repository, "feat/a-1-1", "main");
    expect(ws).toEqual({
      path: path.join(base, "worktrees", `${repositoryKey(repository)}-feat-a-1-1`),
      branchName: "feat/a-1-1",
      baseBranch: "main",
      repositoryPath: repository.path,
    });
    expect(await fs.readFile(path.join(ws.path, "README.md"), "utf8")).toBe("# temp\n");
    expect(runGit(["rev-parse", "--abbrev-ref", "HEAD"], ws.path)).toBe("feat/a-1-1");
  });

  it("leaves exactly one live workspace when created twice", async () => {
    const first = await manager.create(repository, "feat/a-1-1", "main");
    await fs.writeFile(path.join(first.path, "scratch.txt"), "left over\n", "utf8");
    const second = await manager.create(repository, "feat/a-1-1", "main");

    expect(second.path).toBe(first.path);
    expect(live(second.path)).toHaveLength(1);
    expect(manager.list(repository)).toHaveLength(2);
  });

  it("keeps commits of an existing branch when recreating its workspace", async () => {
    const first = await manager.create(repository, "feat/a-1-1", "main");
    await fs.writeFile(path.join(first.path, "work.txt"), "done\n", "utf8");
    runGit(["add", "-A"], first.path);
    runGit(["commit", "-q", "-m", "feat: work"], first.path);

    const second = await manager.create(repository, "feat/a-1-1", "main");
    expect(await fs.readFile(path.join(second.path, "work.txt"), "utf8")).toBe("done\n");
  });

  it("refuses a branch that is checked out in another worktree", async () => {
    runGit(["worktree", "add", "-b", "feat/busy", path.join(base, "elsewhere"), "main"], repository.path);
    await expect(manager.create(repository, "feat/busy", "main")).rejects.toBeInstanceOf(WorkspaceCreationFailed);
  });

  it("removes the directory and registration but keeps the branch", async () => {
    const ws = await manager.create(repository, "feat/a-1-1", "main");
    await manager.remove(ws);

    await expect(fs.access(ws.path)).rejects.toThrow();
    expect(live(ws.path)).toHaveLength(0);
    expect(refExists(runner, "refs/heads/feat/a-1-1", repository.path)).toBe(true);
  });

  it("sweeps leftover workspaces of the repository only", async () => {
    const a = await manager.create(repository, "feat/a-1-1", "main");
    const b = await manager.create(repository, "fix/b-1-2", "main");
    const stranger = path.join(base, "worktrees", "other-feat-c");
    await fs.mkdir(stranger, { recursive: true });

    const removed = await manager.bulkCleanup(repository);

    expect(removed).toEqual([a.path, b.path].sort());
    expect(manager.list(repository)).toHaveLength(1);
    expect((await fs.stat(stranger)).isDirectory()).toBe(true);
  });

  it("keeps workspaces of same-named repositories apart", async () => {
    const otherPath = await makeTempRepo(path.join(base, "elsewhere", "app"));
    const other: Repository = { name: "app", path: otherPath, taskFile: path.join(otherPath, "TASKS.md") };

    const mine = await manager.create(repository, "feat/a-1-1", "main");
    const theirs = await manager.create(other, "feat/a-1-1", "main");

    expect(theirs.path).not.toBe(mine.path);
    expect(await fs.readFile(path.join(mine.path, ".git"), "utf8")).toContain(path.join(repository.path, ".git", "worktrees"));
    expect(await fs.readFile(path.join(theirs.path, ".git"), "utf8")).toContain(path.join(otherPath, ".git", "worktrees"));

    expect(await manager.bulkCleanup(other)).toEqual([theirs.path]);
    expect(runGit(["rev-parse", "--abbrev-ref", "HEAD"], mine.path)).toBe("feat/a-1-1");
  });
});

import type { CommandRunner } from "./exec.js";
import { outputOf } from "./exec.js";
import type { PullRequestDraft } from "./types.js";
import { git, gitTry, refExists } from "./utils.js";

export function ghAvailable(runner: CommandRunner): boolean {
  return runner.exists("gh") && runner.run("gh", ["--version"]).status === 0;
}

export function ghAuthenticated(runner: CommandRunner): boolean {
  return runner.run("gh", ["auth", "status"]).status === 0;
}

function toGithubHttps(remoteUrl: string): string | null {
  // git@github.com:user/repo.git -> https://github.com/user/repo
  const ssh = remoteUrl.match(/^git@github\.com:([^#]+?)(?:\.git)?$/i);
  if (ssh) return `https://github.com/${ssh[1]}`.replace(/\.git$/, "");
  // https://github.com/user/repo(.git)?
  const https = remoteUrl.match(/^https:\/\/github\.com\/([^#]+?)(?:\.git)?$/i);
  if (https) return `https://github.com/${https[1]}`.replace(/\.git$/, "");
  return null;
}

export function buildCompareUrl(remoteUrl: string | null, base: string, head: string): string | null {
  if (!remoteUrl) return null;
  const gh = toGithubHttps(remoteUrl);
  if (!gh) return null;
  const enc = (s: string) => encodeURIComponent(s);
  return `${gh}/compare/${enc(base)}...${enc(head)}`;
}

/** `base` resolved to a ref that exists locally, preferring the local branch. */
export function baseRef(runner: CommandRunner, remote: string, base: string, cwd: string): string {
  if (refExists(runner, `refs/heads/${base}`, cwd)) return base;
  if (refExists(runner, `refs/remotes/${remote}/${base}`, cwd)) return `${remote}/${base}`;
  return base;
}

/** Commits on `head` not on `base`; null when git cannot tell. */
export function commitsAhead(runner: CommandRunner, base: string, head: string, cwd: string): number | null {
  const out = gitTry(runner, ["rev-list", "--count", `${base}..${head}`], cwd);
  if (out === null) return null;
  const n = Number(out);
  return Number.isFinite(n) ? n : null;
}

export function pushBranch(runner: CommandRunner, remote: string, branch: string, cwd: string): string {
  return git(runner, ["push", "-u", remote, `refs/heads/${branch}:refs/heads/${branch}`], cwd);
}

export function createPRWithGh(runner: CommandRunner, draft: PullRequestDraft, opts: { draft?: boolean; cwd: string }): string {
  const args = [
    "pr", "create",
    "--base", draft.baseBranch,
    "--head", draft.headBranch,
    "--title", draft.title,
    "--body", draft.body,
  ];
  if (opts.draft) args.push("--draft");
  const res = runner.run("gh", args, { cwd: opts.cwd });
  if (res.status !== 0) throw new Error(outputOf(res) || "gh pr create failed");
  const out = res.stdout.trim();
  const url = out.split(/\s+/).find((s) => s.startsWith("http"));
  return url ?? out;
}

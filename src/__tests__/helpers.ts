import { execFileSync } from "node:child_process";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Assistant } from "../assistant.js";
import type { Backend } from "../backends.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../exec.js";
import { createNodeRunner } from "../exec.js";
import type { BackendResult, Workspace } from "../types.js";

export type RecordedCall = { command: string; args: string[]; opts: CommandOptions };

type Reply = Partial<CommandResult> | ((args: string[], opts: CommandOptions) => Partial<CommandResult>);

/**
 * Scripted CommandRunner. Rules match on command plus an argument prefix; the
 * most recently added matching rule wins. Unmatched calls succeed with empty
 * output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly installed: Set<string>;
  private readonly rules: Array<{ command: string; prefix: string[]; reply: Reply }> = [];

  constructor(installed: string[] = ["git"]) {
    this.installed = new Set(installed);
  }

  on(command: string, prefix: string[], reply: Reply): this {
    this.rules.unshift({ command, prefix, reply });
    return this;
  }

  run(command: string, args: string[], opts: CommandOptions = {}): CommandResult {
    this.calls.push({ command, args, opts });
    const rule = this.rules.find(r => r.command === command && r.prefix.every((p, i) => args[i] === p));
    const reply = rule ? (typeof rule.reply === "function" ? rule.reply(args, opts) : rule.reply) : {};
    return { status: reply.status ?? 0, stdout: reply.stdout ?? "", stderr: reply.stderr ?? "" };
  }

  exists(command: string): boolean {
    return this.installed.has(command);
  }

  callsOf(command: string, ...prefix: string[]): RecordedCall[] {
    return this.calls.filter(c => c.command === command && prefix.every((p, i) => c.args[i] === p));
  }
}

/** Real subprocesses, but `exists` answers from the given table first. */
export function nodeRunnerWith(overrides: Record<string, boolean>): CommandRunner {
  const real = createNodeRunner();
  return {
    run: (command, args, opts) => real.run(command, args, opts),
    exists: command => overrides[command] ?? real.exists(command),
  };
}

export function scriptedAssistant(answer: string | null | ((prompt: string) => string | null)): Assistant & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    ask(prompt) {
      prompts.push(prompt);
      return typeof answer === "function" ? answer(prompt) : answer;
    },
  };
}

/**
 * In-process stand-in for a code-generation CLI. Writes one file per task into
 * the workspace; titles matching `failOn` exit with code 1 instead.
 */
export class FakeBackend implements Backend {
  readonly id = "codex";
  readonly executable = "fake-ai";
  readonly supportsModel = false;
  readonly prompts: string[] = [];

  constructor(private readonly failOn: RegExp | null = null) {}

  run(prompt: string, workspace: Workspace): BackendResult {
    this.prompts.push(prompt);
    const title = /^Task: (.*)$/m.exec(prompt)?.[1] ?? "task";
    if (this.failOn?.test(title)) {
      return { succeeded: false, exitCode: 1, logExcerpt: "model refused", mode: "backend" };
    }
    const file = `${title.toLowerCase().replace(/[^a-z0-9]+/g, "-")}.txt`;
    fss.writeFileSync(path.join(workspace.path, file), `${title}\n`, "utf8");
    return { succeeded: true, exitCode: 0, logExcerpt: "", mode: "backend" };
  }
}

export async function makeTempDir(prefix = "nightshift-test-"): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export function runGit(args: string[], cwd: string) {
  return execFileSync("git", args, { cwd, encoding: "utf8", stdio: ["ignore", "pipe", "pipe"] }).trim();
}

/** A repository on branch `main` with one commit holding `files`. */
export async function makeTempRepo(dir: string, files: Record<string, string> = { "README.md": "# temp\n" }): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  runGit(["init", "-q"], dir);
  runGit(["config", "user.email", "test@example.com"], dir);
  runGit(["config", "user.name", "Test User"], dir);
  runGit(["config", "commit.gpgsign", "false"], dir);
  for (const [name, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await fs.writeFile(path.join(dir, name), content, "utf8");
  }
  runGit(["add", "-A"], dir);
  runGit(["commit", "-q", "-m", "init"], dir);
  runGit(["branch", "-M", "main"], dir);
  return dir;
}

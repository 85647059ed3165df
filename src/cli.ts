#!/usr/bin/env node
import fs from "node:fs/promises";
import * as fss from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { z } from "zod";
import type { Assistant } from "./assistant.js";
import { CliAssistant, offlineAssistant } from "./assistant.js";
import type { RunConfig } from "./config.js";
import { loadConfig, readConfigFile } from "./config.js";
import { NightshiftError, errorMessage } from "./errors.js";
import { createNodeRunner } from "./exec.js";
import { resolveDefaultHome } from "./home.js";
import { configureLogging, shutdownLogging } from "./log.js";
import type { RepositoryReport, RunReport } from "./orchestrator.js";
import { Orchestrator, exitCodeFor } from "./orchestrator.js";
import { groupTasks, parseTasks, tasksFromChecklist } from "./tasks.js";
import { tsCompact } from "./utils.js";

function packageVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(fss.readFileSync(pkgPath, "utf8")));
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

type CommonOptions = {
  config?: string;
  root?: string;
  repo?: string[];
  taskFile?: string;
  logLevel?: string;
};

type RunOptions = CommonOptions & {
  baseBranch?: string;
  remote?: string;
  backend?: string;
  model?: string;
  createPr?: boolean;
  draft?: boolean;
  cleanupWorktrees?: boolean;
  dryRun?: boolean;
  settleMs?: number;
};

function toFlags(opts: RunOptions): Record<string, unknown> {
  const flags: Record<string, unknown> = {
    root: opts.root,
    repositories: opts.repo,
    taskFile: opts.taskFile,
    baseBranch: opts.baseBranch,
    remote: opts.remote,
    backend: opts.backend,
    model: opts.model,
    createPullRequests: opts.createPr,
    draftPullRequests: opts.draft,
    cleanupWorkspaces: opts.cleanupWorktrees,
    dryRun: opts.dryRun,
    settleMs: opts.settleMs,
    logLevel: opts.logLevel,
  };
  return Object.fromEntries(Object.entries(flags).filter(([, v]) => v !== undefined));
}

async function resolveConfig(opts: RunOptions): Promise<RunConfig> {
  const home = resolveDefaultHome(process.env, process.platform, os.homedir());
  const file = await readConfigFile(opts.config, home);
  return loadConfig({ env: process.env, file, flags: toFlags(opts) });
}

function reportFailure(label: string, e: unknown) {
  console.error(`✖ ${label} failed: ${errorMessage(e)}`);
  if (e instanceof NightshiftError) {
    for (const s of e.suggestions) console.error(`  → ${s}`);
  }
  process.exitCode = 1;
}

function printRepository(r: RepositoryReport) {
  switch (r.status) {
    case "failed":
      console.error(`✖ ${r.repository}: ${r.error ?? "failed"}`);
      return;
    case "no-tasks":
      console.log(`✔ ${r.repository}: no pending tasks`);
      return;
    case "planned":
      console.log(`✔ ${r.repository}: ${r.plan.length} group(s) planned from ${r.baseBranch ?? "?"}`);
      for (const g of r.plan) {
        console.log(`  - ${g.branch}  ${g.lead}${g.members.length ? ` (+${g.members.length} subtask(s))` : ""}`);
      }
      return;
    case "processed":
      for (const g of r.groups) {
        const where = g.outcome?.state === "done-published"
          ? g.outcome.url
          : g.outcome?.state === "done-local-only"
            ? `local branch ${g.branch} (${g.outcome.reason})`
            : g.branch;
        if (g.state === "published") {
          console.log(`✔ ${r.repository}: ${g.lead} → ${where}`);
        } else {
          console.error(`✖ ${r.repository}: ${g.lead}: ${g.error?.code ?? "FAILED"} ${g.error?.message ?? ""}`.trimEnd());
          if (g.outcome?.state === "failed-publish-partial" && g.outcome.compareUrl) {
            console.error(`  → ${g.outcome.compareUrl}`);
          }
          if (g.skipped.length) console.error(`  → not implemented: ${g.skipped.join("; ")}`);
        }
      }
      return;
  }
}

function printReport(report: RunReport, runLog: string) {
  if (report.aborted) console.error(`✖ run aborted: ${report.aborted.message}`);
  for (const r of report.repositories) printRepository(r);
  console.log(`Logs: ${runLog}`);
}

async function runCommand(opts: RunOptions) {
  let configured = false;
  try {
    const config = await resolveConfig(opts);
    const orchestrator = new Orchestrator(config, { runner: createNodeRunner(), runStamp: tsCompact() });
    const runLog = await configureLogging(config, orchestrator.runStamp);
    configured = true;
    const report = await orchestrator.run();
    printReport(report, runLog);
    process.exitCode = exitCodeFor(report);
  } catch (e) {
    reportFailure(opts.dryRun ? "plan" : "run", e);
  } finally {
    if (configured) await shutdownLogging();
  }
}

function intArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`expected a non-negative integer, got '${value}'`);
  return n;
}

const program = new Command();

program
  .name("nightshift")
  .description("Implement TASKS.md checklists in isolated git worktrees with an AI coding CLI")
  .version(packageVersion());

function withCommon(cmd: Command): Command {
  return cmd
    .option("-c, --config <file>", "YAML config file (default: <home>/config.yml)")
    .option("--root <dir>", "directory whose subdirectories are scanned for repositories")
    .option("--repo <path...>", "explicit repositories (overrides discovery)")
    .option("--task-file <name>", "checklist file name (default: TASKS.md)")
    .option("--log-level <level>", "debug|info|warning|error");
}

function withRun(cmd: Command): Command {
  return withCommon(cmd)
    .option("--base-branch <branch>", "branch new work starts from (default: main)")
    .option("--remote <name>", "git remote (default: origin)")
    .option("--backend <id>", "copilot|claude|codex (an explicit choice must be installed)")
    .option("--model <model>", "model passed to the backend")
    .option("--create-pr", "push branches and open pull requests with gh")
    .option("--draft", "open pull requests as drafts")
    .option("--cleanup-worktrees", "remove each worktree when its group finishes")
    .option("--settle-ms <ms>", "wait before creating a pull request", intArg);
}

withRun(program.command("run"))
  .description("Process every pending task group")
  .option("--dry-run", "parse, group and name branches; change nothing")
  .action(async (opts: RunOptions) => {
    await runCommand(opts);
  });

withRun(program.command("plan"))
  .description("Same as run --dry-run")
  .action(async (opts: RunOptions) => {
    await runCommand({ ...opts, dryRun: true });
  });

withCommon(program.command("clean"))
  .description("Remove leftover worktrees of interrupted runs")
  .action(async (opts: CommonOptions) => {
    let configured = false;
    try {
      const config = await resolveConfig(opts);
      const orchestrator = new Orchestrator(config, { runner: createNodeRunner(), runStamp: tsCompact() });
      await configureLogging(config, orchestrator.runStamp);
      configured = true;
      const cleaned = await orchestrator.clean();
      for (const { repository, removed } of cleaned) {
        console.log(`✔ ${repository}: removed ${removed.length} worktree(s)`);
        for (const p of removed) console.log(`  - ${p}`);
      }
    } catch (e) {
      reportFailure("clean", e);
    } finally {
      if (configured) await shutdownLogging();
    }
  });

program
  .command("parse")
  .description("Print the tasks and groups parsed from a checklist as JSON")
  .argument("<file>", "checklist document")
  .option("--checklist", "skip the assistant and use checklist rules only")
  .option("-c, --config <file>", "YAML config file (assistant settings)")
  .action(async (file: string, opts: { checklist?: boolean; config?: string }) => {
    try {
      const document = await fs.readFile(path.resolve(file), "utf8");
      let assistant: Assistant = offlineAssistant;
      if (!opts.checklist) {
        const config = await resolveConfig({ config: opts.config });
        const cli = new CliAssistant(config.assistant, createNodeRunner());
        if (cli.available()) assistant = cli;
      }
      const tasks = opts.checklist ? tasksFromChecklist(document) : parseTasks(document, assistant);
      console.log(JSON.stringify({ tasks, groups: groupTasks(tasks) }, null, 2));
    } catch (e) {
      reportFailure("parse", e);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});

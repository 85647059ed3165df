import * as fss from "node:fs";
import path from "node:path";
import type { BackendId, RunConfig } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { outputOf } from "./exec.js";
import { BackendUnavailableHard } from "./errors.js";
import type { RecoveredKind } from "./errors.js";
import { componentLogger } from "./log.js";
import { writePendingMarker } from "./markers.js";
import { buildTaskPrompt } from "./prompts.js";
import type { LoadedSpecification } from "./specs.js";
import type { BackendResult, Task, Workspace } from "./types.js";
import { appendLog, tail } from "./utils.js";

const log = componentLogger("backends");

export type BackendSettings = {
  model?: string;
  tools: RunConfig["tools"];
  timeoutMs?: number;
};

export type BackendRunOptions = {
  // full CLI output is appended here
  logPath?: string;
};

/** A code-generation CLI: takes a prompt, edits files under the workspace, exits 0 on success. */
export interface Backend {
  readonly id: BackendId;
  readonly executable: string;
  readonly supportsModel: boolean;
  run(prompt: string, workspace: Workspace, opts?: BackendRunOptions): BackendResult;
}

type Invocation = { args: string[]; input?: string };

abstract class CliBackend implements Backend {
  abstract readonly id: BackendId;
  abstract readonly executable: string;
  abstract readonly supportsModel: boolean;

  constructor(
    protected readonly settings: BackendSettings,
    private readonly runner: CommandRunner,
  ) {}

  protected abstract invocation(prompt: string): Invocation;

  protected modelArgs(flag: string): string[] {
    return this.supportsModel && this.settings.model ? [flag, this.settings.model] : [];
  }

  run(prompt: string, workspace: Workspace, opts: BackendRunOptions = {}): BackendResult {
    const { args, input } = this.invocation(prompt);
    log.debug("Running {executable} in {path}", { executable: this.executable, path: workspace.path, branch: workspace.branchName });
    const res = this.runner.run(this.executable, args, { cwd: workspace.path, input, timeoutMs: this.settings.timeoutMs });
    const output = outputOf(res);
    if (opts.logPath) {
      fss.mkdirSync(path.dirname(opts.logPath), { recursive: true });
      fss.appendFileSync(opts.logPath, `${output}\n[${this.id}] exit code ${res.status}\n`, "utf8");
    }
    return {
      succeeded: res.status === 0,
      exitCode: res.status,
      logExcerpt: tail(output),
      mode: "backend",
      logPath: opts.logPath,
    };
  }
}

// Prompt on stdin; tool policy is allow-all minus an explicit deny list.
export class CopilotBackend extends CliBackend {
  readonly id = "copilot";
  readonly executable = "copilot";
  readonly supportsModel = true;

  protected invocation(prompt: string): Invocation {
    const deny = this.settings.tools.copilotDeny.flatMap(t => ["--deny-tool", t]);
    return { args: ["--allow-all-tools", ...deny, ...this.modelArgs("--model")], input: prompt };
  }
}

// Prompt as an argument; tool policy is an allow list plus a permission mode.
export class ClaudeBackend extends CliBackend {
  readonly id = "claude";
  readonly executable = "claude";
  readonly supportsModel = true;

  protected invocation(prompt: string): Invocation {
    return {
      args: [
        "-p", prompt,
        "--allowedTools", this.settings.tools.claudeAllowed.join(","),
        "--permission-mode", this.settings.tools.claudePermissionMode,
        ...this.modelArgs("--model"),
      ],
    };
  }
}

export class CodexBackend extends CliBackend {
  readonly id = "codex";
  readonly executable = "codex";
  readonly supportsModel = true;

  protected invocation(prompt: string): Invocation {
    return { args: ["exec", "--full-auto", ...this.modelArgs("-m"), "-"], input: prompt };
  }
}

export type BackendFactory = (settings: BackendSettings, runner: CommandRunner) => Backend;

export const BACKENDS: Record<BackendId, BackendFactory> = {
  copilot: (s, r) => new CopilotBackend(s, r),
  claude: (s, r) => new ClaudeBackend(s, r),
  codex: (s, r) => new CodexBackend(s, r),
};

export function createBackend(config: RunConfig, runner: CommandRunner): Backend {
  return BACKENDS[config.backend.id]({ model: config.backend.model, tools: config.tools }, runner);
}

export type Availability = "available" | "marker";

export type DispatchInput = {
  repositoryName: string;
  workspace: Workspace;
  task: Task;
  specification?: LoadedSpecification | null;
  logPath?: string;
};

/**
 * Runs the configured backend for one task, or writes a pending-task marker
 * when an optional backend is not installed.
 */
export class BackendDispatcher {
  private availability: Availability | null = null;

  constructor(
    private readonly config: Pick<RunConfig, "backend">,
    private readonly backend: Backend,
    private readonly runner: CommandRunner,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get backendId(): BackendId {
    return this.backend.id;
  }

  /** Throws BackendUnavailableHard when a required backend is missing. */
  checkAvailability(): Availability {
    if (this.availability) return this.availability;
    if (this.runner.exists(this.backend.executable)) {
      log.info("AI backend: {backend} (model: {model})", { backend: this.backend.id, model: this.config.backend.model ?? "default" });
      this.availability = "available";
    } else if (this.config.backend.required) {
      throw new BackendUnavailableHard(this.backend.id, this.backend.executable);
    } else {
      log.warn("{executable} CLI not available; tasks will get pending-task markers for manual implementation", {
        executable: this.backend.executable,
        kind: "BackendUnavailableSoft" satisfies RecoveredKind,
      });
      this.availability = "marker";
    }
    return this.availability;
  }

  async dispatch(input: DispatchInput): Promise<BackendResult> {
    const { workspace, task } = input;
    await appendLog(input.logPath, [
      "---",
      `Task: ${task.title}`,
      ...(task.specificationLink ? [`Specification: ${task.specificationLink}`] : []),
      `Worktree: ${workspace.path}`,
      "---",
    ].join("\n"));

    if (this.checkAvailability() === "marker") {
      const file = await writePendingMarker(workspace, task, this.clock());
      log.info("Wrote pending-task marker {file}", { file, branch: workspace.branchName, task: task.title });
      return { succeeded: true, exitCode: 0, logExcerpt: `pending-task marker: ${file}`, mode: "marker", logPath: input.logPath };
    }

    const prompt = buildTaskPrompt({
      repositoryName: input.repositoryName,
      workspace,
      task,
      specification: input.specification,
    });
    log.info("Using {backend} backend to implement {task}", { backend: this.backend.id, task: task.title, branch: workspace.branchName });
    return this.backend.run(prompt, workspace, { logPath: input.logPath });
  }
}

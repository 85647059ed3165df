/**
 * Error types raised by the run pipeline.
 *
 * Every error carries the repository/branch/task it happened on and a list of
 * suggestions a human can follow to recover by hand.
 */

export type ErrorCode =
  | "CONFIG_INVALID"
  | "PREREQUISITE_MISSING"
  | "WORKSPACE_CREATION_FAILED"
  | "BACKEND_UNAVAILABLE"
  | "BACKEND_EXECUTION_FAILED"
  | "COMMIT_FAILED"
  | "PUSH_FAILED"
  | "PUBLISH_PARTIAL";

// Conditions that are handled where they occur and only ever show up in logs.
export type RecoveredKind = "ParseDegraded" | "BackendUnavailableSoft";

export interface ErrorContext {
  repository?: string;
  branch?: string;
  task?: string;
  [key: string]: unknown;
}

export class NightshiftError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: ErrorContext = {},
    public readonly suggestions: string[] = [],
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Only these stop the whole run; everything else is local to a task group. */
  get abortsRun(): boolean {
    return this.code === "CONFIG_INVALID" || this.code === "PREREQUISITE_MISSING" || this.code === "BACKEND_UNAVAILABLE";
  }
}

export class ConfigError extends NightshiftError {
  constructor(message: string, public readonly key?: string) {
    super(message, "CONFIG_INVALID", key ? { key } : {});
  }
}

export class PrerequisiteMissing extends NightshiftError {
  constructor(tool: string, suggestions: string[] = []) {
    super(`${tool} is not available`, "PREREQUISITE_MISSING", { tool }, suggestions);
  }
}

export class WorkspaceCreationFailed extends NightshiftError {
  constructor(reason: string, context: ErrorContext) {
    super(`Failed to create workspace for ${context.branch ?? "(unknown branch)"}: ${reason}`, "WORKSPACE_CREATION_FAILED", context);
  }
}

export class BackendUnavailableHard extends NightshiftError {
  constructor(backend: string, executable: string) {
    super(`Backend '${backend}' is required but '${executable}' was not found on PATH`, "BACKEND_UNAVAILABLE", { backend }, [
      `Install the ${executable} CLI`,
      "Or unset the backend selection to fall back to pending-task markers",
    ]);
  }
}

export class BackendExecutionFailed extends NightshiftError {
  constructor(exitCode: number, context: ErrorContext & { logPath?: string }) {
    super(`Backend exited with code ${exitCode}`, "BACKEND_EXECUTION_FAILED", context,
      context.logPath ? [`Check log: ${context.logPath}`] : []);
  }
}

export class CommitFailed extends NightshiftError {
  constructor(detail: string, context: ErrorContext) {
    super(`Failed to commit changes: ${detail}`, "COMMIT_FAILED", context);
  }
}

export class PushFailed extends NightshiftError {
  constructor(detail: string, context: ErrorContext & { remote: string; branch: string }) {
    super(`Failed to push ${context.branch} to ${context.remote}: ${detail}`, "PUSH_FAILED", context, [
      `Branch ${context.branch} is kept locally; retry with: git push -u ${context.remote} ${context.branch}`,
    ]);
  }
}

export class PublishPartial extends NightshiftError {
  constructor(detail: string, context: ErrorContext & { branch: string; base: string; compareUrl?: string | null }) {
    const suggestions = [
      `Branch ${context.branch} was pushed; retry with: gh pr create --head ${context.branch} --base ${context.base}`,
    ];
    if (context.compareUrl) suggestions.push(`Or open: ${context.compareUrl}`);
    super(`Pushed ${context.branch} but pull request creation failed: ${detail}`, "PUBLISH_PARTIAL", context, suggestions);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

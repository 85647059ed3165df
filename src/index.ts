export * from "./types.js";
export * from "./errors.js";
export { loadConfig, readConfigFile, configFromEnv, BACKEND_IDS, DEFAULT_MODELS } from "./config.js";
export type { RunConfig, ConfigInput, BackendId, LoadConfigOptions } from "./config.js";
export { configureLogging, shutdownLogging, LOG_CATEGORY } from "./log.js";
export { createNodeRunner } from "./exec.js";
export type { CommandRunner, CommandResult, CommandOptions } from "./exec.js";
export { CliAssistant, offlineAssistant, withFallback } from "./assistant.js";
export type { Assistant } from "./assistant.js";
export { parseTasks, tasksFromChecklist, groupTasks, flattenGroups, extractTaskLink } from "./tasks.js";
export { branchSlug, fallbackBranchSlug, BranchNamer } from "./branches.js";
export { loadSpecification, resolveSpecificationPath } from "./specs.js";
export type { LoadedSpecification } from "./specs.js";
export { WorkspaceManager } from "./workspaces.js";
export { BackendDispatcher, createBackend, CopilotBackend, ClaudeBackend, CodexBackend } from "./backends.js";
export type { Backend } from "./backends.js";
export { commitChanges, commitMessage } from "./commit.js";
export { PublishPipeline } from "./publish.js";
export { buildPullRequestDraft } from "./builder.js";
export { GroupRunner } from "./group.js";
export type { GroupState, GroupReport } from "./group.js";
export { Orchestrator, exitCodeFor } from "./orchestrator.js";
export type { RunReport, RepositoryReport, PlannedGroup, CleanReport } from "./orchestrator.js";

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { defaultConfigPath, expandHome, resolveDefaultHome } from "./home.js";
import { pathExists } from "./utils.js";

export const BACKEND_IDS = ["copilot", "claude", "codex"] as const;
export type BackendId = (typeof BACKEND_IDS)[number];

export const DEFAULT_BACKEND: BackendId = "copilot";

export const DEFAULT_MODELS: Record<BackendId, string | undefined> = {
  copilot: "gpt-4o",
  claude: "claude-sonnet-4-5",
  codex: undefined,
};

const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

const RunConfigSchema = z.object({
  home: z.string().min(1),
  root: z.string().min(1),
  repositories: z.array(z.string().min(1)),
  taskFile: z.string().min(1),
  baseBranch: z.string().min(1),
  remote: z.string().min(1),
  backend: z.object({
    id: z.enum(BACKEND_IDS),
    model: z.string().min(1).optional(),
    required: z.boolean(),
  }),
  tools: z.object({
    copilotDeny: z.array(z.string().min(1)),
    claudeAllowed: z.array(z.string().min(1)),
    claudePermissionMode: z.string().min(1),
  }),
  assistant: z.object({
    command: z.string().min(1),
    model: z.string().min(1),
  }),
  createPullRequests: z.boolean(),
  draftPullRequests: z.boolean(),
  cleanupWorkspaces: z.boolean(),
  dryRun: z.boolean(),
  settleMs: z.number().int().nonnegative(),
  specMaxBytes: z.number().int().positive(),
  logDir: z.string().min(1),
  worktreesDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type RunConfig = DeepReadonly<z.infer<typeof RunConfigSchema>>;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Flat, all-optional shape shared by the config file, env vars and CLI flags. */
export const ConfigInputSchema = z
  .object({
    root: z.string(),
    repositories: z.array(z.string()),
    taskFile: z.string(),
    baseBranch: z.string(),
    remote: z.string(),
    backend: z.enum(BACKEND_IDS),
    model: z.string(),
    copilotDenyTools: z.array(z.string()),
    claudeAllowedTools: z.array(z.string()),
    claudePermissionMode: z.string(),
    assistantCommand: z.string(),
    assistantModel: z.string(),
    createPullRequests: z.boolean(),
    draftPullRequests: z.boolean(),
    cleanupWorkspaces: z.boolean(),
    dryRun: z.boolean(),
    settleMs: z.number(),
    specMaxBytes: z.number(),
    logDir: z.string(),
    worktreesDir: z.string(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial()
  .strict();

export type ConfigInput = z.infer<typeof ConfigInputSchema>;

function parseBool(key: string, raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`Expected a boolean for ${key}, got '${raw}'`, key);
}

function parseInt10(key: string, raw: string): number {
  const n = Number(raw.trim());
  if (!Number.isInteger(n)) throw new ConfigError(`Expected an integer for ${key}, got '${raw}'`, key);
  return n;
}

function parseList(raw: string): string[] {
  return raw.split(",").map(s => s.trim()).filter(Boolean);
}

/** Maps NIGHTSHIFT_* variables onto config keys. Unset and empty variables are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const out: Record<string, unknown> = {};
  const str = (name: string) => {
    const v = env[name];
    return v != null && v.trim() !== "" ? v : undefined;
  };
  const strings: Array<[string, keyof ConfigInput]> = [
    ["NIGHTSHIFT_ROOT", "root"],
    ["NIGHTSHIFT_TASK_FILE", "taskFile"],
    ["NIGHTSHIFT_BASE_BRANCH", "baseBranch"],
    ["NIGHTSHIFT_REMOTE", "remote"],
    ["NIGHTSHIFT_BACKEND", "backend"],
    ["NIGHTSHIFT_MODEL", "model"],
    ["NIGHTSHIFT_CLAUDE_PERMISSION_MODE", "claudePermissionMode"],
    ["NIGHTSHIFT_ASSISTANT_COMMAND", "assistantCommand"],
    ["NIGHTSHIFT_ASSISTANT_MODEL", "assistantModel"],
    ["NIGHTSHIFT_LOG_DIR", "logDir"],
    ["NIGHTSHIFT_WORKTREES_DIR", "worktreesDir"],
    ["NIGHTSHIFT_LOG_LEVEL", "logLevel"],
  ];
  for (const [name, key] of strings) {
    const v = str(name);
    if (v !== undefined) out[key] = v.trim();
  }
  const bools: Array<[string, keyof ConfigInput]> = [
    ["NIGHTSHIFT_CREATE_PR", "createPullRequests"],
    ["NIGHTSHIFT_DRAFT_PR", "draftPullRequests"],
    ["NIGHTSHIFT_CLEANUP_WORKTREES", "cleanupWorkspaces"],
    ["NIGHTSHIFT_DRY_RUN", "dryRun"],
  ];
  for (const [name, key] of bools) {
    const v = str(name);
    if (v !== undefined) out[key] = parseBool(name, v);
  }
  const ints: Array<[string, keyof ConfigInput]> = [
    ["NIGHTSHIFT_SETTLE_MS", "settleMs"],
    ["NIGHTSHIFT_SPEC_MAX_BYTES", "specMaxBytes"],
  ];
  for (const [name, key] of ints) {
    const v = str(name);
    if (v !== undefined) out[key] = parseInt10(name, v);
  }
  const lists: Array<[string, keyof ConfigInput]> = [
    ["NIGHTSHIFT_COPILOT_DENY_TOOLS", "copilotDenyTools"],
    ["NIGHTSHIFT_CLAUDE_ALLOWED_TOOLS", "claudeAllowedTools"],
  ];
  for (const [name, key] of lists) {
    const v = str(name);
    if (v !== undefined) out[key] = parseList(v);
  }
  return validateInput(out, "environment");
}

function validateInput(raw: unknown, source: string): ConfigInput {
  const parsed = ConfigInputSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || undefined;
    throw new ConfigError(`Invalid ${source} configuration${key ? ` at '${key}'` : ""}: ${issue?.message ?? "unknown error"}`, key);
  }
  return parsed.data;
}

/**
 * Reads the YAML config file. An explicitly named file must exist; the default
 * one under the home directory is optional.
 */
export async function readConfigFile(filePath: string | undefined, home: string): Promise<ConfigInput> {
  const target = filePath ? path.resolve(expandHome(filePath)) : defaultConfigPath(home);
  if (!(await pathExists(target))) {
    if (filePath) throw new ConfigError(`Config file not found: ${target}`, "config");
    return {};
  }
  let raw: unknown;
  try {
    raw = YAML.parse(await fs.readFile(target, "utf8"));
  } catch (e) {
    throw new ConfigError(`Config file is not valid YAML: ${target}: ${e instanceof Error ? e.message : String(e)}`, "config");
  }
  return validateInput(raw, `file ${target}`);
}

function deepFreeze<T>(o: T): T {
  if (o && typeof o === "object") {
    for (const v of Object.values(o)) deepFreeze(v);
    Object.freeze(o);
  }
  return o;
}

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  file?: ConfigInput;
  // raw command-line values; validated here like every other source
  flags?: Record<string, unknown>;
  homedir?: string;
};

/**
 * Builds the one immutable config for a run.
 * Precedence: defaults < config file < environment < flags.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RunConfig {
  const env = opts.env ?? {};
  const homedir = opts.homedir ?? os.homedir();
  const home = resolveDefaultHome(env, process.platform, homedir);
  const file = opts.file ?? {};
  const fromEnv = configFromEnv(env);
  const flags = validateInput(opts.flags ?? {}, "command-line");
  const pick = <K extends keyof ConfigInput>(key: K): ConfigInput[K] => flags[key] ?? fromEnv[key] ?? file[key];

  const backendId = pick("backend") ?? DEFAULT_BACKEND;
  const abs = (p: string) => path.resolve(expandHome(p, homedir));

  const candidate = {
    home,
    root: abs(pick("root") ?? "~/projects"),
    repositories: (pick("repositories") ?? []).map(abs),
    taskFile: pick("taskFile") ?? "TASKS.md",
    baseBranch: pick("baseBranch") ?? "main",
    remote: pick("remote") ?? "origin",
    backend: {
      id: backendId,
      model: pick("model") ?? DEFAULT_MODELS[backendId],
      required: pick("backend") !== undefined,
    },
    tools: {
      copilotDeny: pick("copilotDenyTools") ?? ["shell(rm)"],
      claudeAllowed: pick("claudeAllowedTools") ?? ["Read", "Write", "Edit", "Bash", "Grep", "Glob"],
      claudePermissionMode: pick("claudePermissionMode") ?? "acceptEdits",
    },
    assistant: {
      command: pick("assistantCommand") ?? "llm",
      model: pick("assistantModel") ?? "gpt-4o-mini",
    },
    createPullRequests: pick("createPullRequests") ?? false,
    draftPullRequests: pick("draftPullRequests") ?? false,
    cleanupWorkspaces: pick("cleanupWorkspaces") ?? false,
    dryRun: pick("dryRun") ?? false,
    settleMs: pick("settleMs") ?? 30_000,
    specMaxBytes: pick("specMaxBytes") ?? 100 * 1024,
    logDir: abs(pick("logDir") ?? path.join(home, "logs")),
    worktreesDir: abs(pick("worktreesDir") ?? path.join(home, "worktrees")),
    logLevel: pick("logLevel") ?? "info",
  };

  const parsed = RunConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || undefined;
    throw new ConfigError(`Invalid configuration${key ? ` at '${key}'` : ""}: ${issue?.message ?? "unknown error"}`, key);
  }
  return deepFreeze(parsed.data);
}

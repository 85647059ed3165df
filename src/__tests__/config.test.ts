import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { configFromEnv, loadConfig, readConfigFile } from "../config.js";
import { ConfigError } from "../errors.js";
import { makeTempDir } from "./helpers.js";

const env = { NIGHTSHIFT_HOME: "/srv/nightshift" };
const homedir = "/home/tester";

describe("loadConfig", () => {
  it("fills defaults", () => {
    const config = loadConfig({ env, homedir });
    expect(config.home).toBe("/srv/nightshift");
    expect(config.root).toBe("/home/tester/projects");
    expect(config.taskFile).toBe("TASKS.md");
    expect(config.baseBranch).toBe("main");
    expect(config.remote).toBe("origin");
    expect(config.backend).toEqual({ id: "copilot", model: "gpt-4o", required: false });
    expect(config.tools.copilotDeny).toEqual(["shell(rm)"]);
    expect(config.assistant).toEqual({ command: "llm", model: "gpt-4o-mini" });
    expect(config.createPullRequests).toBe(false);
    expect(config.cleanupWorkspaces).toBe(false);
    expect(config.settleMs).toBe(30000);
    expect(config.specMaxBytes).toBe(102400);
    expect(config.logDir).toBe("/srv/nightshift/logs");
    expect(config.worktreesDir).toBe("/srv/nightshift/worktrees");
  });

  it("applies file < environment < flags", () => {
    const file = { baseBranch: "develop", remote: "upstream" };
    const fromEnv = { ...env, NIGHTSHIFT_BASE_BRANCH: "release" };
    expect(loadConfig({ env: fromEnv, homedir, file }).baseBranch).toBe("release");
    expect(loadConfig({ env: fromEnv, homedir, file }).remote).toBe("upstream");
    expect(loadConfig({ env: fromEnv, homedir, file, flags: { baseBranch: "hotfix" } }).baseBranch).toBe("hotfix");
  });

  it("marks an explicitly chosen backend as required and picks its default model", () => {
    const config = loadConfig({ env, homedir, flags: { backend: "claude" } });
    expect(config.backend).toEqual({ id: "claude", model: "claude-sonnet-4-5", required: true });
    expect(loadConfig({ env, homedir, flags: { backend: "codex" } }).backend.model).toBeUndefined();
  });

  it("expands ~ in paths", () => {
    const config = loadConfig({ env, homedir, flags: { root: "~/code", repositories: ["~/code/a"] } });
    expect(config.root).toBe("/home/tester/code");
    expect(config.repositories).toEqual(["/home/tester/code/a"]);
  });

  it("names the offending key", () => {
    try {
      loadConfig({ env, homedir, flags: { backend: "gpt" } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e instanceof ConfigError && e.key).toBe("backend");
    }
  });

  it("rejects unknown keys", () => {
    expect(() => loadConfig({ env, homedir, flags: { colour: "blue" } })).toThrow(ConfigError);
  });

  it("returns a frozen object", () => {
    const config = loadConfig({ env, homedir });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.backend)).toBe(true);
    expect(Object.isFrozen(config.tools.claudeAllowed)).toBe(true);
  });
});

describe("configFromEnv", () => {
  it("parses booleans, integers and lists", () => {
    expect(configFromEnv({
      NIGHTSHIFT_CREATE_PR: "yes",
      NIGHTSHIFT_DRY_RUN: "0",
      NIGHTSHIFT_SETTLE_MS: "500",
      NIGHTSHIFT_CLAUDE_ALLOWED_TOOLS: "Read, Edit,,Bash",
      NIGHTSHIFT_MODEL: "  ",
    })).toEqual({
      createPullRequests: true,
      dryRun: false,
      settleMs: 500,
      claudeAllowedTools: ["Read", "Edit", "Bash"],
    });
  });

  it("rejects a malformed boolean", () => {
    expect(() => configFromEnv({ NIGHTSHIFT_CREATE_PR: "maybe" })).toThrow("Expected a boolean for NIGHTSHIFT_CREATE_PR, got 'maybe'");
  });
});

describe("readConfigFile", () => {
  it("reads YAML from the home directory", async () => {
    const home = await makeTempDir();
    await fs.writeFile(path.join(home, "config.yml"), "baseBranch: trunk\ncreatePullRequests: true\n", "utf8");
    expect(await readConfigFile(undefined, home)).toEqual({ baseBranch: "trunk", createPullRequests: true });
  });

  it("treats a missing default file as empty", async () => {
    expect(await readConfigFile(undefined, await makeTempDir())).toEqual({});
  });

  it("fails for a missing explicit file", async () => {
    const home = await makeTempDir();
    await expect(readConfigFile(path.join(home, "nope.yml"), home)).rejects.toBeInstanceOf(ConfigError);
  });

  it("fails for an invalid value", async () => {
    const home = await makeTempDir();
    await fs.writeFile(path.join(home, "config.yml"), "settleMs: soon\n", "utf8");
    await expect(readConfigFile(undefined, home)).rejects.toThrow(/settleMs/);
  });
});

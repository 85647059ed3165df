import { spawnSync } from "node:child_process";
import * as fss from "node:fs";
import path from "node:path";

export type CommandResult = {
  status: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  input?: string;
  timeoutMs?: number;
};

/**
 * Blocking subprocess access. Everything that shells out (git, gh, llm,
 * backend CLIs) goes through one of these so tests can swap in a fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], opts?: CommandOptions): CommandResult;
  exists(command: string): boolean;
}

export function createNodeRunner(env: NodeJS.ProcessEnv = process.env): CommandRunner {
  return {
    run(command, args, opts = {}) {
      const res = spawnSync(command, args, {
        cwd: opts.cwd,
        input: opts.input,
        encoding: "utf8",
        timeout: opts.timeoutMs,
        maxBuffer: 64 * 1024 * 1024,
        env,
      });
      if (res.error) {
        return { status: 127, stdout: "", stderr: res.error.message };
      }
      return { status: res.status ?? 1, stdout: res.stdout ?? "", stderr: res.stderr ?? "" };
    },
    exists(command) {
      if (command.includes(path.sep)) return isExecutable(command);
      const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
      const exts = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
      return dirs.some(d => exts.some(ext => isExecutable(path.join(d, command + ext))));
    },
  };
}

function isExecutable(p: string): boolean {
  try {
    fss.accessSync(p, fss.constants.X_OK);
    return fss.statSync(p).isFile();
  } catch {
    return false;
  }
}

export function outputOf(res: CommandResult): string {
  return [res.stdout, res.stderr].filter(s => s.trim().length > 0).join("\n").trim();
}

import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type { CommandRunner } from "./exec.js";
import { outputOf } from "./exec.js";

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function pathExists(p: string) {
  try { await fs.access(p); return true; } catch { return false; }
}

// 20251019-031500
export function tsCompact(d = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/** Last `lines` lines of `s`, capped to `maxChars` from the end. */
export function tail(s: string, lines = 20, maxChars = 2000): string {
  const out = s.trimEnd().split("\n").slice(-lines).join("\n");
  return out.length > maxChars ? out.slice(out.length - maxChars) : out;
}

export async function writeFileAtomic(p: string, data: string) {
  const tmp = `${p}.tmp-${process.pid}-${Math.random().toString(36).slice(2)}`;
  await fs.writeFile(tmp, data, "utf8");
  await fs.rename(tmp, p);
}

export async function writeYamlAtomic(filePath: string, data: unknown) {
  await writeFileAtomic(filePath, YAML.stringify(data));
}

export async function appendLog(logPath: string | undefined, lines: string) {
  if (!logPath || !lines) return;
  await ensureDir(path.dirname(logPath));
  await fs.appendFile(logPath, lines.endsWith("\n") ? lines : lines + "\n", "utf8");
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ---------- Git helpers ----------

export function git(runner: CommandRunner, args: string[], cwd: string): string {
  const res = runner.run("git", args, { cwd });
  if (res.status !== 0) throw new Error(outputOf(res) || `git ${args.join(" ")} failed`);
  return res.stdout.trim();
}

export function gitTry(runner: CommandRunner, args: string[], cwd: string): string | null {
  try { return git(runner, args, cwd); } catch { return null; }
}

export function refExists(runner: CommandRunner, ref: string, cwd: string): boolean {
  return runner.run("git", ["show-ref", "--verify", "--quiet", ref], { cwd }).status === 0;
}

export function getRemoteUrl(runner: CommandRunner, remote: string, cwd: string): string | null {
  return gitTry(runner, ["remote", "get-url", remote], cwd) || null;
}

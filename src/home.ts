import crypto from "node:crypto";
import * as fss from "node:fs";
import os from "node:os";
import path from "node:path";

export const APP_NAME = "nightshift";

export function sha8(s: string) {
  return crypto.createHash("sha256").update(s).digest("hex").slice(0, 8);
}

/**
 * `<name>-<sha8(realpath)>`: prefix for a repository's worktrees and logs, so
 * two repositories sharing a directory name never collide.
 */
export function repositoryKey(repository: { name: string; path: string }, platform: NodeJS.Platform = process.platform) {
  let p: string;
  try { p = fss.realpathSync(repository.path); } catch { p = path.resolve(repository.path); }
  if (platform === "win32") p = p.toLowerCase();
  return `${repository.name}-${sha8(p)}`;
}

export function expandHome(p: string, homedir = os.homedir()) {
  if (p === "~") return homedir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homedir, p.slice(2));
  return p;
}

export function resolveDefaultHome(env: NodeJS.ProcessEnv, platform: NodeJS.Platform = process.platform, homedir = os.homedir()) {
  const explicit = (env.NIGHTSHIFT_HOME || "").trim();
  if (explicit) return path.resolve(expandHome(explicit, homedir));
  if (platform === "win32") {
    const appdata = env.APPDATA || path.join(homedir, "AppData", "Roaming");
    return path.join(appdata, APP_NAME);
  }
  if (platform === "darwin") {
    return path.join(homedir, "Library", "Application Support", APP_NAME);
  }
  const xdg = env.XDG_CONFIG_HOME || path.join(homedir, ".config");
  return path.join(xdg, APP_NAME);
}

export function defaultConfigPath(home: string) {
  return path.join(home, "config.yml");
}

export function sanitizeBranchForPath(branch: string) {
  return String(branch).replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^-+|-+$/g, "");
}

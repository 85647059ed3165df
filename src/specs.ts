import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./errors.js";
import { componentLogger } from "./log.js";

const log = componentLogger("specs");

export const SPEC_MAX_BYTES = 100 * 1024;

export type LoadedSpecification = {
  content: string;
  truncated: boolean;
  // size of the file on disk, not of `content`
  bytes: number;
  path: string | null;
};

function isInside(root: string, p: string) {
  const rel = path.relative(root, p);
  return rel !== "" && rel !== ".." && !rel.startsWith(".." + path.sep) && !path.isAbsolute(rel);
}

/**
 * `/specs/a.md`, `./specs/a.md` and `specs/a.md` all resolve against the
 * repository root. Returns null for anything that would land outside it.
 */
export function resolveSpecificationPath(repoRoot: string, link: string): string | null {
  const trimmed = link.trim();
  if (!trimmed || trimmed.includes("\0")) return null;
  const rel = trimmed.replace(/\\/g, "/").replace(/^\/+/, "").replace(/^(?:\.\/)+/, "");
  const root = path.resolve(repoRoot);
  const full = path.resolve(root, rel);
  return isInside(root, full) ? full : null;
}

/** Length of the longest prefix of `buf` that does not end inside a multi-byte UTF-8 sequence. */
export function utf8PrefixLength(buf: Uint8Array): number {
  const end = buf.length;
  let back = 0;
  while (back < 3 && end - back - 1 >= 0 && (buf[end - back - 1] & 0xc0) === 0x80) back++;
  const leadAt = end - back - 1;
  if (leadAt < 0) return end;
  const lead = buf[leadAt];
  const need = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return back + 1 >= need ? end : leadAt;
}

function empty(p: string | null): LoadedSpecification {
  return { content: "", truncated: false, bytes: 0, path: p };
}

export async function loadSpecification(repoRoot: string, link: string, maxBytes = SPEC_MAX_BYTES): Promise<LoadedSpecification> {
  const resolved = resolveSpecificationPath(repoRoot, link);
  if (!resolved) {
    log.warn("Specification link {link} points outside the repository; ignoring it", { link });
    return empty(null);
  }

  let real: string;
  try {
    const rootReal = await fs.realpath(repoRoot);
    real = await fs.realpath(resolved);
    if (!isInside(rootReal, real)) {
      log.warn("Specification {link} resolves outside the repository through a symlink; ignoring it", { link });
      return empty(resolved);
    }
  } catch {
    log.warn("Task specification file not found: {link}", { link });
    return empty(resolved);
  }

  let handle: FileHandle | undefined;
  try {
    const st = await fs.stat(real);
    if (!st.isFile()) {
      log.warn("Task specification is not a regular file: {link}", { link });
      return empty(resolved);
    }
    handle = await fs.open(real, "r");
    const length = Math.min(st.size, maxBytes);
    const buf = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buf, 0, length, 0);
    const truncated = st.size > maxBytes;
    if (truncated) {
      log.warn("Specification file is large ({bytes} bytes), truncating to {max} bytes: {link}", { bytes: st.size, max: maxBytes, link });
    }
    const read = buf.subarray(0, bytesRead);
    const content = read.subarray(0, truncated ? utf8PrefixLength(read) : read.length).toString("utf8");
    return { content, truncated, bytes: st.size, path: resolved };
  } catch (e) {
    log.warn("Task specification file not readable: {link} ({error})", { link, error: errorMessage(e) });
    return empty(resolved);
  } finally {
    await handle?.close();
  }
}

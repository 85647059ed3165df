import * as fss from "node:fs";
import path from "node:path";
import stream from "node:stream";
import { configure, dispose, getConsoleSink, getLogger, getStreamSink, type Logger } from "@logtape/logtape";
import type { RunConfig } from "./config.js";
import type { NightshiftError } from "./errors.js";
import { repositoryKey } from "./home.js";
import type { Repository } from "./types.js";

export const LOG_CATEGORY = "nightshift";

export function componentLogger(component: string): Logger {
  return getLogger([LOG_CATEGORY, component]);
}

/**
 * Console plus a per-run text log under `logDir`. Returns the run log path.
 * Per-repository logs (backend and VCS output) are written separately with
 * `appendLog`.
 */
export async function configureLogging(config: RunConfig, runStamp: string): Promise<string> {
  fss.mkdirSync(config.logDir, { recursive: true });
  const runLog = path.join(config.logDir, `run_${runStamp}.log`);
  const fileStream = fss.createWriteStream(runLog, { flags: "a" });
  await configure({
    reset: true,
    sinks: {
      console: getConsoleSink(),
      file: getStreamSink(stream.Writable.toWeb(fileStream)),
    },
    loggers: [
      { category: [LOG_CATEGORY], lowestLevel: config.logLevel, sinks: ["console", "file"] },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
    ],
  });
  return runLog;
}

export async function shutdownLogging() {
  await dispose();
}

export function repositoryLogPath(config: RunConfig, repository: Repository, runStamp: string) {
  return path.join(config.logDir, `${repositoryKey(repository)}_${runStamp}.log`);
}

/** One error line with the failure's context, then one line per recovery suggestion. */
export function logFailure(logger: Logger, err: NightshiftError) {
  logger.error("{code}: {message}", { ...err.context, code: err.code, message: err.message });
  for (const suggestion of err.suggestions) logger.error("  → {suggestion}", { suggestion });
}

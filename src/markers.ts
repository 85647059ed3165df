import path from "node:path";
import type { Task, Workspace } from "./types.js";
import { ensureDir, writeYamlAtomic } from "./utils.js";

export const MARKER_DIRNAME = ".pending_tasks";

export type PendingTaskMarker = {
  task: string;
  specification: string | null;
  createdAt: string;
  status: "pending";
  instructions: string[];
};

export function markerFileName(title: string) {
  return `${title.replace(/[^a-zA-Z0-9]/g, "_").slice(0, 100) || "task"}.yml`;
}

export function pendingMarker(task: Task, now: Date): PendingTaskMarker {
  const steps = ["Review the task description above"];
  if (task.specificationLink) {
    steps.push(`Read the detailed specification in: ${task.specificationLink}`);
    steps.push("Implement according to the specification");
  } else {
    steps.push("Make necessary code changes");
  }
  steps.push("Test your changes");
  steps.push("Delete this marker file");
  return {
    task: task.title,
    specification: task.specificationLink ?? null,
    createdAt: now.toISOString(),
    status: "pending",
    instructions: steps.map((s, i) => `${i + 1}. ${s}`),
  };
}

/** Records a task for manual implementation. Returns the marker path. */
export async function writePendingMarker(workspace: Workspace, task: Task, now = new Date()): Promise<string> {
  const dir = path.join(workspace.path, MARKER_DIRNAME);
  await ensureDir(dir);
  const file = path.join(dir, markerFileName(task.title));
  await writeYamlAtomic(file, pendingMarker(task, now));
  return file;
}

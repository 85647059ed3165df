import path from "node:path";
import type { LoadedSpecification } from "./specs.js";
import type { Task, Workspace } from "./types.js";

export type TaskPromptInput = {
  repositoryName: string;
  workspace: Workspace;
  task: Task;
  specification?: LoadedSpecification | null;
};

function header(input: TaskPromptInput): string[] {
  return [
    "Implement the following task in this repository:",
    "",
    `Repository: ${input.repositoryName || path.basename(input.workspace.repositoryPath)}`,
    `Current branch: ${input.workspace.branchName}`,
    `Working directory: ${input.workspace.path}`,
    "",
    `Task: ${input.task.title}`,
    "",
  ];
}

export function buildTaskPrompt(input: TaskPromptInput): string {
  const spec = input.specification?.content.trim() ? input.specification : null;
  const lines = header(input);
  if (spec) {
    lines.push("Detailed Specification:");
    lines.push(spec.content.trimEnd());
    if (spec.truncated) lines.push("", `(specification truncated; full file: ${input.task.specificationLink ?? spec.path ?? "unknown"})`);
    lines.push("");
    lines.push("Instructions:");
    lines.push("1. Read and understand the full specification above");
    lines.push("2. Plan the necessary code changes");
    lines.push("3. Implement ALL requirements listed in the specification");
    lines.push("4. Analyze existing code patterns and follow the existing style");
    lines.push("5. Add appropriate error handling and logging");
    lines.push("6. Include helpful comments where needed");
    lines.push("7. Make minimal, focused changes to accomplish this task");
  } else {
    lines.push("Instructions:");
    lines.push("1. Infer the scope of the task from its title and the existing code");
    lines.push("2. Analyze the existing code structure and patterns");
    lines.push("3. Follow existing code style and conventions");
    lines.push("4. Add appropriate error handling");
    lines.push("5. Include helpful comments where needed");
    lines.push("6. Make minimal, focused changes");
  }
  lines.push("");
  lines.push("Please implement this task now.");
  return lines.join("\n");
}

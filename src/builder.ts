import type { PullRequestDraft, Task, Workspace } from "./types.js";

export function makeTitle(tasks: readonly Task[], workspace: Workspace): string {
  return tasks[0]?.title || workspace.branchName;
}

export function makeBody(tasks: readonly Task[]): string {
  const lines: string[] = [];
  lines.push("## Summary");
  lines.push("");
  lines.push("This PR implements the following changes:");
  lines.push("");
  if (tasks.length === 0) {
    lines.push("- (no tasks recorded)");
  } else {
    for (const t of tasks) {
      const indent = "  ".repeat(Math.max(0, t.depth));
      const spec = t.specificationLink ? ` (spec: \`${t.specificationLink}\`)` : "";
      lines.push(`${indent}- ${t.title}${spec}`);
    }
  }
  lines.push("");
  lines.push("## Review Checklist");
  lines.push("");
  lines.push("- [ ] Code follows project conventions");
  lines.push("- [ ] Tests pass");
  lines.push("- [ ] Documentation updated if needed");
  return lines.join("\n");
}

export function buildPullRequestDraft(tasks: readonly Task[], workspace: Workspace): PullRequestDraft {
  return {
    title: makeTitle(tasks, workspace),
    body: makeBody(tasks),
    headBranch: workspace.branchName,
    baseBranch: workspace.baseBranch,
  };
}

export function planPR(draft: PullRequestDraft, compareUrl: string | null): string {
  const lines: string[] = [];
  lines.push("=== PR DRAFT (dry-run) ===");
  lines.push("");
  lines.push(`# ${draft.title}`);
  lines.push("");
  lines.push(draft.body);
  lines.push("");
  lines.push(`Compare: ${compareUrl ?? "(no compare URL available)"}`);
  return lines.join("\n");
}

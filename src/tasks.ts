import type { Assistant } from "./assistant.js";
import { offlineAssistant, taskParsePrompt, withFallback } from "./assistant.js";
import type { RecoveredKind } from "./errors.js";
import { componentLogger } from "./log.js";
import type { Task, TaskGroup } from "./types.js";
import { tasksOf } from "./types.js";

const log = componentLogger("tasks");

const UNCHECKED_LINE = /^([ \t]*)[-*][ \t]+\[ \][ \t]*(.*)$/;
const CHECKED_PREFIX = /^[-*][ \t]+\[[xX]\]/;
const BULLET_PREFIX = /^[-*][ \t]+(?:\[ \][ \t]*)?/;
const SPEC_LINK = /\[([^\]]*)\]\(([^)]*\.md)\)/;

type RawLine = { indent: string; text: string };

export function extractTaskLink(text: string): { title: string; link?: string } {
  const m = SPEC_LINK.exec(text);
  if (!m || !m[1].trim() || !m[2].trim()) return { title: text.trim() };
  // The link label stays in the title: "Add [OAuth](specs/oauth.md) login" -> "Add OAuth login"
  const title = (text.slice(0, m.index) + m[1] + text.slice(m.index + m[0].length)).replace(/\s+/g, " ").trim();
  return { title, link: m[2].trim() };
}

function indentWidth(ws: string): number {
  let w = 0;
  for (const ch of ws) w += ch === "\t" ? 4 : 1;
  return w;
}

function toTasks(lines: RawLine[]): Task[] {
  const stack: number[] = [];
  const tasks: Task[] = [];
  for (const line of lines) {
    const { title, link } = extractTaskLink(line.text);
    if (!title) continue;
    const width = indentWidth(line.indent);
    while (stack.length > 0 && stack[stack.length - 1] >= width) stack.pop();
    if (width > 0 && stack.length === 0) {
      log.warn("Subtask '{title}' has no parent task; treating it as top-level", { title });
    }
    const depth = stack.length;
    stack.push(width);
    tasks.push({ title, ...(link ? { specificationLink: link } : {}), depth, sourceOrder: tasks.length });
  }
  return tasks;
}

/** Deterministic strategy: `- [ ] text` lines, native indentation as depth. */
export function tasksFromChecklist(document: string): Task[] {
  const lines: RawLine[] = [];
  for (const raw of document.split(/\r?\n/)) {
    const m = UNCHECKED_LINE.exec(raw);
    if (m) lines.push({ indent: m[1], text: m[2] });
  }
  return toTasks(lines);
}

/** Assistant output: one task per line, two-space indents per level. */
export function tasksFromAssistantOutput(output: string): Task[] {
  const lines: RawLine[] = [];
  for (const raw of output.split(/\r?\n/)) {
    if (!raw.trim()) continue;
    const indent = /^[ \t]*/.exec(raw)?.[0] ?? "";
    const body = raw.slice(indent.length);
    if (CHECKED_PREFIX.test(body)) continue;
    lines.push({ indent, text: body.replace(BULLET_PREFIX, "") });
  }
  return toTasks(lines);
}

export function hasUncheckedTasks(document: string): boolean {
  return document.split(/\r?\n/).some(l => UNCHECKED_LINE.test(l));
}

/**
 * Turns a checklist document into ordered tasks. Asks the assistant first and
 * falls back to the checklist regex when it is unavailable or yields nothing.
 * Never throws; zero tasks is a valid answer.
 */
export function parseTasks(document: string, assistant: Assistant = offlineAssistant): Task[] {
  if (!hasUncheckedTasks(document)) return [];
  return withFallback(
    "task parsing",
    () => {
      const out = assistant.ask(taskParsePrompt(document));
      if (!out) return null;
      const tasks = tasksFromAssistantOutput(out);
      return tasks.length > 0 ? tasks : null;
    },
    () => {
      log.info("Assistant parsing unavailable, using checklist parsing", { kind: "ParseDegraded" satisfies RecoveredKind });
      return tasksFromChecklist(document);
    },
  );
}

export function groupTasks(tasks: readonly Task[]): TaskGroup[] {
  const groups: Array<{ leadTask: Task; memberTasks: Task[] }> = [];
  for (const task of tasks) {
    const current = groups[groups.length - 1];
    if (task.depth === 0 || !current) {
      groups.push({ leadTask: task.depth === 0 ? task : { ...task, depth: 0 }, memberTasks: [] });
    } else {
      current.memberTasks.push(task);
    }
  }
  return groups;
}

export function flattenGroups(groups: readonly TaskGroup[]): Task[] {
  return groups.flatMap(tasksOf);
}

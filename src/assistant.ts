import type { RunConfig } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { componentLogger } from "./log.js";
import { errorMessage } from "./errors.js";

const log = componentLogger("assistant");

/**
 * Stateless text-in/text-out language service. `ask` returns null when the
 * service is unavailable or answers with nothing; callers always have a
 * deterministic fallback.
 */
export interface Assistant {
  ask(prompt: string): string | null;
}

export const offlineAssistant: Assistant = {
  ask: () => null,
};

export class CliAssistant implements Assistant {
  constructor(
    private readonly config: RunConfig["assistant"],
    private readonly runner: CommandRunner,
  ) {}

  available(): boolean {
    return this.runner.exists(this.config.command);
  }

  ask(prompt: string): string | null {
    const res = this.runner.run(this.config.command, ["-m", this.config.model], { input: prompt, timeoutMs: 120_000 });
    if (res.status !== 0) {
      log.debug("{command} exited with {status}", { command: this.config.command, status: res.status });
      return null;
    }
    const out = res.stdout.trim();
    return out.length > 0 ? out : null;
  }
}

/**
 * Two-step strategy: `primary` may return nothing or throw, `fallback` must be
 * total. Failures of the primary never reach the caller.
 */
export function withFallback<T>(label: string, primary: () => T | null | undefined, fallback: () => T): T {
  try {
    const value = primary();
    if (value !== null && value !== undefined) return value;
    log.debug("{label}: primary strategy returned nothing, using fallback", { label });
  } catch (e) {
    log.debug("{label}: primary strategy failed ({error}), using fallback", { label, error: errorMessage(e) });
  }
  return fallback();
}

export function taskParsePrompt(document: string): string {
  return `You are a task parser for a code automation system.

Parse the following task list and extract all actionable tasks.

Rules:
1. Extract tasks marked with - [ ] (unchecked checkboxes)
2. Include both top-level tasks and subtasks
3. Rephrase each task as a concise, actionable imperative (e.g., 'Add user validation' not 'User validation needs to be added')
4. Keep rephrased tasks brief - do not add context or details not present in the original
5. PRESERVE markdown links exactly as written: [text](file.md)
6. Preserve the hierarchy by indenting subtasks with 2 spaces
7. Skip completed tasks (marked with - [x])
8. Return ONLY the task list, one task per line
9. Do not add any explanations or additional text

Task list content:
${document}

Output format (one task per line):
Add user validation
[Implement OAuth](./specs/oauth.md)
  Configure token refresh
Fix memory leak in cache`;
}

export function branchSlugPrompt(title: string): string {
  return `Generate a short git branch slug for this task:

Task: ${title}

Rules:
1. Output ONLY the slug, nothing else
2. Use 2-4 lowercase words separated by hyphens
3. No special characters, only a-z and hyphens
4. Keep it descriptive but brief
5. Use conventional prefixes: feat/, fix/, refactor/, docs/, chore/

Examples:
- 'Add user authentication' -> feat/add-user-auth
- 'Fix memory leak in cache' -> fix/cache-memory-leak
- 'Update README documentation' -> docs/update-readme

Output only the slug:`;
}

export function commitMessagePrompt(title: string): string {
  return `Generate a conventional commit message for this task:

Task: ${title}

Rules:
1. Output ONLY the commit message, nothing else
2. Use conventional commit format: type: description
3. Types: feat, fix, refactor, docs, chore, style, test, perf
4. Keep description lowercase, concise (under 50 chars if possible)
5. No period at the end

Examples:
- 'Add user authentication' -> feat: add user authentication
- 'Fix memory leak in cache' -> fix: resolve memory leak in cache
- 'Update README' -> docs: update readme

Output only the commit message:`;
}

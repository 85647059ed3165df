import type { Assistant } from "./assistant.js";
import { branchSlugPrompt, offlineAssistant, withFallback } from "./assistant.js";

const SLUG = /^[a-z]+\/[a-z-]+$/;

export function fallbackBranchSlug(title: string): string {
  const sanitized = title
    .replace(/[^a-zA-Z0-9]/g, "-")
    .toLowerCase()
    .slice(0, 30)
    .replace(/^-+|-+$/g, "")
    .replace(/-{2,}/g, "-");
  return `feat/${sanitized || "task"}`;
}

export function branchSlug(title: string, assistant: Assistant = offlineAssistant): string {
  return withFallback(
    "branch slug",
    () => {
      const slug = (assistant.ask(branchSlugPrompt(title)) ?? "").replace(/\s+/g, "");
      return SLUG.test(slug) ? slug : null;
    },
    () => fallbackBranchSlug(title),
  );
}

/**
 * Appends `<unix seconds>-<sequence>` to slugs. The sequence is per namer, so two
 * groups with the same title started in the same second still get distinct
 * branches.
 */
export class BranchNamer {
  private seq = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  next(slug: string): string {
    this.seq += 1;
    const seconds = Math.floor(this.clock().getTime() / 1000);
    return `${slug}-${seconds}-${this.seq}`;
  }
}

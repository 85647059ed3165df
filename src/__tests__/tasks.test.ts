import { describe, it, expect } from "vitest";
import { extractTaskLink, flattenGroups, groupTasks, parseTasks, tasksFromAssistantOutput, tasksFromChecklist } from "../tasks.js";
import { scriptedAssistant } from "./helpers.js";

const titles = (ts: ReadonlyArray<{ title: string }>) => ts.map(t => t.title);

describe("checklist parsing", () => {
  it("parses nested tasks and skips checked ones", () => {
    const doc = "- [ ] Add X\n  - [ ] sub\n- [x] done\n- [ ] Add Y";
    const tasks = parseTasks(doc);
    expect(tasks).toEqual([
      { title: "Add X", depth: 0, sourceOrder: 0 },
      { title: "sub", depth: 1, sourceOrder: 1 },
      { title: "Add Y", depth: 0, sourceOrder: 2 },
    ]);

    const groups = groupTasks(tasks);
    expect(groups.map(g => ({ lead: g.leadTask.title, members: titles(g.memberTasks) }))).toEqual([
      { lead: "Add X", members: ["sub"] },
      { lead: "Add Y", members: [] },
    ]);
  });

  it("yields one task per unchecked line", () => {
    const docs = [
      "",
      "# Notes\nnothing to do",
      "- [x] a\n- [X] b",
      "- [ ] a\n* [ ] b\n\t- [ ] c\n    - [ ] d\n- [x] e\n- [ ]   f",
      "intro\n- [ ] one\n  - [x] closed\n  - [ ] two\n      - [ ] three\n",
    ];
    for (const doc of docs) {
      const lines = doc.split("\n");
      const unchecked = lines.filter(l => /^\s*[-*]\s+\[ \]/.test(l)).length;
      const checked = lines.flatMap(l => /^\s*[-*]\s+\[[xX]\]\s*(.*)$/.exec(l)?.[1] ?? []);
      const tasks = parseTasks(doc);
      expect(tasks).toHaveLength(unchecked);
      expect(titles(tasks).filter(t => checked.includes(t))).toEqual([]);
    }
  });

  it("treats tabs as four columns of indentation", () => {
    const tasks = tasksFromChecklist("- [ ] parent\n\t- [ ] child\n\t\t- [ ] grandchild");
    expect(tasks.map(t => t.depth)).toEqual([0, 1, 2]);
  });

  it("promotes a subtask with no parent to top level", () => {
    const tasks = tasksFromChecklist("  - [ ] orphan\n- [ ] top\n  - [ ] child");
    expect(tasks.map(t => [t.title, t.depth])).toEqual([["orphan", 0], ["top", 0], ["child", 1]]);
    expect(groupTasks(tasks).map(g => g.leadTask.title)).toEqual(["orphan", "top"]);
  });

  it("returns no tasks for a document without unchecked lines, without asking the assistant", () => {
    const assistant = scriptedAssistant("Do something");
    expect(parseTasks("- [x] finished\n", assistant)).toEqual([]);
    expect(assistant.prompts).toHaveLength(0);
  });
});

describe("specification links", () => {
  it("keeps the link label in the title and extracts the path", () => {
    expect(extractTaskLink("Add [OAuth](specs/oauth.md) login")).toEqual({ title: "Add OAuth login", link: "specs/oauth.md" });
    expect(extractTaskLink("[Implement OAuth](./specs/oauth.md)")).toEqual({ title: "Implement OAuth", link: "./specs/oauth.md" });
  });

  it("ignores links that are not markdown files", () => {
    expect(extractTaskLink("See [docs](https://example.com/page)")).toEqual({ title: "See [docs](https://example.com/page)" });
  });

  it("carries the link onto the parsed task", () => {
    const [task] = tasksFromChecklist("- [ ] [Cache layer](/specs/cache.md)");
    expect(task).toEqual({ title: "Cache layer", specificationLink: "/specs/cache.md", depth: 0, sourceOrder: 0 });
  });
});

describe("grouping", () => {
  it("is idempotent", () => {
    const docs = [
      "- [ ] a\n  - [ ] b\n    - [ ] c\n- [ ] d",
      "  - [ ] orphan\n    - [ ] deeper\n- [ ] top",
      "- [ ] solo",
    ];
    for (const doc of docs) {
      const groups = groupTasks(tasksFromChecklist(doc));
      expect(groupTasks(flattenGroups(groups))).toEqual(groups);
    }
  });

  it("never repeats the lead among the members", () => {
    const [group] = groupTasks(tasksFromChecklist("- [ ] lead\n  - [ ] m1\n  - [ ] m2"));
    expect(group.leadTask.title).toBe("lead");
    expect(titles(group.memberTasks)).toEqual(["m1", "m2"]);
  });
});

describe("assistant parsing", () => {
  it("uses the assistant's rephrased list when it answers", () => {
    const assistant = scriptedAssistant(
      "Add user validation\n[Implement OAuth](./specs/oauth.md)\n  Configure token refresh\n- [x] done",
    );
    const tasks = parseTasks("- [ ] user validation needed\n- [ ] [oauth](./specs/oauth.md)\n  - [ ] refresh", assistant);
    expect(tasks).toEqual([
      { title: "Add user validation", depth: 0, sourceOrder: 0 },
      { title: "Implement OAuth", specificationLink: "./specs/oauth.md", depth: 0, sourceOrder: 1 },
      { title: "Configure token refresh", depth: 1, sourceOrder: 2 },
    ]);
    expect(assistant.prompts[0]).toContain("- [ ] user validation needed");
  });

  it("falls back to checklist parsing when the assistant has nothing", () => {
    const tasks = parseTasks("- [ ] Add X\n  - [ ] sub", scriptedAssistant(null));
    expect(titles(tasks)).toEqual(["Add X", "sub"]);
  });

  it("falls back to checklist parsing when the assistant throws", () => {
    const assistant = scriptedAssistant(() => {
      throw new Error("connection refused");
    });
    expect(titles(parseTasks("- [ ] Add X", assistant))).toEqual(["Add X"]);
  });

  it("strips bullets and unchecked boxes from assistant lines", () => {
    expect(tasksFromAssistantOutput("- [ ] First\n  * Second\n\n")).toEqual([
      { title: "First", depth: 0, sourceOrder: 0 },
      { title: "Second", depth: 1, sourceOrder: 1 },
    ]);
  });
});

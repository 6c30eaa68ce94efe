import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Operation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import { describe, test, expect } from "vitest";
import { UsageError } from "../src/errors.js";
import {
  buildCreateWorkItemPatch,
  buildRecentWorkItemsWiql,
  buildUpdateWorkItemPatch,
  parseTags,
  parseWorkItemsRecentArgs,
  resolveCommentText,
  resolveWorkItemType,
  summarizeWorkItem,
} from "../src/work-items.js";

describe("resolveWorkItemType", () => {
  test("accepts aliases", () => {
    expect(resolveWorkItemType("bug")).toBe("Bug");
    expect(resolveWorkItemType("story")).toBe("User Story");
    expect(resolveWorkItemType("User Story")).toBe("User Story");
  });

  test("rejects other types", () => {
    expect(() => resolveWorkItemType("Epic")).toThrow('Unsupported work item type "Epic"');
  });
});

describe("parseTags", () => {
  test("splits on semicolons and commas and drops duplicates", () => {
    expect(parseTags("api; ui,api , ,docs")).toEqual(["api", "ui", "docs"]);
    expect(parseTags(undefined)).toEqual([]);
  });
});

describe("buildCreateWorkItemPatch", () => {
  test("writes a bug description into repro steps and links the parent", () => {
    const patch = buildCreateWorkItemPatch(
      { type: "Bug", title: "Crash on save", description: "Click save", tags: ["ui", "p1"], parentId: 42 },
      "https://dev.azure.com/acme",
    );

    expect(patch).toEqual([
      { op: Operation.Add, path: "/fields/System.Title", value: "Crash on save" },
      { op: Operation.Add, path: "/fields/Microsoft.VSTS.TCM.ReproSteps", value: "Click save" },
      { op: Operation.Add, path: "/fields/System.Tags", value: "ui; p1" },
      {
        op: Operation.Add,
        path: "/relations/-",
        value: {
          rel: "System.LinkTypes.Hierarchy-Reverse",
          url: "https://dev.azure.com/acme/_apis/wit/workItems/42",
        },
      },
    ]);
  });

  test("uses System.Description and story points for user stories", () => {
    const patch = buildCreateWorkItemPatch(
      { type: "User Story", title: "Checkout", description: "As a buyer", priority: 2, storyPoints: 5 },
      "https://dev.azure.com/acme",
    );

    expect(patch.map((operation) => operation.path)).toEqual([
      "/fields/System.Title",
      "/fields/System.Description",
      "/fields/Microsoft.VSTS.Common.Priority",
      "/fields/Microsoft.VSTS.Scheduling.StoryPoints",
    ]);
  });

  test("rejects story points on tasks", () => {
    expect(() =>
      buildCreateWorkItemPatch({ type: "Task", title: "Wire it", storyPoints: 3 }, "https://dev.azure.com/acme"),
    ).toThrow("Story points are only supported for User Story and Spike items.");
  });
});

describe("buildUpdateWorkItemPatch", () => {
  test("only includes given changes and records comments in history", () => {
    expect(buildUpdateWorkItemPatch({ state: "Resolved", comment: "Fixed in 1.2" })).toEqual([
      { op: Operation.Add, path: "/fields/System.State", value: "Resolved" },
      { op: Operation.Add, path: "/fields/System.History", value: "Fixed in 1.2" },
    ]);
    expect(buildUpdateWorkItemPatch({})).toEqual([]);
  });
});

describe("parseWorkItemsRecentArgs", () => {
  test("keeps a positional top", () => {
    const parsed = parseWorkItemsRecentArgs(["25"]);

    expect(parsed.top).toBe(25);
    expect(parsed.filters).toEqual({
      tag: undefined,
      type: undefined,
      state: undefined,
      assignedTo: undefined,
    });
  });

  test("supports filters and resolves type aliases", () => {
    const parsed = parseWorkItemsRecentArgs(["--top=12", "--tag=bot", "--type=bug", "--state=New", "--assigned-to=@me"]);

    expect(parsed).toEqual({
      top: 12,
      filters: { tag: "bot", type: "Bug", state: "New", assignedTo: "@me" },
    });
  });

  test("passes unknown work item types through", () => {
    expect(parseWorkItemsRecentArgs(["--type=Epic"]).filters.type).toBe("Epic");
  });

  test("rejects unknown options and extra positionals", () => {
    expect(() => parseWorkItemsRecentArgs(["--foo=bar"])).toThrow(/Unknown option/);
    expect(() => parseWorkItemsRecentArgs(["1", "2"])).toThrow("Too many arguments.");
  });
});

describe("buildRecentWorkItemsWiql", () => {
  test("scopes to the project without filters", () => {
    expect(buildRecentWorkItemsWiql()).toBe(
      "SELECT [System.Id] FROM WorkItems WHERE [System.TeamProject] = @project ORDER BY [System.ChangedDate] DESC",
    );
  });

  test("builds a combined WHERE clause", () => {
    const wiql = buildRecentWorkItemsWiql({ tag: "bot", type: "Bug", state: "Active", assignedTo: "@Me" });

    expect(wiql).toBe(
      "SELECT [System.Id] FROM WorkItems WHERE [System.TeamProject] = @project AND [System.WorkItemType] = 'Bug' AND [System.State] = 'Active' AND [System.Tags] CONTAINS 'bot' AND [System.AssignedTo] = @Me ORDER BY [System.ChangedDate] DESC",
    );
  });

  test("escapes single quotes in filters", () => {
    const wiql = buildRecentWorkItemsWiql({ tag: "bot's", assignedTo: "O'Neil" });

    expect(wiql).toBe(
      "SELECT [System.Id] FROM WorkItems WHERE [System.TeamProject] = @project AND [System.Tags] CONTAINS 'bot''s' AND [System.AssignedTo] = 'O''Neil' ORDER BY [System.ChangedDate] DESC",
    );
  });
});

describe("summarizeWorkItem", () => {
  test("reads the common fields", () => {
    expect(
      summarizeWorkItem({
        id: 7,
        url: "https://dev.azure.com/acme/_apis/wit/workItems/7",
        fields: {
          "System.Title": "Crash on save",
          "System.State": "Active",
          "System.WorkItemType": "Bug",
          "System.AssignedTo": { displayName: "Dana" },
          "System.ChangedDate": "2024-05-01T10:00:00Z",
        },
      }),
    ).toEqual({
      id: 7,
      title: "Crash on save",
      state: "Active",
      type: "Bug",
      assignedTo: "Dana",
      changedDate: "2024-05-01T10:00:00Z",
      url: "https://dev.azure.com/acme/_apis/wit/workItems/7",
    });
  });
});

describe("resolveCommentText", () => {
  test("prefers --text", async () => {
    await expect(resolveCommentText({ text: "  Looks good  " })).resolves.toBe("Looks good");
  });

  test("reads the comment from a file", async () => {
    const dir = mkdtempSync(join(tmpdir(), "ado-comment-test-"));
    try {
      const file = join(dir, "comment.md");
      writeFileSync(file, "From a file\n", "utf8");

      await expect(resolveCommentText({ file })).resolves.toBe("From a file");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("requires a non-empty body", async () => {
    await expect(resolveCommentText({ text: "   " })).rejects.toBeInstanceOf(UsageError);
  });
});

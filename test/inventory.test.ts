import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { InventoryError, exitCodeFor, type RunPhase } from "../src/inventory.js";
import type { Reporter } from "../src/progress.js";
import { runPullRequestInventory } from "../src/pull-request-inventory.js";
import type { AdoConnectionInfo } from "../src/types.js";
import { runVariableGroupInventory } from "../src/variable-group-inventory.js";
import { json, stubFetch } from "./fetch-stub.js";

const connection: AdoConnectionInfo = {
  pat: "test-pat",
  collectionUrl: "https://dev.azure.com/acme",
};

const projects = {
  value: [
    { id: "p1", name: "Foo", state: "wellFormed" },
    { id: "p2", name: "Bar", state: "wellFormed" },
    { id: "p3", name: "Deleting", state: "deleting" },
  ],
};

function pullRequests(repo: string, count: number) {
  return {
    value: Array.from({ length: count }, (_, index) => ({
      pullRequestId: index + 1,
      title: `${repo} change ${index + 1}`,
      status: "active",
      createdBy: { displayName: "Dana" },
      creationDate: "2024-05-01T10:00:00Z",
      sourceRefName: "refs/heads/feature/x",
      targetRefName: "refs/heads/main",
      isDraft: false,
      mergeStatus: "succeeded",
      url: `https://dev.azure.com/acme/_apis/git/pullrequests/${index + 1}`,
    })),
  };
}

interface RouteOptions {
  forbiddenRepo?: string;
  forbiddenProjects?: readonly string[];
}

function routeOrganization({ forbiddenRepo, forbiddenProjects = [] }: RouteOptions = {}) {
  return stubFetch((url) => {
    const path = url.pathname;
    if (path === "/acme/_apis/projects") return json(projects);

    const repoMatch = /^\/acme\/([^/]+)\/_apis\/git\/repositories$/.exec(path);
    if (repoMatch) {
      const project = repoMatch[1] ?? "";
      if (forbiddenProjects.includes(project)) return json({ message: "TF400813: not authorized" }, 401);
      return json({ value: [{ id: `${project}-repo`, name: `${project}-repo` }] });
    }

    const prMatch = /^\/acme\/[^/]+\/_apis\/git\/repositories\/([^/]+)\/pullrequests$/.exec(path);
    if (prMatch) {
      const repo = prMatch[1] ?? "";
      if (repo === forbiddenRepo) return json({ message: "TF401019: access denied" }, 403);
      return json(pullRequests(repo, 3));
    }

    return json({ message: "not found" }, 404);
  });
}

function createReporter() {
  return {
    progress: vi.fn(),
    info: vi.fn(),
    skip: vi.fn(),
    warn: vi.fn(),
    summary: vi.fn(),
  } satisfies Reporter;
}

describe("runPullRequestInventory", () => {
  test("collects pull requests from every repository of every matching project", async () => {
    routeOrganization();

    const result = await runPullRequestInventory(connection, "acme", { throttleLimit: 2 });

    expect(result.phase).toBe("done");
    expect(result.projects).toEqual([
      { id: "p1", name: "Foo" },
      { id: "p2", name: "Bar" },
    ]);
    expect(result.records).toHaveLength(6);
    expect(result.summary).toEqual({ totalChildResources: 2, succeeded: 2, failed: 0, totalRecords: 6 });
    expect(result.failures).toEqual([]);
    expect(exitCodeFor(result)).toBe(0);
  });

  test("maps pull requests to flat records", async () => {
    routeOrganization();

    const result = await runPullRequestInventory(connection, "acme", { projectPatterns: ["foo"] });
    const first = result.records.find((record) => record.pullRequestId === 1);

    expect(first).toEqual({
      organization: "acme",
      project: "Foo",
      repository: "Foo-repo",
      pullRequestId: 1,
      title: "Foo-repo change 1",
      status: "active",
      createdBy: "Dana",
      creationDate: "2024-05-01T10:00:00Z",
      sourceBranch: "feature/x",
      targetBranch: "main",
      isDraft: false,
      mergeStatus: "succeeded",
      url: "https://dev.azure.com/acme/_apis/git/pullrequests/1",
    });
  });

  test("sends the status filter and page size", async () => {
    const fetchMock = routeOrganization();

    await runPullRequestInventory(connection, "acme", { projectPatterns: ["Bar"], status: "completed" });

    const prUrl = fetchMock.mock.calls
      .map(([input]) => String(input))
      .find((url) => url.includes("/pullrequests"));
    expect(prUrl).toBe(
      "https://dev.azure.com/acme/Bar/_apis/git/repositories/Bar-repo/pullrequests?searchCriteria.status=completed&%24top=1000&api-version=7.0",
    );
  });

  test("filters projects with wildcard patterns", async () => {
    routeOrganization();

    const result = await runPullRequestInventory(connection, "acme", { projectPatterns: ["F*"] });

    expect(result.projects).toEqual([{ id: "p1", name: "Foo" }]);
    expect(result.records.every((record) => record.project === "Foo")).toBe(true);
    expect(result.summary.totalChildResources).toBe(1);
  });

  test("reports a forbidden repository as skipped and keeps going", async () => {
    routeOrganization({ forbiddenRepo: "Bar-repo" });
    const reporter = createReporter();

    const result = await runPullRequestInventory(connection, "acme", { reporter });

    expect(result.summary).toEqual({ totalChildResources: 2, succeeded: 1, failed: 1, totalRecords: 3 });
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.resource.name).toBe("Bar-repo");
    expect(reporter.skip).toHaveBeenCalledTimes(1);
    expect(reporter.skip.mock.calls[0]?.[0]).toMatch(/^Bar\/Bar-repo: Azure DevOps API request failed \(403\)/);
    expect(reporter.warn).not.toHaveBeenCalled();
    expect(reporter.summary).toHaveBeenCalledWith(result.summary);
    expect(exitCodeFor(result)).toBe(0);
  });

  test("skips a project whose repositories cannot be listed and scans the others", async () => {
    routeOrganization({ forbiddenProjects: ["Foo"] });
    const reporter = createReporter();

    const result = await runPullRequestInventory(connection, "acme", { reporter });

    expect(result.records).toHaveLength(3);
    expect(result.records.every((record) => record.project === "Bar")).toBe(true);
    expect(result.summary).toEqual({ totalChildResources: 2, succeeded: 1, failed: 1, totalRecords: 3 });
    expect(result.failures.map((failure) => failure.resource.name)).toEqual(["Foo"]);
    expect(reporter.skip).toHaveBeenCalledTimes(1);
    expect(reporter.skip.mock.calls[0]?.[0]).toMatch(
      /^Foo: Failed to list repositories: Azure DevOps API request failed \(401\)/,
    );
    expect(exitCodeFor(result)).toBe(0);
  });

  test("fails in the children phase when no project's repositories can be listed", async () => {
    routeOrganization({ forbiddenProjects: ["Foo", "Bar"] });
    const phases: RunPhase[] = [];

    const run = runPullRequestInventory(connection, "acme", { onPhase: (phase) => phases.push(phase) });

    await expect(run).rejects.toMatchObject({
      name: "InventoryError",
      phase: "enumerating-children",
    });
    expect(phases).toEqual(["enumerating-projects", "enumerating-children", "failed"]);
  });

  test("fails in the project phase when projects cannot be listed", async () => {
    stubFetch(() => json({ message: "no such organization" }, 404));
    const phases: RunPhase[] = [];

    const run = runPullRequestInventory(connection, "acme", { onPhase: (phase) => phases.push(phase) });

    await expect(run).rejects.toBeInstanceOf(InventoryError);
    await expect(run).rejects.toMatchObject({ phase: "enumerating-projects" });
    expect(phases).toEqual(["enumerating-projects", "failed"]);
  });

  test("walks the phases in order on success", async () => {
    routeOrganization();
    const phases: RunPhase[] = [];

    await runPullRequestInventory(connection, "acme", { onPhase: (phase) => phases.push(phase) });

    expect(phases).toEqual(["enumerating-projects", "enumerating-children", "dispatching", "aggregating", "done"]);
  });

  describe("export", () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), "ado-inventory-test-"));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    test("writes a CSV file when an output path is given", async () => {
      routeOrganization();
      const outputPath = join(testDir, "prs.csv");

      const result = await runPullRequestInventory(connection, "acme", { projectPatterns: ["Foo"], outputPath });

      expect(result.exportedTo).toBe(outputPath);
      const lines = readFileSync(outputPath, "utf8").trimEnd().split("\n");
      expect(lines[0]).toBe(
        "organization,project,repository,pullRequestId,title,status,createdBy,creationDate,sourceBranch,targetBranch,isDraft,mergeStatus,url",
      );
      expect(lines).toHaveLength(4);
    });

    test("keeps the records when the export format is not supported", async () => {
      routeOrganization();
      const reporter = createReporter();

      const result = await runPullRequestInventory(connection, "acme", {
        outputPath: join(testDir, "prs.txt"),
        reporter,
      });

      expect(result.records).toHaveLength(6);
      expect(result.exportedTo).toBeUndefined();
      expect(result.exportError).toMatch(/^Unsupported export format "\.txt"/);
      expect(reporter.warn).toHaveBeenCalledTimes(1);
    });
  });
});

describe("runVariableGroupInventory", () => {
  test("emits one record per variable and hides secret values", async () => {
    stubFetch((url) => {
      if (url.pathname === "/acme/_apis/projects") {
        return json({ value: [{ id: "p1", name: "Foo", state: "wellFormed" }] });
      }
      if (url.pathname === "/acme/Foo/_apis/distributedtask/variablegroups") {
        return json({
          value: [
            {
              id: 4,
              name: "app-settings",
              variables: {
                region: { value: "westeurope" },
                apiKey: { value: null, isSecret: true },
              },
            },
            { id: 5, name: "empty-group", variables: {} },
            { id: 6, name: "legacy", variables: { old: { value: "1" } } },
          ],
        });
      }
      return json({}, 404);
    });

    const result = await runVariableGroupInventory(connection, "acme", { groupPatterns: ["app-*", "empty*"] });

    expect(result.records).toEqual([
      {
        organization: "acme",
        project: "Foo",
        variableGroupId: 4,
        variableGroupName: "app-settings",
        variableName: "region",
        value: "westeurope",
        isSecret: false,
      },
      {
        organization: "acme",
        project: "Foo",
        variableGroupId: 4,
        variableGroupName: "app-settings",
        variableName: "apiKey",
        value: null,
        isSecret: true,
      },
      {
        organization: "acme",
        project: "Foo",
        variableGroupId: 5,
        variableGroupName: "empty-group",
        variableName: "",
        value: null,
        isSecret: false,
      },
    ]);
    expect(result.summary).toEqual({ totalChildResources: 1, succeeded: 1, failed: 0, totalRecords: 3 });
  });
});

describe("runVariableGroupInventory with details", () => {
  test("adds description and modification fields", async () => {
    stubFetch((url) => {
      if (url.pathname === "/acme/_apis/projects") {
        return json({ value: [{ id: "p1", name: "Foo", state: "wellFormed" }] });
      }
      if (url.pathname === "/acme/Foo/_apis/distributedtask/variablegroups") {
        return json({
          value: [
            {
              id: 9,
              name: "release",
              description: "Release settings",
              modifiedBy: { displayName: "Dana" },
              modifiedOn: "2024-06-01T08:30:00Z",
              variables: { channel: { value: "stable" } },
            },
          ],
        });
      }
      return json({}, 404);
    });

    const result = await runVariableGroupInventory(connection, "acme", { includeDetails: true });

    expect(result.records).toEqual([
      {
        organization: "acme",
        project: "Foo",
        variableGroupId: 9,
        variableGroupName: "release",
        variableName: "channel",
        value: "stable",
        isSecret: false,
        description: "Release settings",
        modifiedBy: "Dana",
        modifiedOn: "2024-06-01T08:30:00Z",
      },
    ]);
  });
});

describe("exitCodeFor", () => {
  test("fails only when every task failed", () => {
    expect(exitCodeFor({ summary: { totalChildResources: 2, succeeded: 0, failed: 2, totalRecords: 0 } })).toBe(1);
    expect(exitCodeFor({ summary: { totalChildResources: 2, succeeded: 1, failed: 1, totalRecords: 4 } })).toBe(0);
    expect(exitCodeFor({ summary: { totalChildResources: 0, succeeded: 0, failed: 0, totalRecords: 0 } })).toBe(0);
  });
});

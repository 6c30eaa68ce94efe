import { GitPullRequestMergeStrategy, PullRequestStatus } from "azure-devops-node-api/interfaces/GitInterfaces.js";
import type { PolicyConfiguration } from "azure-devops-node-api/interfaces/PolicyInterfaces.js";
import { Operation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import { describe, test, expect } from "vitest";
import { describeVote, stripRefPrefix, toPullRequestRecord } from "../src/pull-request-inventory.js";
import {
  buildArtifactLinkPatch,
  buildPullRequestArtifactUrl,
  mapPrStatus,
  normalizeRefName,
  parseMergeStrategy,
  parseVote,
  prStatusName,
  selectOptionalWorkItemPolicyIds,
  summarizePullRequest,
} from "../src/pull-requests.js";

describe("ref names", () => {
  test("normalizeRefName prefixes bare branch names", () => {
    expect(normalizeRefName("main")).toBe("refs/heads/main");
    expect(normalizeRefName("refs/tags/v1")).toBe("refs/tags/v1");
  });

  test("stripRefPrefix drops refs/heads/", () => {
    expect(stripRefPrefix("refs/heads/feature/login")).toBe("feature/login");
    expect(stripRefPrefix("refs/tags/v1")).toBe("refs/tags/v1");
    expect(stripRefPrefix(undefined)).toBe("");
  });
});

describe("parseVote", () => {
  test("defaults to approve", () => {
    expect(parseVote(undefined)).toBe(10);
  });

  test("maps every vote name", () => {
    expect(parseVote("Approve-With-Suggestions")).toBe(5);
    expect(parseVote("none")).toBe(0);
    expect(parseVote("wait")).toBe(-5);
    expect(parseVote("reject")).toBe(-10);
  });

  test("rejects unknown votes", () => {
    expect(() => parseVote("maybe")).toThrow('Unknown vote "maybe"');
  });
});

describe("parseMergeStrategy", () => {
  test("defaults to squash and ignores case", () => {
    expect(parseMergeStrategy(undefined)).toBe(GitPullRequestMergeStrategy.Squash);
    expect(parseMergeStrategy("noFastForward")).toBe(GitPullRequestMergeStrategy.NoFastForward);
    expect(parseMergeStrategy("rebaseMerge")).toBe(GitPullRequestMergeStrategy.RebaseMerge);
  });

  test("rejects unknown strategies", () => {
    expect(() => parseMergeStrategy("octopus")).toThrow('Unknown merge strategy "octopus"');
  });
});

describe("pull request status", () => {
  test("maps status names both ways", () => {
    expect(mapPrStatus("Completed")).toBe(PullRequestStatus.Completed);
    expect(mapPrStatus("all")).toBe(PullRequestStatus.All);
    expect(prStatusName(PullRequestStatus.Abandoned)).toBe("Abandoned");
    expect(() => mapPrStatus("merged")).toThrow('Unknown pull request status "merged"');
  });
});

describe("buildPullRequestArtifactUrl", () => {
  test("builds the vstfs URL", () => {
    const artifactUrl = buildPullRequestArtifactUrl({
      pullRequestId: 2037,
      repository: {
        id: "repo-id-123",
        project: { id: "project-id-456" },
      },
    });

    expect(artifactUrl).toBe("vstfs:///Git/PullRequestId/project-id-456%2Frepo-id-123%2F2037");
  });

  test("returns null when mandatory fields are missing", () => {
    expect(buildPullRequestArtifactUrl({})).toBeNull();
    expect(buildPullRequestArtifactUrl(null)).toBeNull();
  });

  test("wraps the URL in an artifact link patch", () => {
    expect(buildArtifactLinkPatch("vstfs:///Git/PullRequestId/p%2Fr%2F1")).toEqual([
      {
        op: Operation.Add,
        path: "/relations/-",
        value: {
          rel: "ArtifactLink",
          url: "vstfs:///Git/PullRequestId/p%2Fr%2F1",
          attributes: { name: "Pull Request" },
        },
      },
    ]);
  });
});

describe("summarizePullRequest", () => {
  test("keeps the fields shown by the CLI", () => {
    expect(
      summarizePullRequest({
        pullRequestId: 12,
        title: "Add login",
        status: PullRequestStatus.Active,
        createdBy: { displayName: "Dana", id: "user-1" },
        sourceRefName: "refs/heads/login",
        targetRefName: "refs/heads/main",
        repository: { name: "web" },
      }),
    ).toEqual({
      id: 12,
      title: "Add login",
      status: "Active",
      isDraft: false,
      createdBy: "Dana",
      createdById: "user-1",
      sourceRef: "refs/heads/login",
      targetRef: "refs/heads/main",
      repository: "web",
      url: null,
    });
  });
});

describe("selectOptionalWorkItemPolicyIds", () => {
  const linking = { id: "40e92b44-2fe1-4dd6-b3d8-74a9c21d0c6e", displayName: "Work item linking" };
  const policies: PolicyConfiguration[] = [
    { id: 1, isEnabled: true, isBlocking: false, type: linking, settings: {} },
    { id: 2, isEnabled: true, isBlocking: true, type: linking, settings: {} },
    {
      id: 3,
      isEnabled: true,
      isBlocking: false,
      type: linking,
      settings: { scope: [{ repositoryId: "r1", refName: "refs/heads/main", matchKind: "Exact" }] },
    },
    {
      id: 4,
      isEnabled: true,
      isBlocking: false,
      type: linking,
      settings: { scope: [{ repositoryId: "r2", refName: "refs/heads/main", matchKind: "Exact" }] },
    },
    {
      id: 5,
      isEnabled: true,
      isBlocking: false,
      type: linking,
      settings: { scope: [{ refName: "refs/heads/release/", matchKind: "Prefix" }] },
    },
    { id: 6, isEnabled: true, isBlocking: false, type: { id: "fa4e907d-c16b-4a4c-9dfa-4906e5d171dd", displayName: "Minimum number of reviewers" }, settings: {} },
    { id: 7, isEnabled: false, isBlocking: false, type: linking, settings: {} },
  ];

  test("selects enabled non-blocking policies scoped to the target", () => {
    expect(selectOptionalWorkItemPolicyIds(policies, "r1", "refs/heads/main")).toEqual([1, 3]);
  });

  test("honours prefix scopes", () => {
    expect(selectOptionalWorkItemPolicyIds(policies, "r1", "refs/heads/release/1.0")).toEqual([1, 5]);
  });
});

describe("toPullRequestRecord", () => {
  const target = { id: "repo-1", name: "web", parentId: "p1", projectName: "Shop" };

  test("adds description and reviewers with details", () => {
    const record = toPullRequestRecord(
      "acme",
      target,
      {
        pullRequestId: 9,
        description: "Adds caching",
        reviewers: [
          { displayName: "Ana", vote: 10 },
          { uniqueName: "bo@example.test", vote: -5 },
          { id: "group-1" },
        ],
      },
      true,
    );

    expect(record.description).toBe("Adds caching");
    expect(record.reviewers).toEqual(["Ana (approved)", "bo@example.test (waiting for author)", "group-1 (no vote)"]);
  });

  test("fills absent fields with empty values", () => {
    expect(toPullRequestRecord("acme", target, {})).toEqual({
      organization: "acme",
      project: "Shop",
      repository: "web",
      pullRequestId: 0,
      title: "",
      status: "",
      createdBy: "",
      creationDate: "",
      sourceBranch: "",
      targetBranch: "",
      isDraft: false,
      mergeStatus: "",
      url: "",
    });
  });

  test("describeVote names the review states", () => {
    expect(describeVote(5)).toBe("approved with suggestions");
    expect(describeVote(-10)).toBe("rejected");
    expect(describeVote(undefined)).toBe("no vote");
  });
});

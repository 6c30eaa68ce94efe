import { adoRequest, encodePathSegment } from "./api.js";
import { runInventory, type InventoryDefinition, type InventoryOptions, type InventoryResult } from "./inventory.js";
import { listRepositories } from "./resources.js";
import type {
  AdoConnectionInfo,
  AdoListResponse,
  AdoProjectRef,
  AdoPullRequest,
  AdoRepositoryRef,
  AdoReviewer,
  PullRequestRecord,
} from "./types.js";

export const PULL_REQUEST_STATUSES = ["active", "completed", "abandoned", "all"] as const;
export type PullRequestStatusFilter = (typeof PULL_REQUEST_STATUSES)[number];

const PULL_REQUESTS_PAGE_SIZE = 1000;

export interface PullRequestInventoryOptions extends InventoryOptions {
  status?: PullRequestStatusFilter;
  includeDetails?: boolean;
}

/** Repository resolved together with its project's name for record provenance. */
export interface RepositoryTarget extends AdoRepositoryRef {
  projectName: string;
}

export function isPullRequestStatus(value: string): value is PullRequestStatusFilter {
  return PULL_REQUEST_STATUSES.some((status) => status === value);
}

export function stripRefPrefix(refName: string | undefined): string {
  return (refName ?? "").replace(/^refs\/heads\//, "");
}

export function describeVote(vote: number | undefined): string {
  switch (vote) {
    case 10:
      return "approved";
    case 5:
      return "approved with suggestions";
    case -5:
      return "waiting for author";
    case -10:
      return "rejected";
    default:
      return "no vote";
  }
}

function formatReviewer(reviewer: AdoReviewer): string {
  const name = reviewer.displayName ?? reviewer.uniqueName ?? reviewer.id ?? "unknown";
  return `${name} (${describeVote(reviewer.vote)})`;
}

export function toPullRequestRecord(
  organization: string,
  target: RepositoryTarget,
  pr: AdoPullRequest,
  includeDetails = false,
): PullRequestRecord {
  const record: PullRequestRecord = {
    organization,
    project: target.projectName,
    repository: target.name,
    pullRequestId: pr.pullRequestId ?? 0,
    title: pr.title ?? "",
    status: pr.status ?? "",
    createdBy: pr.createdBy?.displayName ?? "",
    creationDate: pr.creationDate ?? "",
    sourceBranch: stripRefPrefix(pr.sourceRefName),
    targetBranch: stripRefPrefix(pr.targetRefName),
    isDraft: pr.isDraft ?? false,
    mergeStatus: pr.mergeStatus ?? "",
    url: pr.url ?? "",
  };

  if (includeDetails) {
    record.description = pr.description ?? "";
    record.reviewers = (pr.reviewers ?? []).map(formatReviewer);
  }
  return record;
}

export function pullRequestInventory(
  connection: AdoConnectionInfo,
  organization: string,
  { status = "active", includeDetails = false }: Pick<PullRequestInventoryOptions, "status" | "includeDetails"> = {},
): InventoryDefinition<RepositoryTarget, PullRequestRecord> {
  return {
    childLabel: "repositories",
    async listChildren(project: AdoProjectRef, signal?: AbortSignal) {
      const repos = await listRepositories(connection, project, signal);
      return repos.map((repo) => ({ ...repo, projectName: project.name }));
    },
    describe: (target) => `${target.projectName}/${target.name}`,
    async collect(target, signal) {
      const response = await adoRequest<AdoListResponse<AdoPullRequest>>(
        connection,
        `/${encodePathSegment(target.projectName)}/_apis/git/repositories/${encodeURIComponent(target.id)}/pullrequests`,
        {
          query: { "searchCriteria.status": status, $top: PULL_REQUESTS_PAGE_SIZE },
          signal,
        },
      );
      return (response?.value ?? []).map((pr) => toPullRequestRecord(organization, target, pr, includeDetails));
    },
  };
}

export function runPullRequestInventory(
  connection: AdoConnectionInfo,
  organization: string,
  { status, includeDetails, ...options }: PullRequestInventoryOptions = {},
): Promise<InventoryResult<RepositoryTarget, PullRequestRecord>> {
  return runInventory(connection, pullRequestInventory(connection, organization, { status, includeDetails }), options);
}

import {
  GitPullRequestMergeStrategy,
  PullRequestStatus,
} from "azure-devops-node-api/interfaces/GitInterfaces.js";
import type {
  GitPullRequest,
  GitPullRequestSearchCriteria,
} from "azure-devops-node-api/interfaces/GitInterfaces.js";
import type { PolicyConfiguration } from "azure-devops-node-api/interfaces/PolicyInterfaces.js";
import { Operation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import type { JsonPatchOperation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import {
  assertKnownOptions,
  optionFlag,
  optionString,
  parseId,
  parseIdList,
  parseOptionArgs,
  toBoundedTop,
} from "./args.js";
import { requireProject, requireRepo } from "./config.js";
import { UsageError, describeError } from "./errors.js";
import type { AdoConfig } from "./types.js";

export const PR_VOTES = {
  approve: 10,
  "approve-with-suggestions": 5,
  none: 0,
  wait: -5,
  reject: -10,
} as const;
export type PrVoteName = keyof typeof PR_VOTES;

const MERGE_STRATEGIES: Record<string, GitPullRequestMergeStrategy> = {
  squash: GitPullRequestMergeStrategy.Squash,
  nofastforward: GitPullRequestMergeStrategy.NoFastForward,
  merge: GitPullRequestMergeStrategy.NoFastForward,
  rebase: GitPullRequestMergeStrategy.Rebase,
  rebasemerge: GitPullRequestMergeStrategy.RebaseMerge,
};

export function normalizeRefName(branch: string): string {
  return branch.startsWith("refs/") ? branch : `refs/heads/${branch}`;
}

export function parseVote(raw: string | undefined): number {
  const name = (raw ?? "approve").trim().toLowerCase();
  for (const [key, vote] of Object.entries(PR_VOTES)) {
    if (key === name) return vote;
  }
  throw new Error(`Unknown vote "${raw}". Use one of: ${Object.keys(PR_VOTES).join(", ")}.`);
}

export function parseMergeStrategy(raw: string | undefined): GitPullRequestMergeStrategy {
  const strategy = MERGE_STRATEGIES[(raw ?? "squash").trim().toLowerCase()];
  if (strategy === undefined) {
    throw new Error(`Unknown merge strategy "${raw}". Use squash, noFastForward, rebase or rebaseMerge.`);
  }
  return strategy;
}

export function mapPrStatus(s: string): PullRequestStatus {
  switch (s.toLowerCase()) {
    case "active":
      return PullRequestStatus.Active;
    case "abandoned":
      return PullRequestStatus.Abandoned;
    case "completed":
      return PullRequestStatus.Completed;
    case "all":
      return PullRequestStatus.All;
    default:
      throw new Error(`Unknown pull request status "${s}". Use active, completed, abandoned or all.`);
  }
}

export function prStatusName(status: number | undefined): string {
  return PullRequestStatus[status ?? 0] ?? "unknown";
}

export function buildPullRequestArtifactUrl(
  pr:
    | { pullRequestId?: number; repository?: { id?: string; project?: { id?: string } } }
    | null
    | undefined,
): string | null {
  const projectId = pr?.repository?.project?.id;
  const repoId = pr?.repository?.id;
  const prId = pr?.pullRequestId;

  if (!projectId || !repoId || !prId) return null;
  return `vstfs:///Git/PullRequestId/${projectId}%2F${repoId}%2F${prId}`;
}

export function buildArtifactLinkPatch(artifactUrl: string): JsonPatchOperation[] {
  return [
    {
      op: Operation.Add,
      path: "/relations/-",
      value: {
        rel: "ArtifactLink",
        url: artifactUrl,
        attributes: { name: "Pull Request" },
      },
    },
  ];
}

export function summarizePullRequest(pr: GitPullRequest): Record<string, string | number | boolean | null> {
  return {
    id: pr.pullRequestId ?? null,
    title: pr.title ?? null,
    status: prStatusName(pr.status),
    isDraft: pr.isDraft ?? false,
    createdBy: pr.createdBy?.displayName ?? null,
    createdById: pr.createdBy?.id ?? null,
    sourceRef: pr.sourceRefName ?? null,
    targetRef: pr.targetRefName ?? null,
    repository: pr.repository?.name ?? null,
    url: pr.url ?? null,
  };
}

interface PolicyScope {
  repositoryId?: string;
  refName?: string;
  matchKind?: string;
}

/** Ids of enabled, non-blocking "Work item linking" policies that apply to the target branch. */
export function selectOptionalWorkItemPolicyIds(
  policies: readonly PolicyConfiguration[],
  repositoryId: string | undefined,
  targetRefName: string | undefined,
): number[] {
  const ids: number[] = [];

  for (const policy of policies) {
    if (policy.type?.displayName !== "Work item linking") continue;
    if (!policy.isEnabled || policy.isBlocking) continue;

    const scopes: unknown = policy.settings?.scope;
    if (!Array.isArray(scopes) || scopes.length === 0) {
      if (policy.id != null) ids.push(policy.id);
      continue;
    }

    const matchesScope = scopes.some((scope: PolicyScope) => {
      const repoOk = !scope.repositoryId || scope.repositoryId === repositoryId;
      const refOk =
        !scope.refName ||
        (scope.matchKind === "Prefix"
          ? (targetRefName ?? "").startsWith(scope.refName)
          : scope.refName === targetRefName);
      const matchKindOk = !scope.matchKind || scope.matchKind === "Exact" || scope.matchKind === "Prefix";
      return repoOk && refOk && matchKindOk;
    });

    if (matchesScope && policy.id != null) ids.push(policy.id);
  }

  return ids;
}

async function linkWorkItemsToPr(config: AdoConfig, pr: GitPullRequest, workItemIds: number[]): Promise<void> {
  const artifactUrl = buildPullRequestArtifactUrl(pr);
  if (!artifactUrl) {
    throw new Error("Unable to resolve PR artifact URL required to link work items.");
  }

  const witApi = await config.connection.getWorkItemTrackingApi();
  for (const workItemId of workItemIds) {
    await witApi.updateWorkItem({}, buildArtifactLinkPatch(artifactUrl), workItemId, requireProject(config));
    console.log(`Linked work item #${workItemId} to PR #${pr.pullRequestId}`);
  }
}

const PRS_USAGE = "Usage: prs [active|completed|abandoned|all] [top] [repo]";

export async function cmdPrs(config: AdoConfig, args: string[]): Promise<void> {
  const [status = "active", topRaw = "10", repoArg] = args;
  let searchStatus: PullRequestStatus;
  try {
    searchStatus = mapPrStatus(status);
  } catch (error) {
    throw new UsageError(describeError(error), PRS_USAGE);
  }

  const gitApi = await config.connection.getGitApi();
  const prs = await gitApi.getPullRequests(
    requireRepo(config, repoArg),
    { status: searchStatus } as GitPullRequestSearchCriteria,
    requireProject(config),
    undefined,
    undefined,
    toBoundedTop(topRaw),
  );

  for (const pr of prs) {
    const createdBy = pr.createdBy?.displayName ?? "unknown";
    const draft = pr.isDraft ? " (draft)" : "";
    console.log(`#${pr.pullRequestId}\t[${prStatusName(pr.status)}]${draft}\t${pr.title}\t(${createdBy})`);
  }
}

export async function cmdPrGet(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], "Usage: pr-get <id>", "pull request ID");
  const gitApi = await config.connection.getGitApi();
  const pr = await gitApi.getPullRequestById(id, requireProject(config));
  console.log(JSON.stringify(summarizePullRequest(pr), null, 2));
}

const PR_CREATE_USAGE =
  "Usage: pr-create --title=... --source=feature/x --target=develop [--description=...] [--repo=...] [--work-items=123,456] [--reviewers=<id>,<id>] [--draft]";

export async function cmdPrCreate(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(
    parsed,
    ["title", "source", "target", "description", "repo", "work-items", "reviewers", "draft"],
    PR_CREATE_USAGE,
  );
  const { options } = parsed;

  const title = optionString(options.title);
  const source = optionString(options.source);
  const target = optionString(options.target);
  if (!title || !source || !target) {
    throw new UsageError("--title, --source and --target are required.", PR_CREATE_USAGE);
  }

  const repo = requireRepo(config, optionString(options.repo));
  const project = requireProject(config);
  const reviewers = (optionString(options.reviewers) ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
    .map((id) => ({ id }));

  const gitApi = await config.connection.getGitApi();
  const created = await gitApi.createPullRequest(
    {
      title,
      description: optionString(options.description) ?? "",
      sourceRefName: normalizeRefName(source),
      targetRefName: normalizeRefName(target),
      isDraft: optionFlag(options.draft),
      reviewers,
    },
    repo,
    project,
  );
  console.log(`Created PR #${created.pullRequestId}: ${created.title}`);

  const workItemIds = parseIdList(options["work-items"]);
  if (workItemIds.length > 0 && created.pullRequestId !== undefined) {
    const createdPr = await gitApi.getPullRequestById(created.pullRequestId, project);
    await linkWorkItemsToPr(config, createdPr, workItemIds);
  }
}

const PR_UPDATE_USAGE =
  "Usage: pr-update <id> [--title=...] [--description=...] [--repo=...] [--work-items=123,456] [--publish]";

export async function cmdPrUpdate(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], PR_UPDATE_USAGE, "pull request ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["title", "description", "repo", "work-items", "publish"], PR_UPDATE_USAGE);
  const { options } = parsed;

  const body: GitPullRequest = {};
  if (typeof options.title === "string") body.title = options.title;
  if (typeof options.description === "string") body.description = options.description;
  if (optionFlag(options.publish)) body.isDraft = false;
  const workItemIds = parseIdList(options["work-items"]);

  if (Object.keys(body).length === 0 && workItemIds.length === 0) {
    throw new UsageError("Nothing to update.", PR_UPDATE_USAGE);
  }

  const project = requireProject(config);
  const gitApi = await config.connection.getGitApi();
  let updated: GitPullRequest;

  if (Object.keys(body).length > 0) {
    updated = await gitApi.updatePullRequest(body, requireRepo(config, optionString(options.repo)), id, project);
    console.log(`Updated PR #${updated.pullRequestId}: ${updated.title}`);
  } else {
    updated = await gitApi.getPullRequestById(id, project);
  }

  if (workItemIds.length > 0) {
    await linkWorkItemsToPr(config, updated, workItemIds);
  }
}

const PR_APPROVE_USAGE =
  "Usage: pr-approve <id> [repo] [--vote=approve|approve-with-suggestions|none|wait|reject] [--reviewer=<id>]";

export async function cmdPrApprove(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["vote", "reviewer"], PR_APPROVE_USAGE);
  const [idRaw, repoArg] = parsed.positionals;
  const id = parseId(idRaw, PR_APPROVE_USAGE, "pull request ID");

  let vote: number;
  try {
    vote = parseVote(optionString(parsed.options.vote));
  } catch (error) {
    throw new UsageError(describeError(error), PR_APPROVE_USAGE);
  }

  const project = requireProject(config);
  const gitApi = await config.connection.getGitApi();
  let reviewerId = optionString(parsed.options.reviewer);
  if (!reviewerId) {
    const pr = await gitApi.getPullRequestById(id, project);
    reviewerId = pr.createdBy?.id;
  }
  if (!reviewerId) {
    throw new Error("Could not determine reviewer id; pass --reviewer=<id>.");
  }

  await gitApi.createPullRequestReviewer({ vote }, requireRepo(config, repoArg), id, reviewerId, project);
  console.log(`Voted ${vote} on PR #${id} as reviewer ${reviewerId}`);
}

export async function cmdPrAutocomplete(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], "Usage: pr-autocomplete <id> [repo]", "pull request ID");
  const repo = requireRepo(config, args[1]);
  const project = requireProject(config);

  const gitApi = await config.connection.getGitApi();
  const pr = await gitApi.getPullRequestById(id, project);
  const userId = pr.createdBy?.id;
  if (!userId) {
    throw new Error("Could not determine user id from PR createdBy.");
  }

  const policyApi = await config.connection.getPolicyApi();
  const ignoredPolicyIds = selectOptionalWorkItemPolicyIds(
    await policyApi.getPolicyConfigurations(project),
    pr.repository?.id,
    pr.targetRefName,
  );

  await gitApi.updatePullRequest(
    {
      autoCompleteSetBy: { id: userId },
      completionOptions: {
        deleteSourceBranch: true,
        autoCompleteIgnoreConfigIds: ignoredPolicyIds,
      },
    } as GitPullRequest,
    repo,
    id,
    project,
  );

  if (ignoredPolicyIds.length > 0) {
    console.log(
      `Enabled auto-complete for PR #${id} (optional linked work item policies ignored: ${ignoredPolicyIds.join(", ")})`,
    );
  } else {
    console.log(`Enabled auto-complete for PR #${id}`);
  }
}

const PR_COMPLETE_USAGE =
  "Usage: pr-complete <id> [repo] [--strategy=squash|noFastForward|rebase|rebaseMerge] [--keep-source] [--message=...]";

export async function cmdPrComplete(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["strategy", "keep-source", "message"], PR_COMPLETE_USAGE);
  const [idRaw, repoArg] = parsed.positionals;
  const id = parseId(idRaw, PR_COMPLETE_USAGE, "pull request ID");

  let mergeStrategy: GitPullRequestMergeStrategy;
  try {
    mergeStrategy = parseMergeStrategy(optionString(parsed.options.strategy));
  } catch (error) {
    throw new UsageError(describeError(error), PR_COMPLETE_USAGE);
  }

  const project = requireProject(config);
  const gitApi = await config.connection.getGitApi();
  const pr = await gitApi.getPullRequestById(id, project);
  if (pr.status !== PullRequestStatus.Active) {
    throw new Error(`PR #${id} is ${prStatusName(pr.status)}; only active pull requests can be completed.`);
  }
  if (!pr.lastMergeSourceCommit?.commitId) {
    throw new Error(`PR #${id} has no merge source commit yet; try again once the merge has been evaluated.`);
  }

  const completed = await gitApi.updatePullRequest(
    {
      status: PullRequestStatus.Completed,
      lastMergeSourceCommit: pr.lastMergeSourceCommit,
      completionOptions: {
        mergeStrategy,
        deleteSourceBranch: !optionFlag(parsed.options["keep-source"]),
        transitionWorkItems: true,
        mergeCommitMessage: optionString(parsed.options.message),
      },
    },
    requireRepo(config, repoArg ?? pr.repository?.name),
    id,
    project,
  );
  console.log(`Completed PR #${id} (${prStatusName(completed.status)}): ${completed.title ?? pr.title}`);
}

export async function cmdPrAbandon(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], "Usage: pr-abandon <id> [repo]", "pull request ID");
  const project = requireProject(config);
  const gitApi = await config.connection.getGitApi();
  const updated = await gitApi.updatePullRequest(
    { status: PullRequestStatus.Abandoned },
    requireRepo(config, args[1]),
    id,
    project,
  );
  console.log(`Abandoned PR #${id}: ${updated.title}`);
}

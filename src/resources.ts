import { adoRequest, encodePathSegment } from "./api.js";
import { matchesAnyWildcard } from "./wildcard.js";
import type {
  AdoConnectionInfo,
  AdoListResponse,
  AdoProject,
  AdoProjectRef,
  AdoRepository,
  AdoRepositoryRef,
  AdoVariableGroup,
} from "./types.js";

const PROJECTS_PAGE_SIZE = 500;

export interface ListProjectsOptions {
  patterns?: readonly string[];
  signal?: AbortSignal;
}

export function toProjectRefs(projects: readonly AdoProject[], patterns: readonly string[] = []): AdoProjectRef[] {
  const refs: AdoProjectRef[] = [];
  for (const project of projects) {
    const name = project.name?.trim();
    if (!project.id || !name || project.state !== "wellFormed") continue;
    if (!matchesAnyWildcard(name, patterns)) continue;
    refs.push({ id: project.id, name });
  }
  return refs;
}

export async function listProjects(
  connection: AdoConnectionInfo,
  { patterns = [], signal }: ListProjectsOptions = {},
): Promise<AdoProjectRef[]> {
  const response = await adoRequest<AdoListResponse<AdoProject>>(connection, "/_apis/projects", {
    query: { $top: PROJECTS_PAGE_SIZE },
    signal,
  });
  return toProjectRefs(response?.value ?? [], patterns);
}

export async function listRepositories(
  connection: AdoConnectionInfo,
  project: AdoProjectRef,
  signal?: AbortSignal,
): Promise<AdoRepositoryRef[]> {
  const response = await adoRequest<AdoListResponse<AdoRepository>>(
    connection,
    `/${encodePathSegment(project.name)}/_apis/git/repositories`,
    { signal },
  );

  const refs: AdoRepositoryRef[] = [];
  for (const repo of response?.value ?? []) {
    if (!repo.id || !repo.name || repo.isDisabled) continue;
    refs.push({ id: repo.id, name: repo.name, parentId: project.id });
  }
  return refs;
}

export async function listVariableGroups(
  connection: AdoConnectionInfo,
  project: AdoProjectRef,
  signal?: AbortSignal,
): Promise<AdoVariableGroup[]> {
  const response = await adoRequest<AdoListResponse<AdoVariableGroup>>(
    connection,
    `/${encodePathSegment(project.name)}/_apis/distributedtask/variablegroups`,
    { signal },
  );
  return response?.value ?? [];
}

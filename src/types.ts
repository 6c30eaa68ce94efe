import type { WebApi } from "azure-devops-node-api";

export interface AdoConnectionInfo {
  pat: string;
  collectionUrl: string;
}

export interface AdoConfig extends AdoConnectionInfo {
  organization: string;
  project?: string;
  repo?: string;
  connection: WebApi;
}

export interface FileConfig {
  pat?: string;
  organization?: string;
  collectionUrl?: string;
  project?: string;
  repo?: string;
  throttleLimit?: number;
  timeoutMinutes?: number;
}

export interface ConfigOverrides {
  pat?: string;
  organization?: string;
  collectionUrl?: string;
  project?: string;
  repo?: string;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface AdoRequestOptions {
  method?: HttpMethod;
  body?: unknown;
  contentType?: string;
  apiVersion?: string;
  query?: Record<string, string | number | boolean | undefined>;
  retries?: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
}

export interface AdoListResponse<T> {
  count?: number;
  value?: T[];
}

export interface AdoIdentityRef {
  displayName?: string;
  uniqueName?: string;
  id?: string;
}

export interface AdoProject {
  id?: string;
  name?: string | null;
  state?: string;
}

export interface AdoRepository {
  id?: string;
  name?: string;
  isDisabled?: boolean;
  project?: { id?: string; name?: string };
}

export interface AdoReviewer extends AdoIdentityRef {
  vote?: number;
  isRequired?: boolean;
}

export interface AdoPullRequest {
  pullRequestId?: number;
  title?: string;
  description?: string;
  status?: string;
  createdBy?: AdoIdentityRef;
  creationDate?: string;
  sourceRefName?: string;
  targetRefName?: string;
  isDraft?: boolean;
  mergeStatus?: string;
  reviewers?: AdoReviewer[];
  repository?: AdoRepository;
  url?: string;
}

export interface AdoVariableValue {
  value?: string | null;
  isSecret?: boolean;
  isReadOnly?: boolean;
}

export interface AdoVariableGroup {
  id?: number;
  name?: string;
  description?: string;
  type?: string;
  modifiedBy?: AdoIdentityRef;
  modifiedOn?: string;
  variables?: Record<string, AdoVariableValue>;
}

/** Parent of the inventory fan-out. */
export interface AdoProjectRef {
  id: string;
  name: string;
}

/** Child of the inventory fan-out; `parentId` is the owning project id. */
export interface AdoRepositoryRef {
  id: string;
  name: string;
  parentId: string;
}

export type RecordValue = string | number | boolean | null | string[];

export type FlatRecord = Record<string, RecordValue>;

export interface PullRequestRecord extends FlatRecord {
  organization: string;
  project: string;
  repository: string;
  pullRequestId: number;
  title: string;
  status: string;
  createdBy: string;
  creationDate: string;
  sourceBranch: string;
  targetBranch: string;
  isDraft: boolean;
  mergeStatus: string;
  url: string;
}

export interface VariableGroupRecord extends FlatRecord {
  organization: string;
  project: string;
  variableGroupId: number;
  variableGroupName: string;
  variableName: string;
  value: string | null;
  isSecret: boolean;
}

export interface TaskResult<TResource, TRecord> {
  resource: TResource;
  records: TRecord[];
  error?: string;
  permissionDenied?: boolean;
}

export interface RunSummary {
  totalChildResources: number;
  succeeded: number;
  failed: number;
  totalRecords: number;
}

export interface TaskFailure<TResource> {
  resource: TResource;
  error: string;
}

export interface ParsedOptions {
  options: Record<string, string | boolean>;
  multi: Record<string, string[]>;
  positionals: string[];
}

export interface WorkItemFilters {
  tag?: string;
  type?: string;
  state?: string;
  assignedTo?: string;
}

export interface ParsedWorkItemsRecentArgs {
  top: number;
  filters: WorkItemFilters;
}

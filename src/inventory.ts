import { aggregate } from "./aggregate.js";
import { DEFAULT_THROTTLE_LIMIT, DEFAULT_TIMEOUT_MINUTES } from "./config.js";
import { dispatch } from "./dispatcher.js";
import { describeError, isPermissionDenied } from "./errors.js";
import { exportRecords } from "./export.js";
import { silentReporter, type Reporter } from "./progress.js";
import { listProjects } from "./resources.js";
import type {
  AdoConnectionInfo,
  AdoProjectRef,
  FlatRecord,
  RunSummary,
  TaskFailure,
  TaskResult,
} from "./types.js";

export type RunPhase =
  | "idle"
  | "enumerating-projects"
  | "enumerating-children"
  | "dispatching"
  | "aggregating"
  | "exporting"
  | "done"
  | "failed";

export class InventoryError extends Error {
  readonly phase: RunPhase;

  constructor(phase: RunPhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InventoryError";
    this.phase = phase;
  }
}

export interface InventoryDefinition<TChild, TRecord extends FlatRecord> {
  /** Plural noun for log lines, e.g. "repositories". */
  childLabel: string;
  listChildren(project: AdoProjectRef, signal?: AbortSignal): Promise<TChild[]>;
  describe(child: TChild): string;
  collect(child: TChild, signal: AbortSignal): Promise<TRecord[]>;
}

export interface InventoryOptions {
  projectPatterns?: readonly string[];
  throttleLimit?: number;
  timeoutMinutes?: number;
  /** Overrides `timeoutMinutes` with a precise budget. */
  timeoutMs?: number;
  outputPath?: string;
  reporter?: Reporter;
  signal?: AbortSignal;
  onPhase?: (phase: RunPhase) => void;
}

export interface InventoryResult<TChild, TRecord> {
  phase: "done";
  projects: AdoProjectRef[];
  records: TRecord[];
  summary: RunSummary;
  /** Failed children, plus projects whose children could not be listed. */
  failures: TaskFailure<TChild | AdoProjectRef>[];
  exportedTo?: string;
  exportError?: string;
}

export async function runInventory<TChild, TRecord extends FlatRecord>(
  connection: AdoConnectionInfo,
  definition: InventoryDefinition<TChild, TRecord>,
  {
    projectPatterns = [],
    throttleLimit = DEFAULT_THROTTLE_LIMIT,
    timeoutMinutes = DEFAULT_TIMEOUT_MINUTES,
    timeoutMs = timeoutMinutes * 60_000,
    outputPath,
    reporter = silentReporter,
    signal,
    onPhase,
  }: InventoryOptions = {},
): Promise<InventoryResult<TChild, TRecord>> {
  const enter = (next: RunPhase): void => {
    onPhase?.(next);
  };

  enter("enumerating-projects");
  let projects: AdoProjectRef[];
  try {
    projects = await listProjects(connection, { patterns: projectPatterns, signal });
  } catch (error) {
    enter("failed");
    throw new InventoryError(
      "enumerating-projects",
      `Failed to list projects in ${connection.collectionUrl}: ${describeError(error)}`,
      { cause: error },
    );
  }
  reporter.info(`Found ${projects.length} matching project(s).`);

  enter("enumerating-children");
  const children: TChild[] = [];
  const unlisted: TaskResult<AdoProjectRef, TRecord>[] = [];
  let lastListingError: unknown;
  for (const project of projects) {
    try {
      children.push(...(await definition.listChildren(project, signal)));
    } catch (error) {
      lastListingError = error;
      const failure: TaskResult<AdoProjectRef, TRecord> = {
        resource: project,
        records: [],
        error: `Failed to list ${definition.childLabel}: ${describeError(error)}`,
        permissionDenied: isPermissionDenied(error),
      };
      unlisted.push(failure);
      if (failure.permissionDenied) {
        reporter.skip(`${project.name}: ${failure.error}`);
      } else {
        reporter.warn(`${project.name}: ${failure.error}`);
      }
    }
  }
  if (projects.length > 0 && unlisted.length === projects.length) {
    enter("failed");
    throw new InventoryError(
      "enumerating-children",
      `Failed to list ${definition.childLabel} for every matching project: ${describeError(lastListingError)}`,
      { cause: lastListingError },
    );
  }
  reporter.info(`Scanning ${children.length} ${definition.childLabel}.`);

  enter("dispatching");
  const results = await dispatch(children, (child, taskSignal) => definition.collect(child, taskSignal), {
    throttle: throttleLimit,
    timeoutMs,
    signal,
    onResult: (result, processed, total) => {
      const label = definition.describe(result.resource);
      if (result.error === undefined) {
        reporter.progress(processed, total, `${label}: ${result.records.length} record(s)`);
      } else if (result.permissionDenied) {
        reporter.progress(processed, total, `${label}: skipped`);
        reporter.skip(`${label}: ${result.error}`);
      } else {
        reporter.progress(processed, total, `${label}: failed`);
        reporter.warn(`${label}: ${result.error}`);
      }
    },
  });

  enter("aggregating");
  const { records, summary, failures } = aggregate<TChild | AdoProjectRef, TRecord>([...unlisted, ...results]);

  const result: InventoryResult<TChild, TRecord> = {
    phase: "done",
    projects,
    records,
    summary,
    failures,
  };

  if (outputPath) {
    enter("exporting");
    try {
      await exportRecords(records, outputPath);
      result.exportedTo = outputPath;
      reporter.info(`Exported ${records.length} record(s) to ${outputPath}`);
    } catch (error) {
      result.exportError = describeError(error);
      reporter.warn(`Could not export to ${outputPath}: ${result.exportError}`);
    }
  }

  enter("done");
  reporter.summary(summary);
  return result;
}

/** Non-zero only when there was something to scan and every task failed. */
export function exitCodeFor(result: { summary: RunSummary }): number {
  const { totalChildResources, succeeded } = result.summary;
  return totalChildResources > 0 && succeeded === 0 ? 1 : 0;
}

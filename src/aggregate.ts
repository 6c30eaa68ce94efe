import type { RunSummary, TaskFailure, TaskResult } from "./types.js";

export interface Aggregated<TResource, TRecord> {
  records: TRecord[];
  summary: RunSummary;
  failures: TaskFailure<TResource>[];
}

export function aggregate<TResource, TRecord>(
  results: readonly TaskResult<TResource, TRecord>[],
): Aggregated<TResource, TRecord> {
  const records: TRecord[] = [];
  const failures: TaskFailure<TResource>[] = [];

  for (const result of results) {
    if (result.error !== undefined) {
      failures.push({ resource: result.resource, error: result.error });
      continue;
    }
    records.push(...result.records);
  }

  return {
    records,
    failures,
    summary: {
      totalChildResources: results.length,
      succeeded: results.length - failures.length,
      failed: failures.length,
      totalRecords: records.length,
    },
  };
}

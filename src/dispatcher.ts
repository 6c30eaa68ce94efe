import { describeError, isPermissionDenied } from "./errors.js";
import type { TaskResult } from "./types.js";

export type TaskWork<TResource, TRecord> = (
  resource: TResource,
  signal: AbortSignal,
) => Promise<TRecord[]>;

export interface DispatchOptions<TResource, TRecord> {
  /** Maximum number of resources worked on at once. */
  throttle: number;
  /** Wall-clock budget for the whole dispatch. */
  timeoutMs: number;
  /** Stops new resources from starting; in-flight work is left to finish. */
  signal?: AbortSignal;
  onResult?: (result: TaskResult<TResource, TRecord>, processed: number, total: number) => void;
}

/**
 * Runs `work` once per resource on a bounded pool of workers and returns one
 * result per resource, in completion order. Failures stay inside their result.
 *
 * When the deadline passes, every unfinished resource is settled as timed out and
 * the signal handed to `work` is aborted; whatever the abandoned work produces
 * afterwards is discarded.
 */
export async function dispatch<TResource, TRecord>(
  resources: readonly TResource[],
  work: TaskWork<TResource, TRecord>,
  { throttle, timeoutMs, signal, onResult }: DispatchOptions<TResource, TRecord>,
): Promise<TaskResult<TResource, TRecord>[]> {
  const total = resources.length;
  const results: TaskResult<TResource, TRecord>[] = [];
  if (total === 0) return results;

  const settled = new Set<number>();
  const deadline = new AbortController();
  let cursor = 0;

  const settle = (index: number, result: TaskResult<TResource, TRecord>): void => {
    if (settled.has(index)) return;
    settled.add(index);
    results.push(result);
    onResult?.(result, results.length, total);
  };

  const stopped = (): boolean => deadline.signal.aborted || signal?.aborted === true;

  const worker = async (): Promise<void> => {
    while (cursor < total && !stopped()) {
      const index = cursor;
      cursor += 1;
      const resource = resources[index];
      if (resource === undefined) continue;

      try {
        const records = await work(resource, deadline.signal);
        settle(index, { resource, records });
      } catch (error) {
        settle(index, {
          resource,
          records: [],
          error: describeError(error),
          permissionDenied: isPermissionDenied(error),
        });
      }
    }
  };

  const poolSize = Math.max(1, Math.min(Math.trunc(throttle), total));
  const pool = Promise.all(Array.from({ length: poolSize }, () => worker()));

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<"expired">((resolve) => {
    timer = setTimeout(() => resolve("expired"), timeoutMs);
  });

  try {
    const outcome = await Promise.race([pool.then(() => "finished" as const), expired]);
    if (outcome === "expired") {
      deadline.abort();
    }
  } finally {
    clearTimeout(timer);
  }

  resources.forEach((resource, index) => {
    if (settled.has(index)) return;
    const error = deadline.signal.aborted
      ? index < cursor
        ? `timed out after ${timeoutMs} ms`
        : `timed out after ${timeoutMs} ms (not started)`
      : "cancelled before start";
    settle(index, { resource, records: [], error });
  });

  return results;
}

import { setTimeout as delay } from "node:timers/promises";
import { AdoHttpError } from "./errors.js";
import type { AdoConnectionInfo, AdoRequestOptions } from "./types.js";

export const API_VERSION = "7.0";

const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 500;
const ERROR_PREVIEW_LENGTH = 350;

const authHeaders = new WeakMap<AdoConnectionInfo, string>();

export function encodePathSegment(value: string): string {
  return encodeURIComponent(value).replaceAll("%2F", "/");
}

export function buildAuthHeader(connection: AdoConnectionInfo): string {
  const cached = authHeaders.get(connection);
  if (cached) return cached;

  const header = `Basic ${Buffer.from(`:${connection.pat}`).toString("base64")}`;
  authHeaders.set(connection, header);
  return header;
}

export function buildRequestUrl(
  connection: AdoConnectionInfo,
  path: string,
  apiVersion: string = API_VERSION,
  query: AdoRequestOptions["query"] = {},
): string {
  const url = new URL(/^https?:\/\//i.test(path) ? path : `${connection.collectionUrl}${path}`);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  url.searchParams.set("api-version", apiVersion);
  return url.toString();
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function shouldRetry(error: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted || isAbort(error)) return false;
  if (error instanceof AdoHttpError) return error.isTransient();
  // fetch rejects with a TypeError on connection resets and DNS failures.
  return error instanceof TypeError;
}

export async function adoRequest<T = unknown>(
  connection: AdoConnectionInfo,
  path: string,
  {
    method = "GET",
    body,
    contentType = "application/json",
    apiVersion = API_VERSION,
    query,
    retries = DEFAULT_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    signal,
  }: AdoRequestOptions = {},
): Promise<T | null> {
  const url = buildRequestUrl(connection, path, apiVersion, query);
  const maxAttempts = method === "GET" ? Math.max(0, retries) + 1 : 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const res = await fetch(url, {
        method,
        headers: {
          Authorization: buildAuthHeader(connection),
          "Content-Type": contentType,
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal,
      });

      if (!res.ok) {
        const preview = (await res.text()).trim().slice(0, ERROR_PREVIEW_LENGTH);
        throw new AdoHttpError(res.status, method, url, preview);
      }

      const text = await res.text();
      return text ? (JSON.parse(text) as T) : null;
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, signal)) {
        throw error;
      }
      await delay(retryDelayMs * attempt, undefined, { signal });
    }
  }
}

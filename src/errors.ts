import type { HttpMethod } from "./types.js";

export class AdoHttpError extends Error {
  readonly status: number;
  readonly method: HttpMethod;
  readonly url: string;
  readonly body: string;

  constructor(status: number, method: HttpMethod, url: string, body: string) {
    super(`Azure DevOps API request failed (${status}). ${body}`.trim());
    this.name = "AdoHttpError";
    this.status = status;
    this.method = method;
    this.url = url;
    this.body = body;
  }

  isPermissionDenied(): boolean {
    return this.status === 401 || this.status === 403;
  }

  isTransient(): boolean {
    return this.status >= 500 || this.status === 429;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends Error {
  readonly usage: string;

  constructor(message: string, usage: string) {
    super(message);
    this.name = "UsageError";
    this.usage = usage;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPermissionDenied(error: unknown): boolean {
  return error instanceof AdoHttpError && error.isPermissionDenied();
}

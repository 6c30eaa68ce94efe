import { UsageError } from "./errors.js";
import type { ConfigOverrides, ParsedOptions } from "./types.js";

/** Options that may be given more than once and are collected in order. */
const REPEATABLE = new Set(["var", "secret"]);

export function parseOptionArgs(args: string[] = []): ParsedOptions {
  const options: Record<string, string | boolean> = {};
  const multi: Record<string, string[]> = {};
  const positionals: string[] = [];

  const assign = (key: string, value: string | boolean): void => {
    if (REPEATABLE.has(key) && typeof value === "string") {
      (multi[key] ??= []).push(value);
    }
    options[key] = value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    if (eqIndex >= 0) {
      assign(arg.slice(2, eqIndex), arg.slice(eqIndex + 1));
      continue;
    }

    const key = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      assign(key, next);
      i += 1;
    } else {
      assign(key, true);
    }
  }

  return { options, multi, positionals };
}

const GLOBAL_OPTIONS: Record<string, keyof ConfigOverrides> = {
  org: "organization",
  organization: "organization",
  "collection-url": "collectionUrl",
  project: "project",
  pat: "pat",
};

/** Pulls connection options out of the argument list so commands never see them. */
export function extractGlobalOptions(args: string[]): { overrides: ConfigOverrides; rest: string[] } {
  const overrides: ConfigOverrides = {};
  const rest: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    const match = /^--([a-z-]+)(?:=(.*))?$/s.exec(arg);
    const target = match?.[1] ? GLOBAL_OPTIONS[match[1]] : undefined;
    if (!match || !target) {
      rest.push(arg);
      continue;
    }

    let value = match[2];
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`--${match[1]} needs a value.`);
      }
      value = next;
      i += 1;
    }
    overrides[target] = value;
  }

  return { overrides, rest };
}

export function assertKnownOptions(parsed: ParsedOptions, allowed: readonly string[], usage: string): void {
  const allowedSet = new Set(allowed);
  for (const key of Object.keys(parsed.options)) {
    if (!allowedSet.has(key)) {
      throw new UsageError(`Unknown option: --${key}`, usage);
    }
  }
}

export function optionString(value: string | boolean | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function optionFlag(value: string | boolean | undefined): boolean {
  return value === true || value === "true" || value === "1";
}

export function toBoundedTop(
  value: string | boolean | undefined,
  defaultValue = 10,
  maxValue = 50,
): number {
  const numeric = Number(value);
  if (typeof value === "boolean" || !Number.isFinite(numeric) || numeric <= 0) return defaultValue;
  return Math.min(Math.trunc(numeric), maxValue);
}

export function parseId(raw: string | undefined, usage: string, label = "id"): number {
  const id = Number(raw);
  if (raw === undefined || !Number.isInteger(id) || id <= 0) {
    throw new UsageError(`A valid ${label} is required.`, usage);
  }
  return id;
}

/** Splits `key=value` on the first `=`; values may contain further `=`. */
export function parseKeyValue(raw: string): [string, string] {
  const eqIndex = raw.indexOf("=");
  const key = (eqIndex >= 0 ? raw.slice(0, eqIndex) : raw).trim();
  if (key.length === 0) {
    throw new Error(`Invalid variable "${raw}": expected key=value.`);
  }
  return [key, eqIndex >= 0 ? raw.slice(eqIndex + 1) : ""];
}

export function parseIdList(rawValue: string | boolean | null | undefined): number[] {
  if (typeof rawValue !== "string" || rawValue.length === 0) return [];

  const ids = rawValue
    .split(",")
    .map((part) => Number(part.trim()))
    .filter((id) => Number.isInteger(id) && id > 0);

  return [...new Set(ids)];
}

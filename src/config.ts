import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { WebApi, getPersonalAccessTokenHandler } from "azure-devops-node-api";
import { ConfigError } from "./errors.js";
import type { AdoConfig, ConfigOverrides, FileConfig } from "./types.js";

export const LOCAL_CONFIG_FILENAME = "ado.json";

export const DEFAULT_THROTTLE_LIMIT = 10;
export const MAX_THROTTLE_LIMIT = 20;
export const DEFAULT_TIMEOUT_MINUTES = 10;
export const MAX_TIMEOUT_MINUTES = 60;

const PAT_ENV_VARS = ["ADO_PAT", "PAT", "DEVOPS_PAT"] as const;

function isDefaultPlaceholder(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0 || value.includes("<your-");
}

function firstPresent(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => !isDefaultPlaceholder(value))?.trim();
}

export function getConfigDir(): string {
  const xdgConfig = process.env.XDG_CONFIG_HOME;
  const base = xdgConfig && xdgConfig.length > 0 ? xdgConfig : join(homedir(), ".config");
  return join(base, "ado");
}

export function getConfigFilePath(): string {
  return join(getConfigDir(), "config.json");
}

function readConfigFile(path: string, label: string): FileConfig {
  if (!existsSync(path)) {
    return {};
  }

  const content = readFileSync(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    console.warn(`Warning: could not parse ${label} at ${path}. Ignoring.`);
    return {};
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    console.warn(`Warning: ${label} at ${path} is not a JSON object. Ignoring.`);
    return {};
  }
  return toFileConfig(new Map<string, unknown>(Object.entries(parsed)));
}

function toFileConfig(fields: Map<string, unknown>): FileConfig {
  const text = (key: string): string | undefined => {
    const value = fields.get(key);
    return typeof value === "string" ? value : undefined;
  };
  const numeric = (key: string): number | undefined => {
    const value = fields.get(key);
    return typeof value === "number" ? value : undefined;
  };

  return {
    pat: text("pat"),
    organization: text("organization"),
    collectionUrl: text("collectionUrl"),
    project: text("project"),
    repo: text("repo"),
    throttleLimit: numeric("throttleLimit"),
    timeoutMinutes: numeric("timeoutMinutes"),
  };
}

export function loadFileConfig(): FileConfig {
  return readConfigFile(getConfigFilePath(), "config file");
}

export function getLocalConfigFilePath(): string {
  return join(process.cwd(), LOCAL_CONFIG_FILENAME);
}

export function loadLocalConfig(): FileConfig {
  return readConfigFile(getLocalConfigFilePath(), "local config file");
}

export function censorPat(pat: string): string {
  if (pat.length <= 8) {
    return "****";
  }
  return `${pat.slice(0, 4)}${"*".repeat(pat.length - 8)}${pat.slice(-4)}`;
}

export function resolvePat(
  env: NodeJS.ProcessEnv,
  ...fallbacks: (string | undefined)[]
): string | undefined {
  return firstPresent(...PAT_ENV_VARS.map((name) => env[name]), ...fallbacks);
}

export function organizationFromCollectionUrl(collectionUrl: string): string {
  const url = new URL(collectionUrl);
  if (url.hostname.endsWith(".visualstudio.com")) {
    return url.hostname.split(".")[0] ?? url.hostname;
  }
  const [first] = url.pathname.split("/").filter((segment) => segment.length > 0);
  return first ?? url.hostname;
}

export function buildCollectionUrl(organization: string): string {
  return `https://dev.azure.com/${encodeURIComponent(organization)}`;
}

export function getConfig(overrides: ConfigOverrides = {}): AdoConfig {
  const fileConfig = loadFileConfig();
  const localConfig = loadLocalConfig();
  const env = process.env;

  const pat = firstPresent(overrides.pat) ?? resolvePat(env, localConfig.pat, fileConfig.pat);
  if (!pat) {
    throw new ConfigError(
      `Missing PAT. Set ADO_PAT (or PAT / DEVOPS_PAT), pass --pat, or run "ado init" to create ${getConfigFilePath()}.`,
    );
  }

  const organization = firstPresent(
    overrides.organization,
    env.ADO_ORGANIZATION,
    localConfig.organization,
    fileConfig.organization,
  );
  // An explicit organization wins over a configured collection URL.
  const configuredUrl = firstPresent(
    overrides.collectionUrl,
    overrides.organization ? undefined : env.ADO_COLLECTION_URL,
    overrides.organization ? undefined : localConfig.collectionUrl,
    overrides.organization ? undefined : fileConfig.collectionUrl,
  );

  let collectionUrl: string;
  if (configuredUrl) {
    collectionUrl = configuredUrl.replace(/\/+$/, "");
  } else if (organization) {
    collectionUrl = buildCollectionUrl(organization);
  } else {
    throw new ConfigError(
      "Azure DevOps organization is not configured. Set ADO_ORGANIZATION or ADO_COLLECTION_URL, or pass --org.",
    );
  }

  const project = firstPresent(overrides.project, env.ADO_PROJECT, localConfig.project, fileConfig.project);
  const repo = firstPresent(overrides.repo, env.ADO_REPO, localConfig.repo, fileConfig.repo);

  const authHandler = getPersonalAccessTokenHandler(pat);
  const connection = new WebApi(collectionUrl, authHandler);

  return {
    pat,
    organization: organization ?? organizationFromCollectionUrl(collectionUrl),
    collectionUrl,
    project,
    repo,
    connection,
  };
}

export function requireProject(config: AdoConfig): string {
  if (!config.project) {
    throw new ConfigError("No project configured. Set ADO_PROJECT, add it to ado.json, or pass --project.");
  }
  return config.project;
}

export function requireRepo(config: AdoConfig, value?: string): string {
  const repo = value || config.repo;
  if (!repo) {
    throw new ConfigError("No repository given. Pass one, set ADO_REPO, or add it to ado.json.");
  }
  return repo;
}

function parseBoundedInteger(
  raw: string | number | boolean | undefined,
  name: string,
  min: number,
  max: number,
  fallback: number,
): number {
  if (raw === undefined) return fallback;
  const value = typeof raw === "number" ? raw : Number(raw);
  if (typeof raw === "boolean" || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (got ${String(raw)}).`);
  }
  return value;
}

/** Inventory tuning from ado.json, then the global config file. */
function configuredTuning(key: "throttleLimit" | "timeoutMinutes"): number | undefined {
  return loadLocalConfig()[key] ?? loadFileConfig()[key];
}

export function parseThrottleLimit(raw: string | number | boolean | undefined): number {
  return parseBoundedInteger(
    raw ?? configuredTuning("throttleLimit"),
    "Throttle limit",
    1,
    MAX_THROTTLE_LIMIT,
    DEFAULT_THROTTLE_LIMIT,
  );
}

export function parseTimeoutMinutes(raw: string | number | boolean | undefined): number {
  return parseBoundedInteger(
    raw ?? configuredTuning("timeoutMinutes"),
    "Timeout",
    1,
    MAX_TIMEOUT_MINUTES,
    DEFAULT_TIMEOUT_MINUTES,
  );
}

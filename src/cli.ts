#!/usr/bin/env node
import { assertKnownOptions, extractGlobalOptions, optionFlag, optionString, parseOptionArgs } from "./args.js";
import {
  getConfig,
  getConfigDir,
  getConfigFilePath,
  loadFileConfig,
  parseThrottleLimit,
  parseTimeoutMinutes,
} from "./config.js";
import { UsageError, describeError } from "./errors.js";
import { exitCodeFor, type InventoryResult } from "./inventory.js";
import { createConsoleReporter } from "./progress.js";
import { cmdBuilds, cmdPipelineRun, cmdPipelines } from "./pipelines.js";
import { isPullRequestStatus, runPullRequestInventory } from "./pull-request-inventory.js";
import {
  cmdPrAbandon,
  cmdPrApprove,
  cmdPrAutocomplete,
  cmdPrComplete,
  cmdPrCreate,
  cmdPrGet,
  cmdPrs,
  cmdPrUpdate,
} from "./pull-requests.js";
import { cmdBranches, cmdRepos } from "./repositories.js";
import type { AdoConfig, FileConfig, FlatRecord } from "./types.js";
import { runVariableGroupInventory } from "./variable-group-inventory.js";
import {
  cmdVariableGroupCreate,
  cmdVariableGroupGet,
  cmdVariableGroupRemoveVariable,
  cmdVariableGroupSet,
  cmdVariableGroups,
} from "./variable-groups.js";
import { parsePatternList } from "./wildcard.js";
import {
  cmdWorkItemCommentAdd,
  cmdWorkItemCreate,
  cmdWorkItemGet,
  cmdWorkItemUpdate,
  cmdWorkItemsRecent,
} from "./work-items.js";

type Command = (config: AdoConfig, args: string[]) => Promise<void>;

const INVENTORY_OPTIONS = ["projects", "throttle", "timeout", "output", "details", "quiet"];

const PR_INVENTORY_USAGE =
  "Usage: pr-inventory [--projects=a,b*] [--status=active|completed|abandoned|all] [--throttle=1-20] [--timeout=<minutes>] [--output=file.csv|.json|.xml] [--details] [--quiet]";

const VG_INVENTORY_USAGE =
  "Usage: variable-group-inventory [--projects=a,b*] [--group-filter=pattern] [--throttle=1-20] [--timeout=<minutes>] [--output=file.csv|.json|.xml] [--details] [--quiet]";

async function runInventoryCommand<TChild, TRecord extends FlatRecord>(
  run: (signal: AbortSignal, quiet: boolean) => Promise<InventoryResult<TChild, TRecord>>,
  options: Record<string, string | boolean>,
): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error("Interrupted: finishing in-flight requests, no new ones will start.");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const result = await run(controller.signal, optionFlag(options.quiet));
    if (!result.exportedTo) {
      console.log(JSON.stringify(result.records, null, 2));
    }
    for (const failure of result.failures) {
      console.error(`Failed: ${failure.error}`);
    }
    process.exitCode = exitCodeFor(result);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

const cmdPrInventory: Command = async (config, args) => {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, [...INVENTORY_OPTIONS, "status"], PR_INVENTORY_USAGE);
  const { options } = parsed;

  const status = optionString(options.status)?.toLowerCase() ?? "active";
  if (!isPullRequestStatus(status)) {
    throw new UsageError(`Unknown status: ${status}`, PR_INVENTORY_USAGE);
  }
  const throttleLimit = parseThrottleLimit(options.throttle);
  const timeoutMinutes = parseTimeoutMinutes(options.timeout);

  await runInventoryCommand(
    (signal, quiet) =>
      runPullRequestInventory(config, config.organization, {
        projectPatterns: parsePatternList(options.projects),
        status,
        includeDetails: optionFlag(options.details),
        throttleLimit,
        timeoutMinutes,
        outputPath: optionString(options.output),
        reporter: createConsoleReporter({ quiet }),
        signal,
      }),
    options,
  );
};

const cmdVariableGroupInventory: Command = async (config, args) => {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, [...INVENTORY_OPTIONS, "group-filter"], VG_INVENTORY_USAGE);
  const { options } = parsed;
  const throttleLimit = parseThrottleLimit(options.throttle);
  const timeoutMinutes = parseTimeoutMinutes(options.timeout);

  await runInventoryCommand(
    (signal, quiet) =>
      runVariableGroupInventory(config, config.organization, {
        projectPatterns: parsePatternList(options.projects),
        groupPatterns: parsePatternList(options["group-filter"]),
        includeDetails: optionFlag(options.details),
        throttleLimit,
        timeoutMinutes,
        outputPath: optionString(options.output),
        reporter: createConsoleReporter({ quiet }),
        signal,
      }),
    options,
  );
};

const cmdSmoke: Command = async (config) => {
  const coreApi = await config.connection.getCoreApi();
  const projects = await coreApi.getProjects(undefined, 5);

  console.log("Azure DevOps connectivity check");
  console.log("--------------------------------");
  console.log(`Organization: ${config.organization} (${config.collectionUrl})`);
  console.log(`Project: ${config.project ?? "(not configured)"}`);
  console.log(`Visible projects: ${projects.map((project) => project.name).join(", ") || "none"}`);
};

const COMMANDS: Record<string, Command> = {
  smoke: cmdSmoke,
  repos: cmdRepos,
  branches: cmdBranches,
  prs: cmdPrs,
  "pr-get": cmdPrGet,
  "pr-create": cmdPrCreate,
  "pr-update": cmdPrUpdate,
  "pr-approve": cmdPrApprove,
  "pr-autocomplete": cmdPrAutocomplete,
  "pr-complete": cmdPrComplete,
  "pr-abandon": cmdPrAbandon,
  "workitem-create": cmdWorkItemCreate,
  "workitem-get": cmdWorkItemGet,
  "workitem-update": cmdWorkItemUpdate,
  "workitems-recent": cmdWorkItemsRecent,
  "workitem-comment-add": cmdWorkItemCommentAdd,
  pipelines: cmdPipelines,
  "pipeline-run": cmdPipelineRun,
  builds: cmdBuilds,
  "variable-groups": cmdVariableGroups,
  "variable-group-get": cmdVariableGroupGet,
  "variable-group-create": cmdVariableGroupCreate,
  "variable-group-set": cmdVariableGroupSet,
  "variable-group-remove-var": cmdVariableGroupRemoveVariable,
  "pr-inventory": cmdPrInventory,
  "variable-group-inventory": cmdVariableGroupInventory,
};

async function cmdInit(): Promise<void> {
  const { createInterface } = await import("node:readline/promises");
  const { mkdirSync, writeFileSync, existsSync } = await import("node:fs");

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  const existing = loadFileConfig();
  const configPath = getConfigFilePath();

  console.log("Azure DevOps toolkit configuration");
  console.log(`Config file: ${configPath}`);
  console.log("Press Enter to keep existing values shown in brackets.\n");

  const ask = async (label: string, current: string | undefined, masked = false): Promise<string> => {
    const hint = current ? ` [${masked ? "****" : current}]` : "";
    return (await rl.question(`${label}${hint}: `)).trim() || current || "";
  };

  const pat = await ask("Personal Access Token (PAT)", existing.pat, true);
  const organization = await ask("Organization", existing.organization);
  const project = await ask("Default project (optional)", existing.project);
  const repo = await ask("Default repository (optional)", existing.repo);

  rl.close();

  if (!pat || !organization) {
    throw new Error("PAT and organization are required.");
  }

  const config: FileConfig = {
    ...existing,
    pat,
    organization,
    project: project || undefined,
    repo: repo || undefined,
  };

  const configDir = getConfigDir();
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", { encoding: "utf8", mode: 0o600 });
  console.log(`\nConfiguration saved to ${configPath}`);
}

function printHelp(): void {
  console.log(
    `Azure DevOps toolkit

Global options: --org=<organization> --collection-url=<url> --project=<project> --pat=<token>

Commands:
  init
  smoke
  repos [--filter=<pattern>]
  branches [repo] [--filter=<pattern>]
  prs [status] [top] [repo]
  pr-get <id>
  pr-create --title=... --source=... --target=... [--description=...] [--repo=...] [--work-items=123,456] [--reviewers=<id>,<id>] [--draft]
  pr-update <id> [--title=...] [--description=...] [--repo=...] [--work-items=123,456] [--publish]
  pr-approve <id> [repo] [--vote=approve|approve-with-suggestions|none|wait|reject] [--reviewer=<id>]
  pr-autocomplete <id> [repo]
  pr-complete <id> [repo] [--strategy=squash|noFastForward|rebase|rebaseMerge] [--keep-source] [--message=...]
  pr-abandon <id> [repo]
  workitem-create <Bug|Task|"User Story"|Spike> --title=... [--description=...] [--assigned-to=...] [--area=...] [--iteration=...] [--tags=a;b] [--priority=n] [--story-points=n] [--parent=<id>]
  workitem-get <id> [--raw] [--expand=all|fields|links|relations]
  workitem-update <id> [--state=...] [--title=...] [--assigned-to=...] [--comment=...]
  workitems-recent [top] [--tag=<tag>] [--type=<type>] [--state=<state>] [--assigned-to=<user>|@me]
  workitem-comment-add <id> --text="..." [--file=path]
  pipelines [top]
  pipeline-run <id> [--branch=<branch>] [--var key=value ...]
  builds [top] [--definition=<id>] [--branch=<branch>]
  variable-groups [--filter=<pattern>]
  variable-group-get <id>
  variable-group-create --name=<name> [--description=...] [--var key=value ...] [--secret key=value ...]
  variable-group-set <id> --name=<variable> --value=<value> [--secret]
  variable-group-remove-var <id> --name=<variable>
  pr-inventory [--projects=a,b*] [--status=...] [--throttle=1-20] [--timeout=<minutes>] [--output=<file>] [--details] [--quiet]
  variable-group-inventory [--projects=a,b*] [--group-filter=<pattern>] [--throttle=1-20] [--timeout=<minutes>] [--output=<file>] [--details] [--quiet]
`,
  );
}

async function main(): Promise<void> {
  const [command = "smoke", ...rawArgs] = process.argv.slice(2);

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "init") {
    await cmdInit();
    return;
  }

  const handler = COMMANDS[command];
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    process.exit(1);
  }

  const { overrides, rest } = extractGlobalOptions(rawArgs);
  await handler(getConfig(overrides), rest);
}

try {
  await main();
} catch (e) {
  console.error(describeError(e));
  if (e instanceof UsageError) {
    console.error(e.usage);
  }
  process.exit(1);
}

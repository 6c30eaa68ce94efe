import { BuildQueryOrder, BuildResult, BuildStatus } from "azure-devops-node-api/interfaces/BuildInterfaces.js";
import type { RunPipelineParameters, Variable } from "azure-devops-node-api/interfaces/PipelinesInterfaces.js";
import { assertKnownOptions, optionString, parseId, parseKeyValue, parseOptionArgs, toBoundedTop } from "./args.js";
import { requireProject } from "./config.js";
import { UsageError, describeError } from "./errors.js";
import { normalizeRefName } from "./pull-requests.js";
import type { AdoConfig } from "./types.js";

export function buildStatusName(status: BuildStatus | undefined, result: BuildResult | undefined): string {
  const statusName = BuildStatus[status ?? BuildStatus.None] ?? "unknown";
  const resultName = result === undefined || result === BuildResult.None ? "n/a" : (BuildResult[result] ?? "unknown");
  return `${statusName}/${resultName}`;
}

export function buildRunParameters(branch: string | undefined, variables: readonly string[]): RunPipelineParameters {
  const parameters: RunPipelineParameters = {};
  if (branch) {
    parameters.resources = { repositories: { self: { refName: normalizeRefName(branch) } } };
  }
  if (variables.length > 0) {
    const entries: Record<string, Variable> = {};
    for (const raw of variables) {
      const [key, value] = parseKeyValue(raw);
      entries[key] = { value, isSecret: false };
    }
    parameters.variables = entries;
  }
  return parameters;
}

export async function cmdPipelines(config: AdoConfig, args: string[]): Promise<void> {
  const pipelinesApi = await config.connection.getPipelinesApi();
  const pipelines = await pipelinesApi.listPipelines(requireProject(config), "name asc", toBoundedTop(args[0], 50, 500));
  for (const pipeline of pipelines) {
    const folder = pipeline.folder && pipeline.folder !== "\\" ? `${pipeline.folder}\\` : "";
    console.log(`${pipeline.id}\t${folder}${pipeline.name}`);
  }
}

const RUN_USAGE = "Usage: pipeline-run <id> [--branch=<branch>] [--var key=value ...]";

export async function cmdPipelineRun(config: AdoConfig, args: string[]): Promise<void> {
  const pipelineId = parseId(args[0], RUN_USAGE, "pipeline ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["branch", "var"], RUN_USAGE);

  let parameters: RunPipelineParameters;
  try {
    parameters = buildRunParameters(optionString(parsed.options.branch), parsed.multi.var ?? []);
  } catch (error) {
    throw new UsageError(describeError(error), RUN_USAGE);
  }

  const pipelinesApi = await config.connection.getPipelinesApi();
  const run = await pipelinesApi.runPipeline(parameters, requireProject(config), pipelineId);
  console.log(`Queued run #${run.id} (${run.name ?? "unnamed"}) of pipeline ${pipelineId}`);
}

const BUILDS_USAGE = "Usage: builds [top] [--definition=<id>] [--branch=<branch>]";

export async function cmdBuilds(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["definition", "branch"], BUILDS_USAGE);

  const definitionRaw = optionString(parsed.options.definition);
  const definitions = definitionRaw ? [parseId(definitionRaw, BUILDS_USAGE, "definition ID")] : undefined;
  const branch = optionString(parsed.options.branch);

  const buildApi = await config.connection.getBuildApi();
  const builds = await buildApi.getBuilds(
    requireProject(config),
    definitions,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    toBoundedTop(parsed.positionals[0]),
    undefined,
    undefined,
    undefined,
    BuildQueryOrder.QueueTimeDescending,
    branch ? normalizeRefName(branch) : undefined,
  );

  for (const b of builds) {
    console.log(
      `#${b.id}\t${buildStatusName(b.status, b.result)}\t${b.definition?.name ?? "unknown"}\t${b.sourceBranch ?? ""}`,
    );
  }
}

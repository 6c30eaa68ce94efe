import type {
  VariableGroup,
  VariableGroupParameters,
  VariableValue,
} from "azure-devops-node-api/interfaces/TaskAgentInterfaces.js";
import { assertKnownOptions, optionFlag, optionString, parseId, parseKeyValue, parseOptionArgs } from "./args.js";
import { requireProject } from "./config.js";
import { UsageError, describeError } from "./errors.js";
import type { AdoConfig } from "./types.js";
import { matchesAnyWildcard, parsePatternList } from "./wildcard.js";

export const SECRET_MASK = "********";

export function buildVariableMap(
  plain: readonly string[],
  secret: readonly string[] = [],
): Record<string, VariableValue> {
  const variables: Record<string, VariableValue> = {};
  for (const raw of plain) {
    const [key, value] = parseKeyValue(raw);
    variables[key] = { value, isSecret: false };
  }
  for (const raw of secret) {
    const [key, value] = parseKeyValue(raw);
    variables[key] = { value, isSecret: true };
  }
  return variables;
}

export function withVariable(
  variables: Record<string, VariableValue> | undefined,
  name: string,
  value: string,
  isSecret: boolean,
): Record<string, VariableValue> {
  return { ...variables, [name]: { value, isSecret } };
}

export function withoutVariable(
  variables: Record<string, VariableValue> | undefined,
  name: string,
): Record<string, VariableValue> {
  const remaining = { ...variables };
  if (!(name in remaining)) {
    throw new Error(`Variable "${name}" does not exist in this group.`);
  }
  delete remaining[name];
  return remaining;
}

export function maskVariables(variables: Record<string, VariableValue> | undefined): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [name, variable] of Object.entries(variables ?? {})) {
    masked[name] = variable.isSecret ? SECRET_MASK : (variable.value ?? "");
  }
  return masked;
}

export function toUpdateParameters(
  group: VariableGroup,
  variables: Record<string, VariableValue>,
): VariableGroupParameters {
  return {
    name: group.name,
    description: group.description,
    type: group.type ?? "Vsts",
    variables,
    variableGroupProjectReferences: group.variableGroupProjectReferences,
  };
}

export async function cmdVariableGroups(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["filter"], "Usage: variable-groups [--filter=<pattern>[,<pattern>]]");
  const patterns = parsePatternList(parsed.options.filter);

  const taskAgentApi = await config.connection.getTaskAgentApi();
  const groups = await taskAgentApi.getVariableGroups(requireProject(config));
  for (const group of groups) {
    if (!matchesAnyWildcard(group.name ?? "", patterns)) continue;
    const count = Object.keys(group.variables ?? {}).length;
    console.log(`${group.id}\t${group.name}\t${count} variable(s)`);
  }
}

async function fetchGroup(config: AdoConfig, groupId: number): Promise<VariableGroup> {
  const taskAgentApi = await config.connection.getTaskAgentApi();
  const group = await taskAgentApi.getVariableGroup(requireProject(config), groupId);
  if (!group) {
    throw new Error(`Variable group ${groupId} was not found in project ${requireProject(config)}.`);
  }
  return group;
}

export async function cmdVariableGroupGet(config: AdoConfig, args: string[]): Promise<void> {
  const groupId = parseId(args[0], "Usage: variable-group-get <id>", "variable group ID");
  const group = await fetchGroup(config, groupId);
  console.log(
    JSON.stringify(
      {
        id: group.id,
        name: group.name,
        description: group.description ?? null,
        modifiedBy: group.modifiedBy?.displayName ?? null,
        variables: maskVariables(group.variables),
      },
      null,
      2,
    ),
  );
}

const CREATE_USAGE =
  "Usage: variable-group-create --name=<name> [--description=...] [--var key=value ...] [--secret key=value ...]";

export async function cmdVariableGroupCreate(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["name", "description", "var", "secret"], CREATE_USAGE);

  const name = optionString(parsed.options.name);
  if (!name) {
    throw new UsageError("--name is required.", CREATE_USAGE);
  }

  let variables: Record<string, VariableValue>;
  try {
    variables = buildVariableMap(parsed.multi.var ?? [], parsed.multi.secret ?? []);
  } catch (error) {
    throw new UsageError(describeError(error), CREATE_USAGE);
  }
  if (Object.keys(variables).length === 0) {
    throw new UsageError("A variable group needs at least one variable.", CREATE_USAGE);
  }

  const projectName = requireProject(config);
  const coreApi = await config.connection.getCoreApi();
  const project = await coreApi.getProject(projectName);
  const description = optionString(parsed.options.description);

  const taskAgentApi = await config.connection.getTaskAgentApi();
  const created = await taskAgentApi.addVariableGroup({
    name,
    description,
    type: "Vsts",
    variables,
    variableGroupProjectReferences: [
      { name, description, projectReference: { id: project.id, name: project.name } },
    ],
  });
  console.log(`Created variable group ${created.id}: ${created.name}`);
}

const SET_USAGE = "Usage: variable-group-set <id> --name=<variable> --value=<value> [--secret]";

export async function cmdVariableGroupSet(config: AdoConfig, args: string[]): Promise<void> {
  const groupId = parseId(args[0], SET_USAGE, "variable group ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["name", "value", "secret"], SET_USAGE);

  const name = optionString(parsed.options.name);
  const value = parsed.options.value;
  if (!name || typeof value !== "string") {
    throw new UsageError("--name and --value are required.", SET_USAGE);
  }

  const group = await fetchGroup(config, groupId);
  const existed = name in (group.variables ?? {});
  const variables = withVariable(group.variables, name, value, optionFlag(parsed.options.secret));

  const taskAgentApi = await config.connection.getTaskAgentApi();
  await taskAgentApi.updateVariableGroup(toUpdateParameters(group, variables), groupId);
  console.log(`${existed ? "Updated" : "Added"} variable ${name} in group ${group.name}`);
}

const REMOVE_USAGE = "Usage: variable-group-remove-var <id> --name=<variable>";

export async function cmdVariableGroupRemoveVariable(config: AdoConfig, args: string[]): Promise<void> {
  const groupId = parseId(args[0], REMOVE_USAGE, "variable group ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["name"], REMOVE_USAGE);

  const name = optionString(parsed.options.name);
  if (!name) {
    throw new UsageError("--name is required.", REMOVE_USAGE);
  }

  const group = await fetchGroup(config, groupId);
  const variables = withoutVariable(group.variables, name);

  const taskAgentApi = await config.connection.getTaskAgentApi();
  await taskAgentApi.updateVariableGroup(toUpdateParameters(group, variables), groupId);
  console.log(`Removed variable ${name} from group ${group.name}`);
}

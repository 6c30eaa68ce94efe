import { runInventory, type InventoryDefinition, type InventoryOptions, type InventoryResult } from "./inventory.js";
import { listVariableGroups } from "./resources.js";
import { matchesAnyWildcard } from "./wildcard.js";
import type { AdoConnectionInfo, AdoProjectRef, AdoVariableGroup, FlatRecord, VariableGroupRecord } from "./types.js";

export interface VariableGroupInventoryOptions extends InventoryOptions {
  groupPatterns?: readonly string[];
  includeDetails?: boolean;
}

export function toVariableGroupRecords(
  organization: string,
  project: AdoProjectRef,
  group: AdoVariableGroup,
  includeDetails = false,
): VariableGroupRecord[] {
  const base = {
    organization,
    project: project.name,
    variableGroupId: group.id ?? 0,
    variableGroupName: group.name ?? "",
  };
  const details: FlatRecord = includeDetails
    ? {
        description: group.description ?? "",
        modifiedBy: group.modifiedBy?.displayName ?? "",
        modifiedOn: group.modifiedOn ?? "",
      }
    : {};

  const entries = Object.entries(group.variables ?? {});
  if (entries.length === 0) {
    return [{ ...base, variableName: "", value: null, isSecret: false, ...details }];
  }

  return entries.map(([variableName, variable]) => {
    const isSecret = variable.isSecret === true;
    return {
      ...base,
      variableName,
      value: isSecret ? null : (variable.value ?? null),
      isSecret,
      ...details,
    };
  });
}

export function variableGroupInventory(
  connection: AdoConnectionInfo,
  organization: string,
  { groupPatterns = [], includeDetails = false }: Pick<VariableGroupInventoryOptions, "groupPatterns" | "includeDetails"> = {},
): InventoryDefinition<AdoProjectRef, VariableGroupRecord> {
  return {
    childLabel: "projects",
    listChildren: async (project) => [project],
    describe: (project) => project.name,
    async collect(project, signal) {
      const groups = await listVariableGroups(connection, project, signal);
      return groups
        .filter((group) => matchesAnyWildcard(group.name ?? "", groupPatterns))
        .flatMap((group) => toVariableGroupRecords(organization, project, group, includeDetails));
    },
  };
}

export function runVariableGroupInventory(
  connection: AdoConnectionInfo,
  organization: string,
  { groupPatterns, includeDetails, ...options }: VariableGroupInventoryOptions = {},
): Promise<InventoryResult<AdoProjectRef, VariableGroupRecord>> {
  return runInventory(
    connection,
    variableGroupInventory(connection, organization, { groupPatterns, includeDetails }),
    options,
  );
}

import { readFile } from "node:fs/promises";
import { WorkItemExpand } from "azure-devops-node-api/interfaces/WorkItemTrackingInterfaces.js";
import type { WorkItem } from "azure-devops-node-api/interfaces/WorkItemTrackingInterfaces.js";
import { Operation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import type { JsonPatchOperation } from "azure-devops-node-api/interfaces/common/VSSInterfaces.js";
import {
  assertKnownOptions,
  optionFlag,
  optionString,
  parseId,
  parseOptionArgs,
  toBoundedTop,
} from "./args.js";
import { requireProject } from "./config.js";
import { UsageError, describeError } from "./errors.js";
import type { AdoConfig, ParsedWorkItemsRecentArgs, WorkItemFilters } from "./types.js";

const TYPE_ALIASES: Record<string, string> = {
  bug: "Bug",
  task: "Task",
  story: "User Story",
  userstory: "User Story",
  "user-story": "User Story",
  "user story": "User Story",
  spike: "Spike",
};

export const DESCRIPTION_FIELDS: Record<string, string> = {
  Bug: "Microsoft.VSTS.TCM.ReproSteps",
};

const STORY_POINT_TYPES = new Set(["User Story", "Spike"]);

export interface WorkItemDraft {
  type: string;
  title: string;
  description?: string;
  assignedTo?: string;
  areaPath?: string;
  iterationPath?: string;
  tags?: string[];
  priority?: number;
  storyPoints?: number;
  parentId?: number;
}

export interface WorkItemChanges {
  state?: string;
  title?: string;
  assignedTo?: string;
  comment?: string;
}

export function resolveWorkItemType(raw: string | undefined): string {
  const type = TYPE_ALIASES[(raw ?? "").trim().toLowerCase()];
  if (!type) {
    throw new Error(`Unsupported work item type "${raw ?? ""}". Use Bug, Task, "User Story" or Spike.`);
  }
  return type;
}

export function parseTags(raw: string | undefined): string[] {
  return [
    ...new Set(
      (raw ?? "")
        .split(/[;,]/)
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0),
    ),
  ];
}

function addField(path: string, value: string | number): JsonPatchOperation {
  return { op: Operation.Add, path: `/fields/${path}`, value };
}

export function buildCreateWorkItemPatch(draft: WorkItemDraft, collectionUrl: string): JsonPatchOperation[] {
  const patch: JsonPatchOperation[] = [addField("System.Title", draft.title)];

  if (draft.description) {
    patch.push(addField(DESCRIPTION_FIELDS[draft.type] ?? "System.Description", draft.description));
  }
  if (draft.assignedTo) patch.push(addField("System.AssignedTo", draft.assignedTo));
  if (draft.areaPath) patch.push(addField("System.AreaPath", draft.areaPath));
  if (draft.iterationPath) patch.push(addField("System.IterationPath", draft.iterationPath));
  if (draft.tags && draft.tags.length > 0) patch.push(addField("System.Tags", draft.tags.join("; ")));
  if (draft.priority !== undefined) patch.push(addField("Microsoft.VSTS.Common.Priority", draft.priority));
  if (draft.storyPoints !== undefined) {
    if (!STORY_POINT_TYPES.has(draft.type)) {
      throw new Error(`Story points are only supported for ${[...STORY_POINT_TYPES].join(" and ")} items.`);
    }
    patch.push(addField("Microsoft.VSTS.Scheduling.StoryPoints", draft.storyPoints));
  }
  if (draft.parentId !== undefined) {
    patch.push({
      op: Operation.Add,
      path: "/relations/-",
      value: {
        rel: "System.LinkTypes.Hierarchy-Reverse",
        url: `${collectionUrl}/_apis/wit/workItems/${draft.parentId}`,
      },
    });
  }

  return patch;
}

export function buildUpdateWorkItemPatch(changes: WorkItemChanges): JsonPatchOperation[] {
  const patch: JsonPatchOperation[] = [];
  if (changes.title) patch.push(addField("System.Title", changes.title));
  if (changes.state) patch.push(addField("System.State", changes.state));
  if (changes.assignedTo !== undefined) patch.push(addField("System.AssignedTo", changes.assignedTo));
  if (changes.comment) patch.push(addField("System.History", changes.comment));
  return patch;
}

export function escapeWiqlLiteral(value: string): string {
  return value.replaceAll("'", "''");
}

export function buildRecentWorkItemsWiql(filters: WorkItemFilters = {}): string {
  const clauses: string[] = ["[System.TeamProject] = @project"];

  if (filters.type) {
    clauses.push(`[System.WorkItemType] = '${escapeWiqlLiteral(filters.type)}'`);
  }
  if (filters.state) {
    clauses.push(`[System.State] = '${escapeWiqlLiteral(filters.state)}'`);
  }
  if (filters.tag) {
    clauses.push(`[System.Tags] CONTAINS '${escapeWiqlLiteral(filters.tag)}'`);
  }
  if (filters.assignedTo) {
    clauses.push(
      filters.assignedTo.toLowerCase() === "@me"
        ? "[System.AssignedTo] = @Me"
        : `[System.AssignedTo] = '${escapeWiqlLiteral(filters.assignedTo)}'`,
    );
  }

  return `SELECT [System.Id] FROM WorkItems WHERE ${clauses.join(" AND ")} ORDER BY [System.ChangedDate] DESC`;
}

const RECENT_USAGE =
  "Usage: workitems-recent [top] [--tag=<tag>] [--type=<work-item-type>] [--state=<state>] [--assigned-to=<user>|@me]";

export function parseWorkItemsRecentArgs(args: string[] = []): ParsedWorkItemsRecentArgs {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["top", "tag", "type", "state", "assigned-to"], RECENT_USAGE);

  if (parsed.positionals.length > 1) {
    throw new UsageError("Too many arguments.", RECENT_USAGE);
  }

  const { options } = parsed;
  const typeRaw = optionString(options.type);
  return {
    top: toBoundedTop(options.top ?? parsed.positionals[0] ?? "10"),
    filters: {
      tag: optionString(options.tag),
      type: typeRaw && TYPE_ALIASES[typeRaw.toLowerCase()] ? resolveWorkItemType(typeRaw) : typeRaw,
      state: optionString(options.state),
      assignedTo: optionString(options["assigned-to"]),
    },
  };
}

function optionalNumber(raw: string | boolean | undefined, name: string, usage: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (typeof raw === "boolean" || !Number.isFinite(value)) {
    throw new UsageError(`--${name} must be a number.`, usage);
  }
  return value;
}

export function summarizeWorkItem(item: WorkItem): Record<string, unknown> {
  const assignedTo: unknown = item.fields?.["System.AssignedTo"];
  return {
    id: item.id,
    title: item.fields?.["System.Title"],
    state: item.fields?.["System.State"],
    type: item.fields?.["System.WorkItemType"],
    assignedTo:
      typeof assignedTo === "object" && assignedTo !== null && "displayName" in assignedTo
        ? assignedTo.displayName
        : null,
    changedDate: item.fields?.["System.ChangedDate"],
    url: item.url,
  };
}

const CREATE_USAGE =
  'Usage: workitem-create <Bug|Task|"User Story"|Spike> --title=... [--description=...] [--assigned-to=...] [--area=...] [--iteration=...] [--tags=a;b] [--priority=1-4] [--story-points=n] [--parent=<id>]';

export async function cmdWorkItemCreate(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(
    parsed,
    ["title", "description", "assigned-to", "area", "iteration", "tags", "priority", "story-points", "parent"],
    CREATE_USAGE,
  );
  const { options, positionals } = parsed;

  let type: string;
  try {
    type = resolveWorkItemType(positionals.join(" "));
  } catch (error) {
    throw new UsageError(describeError(error), CREATE_USAGE);
  }

  const title = optionString(options.title);
  if (!title) {
    throw new UsageError("--title is required.", CREATE_USAGE);
  }

  const parentRaw = optionString(options.parent);
  const draft: WorkItemDraft = {
    type,
    title,
    description: optionString(options.description),
    assignedTo: optionString(options["assigned-to"]),
    areaPath: optionString(options.area),
    iterationPath: optionString(options.iteration),
    tags: parseTags(optionString(options.tags)),
    priority: optionalNumber(options.priority, "priority", CREATE_USAGE),
    storyPoints: optionalNumber(options["story-points"], "story-points", CREATE_USAGE),
    parentId: parentRaw === undefined ? undefined : parseId(parentRaw, CREATE_USAGE, "parent work item ID"),
  };

  const project = requireProject(config);
  const witApi = await config.connection.getWorkItemTrackingApi();
  const created = await witApi.createWorkItem(
    {},
    buildCreateWorkItemPatch(draft, config.collectionUrl),
    project,
    type,
  );
  console.log(`Created ${type} #${created.id}: ${title}`);
}

const GET_USAGE = "Usage: workitem-get <id> [--raw] [--expand=all|fields|links|relations]";

const expandMap: Record<string, WorkItemExpand> = {
  none: WorkItemExpand.None,
  relations: WorkItemExpand.Relations,
  fields: WorkItemExpand.Fields,
  links: WorkItemExpand.Links,
  all: WorkItemExpand.All,
};

export async function cmdWorkItemGet(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], GET_USAGE, "work item ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["raw", "expand"], GET_USAGE);
  if (parsed.positionals.length > 0) {
    throw new UsageError("Too many arguments.", GET_USAGE);
  }

  const expandName = optionString(parsed.options.expand)?.toLowerCase();
  const expand = expandName ? expandMap[expandName] : undefined;
  if (expandName && expand === undefined) {
    throw new UsageError(`Unknown expand value: ${expandName}`, GET_USAGE);
  }

  const witApi = await config.connection.getWorkItemTrackingApi();
  const result = await witApi.getWorkItem(id, undefined, undefined, expand, requireProject(config));
  const output = optionFlag(parsed.options.raw) ? result : summarizeWorkItem(result);
  console.log(JSON.stringify(output, null, 2));
}

const UPDATE_USAGE =
  "Usage: workitem-update <id> [--state=...] [--title=...] [--assigned-to=...] [--comment=...]";

export async function cmdWorkItemUpdate(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], UPDATE_USAGE, "work item ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["state", "title", "assigned-to", "comment"], UPDATE_USAGE);

  const assignedRaw = parsed.options["assigned-to"];
  const patch = buildUpdateWorkItemPatch({
    state: optionString(parsed.options.state),
    title: optionString(parsed.options.title),
    assignedTo: typeof assignedRaw === "string" ? assignedRaw.trim() : undefined,
    comment: optionString(parsed.options.comment),
  });
  if (patch.length === 0) {
    throw new UsageError("Nothing to update.", UPDATE_USAGE);
  }

  const witApi = await config.connection.getWorkItemTrackingApi();
  const updated = await witApi.updateWorkItem({}, patch, id, requireProject(config));
  console.log(
    `Updated work item #${updated.id} (${String(updated.fields?.["System.State"] ?? "unknown state")})`,
  );
}

export async function cmdWorkItemsRecent(config: AdoConfig, args: string[]): Promise<void> {
  const parsedArgs = parseWorkItemsRecentArgs(args);
  const project = requireProject(config);

  const witApi = await config.connection.getWorkItemTrackingApi();
  const wiqlResult = await witApi.queryByWiql(
    { query: buildRecentWorkItemsWiql(parsedArgs.filters) },
    { project },
    undefined,
    parsedArgs.top,
  );

  for (const wi of wiqlResult.workItems ?? []) {
    console.log(wi.id);
  }
}

const COMMENT_USAGE = 'Usage: workitem-comment-add <id> --text="..." [--file=path]';

export async function resolveCommentText(options: Record<string, string | boolean>): Promise<string> {
  let text = optionString(options.text);
  if (!text && typeof options.file === "string") {
    text = (await readFile(options.file, "utf8")).trim();
  }
  if (!text) {
    throw new UsageError("Either --text or --file must provide a non-empty comment body.", COMMENT_USAGE);
  }
  return text;
}

export async function cmdWorkItemCommentAdd(config: AdoConfig, args: string[]): Promise<void> {
  const id = parseId(args[0], COMMENT_USAGE, "work item ID");
  const parsed = parseOptionArgs(args.slice(1));
  assertKnownOptions(parsed, ["text", "file"], COMMENT_USAGE);
  const text = await resolveCommentText(parsed.options);

  const witApi = await config.connection.getWorkItemTrackingApi();
  const result = await witApi.addComment({ text }, requireProject(config), id);

  console.log(
    JSON.stringify(
      {
        id: result.id ?? null,
        workItemId: id,
        createdBy: result.createdBy?.displayName ?? null,
        createdDate: result.createdDate ?? null,
        text: result.text ?? text,
      },
      null,
      2,
    ),
  );
}

import { assertKnownOptions, optionString, parseOptionArgs } from "./args.js";
import { requireProject, requireRepo } from "./config.js";
import { stripRefPrefix } from "./pull-request-inventory.js";
import type { AdoConfig } from "./types.js";
import { matchesAnyWildcard, parsePatternList } from "./wildcard.js";

export async function cmdRepos(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["filter"], "Usage: repos [--filter=<pattern>[,<pattern>]]");
  const patterns = parsePatternList(parsed.options.filter);

  const gitApi = await config.connection.getGitApi();
  const repos = await gitApi.getRepositories(requireProject(config));
  for (const repo of repos) {
    if (!matchesAnyWildcard(repo.name ?? "", patterns)) continue;
    const state = repo.isDisabled ? "\t(disabled)" : "";
    console.log(`${repo.id}\t${repo.name}\t${stripRefPrefix(repo.defaultBranch) || "-"}${state}`);
  }
}

export async function cmdBranches(config: AdoConfig, args: string[]): Promise<void> {
  const parsed = parseOptionArgs(args);
  assertKnownOptions(parsed, ["filter"], "Usage: branches [repo] [--filter=<pattern>]");
  const patterns = parsePatternList(optionString(parsed.options.filter));

  const gitApi = await config.connection.getGitApi();
  const refs = await gitApi.getRefs(requireRepo(config, parsed.positionals[0]), requireProject(config), "heads/");
  for (const ref of refs) {
    const name = stripRefPrefix(ref.name);
    if (matchesAnyWildcard(name, patterns)) console.log(name);
  }
}

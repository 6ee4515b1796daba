import { existsSync } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  ConfigurationError,
  SearchPath,
  SearchPathError,
  createMatcher,
  findConfigFile,
  loadSearchConfig,
  toSearchPath,
  type EntryInput,
  type Match,
  type MatcherName,
  type SearchAllOptions,
  type SearchConfig,
  type TraversalKind,
} from "../../src";
import { colors, debug, warn } from "../../src/logging";

/** Parsed values of the shared search arguments */
export interface SearchArgs {
  dir: string[];
  config?: string;
  kind?: TraversalKind;
  include: string[];
  exclude: string[];
  includeFrom: string[];
  excludeFrom: string[];
  includeFromAncestors?: string;
  excludeFromAncestors?: string;
  matcher?: MatcherName;
  noFollowSymlinks: boolean;
}

export interface ResolvedSearch {
  searchPath: SearchPath;
  options: SearchAllOptions;
  /** Config file that contributed, if any */
  configPath: string | null;
}

/**
 * Parses a `--dir` value: `name=path` gives a named scope, anything else is a
 * bare path. Paths are resolved against `cwd`.
 */
export function parseDirArg(value: string, cwd: string = process.cwd()): EntryInput {
  const eq = value.indexOf("=");
  if (eq > 0) {
    const name = value.slice(0, eq);
    const dir = value.slice(eq + 1);
    if (!/[\\/]/.test(name)) {
      if (!dir) {
        throw new ConfigurationError(`Missing path for scope "${name}" in --dir ${value}`);
      }
      return [name, path.resolve(cwd, dir)];
    }
  }
  return path.resolve(cwd, value);
}

function loadConfig(args: SearchArgs, cwd: string): SearchConfig | null {
  if (args.config) {
    return loadSearchConfig(path.resolve(cwd, args.config));
  }
  const found = findConfigFile(cwd);
  if (!found) return null;
  debug(`Using project config ${found}`);
  return loadSearchConfig(found);
}

/**
 * Builds the search path and options for a command. Command-line patterns are
 * appended to the config's; command-line scalars override it. Without `--dir`
 * or configured scopes the current directory is searched as scope "cwd".
 */
export function resolveSearch(
  args: SearchArgs,
  cwd: string = process.cwd(),
): ResolvedSearch {
  const config = loadConfig(args, cwd);

  let searchPath: SearchPath;
  if (args.dir.length > 0) {
    searchPath = new SearchPath(...args.dir.map((value) => parseDirArg(value, cwd)));
  } else if (config && config.scopes.length > 0) {
    searchPath = toSearchPath(config);
  } else {
    if (config) {
      warn(`No scopes in ${config.source}; searching ${cwd}`);
    }
    searchPath = new SearchPath(["cwd", cwd]);
  }

  const fromCwd = (file: string) => path.resolve(cwd, file);
  const options: SearchAllOptions = {
    kind: args.kind ?? config?.kind,
    include: [...(config?.include ?? []), ...args.include],
    exclude: [...(config?.exclude ?? []), ...args.exclude],
    includeFrom: [...(config?.includeFrom ?? []), ...args.includeFrom.map(fromCwd)],
    excludeFrom: [...(config?.excludeFrom ?? []), ...args.excludeFrom.map(fromCwd)],
    includeFromAncestors: args.includeFromAncestors ?? config?.includeFromAncestors,
    excludeFromAncestors: args.excludeFromAncestors ?? config?.excludeFromAncestors,
    matcher: createMatcher(args.matcher ?? config?.matcher ?? "glob"),
    followSymlinks: args.noFollowSymlinks ? false : config?.followSymlinks,
    dedupe: config?.dedupe,
  };

  return { searchPath, options, configPath: config?.source ?? null };
}

/**
 * Shortens a path by replacing the home directory with ~
 */
export function shortenPath(p: string): string {
  const home = os.homedir();
  if (p === home || p.startsWith(home + path.sep)) {
    return "~" + p.slice(home.length);
  }
  return p;
}

export interface MatchJson {
  path: string;
  relative: string;
  scope: string;
  source: string;
}

export function matchToJson(match: Match): MatchJson {
  return {
    path: match.path,
    relative: match.relative,
    scope: match.scope,
    source: match.source,
  };
}

/** One output line per match: the path, or `scope<TAB>path` with provenance */
export function formatMatch(match: Match, withScope: boolean): string {
  return withScope ? `${match.scope}\t${match.path}` : match.path;
}

export interface ScopeInfo {
  scope: string;
  path: string;
  exists: boolean;
}

export function describeScopes(searchPath: SearchPath): ScopeInfo[] {
  return [...searchPath.items()].map(([scope, dir]) => ({
    scope,
    path: dir,
    exists: existsSync(dir),
  }));
}

/**
 * Prints library errors and exits with status 2. Anything else is a bug and
 * is rethrown.
 */
export function exitOnSearchError(error: unknown): never {
  if (error instanceof SearchPathError) {
    console.error(colors.red(`Error: ${error.message}`));
    process.exit(2);
  }
  throw error;
}

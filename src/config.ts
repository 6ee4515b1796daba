import * as TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import * as os from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import {
  APP_NAME,
  CONFIG_FILENAME,
  DEFAULT_XDG_CONFIG_DIRS,
  PROJECT_MARKERS,
} from "./constants";
import { GitignoreMatcher, GlobMatcher, RegexMatcher } from "./core/matchers";
import { SearchPath } from "./core/search-path";
import type { PathMatcher, SearchAllOptions, TraversalKind } from "./core/types";
import { ConfigurationError } from "./errors";
import { debug } from "./logging";

const PatternListSchema = z.union([z.string(), z.array(z.string())]);

const MatcherNameSchema = z.enum(["glob", "regex", "gitignore"]);

export type MatcherName = z.infer<typeof MatcherNameSchema>;

const SearchConfigSchema = z
  .object({
    /** Search path entries in priority order */
    scopes: z
      .array(
        z.object({
          name: z.string().min(1, "Scope name cannot be empty"),
          path: z.string().min(1, "Scope path cannot be empty"),
        }),
      )
      .optional(),
    include: PatternListSchema.optional(),
    exclude: PatternListSchema.optional(),
    /** Strict pattern files, relative to the config file */
    "include-from": PatternListSchema.optional(),
    "exclude-from": PatternListSchema.optional(),
    /** Pattern filenames looked up in every directory under each scope root */
    "include-from-ancestors": z.string().min(1).optional(),
    "exclude-from-ancestors": z.string().min(1).optional(),
    matcher: MatcherNameSchema.optional(),
    kind: z.enum(["files", "dirs", "both"]).optional(),
    "follow-symlinks": z.boolean().optional(),
    dedupe: z.boolean().optional(),
  })
  .strict();

type SearchConfigFile = z.infer<typeof SearchConfigSchema>;

export interface ScopeConfig {
  name: string;
  /** Absolute directory */
  path: string;
}

/** A validated config file with every path made absolute */
export interface SearchConfig {
  /** Path of the file the config was loaded from */
  source: string;
  scopes: ScopeConfig[];
  include: string[];
  exclude: string[];
  includeFrom: string[];
  excludeFrom: string[];
  includeFromAncestors?: string;
  excludeFromAncestors?: string;
  matcher: MatcherName;
  kind?: TraversalKind;
  followSymlinks?: boolean;
  dedupe?: boolean;
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : value;
}

/** Resolves `~/` and relative paths; relative paths are taken from `baseDir`. */
function resolveConfigPath(baseDir: string, value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return join(os.homedir(), value.slice(2));
  return isAbsolute(value) ? value : resolve(baseDir, value);
}

function formatIssues(error: z.ZodError<SearchConfigFile>): string {
  const lines = error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  ${key}: ${issue.message}`;
  });
  return ["invalid configuration", ...lines].join("\n");
}

/**
 * Loads and validates a TOML search configuration.
 *
 * @example
 * ```toml
 * matcher = "gitignore"
 * exclude-from-ancestors = ".searchignore"
 *
 * [[scopes]]
 * name = "project"
 * path = ".config"
 * ```
 */
export function loadSearchConfig(configPath: string): SearchConfig {
  const source = resolve(configPath);
  const baseDir = dirname(source);

  let raw: string;
  try {
    raw = readFileSync(source, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code;
    const reason =
      code === "ENOENT"
        ? "file not found"
        : error instanceof Error
          ? error.message
          : String(error);
    throw new ConfigurationError(`cannot read configuration: ${reason}`, source);
  }

  let data: TOML.JsonMap;
  try {
    data = TOML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`invalid TOML: ${reason}`, source);
  }

  const parsed = SearchConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), source);
  }

  const config = parsed.data;
  debug(`Loaded search config from ${source}`);

  return {
    source,
    scopes: (config.scopes ?? []).map((scope) => ({
      name: scope.name,
      path: resolveConfigPath(baseDir, scope.path),
    })),
    include: toList(config.include),
    exclude: toList(config.exclude),
    includeFrom: toList(config["include-from"]).map((p) => resolveConfigPath(baseDir, p)),
    excludeFrom: toList(config["exclude-from"]).map((p) => resolveConfigPath(baseDir, p)),
    includeFromAncestors: config["include-from-ancestors"],
    excludeFromAncestors: config["exclude-from-ancestors"],
    matcher: config.matcher ?? "glob",
    kind: config.kind,
    followSymlinks: config["follow-symlinks"],
    dedupe: config.dedupe,
  };
}

/** A fresh matcher for a config or CLI matcher name */
export function createMatcher(name: MatcherName): PathMatcher {
  switch (name) {
    case "glob":
      return new GlobMatcher();
    case "regex":
      return new RegexMatcher();
    case "gitignore":
      return new GitignoreMatcher();
  }
}

export function toSearchOptions(config: SearchConfig): SearchAllOptions {
  return {
    kind: config.kind,
    include: config.include,
    exclude: config.exclude,
    includeFrom: config.includeFrom,
    excludeFrom: config.excludeFrom,
    includeFromAncestors: config.includeFromAncestors,
    excludeFromAncestors: config.excludeFromAncestors,
    matcher: createMatcher(config.matcher),
    followSymlinks: config.followSymlinks,
    dedupe: config.dedupe,
  };
}

export function toSearchPath(config: SearchConfig): SearchPath {
  return new SearchPath(
    ...config.scopes.map((scope) => [scope.name, scope.path] as const),
  );
}

/**
 * Conventional config locations for an application, highest priority first:
 * `project` (`<projectRoot>/.<appName>`), `user` (XDG config home) and
 * `system` (first XDG config dir).
 */
export function getDefaultScopes(
  appName: string = APP_NAME,
  projectRoot?: string,
  env: NodeJS.ProcessEnv = process.env,
): SearchPath {
  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const userPath = xdgConfigHome
    ? join(xdgConfigHome, appName)
    : join(os.homedir(), ".config", appName);

  const systemBase =
    (env.XDG_CONFIG_DIRS ?? "").split(":").find((dir) => dir.length > 0) ??
    DEFAULT_XDG_CONFIG_DIRS;

  return new SearchPath(
    ["project", projectRoot ? join(projectRoot, `.${appName}`) : null],
    ["user", userPath],
    ["system", join(systemBase, appName)],
  );
}

/** Nearest directory at or above `startDir` holding `.git` or a config file. */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);
  for (;;) {
    if (PROJECT_MARKERS.some((marker) => existsSync(join(dir, marker)))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** The project config file for `startDir`, if the project has one. */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const root = findProjectRoot(startDir);
  if (!root) return null;
  const candidate = join(root, CONFIG_FILENAME);
  return existsSync(candidate) ? candidate : null;
}

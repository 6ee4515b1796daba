import { array, flag, multioption, oneOf, option, optional, string } from "cmd-ts";
import type { MatcherName, TraversalKind } from "../../src";

/** Arguments shared by every command that builds a search path */
export const searchArgs = {
  dir: multioption({
    type: array(string),
    long: "dir",
    short: "d",
    description: "Directory to search, as name=path or a bare path (can be repeated; order is priority)",
  }),
  config: option({
    type: optional(string),
    long: "config",
    short: "c",
    description: "Search config file (defaults to the project's .searchscope.toml)",
  }),
  kind: option({
    type: optional(oneOf<TraversalKind>(["files", "dirs", "both"])),
    long: "kind",
    short: "k",
    description: "What to match: files, dirs or both (default: files)",
  }),
  include: multioption({
    type: array(string),
    long: "include",
    short: "i",
    description: "Pattern a result must match (can be repeated)",
  }),
  exclude: multioption({
    type: array(string),
    long: "exclude",
    short: "e",
    description: "Pattern that rejects a result and prunes matching directories (can be repeated)",
  }),
  includeFrom: multioption({
    type: array(string),
    long: "include-from",
    description: "File of include patterns, one per line (can be repeated)",
  }),
  excludeFrom: multioption({
    type: array(string),
    long: "exclude-from",
    description: "File of exclude patterns, one per line (can be repeated)",
  }),
  includeFromAncestors: option({
    type: optional(string),
    long: "include-from-ancestors",
    description: "Include pattern filename read from every directory down to each result",
  }),
  excludeFromAncestors: option({
    type: optional(string),
    long: "exclude-from-ancestors",
    description: "Exclude pattern filename read from every directory down to each result (e.g. .gitignore)",
  }),
  matcher: option({
    type: optional(oneOf<MatcherName>(["glob", "regex", "gitignore"])),
    long: "matcher",
    short: "m",
    description: "Pattern syntax: glob, regex or gitignore (default: glob)",
  }),
  noFollowSymlinks: flag({
    long: "no-follow-symlinks",
    description: "Do not descend into symlinked directories",
  }),
};

/** Output arguments for commands that print matches */
export const outputArgs = {
  json: flag({
    long: "json",
    description: "Print results as JSON",
  }),
  scope: flag({
    long: "scope",
    short: "s",
    description: "Show the scope each result came from",
  }),
};

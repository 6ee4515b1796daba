import { command, flag, optional, positional, string } from "cmd-ts";
import { DEFAULT_PATTERN } from "../../../src";
import { raw } from "../../../src/logging";
import { outputArgs, searchArgs } from "../args";
import { exitOnSearchError, formatMatch, matchToJson, resolveSearch } from "../utils";

export const all = command({
  name: "all",
  description: "Print every match across all directories, in priority order",
  args: {
    pattern: positional({
      type: optional(string),
      displayName: "pattern",
      description: "Pattern matched against paths relative to each directory (default: **)",
    }),
    ...searchArgs,
    ...outputArgs,
    noDedupe: flag({
      long: "no-dedupe",
      description: "Keep matches that share a relative path with a higher-priority match",
    }),
  },
  handler: ({ pattern, json, scope, noDedupe, ...args }) => {
    try {
      const { searchPath, options } = resolveSearch(args);
      const found = searchPath.matches(pattern ?? DEFAULT_PATTERN, {
        ...options,
        dedupe: noDedupe ? false : options.dedupe,
      });

      if (json) {
        raw(JSON.stringify(found.map(matchToJson), null, 2));
        return;
      }
      for (const match of found) {
        raw(formatMatch(match, scope));
      }
    } catch (error) {
      exitOnSearchError(error);
    }
  },
});

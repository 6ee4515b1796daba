import { command, optional, positional, string } from "cmd-ts";
import { DEFAULT_PATTERN } from "../../../src";
import { raw } from "../../../src/logging";
import { outputArgs, searchArgs } from "../args";
import { exitOnSearchError, formatMatch, matchToJson, resolveSearch } from "../utils";

export const first = command({
  name: "first",
  description: "Print the highest-priority match, exiting 1 when nothing matches",
  args: {
    pattern: positional({
      type: optional(string),
      displayName: "pattern",
      description: "Pattern matched against paths relative to each directory (default: **)",
    }),
    ...searchArgs,
    ...outputArgs,
  },
  handler: ({ pattern, json, scope, ...args }) => {
    try {
      const { searchPath, options } = resolveSearch(args);
      const found = searchPath.match(pattern ?? DEFAULT_PATTERN, options);
      if (!found) {
        if (json) raw("null");
        process.exit(1);
      }
      raw(json ? JSON.stringify(matchToJson(found), null, 2) : formatMatch(found, scope));
    } catch (error) {
      exitOnSearchError(error);
    }
  },
});

import { command, flag } from "cmd-ts";
import { colors, raw } from "../../../src/logging";
import { searchArgs } from "../args";
import { describeScopes, exitOnSearchError, resolveSearch, shortenPath } from "../utils";

export const scopes = command({
  name: "scopes",
  description: "Show the directories that would be searched, in priority order",
  args: {
    ...searchArgs,
    json: flag({
      long: "json",
      description: "Print scopes as JSON",
    }),
  },
  handler: ({ json, ...args }) => {
    try {
      const { searchPath, configPath } = resolveSearch(args);
      const entries = describeScopes(searchPath);

      if (json) {
        raw(JSON.stringify(entries, null, 2));
        return;
      }

      if (configPath) {
        raw(colors.dim(`Config: ${shortenPath(configPath)}`));
      }
      for (const entry of entries) {
        const missing = entry.exists ? "" : colors.yellow(" (missing)");
        raw(`${colors.bold(entry.scope)}  ${shortenPath(entry.path)}${missing}`);
      }
    } catch (error) {
      exitOnSearchError(error);
    }
  },
});

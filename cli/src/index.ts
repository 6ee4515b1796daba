#!/usr/bin/env node
import { run, subcommands } from "cmd-ts";
import { all } from "./commands/all";
import { first } from "./commands/first";
import { scopes } from "./commands/scopes";

const app = subcommands({
  name: "searchscope",
  description: "Find files across prioritized, scoped directories",
  version: "0.1.0",
  cmds: {
    first,
    all,
    scopes,
  },
});

run(app, process.argv.slice(2)).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

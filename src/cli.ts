#!/usr/bin/env node
import { defineCommand, runMain } from "citty";

const main = defineCommand({
  meta: {
    name: "git-extra",
    version: "0.1.0",
    description: "Extra Git commands for browsing remotes and quick-starting projects",
  },
  subCommands: {
    browse: () => import("./commands/browse.js").then((m) => m.default),
    "quick-start": () => import("./commands/quick-start.js").then((m) => m.default),
  },
});

runMain(main);

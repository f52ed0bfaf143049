import { defineCommand } from "citty";

export default defineCommand({
  meta: {
    name: "quick-start",
    description: "Commands to quickly start projects",
  },
  subCommands: {
    list: () => import("./list.js").then((m) => m.default),
    create: () => import("./create.js").then((m) => m.default),
  },
});

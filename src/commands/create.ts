import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import { resolve } from "node:path";
import { readCatalog } from "../lib/catalog.js";
import { describeError, exitCodeFor } from "../lib/errors.js";
import { createClackLog, type Log } from "../lib/log.js";
import { provisionProject } from "../lib/provision.js";
import { toUserPath } from "../lib/ui-utils.js";
import type { ProvisionOutcome, ProvisionRequest } from "../types/index.js";

/**
 * Load the catalog and provision a project from it
 */
export async function createProject(
  log: Log,
  request: ProvisionRequest,
  catalogPath?: string
): Promise<ProvisionOutcome> {
  const catalog = await readCatalog(log, catalogPath);
  return provisionProject(request, { log, catalog });
}

export default defineCommand({
  meta: {
    name: "create",
    description: "Create a new project by cloning a repo and running a customization script",
  },
  args: {
    source: {
      type: "positional",
      description: "A name from the catalog, or a Git URL (SSH, HTTPS or file://)",
      required: true,
    },
    directory: {
      type: "positional",
      description: "Directory to clone the repo into",
      required: true,
    },
    customizer: {
      type: "string",
      alias: "c",
      description: "Customization file, relative to the new project directory",
    },
  },
  async run({ args }) {
    p.intro("git-extra quick-start create");
    const log = createClackLog();

    try {
      const outcome = await createProject(log, {
        sourceText: args.source,
        targetDirectory: args.directory,
        customizerOverride: args.customizer,
      });

      p.outro(`Created ${toUserPath(resolve(outcome.directory))}`);
    } catch (error) {
      log.error(describeError(error));
      process.exit(exitCodeFor(error));
    }
  },
});

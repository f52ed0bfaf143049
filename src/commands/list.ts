import { defineCommand } from "citty";
import { formatCatalog, readCatalog } from "../lib/catalog.js";
import { describeError, exitCodeFor } from "../lib/errors.js";
import { createClackLog, type Log } from "../lib/log.js";

/**
 * Print every catalog entry; returns how many were printed
 */
export async function listCatalog(log: Log, catalogPath?: string): Promise<number> {
  const catalog = await readCatalog(log, catalogPath);
  const lines = formatCatalog(catalog);

  for (const line of lines) {
    log.output(line);
  }

  return lines.length;
}

export default defineCommand({
  meta: {
    name: "list",
    description: "List the named repositories in ~/.config/git_extra/repos.toml",
  },
  args: {
    // Older releases spelled this command `quick-start --list`
    list: {
      type: "boolean",
      alias: "l",
      description: "Accepted for compatibility; has no effect",
      default: false,
    },
  },
  async run() {
    const log = createClackLog();

    try {
      await listCatalog(log);
    } catch (error) {
      log.error(describeError(error));
      process.exit(exitCodeFor(error));
    }
  },
});

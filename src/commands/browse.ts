import { defineCommand } from "citty";
import { DEFAULTS } from "../lib/config.js";
import { describeError, exitCodeFor } from "../lib/errors.js";
import { listRemotes } from "../lib/git.js";
import { createClackLog, type Log } from "../lib/log.js";
import { resolveBrowseUrl } from "../lib/remotes.js";
import { openInBrowser } from "../lib/ui-utils.js";

/**
 * Open the web page for a remote of the current repository
 * Returns the URL that was opened, or null when no remote matched.
 */
export async function browseRemote(log: Log, remoteName?: string): Promise<string | null> {
  const name = remoteName || DEFAULTS.remoteName;
  const listing = await listRemotes();
  const url = resolveBrowseUrl(listing, name);

  if (!url) {
    log.warning(`No '${name}' remote with a recognized SSH or HTTPS URL`);
    return null;
  }

  log.output(`Opening URL '${url}'`);
  await openInBrowser(url);
  return url;
}

export default defineCommand({
  meta: {
    name: "browse",
    description: "Browse to the origin repository web page",
  },
  args: {
    origin: {
      type: "string",
      description: "Name of the remote to browse (default: origin)",
    },
  },
  async run({ args }) {
    const log = createClackLog();

    try {
      await browseRemote(log, args.origin);
    } catch (error) {
      log.error(describeError(error));
      process.exit(exitCodeFor(error));
    }
  },
});

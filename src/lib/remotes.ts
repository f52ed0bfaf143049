import type { RemoteRecord } from "../types/index.js";
import { DEFAULTS } from "./config.js";
import { normalizeRemoteUrl } from "./url-parser.js";

// <name> <url> (fetch|push), as printed by `git remote -vv`
const REMOTE_LINE = /^(?<name>[a-zA-Z0-9-]+)\s+(?<url>.*?)\s+\((?<direction>fetch|push)\)$/;

/**
 * Parse `git remote -vv` output into records
 * Lines that don't look like a remote entry are skipped.
 */
export function parseRemoteList(text: string): RemoteRecord[] {
  const records: RemoteRecord[] = [];

  for (const rawLine of text.split("\n")) {
    const match = REMOTE_LINE.exec(rawLine.trimEnd());
    const groups = match?.groups;
    if (!groups) continue;

    const { name, url } = groups;
    if (!name || !url) continue;

    records.push({ name, url, direction: groups.direction === "push" ? "push" : "fetch" });
  }

  return records;
}

/**
 * Keep only fetch records; browsing always uses the fetch endpoint
 */
export function fetchRecords(records: RemoteRecord[]): RemoteRecord[] {
  return records.filter((record) => record.direction === "fetch");
}

/**
 * Find the web page for a named remote
 *
 * Every fetch entry under that name is tried in order, since a remote can be
 * listed more than once and older entries may not match either layout.
 * Returns null when none of them normalizes.
 */
export function resolveBrowseUrl(
  listing: string,
  remoteName: string = DEFAULTS.remoteName
): string | null {
  for (const record of fetchRecords(parseRemoteList(listing))) {
    if (record.name !== remoteName) continue;

    const url = normalizeRemoteUrl(record.url);
    if (url) return url;
  }

  return null;
}

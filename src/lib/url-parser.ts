import type { ParsedRemoteUrl } from '../types/index.js';

// git@host:user/project.git
const SSH_PATTERN =
  /^git@(?<domain>[a-z0-9\-.]+):(?<user>[a-zA-Z0-9\-_]+)\/(?<project>[a-zA-Z0-9\-_]+)\.git$/;

// https://[creds@]host/user/project.git
const HTTPS_PATTERN =
  /^https:\/\/(?:[a-zA-Z0-9\-_]+@)?(?<domain>[a-z0-9\-.]+)\/(?<user>[a-zA-Z0-9\-_]+)\/(?<project>[a-zA-Z0-9\-_]+)\.git$/;

export const FILE_URL_PREFIX = 'file://';

function fromMatch(match: RegExpExecArray | null): ParsedRemoteUrl | null {
  const groups = match?.groups;
  if (!groups) return null;

  const { domain, user, project } = groups;
  if (!domain || !user || !project) return null;

  return { domain, user, project };
}

/**
 * Match the SSH layout: git@host:user/project.git
 */
export function matchSshUrl(url: string): ParsedRemoteUrl | null {
  return fromMatch(SSH_PATTERN.exec(url));
}

/**
 * Match the HTTPS layout: https://host/user/project.git
 * An optional `user@` credential before the host is accepted and discarded.
 */
export function matchHttpsUrl(url: string): ParsedRemoteUrl | null {
  return fromMatch(HTTPS_PATTERN.exec(url));
}

/**
 * Parse a remote URL, trying SSH first and then HTTPS
 * Returns null when neither layout matches
 */
export function parseRemoteUrl(url: string): ParsedRemoteUrl | null {
  return matchSshUrl(url) ?? matchHttpsUrl(url);
}

/**
 * Check whether a string uses one of the recognized remote layouts
 */
export function isRemoteUrl(url: string): boolean {
  return parseRemoteUrl(url) !== null;
}

export function isFileUrl(url: string): boolean {
  return url.startsWith(FILE_URL_PREFIX);
}

/**
 * Render the web page address for a parsed remote
 */
export function toBrowseUrl(parsed: ParsedRemoteUrl): string {
  return `https://${parsed.domain}/${parsed.user}/${parsed.project}`;
}

/**
 * Convert a remote URL into its browsable https address
 *
 * Converts URLs like:
 * - git@github.com:owner/repo.git → https://github.com/owner/repo
 * - https://token@gitlab.com/owner/repo.git → https://gitlab.com/owner/repo
 */
export function normalizeRemoteUrl(url: string): string | null {
  const parsed = parseRemoteUrl(url);
  return parsed ? toBrowseUrl(parsed) : null;
}

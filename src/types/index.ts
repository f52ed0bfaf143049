/**
 * Shared value types for git-extra
 * Everything here lives for a single invocation; only the catalog file persists.
 */

export type RemoteDirection = "fetch" | "push";

/**
 * One line of `git remote -vv` output
 */
export interface RemoteRecord {
  name: string;
  url: string;
  direction: RemoteDirection;
}

/**
 * Result of matching a remote URL against the SSH or HTTPS layout
 */
export interface ParsedRemoteUrl {
  domain: string; // host only, no scheme or credentials
  user: string;
  project: string; // never ends in ".git"
}

export interface CatalogEntry {
  name: string; // unique key in repos.toml
  origin: string; // clone URL
  customizer?: string; // file name relative to the new project directory
  description?: string;
}

export type Catalog = ReadonlyMap<string, CatalogEntry>;

export interface ProvisionRequest {
  sourceText: string;
  targetDirectory: string;
  customizerOverride?: string;
}

export type SourceKind = "url" | "file" | "catalog";

/**
 * Where to clone from, plus the customizer name before any command-line override
 */
export interface ResolvedSource {
  kind: SourceKind;
  cloneUrl: string;
  customizerCandidate: string;
}

export type ProvisionState =
  | "resolving-source"
  | "cloning"
  | "checking-customizer"
  | "running-customizer"
  | "done"
  | "failed";

export interface ProvisionOutcome {
  cloneUrl: string;
  directory: string;
  customizerPath: string;
  customizerRan: boolean;
}

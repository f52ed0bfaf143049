/**
 * Fatal errors raised while provisioning or reading the catalog
 * Commands print `message` and exit with `exitCode`.
 */

export type GitExtraErrorCode =
  | "UNRECOGNIZED_SOURCE"
  | "CATALOG_MALFORMED"
  | "CLONE_FAILED"
  | "CUSTOMIZER_FAILED";

export class GitExtraError extends Error {
  readonly code: GitExtraErrorCode;
  readonly exitCode: number;

  constructor(code: GitExtraErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GitExtraError";
    this.code = code;
    this.exitCode = 1;
  }
}

export class UnrecognizedSourceError extends GitExtraError {
  readonly source: string;

  constructor(source: string) {
    super(
      "UNRECOGNIZED_SOURCE",
      `Repository '${source}' is not a URL or a catalog name\n` +
        `Expected SSH (git@host:user/project.git), HTTPS (https://host/user/project.git), ` +
        `a local path starting with file://, or a name from the quick-start catalog`
    );
    this.name = "UnrecognizedSourceError";
    this.source = source;
  }
}

export class CatalogError extends GitExtraError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super("CATALOG_MALFORMED", `Catalog file '${path}' is invalid: ${detail}`, options);
    this.name = "CatalogError";
    this.path = path;
  }
}

export class CloneError extends GitExtraError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super("CLONE_FAILED", `Unable to run \`git clone\` for '${url}': ${describeError(cause)}`, {
      cause,
    });
    this.name = "CloneError";
    this.url = url;
  }
}

export class CustomizerError extends GitExtraError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(
      "CUSTOMIZER_FAILED",
      `There was a problem running customizer file '${path}': ${detail}`,
      options
    );
    this.name = "CustomizerError";
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message.trim() : String(error);
}

/**
 * Exit status for an error that reached a command
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof GitExtraError ? error.exitCode : 1;
}

import type { Catalog, ResolvedSource } from "../types/index.js";
import { findEntry } from "./catalog.js";
import { DEFAULTS } from "./config.js";
import { UnrecognizedSourceError } from "./errors.js";
import { FILE_URL_PREFIX, isFileUrl, isRemoteUrl } from "./url-parser.js";

/**
 * Decide where to clone from
 *
 * Resolution order, first match wins:
 * 1. SSH or HTTPS remote URL, used verbatim
 * 2. file:// URL, with the prefix stripped
 * 3. catalog name, using the entry's origin and customizer
 *
 * Literal URLs are checked before the catalog so a catalog key can never
 * shadow a URL typed on the command line.
 */
export function resolveSource(sourceText: string, catalog: Catalog): ResolvedSource {
  if (isRemoteUrl(sourceText)) {
    return {
      kind: "url",
      cloneUrl: sourceText,
      customizerCandidate: DEFAULTS.customizer,
    };
  }

  if (isFileUrl(sourceText)) {
    return {
      kind: "file",
      cloneUrl: sourceText.slice(FILE_URL_PREFIX.length),
      customizerCandidate: DEFAULTS.customizer,
    };
  }

  const entry = findEntry(catalog, sourceText);
  if (entry) {
    return {
      kind: "catalog",
      cloneUrl: entry.origin,
      customizerCandidate: entry.customizer ?? DEFAULTS.customizer,
    };
  }

  throw new UnrecognizedSourceError(sourceText);
}

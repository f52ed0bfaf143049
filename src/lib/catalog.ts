import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { parse, TomlError } from "smol-toml";
import pc from "picocolors";
import type { Catalog, CatalogEntry } from "../types/index.js";
import { getCatalogPath } from "./config.js";
import { CatalogError } from "./errors.js";
import type { Log } from "./log.js";
import { normalizeCatalog } from "./schema.js";

/**
 * Create an empty catalog
 */
export function createEmptyCatalog(): Catalog {
  return new Map();
}

/**
 * Read the quick-start catalog from disk
 *
 * A missing file is not an error: the catalog is empty and a warning names
 * the path that was expected. A file that exists but doesn't parse is fatal.
 */
export async function readCatalog(log: Log, path: string = getCatalogPath()): Promise<Catalog> {
  if (!existsSync(path)) {
    log.warning(`'${path}' not found`);
    return createEmptyCatalog();
  }

  const content = await readFile(path, "utf-8");

  let data: unknown;
  try {
    data = parse(content);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new CatalogError(path, error.message, { cause: error });
    }
    throw error;
  }

  try {
    const normalized = normalizeCatalog(data);
    for (const issue of normalized.issues) {
      log.warning(`${path}: ${issue}`);
    }
    return normalized.data;
  } catch (error) {
    throw new CatalogError(path, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

/**
 * Find a catalog entry by name
 */
export function findEntry(catalog: Catalog, name: string): CatalogEntry | undefined {
  return catalog.get(name);
}

/**
 * Catalog entries in name order
 */
export function sortedEntries(catalog: Catalog): CatalogEntry[] {
  return [...catalog.values()].sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Render the catalog as aligned `name  origin` lines
 * Entries with a description get it on an indented second line.
 */
export function formatCatalog(catalog: Catalog): string[] {
  const entries = sortedEntries(catalog);
  if (entries.length === 0) return [];

  const width = Math.max(...entries.map((entry) => entry.name.length)) + 3;
  const indent = " ".repeat(width);

  return entries.map((entry) => {
    const header = `${entry.name.padEnd(width)} ${entry.origin}`;
    return entry.description ? `${header}\n${indent} ${pc.bold(entry.description)}` : header;
  });
}

import type { Catalog, CatalogEntry } from '../types/index.js';

type NormalizationResult<T> = {
  data: T;
  changed: boolean;
  issues: string[];
};

const CATALOG_ENTRY_KEYS = new Set(['origin', 'customizer', 'description']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  name: string,
  issues: string[]
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.length > 0) return value;

  issues.push(`${name} dropped invalid ${key}`);
  return undefined;
}

function normalizeCatalogEntry(
  name: string,
  raw: Record<string, unknown>,
  issues: string[]
): { entry: CatalogEntry; changed: boolean } {
  const before = issues.length;

  for (const key of Object.keys(raw)) {
    if (!CATALOG_ENTRY_KEYS.has(key)) {
      issues.push(`${name} dropped unknown field "${key}"`);
    }
  }

  if (typeof raw.origin !== 'string' || raw.origin.length === 0) {
    throw new Error(`entry "${name}" is missing origin`);
  }

  const entry: CatalogEntry = { name, origin: raw.origin };

  const customizer = optionalString(raw, 'customizer', name, issues);
  if (customizer !== undefined) entry.customizer = customizer;

  const description = optionalString(raw, 'description', name, issues);
  if (description !== undefined) entry.description = description;

  return { entry, changed: issues.length !== before };
}

/**
 * Validate a parsed repos.toml document
 *
 * Every top-level key names an entry. A missing origin is fatal; unknown or
 * mistyped optional fields are dropped and reported in `issues`.
 */
export function normalizeCatalog(raw: unknown): NormalizationResult<Catalog> {
  if (!isRecord(raw)) {
    throw new Error('expected a table of named repositories');
  }

  const issues: string[] = [];
  let changed = false;
  const entries = new Map<string, CatalogEntry>();

  for (const [name, value] of Object.entries(raw)) {
    if (!isRecord(value)) {
      throw new Error(`entry "${name}" must be a table`);
    }

    const normalized = normalizeCatalogEntry(name, value, issues);
    if (normalized.changed) {
      changed = true;
    }
    entries.set(name, normalized.entry);
  }

  return { data: entries, changed, issues };
}

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { CatalogFileSchema } from '../config/schema.js';
import type { Catalog, CatalogEntry, CatalogFile } from '../types/catalog.js';
import { ConfigError, errorMessage } from './errors.js';

export const LIST_HEADER = 'Available packages (not all may be available on all platforms):';

export function parseCatalog(raw: string, path: string): Catalog {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid YAML: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = CatalogFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config file ${path} is malformed: ${issues}`);
  }

  return { path, entries: buildEntries(result.data) };
}

export function loadCatalog(path: string): Catalog {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return parseCatalog(raw, path);
}

function buildEntries(file: CatalogFile): Map<string, CatalogEntry> {
  const entries = new Map<string, CatalogEntry>();
  for (const name of file['classic-cbdeps'].packages) {
    entries.set(name, { kind: 'legacy', name });
  }
  // Detailed descriptors shadow a legacy name listed in both sections
  for (const [name, descriptor] of Object.entries(file.packages)) {
    entries.set(name, { kind: 'detailed', name, descriptor });
  }
  return entries;
}

export function lookupEntry(catalog: Catalog, name: string): CatalogEntry | undefined {
  return catalog.entries.get(name);
}

export function listPackageNames(catalog: Catalog): string[] {
  return [...catalog.entries.keys()].sort();
}

/** Lines printed by `cbdep list`, including the header and trailing blank line. */
export function formatPackageList(catalog: Catalog): string[] {
  return [LIST_HEADER, ...listPackageNames(catalog).map((name) => `  ${name}`), ''];
}

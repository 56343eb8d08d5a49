import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { UpdaterError, ErrorCode } from '../lib/errors.js';
import { formatConfigError } from '../config/loader.js';
import { catalogSchema, type Catalog } from './types.js';

/**
 * Locations of the bundled catalog, package root first: one level up
 * from the bundle (dist/index.js), two up from the sources
 * (src/catalog/loader.ts). Seen from the bundle, two levels up is
 * outside the package, so that candidate must come last.
 */
const CATALOG_CANDIDATES = [
  new URL('../catalog/default-steps.yaml', import.meta.url),
  new URL('../../catalog/default-steps.yaml', import.meta.url),
];

export function defaultCatalogPath(candidates: readonly URL[] = CATALOG_CANDIDATES): string {
  for (const url of candidates) {
    const path = fileURLToPath(url);
    if (existsSync(path)) return path;
  }
  throw new UpdaterError(
    ErrorCode.CATALOG_NOT_FOUND,
    'default step catalog not found',
    'Reinstall mac-updater; catalog/default-steps.yaml is missing',
  );
}

/** Parse a catalog YAML string. Throws UpdaterError on failure. */
export function parseCatalogYaml(content: string, source = 'catalog'): Catalog {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new UpdaterError(
      ErrorCode.CATALOG_INVALID,
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    throw new UpdaterError(ErrorCode.CATALOG_INVALID, formatConfigError(result.error));
  }
  return result.data;
}

export function loadCatalog(path: string = defaultCatalogPath()): Catalog {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    throw new UpdaterError(ErrorCode.CATALOG_NOT_FOUND, `step catalog not found: ${path}`);
  }
  return parseCatalogYaml(content, path);
}

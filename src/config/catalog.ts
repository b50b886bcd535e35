/**
 * Discovery Catalog Configuration
 *
 * Environment templates, path suffixes and parameter names live in
 * data/catalog.json. The catalog size bounds the per-target fetch volume:
 * at most (templates + 1) × paths candidates per target.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export interface DiscoveryCatalog {
  version: number;
  /** `dev.` prefixes the host; `{label}-dev` rewrites the leftmost label */
  environmentTemplates: readonly string[];
  /** Path suffixes, `/#/…` entries are SPA hash routes */
  paths: readonly string[];
  /** Parameter names the pattern miner reports when used as keys */
  parameterNames: readonly string[];
}

export const LABEL_PLACEHOLDER = '{label}';

export const CATALOG_PATH = fileURLToPath(new URL('../../data/catalog.json', import.meta.url));

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isValidCatalog(value: unknown): value is DiscoveryCatalog {
  if (!value || typeof value !== 'object') return false;
  if (!('version' in value && 'environmentTemplates' in value && 'paths' in value && 'parameterNames' in value)) {
    return false;
  }
  return (
    typeof value.version === 'number' &&
    isStringArray(value.environmentTemplates) &&
    isStringArray(value.paths) &&
    value.paths.every((path) => path.startsWith('/')) &&
    isStringArray(value.parameterNames)
  );
}

export function loadCatalog(path: string = CATALOG_PATH): DiscoveryCatalog {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!isValidCatalog(parsed)) {
    throw new Error(`Malformed discovery catalog: ${path}`);
  }
  return Object.freeze({
    version: parsed.version,
    environmentTemplates: Object.freeze([...parsed.environmentTemplates]),
    paths: Object.freeze([...parsed.paths]),
    parameterNames: Object.freeze([...parsed.parameterNames]),
  });
}

let cached: DiscoveryCatalog | null = null;

/**
 * The bundled catalog, read once per process
 */
export function getDefaultCatalog(): DiscoveryCatalog {
  if (!cached) {
    cached = loadCatalog();
  }
  return cached;
}

/**
 * Hash routes the expander already fetches (`/#/admin` → `#/admin`)
 */
export function knownHashRoutes(catalog: DiscoveryCatalog): Set<string> {
  const routes = new Set<string>();
  for (const path of catalog.paths) {
    const idx = path.indexOf('#/');
    if (idx === -1) continue;
    routes.add(normalizeHashRoute(path.slice(idx)));
  }
  return routes;
}

/**
 * Paths fetched on behalf of hash routes (`/#/admin` → `/`)
 */
export function hashRouteBases(catalog: DiscoveryCatalog): Set<string> {
  const bases = new Set<string>();
  for (const path of catalog.paths) {
    const idx = path.indexOf('#');
    if (idx !== -1) bases.add(path.slice(0, idx));
  }
  return bases;
}

/**
 * `#/Admin/` → `#/admin`
 */
export function normalizeHashRoute(route: string): string {
  const trimmed = route.trim().toLowerCase();
  return trimmed.length > 2 ? trimmed.replace(/\/+$/, '') : trimmed;
}

export default { loadCatalog, getDefaultCatalog, knownHashRoutes, hashRouteBases };

/* =============================================================================
 * MODULE: spaRouteDetector.ts
 * =============================================================================
 * Hash routes (`#/route`) a single-page app exposes in its links or scripts
 * that the catalog does not already fetch.
 * =============================================================================
 */

import { defineScanner, type IDiscoveryScanner } from '../core/IDiscoveryScanner.js';
import { bodyText, type Candidate, type Discovery, type FetchResult } from '../core/types.js';
import { getDefaultCatalog, knownHashRoutes, normalizeHashRoute, type DiscoveryCatalog } from '../config/catalog.js';
import { extractAnchorHrefs, isHtmlResponse, parseDocument } from '../util/htmlAssets.js';

const QUOTED_HASH_ROUTE = /["'`]\/?(#\/[A-Za-z0-9_\-/.:]*)["'`]/g;

const MAX_ROUTES_PER_RESPONSE = 50;

function anchorRoutes(result: FetchResult, origin: URL): string[] {
  const routes: string[] = [];
  for (const href of extractAnchorHrefs(parseDocument(bodyText(result)))) {
    if (href.startsWith('#/')) {
      routes.push(href);
      continue;
    }
    if (!URL.canParse(href, result.finalUrl)) continue;
    const url = new URL(href, result.finalUrl);
    if (url.host === origin.host && url.hash.startsWith('#/')) routes.push(url.hash);
  }
  return routes;
}

function scriptRoutes(body: string): string[] {
  const routes: string[] = [];
  for (const match of body.matchAll(QUOTED_HASH_ROUTE)) {
    if (match[1]) routes.push(match[1]);
  }
  return routes;
}

export function createSpaRouteScanner(catalog: DiscoveryCatalog = getDefaultCatalog()): IDiscoveryScanner {
  const known = knownHashRoutes(catalog);

  const detectSpaRoutes = (candidate: Candidate, result: FetchResult): Discovery[] => {
    const status = result.status;
    if (result.error || status === undefined || status < 200 || status >= 300) return [];

    const origin = new URL(result.finalUrl);
    const found = isHtmlResponse(result) ? anchorRoutes(result, origin) : [];
    found.push(...scriptRoutes(bodyText(result)));

    const discoveries: Discovery[] = [];
    const emitted = new Set<string>();
    for (const raw of found) {
      const route = normalizeHashRoute(raw);
      if (route === '#/' || known.has(route) || emitted.has(route)) continue;
      emitted.add(route);
      discoveries.push({
        kind: 'SpaRouteHit',
        value: `${origin.origin}/${route}`,
        source: candidate.url,
        status,
      });
      if (discoveries.length >= MAX_ROUTES_PER_RESPONSE) break;
    }
    return discoveries;
  };

  return defineScanner(
    {
      id: 'spa_route',
      name: 'SPA Route Detector',
      description: 'Hash routes linked or referenced by single-page apps',
      produces: ['SpaRouteHit'],
    },
    detectSpaRoutes
  );
}

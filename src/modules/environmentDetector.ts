/* =============================================================================
 * MODULE: environmentDetector.ts
 * =============================================================================
 * Live environment subdomains: a permutation host answering 2xx/3xx on any
 * catalog path with something other than a challenge or soft-error page.
 * The value is `scheme://host`, so the store keeps one line per host.
 * =============================================================================
 */

import { defineScanner } from '../core/IDiscoveryScanner.js';
import { bodyText, type Candidate, type Discovery, type FetchResult } from '../core/types.js';
import { isFalsePositivePage } from './falsePositives.js';
import { extractTitle, isHtmlResponse, parseDocument } from '../util/htmlAssets.js';

export function detectEnvironment(candidate: Candidate, result: FetchResult): Discovery[] {
  const status = result.status;
  if (result.error || status === undefined || status < 200 || status >= 400) return [];

  const body = bodyText(result);
  if (isFalsePositivePage(body)) return [];

  const title = isHtmlResponse(result) ? extractTitle(parseDocument(body)) : undefined;

  return [
    {
      kind: 'EnvironmentHit',
      value: `${result.scheme}://${candidate.host}`,
      source: candidate.url,
      status,
      ...(title ? { detail: title } : {}),
    },
  ];
}

export const environmentScanner = defineScanner(
  {
    id: 'environment',
    name: 'Environment Detector',
    description: 'Environment subdomains that answer with a live page',
    produces: ['EnvironmentHit'],
  },
  detectEnvironment,
  {
    appliesTo: (candidate) => candidate.kind === 'permutation',
  }
);

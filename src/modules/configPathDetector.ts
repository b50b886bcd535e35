/* =============================================================================
 * MODULE: configPathDetector.ts
 * =============================================================================
 * Sensitive and versioned paths that answer 200 where they were asked.
 * A redirect to another path (login pages, the home page) does not count.
 * =============================================================================
 */

import { defineScanner } from '../core/IDiscoveryScanner.js';
import { bodyText, type Candidate, type Discovery, type FetchResult } from '../core/types.js';
import { isFalsePositivePage } from './falsePositives.js';

const CONFIG_PATH_PATTERNS: readonly RegExp[] = [
  /^\/internal(?:\/|$)/i,
  /^\/config(?:\.json|\.ya?ml|\/|$)/i,
  /^\/admin(?:\/|$)/i,
  /^\/(?:api\/)?v\d+(?:\/|$)/i,
  /^\/actuator(?:\/|$)/i,
  /^\/debug(?:\/|$)/i,
  /^\/server-status\/?$/i,
];

export function isConfigPath(pathname: string): boolean {
  return CONFIG_PATH_PATTERNS.some((pattern) => pattern.test(pathname));
}

export function detectConfigPath(candidate: Candidate, result: FetchResult): Discovery[] {
  if (result.error || result.status !== 200) return [];

  const requested = new URL(result.url).pathname;
  if (!isConfigPath(requested)) return [];
  if (new URL(result.finalUrl).pathname !== requested) return [];
  if (isFalsePositivePage(bodyText(result))) return [];

  return [
    {
      kind: 'ConfigPathHit',
      value: result.url,
      source: candidate.url,
      status: result.status,
    },
  ];
}

export const configPathScanner = defineScanner(
  {
    id: 'config_path',
    name: 'Config Path Detector',
    description: 'Admin, config, internal, debug and versioned API paths',
    produces: ['ConfigPathHit'],
  },
  detectConfigPath,
  {
    appliesTo: (candidate) => candidate.kind !== 'asset',
  }
);

import { LABEL_PLACEHOLDER, type DiscoveryCatalog } from '../config/catalog.js';
import type { Candidate, CandidateKind, Target } from '../core/types.js';
import { isValidHostname } from '../core/validation.js';

export interface PermutedHost {
  host: string;
  /** Template that produced it; absent for the target itself */
  template?: string;
}

/**
 * Apply one environment template to a host.
 * Returns null when the template does not apply (label templates on an apex host).
 */
export function applyTemplate(host: string, template: string): string | null {
  if (!template.includes(LABEL_PLACEHOLDER)) {
    return `${template}${host}`;
  }

  const labels = host.split('.');
  if (labels.length < 3) return null;

  const [leftmost, ...rest] = labels;
  return [template.split(LABEL_PLACEHOLDER).join(leftmost), ...rest].join('.');
}

/**
 * Target host followed by its environment permutations, in template order
 */
export function permuteHosts(target: Target, catalog: DiscoveryCatalog): PermutedHost[] {
  const hosts: PermutedHost[] = [{ host: target.host }];
  if (target.isIpAddress) return hosts;

  const seen = new Set<string>([target.host]);
  for (const template of catalog.environmentTemplates) {
    const host = applyTemplate(target.host, template);
    if (!host || seen.has(host) || !isValidHostname(host)) continue;
    seen.add(host);
    hosts.push({ host, template });
  }
  return hosts;
}

export function buildCandidate(
  origin: Target,
  host: string,
  path: string,
  kind: CandidateKind,
  template?: string
): Candidate {
  const candidate: Candidate = {
    url: `https://${host}${path}`,
    scheme: 'https',
    host,
    path,
    origin,
    kind,
    ...(template !== undefined ? { template } : {}),
  };
  return Object.freeze(candidate);
}

/**
 * Every candidate for one target: hosts in template order, paths in catalog order.
 * Pure and restartable.
 */
export function expandTarget(target: Target, catalog: DiscoveryCatalog): Candidate[] {
  const candidates: Candidate[] = [];
  for (const { host, template } of permuteHosts(target, catalog)) {
    const kind: CandidateKind = template === undefined ? 'origin' : 'permutation';
    for (const path of catalog.paths) {
      candidates.push(buildCandidate(target, host, path, kind, template));
    }
  }
  return candidates;
}

/**
 * Lazy candidate stream over all targets, so the scheduler pulls as slots free up
 */
export function* candidateStream(targets: Iterable<Target>, catalog: DiscoveryCatalog): Generator<Candidate> {
  for (const target of targets) {
    yield* expandTarget(target, catalog);
  }
}

export function maxCandidatesPerTarget(catalog: DiscoveryCatalog): number {
  return (catalog.environmentTemplates.length + 1) * catalog.paths.length;
}

/**
 * Candidate for a linked JS asset found on a page of `origin`
 */
export function buildAssetCandidate(origin: Target, url: URL): Candidate {
  const candidate: Candidate = {
    url: url.href,
    scheme: url.protocol === 'http:' ? 'http' : 'https',
    host: url.hostname,
    path: `${url.pathname}${url.search}`,
    origin,
    kind: 'asset',
  };
  return Object.freeze(candidate);
}

/**
 * Shared type definitions used across the recon pipeline
 */

// =============================================================================
// Targets & Candidates
// =============================================================================

/**
 * A normalized host under enumeration (lowercase, no scheme/port/userinfo/path)
 */
export interface Target {
  readonly host: string;
  /** Dotted-quad hosts are kept but get no permutations and no JS mining */
  readonly isIpAddress: boolean;
}

export type CandidateKind = 'origin' | 'permutation' | 'asset';

export type Scheme = 'https' | 'http';

/**
 * A concrete URL to fetch. Immutable once created.
 */
export interface Candidate {
  readonly url: string;
  readonly scheme: Scheme;
  readonly host: string;
  /** Path as generated, may carry a `#/` hash route */
  readonly path: string;
  /** Back-reference to the Target the candidate was derived from */
  readonly origin: Target;
  readonly kind: CandidateKind;
  /** Environment template that produced the host, for permutations */
  readonly template?: string;
}

// =============================================================================
// Fetch results
// =============================================================================

export const FETCH_ERROR_KINDS = ['NetworkError', 'Timeout', 'RedirectLoop'] as const;

export type FetchErrorKind = (typeof FETCH_ERROR_KINDS)[number];

export interface FetchResult {
  /** URL of the first request (fragment stripped) */
  readonly url: string;
  /** URL that produced the final response, after redirects and scheme fallback */
  readonly finalUrl: string;
  readonly scheme: Scheme;
  /** Absent when the fetch failed */
  readonly status?: number;
  /** Lowercased header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
  readonly truncated: boolean;
  readonly elapsedMs: number;
  readonly redirects: number;
  /** Transport calls made for this candidate */
  readonly requests: number;
  readonly schemeFallback: boolean;
  readonly error?: FetchErrorKind;
  readonly errorMessage?: string;
}

/**
 * Case-insensitive header lookup
 */
export function headerValue(result: Pick<FetchResult, 'headers'>, name: string): string {
  return result.headers[name.toLowerCase()] ?? '';
}

const bodyTextCache = new WeakMap<FetchResult, string>();

/**
 * Body decoded as UTF-8, decoded once per result
 */
export function bodyText(result: FetchResult): string {
  let text = bodyTextCache.get(result);
  if (text === undefined) {
    text = result.body.toString('utf8');
    bodyTextCache.set(result, text);
  }
  return text;
}

// =============================================================================
// Discoveries
// =============================================================================

export const DISCOVERY_KINDS = [
  'EnvironmentHit',
  'ApiDocHit',
  'SpaRouteHit',
  'JsEndpoint',
  'JsParameter',
  'ConfigPathHit',
] as const;

export type DiscoveryKind = (typeof DISCOVERY_KINDS)[number];

/**
 * Output tag written in front of every line
 */
export const DISCOVERY_TAGS: Record<DiscoveryKind, string> = {
  EnvironmentHit: 'DISCOVERY',
  ApiDocHit: 'API-DOC',
  SpaRouteHit: 'SPA-ROUTE',
  JsEndpoint: 'JS-ENDPOINT',
  JsParameter: 'PARAM',
  ConfigPathHit: 'CONFIG',
} as const;

export interface Discovery {
  readonly kind: DiscoveryKind;
  /** URL, endpoint or parameter name; the dedup value */
  readonly value: string;
  /** Candidate URL the discovery came from */
  readonly source: string;
  readonly status?: number;
  readonly detail?: string;
}

export function isDiscoveryKind(value: unknown): value is DiscoveryKind {
  return typeof value === 'string' && (DISCOVERY_KINDS as readonly string[]).includes(value);
}

// =============================================================================
// Run configuration values
// =============================================================================

export const VERBOSITY_MODES = ['debug', 'verbose', 'discovery', 'quiet'] as const;

export type Verbosity = (typeof VERBOSITY_MODES)[number];

export const JS_MINING_MODES = ['pattern', 'evaluation'] as const;

export type JsMiningMode = (typeof JS_MINING_MODES)[number];

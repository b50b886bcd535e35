import type { DiscoveryCatalog } from '../src/config/catalog.js';
import type { Candidate, CandidateKind, FetchResult, Target } from '../src/core/types.js';
import { buildCandidate } from '../src/util/candidateExpander.js';
import { TransportError, type HttpResponse, type HttpTransport } from '../src/net/httpClient.js';

export const exampleTarget: Target = { host: 'example.com', isIpAddress: false };

export function candidate(
  path: string,
  options: { host?: string; kind?: CandidateKind; template?: string; target?: Target } = {}
): Candidate {
  const target = options.target ?? exampleTarget;
  return buildCandidate(target, options.host ?? target.host, path, options.kind ?? 'origin', options.template);
}

export function fetchResult(
  url: string,
  status: number,
  body: string,
  headers: Record<string, string> = {},
  overrides: Partial<FetchResult> = {}
): FetchResult {
  return {
    url,
    finalUrl: url,
    scheme: url.startsWith('http://') ? 'http' : 'https',
    status,
    headers,
    body: Buffer.from(body, 'utf8'),
    truncated: false,
    elapsedMs: 1,
    redirects: 0,
    requests: 1,
    schemeFallback: false,
    ...overrides,
  };
}

export function errorResult(url: string, error: FetchResult['error'] = 'NetworkError'): FetchResult {
  return {
    url,
    finalUrl: url,
    scheme: 'https',
    headers: {},
    body: Buffer.alloc(0),
    truncated: false,
    elapsedMs: 1,
    redirects: 0,
    requests: 1,
    schemeFallback: false,
    error,
  };
}

export type Route =
  | { status: number; body?: string; headers?: Record<string, string> }
  | TransportError;

/**
 * In-process transport answering from a URL → response table
 */
export class FakeTransport implements HttpTransport {
  readonly calls: string[] = [];
  active = 0;
  peak = 0;
  closed = false;

  constructor(
    private readonly routes: Record<string, Route>,
    private readonly delayMs = 0
  ) {}

  async get(url: string): Promise<HttpResponse> {
    this.calls.push(url);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const route = this.routes[url];
      if (!route) {
        throw new TransportError('NetworkError', `no route for ${url}`, 'ECONNREFUSED');
      }
      if (route instanceof TransportError) throw route;
      return {
        status: route.status,
        headers: route.headers ?? {},
        body: Buffer.from(route.body ?? '', 'utf8'),
        truncated: false,
        url,
      };
    } finally {
      this.active--;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const smallCatalog: DiscoveryCatalog = {
  version: 1,
  environmentTemplates: ['dev.', '{label}-dev', 'staging.'],
  paths: ['/', '/swagger.json'],
  parameterNames: ['api_key'],
};

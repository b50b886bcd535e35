/**
 * One Candidate → one FetchResult.
 *
 * Walks redirects hop by hop, retries an https connection failure once over
 * http, and folds every transport failure into the result's error kind.
 */

import type { Candidate, FetchErrorKind, FetchResult, Scheme } from '../core/types.js';
import { scanner } from '../core/env.js';
import { describeError, systemErrorCode } from '../core/errors.js';
import { isDnsFailure, TransportError, type HttpResponse, type HttpTransport } from './httpClient.js';

export interface FetchPolicy {
  timeoutMs: number;
  maxRedirects: number;
  maxBodyBytes: number;
  /** Retry once over http when https cannot connect */
  schemeFallback: boolean;
}

export const DEFAULT_FETCH_POLICY: FetchPolicy = Object.freeze({
  timeoutMs: scanner.REQUEST_TIMEOUT_MS,
  maxRedirects: scanner.MAX_REDIRECTS,
  maxBodyBytes: scanner.MAX_BODY_BYTES,
  schemeFallback: scanner.SCHEME_FALLBACK,
});

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

interface WalkOutcome {
  response?: HttpResponse;
  finalUrl: string;
  redirects: number;
  error?: FetchErrorKind;
  errorMessage?: string;
  errorCode?: string;
}

export function stripFragment(url: string): string {
  const idx = url.indexOf('#');
  return idx === -1 ? url : url.slice(0, idx);
}

/**
 * Absolute http(s) target of a Location header, or null when it cannot be followed
 */
function resolveLocation(location: string, base: string): string | null {
  if (!URL.canParse(location, base)) return null;
  const next = new URL(location, base);
  if (next.protocol !== 'http:' && next.protocol !== 'https:') return null;
  next.hash = '';
  return next.toString();
}

export async function fetchCandidate(
  candidate: Candidate,
  transport: HttpTransport,
  policy: FetchPolicy = DEFAULT_FETCH_POLICY,
  signal?: AbortSignal
): Promise<FetchResult> {
  const started = Date.now();
  let requests = 0;

  const walk = async (startUrl: string): Promise<WalkOutcome> => {
    const visited = new Set<string>([startUrl]);
    let current = startUrl;
    let redirects = 0;

    for (;;) {
      let response: HttpResponse;
      try {
        requests++;
        response = await transport.get(current, {
          timeout: policy.timeoutMs,
          maxBodyBytes: policy.maxBodyBytes,
          signal,
        });
      } catch (error) {
        const failure =
          error instanceof TransportError
            ? error
            : new TransportError('NetworkError', describeError(error), systemErrorCode(error), error);
        return {
          finalUrl: current,
          redirects,
          error: failure.kind,
          errorMessage: failure.message,
          errorCode: failure.code,
        };
      }

      const location = response.headers['location'];
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return { response, finalUrl: current, redirects };
      }

      const next = resolveLocation(location, current);
      if (!next) {
        return { response, finalUrl: current, redirects };
      }

      if (visited.has(next) || redirects >= policy.maxRedirects) {
        return {
          finalUrl: current,
          redirects,
          error: 'RedirectLoop',
          errorMessage: visited.has(next)
            ? `redirect revisits ${next}`
            : `more than ${policy.maxRedirects} redirects`,
        };
      }

      visited.add(next);
      redirects++;
      current = next;
    }
  };

  const url = stripFragment(candidate.url);
  let scheme: Scheme = candidate.scheme;
  let schemeFallback = false;
  let outcome = await walk(url);

  if (
    policy.schemeFallback &&
    scheme === 'https' &&
    outcome.error === 'NetworkError' &&
    outcome.redirects === 0 &&
    !isDnsFailure(outcome.errorCode) &&
    !signal?.aborted
  ) {
    scheme = 'http';
    schemeFallback = true;
    outcome = await walk(`http://${url.slice('https://'.length)}`);
  }

  const base = {
    url,
    finalUrl: outcome.finalUrl,
    scheme,
    redirects: outcome.redirects,
    requests,
    schemeFallback,
    elapsedMs: Date.now() - started,
  };

  if (outcome.response && !outcome.error) {
    return {
      ...base,
      status: outcome.response.status,
      headers: outcome.response.headers,
      body: outcome.response.body,
      truncated: outcome.response.truncated,
    };
  }

  return {
    ...base,
    headers: {},
    body: Buffer.alloc(0),
    truncated: false,
    error: outcome.error ?? 'NetworkError',
    ...(outcome.errorMessage !== undefined ? { errorMessage: outcome.errorMessage } : {}),
  };
}

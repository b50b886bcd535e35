/**
 * HTTP Client - single-hop undici GET with timeout and body ceiling
 *
 * Redirects are never followed here; fetchCandidate walks them one hop at a
 * time so the hop limit is exact.
 */

import { Agent, request, type Dispatcher } from 'undici';
import type { FetchErrorKind } from '../core/types.js';
import { describeError, systemErrorCode } from '../core/errors.js';

export interface HttpClientOptions {
  timeout?: number;
  maxBodyBytes?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
  truncated: boolean;
  url: string;
}

/**
 * One request, one response; implementations must not follow redirects
 */
export interface HttpTransport {
  get(url: string, options?: HttpClientOptions): Promise<HttpResponse>;
  /** Release pooled connections */
  close?(): Promise<void>;
}

export class TransportError extends Error {
  readonly kind: FetchErrorKind;
  readonly code?: string;

  constructor(kind: FetchErrorKind, message: string, code?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.code = code;
  }
}

export interface HttpTransportConfig {
  userAgent?: string;
  /** Verify TLS certificates (ignored when a dispatcher is supplied) */
  tlsVerify?: boolean;
  dispatcher?: Dispatcher;
}

const DEFAULT_TIMEOUT = 10000;
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;
const DEFAULT_USER_AGENT = 'env-recon/1.0';

const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'ETIMEDOUT']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME', 'EAI_NODATA']);

export function isDnsFailure(code: string | undefined): boolean {
  return code !== undefined && DNS_CODES.has(code);
}

function flattenHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

async function readBody(
  stream: AsyncIterable<Uint8Array>,
  maxBodyBytes: number
): Promise<{ body: Buffer; truncated: boolean }> {
  const chunks: Buffer[] = [];
  let size = 0;
  let truncated = false;

  for await (const chunk of stream) {
    const buf = Buffer.from(chunk);
    if (size + buf.length > maxBodyBytes) {
      chunks.push(buf.subarray(0, maxBodyBytes - size));
      size = maxBodyBytes;
      truncated = true;
      // leaving the loop destroys the socket stream
      break;
    }
    chunks.push(buf);
    size += buf.length;
  }

  return { body: Buffer.concat(chunks, size), truncated };
}

function toTransportError(error: unknown, timedOut: boolean): TransportError {
  if (error instanceof TransportError) return error;
  const code = systemErrorCode(error);
  if (timedOut || (code !== undefined && TIMEOUT_CODES.has(code))) {
    return new TransportError('Timeout', timedOut ? 'request timed out' : describeError(error), code, error);
  }
  return new TransportError('NetworkError', describeError(error), code, error);
}

export function createHttpTransport(config: HttpTransportConfig = {}): HttpTransport {
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  // a supplied dispatcher belongs to the caller and is left open by close()
  const ownsDispatcher = config.dispatcher === undefined;
  const dispatcher =
    config.dispatcher ?? new Agent({ connect: { rejectUnauthorized: config.tlsVerify ?? true } });

  async function httpGet(url: string, options: HttpClientOptions = {}): Promise<HttpResponse> {
    const { timeout = DEFAULT_TIMEOUT, maxBodyBytes = DEFAULT_MAX_BODY_BYTES, headers = {}, signal } = options;

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await request(url, {
        method: 'GET',
        headers: {
          'user-agent': userAgent,
          accept: '*/*',
          ...headers,
        },
        signal: controller.signal,
        dispatcher,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const { body, truncated } = await readBody(response.body, maxBodyBytes);

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
        truncated,
        url,
      };
    } catch (error) {
      throw toTransportError(error, timedOut);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async function close(): Promise<void> {
    if (ownsDispatcher) await dispatcher.close();
  }

  return { get: httpGet, close };
}

export default { createHttpTransport, isDnsFailure };

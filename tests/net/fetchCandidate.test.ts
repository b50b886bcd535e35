import { describe, expect, it } from 'vitest';
import { fetchCandidate, stripFragment, type FetchPolicy } from '../../src/net/fetchCandidate.js';
import { TransportError } from '../../src/net/httpClient.js';
import { candidate, FakeTransport } from '../helpers.js';

const policy: FetchPolicy = {
  timeoutMs: 1000,
  maxRedirects: 5,
  maxBodyBytes: 1024,
  schemeFallback: true,
};

describe('fetchCandidate', () => {
  it('returns the response of a single request', async () => {
    const transport = new FakeTransport({
      'https://example.com/': { status: 200, body: 'ok', headers: { 'content-type': 'text/plain' } },
    });

    const result = await fetchCandidate(candidate('/'), transport, policy);

    expect(result).toMatchObject({
      url: 'https://example.com/',
      finalUrl: 'https://example.com/',
      scheme: 'https',
      status: 200,
      redirects: 0,
      requests: 1,
      schemeFallback: false,
    });
    expect(result.error).toBeUndefined();
    expect(result.body.toString('utf8')).toBe('ok');
  });

  it('requests hash routes without their fragment', async () => {
    const transport = new FakeTransport({ 'https://example.com/': { status: 200 } });

    await fetchCandidate(candidate('/#/admin'), transport, policy);

    expect(transport.calls).toEqual(['https://example.com/']);
  });

  it('follows redirects hop by hop', async () => {
    const transport = new FakeTransport({
      'https://example.com/a': { status: 301, headers: { location: '/b' } },
      'https://example.com/b': { status: 200, body: 'moved' },
    });

    const result = await fetchCandidate(candidate('/a'), transport, policy);

    expect(result.status).toBe(200);
    expect(result.finalUrl).toBe('https://example.com/b');
    expect(result.redirects).toBe(1);
    expect(result.requests).toBe(2);
  });

  it('reports a revisited URL as RedirectLoop', async () => {
    const transport = new FakeTransport({
      'https://example.com/a': { status: 302, headers: { location: '/b' } },
      'https://example.com/b': { status: 302, headers: { location: '/a' } },
    });

    const result = await fetchCandidate(candidate('/a'), transport, policy);

    expect(result.error).toBe('RedirectLoop');
    expect(result.status).toBeUndefined();
    expect(transport.calls).toEqual(['https://example.com/a', 'https://example.com/b']);
  });

  it('stops after the hop limit', async () => {
    const transport = new FakeTransport({
      'https://example.com/r0': { status: 307, headers: { location: '/r1' } },
      'https://example.com/r1': { status: 307, headers: { location: '/r2' } },
      'https://example.com/r2': { status: 307, headers: { location: '/r3' } },
      'https://example.com/r3': { status: 200 },
    });

    const result = await fetchCandidate(candidate('/r0'), transport, { ...policy, maxRedirects: 2 });

    expect(result.error).toBe('RedirectLoop');
    expect(result.requests).toBe(3);
  });

  it('retries over http when https cannot connect', async () => {
    const transport = new FakeTransport({
      'https://example.com/': new TransportError('NetworkError', 'connect ECONNREFUSED', 'ECONNREFUSED'),
      'http://example.com/': { status: 200, body: 'plain' },
    });

    const result = await fetchCandidate(candidate('/'), transport, policy);

    expect(result).toMatchObject({
      url: 'https://example.com/',
      finalUrl: 'http://example.com/',
      scheme: 'http',
      status: 200,
      schemeFallback: true,
      requests: 2,
    });
  });

  it('does not retry DNS failures or timeouts', async () => {
    const transport = new FakeTransport({
      'https://example.com/dns': new TransportError('NetworkError', 'getaddrinfo ENOTFOUND', 'ENOTFOUND'),
      'https://example.com/slow': new TransportError('Timeout', 'request timed out'),
    });

    const dns = await fetchCandidate(candidate('/dns'), transport, policy);
    const slow = await fetchCandidate(candidate('/slow'), transport, policy);

    expect(dns).toMatchObject({ error: 'NetworkError', requests: 1, schemeFallback: false });
    expect(slow).toMatchObject({ error: 'Timeout', requests: 1, errorMessage: 'request timed out' });
    expect(transport.calls).toEqual(['https://example.com/dns', 'https://example.com/slow']);
  });

  it('skips the fallback when disabled', async () => {
    const transport = new FakeTransport({
      'https://example.com/': new TransportError('NetworkError', 'connect ECONNREFUSED', 'ECONNREFUSED'),
    });

    const result = await fetchCandidate(candidate('/'), transport, { ...policy, schemeFallback: false });

    expect(result.error).toBe('NetworkError');
    expect(result.requests).toBe(1);
  });
});

describe('stripFragment', () => {
  it('removes everything from the first #', () => {
    expect(stripFragment('https://example.com/#/admin')).toBe('https://example.com/');
    expect(stripFragment('https://example.com/x')).toBe('https://example.com/x');
  });
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultOutputPath, executeRun } from '../../src/scan/executeRun.js';
import { InputError } from '../../src/core/errors.js';
import type { DiscoveryCatalog } from '../../src/config/catalog.js';
import { TransportError } from '../../src/net/httpClient.js';
import { FakeTransport, type Route } from '../helpers.js';

const HTML = { 'content-type': 'text/html; charset=utf-8' };

const catalog: DiscoveryCatalog = {
  version: 1,
  environmentTemplates: ['dev.'],
  paths: ['/', '/swagger.json', '/admin'],
  parameterNames: ['api_key'],
};

const routes: Record<string, Route> = {
  'https://example.com/': {
    status: 200,
    headers: HTML,
    body: [
      '<html><head><title>Example</title></head><body>',
      '<script src="/static/app.js"></script>',
      '<script src="https://cdn.other.net/lib.js"></script>',
      '</body></html>',
    ].join(''),
  },
  'https://example.com/static/app.js': {
    status: 200,
    headers: { 'content-type': 'application/javascript' },
    body: 'fetch("/internal/config");',
  },
  'https://example.com/swagger.json': {
    status: 200,
    headers: { 'content-type': 'application/json' },
    body: '{"openapi":"3.0.0","paths":{}}',
  },
  'https://example.com/admin': { status: 302, headers: { location: '/login' } },
  'https://example.com/login': { status: 200, headers: HTML, body: '<html><title>Login</title></html>' },
  'https://dev.example.com/': { status: 200, headers: HTML, body: '<html><head><title>Dev</title></head></html>' },
  'https://dev.example.com/swagger.json': { status: 404, body: 'not found' },
  'https://dev.example.com/admin': new TransportError('NetworkError', 'getaddrinfo ENOTFOUND', 'ENOTFOUND'),
};

const expectedOutput = [
  '[JS-ENDPOINT] /internal/config',
  '[API-DOC] https://example.com/swagger.json',
  '[DISCOVERY] https://dev.example.com [200] Dev',
  '',
].join('\n');

describe('executeRun', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'env-recon-run-'));
    inputPath = join(dir, 'targets.txt');
    outputPath = join(dir, 'env-enum.txt');
    await writeFile(inputPath, 'https://Example.com/\n\nexample.com\nnot a host\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('enumerates, classifies and mines one target end to end', async () => {
    const transport = new FakeTransport(routes);
    const lines: string[] = [];

    const summary = await executeRun({
      inputPath,
      outputPath,
      catalog,
      transport,
      concurrency: 1,
      jsMode: 'pattern',
      onDiscovery: (line) => lines.push(line),
    });

    expect(await readFile(outputPath, 'utf8')).toBe(expectedOutput);
    expect(lines).toEqual(expectedOutput.trimEnd().split('\n'));
    expect(summary).toMatchObject({ status: 'completed', outputPath, targets: 1, rejectedTargets: 1 });
    expect(summary.stats).toMatchObject({
      candidates: 7,
      requests: 8,
      errors: { NetworkError: 1, Timeout: 0, RedirectLoop: 0 },
      notFound: 1,
      discoveries: 3,
      duplicates: 0,
      scannerFailures: 0,
    });
    expect(transport.closed).toBe(false);
    expect(transport.calls).not.toContain('https://cdn.other.net/lib.js');
    expect(transport.calls).not.toContain('http://dev.example.com/admin');
  });

  it('backs up the previous output on a rerun', async () => {
    await executeRun({ inputPath, outputPath, catalog, transport: new FakeTransport(routes), concurrency: 1 });
    await executeRun({ inputPath, outputPath, catalog, transport: new FakeTransport(routes), concurrency: 4 });

    expect(await readFile(`${outputPath}.bak`, 'utf8')).toBe(expectedOutput);
    const rerun = (await readFile(outputPath, 'utf8')).trimEnd().split('\n');
    expect([...rerun].sort()).toEqual(expectedOutput.trimEnd().split('\n').sort());
  });

  it('counts a failing extra scanner and keeps going', async () => {
    const broken = {
      metadata: { id: 'broken', name: 'Broken', description: 'always throws', produces: [] },
      scan: () => {
        throw new Error('boom');
      },
    };

    const summary = await executeRun({
      inputPath,
      outputPath,
      catalog: { ...catalog, environmentTemplates: [], paths: ['/'] },
      transport: new FakeTransport(routes),
      concurrency: 1,
      extraScanners: [broken],
    });

    expect(summary.status).toBe('completed');
    // the page and its linked script
    expect(summary.stats.scannerFailures).toBe(2);
    expect(await readFile(outputPath, 'utf8')).toBe('[JS-ENDPOINT] /internal/config\n');
  });

  it('rejects an unreadable input file', async () => {
    await expect(
      executeRun({ inputPath: join(dir, 'missing.txt'), outputPath, catalog, transport: new FakeTransport({}) })
    ).rejects.toBeInstanceOf(InputError);
  });

  it('writes beside the input by default', () => {
    expect(defaultOutputPath(inputPath)).toBe(join(dir, 'env-enum.txt'));
  });
});

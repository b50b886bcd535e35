import { describe, expect, it } from 'vitest';
import {
  applyTemplate,
  buildAssetCandidate,
  candidateStream,
  expandTarget,
  maxCandidatesPerTarget,
  permuteHosts,
} from '../../src/util/candidateExpander.js';
import { getDefaultCatalog, hashRouteBases, knownHashRoutes } from '../../src/config/catalog.js';
import { exampleTarget, smallCatalog } from '../helpers.js';

describe('applyTemplate', () => {
  it('prefixes plain templates', () => {
    expect(applyTemplate('example.com', 'preview.api.')).toBe('preview.api.example.com');
  });

  it('rewrites the leftmost label only when the host has a subdomain', () => {
    expect(applyTemplate('example.com', 'dev-{label}')).toBeNull();
    expect(applyTemplate('app.example.com', 'dev-{label}')).toBe('dev-app.example.com');
    expect(applyTemplate('app.example.com', '{label}-dev')).toBe('app-dev.example.com');
  });
});

describe('expandTarget', () => {
  it('emits the target first, then templates in catalog order, paths within each host', () => {
    const candidates = expandTarget(exampleTarget, smallCatalog);

    expect(candidates.map((c) => c.url)).toEqual([
      'https://example.com/',
      'https://example.com/swagger.json',
      'https://dev.example.com/',
      'https://dev.example.com/swagger.json',
      'https://staging.example.com/',
      'https://staging.example.com/swagger.json',
    ]);
    expect(candidates[0]?.kind).toBe('origin');
    expect(candidates[2]).toMatchObject({ kind: 'permutation', template: 'dev.', scheme: 'https' });
    expect(candidates.every((c) => c.origin === exampleTarget)).toBe(true);
  });

  it('is deterministic and immutable', () => {
    const first = expandTarget(exampleTarget, smallCatalog);
    const second = expandTarget(exampleTarget, smallCatalog);

    expect(second).toEqual(first);
    expect(Object.isFrozen(first[0])).toBe(true);
  });

  it('stays within the per-target bound for the bundled catalog', () => {
    const catalog = getDefaultCatalog();
    const target = { host: 'app.example.com', isIpAddress: false };

    expect(expandTarget(target, catalog).length).toBeLessThanOrEqual(maxCandidatesPerTarget(catalog));
    expect(maxCandidatesPerTarget(catalog)).toBe((56 + 1) * 46);
  });

  it('gives IP targets no permutations', () => {
    const hosts = permuteHosts({ host: '10.0.0.1', isIpAddress: true }, smallCatalog);
    expect(hosts).toEqual([{ host: '10.0.0.1' }]);
  });

  it('drops duplicate generated hosts', () => {
    const catalog = { ...smallCatalog, environmentTemplates: ['dev.', 'dev.'] };
    expect(permuteHosts(exampleTarget, catalog).map((h) => h.host)).toEqual(['example.com', 'dev.example.com']);
  });
});

describe('candidateStream', () => {
  it('yields lazily across targets', () => {
    const other = { host: 'example.org', isIpAddress: false };
    const stream = candidateStream([exampleTarget, other], smallCatalog);

    expect(stream.next().value?.url).toBe('https://example.com/');
    expect([...stream]).toHaveLength(11);
  });
});

describe('buildAssetCandidate', () => {
  it('keeps scheme, host and query of the asset URL', () => {
    const asset = buildAssetCandidate(exampleTarget, new URL('http://cdn.example.com/app.js?v=2'));

    expect(asset).toMatchObject({
      url: 'http://cdn.example.com/app.js?v=2',
      scheme: 'http',
      host: 'cdn.example.com',
      path: '/app.js?v=2',
      kind: 'asset',
    });
  });
});

describe('knownHashRoutes', () => {
  it('collects the catalog hash routes', () => {
    const routes = knownHashRoutes(getDefaultCatalog());
    expect(routes.has('#/admin')).toBe(true);
    expect(routes.has('#/')).toBe(true);
    expect(routes.size).toBe(6);
  });
});

describe('hashRouteBases', () => {
  it('maps every catalog hash route to the root it is fetched from', () => {
    expect([...hashRouteBases(getDefaultCatalog())]).toEqual(['/']);
    expect(hashRouteBases(smallCatalog).size).toBe(0);
  });
});

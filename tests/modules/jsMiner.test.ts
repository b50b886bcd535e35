import { describe, expect, it, vi } from 'vitest';
import {
  createJsMinerScanner,
  isJavaScriptResponse,
  mineByEvaluation,
  mineJavaScript,
  minePatterns,
  type EvaluationBudget,
} from '../../src/modules/jsMiner/index.js';
import { EvaluationFault } from '../../src/core/errors.js';
import { candidate, fetchResult } from '../helpers.js';

const JS = { 'content-type': 'application/javascript' };

const generous: EvaluationBudget = {
  timeBudgetMs: 1000,
  maxSteps: 10_000,
  maxSourceBytes: 64 * 1024,
  maxStringLength: 1024,
  now: () => 0,
};

function faultOf(run: () => unknown): EvaluationFault {
  try {
    run();
  } catch (error) {
    if (error instanceof EvaluationFault) return error;
    throw error;
  }
  throw new Error('expected an EvaluationFault');
}

describe('minePatterns', () => {
  it('finds the target of a fetch call', () => {
    expect(minePatterns('fetch("/internal/config")')).toEqual({
      endpoints: ['/internal/config'],
      parameters: [],
    });
  });

  it('drops static assets and keeps API paths', () => {
    const source = 'const logo = "/img/logo.png"; const users = "/api/users";';
    expect(minePatterns(source).endpoints).toEqual(['/api/users']);
  });

  it('reads xhr.open targets and their query parameters', () => {
    const source = 'xhr.open("GET", "/api/v2/items?page=1&limit=20");';
    expect(minePatterns(source)).toEqual({
      endpoints: ['/api/v2/items?page=1&limit=20'],
      parameters: ['page', 'limit'],
    });
  });

  it('cuts template placeholders', () => {
    expect(minePatterns('fetch(`/api/users/${id}/profile`)').endpoints).toEqual(['/api/users/']);
  });

  it('keeps absolute URLs', () => {
    expect(minePatterns('const base = "https://api.example.com/v1";').endpoints).toEqual([
      'https://api.example.com/v1',
    ]);
  });

  it('reports known parameter names used as object keys', () => {
    const source = 'const payload = {api_key: k, "redirect_uri": u, other: 1};';
    expect(minePatterns(source, ['api_key', 'redirect_uri', 'token']).parameters).toEqual([
      'api_key',
      'redirect_uri',
    ]);
  });
});

describe('mineByEvaluation', () => {
  it('folds concatenated bindings into request URLs', () => {
    const source = [
      'const base = "/api";',
      'const version = "v2";',
      'const cfg = { users: base + "/" + version + "/users" };',
      'fetch(cfg.users + "?active=true");',
    ].join('\n');

    expect(mineByEvaluation(source, generous)).toEqual({
      endpoints: ['/api/v2/users?active=true', '/api/v2/users'],
      parameters: ['active'],
    });
  });

  it('resolves template literals and joins', () => {
    const source = [
      'const host = "https://staging.example.com";',
      'const gql = `${host}/graphql`;',
      'const orders = ["", "api", "v3", "orders"].join("/");',
    ].join('\n');

    expect(mineByEvaluation(source, generous).endpoints).toEqual([
      'https://staging.example.com/graphql',
      '/api/v3/orders',
    ]);
  });

  it('leaves shadowed names unresolved', () => {
    const source = 'function load(e) { return fetch("/items/" + e); }';
    expect(mineByEvaluation(source, generous).endpoints).toEqual([]);
  });

  it('raises a capability fault for require', () => {
    const fault = faultOf(() => mineByEvaluation('const u = "/api/" + require("./x");', generous));
    expect(fault.reason).toBe('capability');
  });

  it('raises a capability fault for globalThis', () => {
    const fault = faultOf(() => mineByEvaluation('fetch(globalThis.location + "/x");', generous));
    expect(fault.reason).toBe('capability');
  });

  it('raises budget faults for steps, size, string length and time', () => {
    const concat = 'const u = "/a" + "/b" + "/c" + "/d";';

    expect(faultOf(() => mineByEvaluation(concat, { ...generous, maxSteps: 3 })).reason).toBe('budget');
    expect(faultOf(() => mineByEvaluation(concat, { ...generous, maxSourceBytes: 5 })).reason).toBe('budget');
    expect(faultOf(() => mineByEvaluation(concat, { ...generous, maxStringLength: 5 })).reason).toBe('budget');
    expect(faultOf(() => mineByEvaluation(concat, { ...generous, timeBudgetMs: 0 })).reason).toBe('budget');
  });

  it('stops join, concat and replaceAll at the string and array limits', () => {
    const word = `"${'x'.repeat(100)}"`;
    const joined = `var s = ${word}; var a = [${Array.from({ length: 50 }, () => 's').join(', ')}]; var u = a.join("");`;
    const concatenated = `var a = [${Array.from({ length: 6000 }, () => '1').join(',')}]; var b = a.concat(a);`;
    const replaced = `var u = "/x" + "${'a'.repeat(500)}".replaceAll("a", "bbbb");`;

    expect(faultOf(() => mineByEvaluation(joined, generous)).reason).toBe('budget');
    expect(faultOf(() => mineByEvaluation(concatenated, generous)).reason).toBe('budget');
    expect(faultOf(() => mineByEvaluation(replaced, generous)).reason).toBe('budget');
  });

  it('reports host errors as runtime faults', () => {
    const source = 'var u = "/q?x=" + encodeURIComponent("\\uD800");';
    expect(faultOf(() => mineByEvaluation(source, generous)).reason).toBe('runtime');
  });

  it('raises a parse fault on invalid source', () => {
    expect(faultOf(() => mineByEvaluation('const = ;', generous)).reason).toBe('parse');
  });
});

describe('mineJavaScript', () => {
  it('returns exactly the pattern output when evaluation runs out of budget', () => {
    const source = 'fetch("/internal/config")';
    const onFault = vi.fn();

    const mined = mineJavaScript(source, {
      mode: 'evaluation',
      parameterNames: [],
      budget: { ...generous, timeBudgetMs: 0 },
      onFault,
    });

    expect(mined).toEqual(minePatterns(source, []));
    expect(onFault).toHaveBeenCalledTimes(1);
    expect(onFault.mock.calls[0]?.[0]).toBeInstanceOf(EvaluationFault);
  });

  it('falls back to pattern output on a capability fault', () => {
    const onFault = vi.fn();
    const mined = mineJavaScript('const u = "/api/" + require("./x");', {
      mode: 'evaluation',
      parameterNames: [],
      budget: generous,
      onFault,
    });

    expect(mined).toEqual({ endpoints: ['/api/'], parameters: [] });
    expect(onFault).toHaveBeenCalledTimes(1);
  });

  it('falls back to pattern output when the interpreter hits a host error', () => {
    const source = 'fetch("/api/search"); var u = "/q?x=" + encodeURIComponent("\\uD800");';
    const onFault = vi.fn();

    const mined = mineJavaScript(source, { mode: 'evaluation', parameterNames: [], budget: generous, onFault });

    expect(mined).toEqual(minePatterns(source, []));
    expect(mined.endpoints).toContain('/api/search');
    expect(onFault.mock.calls[0]?.[0]).toMatchObject({ reason: 'runtime' });
  });

  it('falls back to pattern output when a join outgrows the string limit', () => {
    const word = `"${'x'.repeat(4000)}"`;
    const items = Array.from({ length: 300 }, () => 's').join(',');
    const source = `var s = ${word}; var a = [${items}]; fetch("/api/a"); var u = a.join("");`;
    const onFault = vi.fn();

    const mined = mineJavaScript(source, {
      mode: 'evaluation',
      parameterNames: [],
      budget: { ...generous, maxStringLength: 64 * 1024 },
      onFault,
    });

    expect(mined).toEqual(minePatterns(source, []));
    expect(mined.endpoints).toEqual(['/api/a']);
    expect(onFault.mock.calls[0]?.[0]).toMatchObject({ reason: 'budget' });
  });

  it('unions pattern and evaluated endpoints', () => {
    const source = 'const base = "/api"; fetch(base + "/orders");';
    const mined = mineJavaScript(source, { mode: 'evaluation', parameterNames: [], budget: generous });

    expect(mined.endpoints).toEqual(['/api', '/orders', '/api/orders']);
  });
});

describe('createJsMinerScanner', () => {
  const scanner = createJsMinerScanner({ mode: 'pattern', parameterNames: [] });

  it('applies to JavaScript responses', () => {
    const c = candidate('/static/app.js', { kind: 'asset' });
    const result = fetchResult(c.url, 200, 'fetch("/internal/config")', JS);

    expect(scanner.appliesTo?.(c, result)).toBe(true);
    expect(scanner.scan(c, result)).toEqual([
      { kind: 'JsEndpoint', value: '/internal/config', source: c.url, status: 200 },
    ]);
  });

  it('skips IP targets and non-script responses', () => {
    const ipTarget = { host: '10.0.0.1', isIpAddress: true };
    const onIp = candidate('/app.js', { kind: 'asset', target: ipTarget });
    const page = candidate('/');

    expect(isJavaScriptResponse(onIp, fetchResult(onIp.url, 200, '', JS))).toBe(false);
    expect(isJavaScriptResponse(page, fetchResult(page.url, 200, '<html></html>', { 'content-type': 'text/html' }))).toBe(
      false
    );
  });
});

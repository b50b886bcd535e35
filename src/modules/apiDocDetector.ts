/* =============================================================================
 * MODULE: apiDocDetector.ts
 * =============================================================================
 * Reports exposed API documentation: Swagger/OpenAPI specs, Swagger UI pages
 * and GraphQL endpoints.
 *
 * A known doc path answering 200/401/403 is a hit on its own, except a 200
 * HTML page, which must also carry a signature (SPAs answer 200 everywhere).
 * Any other non-404 response below 500 is a hit only by signature, and off
 * doc paths only the strong signatures count: a spec document, a page that
 * boots Swagger UI, or a GraphQL introspection/error body. JS assets are
 * never classified here.
 * =============================================================================
 */

import { defineScanner } from '../core/IDiscoveryScanner.js';
import { bodyText, headerValue, type Candidate, type Discovery, type FetchResult } from '../core/types.js';

export type ApiSignature = 'openapi' | 'swagger-ui' | 'graphql';

const API_DOC_PATH =
  /(?:^|\/)(?:swagger(?:-ui)?(?:\.html|\.json|\.ya?ml)?|openapi(?:\.json|\.ya?ml)?|api-docs|api\/docs|redoc|graphql|graphiql)\/?$/i;

const PATH_HIT_STATUSES = new Set([200, 401, 403]);

const YAML_SPEC = /^(?:swagger|openapi)\s*:/m;
// any mention counts on a doc path
const SWAGGER_UI_MENTION = /swagger-ui|SwaggerUIBundle/i;
const GRAPHIQL_MENTION = /graphiql/i;
// elsewhere the page has to actually load the UI
const SWAGGER_UI_BOOT = /SwaggerUIBundle\s*\(|swagger-ui-bundle(?:\.min)?\.js/;
const GRAPHQL_RESPONSE = /"__schema"|must provide query string/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

export function isApiDocPath(pathname: string): boolean {
  return API_DOC_PATH.test(pathname);
}

/**
 * API documentation signature carried by a body, if any. `onDocPath`
 * admits the weak UI mentions.
 */
export function detectApiSignature(body: string, onDocPath = false): ApiSignature | null {
  const trimmed = body.trimStart();

  if (trimmed.startsWith('{')) {
    const json = parseJsonObject(trimmed);
    if (json && ('swagger' in json || 'openapi' in json)) return 'openapi';
  }
  if (YAML_SPEC.test(trimmed)) return 'openapi';
  if (SWAGGER_UI_BOOT.test(body) || (onDocPath && SWAGGER_UI_MENTION.test(body))) return 'swagger-ui';
  if (GRAPHQL_RESPONSE.test(body) || (onDocPath && GRAPHIQL_MENTION.test(body))) return 'graphql';
  return null;
}

export function detectApiDoc(candidate: Candidate, result: FetchResult): Discovery[] {
  const status = result.status;
  if (candidate.kind === 'asset') return [];
  if (result.error || status === undefined || status === 404 || status >= 500) return [];

  const onDocPath = isApiDocPath(new URL(result.url).pathname);
  const signature = detectApiSignature(bodyText(result), onDocPath);
  const isHtml = headerValue(result, 'content-type').toLowerCase().includes('text/html');

  const hit =
    onDocPath && PATH_HIT_STATUSES.has(status)
      ? status !== 200 || !isHtml || signature !== null
      : signature !== null;
  if (!hit) return [];

  return [
    {
      kind: 'ApiDocHit',
      value: result.finalUrl,
      source: candidate.url,
      status,
      detail: signature ?? 'path',
    },
  ];
}

export const apiDocScanner = defineScanner(
  {
    id: 'api_doc',
    name: 'API Documentation Detector',
    description: 'Swagger/OpenAPI specs, Swagger UI and GraphQL endpoints',
    produces: ['ApiDocHit'],
  },
  detectApiDoc,
  { appliesTo: (candidate) => candidate.kind !== 'asset' }
);

/**
 * Endpoint and parameter helpers shared by both mining modes
 */

const STATIC_ASSET_EXT =
  /\.(?:png|jpe?g|gif|svg|webp|ico|bmp|avif|woff2?|ttf|eot|otf|css|scss|less|map|mp4|webm|mp3|wav|ogg|pdf)(?:[?#]|$)/i;

const ABSOLUTE_URL = /^https?:\/\/[^\s/?#]+\.[^\s/?#]+/i;
const RELATIVE_PATH = /^\/[A-Za-z0-9_]/;
const QUERY_PARAM = /[?&]([A-Za-z_][A-Za-z0-9_-]*)=/g;

const MAX_ENDPOINT_LENGTH = 2048;

/**
 * Cut a template placeholder and whatever follows: `/api/${id}` → `/api/`
 */
export function stripPlaceholder(value: string): string {
  const idx = value.indexOf('${');
  return idx === -1 ? value : value.slice(0, idx);
}

/**
 * Quoted absolute URL or root-relative path that is not a static asset
 */
export function isEndpointLike(value: string): boolean {
  if (value.length < 2 || value.length > MAX_ENDPOINT_LENGTH) return false;
  if (/\s/.test(value)) return false;
  if (STATIC_ASSET_EXT.test(value)) return false;
  if (ABSOLUTE_URL.test(value)) return URL.canParse(value);
  return RELATIVE_PATH.test(value);
}

export function queryParamNames(value: string): string[] {
  const names: string[] = [];
  for (const match of value.matchAll(QUERY_PARAM)) {
    if (match[1]) names.push(match[1]);
  }
  return names;
}

/**
 * Insertion-ordered endpoint and parameter sets
 */
export class MinedSet {
  readonly endpoints = new Set<string>();
  readonly parameters = new Set<string>();

  addEndpoint(raw: string): void {
    const value = stripPlaceholder(raw.trim());
    if (!isEndpointLike(value)) return;
    this.endpoints.add(value);
    for (const name of queryParamNames(value)) this.parameters.add(name);
  }

  addParameter(name: string): void {
    this.parameters.add(name);
  }

  merge(other: MinedEndpoints): this {
    for (const endpoint of other.endpoints) this.endpoints.add(endpoint);
    for (const parameter of other.parameters) this.parameters.add(parameter);
    return this;
  }

  toResult(): MinedEndpoints {
    return { endpoints: [...this.endpoints], parameters: [...this.parameters] };
  }
}

export interface MinedEndpoints {
  endpoints: string[];
  parameters: string[];
}

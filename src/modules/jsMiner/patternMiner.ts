/**
 * Pattern mode: regular expressions over the raw script text.
 * Never executes anything; always returns.
 */

import { MinedSet, queryParamNames, type MinedEndpoints } from './endpoints.js';

const REQUEST_CALL =
  /(?:\bfetch|\baxios(?:\.(?:get|post|put|patch|delete|head|request))?|\$\.(?:get|post|getJSON|ajax)|\.open)\s*\(\s*(?:["'`][A-Za-z]+["'`]\s*,\s*["'`]([^"'`\n]+)["'`]|["'`]([^"'`\n]+)["'`])/g;

const QUOTED_ABSOLUTE_URL = /["'`](https?:\/\/[^"'`\s<>\\]+)["'`]/g;

const QUOTED_RELATIVE_PATH = /["'`](\/[A-Za-z0-9_][^"'`\s<>\\]*)["'`]/g;

const STRING_LITERAL = /"((?:[^"\\\n]|\\.)*)"|'((?:[^'\\\n]|\\.)*)'|`((?:[^`\\]|\\.)*)`/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `{token:`, `,"api_key":` etc. for the given names
 */
export function objectKeyPattern(parameterNames: readonly string[]): RegExp | null {
  if (parameterNames.length === 0) return null;
  const alternatives = parameterNames.map(escapeRegExp).join('|');
  return new RegExp(`[{,]\\s*(["']?)(${alternatives})\\1\\s*:`, 'g');
}

export function minePatterns(source: string, parameterNames: readonly string[] = []): MinedEndpoints {
  const mined = new MinedSet();

  for (const match of source.matchAll(REQUEST_CALL)) {
    const target = match[1] ?? match[2];
    if (target) mined.addEndpoint(target);
  }
  for (const match of source.matchAll(QUOTED_ABSOLUTE_URL)) {
    if (match[1]) mined.addEndpoint(match[1]);
  }
  for (const match of source.matchAll(QUOTED_RELATIVE_PATH)) {
    if (match[1]) mined.addEndpoint(match[1]);
  }

  // query-string names inside any string literal, not only endpoint-shaped ones
  for (const match of source.matchAll(STRING_LITERAL)) {
    const text = match[1] ?? match[2] ?? match[3];
    if (!text || !text.includes('=')) continue;
    for (const name of queryParamNames(text)) mined.addParameter(name);
  }

  const keyPattern = objectKeyPattern(parameterNames);
  if (keyPattern) {
    for (const match of source.matchAll(keyPattern)) {
      if (match[2]) mined.addParameter(match[2]);
    }
  }

  return mined.toResult();
}

import { parse as parseHTML, type HTMLElement } from 'node-html-parser';
import type { FetchResult } from '../core/types.js';
import { headerValue } from '../core/types.js';

export function isHtmlResponse(result: FetchResult): boolean {
  const contentType = headerValue(result, 'content-type').toLowerCase();
  if (contentType) return contentType.includes('text/html') || contentType.includes('application/xhtml');
  return /^\s*(<!doctype html|<html)/i.test(result.body.subarray(0, 512).toString('utf8'));
}

export function parseDocument(html: string): HTMLElement {
  return parseHTML(html, { comment: false });
}

function resolveAttribute(elements: HTMLElement[], attribute: string, baseUrl: string): URL[] {
  const urls: URL[] = [];
  for (const element of elements) {
    const value = element.getAttribute(attribute)?.trim();
    if (!value || !URL.canParse(value, baseUrl)) continue;
    const url = new URL(value, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') continue;
    url.hash = '';
    urls.push(url);
  }
  return urls;
}

/**
 * Absolute `<script src>` URLs in document order, duplicates removed
 */
export function extractScriptSources(root: HTMLElement, baseUrl: string): URL[] {
  const seen = new Set<string>();
  return resolveAttribute(root.querySelectorAll('script[src]'), 'src', baseUrl).filter((url) => {
    if (seen.has(url.href)) return false;
    seen.add(url.href);
    return true;
  });
}

/**
 * Raw `<a href>` values, unresolved
 */
export function extractAnchorHrefs(root: HTMLElement): string[] {
  const hrefs: string[] = [];
  for (const anchor of root.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href')?.trim();
    if (href) hrefs.push(href);
  }
  return hrefs;
}

/**
 * Page title with whitespace collapsed, capped at 120 chars
 */
export function extractTitle(root: HTMLElement): string | undefined {
  const title = root.querySelector('title')?.text.replace(/\s+/g, ' ').trim();
  if (!title) return undefined;
  return title.length > 120 ? `${title.slice(0, 117)}...` : title;
}

/**
 * Host equals the target or is one of its subdomains
 */
export function isSameSite(host: string, targetHost: string): boolean {
  return host === targetHost || host.endsWith(`.${targetHost}`);
}

import type { SubdomainPolicy } from '../types/exploration.js';

const CRAWLABLE_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Resolve `href` against `baseUrl` and normalize it. Fragments are dropped,
 * scheme and host are lowercased, and default ports are removed.
 *
 * @returns null for unparseable URLs and non-http(s) schemes (mailto:, javascript:, tel:, ...)
 */
export function canonicalizeUrl(href: string, baseUrl?: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
  } catch {
    return null;
  }

  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) {
    return null;
  }

  parsed.hash = '';
  // an empty query still serializes a bare '?' until it is reset
  if (parsed.search === '') {
    parsed.search = '';
  }
  return parsed.href;
}

/**
 * Storage key for a page. base64url of the canonical URL: deterministic, reversible,
 * and safe to use as an identifier in every backend.
 */
export function toPageKey(url: string): string {
  const canonical = canonicalizeUrl(url) ?? url;
  return Buffer.from(canonical, 'utf8').toString('base64url');
}

export function fromPageKey(key: string): string {
  return Buffer.from(key, 'base64url').toString('utf8');
}

function stripWww(hostname: string): string {
  return hostname.startsWith('www.') ? hostname.slice(4) : hostname;
}

export function isInternalHost(hostname: string, seedHostname: string, policy: SubdomainPolicy): boolean {
  const host = hostname.toLowerCase();
  const seed = seedHostname.toLowerCase();
  if (policy === 'external') {
    return host === seed;
  }

  const bareHost = stripWww(host);
  const bareSeed = stripWww(seed);
  return bareHost === bareSeed || bareHost.endsWith(`.${bareSeed}`) || bareSeed.endsWith(`.${bareHost}`);
}

export function isInternalUrl(url: string, seedUrl: string, policy: SubdomainPolicy): boolean {
  try {
    return isInternalHost(new URL(url).hostname, new URL(seedUrl).hostname, policy);
  } catch {
    return false;
  }
}

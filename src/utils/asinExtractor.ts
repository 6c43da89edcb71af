import { resolveMarketplace } from '../config/markets';
import { UrlInfo } from '../types';

type AsinMatcher = (url: string) => string | null;

const ASIN_PATTERN = /^[A-Z0-9]{10}$/i;

const matchProductPath: AsinMatcher = (url) => {
  const match = url.match(/\/(?:dp|gp\/product|product)\/([A-Z0-9]{10})/i);
  return match?.[1] ?? null;
};

const matchBareSegment: AsinMatcher = (url) => {
  const match = url.match(/\/([A-Z0-9]{10})(?:[/?]|$)/i);
  return match?.[1] ?? null;
};

const matchQueryParam: AsinMatcher = (url) => {
  try {
    const candidate = new URL(url).searchParams.get('asin');
    return candidate && ASIN_PATTERN.test(candidate) ? candidate : null;
  } catch {
    return null;
  }
};

// Order matters: the first matcher to return an ASIN wins.
const ASIN_MATCHERS: readonly AsinMatcher[] = [matchProductPath, matchBareSegment, matchQueryParam];

export function extractAsin(url: string): string | null {
  for (const matcher of ASIN_MATCHERS) {
    const asin = matcher(url);
    if (asin) {
      return asin;
    }
  }
  return null;
}

function parseHostname(url: string): string | null {
  try {
    const { hostname } = new URL(url);
    return hostname || null;
  } catch {
    return null;
  }
}

/**
 * Pulls the ASIN and marketplace code out of an Amazon product URL.
 * Returns null when no ASIN is present or the hostname cannot be parsed.
 */
export function extractUrlInfo(url: string): UrlInfo | null {
  const asin = extractAsin(url);
  if (!asin) {
    return null;
  }

  const hostname = parseHostname(url);
  if (!hostname) {
    return null;
  }

  return { asin, country: resolveMarketplace(hostname) };
}

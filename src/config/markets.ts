import type { MarketplaceCode } from '../types';

/**
 * Hostname fragments checked by substring containment, in declaration order.
 * `amazon.com` sits second, so it also claims `amazon.com.mx` and
 * `amazon.com.au` hosts.
 */
export const MARKETPLACE_DOMAINS: ReadonlyArray<readonly [string, MarketplaceCode]> = [
  ['amazon.com.br', 'BR'],
  ['amazon.com', 'US'],
  ['amazon.co.uk', 'GB'],
  ['amazon.de', 'DE'],
  ['amazon.ca', 'CA'],
  ['amazon.fr', 'FR'],
  ['amazon.es', 'ES'],
  ['amazon.it', 'IT'],
  ['amazon.co.jp', 'JP'],
  ['amazon.in', 'IN'],
  ['amazon.com.mx', 'MX'],
  ['amazon.com.au', 'AU'],
];

export const DEFAULT_MARKETPLACE: MarketplaceCode = 'US';

export interface MarketLocale {
  language: string;
  marketName: string;
}

const MARKET_LOCALES: Record<string, MarketLocale> = {
  BR: { language: 'Português (Brasil)', marketName: 'Amazon BR' },
  US: { language: 'English (US)', marketName: 'Amazon US' },
  MX: { language: 'Español (México)', marketName: 'Amazon MX' },
  ES: { language: 'Español (España)', marketName: 'Amazon ES' },
};

export function resolveMarketplace(hostname: string): MarketplaceCode {
  const entry = MARKETPLACE_DOMAINS.find(([domain]) => hostname.includes(domain));
  return entry ? entry[1] : DEFAULT_MARKETPLACE;
}

export function resolveMarketLocale(country: MarketplaceCode): MarketLocale {
  return (
    MARKET_LOCALES[country.toUpperCase()] ?? {
      language: 'English (US)',
      marketName: `Amazon ${country}`,
    }
  );
}

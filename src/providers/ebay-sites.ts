import { DEFAULT_SITE } from '../core/search-definition.js';

export type SiteDetails = {
  siteId: number;
  marketplaceId: string;
  currency: string;
  domain: string;
};

const SITES: Record<string, SiteDetails> = {
  'EBAY-GB': { siteId: 3, marketplaceId: 'EBAY_GB', currency: 'GBP', domain: 'www.ebay.co.uk' },
  'EBAY-US': { siteId: 0, marketplaceId: 'EBAY_US', currency: 'USD', domain: 'www.ebay.com' },
  'EBAY-DE': { siteId: 77, marketplaceId: 'EBAY_DE', currency: 'EUR', domain: 'www.ebay.de' },
  'EBAY-FR': { siteId: 71, marketplaceId: 'EBAY_FR', currency: 'EUR', domain: 'www.ebay.fr' },
  'EBAY-IT': { siteId: 101, marketplaceId: 'EBAY_IT', currency: 'EUR', domain: 'www.ebay.it' },
  'EBAY-ES': { siteId: 186, marketplaceId: 'EBAY_ES', currency: 'EUR', domain: 'www.ebay.es' },
  'EBAY-AU': { siteId: 15, marketplaceId: 'EBAY_AU', currency: 'AUD', domain: 'www.ebay.com.au' },
  'EBAY-ENCA': { siteId: 2, marketplaceId: 'EBAY_CA', currency: 'CAD', domain: 'www.ebay.ca' }
};

export const resolveSite = (site: string): SiteDetails => SITES[site] ?? SITES[DEFAULT_SITE];

export const itemUrl = (site: string, itemId: string): string => `https://${resolveSite(site).domain}/itm/${itemId}`;

export const sellerUrl = (site: string, username: string): string =>
  `https://${resolveSite(site).domain}/usr/${encodeURIComponent(username)}`;

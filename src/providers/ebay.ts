import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { MemoryCache } from '../core/cache.js';
import {
  UpstreamError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
  errorMessage,
  toUpstreamError
} from '../core/errors.js';
import { DataCategory, ItemRecord, Money, RequestDescriptor, SearchDefinition, UpstreamClient } from '../core/types.js';
import { logger } from '../util/logger.js';
import { createLimiter } from '../util/rate.js';
import { ApiName, ApiUsageTracker } from './api-usage.js';
import { itemUrl, resolveSite, sellerUrl } from './ebay-sites.js';
import {
  BuyingList,
  buildBuyingRequest,
  buildGetUserRequest,
  parseBuyingPage,
  parseUserId,
  parseXml,
  readResponse
} from './ebay-trading.js';

const TRADING_URL = 'https://api.ebay.com/ws/api.dll';
const BROWSE_SEARCH_URL = 'https://api.ebay.com/buy/browse/v1/item_summary/search';
const COMPATIBILITY_LEVEL = '1193';

const PAGE_SIZE = 200;
const MAX_PAGES = 10;
const SEARCH_LIMIT = 200;
const BUYING_CACHE_TTL_SECONDS = 30;
const DEFAULT_TIMEOUT_MS = 9000;

const CATEGORY_LISTS: Record<DataCategory, BuyingList> = {
  bids: 'BidList',
  watchlist: 'WatchList',
  purchases: 'WonList'
};

export type EbayCredentials = {
  name: string;
  appId: string;
  devId: string;
  certId: string;
  token: string;
  // Browse API token; searches fail as rejected without it.
  oauthToken?: string;
  site: string;
};

export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export type EbayClientOptions = {
  credentials: EbayCredentials;
  globalLimiter?: Bottleneck;
  accountLimiter?: Bottleneck;
  usage?: ApiUsageTracker;
  timeoutMs?: number;
  http?: HttpClient;
  now?: () => number;
};

type BuyingLists = Record<BuyingList, ItemRecord[]>;

type BrowseMoney = {
  value?: string;
  currency?: string;
};

type BrowseItemSummary = {
  itemId?: string;
  title?: string;
  price?: BrowseMoney;
  currentBidPrice?: BrowseMoney;
  itemEndDate?: string;
  bidCount?: number;
  buyingOptions?: string[];
  seller?: {
    username?: string;
    feedbackScore?: number;
    feedbackPercentage?: string;
  };
  itemLocation?: {
    city?: string;
    country?: string;
  };
  image?: {
    imageUrl?: string;
  };
  itemWebUrl?: string;
};

type BrowseSearchResponse = {
  total?: number;
  itemSummaries?: BrowseItemSummary[];
};

const toMoney = (money: BrowseMoney | undefined, fallbackCurrency: string): Money | undefined => {
  if (!money?.value) {
    return undefined;
  }
  const value = Number(money.value);
  if (!Number.isFinite(value) || value < 0) {
    return undefined;
  }
  return { value, currency: money.currency ?? fallbackCurrency };
};

const toNumber = (value: string | number | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const describeBuyingOptions = (options: string[] | undefined): string | undefined => {
  if (options?.includes('AUCTION')) {
    return 'Auction';
  }
  if (options?.includes('FIXED_PRICE')) {
    return 'Buy It Now';
  }
  return options?.[0];
};

export const mapBrowseItem = (summary: BrowseItemSummary, site: string): ItemRecord | undefined => {
  if (!summary.itemId) {
    return undefined;
  }
  const { currency } = resolveSite(site);
  const record: ItemRecord = {
    itemId: summary.itemId,
    title: summary.title ?? summary.itemId,
    currentPrice: toMoney(summary.currentBidPrice, currency) ?? toMoney(summary.price, currency),
    endTime: summary.itemEndDate,
    bidCount: summary.bidCount,
    listingType: describeBuyingOptions(summary.buyingOptions),
    imageUrl: summary.image?.imageUrl,
    itemUrl: summary.itemWebUrl ?? itemUrl(site, summary.itemId)
  };

  const seller = summary.seller?.username;
  if (seller) {
    record.sellerUsername = seller;
    record.sellerFeedbackScore = summary.seller?.feedbackScore;
    record.sellerPositivePercent = toNumber(summary.seller?.feedbackPercentage);
    record.sellerUrl = sellerUrl(site, seller);
  }
  const location = [summary.itemLocation?.city, summary.itemLocation?.country].filter(Boolean).join(', ');
  if (location) {
    record.sellerLocation = location;
  }
  return record;
};

const formatPriceFilter = (min: number | undefined, max: number | undefined): string | undefined => {
  if (min === undefined && max === undefined) {
    return undefined;
  }
  return `price:[${min ?? ''}..${max ?? ''}]`;
};

export const buildSearchParams = (search: SearchDefinition): Record<string, string | number> => {
  const filters: string[] = [];
  const price = formatPriceFilter(search.minPrice, search.maxPrice);
  if (price) {
    filters.push(price, `priceCurrency:${resolveSite(search.site).currency}`);
  }
  if (search.listingType === 'auction') {
    filters.push('buyingOptions:{AUCTION}');
  } else if (search.listingType === 'buy_it_now') {
    filters.push('buyingOptions:{FIXED_PRICE}');
  }

  const params: Record<string, string | number> = {
    q: search.searchQuery,
    limit: SEARCH_LIMIT
  };
  if (search.categoryId) {
    params.category_ids = search.categoryId;
  }
  if (filters.length > 0) {
    params.filter = filters.join(',');
  }
  return params;
};

export const toHttpError = (error: unknown, context: string): UpstreamError => {
  if (!axios.isAxiosError(error)) {
    return toUpstreamError(error);
  }
  const status = error.response?.status;
  if (status === 401 || status === 403) {
    return new UpstreamRejectedError(`${context}: HTTP ${status}`, { cause: error });
  }
  if (status !== undefined) {
    return new UpstreamUnavailableError(`${context}: HTTP ${status}`, { cause: error });
  }
  return new UpstreamUnavailableError(`${context}: ${error.code ?? error.message}`, { cause: error });
};

export class EbayClient implements UpstreamClient {
  readonly name: string;
  readonly usage: ApiUsageTracker;

  private readonly credentials: EbayCredentials;
  private readonly globalLimiter: Bottleneck | undefined;
  private readonly accountLimiter: Bottleneck;
  private readonly http: HttpClient;
  private readonly timeoutMs: number;
  private readonly buyingCache: MemoryCache<BuyingLists>;
  private userId: string | undefined;

  constructor(options: EbayClientOptions) {
    this.credentials = options.credentials;
    this.name = options.credentials.name;
    this.usage = options.usage ?? new ApiUsageTracker(options.credentials.name);
    this.globalLimiter = options.globalLimiter;
    this.accountLimiter =
      options.accountLimiter ?? createLimiter({ id: `ebay-${options.credentials.name}`, minTime: 300, maxConcurrent: 1 });
    this.http = options.http ?? axios;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.buyingCache = new MemoryCache<BuyingLists>(BUYING_CACHE_TTL_SECONDS, options.now);
  }

  async fetchItems(request: RequestDescriptor): Promise<ItemRecord[]> {
    if (request.kind === 'search') {
      return this.search(request.search);
    }
    const lists = await this.buyingCache.withTtl('buying', undefined, () => this.fetchBuyingLists());
    return lists[CATEGORY_LISTS[request.category]];
  }

  private async fetchBuyingLists(): Promise<BuyingLists> {
    const username = await this.resolveUserId();
    const [bids, watchlist, won] = await Promise.all([
      this.fetchList('BidList', username),
      this.fetchList('WatchList', username),
      this.fetchList('WonList', username)
    ]);
    return { BidList: bids, WatchList: watchlist, WonList: won };
  }

  private async fetchList(list: BuyingList, username: string | undefined): Promise<ItemRecord[]> {
    const items: ItemRecord[] = [];
    for (let page = 1; page <= MAX_PAGES; page += 1) {
      const response = await this.tradingCall(
        'GetMyeBayBuying',
        buildBuyingRequest(this.credentials.token, list, page, PAGE_SIZE)
      );
      const parsed = parseBuyingPage(response, list, this.credentials.site, username);
      items.push(...parsed.items);
      if (page >= parsed.totalPages) {
        break;
      }
    }
    return items;
  }

  // Without a user id, bids are still listed but high-bidder flags stay unknown.
  private async resolveUserId(): Promise<string | undefined> {
    if (this.userId) {
      return this.userId;
    }
    try {
      const response = await this.tradingCall('GetUser', buildGetUserRequest(this.credentials.token));
      this.userId = parseUserId(response);
    } catch (error) {
      if (error instanceof UpstreamRejectedError) {
        throw error;
      }
      logger.warn(`Benutzername für ${this.name} konnte nicht ermittelt werden`, { error: errorMessage(error) });
    }
    return this.userId;
  }

  private async tradingCall(callName: string, body: string) {
    const { siteId } = resolveSite(this.credentials.site);
    const response = await this.send('trading', callName, () =>
      this.http.post<string>(TRADING_URL, body, {
        headers: {
          'Content-Type': 'text/xml',
          'X-EBAY-API-COMPATIBILITY-LEVEL': COMPATIBILITY_LEVEL,
          'X-EBAY-API-CALL-NAME': callName,
          'X-EBAY-API-SITEID': String(siteId),
          'X-EBAY-API-APP-NAME': this.credentials.appId,
          'X-EBAY-API-DEV-NAME': this.credentials.devId,
          'X-EBAY-API-CERT-NAME': this.credentials.certId
        },
        responseType: 'text',
        timeout: this.timeoutMs
      })
    );
    if (typeof response.data !== 'string') {
      throw new UpstreamUnavailableError(`${callName}: Antwort ist kein Text`);
    }
    return readResponse(parseXml(response.data), callName);
  }

  private async search(search: SearchDefinition): Promise<ItemRecord[]> {
    const { oauthToken } = this.credentials;
    if (!oauthToken) {
      throw new UpstreamRejectedError(`Kein OAuth-Token für ${this.name} hinterlegt, Suchen nicht möglich`);
    }
    const response = await this.send('browse', 'item_summary/search', () =>
      this.http.get<BrowseSearchResponse>(BROWSE_SEARCH_URL, {
        params: buildSearchParams(search),
        headers: {
          Authorization: `Bearer ${oauthToken}`,
          'X-EBAY-C-MARKETPLACE-ID': resolveSite(search.site).marketplaceId
        },
        timeout: this.timeoutMs
      })
    );
    const summaries = response.data.itemSummaries ?? [];
    return summaries
      .map((summary) => mapBrowseItem(summary, search.site))
      .filter((item): item is ItemRecord => item !== undefined);
  }

  private async send<T>(api: ApiName, context: string, call: () => Promise<T>): Promise<T> {
    const limited = () => {
      this.usage.track(api);
      return call();
    };
    try {
      return await this.accountLimiter.schedule(() =>
        this.globalLimiter ? this.globalLimiter.schedule(limited) : limited()
      );
    } catch (error) {
      throw toHttpError(error, context);
    }
  }
}

export type DataCategory = 'bids' | 'watchlist' | 'purchases';

export const DATA_CATEGORIES: readonly DataCategory[] = ['bids', 'watchlist', 'purchases'] as const;

export type ShippingStatus = 'pending' | 'shipped' | 'delivered';

export type ListingTypeFilter = 'auction' | 'buy_it_now' | 'both';

export type Money = {
  value: number;
  currency: string;
};

export type ItemRecord = {
  itemId: string;
  title: string;
  sellerUsername?: string;
  sellerFeedbackScore?: number;
  sellerPositivePercent?: number;
  sellerLocation?: string;
  sellerUrl?: string;
  currentPrice?: Money;
  isHighBidder?: boolean;
  reserveMet?: boolean;
  endTime?: string;
  bidCount?: number;
  watchers?: number;
  shippingStatus?: ShippingStatus;
  trackingNumber?: string;
  imageUrl?: string;
  itemUrl?: string;
  listingType?: string;
};

export type CoordinatorScope =
  | { kind: 'category'; category: DataCategory }
  | { kind: 'search'; searchId: string };

export type Snapshot = {
  account: string;
  scope: CoordinatorScope;
  capturedAt: Date;
  items: ReadonlyMap<string, ItemRecord>;
};

export type SearchDefinition = {
  searchId: string;
  searchQuery: string;
  site: string;
  categoryId?: string;
  minPrice?: number;
  maxPrice?: number;
  listingType: ListingTypeFilter;
  updateInterval: number;
};

export type RequestDescriptor =
  | { kind: 'category'; category: DataCategory }
  | { kind: 'search'; search: SearchDefinition };

export type WatchEventType =
  | 'new_item'
  | 'became_high_bidder'
  | 'outbid'
  | 'auction_ending_soon'
  | 'auction_won'
  | 'auction_lost'
  | 'item_shipped'
  | 'item_delivered';

type EventBase = {
  account: string;
  item: ItemRecord;
};

export type WatchEvent =
  | (EventBase & { type: 'new_item'; searchId: string; searchQuery?: string })
  | (EventBase & { type: 'auction_ending_soon'; minutesRemaining: number })
  | (EventBase & {
      type: 'became_high_bidder' | 'outbid' | 'auction_won' | 'auction_lost' | 'item_shipped' | 'item_delivered';
    });

export type CoordinatorHealth = 'ok' | 'failing' | 'rejected';

export type SnapshotView = {
  account: string;
  scope: CoordinatorScope;
  items: ItemRecord[];
  itemCount: number;
  capturedAt?: Date;
  health: CoordinatorHealth;
  consecutiveFailures: number;
  lastError?: string;
};

// Implementations reject with UpstreamUnavailableError or UpstreamRejectedError.
export interface UpstreamClient {
  fetchItems(request: RequestDescriptor): Promise<ItemRecord[]>;
}

export interface Publisher {
  publishEvent(event: WatchEvent): void | Promise<void>;
  publishSnapshot(view: SnapshotView): void | Promise<void>;
  dropSnapshot?(account: string, scope: CoordinatorScope): void;
}

export type StoredSearches = Record<string, SearchDefinition>;

export interface SearchDefinitionStore {
  load(account: string): Promise<StoredSearches>;
  save(account: string, searches: StoredSearches): Promise<void>;
}

export const describeScope = (scope: CoordinatorScope): string =>
  scope.kind === 'category' ? scope.category : `search:${scope.searchId}`;

import { ItemRecord, Snapshot, WatchEvent } from './types.js';

export const ENDING_SOON_WINDOW_MINUTES = 15;

const MS_PER_MINUTE = 60_000;

export type DetectionOptions = {
  searchQuery?: string;
};

const parseEndTime = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const minutesUntilEnd = (item: ItemRecord, at: Date): number | undefined => {
  const end = parseEndTime(item.endTime);
  if (end === undefined) {
    return undefined;
  }
  return (end - at.getTime()) / MS_PER_MINUTE;
};

const isInsideWindow = (minutes: number | undefined): minutes is number =>
  minutes !== undefined && minutes > 0 && minutes <= ENDING_SOON_WINDOW_MINUTES;

// An item counts as flagged when the previous poll already saw it inside the window.
const wasFlagged = (before: ItemRecord | undefined, previous: Snapshot | undefined): boolean =>
  before !== undefined && previous !== undefined && isInsideWindow(minutesUntilEnd(before, previous.capturedAt));

const hasEnded = (item: ItemRecord, at: Date): boolean => {
  const end = parseEndTime(item.endTime);
  return end !== undefined && end <= at.getTime();
};

// Ended auctions follow the events of current items.
export const detectChanges = (
  previous: Snapshot | undefined,
  current: Snapshot,
  options: DetectionOptions = {}
): WatchEvent[] => {
  const events: WatchEvent[] = [];
  const { account, scope } = current;
  const category = scope.kind === 'category' ? scope.category : undefined;
  const tracksEndingSoon = category === 'bids' || category === 'watchlist';

  for (const item of current.items.values()) {
    const before = previous?.items.get(item.itemId);

    if (!before && previous && scope.kind === 'search') {
      events.push({
        type: 'new_item',
        account,
        item,
        searchId: scope.searchId,
        searchQuery: options.searchQuery
      });
    }

    // Any scope that reports a high-bidder flag is compared; in practice that is the bid list.
    if (before && item.isHighBidder !== undefined) {
      const wasHighBidder = before.isHighBidder === true;
      if (item.isHighBidder && !wasHighBidder) {
        events.push({ type: 'became_high_bidder', account, item });
      } else if (!item.isHighBidder && wasHighBidder) {
        events.push({ type: 'outbid', account, item });
      }
    }

    if (tracksEndingSoon) {
      const minutes = minutesUntilEnd(item, current.capturedAt);
      if (isInsideWindow(minutes) && !wasFlagged(before, previous)) {
        events.push({
          type: 'auction_ending_soon',
          account,
          item,
          minutesRemaining: Math.floor(minutes)
        });
      }
    }

    if (before && category === 'purchases') {
      const from = before.shippingStatus;
      const to = item.shippingStatus;
      if (to === 'shipped' && from === 'pending') {
        events.push({ type: 'item_shipped', account, item });
      } else if (to === 'delivered' && (from === 'pending' || from === 'shipped')) {
        events.push({ type: 'item_delivered', account, item });
      }
    }
  }

  if (previous && category === 'bids') {
    for (const before of previous.items.values()) {
      if (current.items.has(before.itemId) || !hasEnded(before, current.capturedAt)) {
        continue;
      }
      events.push({
        type: before.isHighBidder === true ? 'auction_won' : 'auction_lost',
        account,
        item: before
      });
    }
  }

  return events;
};

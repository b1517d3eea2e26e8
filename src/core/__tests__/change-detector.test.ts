import { describe, expect, it } from 'vitest';
import { detectChanges } from '../change-detector.js';
import { createSnapshot } from '../snapshot-store.js';
import { CoordinatorScope, ItemRecord } from '../types.js';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');
const at = (minutes: number): Date => new Date(T0 + minutes * 60_000);
const iso = (minutes: number): string => at(minutes).toISOString();

const BIDS: CoordinatorScope = { kind: 'category', category: 'bids' };
const WATCHLIST: CoordinatorScope = { kind: 'category', category: 'watchlist' };
const PURCHASES: CoordinatorScope = { kind: 'category', category: 'purchases' };
const SEARCH: CoordinatorScope = { kind: 'search', searchId: 's1' };

const item = (itemId: string, fields: Partial<ItemRecord> = {}): ItemRecord => ({
  itemId,
  title: `Item ${itemId}`,
  ...fields
});

const snap = (scope: CoordinatorScope, items: ItemRecord[], minutes = 0) =>
  createSnapshot('main', scope, items, at(minutes));

describe('detectChanges', () => {
  it('yields nothing when a snapshot is compared with itself', () => {
    const snapshot = snap(BIDS, [
      item('1', { isHighBidder: true, endTime: iso(10) }),
      item('2', { isHighBidder: false, endTime: iso(120) })
    ]);
    expect(detectChanges(snapshot, snapshot)).toEqual([]);

    const purchases = snap(PURCHASES, [item('3', { shippingStatus: 'shipped' })]);
    expect(detectChanges(purchases, purchases)).toEqual([]);
  });

  it('is deterministic for the same pair of snapshots', () => {
    const previous = snap(BIDS, [item('1', { isHighBidder: false, endTime: iso(30) })], 0);
    const current = snap(BIDS, [item('1', { isHighBidder: true, endTime: iso(30) })], 20);
    expect(detectChanges(previous, current)).toEqual(detectChanges(previous, current));
  });

  it('reports no new items on the first poll of a search', () => {
    const current = snap(SEARCH, [item('1'), item('2'), item('3')]);
    expect(detectChanges(undefined, current)).toEqual([]);
  });

  it('reports items that appear in a later search poll', () => {
    const previous = snap(SEARCH, [item('1')], 0);
    const added = item('2');
    const current = snap(SEARCH, [item('1'), added], 15);

    expect(detectChanges(previous, current, { searchQuery: 'lego castle' })).toEqual([
      { type: 'new_item', account: 'main', item: added, searchId: 's1', searchQuery: 'lego castle' }
    ]);
  });

  it('does not report new items outside searches', () => {
    const previous = snap(WATCHLIST, [item('1')], 0);
    const current = snap(WATCHLIST, [item('1'), item('2')], 10);
    expect(detectChanges(previous, current)).toEqual([]);
  });

  it('emits exactly one became_high_bidder when the flag turns true', () => {
    const previous = snap(BIDS, [item('1', { isHighBidder: false })], 0);
    const current = snap(BIDS, [item('1', { isHighBidder: true })], 5);

    const events = detectChanges(previous, current);
    expect(events.map((event) => event.type)).toEqual(['became_high_bidder']);
  });

  it('emits outbid when the flag turns false', () => {
    const previous = snap(BIDS, [item('1', { isHighBidder: true })], 0);
    const current = snap(BIDS, [item('1', { isHighBidder: false })], 5);
    expect(detectChanges(previous, current).map((event) => event.type)).toEqual(['outbid']);
  });

  it('treats an unknown previous flag as not leading and ignores an unknown current flag', () => {
    const unknownBefore = snap(BIDS, [item('1')], 0);
    const leading = snap(BIDS, [item('1', { isHighBidder: true })], 5);
    expect(detectChanges(unknownBefore, leading).map((event) => event.type)).toEqual(['became_high_bidder']);

    const unknownAfter = snap(BIDS, [item('1')], 10);
    expect(detectChanges(leading, unknownAfter)).toEqual([]);
  });

  it('orders events by item in current snapshot order', () => {
    const previous = snap(SEARCH, [item('1', { isHighBidder: false })], 0);
    const second = item('2');
    const first = item('1', { isHighBidder: true });
    const current = snap(SEARCH, [first, second], 15);

    expect(detectChanges(previous, current)).toEqual([
      { type: 'became_high_bidder', account: 'main', item: first },
      { type: 'new_item', account: 'main', item: second, searchId: 's1', searchQuery: undefined }
    ]);
  });

  it('flags an auction entering the ending-soon window once', () => {
    const first = snap(BIDS, [item('1', { endTime: iso(20) })], 0);
    const second = snap(BIDS, [item('1', { endTime: iso(20) })], 6);
    const third = snap(BIDS, [item('1', { endTime: iso(20) })], 11);

    expect(detectChanges(first, second)).toEqual([
      { type: 'auction_ending_soon', account: 'main', item: item('1', { endTime: iso(20) }), minutesRemaining: 14 }
    ]);
    expect(detectChanges(second, third)).toEqual([]);
  });

  it('flags ending-soon items on the first poll and for the watchlist', () => {
    const events = detectChanges(undefined, snap(WATCHLIST, [item('1', { endTime: iso(7.5) })], 0));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'auction_ending_soon', minutesRemaining: 7 });
  });

  it('ignores ended, distant or unparseable end times', () => {
    const current = snap(BIDS, [
      item('1', { endTime: iso(-1) }),
      item('2', { endTime: iso(16) }),
      item('3', { endTime: 'not a date' })
    ]);
    expect(detectChanges(undefined, current)).toEqual([]);
  });

  it('does not flag ending-soon for purchases or searches', () => {
    expect(detectChanges(undefined, snap(PURCHASES, [item('1', { endTime: iso(5) })]))).toEqual([]);
    expect(detectChanges(undefined, snap(SEARCH, [item('1', { endTime: iso(5) })]))).toEqual([]);
  });

  it('reports won and lost auctions that left the bid list after their end', () => {
    const won = item('1', { isHighBidder: true, endTime: iso(3) });
    const lost = item('2', { isHighBidder: false, endTime: iso(4) });
    const previous = snap(BIDS, [won, lost], 0);
    const current = snap(BIDS, [], 5);

    expect(detectChanges(previous, current)).toEqual([
      { type: 'auction_won', account: 'main', item: won },
      { type: 'auction_lost', account: 'main', item: lost }
    ]);
  });

  it('stays silent when a bid disappears before its end time', () => {
    const previous = snap(BIDS, [item('1', { isHighBidder: true, endTime: iso(60) })], 0);
    expect(detectChanges(previous, snap(BIDS, [], 5))).toEqual([]);
  });

  it('reports shipping transitions of purchases', () => {
    const previous = snap(PURCHASES, [
      item('1', { shippingStatus: 'pending' }),
      item('2', { shippingStatus: 'shipped' }),
      item('3', { shippingStatus: 'pending' }),
      item('4', { shippingStatus: 'delivered' }),
      item('5')
    ]);
    const current = snap(
      PURCHASES,
      [
        item('1', { shippingStatus: 'shipped' }),
        item('2', { shippingStatus: 'delivered' }),
        item('3', { shippingStatus: 'delivered' }),
        item('4', { shippingStatus: 'delivered' }),
        item('5', { shippingStatus: 'shipped' })
      ],
      30
    );

    expect(detectChanges(previous, current).map((event) => [event.type, event.item.itemId])).toEqual([
      ['item_shipped', '1'],
      ['item_delivered', '2'],
      ['item_delivered', '3']
    ]);
  });

  it('has no event for a watchlist price drop', () => {
    const previous = snap(WATCHLIST, [item('1', { currentPrice: { value: 20, currency: 'GBP' } })], 0);
    const current = snap(WATCHLIST, [item('1', { currentPrice: { value: 15, currency: 'GBP' } })], 10);
    expect(detectChanges(previous, current)).toEqual([]);
  });
});

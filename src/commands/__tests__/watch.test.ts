import { describe, expect, it, vi } from 'vitest';
import { CoordinatorStatus } from '../../core/coordinator.js';
import { NotFoundError, UpstreamUnavailableError, ValidationError } from '../../core/errors.js';
import { CoordinatorRegistry } from '../../core/registry.js';
import { recordingPublisher } from '../../core/__tests__/helpers.js';
import { SearchDefinition } from '../../core/types.js';
import { UsageReport } from '../../providers/api-usage.js';
import { InMemorySearchStore } from '../../storage/search-store.js';
import {
  OptionReader,
  formatSearch,
  formatStatusLine,
  formatUsage,
  parseClearFields,
  parseRefreshTarget,
  parseSearchChanges,
  parseSearchInput,
  resolveAccount,
  runRefresh
} from '../watch.js';

const options = (values: Record<string, string | number | boolean>): OptionReader => ({
  getString: (name) => {
    const value = values[name];
    return typeof value === 'string' ? value : null;
  },
  getNumber: (name) => {
    const value = values[name];
    return typeof value === 'number' ? value : null;
  },
  getInteger: (name) => {
    const value = values[name];
    return typeof value === 'number' ? value : null;
  },
  getBoolean: (name) => {
    const value = values[name];
    return typeof value === 'boolean' ? value : null;
  }
});

const castle: SearchDefinition = {
  searchId: 's1',
  searchQuery: 'lego castle',
  site: 'EBAY-GB',
  categoryId: '19006',
  minPrice: 10,
  listingType: 'auction',
  updateInterval: 15
};

describe('resolveAccount', () => {
  it('uses the only account when none is named', () => {
    expect(resolveAccount(['main'], null)).toBe('main');
    expect(resolveAccount(['main', 'second'], 'second')).toBe('second');
  });

  it('asks for an account when the choice is ambiguous', () => {
    expect(() => resolveAccount(['main', 'second'], null)).toThrow('Bitte ein Konto angeben (main, second)');
    expect(() => resolveAccount([], null)).toThrow('Bitte ein Konto angeben (keine Konten konfiguriert)');
    expect(() => resolveAccount(['main'], 'other')).toThrow(NotFoundError);
  });
});

describe('parseRefreshTarget', () => {
  it('defaults to everything and rejects unknown targets', () => {
    expect(parseRefreshTarget(null)).toBe('all');
    expect(parseRefreshTarget('watchlist')).toBe('watchlist');
    expect(() => parseRefreshTarget('orders')).toThrow('target: unbekannter Wert orders');
  });
});

describe('parseSearchInput', () => {
  it('reads the search fields from the command options', () => {
    expect(
      parseSearchInput(options({ query: 'lego', site: 'EBAY-DE', min_price: 5, listing_type: 'auction', interval: 10 }))
    ).toEqual({
      searchQuery: 'lego',
      site: 'EBAY-DE',
      minPrice: 5,
      listingType: 'auction',
      updateInterval: 10
    });
  });

  it('rejects unknown listing types', () => {
    expect(() => parseSearchInput(options({ query: 'lego', listing_type: 'raffle' }))).toThrow(ValidationError);
  });
});

describe('parseSearchChanges', () => {
  it('turns cleared fields into nulls', () => {
    const changes = parseSearchChanges(options({ clear: 'category, max_price', min_price: 3 }));
    expect(changes).toEqual({ categoryId: null, minPrice: 3, maxPrice: null });
  });

  it('rejects fields that cannot be cleared', () => {
    expect(() => parseClearFields('query')).toThrow('clear: unbekanntes Feld query');
    expect(Array.from(parseClearFields(' , min_price'))).toEqual(['min_price']);
  });
});

describe('runRefresh', () => {
  const setup = () => {
    const registry = new CoordinatorRegistry({
      publisher: recordingPublisher().publisher,
      searchStore: new InMemorySearchStore()
    });
    vi.spyOn(registry, 'accounts').mockReturnValue(['main', 'second']);
    return {
      registry,
      refreshAll: vi.spyOn(registry, 'refreshAll').mockImplementation(() => undefined),
      refreshAccount: vi.spyOn(registry, 'refreshAccount').mockImplementation(() => undefined),
      refreshCategory: vi.spyOn(registry, 'refreshCategory').mockImplementation(() => undefined),
      refreshSearches: vi.spyOn(registry, 'refreshSearches').mockImplementation(() => undefined)
    };
  };

  it('refreshes every account', () => {
    const { registry, refreshAll } = setup();
    expect(runRefresh(registry, undefined, 'all')).toBe('🔄 Aktualisierung angestoßen (all) für main, second.');
    expect(refreshAll).toHaveBeenCalledTimes(1);
  });

  it('refreshes a single account or category', () => {
    const { registry, refreshAccount, refreshCategory } = setup();
    runRefresh(registry, 'main', 'all');
    expect(refreshAccount).toHaveBeenCalledWith('main');

    expect(runRefresh(registry, 'main', 'bids')).toBe('🔄 Aktualisierung angestoßen (bids) für main.');
    expect(refreshCategory).toHaveBeenCalledWith('main', 'bids');
  });

  it('refreshes the searches of every account', () => {
    const { registry, refreshSearches } = setup();
    runRefresh(registry, undefined, 'searches');
    expect(refreshSearches.mock.calls).toEqual([['main'], ['second']]);
  });
});

describe('formatting', () => {
  it('summarizes a saved search on one line', () => {
    expect(formatSearch(castle)).toBe(
      '• `s1` **lego castle** · EBAY-GB · auction · alle 15 Min. · Preis 10.00 – ∞ · Kategorie 19006'
    );
    expect(formatSearch({ ...castle, categoryId: undefined, minPrice: undefined, listingType: 'both' })).toBe(
      '• `s1` **lego castle** · EBAY-GB · both · alle 15 Min.'
    );
  });

  it('describes coordinator health', () => {
    const failing: CoordinatorStatus = {
      account: 'main',
      scope: { kind: 'category', category: 'bids' },
      intervalMs: 300_000,
      running: true,
      health: 'failing',
      consecutiveFailures: 2,
      lastSuccessAt: new Date('2026-03-01T12:00:00.000Z'),
      lastError: new UpstreamUnavailableError('GetUser: HTTP 503'),
      itemCount: 4
    };
    expect(formatStatusLine(failing)).toBe(
      '⚠️ main/bids: 4 Einträge, letzter Abruf 2026-03-01T12:00:00.000Z, 2 Fehlversuche (GetUser: HTTP 503)'
    );
    expect(
      formatStatusLine({
        ...failing,
        scope: { kind: 'search', searchId: 's1' },
        health: 'ok',
        consecutiveFailures: 0,
        lastSuccessAt: undefined,
        lastError: undefined,
        itemCount: 0
      })
    ).toBe('✅ main/search:s1: 0 Einträge, letzter Abruf nie');
  });

  it('lists API usage', () => {
    const trackingStart = new Date('2026-03-01T10:00:00.000Z');
    const report: UsageReport = {
      account: 'main',
      trackingStart,
      currentTime: new Date('2026-03-01T12:00:00.000Z'),
      apis: [
        {
          apiName: 'browse',
          callsMade: 10,
          trackingSince: trackingStart,
          hoursElapsed: 2,
          callsPerHour: 5,
          estimatedDaily: 120
        }
      ],
      totalCalls: 10,
      estimatedDailyTotal: 120,
      level: 'low'
    };
    expect(formatUsage(report)).toBe(
      [
        '**API-Nutzung main** seit 2026-03-01T10:00:00.000Z',
        '• browse: 10 Aufrufe in 2 h (5/h, ~120/Tag)',
        'Gesamt: 10 Aufrufe, ~120/Tag, Auslastung niedrig'
      ].join('\n')
    );
  });
});

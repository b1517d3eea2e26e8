import type Bottleneck from 'bottleneck';
import { logger } from '../util/logger.js';
import { createLock } from '../util/rate.js';
import { CoordinatorStatus, RefreshCoordinator } from './coordinator.js';
import { NotFoundError, ValidationError } from './errors.js';
import {
  SearchDefinitionChanges,
  SearchDefinitionInput,
  applySearchChanges,
  createSearchDefinition,
  queryChanged,
  toSearchRequest
} from './search-definition.js';
import { SnapshotStore } from './snapshot-store.js';
import {
  CoordinatorScope,
  DATA_CATEGORIES,
  DataCategory,
  Publisher,
  RequestDescriptor,
  SearchDefinition,
  SearchDefinitionStore,
  Snapshot,
  StoredSearches,
  UpstreamClient
} from './types.js';

export type CategoryIntervals = Record<DataCategory, number>;

export const DEFAULT_CATEGORY_INTERVALS: CategoryIntervals = {
  bids: 5,
  watchlist: 10,
  purchases: 30
};

const minutesToMs = (minutes: number): number => minutes * 60_000;

export type RegistryOptions = {
  publisher: Publisher;
  searchStore: SearchDefinitionStore;
  snapshots?: SnapshotStore;
  intervals?: Partial<CategoryIntervals>;
  maxBackoffMs?: number;
  now?: () => Date;
};

type SearchEntry = {
  definition: SearchDefinition;
  coordinator: RefreshCoordinator;
};

type AccountEntry = {
  account: string;
  client: UpstreamClient;
  categories: Map<DataCategory, RefreshCoordinator>;
  searches: Map<string, SearchEntry>;
};

// Mutations run on the lock and commit their table changes synchronously after persisting.
export class CoordinatorRegistry {
  readonly snapshots: SnapshotStore;

  private readonly table = new Map<string, AccountEntry>();
  private readonly lock: Bottleneck = createLock('coordinator-registry');
  private readonly intervals: CategoryIntervals;

  constructor(private readonly options: RegistryOptions) {
    this.snapshots = options.snapshots ?? new SnapshotStore();
    this.intervals = { ...DEFAULT_CATEGORY_INTERVALS, ...options.intervals };
  }

  accounts(): string[] {
    return Array.from(this.table.keys());
  }

  async addAccount(account: string, client: UpstreamClient): Promise<void> {
    await this.exclusive(async () => {
      if (this.table.has(account)) {
        throw new ValidationError([`Konto ${account} ist bereits registriert`]);
      }
      const stored = await this.options.searchStore.load(account);

      const entry: AccountEntry = {
        account,
        client,
        categories: new Map(),
        searches: new Map()
      };
      for (const category of DATA_CATEGORIES) {
        const coordinator = this.createCoordinator(
          entry,
          { kind: 'category', category },
          { kind: 'category', category },
          minutesToMs(this.intervals[category])
        );
        entry.categories.set(category, coordinator);
      }
      for (const definition of Object.values(stored)) {
        entry.searches.set(definition.searchId, {
          definition,
          coordinator: this.createSearchCoordinator(entry, definition)
        });
      }

      this.table.set(account, entry);
      for (const coordinator of this.coordinatorsOf(entry)) {
        coordinator.start();
      }
      logger.info(`Konto ${account} hinzugefügt`, { searches: entry.searches.size });
    });
  }

  async removeAccount(account: string): Promise<void> {
    await this.exclusive(async () => {
      const entry = this.requireAccount(account);
      this.table.delete(account);
      for (const coordinator of this.coordinatorsOf(entry)) {
        coordinator.retire();
        this.options.publisher.dropSnapshot?.(account, coordinator.scope);
      }
      this.snapshots.dropAccount(account);
      await this.options.searchStore.save(account, {});
      logger.info(`Konto ${account} entfernt`);
    });
  }

  async addSearch(account: string, input: SearchDefinitionInput): Promise<SearchDefinition> {
    const definition = createSearchDefinition(input);
    return this.exclusive(async () => {
      const entry = this.requireAccount(account);
      await this.persist(entry, { ...this.storedSearches(entry), [definition.searchId]: definition });

      const coordinator = this.createSearchCoordinator(entry, definition);
      entry.searches.set(definition.searchId, { definition, coordinator });
      coordinator.start();
      logger.info(`Suche ${definition.searchId} für ${account} angelegt`, { query: definition.searchQuery });
      return definition;
    });
  }

  async updateSearch(account: string, searchId: string, changes: SearchDefinitionChanges): Promise<SearchDefinition> {
    return this.exclusive(async () => {
      const entry = this.requireAccount(account);
      const search = this.requireSearch(entry, searchId);
      const updated = applySearchChanges(search.definition, changes);
      await this.persist(entry, { ...this.storedSearches(entry), [searchId]: updated });

      const scope: CoordinatorScope = { kind: 'search', searchId };
      if (queryChanged(search.definition, updated)) {
        this.dropSnapshot(account, scope);
      }
      search.definition = updated;
      search.coordinator.reconfigure(toSearchRequest(updated), minutesToMs(updated.updateInterval));
      logger.info(`Suche ${searchId} für ${account} aktualisiert`);
      return updated;
    });
  }

  async deleteSearch(account: string, searchId: string): Promise<void> {
    await this.exclusive(async () => {
      const entry = this.requireAccount(account);
      const search = this.requireSearch(entry, searchId);
      const remaining = this.storedSearches(entry);
      delete remaining[searchId];
      await this.persist(entry, remaining);

      entry.searches.delete(searchId);
      search.coordinator.retire();
      this.dropSnapshot(account, { kind: 'search', searchId });
      logger.info(`Suche ${searchId} für ${account} gelöscht`);
    });
  }

  listSearches(account: string): SearchDefinition[] {
    const entry = this.requireAccount(account);
    return Array.from(entry.searches.values(), (search) => search.definition);
  }

  refreshCategory(account: string, category: DataCategory): void {
    const entry = this.requireAccount(account);
    const coordinator = entry.categories.get(category);
    if (coordinator) {
      this.fire([coordinator]);
    }
  }

  refreshSearch(account: string, searchId: string): void {
    const entry = this.requireAccount(account);
    this.fire([this.requireSearch(entry, searchId).coordinator]);
  }

  refreshSearches(account: string): void {
    const entry = this.requireAccount(account);
    this.fire(Array.from(entry.searches.values(), (search) => search.coordinator));
  }

  refreshAccount(account: string): void {
    this.fire(this.coordinatorsOf(this.requireAccount(account)));
  }

  refreshAll(): void {
    this.fire(Array.from(this.table.values()).flatMap((entry) => this.coordinatorsOf(entry)));
  }

  listStatus(account?: string): CoordinatorStatus[] {
    const entries = account === undefined ? Array.from(this.table.values()) : [this.requireAccount(account)];
    return entries.flatMap((entry) => this.coordinatorsOf(entry).map((coordinator) => coordinator.status()));
  }

  getSnapshot(account: string, scope: CoordinatorScope): Snapshot | undefined {
    return this.snapshots.get(account, scope);
  }

  async shutdown(): Promise<void> {
    await this.exclusive(async () => {
      for (const entry of this.table.values()) {
        for (const coordinator of this.coordinatorsOf(entry)) {
          coordinator.retire();
        }
      }
      this.table.clear();
    });
  }

  private dropSnapshot(account: string, scope: CoordinatorScope): void {
    this.snapshots.drop(account, scope);
    this.options.publisher.dropSnapshot?.(account, scope);
  }

  private exclusive<T>(job: () => Promise<T>): Promise<T> {
    return this.lock.schedule(job);
  }

  private fire(coordinators: RefreshCoordinator[]): void {
    for (const coordinator of coordinators) {
      void coordinator.triggerNow();
    }
  }

  private requireAccount(account: string): AccountEntry {
    const entry = this.table.get(account);
    if (!entry) {
      throw new NotFoundError(`Unbekanntes Konto: ${account}`);
    }
    return entry;
  }

  private requireSearch(entry: AccountEntry, searchId: string): SearchEntry {
    const search = entry.searches.get(searchId);
    if (!search) {
      throw new NotFoundError(`Unbekannte Suche ${searchId} für Konto ${entry.account}`);
    }
    return search;
  }

  private coordinatorsOf(entry: AccountEntry): RefreshCoordinator[] {
    return [
      ...entry.categories.values(),
      ...Array.from(entry.searches.values(), (search) => search.coordinator)
    ];
  }

  private storedSearches(entry: AccountEntry): StoredSearches {
    const stored: StoredSearches = {};
    for (const [searchId, search] of entry.searches) {
      stored[searchId] = search.definition;
    }
    return stored;
  }

  private persist(entry: AccountEntry, searches: StoredSearches): Promise<void> {
    return this.options.searchStore.save(entry.account, searches);
  }

  private createSearchCoordinator(entry: AccountEntry, definition: SearchDefinition): RefreshCoordinator {
    return this.createCoordinator(
      entry,
      { kind: 'search', searchId: definition.searchId },
      toSearchRequest(definition),
      minutesToMs(definition.updateInterval)
    );
  }

  private createCoordinator(
    entry: AccountEntry,
    scope: CoordinatorScope,
    request: RequestDescriptor,
    intervalMs: number
  ): RefreshCoordinator {
    return new RefreshCoordinator({
      account: entry.account,
      scope,
      request,
      intervalMs,
      client: entry.client,
      publisher: this.options.publisher,
      snapshots: this.snapshots,
      maxBackoffMs: this.options.maxBackoffMs,
      now: this.options.now
    });
  }
}

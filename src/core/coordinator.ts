import { logger } from '../util/logger.js';
import { detectChanges } from './change-detector.js';
import { UpstreamError, UpstreamRejectedError, errorMessage, toUpstreamError } from './errors.js';
import { SnapshotStore, createSnapshot } from './snapshot-store.js';
import {
  CoordinatorHealth,
  CoordinatorScope,
  ItemRecord,
  Publisher,
  RequestDescriptor,
  SnapshotView,
  UpstreamClient,
  describeScope
} from './types.js';

export const DEFAULT_MAX_BACKOFF_MS = 60 * 60_000;

export type CoordinatorOptions = {
  account: string;
  scope: CoordinatorScope;
  request: RequestDescriptor;
  intervalMs: number;
  client: UpstreamClient;
  publisher: Publisher;
  snapshots: SnapshotStore;
  maxBackoffMs?: number;
  now?: () => Date;
};

export type CoordinatorStatus = {
  account: string;
  scope: CoordinatorScope;
  intervalMs: number;
  running: boolean;
  health: CoordinatorHealth;
  consecutiveFailures: number;
  lastSuccessAt?: Date;
  lastError?: UpstreamError;
  itemCount: number;
};

export const computeDelay = (intervalMs: number, consecutiveFailures: number, maxBackoffMs: number): number => {
  if (consecutiveFailures <= 0) {
    return intervalMs;
  }
  const cap = Math.max(maxBackoffMs, intervalMs);
  return Math.min(intervalMs * 2 ** consecutiveFailures, cap);
};

export class RefreshCoordinator {
  readonly account: string;
  readonly scope: CoordinatorScope;

  private request: RequestDescriptor;
  private intervalMs: number;
  private readonly client: UpstreamClient;
  private readonly publisher: Publisher;
  private readonly snapshots: SnapshotStore;
  private readonly maxBackoffMs: number;
  private readonly now: () => Date;

  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private running = false;
  private retired = false;
  private rerunRequested = false;
  // Bumped on reconfiguration; results fetched under an older generation are dropped.
  private generation = 0;

  private consecutiveFailures = 0;
  private lastSuccessAt: Date | undefined;
  private lastError: UpstreamError | undefined;

  constructor(options: CoordinatorOptions) {
    this.account = options.account;
    this.scope = options.scope;
    this.request = options.request;
    this.intervalMs = options.intervalMs;
    this.client = options.client;
    this.publisher = options.publisher;
    this.snapshots = options.snapshots;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.now = options.now ?? (() => new Date());
  }

  get label(): string {
    return `${this.account}/${describeScope(this.scope)}`;
  }

  start(intervalMs?: number): void {
    if (this.retired) {
      return;
    }
    if (intervalMs !== undefined) {
      this.intervalMs = intervalMs;
    }
    this.running = true;
    this.clearTimer();
    this.runSoon();
  }

  stop(): void {
    this.running = false;
    this.rerunRequested = false;
    this.clearTimer();
  }

  retire(): void {
    this.retired = true;
    this.stop();
  }

  reconfigure(request: RequestDescriptor, intervalMs: number): void {
    this.generation += 1;
    this.request = request;
    this.intervalMs = intervalMs;
    if (this.running) {
      this.clearTimer();
      this.runSoon();
    }
  }

  triggerNow(): Promise<void> {
    if (this.retired) {
      return Promise.resolve();
    }
    if (this.inFlight) {
      return this.inFlight;
    }
    this.clearTimer();
    return this.runTick();
  }

  status(): CoordinatorStatus {
    return {
      account: this.account,
      scope: this.scope,
      intervalMs: this.intervalMs,
      running: this.running,
      health: this.health(),
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError,
      itemCount: this.snapshots.get(this.account, this.scope)?.items.size ?? 0
    };
  }

  private health(): CoordinatorHealth {
    if (!this.lastError) {
      return 'ok';
    }
    return this.lastError instanceof UpstreamRejectedError ? 'rejected' : 'failing';
  }

  private runSoon(): void {
    if (this.inFlight) {
      this.rerunRequested = true;
      return;
    }
    void this.runTick();
  }

  // The returned promise never rejects.
  private runTick(): Promise<void> {
    const tick = this.tick()
      .catch((error: unknown) => {
        logger.error(`Unerwarteter Fehler im Abruf für ${this.label}`, { error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight = undefined;
        this.scheduleNext();
      });
    this.inFlight = tick;
    return tick;
  }

  private scheduleNext(): void {
    if (!this.running || this.retired) {
      return;
    }
    this.clearTimer();
    if (this.rerunRequested) {
      this.rerunRequested = false;
      void this.runTick();
      return;
    }
    const delay = computeDelay(this.intervalMs, this.consecutiveFailures, this.maxBackoffMs);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.runTick();
    }, delay);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private isOutdated(generation: number): boolean {
    return this.retired || generation !== this.generation;
  }

  private async tick(): Promise<void> {
    const generation = this.generation;
    const request = this.request;

    let records: ItemRecord[];
    try {
      records = await this.client.fetchItems(request);
    } catch (error) {
      if (this.isOutdated(generation)) {
        logger.debug(`Verworfener Fehlversuch für ${this.label}`);
        return;
      }
      await this.recordFailure(toUpstreamError(error));
      return;
    }

    if (this.isOutdated(generation)) {
      logger.debug(`Verworfenes Ergebnis für ${this.label}`);
      return;
    }

    const snapshot = createSnapshot(this.account, this.scope, records, this.now());
    const previous = this.snapshots.get(this.account, this.scope);
    const events = detectChanges(previous, snapshot, {
      searchQuery: request.kind === 'search' ? request.search.searchQuery : undefined
    });

    // From here the tick is committed: a reconfiguration only affects the next one.
    for (const event of events) {
      if (this.retired) {
        return;
      }
      await this.deliver('event', () => this.publisher.publishEvent(event));
    }
    if (this.retired || this.snapshots.get(this.account, this.scope) !== previous) {
      logger.debug(`Snapshot für ${this.label} wurde während der Veröffentlichung verworfen`);
      return;
    }

    this.snapshots.replace(snapshot);
    this.consecutiveFailures = 0;
    this.lastError = undefined;
    this.lastSuccessAt = snapshot.capturedAt;

    logger.debug(`Aktualisiert: ${this.label}`, { items: snapshot.items.size, events: events.length });
    await this.deliver('snapshot', () => this.publisher.publishSnapshot(this.view()));
  }

  private async recordFailure(error: UpstreamError): Promise<void> {
    this.consecutiveFailures += 1;
    this.lastError = error;

    const meta = {
      error: error.message,
      consecutiveFailures: this.consecutiveFailures,
      retryInMs: computeDelay(this.intervalMs, this.consecutiveFailures, this.maxBackoffMs)
    };
    if (error instanceof UpstreamRejectedError) {
      logger.error(`Zugriff abgelehnt für ${this.label}, Zugangsdaten prüfen`, meta);
    } else {
      logger.warn(`Abruf fehlgeschlagen für ${this.label}`, meta);
    }

    await this.deliver('snapshot', () => this.publisher.publishSnapshot(this.view()));
  }

  private view(): SnapshotView {
    const snapshot = this.snapshots.get(this.account, this.scope);
    const items = snapshot ? Array.from(snapshot.items.values()) : [];
    return {
      account: this.account,
      scope: this.scope,
      items,
      itemCount: items.length,
      capturedAt: snapshot?.capturedAt,
      health: this.health(),
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError?.message
    };
  }

  private async deliver(kind: 'event' | 'snapshot', publish: () => void | Promise<void>): Promise<void> {
    try {
      await publish();
    } catch (error) {
      logger.error(`Veröffentlichung (${kind}) fehlgeschlagen für ${this.label}`, {
        error: errorMessage(error)
      });
    }
  }
}

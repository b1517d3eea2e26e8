import { snapshotKey } from './snapshot-store.js';
import { CoordinatorScope, Publisher, SnapshotView, WatchEvent } from './types.js';

const DEFAULT_EVENT_HISTORY = 100;

export type RecordedEvent = {
  at: Date;
  event: WatchEvent;
};

export class SnapshotBoard implements Publisher {
  private readonly views = new Map<string, SnapshotView>();
  private readonly events: RecordedEvent[] = [];

  constructor(
    private readonly historySize = DEFAULT_EVENT_HISTORY,
    private readonly now: () => Date = () => new Date()
  ) {}

  publishEvent(event: WatchEvent): void {
    this.events.push({ at: this.now(), event });
    if (this.events.length > this.historySize) {
      this.events.splice(0, this.events.length - this.historySize);
    }
  }

  publishSnapshot(view: SnapshotView): void {
    this.views.set(snapshotKey(view.account, view.scope), view);
  }

  view(account: string, scope: CoordinatorScope): SnapshotView | undefined {
    return this.views.get(snapshotKey(account, scope));
  }

  viewsOf(account: string): SnapshotView[] {
    return Array.from(this.views.values()).filter((view) => view.account === account);
  }

  recentEvents(limit = this.historySize, account?: string): WatchEvent[] {
    const matching = this.events
      .map((entry) => entry.event)
      .filter((event) => account === undefined || event.account === account);
    return matching.slice(Math.max(0, matching.length - limit));
  }

  dropSnapshot(account: string, scope: CoordinatorScope): void {
    this.views.delete(snapshotKey(account, scope));
  }
}

// Every publisher receives the message; the first failure is rethrown afterwards.
export const combinePublishers = (...publishers: Publisher[]): Publisher => {
  const fanOut = async (send: (publisher: Publisher) => void | Promise<void>): Promise<void> => {
    const results = await Promise.allSettled(publishers.map(async (publisher) => send(publisher)));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  };
  return {
    publishEvent: (event) => fanOut((publisher) => publisher.publishEvent(event)),
    publishSnapshot: (view) => fanOut((publisher) => publisher.publishSnapshot(view)),
    dropSnapshot: (account, scope) => {
      for (const publisher of publishers) {
        publisher.dropSnapshot?.(account, scope);
      }
    }
  };
};

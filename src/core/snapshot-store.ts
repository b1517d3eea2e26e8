import { CoordinatorScope, ItemRecord, Snapshot, describeScope } from './types.js';

export const snapshotKey = (account: string, scope: CoordinatorScope): string =>
  JSON.stringify([account, describeScope(scope)]);

export const createSnapshot = (
  account: string,
  scope: CoordinatorScope,
  records: ItemRecord[],
  capturedAt: Date
): Snapshot => {
  const items = new Map<string, ItemRecord>();
  for (const record of records) {
    if (!items.has(record.itemId)) {
      items.set(record.itemId, record);
    }
  }
  return { account, scope, capturedAt, items };
};

export class SnapshotStore {
  private readonly store = new Map<string, Snapshot>();

  get(account: string, scope: CoordinatorScope): Snapshot | undefined {
    return this.store.get(snapshotKey(account, scope));
  }

  replace(snapshot: Snapshot): void {
    this.store.set(snapshotKey(snapshot.account, snapshot.scope), snapshot);
  }

  drop(account: string, scope: CoordinatorScope): boolean {
    return this.store.delete(snapshotKey(account, scope));
  }

  dropAccount(account: string): number {
    let dropped = 0;
    for (const [key, snapshot] of this.store) {
      if (snapshot.account === account) {
        this.store.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.store.size;
  }
}

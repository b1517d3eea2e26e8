import { vi } from 'vitest';
import { ItemRecord, Publisher, RequestDescriptor, SnapshotView, UpstreamClient, WatchEvent } from '../types.js';

export const item = (itemId: string, fields: Partial<ItemRecord> = {}): ItemRecord => ({
  itemId,
  title: `Item ${itemId}`,
  ...fields
});

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export const deferred = <T>(): Deferred<T> => {
  const handlers: Pick<Deferred<T>, 'resolve' | 'reject'> = {
    resolve: () => undefined,
    reject: () => undefined
  };
  const promise = new Promise<T>((resolve, reject) => {
    handlers.resolve = resolve;
    handlers.reject = reject;
  });
  return { promise, ...handlers };
};

export const fakeClient = () => {
  const fetchItems = vi.fn<(request: RequestDescriptor) => Promise<ItemRecord[]>>();
  const client: UpstreamClient = { fetchItems };
  return { client, fetchItems };
};

export const recordingPublisher = () => {
  const events: WatchEvent[] = [];
  const views: SnapshotView[] = [];
  const publisher: Publisher = {
    publishEvent: (event) => {
      events.push(event);
    },
    publishSnapshot: (view) => {
      views.push(view);
    }
  };
  return { publisher, events, views };
};

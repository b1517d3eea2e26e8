import Bottleneck from 'bottleneck';

export type LimiterOptions = {
  id?: string;
  minTime?: number;
  maxConcurrent?: number;
};

export const createLimiter = (options: LimiterOptions): Bottleneck => {
  return new Bottleneck({
    id: options.id,
    minTime: options.minTime ?? 200,
    maxConcurrent: options.maxConcurrent ?? 5
  });
};

// Jobs on a lock must not schedule onto the same lock again.
export const createLock = (id: string): Bottleneck => createLimiter({ id, minTime: 0, maxConcurrent: 1 });

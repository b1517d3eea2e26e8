import { logger } from '../util/logger.js';

export type ApiName = 'browse' | 'trading';

const API_NAMES: readonly ApiName[] = ['browse', 'trading'] as const;

const MS_PER_HOUR = 3_600_000;
const LOG_EVERY = 10;
const HIGH_DAILY_USAGE = 4000;
const MODERATE_DAILY_USAGE = 2000;

type Counter = {
  count: number;
  since: Date;
};

export type UsageLevel = 'low' | 'moderate' | 'high';

export type ApiUsage = {
  apiName: ApiName;
  callsMade: number;
  trackingSince: Date;
  hoursElapsed: number;
  callsPerHour: number;
  estimatedDaily: number;
};

export type UsageReport = {
  account: string;
  trackingStart: Date;
  currentTime: Date;
  apis: ApiUsage[];
  totalCalls: number;
  estimatedDailyTotal: number;
  level: UsageLevel;
};

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const classifyUsage = (estimatedDaily: number): UsageLevel => {
  if (estimatedDaily > HIGH_DAILY_USAGE) {
    return 'high';
  }
  if (estimatedDaily > MODERATE_DAILY_USAGE) {
    return 'moderate';
  }
  return 'low';
};

export class ApiUsageTracker {
  private readonly counters = new Map<ApiName, Counter>();

  constructor(
    readonly account: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.reset();
  }

  track(api: ApiName): void {
    const counter = this.counter(api);
    counter.count += 1;
    if (counter.count % LOG_EVERY === 0) {
      logger.info(`API-Aufrufe ${api.toUpperCase()} für ${this.account}: ${counter.count}`, {
        since: counter.since.toISOString()
      });
    }
  }

  reset(): void {
    const since = this.now();
    for (const api of API_NAMES) {
      this.counters.set(api, { count: 0, since });
    }
  }

  report(): UsageReport {
    const currentTime = this.now();
    const apis = API_NAMES.map((apiName): ApiUsage => {
      const { count, since } = this.counter(apiName);
      const hours = (currentTime.getTime() - since.getTime()) / MS_PER_HOUR;
      const callsPerHour = hours > 0 ? count / hours : 0;
      return {
        apiName,
        callsMade: count,
        trackingSince: since,
        hoursElapsed: round(hours, 2),
        callsPerHour: round(callsPerHour, 1),
        estimatedDaily: Math.round(callsPerHour * 24)
      };
    });
    const trackingStart = new Date(Math.min(...apis.map((api) => api.trackingSince.getTime())));
    const estimatedDailyTotal = apis.reduce((sum, api) => sum + api.estimatedDaily, 0);

    return {
      account: this.account,
      trackingStart,
      currentTime,
      apis,
      totalCalls: apis.reduce((sum, api) => sum + api.callsMade, 0),
      estimatedDailyTotal,
      level: classifyUsage(estimatedDailyTotal)
    };
  }

  private counter(api: ApiName): Counter {
    const existing = this.counters.get(api);
    if (existing) {
      return existing;
    }
    const created = { count: 0, since: this.now() };
    this.counters.set(api, created);
    return created;
  }
}

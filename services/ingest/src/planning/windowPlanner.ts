import { DAY_MS, startOfUtcDay, utcDateKey } from '../cursors/timestamps';

export type WindowGranularity = 'instant' | 'day';

export type WindowPolicy = {
  bootstrapLookbackMs: number;
  overlapMs: number;
  granularity: WindowGranularity;
  floor: Date;
  /** Only records strictly newer than the prior watermark count as new. */
  countOnlyNewer: boolean;
};

export type FetchWindow = {
  start: Date;
  end: Date;
  /** False when the window was derived from the bootstrap lookback. */
  resumed: boolean;
};

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export const DEFAULT_WINDOW_FLOOR = new Date(Date.UTC(2015, 0, 1));

/** Half-hour interval plus one second. */
export const INTERVAL_OVERLAP_MS = 30 * MINUTE_MS + 1_000;

export function consumptionPolicy(options: { lookbackDays?: number; floor?: Date } = {}): WindowPolicy {
  return {
    bootstrapLookbackMs: (options.lookbackDays ?? 7) * DAY_MS,
    overlapMs: INTERVAL_OVERLAP_MS,
    granularity: 'instant',
    floor: options.floor ?? DEFAULT_WINDOW_FLOOR,
    countOnlyNewer: false
  };
}

export function unitRatePolicy(options: { lookbackDays?: number; floor?: Date } = {}): WindowPolicy {
  return {
    bootstrapLookbackMs: (options.lookbackDays ?? 30) * DAY_MS,
    overlapMs: INTERVAL_OVERLAP_MS,
    granularity: 'instant',
    floor: options.floor ?? DEFAULT_WINDOW_FLOOR,
    countOnlyNewer: false
  };
}

export function heatingPolicy(options: { lookbackHours?: number; floor?: Date } = {}): WindowPolicy {
  return {
    bootstrapLookbackMs: (options.lookbackHours ?? 1) * HOUR_MS,
    overlapMs: 0,
    granularity: 'day',
    floor: options.floor ?? DEFAULT_WINDOW_FLOOR,
    countOnlyNewer: true
  };
}

export function planWindow(prior: Date | null, now: Date, policy: WindowPolicy): FetchWindow {
  const end = new Date(now.getTime());
  let start: Date;
  if (prior === null) {
    start = new Date(now.getTime() - policy.bootstrapLookbackMs);
  } else if (policy.granularity === 'day') {
    start = startOfUtcDay(prior);
  } else {
    start = new Date(prior.getTime() - policy.overlapMs);
  }

  if (start.getTime() < policy.floor.getTime()) {
    start = new Date(policy.floor.getTime());
  }
  if (start.getTime() > end.getTime()) {
    start = new Date(end.getTime());
  }
  return { start, end, resumed: prior !== null };
}

/** UTC dates touched by `[start, end]`, both ends inclusive. */
export function enumerateUtcDates(start: Date, end: Date): string[] {
  const dates: string[] = [];
  const last = startOfUtcDay(end).getTime();
  for (let day = startOfUtcDay(start).getTime(); day <= last; day += DAY_MS) {
    dates.push(utcDateKey(new Date(day)));
  }
  return dates;
}

export function isNewerThan(timestamp: Date, prior: Date | null): boolean {
  return prior === null || timestamp.getTime() > prior.getTime();
}

import { parseTimestamp } from '../cursors/timestamps';
import type { ConsumptionRecord } from '../records/types';

export type IntervalGapReport = {
  expected: number;
  actual: number;
  missing: number;
};

/**
 * Counts the fixed-length slots missing between the first and last
 * `interval_end`. Fewer than two readings give no baseline and report nothing missing.
 */
export function detectMissingIntervals(
  records: readonly Pick<ConsumptionRecord, 'interval_end'>[],
  intervalMinutes = 30
): IntervalGapReport {
  const ends = records
    .map((record) => parseTimestamp(record.interval_end))
    .filter((value): value is Date => value !== null)
    .map((value) => value.getTime())
    .sort((a, b) => a - b);

  if (ends.length < 2) {
    return { expected: records.length, actual: records.length, missing: 0 };
  }

  const slotMs = intervalMinutes * 60_000;
  const first = ends[0] ?? 0;
  const last = ends[ends.length - 1] ?? 0;
  const expected = Math.floor((last - (first - slotMs)) / slotMs);
  const actual = ends.length;
  return { expected, actual, missing: Math.max(0, expected - actual) };
}

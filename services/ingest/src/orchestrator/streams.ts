import { formatTimestamp, parseTimestamp } from '../cursors/timestamps';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { planWindow } from '../planning/windowPlanner';
import type { Dataset, PartitionRow } from '../storage/types';
import type { IngestionStream, StreamOutcome } from './types';

export function latestTimestamp<R extends PartitionRow>(dataset: Dataset<R>, records: readonly R[]): Date | null {
  let latest: Date | null = null;
  for (const record of records) {
    const at = parseTimestamp(dataset.timestampOf(record));
    if (at && (!latest || at.getTime() > latest.getTime())) {
      latest = at;
    }
  }
  return latest;
}

export function maxDate(...values: Array<Date | null>): Date | null {
  let latest: Date | null = null;
  for (const value of values) {
    if (value && (!latest || value.getTime() > latest.getTime())) {
      latest = value;
    }
  }
  return latest;
}

/**
 * One pass of a stream: read cursor, plan, fetch and write, then advance the
 * cursor when at least one record counted. Errors propagate to the caller.
 */
export async function runStream(stream: IngestionStream, now: Date, logger: Logger): Promise<StreamOutcome> {
  const { descriptor } = stream;
  const prior = await stream.cursor.get(descriptor.key);
  const window = planWindow(prior, now, stream.policy);
  logger.info(
    {
      windowStart: formatTimestamp(window.start),
      windowEnd: formatTimestamp(window.end),
      watermark: prior ? formatTimestamp(prior) : null,
      resumed: window.resumed
    },
    window.resumed ? 'resuming stream from watermark' : 'no watermark, bootstrapping stream'
  );

  const result = await stream.execute(window, prior, logger);
  if (result.skipped > 0) {
    logger.warn({ skipped: result.skipped }, 'skipped malformed records');
  }

  let watermark = prior;
  if (result.counted > 0 && result.latest) {
    watermark = await stream.cursor.advance(descriptor.key, result.latest);
  }

  logger.info(
    {
      fetched: result.fetched,
      counted: result.counted,
      partitions: result.partitions.length,
      watermark: watermark ? formatTimestamp(watermark) : null
    },
    result.counted > 0 ? 'stream ingested' : 'no new records'
  );

  return {
    key: descriptor.key,
    kind: descriptor.kind,
    status: 'succeeded',
    fetched: result.fetched,
    counted: result.counted,
    partitions: result.partitions.length,
    watermark: watermark ? formatTimestamp(watermark) : null
  };
}

export function failedOutcome(stream: IngestionStream, error: unknown): StreamOutcome {
  return {
    key: stream.descriptor.key,
    kind: stream.descriptor.kind,
    status: 'failed',
    fetched: 0,
    counted: 0,
    partitions: 0,
    watermark: null,
    error: errorMessage(error)
  };
}

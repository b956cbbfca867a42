import { AuthenticationError, IngestionRunError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { failedOutcome, runStream } from './streams';
import type {
  IngestionSource,
  IngestionStream,
  RunStatus,
  RunSummary,
  SourceRegistration,
  SourceSummary
} from './types';

export type RunIngestionOptions = {
  logger: Logger;
  now?: () => Date;
};

export function resolveRunStatus(successCount: number, errorCount: number): RunStatus {
  if (errorCount === 0) {
    return 'success';
  }
  return successCount > 0 ? 'partial_failure' : 'total_failure';
}

function emptySummary(source: SourceRegistration, skipped: boolean): SourceSummary {
  return { source: source.name, skipped, successCount: 0, errorCount: 0, aborted: false, streams: [] };
}

async function runSource(registration: SourceRegistration, now: Date, logger: Logger): Promise<SourceSummary> {
  const summary = emptySummary(registration, false);
  const sourceLogger = logger.child({ source: registration.name });

  let source: IngestionSource;
  let streams: IngestionStream[];
  try {
    source = await registration.create();
  } catch (error) {
    sourceLogger.error({ err: error }, 'failed to load source settings');
    return { ...summary, errorCount: 1, error: errorMessage(error) };
  }

  try {
    try {
      streams = await source.enumerate();
    } catch (error) {
      sourceLogger.error({ err: error }, 'failed to enumerate streams');
      return { ...summary, errorCount: 1, error: errorMessage(error) };
    }
    sourceLogger.info({ streams: streams.length }, 'enumerated streams');

    for (const stream of streams) {
      const streamLogger = sourceLogger.child({ stream: stream.descriptor.key, kind: stream.descriptor.kind });
      try {
        summary.streams.push(await runStream(stream, now, streamLogger));
        summary.successCount += 1;
      } catch (error) {
        streamLogger.error({ err: error, labels: stream.descriptor.labels }, 'stream failed');
        summary.streams.push(failedOutcome(stream, error));
        summary.errorCount += 1;
        if (error instanceof AuthenticationError) {
          summary.aborted = true;
          summary.error = errorMessage(error);
          sourceLogger.error(
            { remaining: streams.length - summary.streams.length },
            'authentication failed, skipping remaining streams of source'
          );
          break;
        }
      }
    }
  } finally {
    await source.close().catch((error: unknown) => {
      sourceLogger.warn({ err: error }, 'failed to release source resources');
    });
  }

  sourceLogger.info(
    { successCount: summary.successCount, errorCount: summary.errorCount },
    'source ingestion completed'
  );
  return summary;
}

/** Runs every source in order and aggregates stream outcomes. Never throws for stream or source failures. */
export async function runIngestion(
  sources: readonly SourceRegistration[],
  options: RunIngestionOptions
): Promise<RunSummary> {
  const clock = options.now ?? (() => new Date());
  const startedAt = clock();
  const summaries: SourceSummary[] = [];

  for (const registration of sources) {
    if (registration.skip) {
      options.logger.info({ source: registration.name }, 'source disabled by configuration, skipping');
      summaries.push(emptySummary(registration, true));
      continue;
    }
    summaries.push(await runSource(registration, startedAt, options.logger));
  }

  const successCount = summaries.reduce((sum, summary) => sum + summary.successCount, 0);
  const errorCount = summaries.reduce((sum, summary) => sum + summary.errorCount, 0);
  const summary: RunSummary = {
    status: resolveRunStatus(successCount, errorCount),
    successCount,
    errorCount,
    startedAt: startedAt.toISOString(),
    finishedAt: clock().toISOString(),
    sources: summaries
  };

  const level = summary.status === 'success' ? 'info' : summary.status === 'partial_failure' ? 'warn' : 'error';
  options.logger[level]({ status: summary.status, successCount, errorCount }, 'ingestion run completed');
  return summary;
}

/** Like `runIngestion`, but a run with no successful stream and at least one error throws `IngestionRunError`. */
export async function runScheduledIngestion(
  sources: readonly SourceRegistration[],
  options: RunIngestionOptions
): Promise<RunSummary> {
  const summary = await runIngestion(sources, options);
  if (summary.status === 'total_failure') {
    throw new IngestionRunError(summary);
  }
  return summary;
}

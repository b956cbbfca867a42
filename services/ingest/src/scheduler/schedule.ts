import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { nextRunAt } from './cronParser';

export type Wait = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableWait: Wait = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export type ScheduleOptions = {
  cron: string;
  timezone: string;
  run: () => Promise<unknown>;
  logger: Logger;
  signal?: AbortSignal;
  /** Stop after this many runs. */
  maxRuns?: number;
  now?: () => Date;
  wait?: Wait;
};

/**
 * Timer loop: waits for the next cron tick, runs once, repeats. A failing run
 * is logged and the loop keeps going; the next tick is computed after the run.
 */
export async function runSchedule(options: ScheduleOptions): Promise<number> {
  const clock = options.now ?? (() => new Date());
  const wait = options.wait ?? abortableWait;
  let runs = 0;

  while (!options.signal?.aborted && (options.maxRuns === undefined || runs < options.maxRuns)) {
    const current = clock();
    const next = nextRunAt(options.cron, options.timezone, current);
    options.logger.info({ nextRunAt: next.toISOString() }, 'waiting for next scheduled run');
    await wait(next.getTime() - current.getTime(), options.signal);
    if (options.signal?.aborted) {
      break;
    }
    runs += 1;
    try {
      await options.run();
    } catch (error) {
      options.logger.error({ err: error, run: runs, error: errorMessage(error) }, 'scheduled run failed');
    }
  }
  return runs;
}

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createSilentLogger } from '../src/logger';
import { nextRunAt, parseCronExpression } from '../src/scheduler/cronParser';
import { runSchedule } from '../src/scheduler/schedule';

describe('cron helpers', () => {
  it('computes the next tick after an instant', () => {
    assert.equal(nextRunAt('*/30 * * * *', 'UTC', new Date('2024-01-01T10:05:00Z')).toISOString(), '2024-01-01T10:30:00.000Z');
    assert.equal(
      nextRunAt('0 6 * * *', ' Europe/London ', new Date('2024-07-01T00:00:00Z')).toISOString(),
      '2024-07-01T05:00:00.000Z'
    );
  });

  it('rejects blank expressions', () => {
    assert.throws(() => parseCronExpression('   '), /non-empty/);
  });
});

describe('runSchedule', () => {
  it('waits for each tick and keeps going after a failed run', async () => {
    let clock = new Date('2024-01-01T10:05:00Z').getTime();
    const waits: number[] = [];
    const runsAt: string[] = [];

    const completed = await runSchedule({
      cron: '*/30 * * * *',
      timezone: 'UTC',
      logger: createSilentLogger(),
      maxRuns: 2,
      now: () => new Date(clock),
      wait: async (ms) => {
        waits.push(ms);
        clock += ms;
      },
      run: async () => {
        runsAt.push(new Date(clock).toISOString());
        clock += 1_000;
        if (runsAt.length === 1) {
          throw new Error('all sources failed');
        }
      }
    });

    assert.equal(completed, 2);
    assert.deepEqual(waits, [1_500_000, 1_799_000]);
    assert.deepEqual(runsAt, ['2024-01-01T10:30:00.000Z', '2024-01-01T11:00:00.000Z']);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    let runs = 0;
    const completed = await runSchedule({
      cron: '* * * * *',
      timezone: 'UTC',
      logger: createSilentLogger(),
      signal: controller.signal,
      now: () => new Date('2024-01-01T00:00:30Z'),
      wait: async () => {
        controller.abort();
      },
      run: async () => {
        runs += 1;
      }
    });

    assert.equal(completed, 0);
    assert.equal(runs, 0);
  });
});

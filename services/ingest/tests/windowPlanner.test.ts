import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  consumptionPolicy,
  enumerateUtcDates,
  heatingPolicy,
  isNewerThan,
  planWindow,
  unitRatePolicy
} from '../src/planning/windowPlanner';

const now = new Date('2024-03-10T12:00:00Z');

describe('planWindow', () => {
  it('bootstraps from the lookback when no watermark exists', () => {
    const window = planWindow(null, now, consumptionPolicy({ lookbackDays: 7 }));
    assert.equal(window.start.toISOString(), '2024-03-03T12:00:00.000Z');
    assert.equal(window.end.toISOString(), '2024-03-10T12:00:00.000Z');
    assert.equal(window.resumed, false);

    assert.equal(planWindow(null, now, unitRatePolicy()).start.toISOString(), '2024-02-09T12:00:00.000Z');
    assert.equal(planWindow(null, now, heatingPolicy()).start.toISOString(), '2024-03-10T11:00:00.000Z');
  });

  it('resumes interval streams one interval and a second before the watermark', () => {
    const window = planWindow(new Date('2024-03-10T10:00:00Z'), now, consumptionPolicy());
    assert.equal(window.start.toISOString(), '2024-03-10T09:29:59.000Z');
    assert.equal(window.resumed, true);
  });

  it('resumes heating streams from the start of the watermark day', () => {
    const window = planWindow(new Date('2024-03-09T22:15:00Z'), now, heatingPolicy());
    assert.equal(window.start.toISOString(), '2024-03-09T00:00:00.000Z');
  });

  it('clamps to the floor and never starts after the end', () => {
    const early = new Date('2015-01-03T00:00:00Z');
    assert.equal(planWindow(null, early, consumptionPolicy()).start.toISOString(), '2015-01-01T00:00:00.000Z');

    const ahead = planWindow(new Date('2024-03-10T14:00:00Z'), now, consumptionPolicy());
    assert.equal(ahead.start.toISOString(), now.toISOString());
  });
});

describe('enumerateUtcDates', () => {
  it('lists every touched day inclusively, across month ends', () => {
    assert.deepEqual(enumerateUtcDates(new Date('2024-02-28T23:00:00Z'), new Date('2024-03-01T00:10:00Z')), [
      '2024-02-28',
      '2024-02-29',
      '2024-03-01'
    ]);
    assert.deepEqual(enumerateUtcDates(now, now), ['2024-03-10']);
  });
});

describe('isNewerThan', () => {
  it('is strict and treats a missing watermark as older than everything', () => {
    const prior = new Date('2024-03-10T10:00:00Z');
    assert.equal(isNewerThan(new Date('2024-03-10T10:00:00Z'), prior), false);
    assert.equal(isNewerThan(new Date('2024-03-10T10:00:01Z'), prior), true);
    assert.equal(isNewerThan(prior, null), true);
  });
});

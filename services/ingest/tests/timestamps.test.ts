import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  canonicalTimestamp,
  formatTimestamp,
  minutesBetween,
  parseDateKey,
  parseTimestamp,
  utcDateKey
} from '../src/cursors/timestamps';

describe('parseTimestamp', () => {
  it('accepts the offset spellings the upstream APIs use', () => {
    const expected = '2023-12-31T23:30:00.000Z';
    for (const value of [
      '2024-01-01T00:30:00+01:00',
      '2024-01-01T00:30:00+0100',
      '2024-01-01T00:30:00+01',
      '2023-12-31T23:30:00Z',
      '2023-12-31T23:30:00+00:00'
    ]) {
      assert.equal(parseTimestamp(value)?.toISOString(), expected, value);
    }
  });

  it('reads values without an offset as UTC', () => {
    assert.equal(parseTimestamp('2024-01-01 00:30:00')?.toISOString(), '2024-01-01T00:30:00.000Z');
    assert.equal(parseTimestamp('2024-01-01')?.toISOString(), '2024-01-01T00:00:00.000Z');
  });

  it('keeps millisecond precision from long fractions', () => {
    assert.equal(parseTimestamp('2024-01-01T00:00:00.123456Z')?.toISOString(), '2024-01-01T00:00:00.123Z');
  });

  it('rejects invalid input', () => {
    assert.equal(parseTimestamp('2024-02-30T00:00:00Z'), null);
    assert.equal(parseTimestamp('2024-01-01T25:00:00Z'), null);
    assert.equal(parseTimestamp('yesterday'), null);
    assert.equal(parseTimestamp(42), null);
    assert.equal(parseTimestamp(null), null);
    assert.equal(parseTimestamp(new Date(Number.NaN)), null);
  });
});

describe('formatting helpers', () => {
  it('drops zero milliseconds from the canonical form', () => {
    assert.equal(formatTimestamp(new Date(Date.UTC(2024, 0, 1))), '2024-01-01T00:00:00Z');
    assert.equal(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 0, 0, 0, 500))), '2024-01-01T00:00:00.500Z');
    assert.equal(canonicalTimestamp('2024-01-01T01:00:00+01:00'), '2024-01-01T00:00:00Z');
    assert.equal(canonicalTimestamp('garbage'), null);
  });

  it('derives UTC date keys', () => {
    assert.equal(utcDateKey(new Date('2024-03-31T23:59:59Z')), '2024-03-31');
    assert.equal(parseDateKey('2024-03-31')?.toISOString(), '2024-03-31T00:00:00.000Z');
    assert.equal(parseDateKey('2024-03-31T00:00'), null);
    assert.equal(minutesBetween(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:45:30Z')), 45);
  });
});

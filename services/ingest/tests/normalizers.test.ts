import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MalformedResponseError } from '../src/errors';
import { normalizeConsumption, normalizeDayReport, normalizeUnitRates } from '../src/records/normalizers';
import type { DeviceRef, MeterRef, TariffRef } from '../src/records/types';
import { loadFixture } from './helpers';

const meter: MeterRef = { energy: 'electricity', mpanMprn: '1200000000001', serial: '21L0000001' };
const tariff: TariffRef = { energy: 'electricity', productCode: 'AGILE-24-10-01', tariffCode: 'E-1R-AGILE-24-10-01-C' };
const device: DeviceRef = { deviceId: '1', zoneId: '1' };

describe('normalizeConsumption', () => {
  it('canonicalizes timestamps and skips malformed readings', () => {
    const result = normalizeConsumption(
      [
        { consumption: 0.25, interval_start: '2024-01-01T00:00:00+00:00', interval_end: '2024-01-01T00:30:00+00:00' },
        { consumption: '0.5', interval_start: '2024-01-01T01:30:00+01:00', interval_end: '2024-01-01T02:00:00+01:00' },
        { consumption: null, interval_start: '2024-01-01T01:00:00Z', interval_end: '2024-01-01T01:30:00Z' },
        { consumption: 1, interval_start: 'soon', interval_end: '2024-01-01T01:30:00Z' },
        'junk'
      ],
      meter
    );

    assert.equal(result.skipped, 3);
    assert.deepEqual(result.records, [
      {
        interval_start: '2024-01-01T00:00:00Z',
        interval_end: '2024-01-01T00:30:00Z',
        consumption: 0.25,
        energy: 'electricity',
        mpan_mprn: '1200000000001',
        serial: '21L0000001'
      },
      {
        interval_start: '2024-01-01T00:30:00Z',
        interval_end: '2024-01-01T01:00:00Z',
        consumption: 0.5,
        energy: 'electricity',
        mpan_mprn: '1200000000001',
        serial: '21L0000001'
      }
    ]);
  });
});

describe('normalizeUnitRates', () => {
  it('keeps open-ended rates and skips unparseable bounds', () => {
    const result = normalizeUnitRates(
      [
        { value_exc_vat: 20, value_inc_vat: 21, valid_from: '2024-01-01T00:00:00Z', valid_to: '2024-01-01T00:30:00Z' },
        { value_inc_vat: 22.05, valid_from: '2024-01-01T00:30:00Z', valid_to: null },
        { value_inc_vat: 1, valid_from: '2024-01-01T01:00:00Z', valid_to: 'later' },
        { value_inc_vat: 'n/a', valid_from: '2024-01-01T01:00:00Z' }
      ],
      tariff
    );

    assert.equal(result.skipped, 2);
    assert.deepEqual(result.records, [
      {
        valid_from: '2024-01-01T00:00:00Z',
        valid_to: '2024-01-01T00:30:00Z',
        value_inc_vat: 21,
        value_exc_vat: 20,
        energy: 'electricity',
        product_code: 'AGILE-24-10-01',
        tariff_code: 'E-1R-AGILE-24-10-01-C'
      },
      {
        valid_from: '2024-01-01T00:30:00Z',
        valid_to: null,
        value_inc_vat: 22.05,
        value_exc_vat: null,
        energy: 'electricity',
        product_code: 'AGILE-24-10-01',
        tariff_code: 'E-1R-AGILE-24-10-01-C'
      }
    ]);
  });
});

describe('normalizeDayReport', () => {
  it('extracts demand events and temperature samples', () => {
    const result = normalizeDayReport(loadFixture('dayReport.json'), device);

    assert.deepEqual(result.demand, [
      { timestamp: '2024-01-15T01:30:00Z', duration_minutes: 45, heat_demand: 'LOW', device_id: '1', zone_id: '1' },
      { timestamp: '2024-01-15T02:15:00Z', duration_minutes: null, heat_demand: 'HIGH', device_id: '1', zone_id: '1' }
    ]);
    assert.deepEqual(result.temperature, [
      {
        timestamp: '2024-01-15T00:00:00Z',
        temperature: 19.5,
        sensor_type: 'inside',
        humidity: 0.55,
        device_id: '1',
        zone_id: '1'
      },
      {
        timestamp: '2024-01-15T00:20:00Z',
        temperature: 19.4,
        sensor_type: 'inside',
        humidity: null,
        device_id: '1',
        zone_id: '1'
      },
      {
        timestamp: '2024-01-15T06:00:00Z',
        temperature: 21,
        sensor_type: 'target',
        humidity: null,
        device_id: '1',
        zone_id: '1'
      }
    ]);
    assert.equal(result.skipped, 3);
  });

  it('returns nothing for an empty report', () => {
    assert.deepEqual(normalizeDayReport({}, device), { demand: [], temperature: [], skipped: 0 });
  });

  it('rejects a body that is not an object', () => {
    assert.throws(() => normalizeDayReport(['nope'], device, 'https://api.test/dayReport'), MalformedResponseError);
  });
});

import { canonicalTimestamp, formatTimestamp, minutesBetween, parseTimestamp } from '../cursors/timestamps';
import { MalformedResponseError } from '../errors';
import type {
  ConsumptionRecord,
  DemandRecord,
  DeviceRef,
  MeterRef,
  NormalizeResult,
  TariffRef,
  TemperatureRecord,
  UnitRateRecord
} from './types';

export type DayReportResult = {
  demand: DemandRecord[];
  temperature: TemperatureRecord[];
  skipped: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

function asNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function arrayAt(value: unknown, ...path: string[]): unknown[] {
  let current = value;
  for (const key of path) {
    current = child(current, key);
  }
  return Array.isArray(current) ? current : [];
}

export function normalizeConsumption(entries: readonly unknown[], meter: MeterRef): NormalizeResult<ConsumptionRecord> {
  const records: ConsumptionRecord[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const start = canonicalTimestamp(child(entry, 'interval_start'));
    const end = canonicalTimestamp(child(entry, 'interval_end'));
    const consumption = asNumber(child(entry, 'consumption'));
    if (!start || !end || consumption === null) {
      skipped += 1;
      continue;
    }
    records.push({
      interval_start: start,
      interval_end: end,
      consumption,
      energy: meter.energy,
      mpan_mprn: meter.mpanMprn,
      serial: meter.serial
    });
  }
  return { records, skipped };
}

export function normalizeUnitRates(entries: readonly unknown[], tariff: TariffRef): NormalizeResult<UnitRateRecord> {
  const records: UnitRateRecord[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const validFrom = canonicalTimestamp(child(entry, 'valid_from'));
    const rawValidTo = child(entry, 'valid_to');
    const validTo = rawValidTo === null || rawValidTo === undefined ? null : canonicalTimestamp(rawValidTo);
    const incVat = asNumber(child(entry, 'value_inc_vat'));
    if (!validFrom || incVat === null || (validTo === null && rawValidTo !== null && rawValidTo !== undefined)) {
      skipped += 1;
      continue;
    }
    records.push({
      valid_from: validFrom,
      valid_to: validTo,
      value_inc_vat: incVat,
      value_exc_vat: asNumber(child(entry, 'value_exc_vat')),
      energy: tariff.energy,
      product_code: tariff.productCode,
      tariff_code: tariff.tariffCode
    });
  }
  return { records, skipped };
}

/**
 * Splits a zone day report into demand events (`callForHeat`, minus `NONE`) and
 * temperature samples (measured inside temperature with humidity, plus target
 * temperature while the zone is powered on).
 */
export function normalizeDayReport(report: unknown, device: DeviceRef, source = 'dayReport'): DayReportResult {
  if (!isRecord(report)) {
    throw new MalformedResponseError('Day report body is not a JSON object', source, { deviceId: device.deviceId });
  }

  let skipped = 0;
  const demand: DemandRecord[] = [];
  for (const interval of arrayAt(report, 'callForHeat', 'dataIntervals')) {
    const level = child(interval, 'value');
    if (level === 'NONE') {
      continue;
    }
    const from = parseTimestamp(child(interval, 'from'));
    if (!from || typeof level !== 'string' || level.length === 0) {
      skipped += 1;
      continue;
    }
    const to = parseTimestamp(child(interval, 'to'));
    demand.push({
      timestamp: formatTimestamp(from),
      duration_minutes: to ? minutesBetween(from, to) : null,
      heat_demand: level,
      device_id: device.deviceId,
      zone_id: device.zoneId
    });
  }

  const humidityByInstant = new Map<number, number>();
  for (const point of arrayAt(report, 'measuredData', 'humidity', 'dataPoints')) {
    const at = parseTimestamp(child(point, 'timestamp'));
    const value = child(point, 'value');
    if (at && typeof value === 'number' && Number.isFinite(value)) {
      humidityByInstant.set(at.getTime(), value);
    }
  }

  const temperature: TemperatureRecord[] = [];
  for (const point of arrayAt(report, 'measuredData', 'insideTemperature', 'dataPoints')) {
    const at = parseTimestamp(child(point, 'timestamp'));
    const celsius = child(child(point, 'value'), 'celsius');
    if (!at || typeof celsius !== 'number' || !Number.isFinite(celsius)) {
      skipped += 1;
      continue;
    }
    temperature.push({
      timestamp: formatTimestamp(at),
      temperature: celsius,
      sensor_type: 'inside',
      humidity: humidityByInstant.get(at.getTime()) ?? null,
      device_id: device.deviceId,
      zone_id: device.zoneId
    });
  }

  for (const interval of arrayAt(report, 'settings', 'dataIntervals')) {
    const setting = child(interval, 'value');
    if (child(setting, 'power') !== 'ON') {
      continue;
    }
    const at = parseTimestamp(child(interval, 'from'));
    const celsius = child(child(setting, 'temperature'), 'celsius');
    if (!at) {
      skipped += 1;
      continue;
    }
    if (typeof celsius !== 'number' || !Number.isFinite(celsius)) {
      continue;
    }
    temperature.push({
      timestamp: formatTimestamp(at),
      temperature: celsius,
      sensor_type: 'target',
      humidity: null,
      device_id: device.deviceId,
      zone_id: device.zoneId
    });
  }

  return { demand, temperature, skipped };
}

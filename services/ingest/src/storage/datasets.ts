import { z } from 'zod';
import { canonicalTimestamp } from '../cursors/timestamps';
import type {
  ConsumptionRecord,
  CostedConsumptionRecord,
  DemandRecord,
  TemperatureRecord,
  UnitRateRecord
} from '../records/types';
import type { Dataset } from './types';

const timestampColumn = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const canonical = canonicalTimestamp(value);
  if (!canonical) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
    return z.NEVER;
  }
  return canonical;
});

const nullableTimestampColumn = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) {
      return null;
    }
    const canonical = canonicalTimestamp(value);
    if (!canonical) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return canonical;
  });

const nullableNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const energyColumn = z.enum(['electricity', 'gas']);

/** Path segment values may not introduce extra directories. */
export function pathSegment(value: string): string {
  const cleaned = value.trim().replace(/[\\/=\s]+/g, '_');
  return cleaned.length > 0 ? cleaned : 'unknown';
}

export const consumptionDataset: Dataset<ConsumptionRecord> = {
  name: 'consumption',
  fields: {
    interval_start: { type: 'timestamp' },
    interval_end: { type: 'timestamp' },
    consumption: { type: 'double' },
    energy: { type: 'string' },
    mpan_mprn: { type: 'string' },
    serial: { type: 'string' }
  },
  rowSchema: z.object({
    interval_start: timestampColumn,
    interval_end: timestampColumn,
    consumption: z.number(),
    energy: energyColumn,
    mpan_mprn: z.string(),
    serial: z.string()
  }),
  timestampOf: (record) => record.interval_start,
  dedupKey: (record) => `${record.mpan_mprn}|${record.serial}|${record.interval_start}|${record.interval_end}`,
  partitionPrefix: (record) =>
    `kind=${record.energy}/mpan_mprn=${pathSegment(record.mpan_mprn)}/serial=${pathSegment(record.serial)}`
};

export const unitRateDataset: Dataset<UnitRateRecord> = {
  name: 'unit_rate',
  fields: {
    valid_from: { type: 'timestamp' },
    valid_to: { type: 'timestamp', nullable: true },
    value_inc_vat: { type: 'double' },
    value_exc_vat: { type: 'double', nullable: true },
    energy: { type: 'string' },
    product_code: { type: 'string' },
    tariff_code: { type: 'string' }
  },
  rowSchema: z.object({
    valid_from: timestampColumn,
    valid_to: nullableTimestampColumn,
    value_inc_vat: z.number(),
    value_exc_vat: nullableNumber,
    energy: energyColumn,
    product_code: z.string(),
    tariff_code: z.string()
  }),
  timestampOf: (record) => record.valid_from,
  dedupKey: (record) => `${record.valid_from}|${record.valid_to ?? ''}|${record.tariff_code}`,
  partitionPrefix: (record) =>
    `kind=unit_rate/energy=${record.energy}/product=${pathSegment(record.product_code)}/tariff=${pathSegment(
      record.tariff_code
    )}`
};

export const demandDataset: Dataset<DemandRecord> = {
  name: 'demand',
  fields: {
    timestamp: { type: 'timestamp' },
    duration_minutes: { type: 'integer', nullable: true },
    heat_demand: { type: 'string' },
    device_id: { type: 'string' },
    zone_id: { type: 'string' }
  },
  rowSchema: z.object({
    timestamp: timestampColumn,
    duration_minutes: z.number().int().nullish().transform((value) => value ?? null),
    heat_demand: z.string(),
    device_id: z.string(),
    zone_id: z.string()
  }),
  timestampOf: (record) => record.timestamp,
  dedupKey: (record) => `${record.device_id}|${record.zone_id}|${record.timestamp}`,
  partitionPrefix: (record) => `kind=demand/trv=${pathSegment(record.device_id)}`
};

export const temperatureDataset: Dataset<TemperatureRecord> = {
  name: 'temperature',
  fields: {
    timestamp: { type: 'timestamp' },
    temperature: { type: 'double' },
    sensor_type: { type: 'string' },
    humidity: { type: 'double', nullable: true },
    device_id: { type: 'string' },
    zone_id: { type: 'string' }
  },
  rowSchema: z.object({
    timestamp: timestampColumn,
    temperature: z.number(),
    sensor_type: z.enum(['inside', 'target']),
    humidity: nullableNumber,
    device_id: z.string(),
    zone_id: z.string()
  }),
  timestampOf: (record) => record.timestamp,
  dedupKey: (record) => `${record.device_id}|${record.zone_id}|${record.timestamp}|${record.sensor_type}`,
  partitionPrefix: (record) => `kind=temperature/trv=${pathSegment(record.device_id)}`
};

export const costedConsumptionDataset: Dataset<CostedConsumptionRecord> = {
  name: 'consumption_cost',
  fields: {
    ...consumptionDataset.fields,
    unit_rate: { type: 'double', nullable: true },
    cost: { type: 'double', nullable: true },
    tariff_code: { type: 'string', nullable: true }
  },
  rowSchema: z.object({
    interval_start: timestampColumn,
    interval_end: timestampColumn,
    consumption: z.number(),
    energy: energyColumn,
    mpan_mprn: z.string(),
    serial: z.string(),
    unit_rate: nullableNumber,
    cost: nullableNumber,
    tariff_code: nullableString
  }),
  timestampOf: (record) => record.interval_start,
  dedupKey: (record) => `${record.mpan_mprn}|${record.serial}|${record.interval_start}|${record.interval_end}`,
  partitionPrefix: (record) =>
    `kind=consumption_cost/energy=${record.energy}/mpan_mprn=${pathSegment(record.mpan_mprn)}/serial=${pathSegment(
      record.serial
    )}`
};

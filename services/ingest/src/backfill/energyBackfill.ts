import { DAY_MS } from '../cursors/timestamps';
import { joinUnitRates, totalCost } from '../enrich/rateJoin';
import type { Logger } from '../logger';
import type { OctopusSource } from '../orchestrator/octopusSource';
import { normalizeConsumption, normalizeUnitRates } from '../records/normalizers';
import type { UnitRateRecord } from '../records/types';
import type { OctopusClient } from '../sources/octopus/client';
import { consumptionDataset, costedConsumptionDataset, unitRateDataset } from '../storage/datasets';
import type { PartitionWriter } from '../storage/partitionWriter';

export type EnergyBackfillOptions = {
  source: OctopusSource;
  client: OctopusClient;
  /** Raw consumption and unit rates. */
  writer: PartitionWriter;
  /** Costed consumption. */
  curatedWriter: PartitionWriter;
  days: number;
  now: Date;
  logger: Logger;
};

export type EnergyBackfillSummary = {
  meters: number;
  tariffs: number;
  errors: number;
  consumptionRecords: number;
  rateRecords: number;
  costedRecords: number;
  totalCost: number;
};

/** Re-fetches the last `days` of consumption and rates and writes costed consumption. Cursors are left alone. */
export async function backfillEnergy(options: EnergyBackfillOptions): Promise<EnergyBackfillSummary> {
  const { source, client, writer, curatedWriter, logger } = options;
  const end = options.now;
  const start = new Date(end.getTime() - options.days * DAY_MS);
  const meters = await source.resolveMeters();
  const tariffs = await source.resolveTariffs();
  const summary: EnergyBackfillSummary = {
    meters: meters.length,
    tariffs: tariffs.length,
    errors: 0,
    consumptionRecords: 0,
    rateRecords: 0,
    costedRecords: 0,
    totalCost: 0
  };

  const rates: UnitRateRecord[] = [];
  for (const tariff of tariffs) {
    try {
      const { records } = normalizeUnitRates(await client.getUnitRates(tariff, start, end), tariff);
      await writer.write(unitRateDataset, records);
      rates.push(...records);
      summary.rateRecords += records.length;
    } catch (error) {
      summary.errors += 1;
      logger.error({ err: error, tariffCode: tariff.tariffCode }, 'unit rate backfill failed');
    }
  }

  for (const meter of meters) {
    try {
      const { records, skipped } = normalizeConsumption(await client.getConsumption(meter, start, end), meter);
      if (skipped > 0) {
        logger.warn({ mpanMprn: meter.mpanMprn, skipped }, 'skipped malformed consumption records');
      }
      await writer.write(consumptionDataset, records);
      const costed = joinUnitRates(records, rates);
      await curatedWriter.write(costedConsumptionDataset, costed);
      summary.consumptionRecords += records.length;
      summary.costedRecords += costed.length;
      summary.totalCost += totalCost(costed);
      logger.info({ mpanMprn: meter.mpanMprn, serial: meter.serial, records: records.length }, 'meter backfilled');
    } catch (error) {
      summary.errors += 1;
      logger.error({ err: error, mpanMprn: meter.mpanMprn }, 'meter backfill failed');
    }
  }

  logger.info(summary, 'energy backfill complete');
  return summary;
}

import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { enumerateUtcDates } from '../planning/windowPlanner';
import type { DemandRecord, DeviceRef, TemperatureRecord } from '../records/types';
import type { TadoClient } from '../sources/tado/client';
import { demandDataset, temperatureDataset } from '../storage/datasets';
import type { PartitionWriter } from '../storage/partitionWriter';
import { fetchDeviceDay } from '../orchestrator/tadoSource';
import { runBounded } from './workerPool';

export type HeatingBackfillOptions = {
  client: TadoClient;
  devices: readonly DeviceRef[];
  /** `null` for a dry run: fetch and parse, write nothing. */
  writer: PartitionWriter | null;
  start: Date;
  end: Date;
  maxWorkers: number;
  logger: Logger;
};

export type HeatingBackfillSummary = {
  days: number;
  deviceDaysFetched: number;
  deviceDaysFailed: number;
  demandDays: number;
  temperatureDays: number;
  partitionsWritten: number;
};

/**
 * Walks `[start, end]` day by day. Each day's device reports are fetched by a
 * bounded pool and that day is written only after every fetch settled. Cursors
 * are left alone.
 */
export async function backfillHeating(options: HeatingBackfillOptions): Promise<HeatingBackfillSummary> {
  const { client, devices, writer, logger } = options;
  const summary: HeatingBackfillSummary = {
    days: 0,
    deviceDaysFetched: 0,
    deviceDaysFailed: 0,
    demandDays: 0,
    temperatureDays: 0,
    partitionsWritten: 0
  };

  for (const date of enumerateUtcDates(options.start, options.end)) {
    const startedAt = Date.now();
    const outcomes = await runBounded(devices, options.maxWorkers, (device) => fetchDeviceDay(client, device, date));

    const demand: DemandRecord[] = [];
    const temperature: TemperatureRecord[] = [];
    let succeeded = 0;
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        summary.deviceDaysFailed += 1;
        logger.warn(
          { date, zoneId: outcome.item.zoneId, error: errorMessage(outcome.error) },
          'day report fetch failed, excluding device'
        );
        continue;
      }
      succeeded += 1;
      demand.push(...outcome.value.demand);
      temperature.push(...outcome.value.temperature);
    }
    summary.days += 1;
    summary.deviceDaysFetched += succeeded;
    logger.info(
      { date, succeeded, devices: devices.length, elapsedMs: Date.now() - startedAt },
      'day fetched'
    );

    if (demand.length > 0) {
      summary.demandDays += 1;
    }
    if (temperature.length > 0) {
      summary.temperatureDays += 1;
    }
    if (writer) {
      const demandWrite = await writer.write(demandDataset, demand);
      const temperatureWrite = await writer.write(temperatureDataset, temperature);
      summary.partitionsWritten += demandWrite.partitions.length + temperatureWrite.partitions.length;
    }
  }

  logger.info(summary, 'heating backfill complete');
  return summary;
}

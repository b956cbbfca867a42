import type { CursorStore } from '../cursors/cursorStore';
import { parseTimestamp } from '../cursors/timestamps';
import type { Logger } from '../logger';
import { enumerateUtcDates, isNewerThan } from '../planning/windowPlanner';
import type { FetchWindow, WindowPolicy } from '../planning/windowPlanner';
import { normalizeDayReport } from '../records/normalizers';
import type { DemandRecord, DeviceRef, TemperatureRecord } from '../records/types';
import type { TadoSettings } from '../config/serviceConfig';
import type { TadoClient } from '../sources/tado/client';
import { demandDataset, temperatureDataset } from '../storage/datasets';
import type { PartitionWriter } from '../storage/partitionWriter';
import { latestTimestamp, maxDate } from './streams';
import type { IngestionSource, IngestionStream, StreamBatchResult, StreamDescriptor } from './types';

export type DeviceDayRecords = {
  demand: DemandRecord[];
  temperature: TemperatureRecord[];
  skipped: number;
};

export async function fetchDeviceDay(client: TadoClient, device: DeviceRef, date: string): Promise<DeviceDayRecords> {
  const report = await client.getDayReport(device, date);
  if (report === null) {
    return { demand: [], temperature: [], skipped: 0 };
  }
  return normalizeDayReport(report, device, client.dayReportUrl(device, date));
}

function newerOnly<R extends { timestamp: string }>(records: readonly R[], prior: Date | null): R[] {
  return records.filter((record) => {
    const at = parseTimestamp(record.timestamp);
    return at !== null && isNewerThan(at, prior);
  });
}

/**
 * One heating zone. Whole UTC days are re-read from the watermark's day; all of
 * their records are written, but only records newer than the watermark count.
 */
export class HeatingStream implements IngestionStream {
  readonly descriptor: StreamDescriptor;

  constructor(
    private readonly device: DeviceRef,
    private readonly client: TadoClient,
    private readonly writer: PartitionWriter,
    readonly cursor: CursorStore,
    readonly policy: WindowPolicy
  ) {
    this.descriptor = {
      key: `${device.deviceId}:${device.zoneId}`,
      kind: 'heating',
      source: 'tado',
      labels: { device_id: device.deviceId, zone_id: device.zoneId, name: device.name ?? '' }
    };
  }

  async execute(window: FetchWindow, prior: Date | null, logger: Logger): Promise<StreamBatchResult> {
    const demand: DemandRecord[] = [];
    const temperature: TemperatureRecord[] = [];
    let skipped = 0;
    for (const date of enumerateUtcDates(window.start, window.end)) {
      const day = await fetchDeviceDay(this.client, this.device, date);
      demand.push(...day.demand);
      temperature.push(...day.temperature);
      skipped += day.skipped;
      logger.debug({ date, demand: day.demand.length, temperature: day.temperature.length }, 'fetched day report');
    }

    const threshold = this.policy.countOnlyNewer ? prior : null;
    const newDemand = newerOnly(demand, threshold);
    const newTemperature = newerOnly(temperature, threshold);
    const counted = newDemand.length + newTemperature.length;
    const fetched = demand.length + temperature.length;
    if (counted === 0) {
      return { fetched, skipped, counted: 0, partitions: [], latest: null };
    }

    const demandWrite = await this.writer.write(demandDataset, demand);
    const temperatureWrite = await this.writer.write(temperatureDataset, temperature);
    return {
      fetched,
      skipped,
      counted,
      partitions: [...demandWrite.partitions, ...temperatureWrite.partitions],
      latest: maxDate(latestTimestamp(demandDataset, newDemand), latestTimestamp(temperatureDataset, newTemperature))
    };
  }
}

export type TadoSourceOptions = {
  settings: TadoSettings;
  client: TadoClient;
  cursor: CursorStore;
  writer: PartitionWriter;
  policy: WindowPolicy;
  logger: Logger;
};

export class TadoSource implements IngestionSource {
  readonly name = 'tado';
  private readonly options: TadoSourceOptions;

  constructor(options: TadoSourceOptions) {
    this.options = options;
  }

  async enumerate(): Promise<IngestionStream[]> {
    const { client, writer, cursor, policy } = this.options;
    const devices = await this.resolveDevices();
    return devices.map((device) => new HeatingStream(device, client, writer, cursor, policy));
  }

  close(): Promise<void> {
    return this.options.client.close();
  }

  /** Configured devices, else every HEATING zone of the home. */
  async resolveDevices(): Promise<DeviceRef[]> {
    const { settings, client, logger } = this.options;
    if (settings.devices) {
      return settings.devices;
    }
    const zones = await client.listHeatingZones();
    logger.info({ zones: zones.length }, 'discovered heating zones');
    return zones;
  }
}

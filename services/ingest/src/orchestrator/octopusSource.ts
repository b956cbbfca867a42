import type { CursorStore } from '../cursors/cursorStore';
import { formatTimestamp } from '../cursors/timestamps';
import { detectMissingIntervals } from '../enrich/gaps';
import type { Logger } from '../logger';
import type { FetchWindow, WindowPolicy } from '../planning/windowPlanner';
import { normalizeConsumption, normalizeUnitRates } from '../records/normalizers';
import type { EnergyKind, MeterRef, TariffRef } from '../records/types';
import type { OctopusSettings } from '../config/serviceConfig';
import type { OctopusClient } from '../sources/octopus/client';
import { tariffFromCode } from '../sources/octopus/tariffs';
import { consumptionDataset, unitRateDataset } from '../storage/datasets';
import type { PartitionWriter } from '../storage/partitionWriter';
import { latestTimestamp } from './streams';
import type { IngestionSource, IngestionStream, StreamBatchResult, StreamDescriptor } from './types';

export type OctopusSourceOptions = {
  settings: OctopusSettings;
  client: OctopusClient;
  cursor: CursorStore;
  writer: PartitionWriter;
  policies: {
    consumption: WindowPolicy;
    unitRate: WindowPolicy;
  };
  now: Date;
  logger: Logger;
};

export class ConsumptionStream implements IngestionStream {
  readonly descriptor: StreamDescriptor;

  constructor(
    private readonly meter: MeterRef,
    private readonly client: OctopusClient,
    private readonly writer: PartitionWriter,
    readonly cursor: CursorStore,
    readonly policy: WindowPolicy
  ) {
    this.descriptor = {
      key: `${meter.mpanMprn}:${meter.serial}`,
      kind: 'consumption',
      source: 'octopus',
      labels: { energy: meter.energy, mpan_mprn: meter.mpanMprn, serial: meter.serial }
    };
  }

  async execute(window: FetchWindow, _prior: Date | null, logger: Logger): Promise<StreamBatchResult> {
    const entries = await this.client.getConsumption(this.meter, window.start, window.end);
    const { records, skipped } = normalizeConsumption(entries, this.meter);
    if (records.length === 0) {
      return { fetched: entries.length, skipped, counted: 0, partitions: [], latest: null };
    }

    const gaps = detectMissingIntervals(records);
    if (gaps.missing > 0) {
      logger.warn(gaps, 'consumption intervals missing in fetched window');
    }

    const written = await this.writer.write(consumptionDataset, records);
    return {
      fetched: entries.length,
      skipped,
      counted: written.recordsWritten,
      partitions: written.partitions,
      latest: latestTimestamp(consumptionDataset, records)
    };
  }
}

export class UnitRateStream implements IngestionStream {
  readonly descriptor: StreamDescriptor;

  constructor(
    private readonly tariff: TariffRef,
    private readonly client: OctopusClient,
    private readonly writer: PartitionWriter,
    readonly cursor: CursorStore,
    readonly policy: WindowPolicy
  ) {
    this.descriptor = {
      key: `${tariff.productCode}:${tariff.tariffCode}`,
      kind: 'unit_rate',
      source: 'octopus',
      labels: { energy: tariff.energy, product_code: tariff.productCode, tariff_code: tariff.tariffCode }
    };
  }

  async execute(window: FetchWindow): Promise<StreamBatchResult> {
    const entries = await this.client.getUnitRates(this.tariff, window.start, window.end);
    const { records, skipped } = normalizeUnitRates(entries, this.tariff);
    if (records.length === 0) {
      return { fetched: entries.length, skipped, counted: 0, partitions: [], latest: null };
    }
    const written = await this.writer.write(unitRateDataset, records);
    return {
      fetched: entries.length,
      skipped,
      counted: written.recordsWritten,
      partitions: written.partitions,
      latest: latestTimestamp(unitRateDataset, records)
    };
  }
}

/**
 * Consumption streams per configured (or discovered) meter, plus unit-rate
 * streams per tariff when rate ingestion is on.
 */
export class OctopusSource implements IngestionSource {
  readonly name = 'octopus';
  private readonly options: OctopusSourceOptions;

  constructor(options: OctopusSourceOptions) {
    this.options = options;
  }

  async enumerate(): Promise<IngestionStream[]> {
    const { client, writer, cursor, policies } = this.options;
    const meters = await this.resolveMeters();
    const streams: IngestionStream[] = meters.map(
      (meter) => new ConsumptionStream(meter, client, writer, cursor, policies.consumption)
    );
    if (this.options.settings.ingestRates) {
      for (const tariff of await this.resolveTariffs()) {
        streams.push(new UnitRateStream(tariff, client, writer, cursor, policies.unitRate));
      }
    }
    return streams;
  }

  close(): Promise<void> {
    return this.options.client.close();
  }

  async resolveMeters(): Promise<MeterRef[]> {
    const { settings, client, logger } = this.options;
    if (settings.meters.length > 0) {
      return settings.meters.map(({ energy, mpanMprn, serial }) => ({ energy, mpanMprn, serial }));
    }
    const discovered = await client.listAllMeters();
    logger.info({ meters: discovered.length }, 'discovered meters from account');
    return discovered;
  }

  /** Configured codes win over a meter's `tariff_code`, which wins over account discovery. */
  async resolveTariffs(): Promise<TariffRef[]> {
    const { settings, client, logger, now } = this.options;
    const resolved = new Map<EnergyKind, TariffRef>();
    for (const energy of ['electricity', 'gas'] as const) {
      const override = settings[energy];
      const meterTariff = settings.meters.find((meter) => meter.energy === energy && meter.tariffCode)?.tariffCode;
      const code = override.tariffCode ?? meterTariff;
      if (!code) {
        continue;
      }
      const tariff = tariffFromCode(code, override.tariffCode ? override.productCode : undefined);
      if (tariff) {
        resolved.set(energy, { ...tariff, energy });
      } else {
        logger.warn({ energy, tariffCode: code }, 'cannot derive product code from tariff code');
      }
    }

    if (settings.discoverTariffs && resolved.size < 2) {
      const discovered = await client.discoverActiveTariffs(now);
      for (const tariff of discovered) {
        if (!resolved.has(tariff.energy)) {
          resolved.set(tariff.energy, tariff);
        }
      }
      logger.info(
        { asOf: formatTimestamp(now), tariffs: discovered.map((tariff) => tariff.tariffCode) },
        'discovered active tariffs'
      );
    }
    return Array.from(resolved.values());
  }
}

import { z } from 'zod';
import {
  booleanVar,
  enumVar,
  instantVar,
  integerVar,
  jsonVar,
  loadEnvConfig,
  optionalStringVar,
  requiredStringVar,
  resolveRetryPolicy,
  stringVar
} from '@gridlake/shared';
import type { EnvSource, RetryPolicy } from '@gridlake/shared';
import type { DeviceRef, MeterRef } from '../records/types';
import { OCTOPUS_BASE_URL } from '../sources/octopus/client';
import { TADO_BASE_URL, TADO_TOKEN_URL } from '../sources/tado/client';
import type { S3ObjectStoreConfig } from '../storage/s3ObjectStore';
import type { PartitionFormat, PartitionWriteMode } from '../storage/types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type ContainerNames = {
  consumption: string;
  heating: string;
  curated: string;
};

export type ServiceConfig = {
  logLevel: LogLevel;
  storage: {
    driver: 'local' | 's3';
    localRoot: string;
    s3: S3ObjectStoreConfig | null;
    containers: ContainerNames;
  };
  partitions: {
    format: PartitionFormat;
    writeMode: PartitionWriteMode;
  };
  windows: {
    consumptionLookbackDays: number;
    ratesLookbackDays: number;
    heatingLookbackHours: number;
    floor: Date;
  };
  sources: {
    skipOctopus: boolean;
    skipTado: boolean;
  };
  http: {
    timeoutMs: number;
    retry: RetryPolicy;
  };
  schedule: {
    cron: string;
    timezone: string;
  };
  backfill: {
    maxWorkers: number;
    bootstrapLookbackDays: number;
  };
};

const serviceEnvSchema = z
  .object({
    LOG_LEVEL: enumVar(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const, 'info'),
    INGEST_STORAGE_DRIVER: enumVar(['local', 's3'] as const, 'local'),
    INGEST_STORAGE_LOCAL_ROOT: stringVar('./data'),
    INGEST_S3_BUCKET: optionalStringVar(),
    INGEST_S3_REGION: optionalStringVar(),
    INGEST_S3_ENDPOINT: optionalStringVar(),
    INGEST_S3_FORCE_PATH_STYLE: booleanVar(),
    INGEST_S3_ACCESS_KEY_ID: optionalStringVar(),
    INGEST_S3_SECRET_ACCESS_KEY: optionalStringVar(),
    INGEST_S3_SESSION_TOKEN: optionalStringVar(),
    STORAGE_CONTAINER_CONSUMPTION: stringVar('consumption'),
    STORAGE_CONTAINER_HEATING: stringVar('heating'),
    STORAGE_CONTAINER_CURATED: stringVar('curated'),
    INGEST_PARTITION_FORMAT: enumVar(['parquet', 'ndjson'] as const, 'parquet'),
    INGEST_PARTITION_WRITE_MODE: enumVar(['merge', 'replace'] as const, 'merge'),
    INGEST_CONSUMPTION_LOOKBACK_DAYS: integerVar({ defaultValue: 7, min: 1 }),
    INGEST_RATES_LOOKBACK_DAYS: integerVar({ defaultValue: 30, min: 1 }),
    INGEST_HEATING_LOOKBACK_HOURS: integerVar({ defaultValue: 1, min: 1 }),
    INGEST_WINDOW_FLOOR: instantVar('2015-01-01T00:00:00Z'),
    SKIP_OCTOPUS: booleanVar(),
    SKIP_TADO: booleanVar(),
    HTTP_TIMEOUT_MS: integerVar({ defaultValue: 30_000, min: 1 }),
    INGEST_SCHEDULE_CRON: stringVar('*/30 * * * *'),
    INGEST_SCHEDULE_TZ: stringVar('UTC'),
    BACKFILL_MAX_WORKERS: integerVar({ defaultValue: 7, min: 1, max: 64 }),
    BOOTSTRAP_LOOKBACK_DAYS: integerVar({ defaultValue: 30, min: 1 })
  })
  .passthrough()
  .superRefine((env, ctx) => {
    if (env.INGEST_STORAGE_DRIVER === 's3' && !env.INGEST_S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['INGEST_S3_BUCKET'],
        message: 'INGEST_S3_BUCKET is required when INGEST_STORAGE_DRIVER=s3'
      });
    }
  });

let cachedConfig: ServiceConfig | null = null;

export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  const parsed = loadEnvConfig(serviceEnvSchema, { env, context: 'ingest' });
  const bucket = parsed.INGEST_S3_BUCKET;

  cachedConfig = {
    logLevel: parsed.LOG_LEVEL,
    storage: {
      driver: parsed.INGEST_STORAGE_DRIVER,
      localRoot: parsed.INGEST_STORAGE_LOCAL_ROOT,
      s3: bucket
        ? {
            bucket,
            region: parsed.INGEST_S3_REGION,
            endpoint: parsed.INGEST_S3_ENDPOINT,
            forcePathStyle: parsed.INGEST_S3_FORCE_PATH_STYLE,
            accessKeyId: parsed.INGEST_S3_ACCESS_KEY_ID,
            secretAccessKey: parsed.INGEST_S3_SECRET_ACCESS_KEY,
            sessionToken: parsed.INGEST_S3_SESSION_TOKEN
          }
        : null,
      containers: {
        consumption: parsed.STORAGE_CONTAINER_CONSUMPTION,
        heating: parsed.STORAGE_CONTAINER_HEATING,
        curated: parsed.STORAGE_CONTAINER_CURATED
      }
    },
    partitions: {
      format: parsed.INGEST_PARTITION_FORMAT,
      writeMode: parsed.INGEST_PARTITION_WRITE_MODE
    },
    windows: {
      consumptionLookbackDays: parsed.INGEST_CONSUMPTION_LOOKBACK_DAYS,
      ratesLookbackDays: parsed.INGEST_RATES_LOOKBACK_DAYS,
      heatingLookbackHours: parsed.INGEST_HEATING_LOOKBACK_HOURS,
      floor: parsed.INGEST_WINDOW_FLOOR
    },
    sources: {
      skipOctopus: parsed.SKIP_OCTOPUS,
      skipTado: parsed.SKIP_TADO
    },
    http: {
      timeoutMs: parsed.HTTP_TIMEOUT_MS,
      retry: resolveRetryPolicy({ attempts: 5, baseMs: 500, factor: 2, maxMs: 10_000 }, { prefix: 'HTTP_RETRY', env })
    },
    schedule: {
      cron: parsed.INGEST_SCHEDULE_CRON,
      timezone: parsed.INGEST_SCHEDULE_TZ
    },
    backfill: {
      maxWorkers: parsed.BACKFILL_MAX_WORKERS,
      bootstrapLookbackDays: parsed.BOOTSTRAP_LOOKBACK_DAYS
    }
  };
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}

export type ConfiguredMeter = MeterRef & {
  tariffCode?: string;
};

export type TariffOverride = {
  productCode?: string;
  tariffCode?: string;
};

export type OctopusSettings = {
  apiKey: string;
  accountNumber: string;
  baseUrl: string;
  /** Empty when meters should be discovered from the account. */
  meters: ConfiguredMeter[];
  electricity: TariffOverride;
  gas: TariffOverride;
  discoverTariffs: boolean;
  ingestRates: boolean;
};

const meterSchema = z
  .object({
    kind: z.enum(['electricity', 'gas']),
    mpan_or_mprn: z.string().min(1),
    serial: z.string().min(1),
    tariff_code: z.string().min(1).nullish()
  })
  .strict();

const octopusEnvSchema = z
  .object({
    OCTOPUS_API_KEY: requiredStringVar(),
    OCTOPUS_ACCOUNT_NUMBER: requiredStringVar(),
    OCTOPUS_BASE_URL: stringVar(OCTOPUS_BASE_URL),
    METERS_JSON: jsonVar(z.array(meterSchema), { defaultValue: [] }),
    ELECTRICITY_PRODUCT_CODE: optionalStringVar(),
    ELECTRICITY_TARIFF_CODE: optionalStringVar(),
    GAS_PRODUCT_CODE: optionalStringVar(),
    GAS_TARIFF_CODE: optionalStringVar(),
    OCTOPUS_DISCOVER_TARIFFS: booleanVar({ defaultValue: true }),
    OCTOPUS_INGEST_RATES: booleanVar({ defaultValue: true })
  })
  .passthrough();

export function loadOctopusSettings(env: EnvSource = process.env): OctopusSettings {
  const parsed = loadEnvConfig(octopusEnvSchema, { env, context: 'ingest:octopus' });
  return {
    apiKey: parsed.OCTOPUS_API_KEY,
    accountNumber: parsed.OCTOPUS_ACCOUNT_NUMBER,
    baseUrl: parsed.OCTOPUS_BASE_URL,
    meters: (parsed.METERS_JSON ?? []).map((meter) => ({
      energy: meter.kind,
      mpanMprn: meter.mpan_or_mprn,
      serial: meter.serial,
      tariffCode: meter.tariff_code ?? undefined
    })),
    electricity: {
      productCode: parsed.ELECTRICITY_PRODUCT_CODE,
      tariffCode: parsed.ELECTRICITY_TARIFF_CODE
    },
    gas: {
      productCode: parsed.GAS_PRODUCT_CODE,
      tariffCode: parsed.GAS_TARIFF_CODE
    },
    discoverTariffs: parsed.OCTOPUS_DISCOVER_TARIFFS,
    ingestRates: parsed.OCTOPUS_INGEST_RATES
  };
}

export type TadoSettings = {
  homeId: string;
  clientId: string;
  /** `null` when heating zones should be discovered from the API. */
  devices: DeviceRef[] | null;
  baseUrl: string;
  tokenUrl: string;
  secretsFile: string;
  refreshTokenSecret: string;
};

const deviceSchema = z
  .object({
    device_id: z.union([z.string().min(1), z.number()]),
    zone_id: z.union([z.string().min(1), z.number()]),
    name: z.string().nullish()
  })
  .strict();

const tadoEnvSchema = z
  .object({
    TADO_HOME_ID: requiredStringVar(),
    TADO_CLIENT_ID: requiredStringVar(),
    TADO_DEVICES_JSON: jsonVar(z.array(deviceSchema)),
    TADO_BASE_URL: stringVar(TADO_BASE_URL),
    TADO_TOKEN_URL: stringVar(TADO_TOKEN_URL),
    TADO_SECRETS_FILE: stringVar('.secrets/tado.json'),
    TADO_REFRESH_TOKEN_SECRET: stringVar('tado-refresh-token')
  })
  .passthrough();

export function loadTadoSettings(env: EnvSource = process.env): TadoSettings {
  const parsed = loadEnvConfig(tadoEnvSchema, { env, context: 'ingest:tado' });
  const devices = parsed.TADO_DEVICES_JSON;
  return {
    homeId: parsed.TADO_HOME_ID,
    clientId: parsed.TADO_CLIENT_ID,
    devices: devices
      ? devices.map((device) => ({
          deviceId: String(device.device_id),
          zoneId: String(device.zone_id),
          name: device.name ?? undefined
        }))
      : null,
    baseUrl: parsed.TADO_BASE_URL,
    tokenUrl: parsed.TADO_TOKEN_URL,
    secretsFile: parsed.TADO_SECRETS_FILE,
    refreshTokenSecret: parsed.TADO_REFRESH_TOKEN_SECRET
  };
}

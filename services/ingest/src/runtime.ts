import type { EnvSource } from '@gridlake/shared';
import { loadOctopusSettings, loadTadoSettings } from './config/serviceConfig';
import type { OctopusSettings, ServiceConfig, TadoSettings } from './config/serviceConfig';
import { CursorStore } from './cursors/cursorStore';
import { HttpClient } from './http/httpClient';
import type { FetchLike } from './http/httpClient';
import { RefreshTokenProvider } from './http/tokens';
import type { Logger } from './logger';
import { OctopusSource } from './orchestrator/octopusSource';
import { TadoSource } from './orchestrator/tadoSource';
import type { SourceRegistration } from './orchestrator/types';
import { consumptionPolicy, heatingPolicy, unitRatePolicy } from './planning/windowPlanner';
import { FileSecretStore } from './secrets/secretStore';
import type { SecretStore } from './secrets/secretStore';
import { OctopusClient } from './sources/octopus/client';
import { TadoClient } from './sources/tado/client';
import { resolveCodec } from './storage/codecs';
import { LocalObjectStore } from './storage/localObjectStore';
import type { ObjectStore } from './storage/objectStore';
import { PartitionWriter } from './storage/partitionWriter';
import { S3ObjectStore, createS3Client } from './storage/s3ObjectStore';

export type ObjectStoreFactory = (container: string) => ObjectStore;

export type RuntimeOptions = {
  config: ServiceConfig;
  logger: Logger;
  env?: EnvSource;
  fetchImpl?: FetchLike;
  now?: () => Date;
  storeFactory?: ObjectStoreFactory;
  secrets?: SecretStore;
};

export function createObjectStoreFactory(config: ServiceConfig): ObjectStoreFactory {
  const { storage } = config;
  if (storage.driver === 's3') {
    if (!storage.s3) {
      throw new Error('S3 storage selected without a bucket');
    }
    const s3 = storage.s3;
    const client = createS3Client(s3);
    return (container) => new S3ObjectStore(client, s3.bucket, container);
  }
  return (container) => new LocalObjectStore(storage.localRoot, container);
}

/** Writer and cursor store sharing one container. */
export type ContainerHandles = {
  store: ObjectStore;
  writer: PartitionWriter;
  cursor: CursorStore;
};

export function openContainer(options: RuntimeOptions, container: string): ContainerHandles {
  const factory = options.storeFactory ?? createObjectStoreFactory(options.config);
  const store = factory(container);
  const logger = options.logger.child({ container });
  return {
    store,
    writer: new PartitionWriter({
      store,
      codec: resolveCodec(options.config.partitions.format),
      mode: options.config.partitions.writeMode,
      logger
    }),
    cursor: new CursorStore(store, { logger })
  };
}

export function createOctopusClient(settings: OctopusSettings, options: RuntimeOptions): OctopusClient {
  const logger = options.logger.child({ source: 'octopus' });
  const http = new HttpClient({
    baseUrl: settings.baseUrl,
    auth: { type: 'basic', username: settings.apiKey },
    timeoutMs: options.config.http.timeoutMs,
    retry: options.config.http.retry,
    fetchImpl: options.fetchImpl,
    logger
  });
  return new OctopusClient({ http, accountNumber: settings.accountNumber, logger });
}

export function createTadoClient(settings: TadoSettings, options: RuntimeOptions): TadoClient {
  const logger = options.logger.child({ source: 'tado' });
  const tokens = new RefreshTokenProvider({
    tokenUrl: settings.tokenUrl,
    clientId: settings.clientId,
    secrets: options.secrets ?? new FileSecretStore(settings.secretsFile),
    secretName: settings.refreshTokenSecret,
    fetchImpl: options.fetchImpl,
    logger
  });
  const http = new HttpClient({
    baseUrl: settings.baseUrl,
    auth: { type: 'bearer', tokens },
    timeoutMs: options.config.http.timeoutMs,
    retry: options.config.http.retry,
    fetchImpl: options.fetchImpl,
    logger
  });
  return new TadoClient({ http, homeId: settings.homeId, logger });
}

export type OctopusRuntime = {
  settings: OctopusSettings;
  client: OctopusClient;
  source: OctopusSource;
  container: ContainerHandles;
};

export function createOctopusRuntime(options: RuntimeOptions): OctopusRuntime {
  const { config } = options;
  const settings = loadOctopusSettings(options.env ?? process.env);
  const container = openContainer(options, config.storage.containers.consumption);
  const client = createOctopusClient(settings, options);
  const floor = config.windows.floor;
  const source = new OctopusSource({
    settings,
    client,
    writer: container.writer,
    cursor: container.cursor,
    policies: {
      consumption: consumptionPolicy({ lookbackDays: config.windows.consumptionLookbackDays, floor }),
      unitRate: unitRatePolicy({ lookbackDays: config.windows.ratesLookbackDays, floor })
    },
    now: (options.now ?? (() => new Date()))(),
    logger: options.logger.child({ source: 'octopus' })
  });
  return { settings, client, source, container };
}

export type TadoRuntime = {
  settings: TadoSettings;
  client: TadoClient;
  source: TadoSource;
  container: ContainerHandles;
};

export function createTadoRuntime(options: RuntimeOptions): TadoRuntime {
  const { config } = options;
  const settings = loadTadoSettings(options.env ?? process.env);
  const container = openContainer(options, config.storage.containers.heating);
  const client = createTadoClient(settings, options);
  const source = new TadoSource({
    settings,
    client,
    writer: container.writer,
    cursor: container.cursor,
    policy: heatingPolicy({ lookbackHours: config.windows.heatingLookbackHours, floor: config.windows.floor }),
    logger: options.logger.child({ source: 'tado' })
  });
  return { settings, client, source, container };
}

/** Source registrations for a scheduled run; settings load lazily so failures stay per source. */
export function createSourceRegistrations(options: RuntimeOptions): SourceRegistration[] {
  const { sources } = options.config;
  return [
    {
      name: 'octopus',
      skip: sources.skipOctopus,
      create: async () => createOctopusRuntime(options).source
    },
    {
      name: 'tado',
      skip: sources.skipTado,
      create: async () => createTadoRuntime(options).source
    }
  ];
}

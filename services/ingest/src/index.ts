export * from './errors';
export * from './logger';
export * from './config/serviceConfig';
export * from './cursors/cursorStore';
export * from './cursors/timestamps';
export * from './planning/windowPlanner';
export * from './records/types';
export * from './records/normalizers';
export * from './http/httpClient';
export * from './http/tokens';
export * from './secrets/secretStore';
export * from './sources/octopus/client';
export * from './sources/octopus/tariffs';
export * from './sources/tado/client';
export * from './storage/types';
export * from './storage/objectStore';
export * from './storage/localObjectStore';
export * from './storage/s3ObjectStore';
export * from './storage/codecs';
export * from './storage/datasets';
export * from './storage/partitionWriter';
export * from './enrich/rateJoin';
export * from './enrich/gaps';
export * from './orchestrator/types';
export * from './orchestrator/streams';
export * from './orchestrator/runIngestion';
export * from './orchestrator/octopusSource';
export * from './orchestrator/tadoSource';
export * from './backfill/workerPool';
export * from './backfill/heatingBackfill';
export * from './backfill/energyBackfill';
export * from './scheduler/cronParser';
export * from './scheduler/schedule';
export * from './runtime';
export { createProgram } from './cli';
export type { CliDependencies } from './cli';

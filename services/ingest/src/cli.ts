#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import type { EnvSource } from '@gridlake/shared';
import { backfillEnergy } from './backfill/energyBackfill';
import { backfillHeating } from './backfill/heatingBackfill';
import { loadServiceConfig } from './config/serviceConfig';
import type { ServiceConfig } from './config/serviceConfig';
import { parseDateKey } from './cursors/timestamps';
import { IngestionRunError } from './errors';
import type { FetchLike } from './http/httpClient';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { runScheduledIngestion } from './orchestrator/runIngestion';
import { createOctopusRuntime, createSourceRegistrations, createTadoRuntime, openContainer } from './runtime';
import type { ObjectStoreFactory, RuntimeOptions } from './runtime';
import { runSchedule } from './scheduler/schedule';
import type { SecretStore } from './secrets/secretStore';

export type CliDependencies = {
  env?: EnvSource;
  fetchImpl?: FetchLike;
  storeFactory?: ObjectStoreFactory;
  secrets?: SecretStore;
  now?: () => Date;
  logger?: Logger;
  output?: (text: string) => void;
};

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseDateOption(value: string): Date {
  const parsed = parseDateKey(value);
  if (!parsed) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return parsed;
}

export function createProgram(dependencies: CliDependencies = {}): Command {
  const env = dependencies.env ?? process.env;
  const output = dependencies.output ?? ((text: string) => process.stdout.write(`${text}\n`));

  const runtime = (): RuntimeOptions => {
    const config: ServiceConfig = loadServiceConfig(env);
    return {
      config,
      logger: dependencies.logger ?? createLogger(config.logLevel),
      env,
      fetchImpl: dependencies.fetchImpl,
      storeFactory: dependencies.storeFactory,
      secrets: dependencies.secrets,
      now: dependencies.now
    };
  };

  const program = new Command();
  program
    .name('gridlake-ingest')
    .description('Incremental ingestion of energy consumption, unit rates and heating telemetry')
    .version('0.1.0');

  program
    .command('run')
    .description('Run one ingestion pass over every enabled source')
    .action(async () => {
      const options = runtime();
      const summary = await runScheduledIngestion(createSourceRegistrations(options), {
        logger: options.logger,
        now: options.now
      });
      output(JSON.stringify(summary, null, 2));
    });

  program
    .command('schedule')
    .description('Run ingestion on the configured cron schedule until interrupted')
    .option('--max-runs <count>', 'stop after this many runs', parsePositiveInteger)
    .action(async (commandOptions: { maxRuns?: number }) => {
      const options = runtime();
      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
      try {
        await runSchedule({
          cron: options.config.schedule.cron,
          timezone: options.config.schedule.timezone,
          logger: options.logger,
          signal: controller.signal,
          maxRuns: commandOptions.maxRuns,
          now: options.now,
          run: () =>
            runScheduledIngestion(createSourceRegistrations(options), {
              logger: options.logger,
              now: options.now
            })
        });
      } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
      }
    });

  program
    .command('backfill-energy')
    .description('Re-fetch recent consumption and unit rates and write costed consumption')
    .option('--days <days>', 'days to re-fetch (default BOOTSTRAP_LOOKBACK_DAYS)', parsePositiveInteger)
    .action(async (commandOptions: { days?: number }) => {
      const options = runtime();
      const octopus = createOctopusRuntime(options);
      const curated = openContainer(options, options.config.storage.containers.curated);
      try {
        const summary = await backfillEnergy({
          source: octopus.source,
          client: octopus.client,
          writer: octopus.container.writer,
          curatedWriter: curated.writer,
          days: commandOptions.days ?? options.config.backfill.bootstrapLookbackDays,
          now: (options.now ?? (() => new Date()))(),
          logger: options.logger.child({ command: 'backfill-energy' })
        });
        output(JSON.stringify(summary, null, 2));
      } finally {
        await octopus.source.close();
      }
    });

  program
    .command('backfill-heating')
    .description('Fetch heating day reports for a date range with a bounded worker pool')
    .requiredOption('--start <date>', 'first UTC date (YYYY-MM-DD)', parseDateOption)
    .requiredOption('--end <date>', 'last UTC date (YYYY-MM-DD)', parseDateOption)
    .option('--max-workers <count>', 'concurrent day report fetches (default BACKFILL_MAX_WORKERS)', parsePositiveInteger)
    .option('--dry-run', 'fetch and parse without writing partitions', false)
    .action(async (commandOptions: { start: Date; end: Date; maxWorkers?: number; dryRun: boolean }) => {
      if (commandOptions.start.getTime() > commandOptions.end.getTime()) {
        throw new InvalidArgumentError('--start must not be after --end.');
      }
      const options = runtime();
      const tado = createTadoRuntime(options);
      try {
        const summary = await backfillHeating({
          client: tado.client,
          devices: await tado.source.resolveDevices(),
          writer: commandOptions.dryRun ? null : tado.container.writer,
          start: commandOptions.start,
          end: commandOptions.end,
          maxWorkers: commandOptions.maxWorkers ?? options.config.backfill.maxWorkers,
          logger: options.logger.child({ command: 'backfill-heating' })
        });
        output(JSON.stringify(summary, null, 2));
      } finally {
        await tado.source.close();
      }
    });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof IngestionRunError) {
      console.error(JSON.stringify(err.summary, null, 2));
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}

import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Response } from 'undici';
import type { EnvSource } from '@gridlake/shared';
import { createProgram } from '../src/cli';
import type { CliDependencies } from '../src/cli';
import { resetCachedServiceConfig } from '../src/config/serviceConfig';
import { IngestionRunError } from '../src/errors';
import { createSilentLogger } from '../src/logger';
import { MemorySecretStore } from '../src/secrets/secretStore';
import { MemoryObjectStore } from '../src/storage/objectStore';
import { FakeFetch, jsonResponse, loadFixture } from './helpers';

const env: EnvSource = {
  INGEST_PARTITION_FORMAT: 'ndjson',
  HTTP_RETRY_ATTEMPTS: '1',
  OCTOPUS_API_KEY: 'test-key',
  OCTOPUS_ACCOUNT_NUMBER: 'A-TEST0001',
  OCTOPUS_BASE_URL: 'https://octopus.test/v1',
  OCTOPUS_DISCOVER_TARIFFS: 'false',
  ELECTRICITY_TARIFF_CODE: 'E-1R-AGILE-24-10-01-C',
  METERS_JSON: JSON.stringify([{ kind: 'electricity', mpan_or_mprn: '1200000000001', serial: '21L0000001' }]),
  TADO_HOME_ID: '1',
  TADO_CLIENT_ID: 'test-client',
  TADO_BASE_URL: 'https://tado.test/api/v2',
  TADO_TOKEN_URL: 'https://tado-login.test/oauth2/token',
  TADO_DEVICES_JSON: '[{"device_id":1,"zone_id":1}]'
};

function createDependencies(fake: FakeFetch, overrides: EnvSource = {}) {
  const stores = new Map<string, MemoryObjectStore>();
  const outputs: string[] = [];
  const dependencies: CliDependencies = {
    env: { ...env, ...overrides },
    fetchImpl: fake.fetch,
    logger: createSilentLogger(),
    secrets: new MemorySecretStore({ 'tado-refresh-token': 'test-refresh' }),
    now: () => new Date('2024-01-02T00:00:00Z'),
    output: (text) => outputs.push(text),
    storeFactory: (container) => {
      const store = stores.get(container) ?? new MemoryObjectStore(container);
      stores.set(container, store);
      return store;
    }
  };
  return { dependencies, stores, outputs };
}

describe('createProgram', () => {
  afterEach(() => resetCachedServiceConfig());

  it('registers the ingestion commands', () => {
    assert.deepEqual(
      createProgram().commands.map((command) => command.name()),
      ['run', 'schedule', 'backfill-energy', 'backfill-heating']
    );
  });

  it('backfills energy and writes costed consumption without moving cursors', async () => {
    const fake = new FakeFetch()
      .on('GET /v1/products/AGILE-24-10-01/electricity-tariffs/E-1R-AGILE-24-10-01-C/standard-unit-rates/', () =>
        jsonResponse({
          next: null,
          results: [
            { value_exc_vat: 0.285, value_inc_vat: 0.3, valid_from: '2023-12-31T23:30:00Z', valid_to: '2024-01-01T00:30:00Z' },
            { value_exc_vat: 0.266, value_inc_vat: 0.28, valid_from: '2024-01-01T00:30:00Z', valid_to: null }
          ]
        })
      )
      .on('GET /v1/electricity-meter-points/1200000000001/meters/21L0000001/consumption/', () =>
        jsonResponse({
          next: null,
          results: [
            { consumption: 0.5, interval_start: '2024-01-01T00:00:00Z', interval_end: '2024-01-01T00:30:00Z' },
            { consumption: 0.7, interval_start: '2024-01-01T00:30:00Z', interval_end: '2024-01-01T01:00:00Z' }
          ]
        })
      );
    const { dependencies, stores, outputs } = createDependencies(fake);

    await createProgram(dependencies).parseAsync(['backfill-energy', '--days', '1'], { from: 'user' });

    assert.deepEqual(JSON.parse(outputs[0] ?? '{}'), {
      meters: 1,
      tariffs: 1,
      errors: 0,
      consumptionRecords: 2,
      rateRecords: 2,
      costedRecords: 2,
      totalCost: 0.5 * 0.3 + 0.7 * 0.28
    });
    assert.equal(fake.requests[0]?.url.searchParams.get('period_from'), '2024-01-01T00:00:00Z');
    assert.deepEqual(stores.get('curated')?.keys(), [
      'kind=consumption_cost/energy=electricity/mpan_mprn=1200000000001/serial=21L0000001/date=2024-01-01/data.jsonl'
    ]);
    assert.deepEqual(stores.get('consumption')?.keys(), [
      'kind=electricity/mpan_mprn=1200000000001/serial=21L0000001/date=2024-01-01/data.jsonl',
      'kind=unit_rate/energy=electricity/product=AGILE-24-10-01/tariff=E-1R-AGILE-24-10-01-C/date=2023-12-31/data.jsonl',
      'kind=unit_rate/energy=electricity/product=AGILE-24-10-01/tariff=E-1R-AGILE-24-10-01-C/date=2024-01-01/data.jsonl'
    ]);
  });

  it('backfills heating days for the configured devices', async () => {
    const fake = new FakeFetch()
      .on('POST /oauth2/token', () => jsonResponse({ access_token: 'access-1' }))
      .on('GET /api/v2/homes/1/zones/1/dayReport', () => jsonResponse(loadFixture('dayReport.json')));
    const { dependencies, stores, outputs } = createDependencies(fake);

    await createProgram(dependencies).parseAsync(
      ['backfill-heating', '--start', '2024-01-15', '--end', '2024-01-15', '--max-workers', '2'],
      { from: 'user' }
    );

    assert.deepEqual(JSON.parse(outputs[0] ?? '{}'), {
      days: 1,
      deviceDaysFetched: 1,
      deviceDaysFailed: 0,
      demandDays: 1,
      temperatureDays: 1,
      partitionsWritten: 2
    });
    assert.equal(stores.get('heating')?.keys().length, 2);
  });

  it('fails the run command when every stream fails', async () => {
    const fake = new FakeFetch().on('GET /v1/', () => new Response('down', { status: 503 }));
    const { dependencies, outputs } = createDependencies(fake, { SKIP_TADO: 'true', OCTOPUS_INGEST_RATES: 'false' });

    await assert.rejects(createProgram(dependencies).parseAsync(['run'], { from: 'user' }), IngestionRunError);
    assert.deepEqual(outputs, []);
  });
});

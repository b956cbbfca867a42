import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Response } from 'undici';
import { backfillHeating } from '../src/backfill/heatingBackfill';
import { runBounded } from '../src/backfill/workerPool';
import { HttpClient } from '../src/http/httpClient';
import { StaticTokenProvider } from '../src/http/tokens';
import { createSilentLogger } from '../src/logger';
import { TadoClient } from '../src/sources/tado/client';
import { ndjsonCodec } from '../src/storage/codecs';
import { MemoryObjectStore } from '../src/storage/objectStore';
import { PartitionWriter } from '../src/storage/partitionWriter';
import { FakeFetch, jsonResponse, loadFixture } from './helpers';

describe('runBounded', () => {
  it('caps concurrency and reports failures without stopping', async () => {
    let inFlight = 0;
    let peak = 0;
    const outcomes = await runBounded([1, 2, 3, 4, 5], 2, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight -= 1;
      if (item === 3) {
        throw new Error('zone offline');
      }
      return item * 10;
    });

    assert.equal(peak, 2);
    assert.equal(outcomes.length, 5);
    const failed = outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.item);
    assert.deepEqual(failed, [3]);
    const values = outcomes.flatMap((outcome) => (outcome.ok ? [outcome.value] : [])).sort((a, b) => a - b);
    assert.deepEqual(values, [10, 20, 40, 50]);
  });

  it('resolves immediately for no work', async () => {
    assert.deepEqual(await runBounded([], 4, async () => 1), []);
  });
});

describe('backfillHeating', () => {
  function createClient(): TadoClient {
    const fake = new FakeFetch()
      .on('GET /api/v2/homes/1/zones/1/dayReport', (request) =>
        request.url.searchParams.get('date') === '2024-01-15' ? jsonResponse(loadFixture('dayReport.json')) : jsonResponse({})
      )
      .on('GET /api/v2/homes/1/zones/2/dayReport', () => new Response('unavailable', { status: 500 }));
    const http = new HttpClient({
      baseUrl: 'https://tado.test/api/v2',
      auth: { type: 'bearer', tokens: new StaticTokenProvider('test-token') },
      retry: { attempts: 1, baseMs: 1, factor: 2, maxMs: 1, jitterRatio: 0 },
      fetchImpl: fake.fetch
    });
    return new TadoClient({ http, homeId: '1' });
  }

  const devices = [
    { deviceId: '1', zoneId: '1' },
    { deviceId: '2', zoneId: '2' }
  ];
  const range = { start: new Date('2024-01-15T00:00:00Z'), end: new Date('2024-01-16T00:00:00Z') };

  it('writes each day once its device fetches settled and excludes failed devices', async () => {
    const store = new MemoryObjectStore('heating');
    const summary = await backfillHeating({
      client: createClient(),
      devices,
      writer: new PartitionWriter({ store, codec: ndjsonCodec }),
      ...range,
      maxWorkers: 2,
      logger: createSilentLogger()
    });

    assert.deepEqual(summary, {
      days: 2,
      deviceDaysFetched: 2,
      deviceDaysFailed: 2,
      demandDays: 1,
      temperatureDays: 1,
      partitionsWritten: 2
    });
    assert.deepEqual(store.keys(), [
      'kind=demand/trv=1/date=2024-01-15/data.jsonl',
      'kind=temperature/trv=1/date=2024-01-15/data.jsonl'
    ]);
  });

  it('keeps every zone when their samples share timestamps', async () => {
    const fake = new FakeFetch().on('GET /api/v2/homes/1/zones/', () => jsonResponse(loadFixture('dayReport.json')));
    const http = new HttpClient({
      baseUrl: 'https://tado.test/api/v2',
      auth: { type: 'bearer', tokens: new StaticTokenProvider('test-token') },
      retry: { attempts: 1, baseMs: 1, factor: 2, maxMs: 1, jitterRatio: 0 },
      fetchImpl: fake.fetch
    });
    const store = new MemoryObjectStore('heating');

    const summary = await backfillHeating({
      client: new TadoClient({ http, homeId: '1' }),
      devices,
      writer: new PartitionWriter({ store, codec: ndjsonCodec }),
      start: range.start,
      end: range.start,
      maxWorkers: 2,
      logger: createSilentLogger()
    });

    assert.equal(summary.partitionsWritten, 4);
    assert.deepEqual(store.keys(), [
      'kind=demand/trv=1/date=2024-01-15/data.jsonl',
      'kind=demand/trv=2/date=2024-01-15/data.jsonl',
      'kind=temperature/trv=1/date=2024-01-15/data.jsonl',
      'kind=temperature/trv=2/date=2024-01-15/data.jsonl'
    ]);
    const zoneOneDemand = await store.download('kind=demand/trv=1/date=2024-01-15/data.jsonl');
    const rows = new TextDecoder().decode(zoneOneDemand ?? new Uint8Array()).trim().split('\n');
    assert.equal(rows.length, 2);
  });

  it('writes nothing on a dry run', async () => {
    const summary = await backfillHeating({
      client: createClient(),
      devices,
      writer: null,
      ...range,
      maxWorkers: 7,
      logger: createSilentLogger()
    });

    assert.equal(summary.partitionsWritten, 0);
    assert.equal(summary.demandDays, 1);
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Response } from 'undici';
import { HttpRequestError, MalformedResponseError } from '../src/errors';
import { HttpClient } from '../src/http/httpClient';
import { StaticTokenProvider } from '../src/http/tokens';
import { TadoClient } from '../src/sources/tado/client';
import { FakeFetch, jsonResponse } from './helpers';

function createClient(fake: FakeFetch): TadoClient {
  const http = new HttpClient({
    baseUrl: 'https://tado.test/api/v2',
    auth: { type: 'bearer', tokens: new StaticTokenProvider('test-token') },
    retry: { attempts: 1, baseMs: 1, factor: 2, maxMs: 1, jitterRatio: 0 },
    fetchImpl: fake.fetch
  });
  return new TadoClient({ http, homeId: '12345' });
}

describe('TadoClient', () => {
  it('lists heating zones as devices', async () => {
    const fake = new FakeFetch().on('GET /api/v2/homes/12345/zones', () =>
      jsonResponse([
        { id: 1, name: 'Living room', type: 'HEATING' },
        { id: 2, name: 'Hot water', type: 'HOT_WATER' },
        { id: '7', name: null, type: 'HEATING' }
      ])
    );

    assert.deepEqual(await createClient(fake).listHeatingZones(), [
      { deviceId: '1', zoneId: '1', name: 'Living room' },
      { deviceId: '7', zoneId: '7', name: undefined }
    ]);
    assert.equal(fake.requests[0]?.headers.get('authorization'), 'Bearer test-token');
  });

  it('rejects a zones payload that is not a list', async () => {
    const fake = new FakeFetch().on('GET /api/v2/homes/12345/zones', () => jsonResponse({ errors: [] }));
    await assert.rejects(createClient(fake).listHeatingZones(), MalformedResponseError);
  });

  it('requests a day report by date and treats 404 as no data', async () => {
    const fake = new FakeFetch()
      .on('GET /api/v2/homes/12345/zones/1/dayReport', () => jsonResponse({ zoneType: 'HEATING' }))
      .on('GET /api/v2/homes/12345/zones/2/dayReport', () => new Response('down', { status: 500 }));
    const client = createClient(fake);

    assert.deepEqual(await client.getDayReport({ deviceId: '1', zoneId: '1' }, '2024-01-15'), { zoneType: 'HEATING' });
    assert.equal(fake.requests[0]?.url.searchParams.get('date'), '2024-01-15');
    assert.equal(await client.getDayReport({ deviceId: '9', zoneId: '9' }, '2024-01-15'), null);
    await assert.rejects(client.getDayReport({ deviceId: '2', zoneId: '2' }, '2024-01-15'), HttpRequestError);
    assert.equal(
      client.dayReportUrl({ deviceId: '1', zoneId: '1' }, '2024-01-15'),
      'https://tado.test/api/v2/homes/12345/zones/1/dayReport?date=2024-01-15'
    );
  });
});

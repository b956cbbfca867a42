import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PartitionDecodeError } from '../src/errors';
import { createSilentLogger } from '../src/logger';
import type { ConsumptionRecord, TemperatureRecord } from '../src/records/types';
import { ndjsonCodec, parquetCodec } from '../src/storage/codecs';
import { consumptionDataset, pathSegment, temperatureDataset } from '../src/storage/datasets';
import { MemoryObjectStore } from '../src/storage/objectStore';
import { PartitionWriter, partitionPath, sortRecords } from '../src/storage/partitionWriter';
import type { PartitionWriteMode } from '../src/storage/types';

const DAY_ONE = 'kind=electricity/mpan_mprn=1200000000001/serial=21L0000001/date=2024-01-01/data.jsonl';
const DAY_TWO = 'kind=electricity/mpan_mprn=1200000000001/serial=21L0000001/date=2024-01-02/data.jsonl';

function reading(start: string, end: string, consumption: number): ConsumptionRecord {
  return {
    interval_start: start,
    interval_end: end,
    consumption,
    energy: 'electricity',
    mpan_mprn: '1200000000001',
    serial: '21L0000001'
  };
}

function line(record: ConsumptionRecord): string {
  return JSON.stringify(record);
}

function createWriter(mode: PartitionWriteMode = 'merge') {
  const store = new MemoryObjectStore('consumption');
  const writer = new PartitionWriter({ store, codec: ndjsonCodec, mode, logger: createSilentLogger() });
  return { store, writer };
}

const first = reading('2024-01-01T00:00:00Z', '2024-01-01T00:30:00Z', 0.2);
const second = reading('2024-01-01T00:30:00Z', '2024-01-01T01:00:00Z', 0.3);
const revised = reading('2024-01-01T00:30:00Z', '2024-01-01T01:00:00Z', 0.35);
const nextDay = reading('2024-01-02T00:00:00Z', '2024-01-02T00:30:00Z', 0.4);

describe('partition layout', () => {
  it('routes records to prefix and UTC date paths', () => {
    assert.equal(partitionPath(consumptionDataset, first, 'jsonl'), DAY_ONE);
    assert.equal(pathSegment(' a/b c=d '), 'a_b_c_d');
    assert.equal(pathSegment('  '), 'unknown');
  });

  it('orders records by instant, then key', () => {
    const quarter = reading('2024-01-01T00:00:00Z', '2024-01-01T00:15:00Z', 1);
    assert.deepEqual(sortRecords(consumptionDataset, [second, first, quarter]), [quarter, first, second]);
  });
});

describe('PartitionWriter', () => {
  it('writes one artifact per prefix and date in sorted order', async () => {
    const { store, writer } = createWriter();

    const result = await writer.write(consumptionDataset, [nextDay, second, first]);

    assert.deepEqual(result, { partitions: [DAY_ONE, DAY_TWO], recordsWritten: 3 });
    assert.equal(store.readText(DAY_ONE), `${line(first)}\n${line(second)}\n`);
    assert.equal(store.readText(DAY_TWO), `${line(nextDay)}\n`);
  });

  it('merges with stored rows and lets the batch win on key collisions', async () => {
    const { store, writer } = createWriter();
    await writer.write(consumptionDataset, [first, second]);

    const result = await writer.write(consumptionDataset, [revised]);

    assert.deepEqual(result, { partitions: [DAY_ONE], recordsWritten: 1 });
    assert.equal(store.readText(DAY_ONE), `${line(first)}\n${line(revised)}\n`);
    assert.deepEqual(await writer.read(consumptionDataset, DAY_ONE), [first, revised]);
  });

  it('produces identical artifacts when a batch is written twice', async () => {
    const { store, writer } = createWriter();
    await writer.write(consumptionDataset, [first, second, second]);
    const once = store.readText(DAY_ONE);
    await writer.write(consumptionDataset, [second, first]);

    assert.equal(store.readText(DAY_ONE), once);
    assert.equal(store.uploads.length, 2);
  });

  it('replaces stored rows in replace mode', async () => {
    const { store, writer } = createWriter('replace');
    await writer.write(consumptionDataset, [first, second]);
    await writer.write(consumptionDataset, [revised]);

    assert.equal(store.readText(DAY_ONE), `${line(revised)}\n`);
  });

  it('skips empty batches', async () => {
    const { store, writer } = createWriter();
    assert.deepEqual(await writer.write(consumptionDataset, []), { partitions: [], recordsWritten: 0 });
    assert.equal(store.uploads.length, 0);
  });

  it('refuses to merge into an artifact it cannot decode', async () => {
    const { store, writer } = createWriter();
    store.objects.set(DAY_ONE, new Uint8Array(Buffer.from('{broken\n', 'utf8')));

    await assert.rejects(writer.write(consumptionDataset, [first]), (error: unknown) => {
      assert.ok(error instanceof PartitionDecodeError);
      assert.equal(error.path, `consumption/${DAY_ONE}`);
      return true;
    });
    assert.equal(store.readText(DAY_ONE), '{broken\n');

    store.objects.set(DAY_ONE, new Uint8Array(Buffer.from('{"interval_start":"later"}\n', 'utf8')));
    await assert.rejects(writer.read(consumptionDataset, DAY_ONE), PartitionDecodeError);
  });

  it('returns null when reading a missing artifact', async () => {
    const { writer } = createWriter();
    assert.equal(await writer.read(consumptionDataset, DAY_ONE), null);
  });
});

describe('parquet partitions', () => {
  it('round trips typed columns including nulls', async () => {
    const store = new MemoryObjectStore('heating');
    const writer = new PartitionWriter({ store, codec: parquetCodec });
    const late: TemperatureRecord = {
      timestamp: '2024-01-15T00:20:00Z',
      temperature: 19.4,
      sensor_type: 'inside',
      humidity: null,
      device_id: '1',
      zone_id: '1'
    };
    const early: TemperatureRecord = { ...late, timestamp: '2024-01-15T00:00:00Z', temperature: 19.5, humidity: 0.55 };

    const result = await writer.write(temperatureDataset, [late, early]);
    const path = 'kind=temperature/trv=1/date=2024-01-15/data.parquet';
    assert.deepEqual(result.partitions, [path]);

    assert.deepEqual(await writer.read(temperatureDataset, path), [early, late]);

    await writer.write(temperatureDataset, [{ ...late, temperature: 19.6 }]);
    const merged = await writer.read(temperatureDataset, path);
    assert.deepEqual(
      merged?.map((row) => row.temperature),
      [19.5, 19.6]
    );
  });
});

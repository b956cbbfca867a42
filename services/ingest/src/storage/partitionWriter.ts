import { parseTimestamp, utcDateKey } from '../cursors/timestamps';
import { PartitionDecodeError } from '../errors';
import type { Logger } from '../logger';
import type { ObjectStore } from './objectStore';
import type { Dataset, PartitionCodec, PartitionRow, PartitionWriteMode } from './types';

export type PartitionWriterOptions = {
  store: ObjectStore;
  codec: PartitionCodec;
  mode?: PartitionWriteMode;
  logger?: Logger;
};

export type PartitionWriteResult = {
  /** Paths written, in write order. */
  partitions: string[];
  /** Distinct records of the batch after deduplication. */
  recordsWritten: number;
};

function instantOf<R extends PartitionRow>(dataset: Dataset<R>, record: R): Date {
  const value = dataset.timestampOf(record);
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new Error(`${dataset.name} record has an invalid timestamp: ${value}`);
  }
  return parsed;
}

export function dedupeRecords<R extends PartitionRow>(dataset: Dataset<R>, records: readonly R[]): R[] {
  const byKey = new Map<string, R>();
  for (const record of records) {
    byKey.set(dataset.dedupKey(record), record);
  }
  return Array.from(byKey.values());
}

export function sortRecords<R extends PartitionRow>(dataset: Dataset<R>, records: readonly R[]): R[] {
  return records
    .map((record) => ({ record, at: instantOf(dataset, record).getTime(), key: dataset.dedupKey(record) }))
    .sort((a, b) => a.at - b.at || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map((entry) => entry.record);
}

export function partitionPath<R extends PartitionRow>(dataset: Dataset<R>, record: R, extension: string): string {
  const date = utcDateKey(instantOf(dataset, record));
  return `${dataset.partitionPrefix(record)}/date=${date}/data.${extension}`;
}

/**
 * Writes records as one artifact per (path prefix, UTC date). Each artifact is
 * rewritten whole; in `merge` mode rows already stored under the path are kept
 * unless the batch carries a row with the same key.
 */
export class PartitionWriter {
  private readonly store: ObjectStore;
  private readonly codec: PartitionCodec;
  private readonly mode: PartitionWriteMode;
  private readonly logger?: Logger;

  constructor(options: PartitionWriterOptions) {
    this.store = options.store;
    this.codec = options.codec;
    this.mode = options.mode ?? 'merge';
    this.logger = options.logger;
  }

  get container(): string {
    return this.store.container;
  }

  async write<R extends PartitionRow>(dataset: Dataset<R>, records: readonly R[]): Promise<PartitionWriteResult> {
    if (records.length === 0) {
      return { partitions: [], recordsWritten: 0 };
    }

    const unique = dedupeRecords(dataset, records);
    const groups = new Map<string, R[]>();
    for (const record of unique) {
      const path = partitionPath(dataset, record, this.codec.extension);
      const group = groups.get(path);
      if (group) {
        group.push(record);
      } else {
        groups.set(path, [record]);
      }
    }

    const partitions: string[] = [];
    for (const path of Array.from(groups.keys()).sort()) {
      const batch = groups.get(path) ?? [];
      const rows = this.mode === 'merge' ? await this.mergeWithExisting(dataset, path, batch) : batch;
      const body = await this.codec.encode(dataset.fields, sortRecords(dataset, rows));
      await this.store.upload(path, body, { overwrite: true, contentType: this.codec.contentType });
      partitions.push(path);
      this.logger?.debug(
        { container: this.store.container, path, batchRows: batch.length, totalRows: rows.length },
        'partition written'
      );
    }

    return { partitions, recordsWritten: unique.length };
  }

  async read<R extends PartitionRow>(dataset: Dataset<R>, path: string): Promise<R[] | null> {
    const body = await this.store.download(path);
    if (body === null) {
      return null;
    }
    try {
      const decoded = await this.codec.decode(dataset.fields, body);
      return decoded.map((row) => dataset.rowSchema.parse(row));
    } catch (error) {
      throw new PartitionDecodeError(`${this.store.container}/${path}`, error);
    }
  }

  private async mergeWithExisting<R extends PartitionRow>(dataset: Dataset<R>, path: string, batch: R[]): Promise<R[]> {
    const existing = await this.read(dataset, path);
    if (!existing || existing.length === 0) {
      return batch;
    }
    return dedupeRecords(dataset, [...existing, ...batch]);
  }
}

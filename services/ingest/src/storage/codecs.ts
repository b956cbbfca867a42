import { Writable } from 'node:stream';
import { ParquetReader, ParquetSchema, ParquetWriter } from 'parquetjs-lite';
import type { ParquetField, ParquetRow } from 'parquetjs-lite';
import { formatTimestamp, parseTimestamp } from '../cursors/timestamps';
import { assertUnreachable } from '../errors';
import type { FieldSchema, FieldType, PartitionCodec, PartitionFormat, PartitionRow } from './types';

function parquetType(type: FieldType): string {
  switch (type) {
    case 'timestamp':
      return 'TIMESTAMP_MILLIS';
    case 'string':
      return 'UTF8';
    case 'double':
      return 'DOUBLE';
    case 'integer':
      return 'INT32';
    case 'boolean':
      return 'BOOLEAN';
    default:
      return assertUnreachable(type);
  }
}

function buildParquetSchema(fields: FieldSchema): ParquetSchema {
  const definition: Record<string, ParquetField> = {};
  for (const [name, field] of Object.entries(fields)) {
    definition[name] = field.nullable ? { type: parquetType(field.type), optional: true } : { type: parquetType(field.type) };
  }
  return new ParquetSchema(definition);
}

function toParquetRow(fields: FieldSchema, row: PartitionRow): ParquetRow {
  const output: ParquetRow = {};
  for (const [name, field] of Object.entries(fields)) {
    const value = row[name];
    if (value === null || value === undefined) {
      continue;
    }
    if (field.type === 'timestamp') {
      const parsed = parseTimestamp(value);
      if (!parsed) {
        throw new Error(`Column ${name} holds an invalid timestamp: ${String(value)}`);
      }
      output[name] = parsed;
      continue;
    }
    output[name] = value;
  }
  return output;
}

function fromParquetValue(value: unknown): unknown {
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return value;
}

class ChunkCollector extends Writable {
  readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    callback();
  }
}

export const parquetCodec: PartitionCodec = {
  format: 'parquet',
  extension: 'parquet',
  contentType: 'application/vnd.apache.parquet',

  async encode(fields, rows) {
    const sink = new ChunkCollector();
    const writer = await ParquetWriter.openStream(buildParquetSchema(fields), sink);
    try {
      for (const row of rows) {
        await writer.appendRow(toParquetRow(fields, row));
      }
    } finally {
      await writer.close();
    }
    return new Uint8Array(Buffer.concat(sink.chunks));
  },

  async decode(fields, body) {
    const reader = await ParquetReader.openBuffer(Buffer.from(body));
    const rows: Record<string, unknown>[] = [];
    try {
      const cursor = reader.getCursor();
      for (let record = await cursor.next(); record !== null; record = await cursor.next()) {
        const row: Record<string, unknown> = {};
        for (const name of Object.keys(fields)) {
          row[name] = fromParquetValue(record[name]);
        }
        rows.push(row);
      }
    } finally {
      await reader.close();
    }
    return rows;
  }
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

export const ndjsonCodec: PartitionCodec = {
  format: 'ndjson',
  extension: 'jsonl',
  contentType: 'application/x-ndjson',

  async encode(fields, rows) {
    const lines = rows.map((row) => {
      const ordered: Record<string, unknown> = {};
      for (const name of Object.keys(fields)) {
        ordered[name] = row[name] ?? null;
      }
      return JSON.stringify(ordered);
    });
    return new Uint8Array(Buffer.from(lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8'));
  },

  async decode(_fields, body) {
    const text = Buffer.from(body).toString('utf8');
    const rows: Record<string, unknown>[] = [];
    for (const [index, line] of text.split('\n').entries()) {
      if (line.trim().length === 0) {
        continue;
      }
      const parsed: unknown = JSON.parse(line);
      if (!isPlainObject(parsed)) {
        throw new Error(`Line ${index + 1} is not a JSON object`);
      }
      rows.push(parsed);
    }
    return rows;
  }
};

export function resolveCodec(format: PartitionFormat): PartitionCodec {
  switch (format) {
    case 'parquet':
      return parquetCodec;
    case 'ndjson':
      return ndjsonCodec;
    default:
      return assertUnreachable(format);
  }
}

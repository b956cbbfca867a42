import type { z } from 'zod';

export type FieldType = 'timestamp' | 'string' | 'double' | 'integer' | 'boolean';

export type FieldSpec = {
  type: FieldType;
  nullable?: boolean;
};

/** Column definitions in persisted column order. */
export type FieldSchema = Record<string, FieldSpec>;

export type PartitionValue = string | number | boolean | null;

export type PartitionRow = Record<string, PartitionValue>;

export type PartitionFormat = 'parquet' | 'ndjson';

export type PartitionWriteMode = 'merge' | 'replace';

export interface PartitionCodec {
  readonly format: PartitionFormat;
  readonly extension: string;
  readonly contentType: string;
  encode(fields: FieldSchema, rows: readonly PartitionRow[]): Promise<Uint8Array>;
  decode(fields: FieldSchema, body: Uint8Array): Promise<Record<string, unknown>[]>;
}

/**
 * Everything the partitioned writer needs to know about one record kind: how to
 * serialize it, where it lives and which rows are the same row.
 */
export interface Dataset<R extends PartitionRow> {
  readonly name: string;
  readonly fields: FieldSchema;
  readonly rowSchema: z.ZodType<R, z.ZodTypeDef, unknown>;
  /** Canonical UTC timestamp that decides the partition date and the watermark. */
  timestampOf(record: R): string;
  /** Identifies a record among every stream that may share one write batch. */
  dedupKey(record: R): string;
  /** Path segments above `date=<D>`, built from stable identifiers only. */
  partitionPrefix(record: R): string;
}

declare module 'parquetjs-lite' {
  import type { Writable } from 'node:stream';

  export type ParquetField = {
    type: string;
    optional?: boolean;
    repeated?: boolean;
    compression?: string;
  };

  export type ParquetSchemaDefinition = Record<string, ParquetField>;

  export class ParquetSchema {
    constructor(schema: ParquetSchemaDefinition);
  }

  export type ParquetRow = Record<string, unknown>;

  export class ParquetWriter {
    static openStream(schema: ParquetSchema, outputStream: Writable, options?: Record<string, unknown>): Promise<ParquetWriter>;
    appendRow(row: ParquetRow): Promise<void>;
    close(): Promise<void>;
  }

  export class ParquetCursor {
    next(): Promise<ParquetRow | null>;
  }

  export class ParquetReader {
    static openBuffer(buffer: Buffer): Promise<ParquetReader>;
    getCursor(columns?: string[]): ParquetCursor;
    close(): Promise<void>;
  }
}

declare module 'parquetjs-lite' {
  export type ParquetType = 'UTF8' | 'INT64' | 'DOUBLE' | 'BOOLEAN' | 'TIMESTAMP_MILLIS';

  export type ParquetField = {
    type: ParquetType;
    optional?: boolean;
    repeated?: boolean;
    compression?: 'UNCOMPRESSED' | 'GZIP' | 'SNAPPY';
  };

  export type ParquetSchemaDefinition = Record<string, ParquetField>;

  export class ParquetSchema {
    constructor(schema: ParquetSchemaDefinition);
  }

  export type ParquetValue = string | number | boolean | Date;

  export type ParquetRow = Record<string, ParquetValue>;

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, filePath: string, options?: Record<string, unknown>): Promise<ParquetWriter>;
    appendRow(row: ParquetRow): Promise<void>;
    close(): Promise<void>;
  }

  export interface ParquetCursor {
    next(): Promise<Record<string, unknown> | null>;
  }

  export class ParquetReader {
    static openFile(filePath: string): Promise<ParquetReader>;
    getCursor(columns?: string[]): ParquetCursor;
    close(): Promise<void>;
  }
}

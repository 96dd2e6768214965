import { randomUUID } from 'node:crypto';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { ParquetSchema, ParquetWriter } from 'parquetjs-lite';
import type { ParquetRow, ParquetSchemaDefinition, ParquetType } from 'parquetjs-lite';
import { PARTITION_COLUMN_NAMES, partitionColumns } from './normalize';
import type { ColumnType } from './schema';
import type { DatasetColumn, DatasetRow, DatasetTable } from './tables';

export const DATE_ACCESSED_COLUMN = 'date_accessed';
/** Directory value for rows whose partition timestamp is missing. */
export const DEFAULT_PARTITION = '__HIVE_DEFAULT_PARTITION__';

const PARQUET_TYPES: Record<ColumnType, ParquetType> = {
  string: 'UTF8',
  int64: 'INT64',
  float64: 'DOUBLE',
  date: 'TIMESTAMP_MILLIS'
};

export interface PartitionOptions {
  partitionByDate: boolean;
  partitionColumn?: string;
}

export interface PartitionPlan {
  /** Path below the dataset directory; empty for an unpartitioned dataset. */
  relativeDirectory: string;
  rows: DatasetRow[];
}

/**
 * Groups rows into hive style `date_start__year=/date_start__month=/date_start__day=`
 * directories and adds the three partition columns to each row. Partitions keep the order
 * in which they are first seen.
 */
export function planPartitions(table: DatasetTable, options: PartitionOptions): PartitionPlan[] {
  if (!options.partitionByDate) {
    return table.rows.length > 0 ? [{ relativeDirectory: '', rows: table.rows }] : [];
  }
  const column = options.partitionColumn ?? 'date_start';
  const plans = new Map<string, PartitionPlan>();

  for (const row of table.rows) {
    const value = row[column];
    const parts = value instanceof Date ? partitionColumns(value) : null;
    const relativeDirectory = PARTITION_COLUMN_NAMES.map(
      (name) => `${name}=${parts ? parts[name] : DEFAULT_PARTITION}`
    ).join('/');

    let plan = plans.get(relativeDirectory);
    if (!plan) {
      plan = { relativeDirectory, rows: [] };
      plans.set(relativeDirectory, plan);
    }
    plan.rows.push({
      ...row,
      date_start__year: parts?.date_start__year ?? null,
      date_start__month: parts?.date_start__month ?? null,
      date_start__day: parts?.date_start__day ?? null
    });
  }
  return [...plans.values()];
}

function schemaFor(columns: DatasetColumn[]): ParquetSchema {
  const definition: ParquetSchemaDefinition = {};
  for (const column of columns) {
    definition[column.name] = { type: PARQUET_TYPES[column.type], optional: true, compression: 'GZIP' };
  }
  return new ParquetSchema(definition);
}

function toParquetRow(row: DatasetRow): ParquetRow {
  const parquetRow: ParquetRow = {};
  for (const [name, value] of Object.entries(row)) {
    if (value !== null && !(typeof value === 'number' && Number.isNaN(value))) {
      parquetRow[name] = value;
    }
  }
  return parquetRow;
}

export interface WriteDatasetOptions {
  directory: string;
  partitionByDate: boolean;
  partitionColumn?: string;
  /** Stamped into `date_accessed`; defaults to the time of the call. */
  accessedAt?: Date;
}

export interface WriteDatasetResult {
  files: string[];
  rowCount: number;
}

/**
 * Writes a table as parquet below `options.directory`, one `part-<uuid>.parquet` file per
 * partition. Concurrent writers must not share a directory.
 */
export async function writeDataset(table: DatasetTable, options: WriteDatasetOptions): Promise<WriteDatasetResult> {
  const accessedAt = options.accessedAt ?? new Date();
  const columns: DatasetColumn[] = [...table.columns, { name: DATE_ACCESSED_COLUMN, type: 'date' }];
  if (options.partitionByDate) {
    columns.push(...PARTITION_COLUMN_NAMES.map((name): DatasetColumn => ({ name, type: 'int64' })));
  }
  const schema = schemaFor(columns);

  const files: string[] = [];
  let rowCount = 0;
  for (const plan of planPartitions(table, options)) {
    const directory = path.join(options.directory, plan.relativeDirectory);
    await mkdir(directory, { recursive: true });
    const filePath = path.join(directory, `part-${randomUUID()}.parquet`);

    const writer = await ParquetWriter.openFile(schema, filePath);
    try {
      for (const row of plan.rows) {
        await writer.appendRow(toParquetRow({ ...row, [DATE_ACCESSED_COLUMN]: accessedAt }));
      }
    } finally {
      await writer.close();
    }
    files.push(filePath);
    rowCount += plan.rows.length;
  }
  return { files, rowCount };
}

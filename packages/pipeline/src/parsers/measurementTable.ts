import { StructuralParseError } from '../errors';
import { parseMeasurementTimestamp, type MeasurementTimestampFormat } from '../dates';
import { END_OF_RECORD_COLUMN, lookupColumn, MEASUREMENT_COLUMNS, type ColumnDefinition, type ColumnTable } from '../schema';
import type { MeasurementRecord } from '../types';
import { decodeUtf8, padStationId, parseFloatCell, parseIntegerCell, splitLines } from '../values';

const QUALITY_COLUMN = /^QN(_\d+)?$/;

export interface MeasurementTableOptions {
  source?: string;
  /**
   * Defaults to `auto`, which reads 10 digit values as the legacy `YYMMDDHHMM` form. Hourly
   * series (`YYYYMMDDHH`) must name their format, see `timestampFormatForResolution`.
   */
  timestampFormat?: MeasurementTimestampFormat;
  columns?: ColumnTable;
}

interface HeaderLayout {
  stationIndex: number;
  dateIndex: number;
  qualityIndex: number;
  valueColumns: Array<{ index: number; column: ColumnDefinition }>;
  width: number;
}

function splitFields(line: string): string[] {
  return line.split(';').map((field) => field.trim());
}

function layoutHeader(header: string[], table: ColumnTable, source: string): HeaderLayout {
  const columns = header.map((name) => lookupColumn(table, name));
  const stationIndex = columns.findIndex((column) => column.name === 'station_id');
  const dateIndex = columns.findIndex((column) => column.name === 'date_start');
  if (stationIndex < 0 || dateIndex < 0) {
    throw new StructuralParseError('header lacks the station id or timestamp column', { source });
  }

  const qualityIndex = columns.findIndex((column) => QUALITY_COLUMN.test(column.name));
  const valueColumns = columns
    .map((column, index) => ({ index, column }))
    .filter(
      ({ index, column }) =>
        index !== stationIndex &&
        index !== dateIndex &&
        index !== qualityIndex &&
        column.source.toLowerCase() !== END_OF_RECORD_COLUMN
    );

  return { stationIndex, dateIndex, qualityIndex, valueColumns, width: header.length };
}

/**
 * Parses a semicolon separated measurement series (`produkt_*.txt`). Fields are trimmed,
 * the `eor` marker column is dropped and `-999` or blank cells become null. A timestamp
 * that cannot be read becomes null rather than failing the file.
 */
export function parseMeasurementTable(
  content: Uint8Array | string,
  options: MeasurementTableOptions = {}
): MeasurementRecord[] {
  const source = options.source ?? 'measurement table';
  const format = options.timestampFormat ?? 'auto';
  const lines = splitLines(decodeUtf8(content));

  const headerLine = lines[0]?.trim() ?? '';
  if (!headerLine) {
    throw new StructuralParseError('missing header line', { source });
  }
  const layout = layoutHeader(splitFields(headerLine), options.columns ?? MEASUREMENT_COLUMNS, source);

  const records: MeasurementRecord[] = [];
  for (let index = 1; index < lines.length; index += 1) {
    const line = lines[index] ?? '';
    if (!line.trim()) {
      continue;
    }
    const fields = splitFields(line);
    if (fields.length !== layout.width) {
      throw new StructuralParseError(`line ${index + 1} has ${fields.length} fields, expected ${layout.width}`, {
        source
      });
    }

    const rawStation = fields[layout.stationIndex] ?? '';
    if (!rawStation) {
      throw new StructuralParseError(`line ${index + 1} has no station id`, { source });
    }
    const stationId = padStationId(rawStation);

    const values: Record<string, number | null> = {};
    for (const { index: position, column } of layout.valueColumns) {
      values[column.name] = parseFloatCell(fields[position] ?? '', { source, stationId, parameter: column.name });
    }

    records.push({
      stationId,
      dateStart: parseMeasurementTimestamp(fields[layout.dateIndex] ?? '', format),
      qualityLevel:
        layout.qualityIndex < 0
          ? null
          : parseIntegerCell(fields[layout.qualityIndex] ?? '', { source, stationId, parameter: 'QN' }),
      values
    });
  }
  return records;
}

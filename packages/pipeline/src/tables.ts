import { STATION_COLUMNS, type ColumnType } from './schema';
import type { ForecastRecord, ForecastStation, MeasurementRecord, Station } from './types';

export type CellValue = string | number | Date | null;

export type DatasetRow = Record<string, CellValue>;

export interface DatasetColumn {
  name: string;
  type: ColumnType;
}

/** Rows handed to the columnar writer, with their ordered column definitions. */
export interface DatasetTable {
  columns: DatasetColumn[];
  rows: DatasetRow[];
}

function valueColumns(records: Iterable<{ values: Record<string, number | null> }>): DatasetColumn[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record.values)) {
      names.add(name);
    }
  }
  return [...names].map((name) => ({ name, type: 'float64' }));
}

function withValues(row: DatasetRow, columns: DatasetColumn[], values: Record<string, number | null>): DatasetRow {
  for (const column of columns) {
    row[column.name] = values[column.name] ?? null;
  }
  return row;
}

export function stationsTable(stations: Station[]): DatasetTable {
  return {
    columns: STATION_COLUMNS.map(({ name, type }) => ({ name, type })),
    rows: stations.map((station) => ({
      station_id: station.stationId,
      date_start: station.dateStart,
      date_end: station.dateEnd,
      height: station.height,
      geo_lat: station.geoLat,
      geo_lon: station.geoLon,
      name: station.name,
      state: station.state
    }))
  };
}

export function measurementsTable(records: MeasurementRecord[]): DatasetTable {
  const parameters = valueColumns(records);
  return {
    columns: [
      { name: 'station_id', type: 'string' },
      { name: 'date_start', type: 'date' },
      { name: 'QN', type: 'int64' },
      ...parameters
    ],
    rows: records.map((record) =>
      withValues(
        { station_id: record.stationId, date_start: record.dateStart, QN: record.qualityLevel },
        parameters,
        record.values
      )
    )
  };
}

export function forecastsTable(records: ForecastRecord[]): DatasetTable {
  const parameters = valueColumns(records);
  return {
    columns: [
      { name: 'product_id', type: 'string' },
      { name: 'generating_process', type: 'string' },
      { name: 'date_issued', type: 'date' },
      { name: 'station_id', type: 'string' },
      { name: 'date_start', type: 'date' },
      ...parameters
    ],
    rows: records.map((record) =>
      withValues(
        {
          product_id: record.productId,
          generating_process: record.generatingProcess,
          date_issued: record.dateIssued,
          station_id: record.stationId,
          date_start: record.dateStart
        },
        parameters,
        record.values
      )
    )
  };
}

export function forecastStationsTable(stations: ForecastStation[]): DatasetTable {
  return {
    columns: [
      { name: 'station_id', type: 'string' },
      { name: 'station_name', type: 'string' },
      { name: 'geo_lat', type: 'float64' },
      { name: 'geo_lon', type: 'float64' },
      { name: 'height', type: 'float64' }
    ],
    rows: stations.map((station) => ({
      station_id: station.stationId,
      station_name: station.stationName,
      geo_lat: station.geoLat,
      geo_lon: station.geoLon,
      height: station.height
    }))
  };
}
